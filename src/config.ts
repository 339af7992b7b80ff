import { readFile, access } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { pathToFileURL } from "node:url";

/**
 * Logging configuration
 */
export interface LogConfig {
  /** Show each JSON-RPC request sent to the node (default: false) */
  requests?: boolean;
  /** Show backoff retries (default: true) */
  retries?: boolean;
}

export interface RetryConfig {
  /** Retries after the first attempt (default: 5) */
  maxRetries?: number;
  /** Delay before the first retry in ms; doubles on each retry (default: 500) */
  baseDelayMs?: number;
}

export interface Config {
  /** JSON-RPC endpoint of an Ethereum node */
  rpcUrl?: string;
  /** Port of the HTTP API started by `serve` (default: 8547) */
  port?: number;
  /** Per-request timeout in ms (default: 30000) */
  requestTimeoutMs?: number;
  retry?: RetryConfig;
  /** Budget for the popular-token balance scan in ms (default: 5000) */
  tokenScanTimeoutMs?: number;
  logging?: LogConfig;
}

/**
 * Config with every default applied; rpcUrl stays optional
 */
export interface ResolvedConfig {
  rpcUrl?: string;
  port: number;
  requestTimeoutMs: number;
  retry: Required<RetryConfig>;
  tokenScanTimeoutMs: number;
  logging: Required<LogConfig>;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  port: 8547,
  requestTimeoutMs: 30_000,
  retry: { maxRetries: 5, baseDelayMs: 500 },
  tokenScanTimeoutMs: 5_000,
  logging: { requests: false, retries: true },
};

export const RPC_URL_ENV = "CHAINLENS_RPC_URL";

/**
 * Supported config file extensions in order of precedence
 */
const CONFIG_EXTENSIONS = [".ts", ".js", ".json"] as const;
export const CONFIG_BASENAME = "chainlens.config";
export type ConfigFormat = "ts" | "js" | "json";

/** Export forms a config file may use, each ending just before its `{` */
const EXPORT_FORMS = [
  /export\s+default\s*(?=\{)/,
  /export\s+const\s+config\s*=\s*(?=\{)/,
  /module\.exports\s*=\s*(?=\{)/,
];

const WORD = /[\w$.]+/y;
const KEY_COLON = /\s*:/y;

/** Index of the quote closing the string that opens at `start`, or -1 */
function closingQuote(source: string, start: number): number {
  const quote = source[start];
  for (let i = start + 1; i < source.length; i++) {
    if (source[i] === "\\") i++;
    else if (source[i] === quote) return i;
  }
  return -1;
}

/**
 * Rewrite the object literal opening at `start` as JSON text. Drops
 * comments, trailing commas and numeric separators, quotes bare keys and
 * turns single-quoted strings into double-quoted ones. Null when the
 * literal never closes.
 */
function literalToJson(source: string, start: number): string | null {
  let json = "";
  let depth = 0;
  let pendingComma = false;
  const emit = (token: string) => {
    if (pendingComma && token !== "}" && token !== "]") json += ",";
    pendingComma = false;
    json += token;
  };

  let i = start;
  while (i < source.length) {
    const char = source[i];

    if (/\s/.test(char)) {
      i++;
    } else if (source.startsWith("//", i)) {
      const end = source.indexOf("\n", i);
      i = end < 0 ? source.length : end;
    } else if (source.startsWith("/*", i)) {
      const end = source.indexOf("*/", i + 2);
      if (end < 0) return null;
      i = end + 2;
    } else if (char === '"' || char === "'") {
      const end = closingQuote(source, i);
      if (end < 0) return null;
      const body = source.slice(i + 1, end);
      emit(char === '"' ? `"${body}"` : `"${body.replace(/"/g, '\\"').replace(/\\'/g, "'")}"`);
      i = end + 1;
    } else if (char === ",") {
      pendingComma = true;
      i++;
    } else {
      WORD.lastIndex = i;
      const word = WORD.exec(source);
      if (word) {
        i += word[0].length;
        KEY_COLON.lastIndex = i;
        if (/^\d/.test(word[0])) emit(word[0].replace(/_/g, ""));
        else emit(KEY_COLON.test(source) ? `"${word[0]}"` : word[0]);
        continue;
      }

      if (char === "{" || char === "[") depth++;
      if (char === "}" || char === "]") depth--;
      emit(char);
      i++;
      if (depth === 0) return json;
    }
  }
  return null;
}

/**
 * The object a TS or JS config file exports as a plain literal, or
 * undefined when no export form yields one
 */
function readObjectLiteral(source: string): unknown {
  for (const form of EXPORT_FORMS) {
    const match = form.exec(source);
    if (!match) continue;

    const json = literalToJson(source, match.index + match[0].length);
    if (json === null) continue;

    try {
      return JSON.parse(json);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(source: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new Error(`Config field ${path} must be a non-negative number`);
  }
  return value;
}

function optionalInteger(source: Record<string, unknown>, key: string, path: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new Error(`Config field ${path} must be a non-negative integer`);
  }
  return value;
}

function optionalBoolean(source: Record<string, unknown>, key: string, path: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`Config field ${path} must be a boolean`);
  }
  return value;
}

/**
 * Check the shape of a parsed config object
 */
export function parseConfig(value: unknown): Config {
  if (!isRecord(value)) {
    throw new Error("Config must be an object");
  }

  const config: Config = {};
  if (value.rpcUrl !== undefined) {
    if (typeof value.rpcUrl !== "string") throw new Error("Config field rpcUrl must be a string");
    config.rpcUrl = value.rpcUrl;
  }
  config.port = optionalInteger(value, "port", "port");
  config.requestTimeoutMs = optionalNumber(value, "requestTimeoutMs", "requestTimeoutMs");
  config.tokenScanTimeoutMs = optionalNumber(value, "tokenScanTimeoutMs", "tokenScanTimeoutMs");

  if (value.retry !== undefined) {
    if (!isRecord(value.retry)) throw new Error("Config field retry must be an object");
    config.retry = {
      maxRetries: optionalInteger(value.retry, "maxRetries", "retry.maxRetries"),
      baseDelayMs: optionalNumber(value.retry, "baseDelayMs", "retry.baseDelayMs"),
    };
  }

  if (value.logging !== undefined) {
    if (!isRecord(value.logging)) throw new Error("Config field logging must be an object");
    config.logging = {
      requests: optionalBoolean(value.logging, "requests", "logging.requests"),
      retries: optionalBoolean(value.logging, "retries", "logging.retries"),
    };
  }

  return config;
}

/**
 * Paths to try, in order: the given file as is when it names an
 * extension, otherwise the file or chainlens.config with each extension
 */
function configCandidates(cwd: string, configFile?: string): string[] {
  if (!configFile) {
    return CONFIG_EXTENSIONS.map((ext) => join(cwd, CONFIG_BASENAME + ext));
  }
  const base = isAbsolute(configFile) ? configFile : join(cwd, configFile);
  if (/\.(ts|js|json)$/.test(configFile)) return [base];
  return CONFIG_EXTENSIONS.map((ext) => base + ext);
}

export async function findConfigFile(cwd: string, configFile?: string): Promise<string | null> {
  for (const candidate of configCandidates(cwd, configFile)) {
    const exists = await access(candidate).then(
      () => true,
      () => false
    );
    if (exists) return candidate;
  }
  return null;
}

/**
 * Get the format of a config file based on its extension
 */
export function getConfigFormat(configPath: string): ConfigFormat {
  if (configPath.endsWith(".ts")) return "ts";
  if (configPath.endsWith(".js")) return "js";
  return "json";
}

/**
 * Load config from a specific path
 */
export async function loadConfigFromPath(configPath: string): Promise<Config> {
  const content = await readFile(configPath, "utf-8");
  const format = getConfigFormat(configPath);

  if (format === "json") {
    return parseConfig(JSON.parse(content));
  }

  const literal = readObjectLiteral(content);
  if (literal !== undefined) {
    return parseConfig(literal);
  }

  // dynamic import handles JS the object-literal parser cannot
  if (format === "js") {
    const fileUrl = pathToFileURL(resolve(configPath)).href;
    const module: unknown = await import(fileUrl);
    if (isRecord(module)) {
      return parseConfig(module.default ?? module.config);
    }
  }

  throw new Error(`Failed to parse config file: ${configPath}`);
}

/**
 * Load chainlens.config.ts, .js or .json. A missing file is an empty
 * config; a file that exists but cannot be parsed is an error.
 */
export async function loadConfig(cwd: string, configFile?: string): Promise<Config> {
  const configPath = await findConfigFile(cwd, configFile);

  if (!configPath) {
    if (configFile) {
      throw new Error(`Config file not found: ${configFile}`);
    }
    return {};
  }

  return loadConfigFromPath(configPath);
}

export function resolveConfig(config: Config): ResolvedConfig {
  return {
    rpcUrl: config.rpcUrl,
    port: config.port ?? DEFAULT_CONFIG.port,
    requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    retry: {
      maxRetries: config.retry?.maxRetries ?? DEFAULT_CONFIG.retry.maxRetries,
      baseDelayMs: config.retry?.baseDelayMs ?? DEFAULT_CONFIG.retry.baseDelayMs,
    },
    tokenScanTimeoutMs: config.tokenScanTimeoutMs ?? DEFAULT_CONFIG.tokenScanTimeoutMs,
    logging: {
      requests: config.logging?.requests ?? DEFAULT_CONFIG.logging.requests,
      retries: config.logging?.retries ?? DEFAULT_CONFIG.logging.retries,
    },
  };
}

/**
 * RPC endpoint: --rpc flag, then CHAINLENS_RPC_URL, then config.rpcUrl
 */
export function resolveRpcUrl(
  flag: string | undefined,
  config: Pick<Config, "rpcUrl">,
  env: Record<string, string | undefined> = process.env
): string {
  const url = flag ?? env[RPC_URL_ENV] ?? config.rpcUrl;
  if (!url) {
    throw new Error(
      `No RPC endpoint configured. Pass --rpc <url>, set ${RPC_URL_ENV}, or add rpcUrl to ${CONFIG_BASENAME}.json`
    );
  }
  return url;
}
