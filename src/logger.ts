import chalk from "chalk";
import type { LogConfig } from "./config.js";
import type { RetryEvent } from "./rpc/retry.js";

export interface Logger {
  /** Outgoing JSON-RPC request */
  request(method: string, params: readonly unknown[]): void;
  retry(event: RetryEvent): void;
  info(message: string): void;
  error(message: string): void;
}

type Write = (line: string) => void;

function writeStderr(line: string): void {
  process.stderr.write(line + "\n");
}

/**
 * Summarize call params for a log line
 */
export function describeParams(method: string, params: readonly unknown[]): string | null {
  const [first] = params;
  if (first === undefined) return null;

  if (method === "eth_call" && typeof first === "object" && first !== null && "to" in first) {
    const { to } = first;
    const data = "data" in first ? first.data : undefined;
    if (typeof to === "string") {
      const shortAddr = `${to.slice(0, 6)}...${to.slice(-4)}`;
      const selector = typeof data === "string" ? data.slice(0, 10) : "";
      return `to=${shortAddr} ${selector}`.trimEnd();
    }
  }

  if (typeof first === "string") {
    return first.length > 18 ? `${first.slice(0, 10)}...` : first;
  }

  return null;
}

/**
 * Coloured log lines on stderr; stdout is kept for command output
 */
export function createLogger(logging: Required<LogConfig>, write: Write = writeStderr): Logger {
  return {
    request(method, params) {
      if (!logging.requests) return;
      const info = describeParams(method, params);
      write(chalk.yellow(`→ ${method}`) + (info ? chalk.dim(` ${info}`) : ""));
    },
    retry({ attempt, delayMs, message, label }) {
      if (!logging.retries) return;
      const what = label ? `${label} ` : "";
      write(chalk.yellow(`↻ ${what}attempt ${attempt + 1} failed, retrying in ${delayMs}ms`) + chalk.dim(` ${message}`));
    },
    info(message) {
      write(chalk.dim(message));
    },
    error(message) {
      write(chalk.red(message));
    },
  };
}
