/**
 * Base class for all chainlens errors
 */
export abstract class ExplorerError extends Error {
  abstract readonly code: number;
  abstract readonly data?: unknown;
}

/**
 * Error reported by the node (JSON-RPC error object) or by the HTTP layer
 */
export class RpcError extends ExplorerError {
  readonly code: number;
  readonly data?: unknown;

  constructor(message: string, code: number, data?: unknown, cause?: unknown) {
    super(message, { cause });
    this.name = "RpcError";
    this.code = code;
    this.data = data;
  }
}

export type NotFoundKind = "block" | "transaction" | "receipts";

/**
 * The node answered with null for a requested block or transaction
 */
export class NotFoundError extends ExplorerError {
  readonly code = -32001;
  readonly data: { kind: NotFoundKind; id: string };

  constructor(kind: NotFoundKind, id: string) {
    const label = kind === "block" ? `Block ${id}` : kind === "transaction" ? `Transaction ${id}` : `Receipts for block ${id}`;
    super(`${label} not found (RPC returned null)`);
    this.name = "NotFoundError";
    this.data = { kind, id };
  }
}

/**
 * Every attempt of a retried operation failed
 */
export class RetryError extends ExplorerError {
  readonly code = -32002;
  readonly data: { attempts: string[] };

  constructor(attempts: string[], last: unknown) {
    const lastMessage = describeError(last);
    const message =
      attempts.length > 1
        ? `${lastMessage}\n\nAll attempts:\n${attempts.join("\n")}`
        : lastMessage;
    super(message, { cause: last });
    this.name = "RetryError";
    this.data = { attempts };
  }

  get attempts(): readonly string[] {
    return this.data.attempts;
  }
}

/**
 * A contract call answered with bytes of the wrong length or shape
 */
export class DecodeError extends ExplorerError {
  readonly code = -32005;
  readonly data: { address: string; call: string; reason: string };

  constructor(address: string, call: string, reason: string) {
    super(`Failed to decode ${call} from ${address}: ${reason}`);
    this.name = "DecodeError";
    this.data = { address, call, reason };
  }
}

/**
 * A caller passed something that is not a block number, hash, address or name
 */
export class InvalidInputError extends ExplorerError {
  readonly code = -32602;
  readonly data: { input: string };

  constructor(message: string, input: string) {
    super(message);
    this.name = "InvalidInputError";
    this.data = { input };
  }
}

export type ResolutionStep = "registry" | "resolver";

/**
 * Forward ENS resolution failed at one of its two steps
 */
export class ResolutionError extends ExplorerError {
  readonly code = -32003;
  readonly data: { name: string; step: ResolutionStep };

  constructor(name: string, step: ResolutionStep, reason: string, cause?: unknown) {
    super(`ENS ${step} lookup failed for ${name}: ${reason}`, { cause });
    this.name = "ResolutionError";
    this.data = { name, step };
  }
}

/**
 * An operation did not settle within its time budget
 */
export class ScanTimeoutError extends ExplorerError {
  readonly code = -32004;
  readonly data: { timeoutMs: number };

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "ScanTimeoutError";
    this.data = { timeoutMs };
  }
}

/**
 * A primary fetch failed; names the operation, its target and the endpoint
 */
export class FetchError extends ExplorerError {
  readonly code: number;
  readonly data: { operation: string; target: string; endpoint: string };

  constructor(operation: string, target: string, endpoint: string, cause: unknown) {
    super(`Failed to ${operation} ${target} (rpc: ${endpoint}): ${describeError(cause)}`, {
      cause,
    });
    this.name = "FetchError";
    this.code = cause instanceof ExplorerError ? cause.code : -32000;
    this.data = { operation, target, endpoint };
  }
}

/**
 * Render an error and its cause chain, links joined with ": "
 */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  while (current !== undefined && current !== null && parts.length < 8) {
    if (current instanceof Error) {
      const message = current.message;
      // wrappers repeat their cause's message; keep each link once
      if (!parts.some((p) => p.includes(message))) {
        parts.push(message);
      }
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  return parts.join(": ");
}

/**
 * Find an error of the given class anywhere in the cause chain
 */
export function findCause<T extends Error>(
  err: unknown,
  type: abstract new (...args: never[]) => T
): T | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 8 && current instanceof Error; depth++) {
    if (current instanceof type) return current;
    current = current.cause;
  }
  return undefined;
}
