import { RpcError } from "../errors.js";

interface JsonRpcRequest {
  jsonrpc: "2.0";
  method: string;
  params: unknown[];
  id: number;
}

interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: number;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

export interface JsonRpcClientOptions {
  /** Abort a single request after this many milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Called once per request, before it is sent */
  onRequest?: (method: string, params: unknown[]) => void;
}

/**
 * Minimal JSON-RPC 2.0 client over HTTP POST
 */
export class JsonRpcClient {
  private requestId = 0;
  private readonly timeoutMs: number;
  private readonly onRequest?: (method: string, params: unknown[]) => void;

  constructor(
    private readonly rpcUrl: string,
    options: JsonRpcClientOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.onRequest = options.onRequest;
  }

  /**
   * Send one request and return its `result` member
   */
  async call<T = unknown>(method: string, params: unknown[] = []): Promise<T> {
    const request: JsonRpcRequest = {
      jsonrpc: "2.0",
      method,
      params,
      id: ++this.requestId,
    };
    this.onRequest?.(method, params);

    let response: Response;
    try {
      response = await fetch(this.rpcUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === "TimeoutError") {
        throw new RpcError(
          `RPC request ${method} timed out after ${this.timeoutMs}ms`,
          -32603,
          undefined,
          err
        );
      }
      throw new RpcError(
        `RPC connection failed for ${method}: ${err instanceof Error ? err.message : "Unknown error"}`,
        -32603,
        undefined,
        err
      );
    }

    if (!response.ok) {
      throw new RpcError(
        `RPC endpoint returned HTTP ${response.status} ${response.statusText} for ${method}`,
        -32603,
        { status: response.status }
      );
    }

    let json: JsonRpcResponse;
    try {
      json = (await response.json()) as JsonRpcResponse;
    } catch (err) {
      // the timeout signal also covers reading the body
      if (err instanceof Error && err.name === "TimeoutError") {
        throw new RpcError(
          `RPC request ${method} timed out after ${this.timeoutMs}ms`,
          -32603,
          undefined,
          err
        );
      }
      throw new RpcError(`Invalid JSON response from RPC endpoint for ${method}`, -32700);
    }

    if (json.error) {
      throw new RpcError(json.error.message, json.error.code, json.error.data);
    }

    return json.result as T;
  }

  /**
   * The endpoint URL (for logging and error context)
   */
  get url(): string {
    return this.rpcUrl;
  }
}
