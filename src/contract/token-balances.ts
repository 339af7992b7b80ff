import {
  encodeFunctionData,
  erc20Abi,
  hexToBigInt,
  size,
  slice,
  type Address,
  type Hex,
} from "viem";
import { ScanTimeoutError } from "../errors.js";
import type { RetryExecutor } from "../rpc/retry.js";
import type { Transport } from "../rpc/transport.js";
import { POPULAR_TOKENS, type KnownToken } from "./tokens.js";

export interface TokenBalance {
  readonly symbol: string;
  readonly name: string;
  readonly address: Address;
  readonly balance: bigint;
  readonly decimals: number;
}

export interface TokenBalanceScannerOptions {
  /** Budget for the whole scan (default: 5000) */
  timeoutMs?: number;
  tokens?: readonly KnownToken[];
}

/**
 * Smallest raw balance worth listing: 0.0001 display units
 */
export function dustThreshold(decimals: number): bigint {
  return 10n ** BigInt(Math.max(decimals - 4, 0));
}

/**
 * Reject with ScanTimeoutError if `promise` has not settled after `ms`
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ScanTimeoutError(operation, ms)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Calls balanceOf on a fixed token table
 */
export class TokenBalanceScanner {
  private readonly timeoutMs: number;
  private readonly tokens: readonly KnownToken[];

  constructor(
    private readonly transport: Transport,
    private readonly executor: RetryExecutor,
    options: TokenBalanceScannerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.tokens = options.tokens ?? POPULAR_TOKENS;
  }

  /**
   * Non-dust balances in table order; [] when the scan runs out of time
   */
  async scan(owner: Address): Promise<TokenBalance[]> {
    try {
      return await withTimeout(this.scanAll(owner), this.timeoutMs, "Token balance scan");
    } catch {
      // late calls keep running; their results are dropped
      return [];
    }
  }

  private async scanAll(owner: Address): Promise<TokenBalance[]> {
    const data = encodeFunctionData({ abi: erc20Abi, functionName: "balanceOf", args: [owner] });
    const balances: TokenBalance[] = [];

    for (const token of this.tokens) {
      let result: Hex;
      try {
        result = await this.executor.run(
          () => this.transport.call({ to: token.address, data }),
          `balanceOf ${token.symbol}`
        );
      } catch {
        continue; // unreachable or non-ERC-20 token contract
      }
      if (size(result) < 32) continue;

      const balance = hexToBigInt(slice(result, 0, 32));
      if (balance >= dustThreshold(token.decimals)) {
        balances.push({
          symbol: token.symbol,
          name: token.name,
          address: token.address,
          balance,
          decimals: token.decimals,
        });
      }
    }

    return balances;
  }
}
