import { FetchError } from "../errors.js";
import type { RetryExecutor } from "../rpc/retry.js";
import type { Transport } from "../rpc/transport.js";
import type { FeeHistory } from "../rpc/types.js";
import type { NetworkSnapshot } from "./types.js";

export const FEE_HISTORY_BLOCKS = 5;
export const FEE_HISTORY_PERCENTILES = [25, 50, 75] as const;

export class NetworkAssembler {
  constructor(
    private readonly transport: Transport,
    private readonly executor: RetryExecutor
  ) {}

  /**
   * Latest block and gas price are required; client version and fee
   * history fall back to "Unknown" and null
   */
  async getSnapshot(): Promise<NetworkSnapshot> {
    let latestBlock: bigint;
    let gasPrice: bigint;
    try {
      latestBlock = await this.executor.run(() => this.transport.getBlockNumber(), "eth_blockNumber");
      gasPrice = await this.executor.run(() => this.transport.getGasPrice(), "eth_gasPrice");
    } catch (err) {
      throw new FetchError("fetch", "network info", this.transport.url, err);
    }

    let clientVersion: string;
    try {
      clientVersion = await this.transport.getClientVersion();
    } catch {
      clientVersion = "Unknown";
    }

    let history: FeeHistory | null;
    try {
      history = await this.transport.getFeeHistory(FEE_HISTORY_BLOCKS, FEE_HISTORY_PERCENTILES);
    } catch {
      history = null;
    }

    return {
      latestBlock,
      gasPrice,
      clientVersion,
      baseFeeTrend: history ? history.baseFeePerGas : null,
      priorityFeePercentiles: history?.reward?.at(-1) ?? null,
    };
  }
}
