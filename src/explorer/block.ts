import type { Address, Hex } from "viem";
import { FetchError } from "../errors.js";
import { detectBuilderTag, printableExtraData } from "../decode/builders.js";
import type { NameResolver } from "../ens/resolver.js";
import type { RetryExecutor } from "../rpc/retry.js";
import type { Transport } from "../rpc/transport.js";
import type { Block, Receipt, Transaction } from "../rpc/types.js";
import { fetchRequired, receiptFee, summarizeTransaction } from "./summary.js";
import type {
  BlockInfo,
  BlockStats,
  BlockTransactions,
  BlockWithTransactions,
} from "./types.js";

export const EMPTY_STATS: BlockStats = {
  totalValueTransferred: 0n,
  totalFees: 0n,
  burntFees: 0n,
  blobCount: 0,
};

/**
 * BlockInfo without derived fields
 */
export function toBlockInfo(block: Block<unknown>, minerName: string | null): BlockInfo {
  return {
    number: block.number,
    hash: block.hash,
    parentHash: block.parentHash,
    timestamp: block.timestamp,
    gasUsed: block.gasUsed,
    gasLimit: block.gasLimit,
    baseFee: block.baseFeePerGas,
    txCount: block.transactions.length,
    miner: block.miner,
    minerName,
    stateRoot: block.stateRoot,
    receiptsRoot: block.receiptsRoot,
    transactionsRoot: block.transactionsRoot,
    extraData: block.extraData,
    extraDataDecoded: printableExtraData(block.extraData),
    size: block.size,
    unclesCount: block.unclesCount,
    withdrawalsCount: block.withdrawalsCount,
    blobGasUsed: block.blobGasUsed,
    excessBlobGas: block.excessBlobGas,
    builderTag: detectBuilderTag(block.extraData, block.miner),
    ...EMPTY_STATS,
  };
}

export function computeBlockStats(
  block: Block<Transaction>,
  receipts: ReadonlyMap<Hex, Receipt>
): BlockStats {
  let totalValueTransferred = 0n;
  let totalFees = 0n;
  let blobCount = 0;

  for (const tx of block.transactions) {
    totalValueTransferred += tx.value;
    blobCount += tx.blobVersionedHashes.length;
    const receipt = receipts.get(tx.hash);
    if (receipt) totalFees += receiptFee(receipt);
  }

  // blocks before the London fork burn nothing
  const burntFees = block.baseFeePerGas === null ? 0n : block.baseFeePerGas * block.gasUsed;

  return { totalValueTransferred, totalFees, burntFees, blobCount };
}

function uniqueParticipants(transactions: readonly Transaction[]): Address[] {
  const seen = new Map<string, Address>();
  for (const tx of transactions) {
    seen.set(tx.from.toLowerCase(), tx.from);
    if (tx.to !== null) seen.set(tx.to.toLowerCase(), tx.to);
  }
  return [...seen.values()];
}

export class BlockAssembler {
  constructor(
    private readonly transport: Transport,
    private readonly executor: RetryExecutor,
    private readonly names: NameResolver
  ) {}

  /**
   * Block header with miner name and builder tag; derived fields stay zero
   */
  async getBlock(number: bigint): Promise<BlockInfo> {
    try {
      const block = await fetchRequired(
        this.executor,
        "eth_getBlockByNumber",
        "block",
        number.toString(),
        () => this.transport.getBlock(number)
      );
      const minerName = await this.names.reverseResolveOne(block.miner);
      return toBlockInfo(block, minerName);
    } catch (err) {
      throw new FetchError("fetch block", `#${number}`, this.transport.url, err);
    }
  }

  /**
   * Transaction summaries with names and fees, plus block statistics.
   * Receipts are optional: without them fees are zero and feePaid is null.
   */
  async getBlockTransactions(number: bigint): Promise<BlockTransactions> {
    try {
      const block = await fetchRequired(
        this.executor,
        "eth_getBlockByNumber(full)",
        "block",
        number.toString(),
        () => this.transport.getBlockWithTransactions(number)
      );

      const names = await this.names.reverseResolve(uniqueParticipants(block.transactions));
      const receipts = await this.readReceipts(number);

      return {
        transactions: block.transactions.map((tx) =>
          summarizeTransaction(tx, names, receipts.get(tx.hash))
        ),
        stats: computeBlockStats(block, receipts),
      };
    } catch (err) {
      throw new FetchError("fetch transactions for block", `#${number}`, this.transport.url, err);
    }
  }

  /**
   * The paired fetch: header and transactions, with derived fields filled
   */
  async getBlockWithTransactions(number: bigint): Promise<BlockWithTransactions> {
    const [block, { transactions, stats }] = await Promise.all([
      this.getBlock(number),
      this.getBlockTransactions(number),
    ]);
    return { block: { ...block, ...stats }, transactions };
  }

  private async readReceipts(number: bigint): Promise<Map<Hex, Receipt>> {
    const index = new Map<Hex, Receipt>();
    let receipts: Receipt[] | null;
    try {
      receipts = await this.executor.run(
        () => this.transport.getBlockReceipts(number),
        "eth_getBlockReceipts"
      );
    } catch {
      // nodes without eth_getBlockReceipts still serve the block
      return index;
    }
    for (const receipt of receipts ?? []) {
      index.set(receipt.transactionHash, receipt);
    }
    return index;
  }
}
