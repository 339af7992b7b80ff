import type { Address, Hex } from "viem";
import { FetchError } from "../errors.js";
import { decodeLog, extractTokenTransfer, type TokenTransfer } from "../decode/events.js";
import { decodeFunctionSelector } from "../decode/selectors.js";
import type { NameResolver } from "../ens/resolver.js";
import type { RetryExecutor } from "../rpc/retry.js";
import type { Transport } from "../rpc/transport.js";
import type { Receipt, Transaction } from "../rpc/types.js";
import { fetchRequired, receiptFee, summarizeTransaction } from "./summary.js";
import type { TxInfo, TxReceiptInfo } from "./types.js";

export function toReceiptInfo(receipt: Receipt): TxReceiptInfo {
  const tokenTransfers: TokenTransfer[] = [];
  for (const log of receipt.logs) {
    const transfer = extractTokenTransfer(log);
    if (transfer) tokenTransfers.push(transfer);
  }

  return {
    gasUsed: receipt.gasUsed,
    status: receipt.status,
    actualFee: receiptFee(receipt),
    contractCreated: receipt.contractAddress,
    logsCount: receipt.logs.length,
    blobGasUsed: receipt.blobGasUsed,
    blobGasPrice: receipt.blobGasPrice,
    logs: receipt.logs.map(decodeLog),
    tokenTransfers,
  };
}

export function toTxInfo(
  tx: Transaction,
  receipt: Receipt | null,
  names: ReadonlyMap<string, string>
): TxInfo {
  const { feePaid: _feePaid, ...summary } = summarizeTransaction(tx, names);
  return {
    ...summary,
    // full signature here; summaries carry the bare name
    decodedMethod: decodeFunctionSelector(tx.input),
    gasPrice: tx.gasPrice,
    maxFeePerGas: tx.maxFeePerGas,
    maxPriorityFeePerGas: tx.maxPriorityFeePerGas,
    nonce: tx.nonce,
    blockNumber: tx.blockNumber,
    txIndex: tx.transactionIndex,
    accessListSize: tx.accessListSize,
    blobHashes: tx.blobVersionedHashes,
    input: tx.input,
    receipt: receipt ? toReceiptInfo(receipt) : null,
  };
}

export class TransactionAssembler {
  constructor(
    private readonly transport: Transport,
    private readonly executor: RetryExecutor,
    private readonly names: NameResolver
  ) {}

  /**
   * Transaction with decoded logs and token transfers. A missing or
   * unreadable receipt leaves `receipt` null (pending transaction).
   */
  async getTransaction(hash: Hex): Promise<TxInfo> {
    try {
      const [tx, receipt] = await Promise.all([
        fetchRequired(this.executor, "eth_getTransactionByHash", "transaction", hash, () =>
          this.transport.getTransaction(hash)
        ),
        this.readReceipt(hash),
      ]);

      const participants: Address[] = tx.to === null ? [tx.from] : [tx.from, tx.to];
      const names = await this.names.reverseResolve(participants);

      return toTxInfo(tx, receipt, names);
    } catch (err) {
      throw new FetchError("fetch transaction", hash, this.transport.url, err);
    }
  }

  private async readReceipt(hash: Hex): Promise<Receipt | null> {
    try {
      return await this.executor.run(
        () => this.transport.getTransactionReceipt(hash),
        "eth_getTransactionReceipt"
      );
    } catch {
      // treated like a pending transaction
      return null;
    }
  }
}
