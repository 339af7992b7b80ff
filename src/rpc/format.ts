import { hexToBigInt, hexToNumber, type Hex } from "viem";
import type {
  Block,
  FeeHistory,
  Log,
  Receipt,
  RpcBlock,
  RpcFeeHistory,
  RpcLog,
  RpcReceipt,
  RpcTransaction,
  Transaction,
} from "./types.js";

function quantity(value: Hex | undefined | null): bigint | null {
  return value === undefined || value === null ? null : hexToBigInt(value);
}

function smallQuantity(value: Hex | undefined | null): number | null {
  return value === undefined || value === null ? null : hexToNumber(value);
}

export function formatLog(log: RpcLog): Log {
  return {
    address: log.address,
    topics: [...log.topics],
    data: log.data,
  };
}

export function formatTransaction(tx: RpcTransaction): Transaction {
  return {
    hash: tx.hash,
    from: tx.from,
    to: tx.to ?? null,
    value: hexToBigInt(tx.value),
    gas: hexToBigInt(tx.gas),
    gasPrice: quantity(tx.gasPrice),
    maxFeePerGas: quantity(tx.maxFeePerGas),
    maxPriorityFeePerGas: quantity(tx.maxPriorityFeePerGas),
    nonce: hexToNumber(tx.nonce),
    blockNumber: quantity(tx.blockNumber),
    transactionIndex: smallQuantity(tx.transactionIndex),
    input: tx.input,
    type: smallQuantity(tx.type) ?? 0,
    accessListSize: tx.accessList ? tx.accessList.length : null,
    blobVersionedHashes: tx.blobVersionedHashes ? [...tx.blobVersionedHashes] : [],
  };
}

export function formatReceipt(receipt: RpcReceipt): Receipt {
  return {
    transactionHash: receipt.transactionHash,
    status: receipt.status === undefined ? null : hexToNumber(receipt.status) === 1,
    gasUsed: hexToBigInt(receipt.gasUsed),
    // pre-London nodes omit effectiveGasPrice
    effectiveGasPrice: quantity(receipt.effectiveGasPrice) ?? 0n,
    contractAddress: receipt.contractAddress ?? null,
    logs: receipt.logs.map(formatLog),
    blobGasUsed: quantity(receipt.blobGasUsed),
    blobGasPrice: quantity(receipt.blobGasPrice),
  };
}

function formatHeader(block: RpcBlock): Omit<Block<never>, "transactions"> {
  return {
    number: hexToBigInt(block.number),
    hash: block.hash,
    parentHash: block.parentHash,
    timestamp: hexToBigInt(block.timestamp),
    gasUsed: hexToBigInt(block.gasUsed),
    gasLimit: hexToBigInt(block.gasLimit),
    baseFeePerGas: quantity(block.baseFeePerGas),
    miner: block.miner,
    stateRoot: block.stateRoot,
    receiptsRoot: block.receiptsRoot,
    transactionsRoot: block.transactionsRoot,
    extraData: block.extraData,
    size: quantity(block.size),
    unclesCount: block.uncles?.length ?? 0,
    withdrawalsCount: block.withdrawals ? block.withdrawals.length : null,
    blobGasUsed: quantity(block.blobGasUsed),
    excessBlobGas: quantity(block.excessBlobGas),
  };
}

/**
 * Format a block fetched without transaction bodies
 */
export function formatBlock(block: RpcBlock): Block<Hex> {
  return {
    ...formatHeader(block),
    transactions: block.transactions.map((tx) => (typeof tx === "string" ? tx : tx.hash)),
  };
}

/**
 * Format a block fetched with full transaction bodies
 */
export function formatBlockWithTransactions(block: RpcBlock): Block<Transaction> {
  const transactions: Transaction[] = [];
  for (const tx of block.transactions) {
    if (typeof tx === "string") {
      throw new Error(`Block ${block.number} returned transaction hashes where bodies were requested`);
    }
    transactions.push(formatTransaction(tx));
  }
  return { ...formatHeader(block), transactions };
}

export function formatFeeHistory(history: RpcFeeHistory): FeeHistory {
  return {
    oldestBlock: hexToBigInt(history.oldestBlock),
    baseFeePerGas: history.baseFeePerGas.map((fee) => hexToBigInt(fee)),
    gasUsedRatio: [...history.gasUsedRatio],
    reward: history.reward ? history.reward.map((row) => row.map((r) => hexToBigInt(r))) : null,
  };
}
