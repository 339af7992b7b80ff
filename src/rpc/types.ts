import type { Address, Hex } from "viem";

// Wire shapes as returned by the node: quantities are hex strings

export interface RpcLog {
  address: Address;
  topics: Hex[];
  data: Hex;
}

export interface RpcTransaction {
  hash: Hex;
  from: Address;
  to: Address | null;
  value: Hex;
  gas: Hex;
  gasPrice?: Hex;
  maxFeePerGas?: Hex;
  maxPriorityFeePerGas?: Hex;
  maxFeePerBlobGas?: Hex;
  nonce: Hex;
  blockNumber: Hex | null;
  transactionIndex: Hex | null;
  input: Hex;
  type?: Hex;
  accessList?: unknown[];
  blobVersionedHashes?: Hex[];
}

export interface RpcReceipt {
  transactionHash: Hex;
  status?: Hex;
  gasUsed: Hex;
  effectiveGasPrice?: Hex;
  contractAddress: Address | null;
  logs: RpcLog[];
  blobGasUsed?: Hex;
  blobGasPrice?: Hex;
}

export interface RpcBlock {
  number: Hex;
  hash: Hex;
  parentHash: Hex;
  timestamp: Hex;
  gasUsed: Hex;
  gasLimit: Hex;
  baseFeePerGas?: Hex;
  miner: Address;
  stateRoot: Hex;
  receiptsRoot: Hex;
  transactionsRoot: Hex;
  extraData: Hex;
  size?: Hex;
  uncles?: Hex[];
  withdrawals?: unknown[];
  blobGasUsed?: Hex;
  excessBlobGas?: Hex;
  transactions: (Hex | RpcTransaction)[];
}

export interface RpcFeeHistory {
  oldestBlock: Hex;
  baseFeePerGas: Hex[];
  gasUsedRatio: number[];
  reward?: Hex[][];
}

// Parsed shapes handed to the assemblers

export interface Log {
  address: Address;
  topics: Hex[];
  data: Hex;
}

export interface Transaction {
  hash: Hex;
  from: Address;
  to: Address | null;
  value: bigint;
  gas: bigint;
  gasPrice: bigint | null;
  maxFeePerGas: bigint | null;
  maxPriorityFeePerGas: bigint | null;
  nonce: number;
  blockNumber: bigint | null;
  transactionIndex: number | null;
  input: Hex;
  /** Raw EIP-2718 type byte; 0 when the node omits it */
  type: number;
  accessListSize: number | null;
  blobVersionedHashes: Hex[];
}

export interface Receipt {
  transactionHash: Hex;
  /** null for pre-Byzantium receipts, which carry a state root instead */
  status: boolean | null;
  gasUsed: bigint;
  effectiveGasPrice: bigint;
  contractAddress: Address | null;
  logs: Log[];
  blobGasUsed: bigint | null;
  blobGasPrice: bigint | null;
}

export interface Block<TTransaction = Hex> {
  number: bigint;
  hash: Hex;
  parentHash: Hex;
  timestamp: bigint;
  gasUsed: bigint;
  gasLimit: bigint;
  baseFeePerGas: bigint | null;
  miner: Address;
  stateRoot: Hex;
  receiptsRoot: Hex;
  transactionsRoot: Hex;
  extraData: Hex;
  size: bigint | null;
  unclesCount: number;
  withdrawalsCount: number | null;
  blobGasUsed: bigint | null;
  excessBlobGas: bigint | null;
  transactions: TTransaction[];
}

export interface FeeHistory {
  oldestBlock: bigint;
  baseFeePerGas: bigint[];
  gasUsedRatio: number[];
  reward: bigint[][] | null;
}
