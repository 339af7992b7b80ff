import type { Address, Hex } from "viem";
import type { TokenBalance } from "../contract/token-balances.js";
import type { TokenInfo } from "../contract/inspector.js";
import type { DecodedLog, TokenTransfer } from "../decode/events.js";

export type { DecodedLog, DecodedParam, TokenTransfer } from "../decode/events.js";
export type { TokenBalance } from "../contract/token-balances.js";
export type { TokenInfo } from "../contract/inspector.js";

export type TxType =
  | { kind: "legacy" }
  | { kind: "access-list" }
  | { kind: "eip1559" }
  | { kind: "blob" }
  | { kind: "unknown"; raw: number };

export function txTypeFromByte(raw: number): TxType {
  switch (raw) {
    case 0:
      return { kind: "legacy" };
    case 1:
      return { kind: "access-list" };
    case 2:
      return { kind: "eip1559" };
    case 3:
      return { kind: "blob" };
    default:
      return { kind: "unknown", raw };
  }
}

export interface BlockStats {
  totalValueTransferred: bigint;
  totalFees: bigint;
  burntFees: bigint;
  blobCount: number;
}

export interface BlockInfo extends BlockStats {
  number: bigint;
  hash: Hex;
  parentHash: Hex;
  timestamp: bigint;
  gasUsed: bigint;
  gasLimit: bigint;
  baseFee: bigint | null;
  txCount: number;
  miner: Address;
  minerName: string | null;
  stateRoot: Hex;
  receiptsRoot: Hex;
  transactionsRoot: Hex;
  extraData: Hex;
  /** Extra data as printable text, when it is */
  extraDataDecoded: string | null;
  size: bigint | null;
  unclesCount: number;
  withdrawalsCount: number | null;
  blobGasUsed: bigint | null;
  excessBlobGas: bigint | null;
  builderTag: string | null;
}

export interface TxSummary {
  hash: Hex;
  from: Address;
  to: Address | null;
  value: bigint;
  gasLimit: bigint;
  type: TxType;
  isContractCreation: boolean;
  fromName: string | null;
  toName: string | null;
  inputSize: number;
  methodSelector: Hex | null;
  /** Bare function name, e.g. "transfer" */
  decodedMethod: string | null;
  blobCount: number;
  /** gasUsed * effectiveGasPrice; null without a receipt */
  feePaid: bigint | null;
}

export interface BlockTransactions {
  transactions: TxSummary[];
  stats: BlockStats;
}

export interface BlockWithTransactions {
  /** Derived fields filled from the transaction fetch */
  block: BlockInfo;
  transactions: TxSummary[];
}

/**
 * Receipt-derived part of TxInfo
 */
export interface TxReceiptInfo {
  gasUsed: bigint;
  status: boolean | null;
  actualFee: bigint;
  contractCreated: Address | null;
  logsCount: number;
  blobGasUsed: bigint | null;
  blobGasPrice: bigint | null;
  logs: DecodedLog[];
  tokenTransfers: TokenTransfer[];
}

export interface TxInfo extends Omit<TxSummary, "feePaid"> {
  gasPrice: bigint | null;
  maxFeePerGas: bigint | null;
  maxPriorityFeePerGas: bigint | null;
  nonce: number;
  blockNumber: bigint | null;
  txIndex: number | null;
  accessListSize: number | null;
  blobHashes: Hex[];
  input: Hex;
  /** Absent while the transaction is pending or the receipt could not be read */
  receipt: TxReceiptInfo | null;
}

export interface AddressInfo {
  address: Address;
  balance: bigint;
  nonce: number;
  isContract: boolean;
  codeSize: number;
  proxyImpl: Address | null;
  tokenInfo: TokenInfo | null;
  name: string | null;
  owner: Address | null;
  tokenBalances: TokenBalance[];
}

export interface NetworkSnapshot {
  latestBlock: bigint;
  gasPrice: bigint;
  clientVersion: string;
  /** Base fee per block, oldest first (includes the next block's estimate) */
  baseFeeTrend: bigint[] | null;
  /** Latest block's priority fees at the 25th, 50th and 75th percentiles */
  priorityFeePercentiles: bigint[] | null;
}
