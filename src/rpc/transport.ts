import { numberToHex, type Address, type Hex } from "viem";
import { JsonRpcClient } from "./client.js";
import {
  formatBlock,
  formatBlockWithTransactions,
  formatFeeHistory,
  formatReceipt,
  formatTransaction,
} from "./format.js";
import type {
  Block,
  FeeHistory,
  Receipt,
  RpcBlock,
  RpcFeeHistory,
  RpcReceipt,
  RpcTransaction,
  Transaction,
} from "./types.js";

export interface CallRequest {
  to: Address;
  data: Hex;
}

/**
 * Read-only node primitives the explorer is built on.
 * `null` means the node answered but has no such object.
 */
export interface Transport {
  /** Endpoint description, used in error messages */
  readonly url: string;
  getBlockNumber(): Promise<bigint>;
  getBlock(number: bigint): Promise<Block<Hex> | null>;
  getBlockWithTransactions(number: bigint): Promise<Block<Transaction> | null>;
  getBlockReceipts(number: bigint): Promise<Receipt[] | null>;
  getTransaction(hash: Hex): Promise<Transaction | null>;
  getTransactionReceipt(hash: Hex): Promise<Receipt | null>;
  getBalance(address: Address): Promise<bigint>;
  getTransactionCount(address: Address): Promise<number>;
  getCode(address: Address): Promise<Hex>;
  getStorageAt(address: Address, slot: Hex): Promise<Hex>;
  call(request: CallRequest): Promise<Hex>;
  getGasPrice(): Promise<bigint>;
  getFeeHistory(blockCount: number, percentiles: readonly number[]): Promise<FeeHistory>;
  getClientVersion(): Promise<string>;
}

/**
 * Transport backed by a JSON-RPC HTTP endpoint
 */
export class RpcTransport implements Transport {
  constructor(private readonly client: JsonRpcClient) {}

  get url(): string {
    return this.client.url;
  }

  async getBlockNumber(): Promise<bigint> {
    return BigInt(await this.client.call<Hex>("eth_blockNumber"));
  }

  async getBlock(number: bigint): Promise<Block<Hex> | null> {
    const block = await this.client.call<RpcBlock | null>("eth_getBlockByNumber", [
      numberToHex(number),
      false,
    ]);
    return block ? formatBlock(block) : null;
  }

  async getBlockWithTransactions(number: bigint): Promise<Block<Transaction> | null> {
    const block = await this.client.call<RpcBlock | null>("eth_getBlockByNumber", [
      numberToHex(number),
      true,
    ]);
    return block ? formatBlockWithTransactions(block) : null;
  }

  async getBlockReceipts(number: bigint): Promise<Receipt[] | null> {
    const receipts = await this.client.call<RpcReceipt[] | null>("eth_getBlockReceipts", [
      numberToHex(number),
    ]);
    return receipts ? receipts.map(formatReceipt) : null;
  }

  async getTransaction(hash: Hex): Promise<Transaction | null> {
    const tx = await this.client.call<RpcTransaction | null>("eth_getTransactionByHash", [hash]);
    return tx ? formatTransaction(tx) : null;
  }

  async getTransactionReceipt(hash: Hex): Promise<Receipt | null> {
    const receipt = await this.client.call<RpcReceipt | null>("eth_getTransactionReceipt", [hash]);
    return receipt ? formatReceipt(receipt) : null;
  }

  async getBalance(address: Address): Promise<bigint> {
    return BigInt(await this.client.call<Hex>("eth_getBalance", [address, "latest"]));
  }

  async getTransactionCount(address: Address): Promise<number> {
    return Number(await this.client.call<Hex>("eth_getTransactionCount", [address, "latest"]));
  }

  getCode(address: Address): Promise<Hex> {
    return this.client.call<Hex>("eth_getCode", [address, "latest"]);
  }

  getStorageAt(address: Address, slot: Hex): Promise<Hex> {
    return this.client.call<Hex>("eth_getStorageAt", [address, slot, "latest"]);
  }

  call(request: CallRequest): Promise<Hex> {
    return this.client.call<Hex>("eth_call", [{ to: request.to, data: request.data }, "latest"]);
  }

  async getGasPrice(): Promise<bigint> {
    return BigInt(await this.client.call<Hex>("eth_gasPrice"));
  }

  async getFeeHistory(blockCount: number, percentiles: readonly number[]): Promise<FeeHistory> {
    const history = await this.client.call<RpcFeeHistory>("eth_feeHistory", [
      numberToHex(blockCount),
      "latest",
      [...percentiles],
    ]);
    return formatFeeHistory(history);
  }

  getClientVersion(): Promise<string> {
    return this.client.call<string>("web3_clientVersion");
  }
}
