import type { Address, Hex } from "viem";
import type { ResolvedConfig } from "../config.js";
import { ContractInspector } from "../contract/inspector.js";
import { TokenBalanceScanner } from "../contract/token-balances.js";
import { NameResolver } from "../ens/resolver.js";
import { FetchError } from "../errors.js";
import type { Logger } from "../logger.js";
import { JsonRpcClient } from "../rpc/client.js";
import { RetryExecutor, type RetryOptions } from "../rpc/retry.js";
import { RpcTransport, type Transport } from "../rpc/transport.js";
import { AddressAssembler } from "./address.js";
import { BlockAssembler } from "./block.js";
import { NetworkAssembler } from "./network.js";
import { TransactionAssembler } from "./transaction.js";
import type {
  AddressInfo,
  BlockInfo,
  BlockTransactions,
  BlockWithTransactions,
  NetworkSnapshot,
  TxInfo,
} from "./types.js";

export interface ExplorerOptions {
  retry?: RetryOptions;
  tokenScanTimeoutMs?: number;
}

/**
 * Read-only view of a chain through one transport
 */
export class Explorer {
  readonly names: NameResolver;
  readonly inspector: ContractInspector;
  readonly blocks: BlockAssembler;
  readonly transactions: TransactionAssembler;
  readonly addresses: AddressAssembler;
  readonly network: NetworkAssembler;

  constructor(
    readonly transport: Transport,
    options: ExplorerOptions = {}
  ) {
    const executor = new RetryExecutor(options.retry);
    this.names = new NameResolver(transport, executor);
    this.inspector = new ContractInspector(transport, executor);
    const scanner = new TokenBalanceScanner(transport, executor, {
      timeoutMs: options.tokenScanTimeoutMs,
    });

    this.blocks = new BlockAssembler(transport, executor, this.names);
    this.transactions = new TransactionAssembler(transport, executor, this.names);
    this.addresses = new AddressAssembler(transport, executor, this.names, this.inspector, scanner);
    this.network = new NetworkAssembler(transport, executor);
  }

  getBlock(number: bigint): Promise<BlockInfo> {
    return this.blocks.getBlock(number);
  }

  getBlockTransactions(number: bigint): Promise<BlockTransactions> {
    return this.blocks.getBlockTransactions(number);
  }

  getBlockWithTransactions(number: bigint): Promise<BlockWithTransactions> {
    return this.blocks.getBlockWithTransactions(number);
  }

  getTransaction(hash: Hex): Promise<TxInfo> {
    return this.transactions.getTransaction(hash);
  }

  getAddress(address: Address): Promise<AddressInfo> {
    return this.addresses.getAddress(address);
  }

  lookupAddress(query: string): Promise<AddressInfo> {
    return this.addresses.lookup(query);
  }

  async resolveName(name: string): Promise<Address> {
    try {
      return await this.names.resolveName(name);
    } catch (err) {
      throw new FetchError("resolve", name, this.transport.url, err);
    }
  }

  getNetworkSnapshot(): Promise<NetworkSnapshot> {
    return this.network.getSnapshot();
  }
}

/**
 * Explorer over a JSON-RPC endpoint, wired to config and logger
 */
export function createExplorer(rpcUrl: string, resolved: ResolvedConfig, logger?: Logger): Explorer {
  const client = new JsonRpcClient(rpcUrl, {
    timeoutMs: resolved.requestTimeoutMs,
    onRequest: logger ? (method, params) => logger.request(method, params) : undefined,
  });
  return new Explorer(new RpcTransport(client), {
    retry: {
      maxRetries: resolved.retry.maxRetries,
      baseDelayMs: resolved.retry.baseDelayMs,
      onRetry: logger ? (event) => logger.retry(event) : undefined,
    },
    tokenScanTimeoutMs: resolved.tokenScanTimeoutMs,
  });
}
