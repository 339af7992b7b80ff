import { getAddress, isAddress, size, type Address } from "viem";
import { FetchError, InvalidInputError } from "../errors.js";
import type { ContractInspector } from "../contract/inspector.js";
import type { TokenBalanceScanner } from "../contract/token-balances.js";
import type { NameResolver } from "../ens/resolver.js";
import type { RetryExecutor } from "../rpc/retry.js";
import type { Transport } from "../rpc/transport.js";
import type { AddressInfo } from "./types.js";

async function orNull<T>(pending: Promise<T>): Promise<T | null> {
  try {
    return await pending;
  } catch {
    return null;
  }
}

export class AddressAssembler {
  constructor(
    private readonly transport: Transport,
    private readonly executor: RetryExecutor,
    private readonly names: NameResolver,
    private readonly inspector: ContractInspector,
    private readonly scanner: TokenBalanceScanner
  ) {}

  /**
   * Balance, nonce and code, then contract checks. Each check fails on its
   * own and leaves only its field empty.
   */
  async getAddress(address: Address): Promise<AddressInfo> {
    let balance: bigint;
    let nonce: number;
    let codeSize: number;
    try {
      balance = await this.executor.run(() => this.transport.getBalance(address), "eth_getBalance");
      nonce = await this.executor.run(
        () => this.transport.getTransactionCount(address),
        "eth_getTransactionCount"
      );
      const code = await this.executor.run(() => this.transport.getCode(address), "eth_getCode");
      codeSize = size(code);
    } catch (err) {
      throw new FetchError("fetch address", address, this.transport.url, err);
    }

    const isContract = codeSize > 0;
    const proxyImpl = isContract ? await orNull(this.inspector.getProxyImplementation(address)) : null;
    const tokenInfo = isContract ? await orNull(this.inspector.detectToken(address)) : null;
    const name = await this.names.reverseResolveOne(address);
    const owner = isContract ? await orNull(this.inspector.readOwner(address)) : null;
    const tokenBalances = isContract ? await this.scanner.scan(address) : [];

    return {
      address,
      balance,
      nonce,
      isContract,
      codeSize,
      proxyImpl,
      tokenInfo,
      name,
      owner,
      tokenBalances,
    };
  }

  /**
   * Accepts a 0x address or an ENS name, which is resolved first
   */
  async lookup(query: string): Promise<AddressInfo> {
    const trimmed = query.trim();
    if (isAddress(trimmed, { strict: false })) {
      return this.getAddress(getAddress(trimmed));
    }
    if (!trimmed.includes(".")) {
      throw new InvalidInputError(`Not an address or ENS name: ${query}`, query);
    }

    let resolved: Address;
    try {
      resolved = await this.names.resolveName(trimmed.toLowerCase());
    } catch (err) {
      throw new FetchError("resolve", trimmed, this.transport.url, err);
    }
    return this.getAddress(resolved);
  }
}
