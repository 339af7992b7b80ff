import {
  decodeAbiParameters,
  getAddress,
  hexToBigInt,
  hexToNumber,
  numberToHex,
  size,
  slice,
  toFunctionSelector,
  zeroAddress,
  type Address,
  type Hex,
} from "viem";
import { DecodeError } from "../errors.js";
import type { RetryExecutor } from "../rpc/retry.js";
import type { Transport } from "../rpc/transport.js";

/** keccak256("eip1967.proxy.implementation") - 1 */
export const EIP1967_IMPLEMENTATION_SLOT: Hex =
  "0x360894a13ba1a3210667c828492db98dca3e2076cc3735a920a3ca505d382bbc";

const ADDRESS_MASK = (1n << 160n) - 1n;

export interface TokenInfo {
  readonly name: string | null;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: bigint | null;
}

/**
 * Heuristic checks against an unknown contract. Every public method
 * either resolves or throws on its own; callers decide what a failure means.
 */
export class ContractInspector {
  constructor(
    private readonly transport: Transport,
    private readonly executor: RetryExecutor
  ) {}

  /**
   * EIP-1967 implementation address, or null when the slot holds none
   */
  async getProxyImplementation(address: Address): Promise<Address | null> {
    const value = await this.executor.run(
      () => this.transport.getStorageAt(address, EIP1967_IMPLEMENTATION_SLOT),
      "proxy.slot"
    );
    if (size(value) === 0 || size(value) > 32) {
      throw new DecodeError(address, "EIP-1967 slot", `expected up to 32 bytes, got ${size(value)}`);
    }
    // only the low 20 bytes hold the address; the rest is reserved
    const low = hexToBigInt(value) & ADDRESS_MASK;
    if (low === 0n) return null;
    return getAddress(numberToHex(low, { size: 20 }));
  }

  /**
   * Token metadata when the contract answers both symbol() and decimals()
   */
  async detectToken(address: Address): Promise<TokenInfo | null> {
    const [name, symbol, decimals, totalSupply] = await Promise.all([
      this.optional(this.readString(address, "name()")),
      this.optional(this.readString(address, "symbol()")),
      this.optional(this.readUint8(address, "decimals()")),
      this.optional(this.readUint256(address, "totalSupply()")),
    ]);

    if (symbol === null || decimals === null) return null;
    return { name, symbol, decimals, totalSupply };
  }

  /**
   * owner() of an Ownable contract; a zero owner counts as none
   */
  async readOwner(address: Address): Promise<Address> {
    const result = await this.callView(address, "owner()");
    if (size(result) < 32) {
      throw new DecodeError(address, "owner()", "Invalid response");
    }
    const owner = getAddress(slice(result, 12, 32));
    if (owner === zeroAddress) {
      throw new DecodeError(address, "owner()", "No owner");
    }
    return owner;
  }

  private callView(address: Address, signature: string): Promise<Hex> {
    return this.executor.run(
      () => this.transport.call({ to: address, data: toFunctionSelector(signature) }),
      signature
    );
  }

  private async readString(address: Address, signature: string): Promise<string> {
    const result = await this.callView(address, signature);
    if (size(result) < 64) {
      throw new DecodeError(address, signature, "Invalid response length");
    }
    try {
      const [value] = decodeAbiParameters([{ type: "string" }], result);
      return value;
    } catch (err) {
      throw new DecodeError(address, signature, err instanceof Error ? err.message : String(err));
    }
  }

  private async readUint8(address: Address, signature: string): Promise<number> {
    const result = await this.callView(address, signature);
    if (size(result) < 32) {
      throw new DecodeError(address, signature, "Invalid response length");
    }
    return hexToNumber(slice(result, 31, 32));
  }

  private async readUint256(address: Address, signature: string): Promise<bigint> {
    const result = await this.callView(address, signature);
    if (size(result) < 32) {
      throw new DecodeError(address, signature, "Invalid response length");
    }
    return hexToBigInt(slice(result, 0, 32));
  }

  private async optional<T>(pending: Promise<T>): Promise<T | null> {
    try {
      return await pending;
    } catch {
      return null;
    }
  }
}
