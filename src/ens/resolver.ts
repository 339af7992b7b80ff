import {
  decodeFunctionResult,
  encodeFunctionData,
  parseAbi,
  zeroAddress,
  type Address,
} from "viem";
import { ResolutionError, describeError } from "../errors.js";
import type { RetryExecutor } from "../rpc/retry.js";
import type { Transport } from "../rpc/transport.js";
import { namehash } from "./namehash.js";

/** ENS ReverseRecords on mainnet (address -> name, batched) */
export const ENS_REVERSE_RECORDS: Address = "0x3671aE578E63FdF66ad4F3E12CC0c0d71Ac7510C";

/** ENS registry on mainnet (name -> resolver) */
export const ENS_REGISTRY: Address = "0x00000000000C2E074eC69A0dFb2997BA6C7d2e1e";

export const reverseRecordsAbi = parseAbi([
  "function getNames(address[] addresses) view returns (string[])",
]);

export const registryAbi = parseAbi([
  "function resolver(bytes32 node) view returns (address)",
]);

export const resolverAbi = parseAbi([
  "function addr(bytes32 node) view returns (address)",
]);

/**
 * ENS lookups in both directions.
 *
 * Reverse lookups are best effort: they never throw and leave unresolved
 * addresses out of the result. Forward lookups throw ResolutionError.
 */
export class NameResolver {
  constructor(
    private readonly transport: Transport,
    private readonly executor: RetryExecutor
  ) {}

  /**
   * Batch reverse resolution. Keys of the returned map are lower-cased.
   */
  async reverseResolve(addresses: readonly Address[]): Promise<Map<string, string>> {
    const names = new Map<string, string>();
    if (addresses.length === 0) return names;

    try {
      const data = encodeFunctionData({
        abi: reverseRecordsAbi,
        functionName: "getNames",
        args: [addresses],
      });
      const response = await this.executor.run(
        () => this.transport.call({ to: ENS_REVERSE_RECORDS, data }),
        "ens.getNames"
      );
      const resolved = decodeFunctionResult({
        abi: reverseRecordsAbi,
        functionName: "getNames",
        data: response,
      });
      addresses.forEach((address, i) => {
        const name = resolved[i];
        if (name) names.set(address.toLowerCase(), name);
      });
    } catch {
      // unresolved names are simply absent
    }
    return names;
  }

  async reverseResolveOne(address: Address): Promise<string | null> {
    const names = await this.reverseResolve([address]);
    return names.get(address.toLowerCase()) ?? null;
  }

  /**
   * Forward resolution: registry -> resolver -> address
   */
  async resolveName(name: string): Promise<Address> {
    const node = namehash(name);

    let resolver: Address;
    try {
      const response = await this.executor.run(
        () =>
          this.transport.call({
            to: ENS_REGISTRY,
            data: encodeFunctionData({ abi: registryAbi, functionName: "resolver", args: [node] }),
          }),
        "ens.resolver"
      );
      resolver = decodeFunctionResult({ abi: registryAbi, functionName: "resolver", data: response });
    } catch (err) {
      throw new ResolutionError(name, "registry", `Failed to query ENS registry: ${describeError(err)}`, err);
    }
    if (resolver === zeroAddress) {
      throw new ResolutionError(name, "registry", `No resolver found for ENS name: ${name}`);
    }

    let resolved: Address;
    try {
      const response = await this.executor.run(
        () =>
          this.transport.call({
            to: resolver,
            data: encodeFunctionData({ abi: resolverAbi, functionName: "addr", args: [node] }),
          }),
        "ens.addr"
      );
      resolved = decodeFunctionResult({ abi: resolverAbi, functionName: "addr", data: response });
    } catch (err) {
      throw new ResolutionError(name, "resolver", `Failed to query ENS resolver ${resolver}: ${describeError(err)}`, err);
    }
    if (resolved === zeroAddress) {
      throw new ResolutionError(name, "resolver", `ENS name ${name} does not resolve to an address`);
    }

    return resolved;
  }
}
