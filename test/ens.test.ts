import { describe, it, expect, beforeEach } from "vitest";
import {
  encodeFunctionData,
  encodeFunctionResult,
  getAddress,
  toFunctionSelector,
  zeroAddress,
  zeroHash,
  type Address,
} from "viem";
import { ResolutionError } from "../src/errors.js";
import { labelhash, namehash } from "../src/ens/namehash.js";
import {
  ENS_REGISTRY,
  ENS_REVERSE_RECORDS,
  NameResolver,
  registryAbi,
  resolverAbi,
  reverseRecordsAbi,
} from "../src/ens/resolver.js";
import { RetryExecutor } from "../src/rpc/retry.js";
import { FakeTransport } from "./helpers/fake-transport.js";

const GET_NAMES = toFunctionSelector("getNames(address[])");
const RESOLVER = toFunctionSelector("resolver(bytes32)");
const ADDR = toFunctionSelector("addr(bytes32)");

const ALICE: Address = "0x00000000000000000000000000000000000a11ce";
const BOB: Address = "0x0000000000000000000000000000000000000b0b";
const PUBLIC_RESOLVER: Address = "0x00000000000000000000000000000000000000e5";

describe("namehash", () => {
  it("should return the zero node for the empty name", () => {
    expect(namehash("")).toBe(zeroHash);
  });

  it("should match the published node for eth", () => {
    expect(namehash("eth")).toBe("0x93cdeb708b7545dc668eb9280176169d1c33cfd8ed6f04690a0bcc88a93fc4ae");
  });

  it("should match the published node for vitalik.eth", () => {
    expect(namehash("vitalik.eth")).toBe(
      "0xee6c4522aab0003e8d14cd40a6af439055fd2577951148c14b6cea9a53475835"
    );
  });

  it("should hash labels right to left", () => {
    expect(labelhash("eth")).not.toBe(namehash("eth"));
    expect(namehash("a.b")).not.toBe(namehash("b.a"));
  });
});

describe("NameResolver", () => {
  let transport: FakeTransport;
  let resolver: NameResolver;

  beforeEach(() => {
    transport = new FakeTransport();
    resolver = new NameResolver(transport, new RetryExecutor({ sleep: async () => {} }));
  });

  describe("reverseResolve", () => {
    it("should make no call for an empty list", async () => {
      const names = await resolver.reverseResolve([]);
      expect(names.size).toBe(0);
      expect(transport.log).toEqual([]);
    });

    it("should pair names positionally and skip empty ones", async () => {
      transport.stubCall(ENS_REVERSE_RECORDS, GET_NAMES, (data) => {
        expect(data).toBe(
          encodeFunctionData({ abi: reverseRecordsAbi, functionName: "getNames", args: [[ALICE, BOB]] })
        );
        return encodeFunctionResult({
          abi: reverseRecordsAbi,
          functionName: "getNames",
          result: ["alice.eth", ""],
        });
      });

      const names = await resolver.reverseResolve([ALICE, BOB]);
      expect([...names.entries()]).toEqual([[ALICE.toLowerCase(), "alice.eth"]]);
      expect(transport.count("call")).toBe(1);
    });

    it("should yield an empty map when the contract call fails", async () => {
      transport.stubCall(ENS_REVERSE_RECORDS, GET_NAMES, new Error("execution reverted"));

      const names = await resolver.reverseResolve([ALICE]);
      expect(names.size).toBe(0);
    });

    it("should resolve a single address", async () => {
      transport.stubCall(
        ENS_REVERSE_RECORDS,
        GET_NAMES,
        encodeFunctionResult({ abi: reverseRecordsAbi, functionName: "getNames", result: ["bob.eth"] })
      );

      expect(await resolver.reverseResolveOne(BOB)).toBe("bob.eth");
    });
  });

  describe("resolveName", () => {
    function stubRegistry(result: Address) {
      transport.stubCall(
        ENS_REGISTRY,
        RESOLVER,
        encodeFunctionResult({ abi: registryAbi, functionName: "resolver", result })
      );
    }

    function stubAddr(result: Address) {
      transport.stubCall(
        PUBLIC_RESOLVER,
        ADDR,
        encodeFunctionResult({ abi: resolverAbi, functionName: "addr", result })
      );
    }

    it("should go from registry to resolver to address", async () => {
      stubRegistry(PUBLIC_RESOLVER);
      transport.stubCall(PUBLIC_RESOLVER, ADDR, (data) => {
        expect(data).toBe(
          encodeFunctionData({ abi: resolverAbi, functionName: "addr", args: [namehash("alice.eth")] })
        );
        return encodeFunctionResult({ abi: resolverAbi, functionName: "addr", result: ALICE });
      });

      expect(await resolver.resolveName("alice.eth")).toBe(getAddress(ALICE));
      expect(transport.count("call")).toBe(2);
    });

    it("should fail when the name has no resolver", async () => {
      stubRegistry(zeroAddress);

      const err = await resolver.resolveName("nobody.eth").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ResolutionError);
      expect(err instanceof Error && err.message).toBe(
        "ENS registry lookup failed for nobody.eth: No resolver found for ENS name: nobody.eth"
      );
    });

    it("should fail when the resolver returns the zero address", async () => {
      stubRegistry(PUBLIC_RESOLVER);
      stubAddr(zeroAddress);

      await expect(resolver.resolveName("empty.eth")).rejects.toThrow(
        "ENS resolver lookup failed for empty.eth: ENS name empty.eth does not resolve to an address"
      );
    });

    it("should name the registry step when its call fails", async () => {
      transport.stubCall(ENS_REGISTRY, RESOLVER, new Error("execution reverted"));

      const err = await resolver.resolveName("alice.eth").catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ResolutionError);
      if (!(err instanceof ResolutionError)) return;
      expect(err.data).toEqual({ name: "alice.eth", step: "registry" });
      expect(err.message).toBe(
        "ENS registry lookup failed for alice.eth: Failed to query ENS registry: execution reverted"
      );
    });
  });
});
