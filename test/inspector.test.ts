import { describe, it, expect, beforeEach } from "vitest";
import { encodeAbiParameters, getAddress, toFunctionSelector, type Address } from "viem";
import { DecodeError } from "../src/errors.js";
import { ContractInspector, EIP1967_IMPLEMENTATION_SLOT } from "../src/contract/inspector.js";
import { RetryExecutor } from "../src/rpc/retry.js";
import { FakeTransport, addressTopic, word } from "./helpers/fake-transport.js";

const CONTRACT: Address = "0x00000000000000000000000000000000000000cc";
const IMPLEMENTATION: Address = "0x00000000000000000000000000000000000000dd";

function encodeString(value: string) {
  return encodeAbiParameters([{ type: "string" }], [value]);
}

describe("ContractInspector", () => {
  let transport: FakeTransport;
  let inspector: ContractInspector;

  beforeEach(() => {
    transport = new FakeTransport();
    inspector = new ContractInspector(transport, new RetryExecutor({ sleep: async () => {} }));
  });

  describe("getProxyImplementation", () => {
    const slotKey = `${CONTRACT}:${EIP1967_IMPLEMENTATION_SLOT}`;

    it("should read the implementation from the EIP-1967 slot", async () => {
      transport.storage.set(slotKey, addressTopic(IMPLEMENTATION));
      expect(await inspector.getProxyImplementation(CONTRACT)).toBe(getAddress(IMPLEMENTATION));
    });

    it("should return null for an empty slot", async () => {
      transport.storage.set(slotKey, word(0));
      expect(await inspector.getProxyImplementation(CONTRACT)).toBeNull();
    });

    it("should ignore bytes above the low 20", async () => {
      transport.storage.set(slotKey, `0xffffffffffffffffffffffff${IMPLEMENTATION.slice(2)}`);
      expect(await inspector.getProxyImplementation(CONTRACT)).toBe(getAddress(IMPLEMENTATION));
    });

    it("should reject an empty response", async () => {
      transport.storage.set(slotKey, "0x");
      await expect(inspector.getProxyImplementation(CONTRACT)).rejects.toBeInstanceOf(DecodeError);
    });
  });

  describe("detectToken", () => {
    it("should collect all four token fields", async () => {
      transport
        .stubCall(CONTRACT, toFunctionSelector("name()"), encodeString("Test Token"))
        .stubCall(CONTRACT, toFunctionSelector("symbol()"), encodeString("TST"))
        .stubCall(CONTRACT, toFunctionSelector("decimals()"), word(6))
        .stubCall(CONTRACT, toFunctionSelector("totalSupply()"), word(1_000_000n));

      expect(await inspector.detectToken(CONTRACT)).toEqual({
        name: "Test Token",
        symbol: "TST",
        decimals: 6,
        totalSupply: 1_000_000n,
      });
    });

    it("should still be a token without name and totalSupply", async () => {
      transport
        .stubCall(CONTRACT, toFunctionSelector("name()"), new Error("execution reverted"))
        .stubCall(CONTRACT, toFunctionSelector("symbol()"), encodeString("TST"))
        .stubCall(CONTRACT, toFunctionSelector("decimals()"), word(18))
        .stubCall(CONTRACT, toFunctionSelector("totalSupply()"), "0x");

      expect(await inspector.detectToken(CONTRACT)).toEqual({
        name: null,
        symbol: "TST",
        decimals: 18,
        totalSupply: null,
      });
    });

    it("should not be a token without decimals", async () => {
      transport
        .stubCall(CONTRACT, toFunctionSelector("name()"), encodeString("Not A Token"))
        .stubCall(CONTRACT, toFunctionSelector("symbol()"), encodeString("NAT"))
        .stubCall(CONTRACT, toFunctionSelector("decimals()"), "0x")
        .stubCall(CONTRACT, toFunctionSelector("totalSupply()"), word(1));

      expect(await inspector.detectToken(CONTRACT)).toBeNull();
    });

    it("should reject string responses shorter than 64 bytes", async () => {
      transport
        .stubCall(CONTRACT, toFunctionSelector("name()"), "0x")
        .stubCall(CONTRACT, toFunctionSelector("symbol()"), word(3))
        .stubCall(CONTRACT, toFunctionSelector("decimals()"), word(18))
        .stubCall(CONTRACT, toFunctionSelector("totalSupply()"), word(1));

      expect(await inspector.detectToken(CONTRACT)).toBeNull();
    });
  });

  describe("readOwner", () => {
    const OWNER = toFunctionSelector("owner()");

    it("should return the owner address", async () => {
      transport.stubCall(CONTRACT, OWNER, addressTopic(IMPLEMENTATION));
      expect(await inspector.readOwner(CONTRACT)).toBe(getAddress(IMPLEMENTATION));
    });

    it("should treat the zero address as no owner", async () => {
      transport.stubCall(CONTRACT, OWNER, word(0));
      await expect(inspector.readOwner(CONTRACT)).rejects.toThrow(
        `Failed to decode owner() from ${CONTRACT}: No owner`
      );
    });

    it("should reject a short response", async () => {
      transport.stubCall(CONTRACT, OWNER, "0x1234");
      await expect(inspector.readOwner(CONTRACT)).rejects.toThrow("Invalid response");
    });
  });
});
