import { describe, it, expect } from "vitest";
import { concat, maxUint256, type Address, type Hex } from "viem";
import {
  APPROVAL_TOPIC,
  DEPOSIT_TOPIC,
  SWAP_V2_TOPIC,
  SWAP_V3_TOPIC,
  TRANSFER_TOPIC,
  WITHDRAWAL_TOPIC,
  decodeEventSignature,
  decodeLog,
  extractTokenTransfer,
} from "../src/decode/events.js";
import { addressTopic, makeLog, word } from "./helpers/fake-transport.js";

const USDC: Address = "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48";
const FROM: Address = "0x00000000000000000000000000000000000000a1";
const TO: Address = "0x00000000000000000000000000000000000000b2";

describe("decodeEventSignature", () => {
  it("should recognise the ERC-20 Transfer and Approval topics", () => {
    expect(decodeEventSignature("0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef")).toBe(
      "Transfer(address,address,uint256)"
    );
    expect(decodeEventSignature("0x8c5be1e5ebec7d5bd14f71427d1e84f3dd0314c0f7b2291e5b200ac8c7c3b925")).toBe(
      "Approval(address,address,uint256)"
    );
  });

  it("should ignore the case of the topic", () => {
    expect(decodeEventSignature("0xDDF252AD1BE2C89B69C2B068FC378DAA952BA7F163C4A11628F55A4DF523B3EF")).toBe(
      "Transfer(address,address,uint256)"
    );
  });

  it("should return null for an unknown topic", () => {
    expect(decodeEventSignature(word(1))).toBeNull();
  });
});

describe("decodeLog", () => {
  describe("Transfer", () => {
    it("should format the amount with the known token's decimals", () => {
      const decoded = decodeLog(
        makeLog({
          address: USDC,
          topics: [TRANSFER_TOPIC, addressTopic(FROM), addressTopic(TO)],
          data: word(1_500_000),
        })
      );

      expect(decoded.eventName).toBe("Transfer(address,address,uint256)");
      expect(decoded.params).toEqual([
        { name: "from", value: FROM, isAddress: true },
        { name: "to", value: TO, isAddress: true },
        { name: "value", value: "1.5", isAddress: false },
      ]);
    });

    it("should fall back to 18 decimals for unknown tokens", () => {
      const decoded = decodeLog(
        makeLog({
          topics: [TRANSFER_TOPIC, addressTopic(FROM), addressTopic(TO)],
          data: word(2_500_000_000_000_000_000n),
        })
      );
      expect(decoded.params[2]).toEqual({ name: "value", value: "2.5", isAddress: false });
    });

    it("should read an ERC-721 token id from the fourth topic", () => {
      const decoded = decodeLog(
        makeLog({
          topics: [TRANSFER_TOPIC, addressTopic(FROM), addressTopic(TO), word(42)],
          data: "0x",
        })
      );
      expect(decoded.params).toEqual([
        { name: "from", value: FROM, isAddress: true },
        { name: "to", value: TO, isAddress: true },
        { name: "tokenId", value: "42", isAddress: false },
      ]);
    });

    it("should decode a Transfer with too few topics generically", () => {
      const decoded = decodeLog(
        makeLog({ topics: [TRANSFER_TOPIC, addressTopic(FROM)], data: "0x" })
      );
      expect(decoded.eventName).toBe("Transfer(address,address,uint256)");
      expect(decoded.params).toEqual([{ name: "topic1", value: FROM, isAddress: true }]);
    });
  });

  describe("Approval", () => {
    it("should show the maximum allowance as unlimited", () => {
      const decoded = decodeLog(
        makeLog({
          topics: [APPROVAL_TOPIC, addressTopic(FROM), addressTopic(TO)],
          data: word(maxUint256),
        })
      );
      expect(decoded.params).toEqual([
        { name: "owner", value: FROM, isAddress: true },
        { name: "spender", value: TO, isAddress: true },
        { name: "value", value: "unlimited", isAddress: false },
      ]);
    });

    it("should format a finite allowance", () => {
      const decoded = decodeLog(
        makeLog({
          topics: [APPROVAL_TOPIC, addressTopic(FROM), addressTopic(TO)],
          data: word(1_000_000_000_000_000_000n),
        })
      );
      expect(decoded.params[2]).toEqual({ name: "value", value: "1", isAddress: false });
    });
  });

  describe("Uniswap V2 Swap", () => {
    it("should decode amounts and the recipient from data", () => {
      const data = concat([
        word(1_000_000_000_000_000_000n),
        word(0),
        word(0),
        word(2_000_000_000_000_000_000n),
        addressTopic(TO),
      ]);
      const decoded = decodeLog(makeLog({ topics: [SWAP_V2_TOPIC, addressTopic(FROM), addressTopic(TO)], data }));

      expect(decoded.eventName).toBe("Swap(address,uint256,uint256,uint256,uint256,address)");
      expect(decoded.params).toEqual([
        { name: "sender", value: FROM, isAddress: true },
        { name: "amount0In", value: "1", isAddress: false },
        { name: "amount1In", value: "0", isAddress: false },
        { name: "amount0Out", value: "0", isAddress: false },
        { name: "amount1Out", value: "2", isAddress: false },
        { name: "to", value: TO, isAddress: true },
      ]);
    });

    it("should only report the sender when data is short", () => {
      const decoded = decodeLog(
        makeLog({ topics: [SWAP_V2_TOPIC, addressTopic(FROM)], data: concat([word(1), word(2)]) })
      );
      expect(decoded.params).toEqual([{ name: "sender", value: FROM, isAddress: true }]);
    });
  });

  describe("WETH", () => {
    it("should decode Deposit and Withdrawal", () => {
      const deposit = decodeLog(
        makeLog({ topics: [DEPOSIT_TOPIC, addressTopic(FROM)], data: word(3_000_000_000_000_000_000n) })
      );
      expect(deposit.params).toEqual([
        { name: "dst", value: FROM, isAddress: true },
        { name: "wad", value: "3", isAddress: false },
      ]);

      const withdrawal = decodeLog(
        makeLog({ topics: [WITHDRAWAL_TOPIC, addressTopic(TO)], data: word(500_000_000_000_000_000n) })
      );
      expect(withdrawal.params).toEqual([
        { name: "src", value: TO, isAddress: true },
        { name: "wad", value: "0.5", isAddress: false },
      ]);
    });
  });

  describe("generic fallback", () => {
    const unknownTopic: Hex = "0xabababababababababababababababababababababababababababababababab";
    const bigTopic: Hex = "0x0100000000000000000000000000000000000000000000000000000000000000";

    it("should read padded topics as addresses and others as integers", () => {
      const decoded = decodeLog(
        makeLog({ topics: [unknownTopic, addressTopic(FROM), bigTopic], data: "0x" })
      );
      expect(decoded.eventName).toBeNull();
      expect(decoded.params).toEqual([
        { name: "topic1", value: FROM, isAddress: true },
        { name: "topic2", value: (1n << 248n).toString(), isAddress: false },
      ]);
    });

    it("should decode at most four data words with 18 decimals", () => {
      const data = concat([
        word(1_000_000_000_000_000_000n),
        word(2_000_000_000_000_000_000n),
        word(3_000_000_000_000_000_000n),
        word(4_000_000_000_000_000_000n),
        word(5_000_000_000_000_000_000n),
      ]);
      const decoded = decodeLog(makeLog({ topics: [unknownTopic], data }));
      expect(decoded.params.map((p) => [p.name, p.value])).toEqual([
        ["data0", "1"],
        ["data1", "2"],
        ["data2", "3"],
        ["data3", "4"],
      ]);
    });

    it("should name a V3 Swap but decode it generically", () => {
      const decoded = decodeLog(
        makeLog({ topics: [SWAP_V3_TOPIC, addressTopic(FROM), addressTopic(TO)], data: "0x" })
      );
      expect(decoded.eventName).toBe("Swap(address,address,int256,int256,uint160,uint128,int24)");
      expect(decoded.params.map((p) => p.name)).toEqual(["topic1", "topic2"]);
    });

    it("should return no params for an anonymous log", () => {
      const decoded = decodeLog(makeLog({ topics: [], data: word(1) }));
      expect(decoded.eventName).toBeNull();
      expect(decoded.params).toEqual([]);
    });
  });
});

describe("extractTokenTransfer", () => {
  it("should extract an ERC-20 transfer with known token metadata", () => {
    const transfer = extractTokenTransfer(
      makeLog({
        address: USDC,
        topics: [TRANSFER_TOPIC, addressTopic(FROM), addressTopic(TO)],
        data: word(1_500_000),
      })
    );
    expect(transfer).toEqual({
      tokenAddress: USDC,
      from: FROM,
      to: TO,
      amount: 1_500_000n,
      tokenSymbol: "USDC",
      decimals: 6,
    });
  });

  it("should leave metadata empty for unlisted tokens", () => {
    const transfer = extractTokenTransfer(
      makeLog({ topics: [TRANSFER_TOPIC, addressTopic(FROM), addressTopic(TO)], data: word(7) })
    );
    expect(transfer?.tokenSymbol).toBeNull();
    expect(transfer?.decimals).toBeNull();
    expect(transfer?.amount).toBe(7n);
  });

  it("should skip ERC-721 transfers and other events", () => {
    expect(
      extractTokenTransfer(
        makeLog({ topics: [TRANSFER_TOPIC, addressTopic(FROM), addressTopic(TO), word(42)] })
      )
    ).toBeNull();
    expect(
      extractTokenTransfer(
        makeLog({ topics: [APPROVAL_TOPIC, addressTopic(FROM), addressTopic(TO)], data: word(1) })
      )
    ).toBeNull();
  });
});
