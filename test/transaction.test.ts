import { describe, it, expect, beforeEach } from "vitest";
import { encodeFunctionData, erc20Abi, size, toFunctionSelector, type Address, type Hex } from "viem";
import { TRANSFER_EVENT, TRANSFER_TOPIC } from "../src/decode/events.js";
import { ENS_REVERSE_RECORDS } from "../src/ens/resolver.js";
import { FetchError, NotFoundError, findCause } from "../src/errors.js";
import { Explorer } from "../src/explorer/explorer.js";
import {
  FakeTransport,
  addressTopic,
  makeLog,
  makeReceipt,
  makeTx,
  word,
} from "./helpers/fake-transport.js";

const ALICE = "0x00000000000000000000000000000000000000a1";
const BOB = "0x00000000000000000000000000000000000000b2";
const CAROL = "0x00000000000000000000000000000000000000c4";
const USDC = "0xa0b86991c6218b36c1d19d4a2e9eb0ce3606eb48";
const HASH: Hex = "0x1111111111111111111111111111111111111111111111111111111111111111";

function usdcTransfer(from: Address, to: Address, amount: bigint) {
  return makeLog({
    address: USDC,
    topics: [TRANSFER_TOPIC, addressTopic(from), addressTopic(to)],
    data: word(amount),
  });
}

describe("TransactionAssembler", () => {
  let transport: FakeTransport;
  let explorer: Explorer;

  beforeEach(() => {
    transport = new FakeTransport();
    explorer = new Explorer(transport, { retry: { sleep: async () => {} } });
    transport.stubReverseNames({ [ALICE]: "alice.eth" });
  });

  describe("a confirmed token transfer", () => {
    beforeEach(() => {
      transport.transactions.set(
        HASH,
        makeTx({
          to: USDC,
          type: 2,
          gasPrice: null,
          maxFeePerGas: 40n,
          maxPriorityFeePerGas: 2n,
          nonce: 9,
          transactionIndex: 3,
          accessListSize: 0,
          input: encodeFunctionData({ abi: erc20Abi, functionName: "transfer", args: [BOB, 1_500_000n] }),
        })
      );
      transport.receipts.set(
        HASH,
        makeReceipt({
          gasUsed: 45_000n,
          effectiveGasPrice: 30n,
          logs: [usdcTransfer(ALICE, BOB, 1_500_000n), usdcTransfer(BOB, CAROL, 250_000n)],
        })
      );
    });

    it("should carry the full method signature and fee fields", async () => {
      const tx = await explorer.getTransaction(HASH);

      expect(tx.decodedMethod).toBe("transfer(address,uint256)");
      expect(tx.methodSelector).toBe("0xa9059cbb");
      expect(tx.type).toEqual({ kind: "eip1559" });
      expect(tx.fromName).toBe("alice.eth");
      expect(tx.toName).toBeNull();
      expect(tx.gasPrice).toBeNull();
      expect(tx.maxFeePerGas).toBe(40n);
      expect(tx.maxPriorityFeePerGas).toBe(2n);
      expect(tx.nonce).toBe(9);
      expect(tx.txIndex).toBe(3);
      expect(tx.blockNumber).toBe(100n);
      expect(tx.inputSize).toBe(68);
      expect(tx).not.toHaveProperty("feePaid");
    });

    it("should decode receipt logs", async () => {
      const { receipt } = await explorer.getTransaction(HASH);

      expect(receipt?.gasUsed).toBe(45_000n);
      expect(receipt?.actualFee).toBe(1_350_000n);
      expect(receipt?.status).toBe(true);
      expect(receipt?.logsCount).toBe(2);
      expect(receipt?.logs[0].eventName).toBe(TRANSFER_EVENT);
      expect(receipt?.logs[0].params).toEqual([
        { name: "from", value: ALICE, isAddress: true },
        { name: "to", value: BOB, isAddress: true },
        { name: "value", value: "1.5", isAddress: false },
      ]);
      expect(receipt?.logs[1].params[2]).toEqual({ name: "value", value: "0.25", isAddress: false });
    });

    it("should extract token transfers with symbol and decimals", async () => {
      const { receipt } = await explorer.getTransaction(HASH);

      expect(receipt?.tokenTransfers).toEqual([
        { tokenAddress: USDC, from: ALICE, to: BOB, amount: 1_500_000n, tokenSymbol: "USDC", decimals: 6 },
        { tokenAddress: USDC, from: BOB, to: CAROL, amount: 250_000n, tokenSymbol: "USDC", decimals: 6 },
      ]);
    });
  });

  it("should leave the receipt empty while pending", async () => {
    transport.transactions.set(HASH, makeTx({ blockNumber: null, transactionIndex: null }));
    transport.receipts.set(HASH, null);

    const tx = await explorer.getTransaction(HASH);
    expect(tx.receipt).toBeNull();
    expect(tx.blockNumber).toBeNull();
    expect(tx.decodedMethod).toBeNull();
  });

  it("should tolerate an unreadable receipt", async () => {
    transport.transactions.set(HASH, makeTx());
    transport.receipts.set(HASH, new Error("execution aborted"));

    const tx = await explorer.getTransaction(HASH);
    expect(tx.receipt).toBeNull();
    expect(tx.hash).toBe(HASH);
  });

  it("should resolve only the sender of a contract creation", async () => {
    const seen: number[] = [];
    transport.stubCall(ENS_REVERSE_RECORDS, toFunctionSelector("getNames(address[])"), (data) => {
      // selector, then offset and length words, then one word per address
      seen.push((size(data) - 4) / 32 - 2);
      return "0x";
    });
    transport.transactions.set(HASH, makeTx({ to: null, input: "0x6080" }));
    transport.receipts.set(HASH, makeReceipt({ contractAddress: CAROL }));

    const tx = await explorer.getTransaction(HASH);
    expect(seen).toEqual([1]);
    expect(tx.isContractCreation).toBe(true);
    expect(tx.methodSelector).toBeNull();
    expect(tx.fromName).toBeNull();
    expect(tx.receipt?.contractCreated).toBe(CAROL);
  });

  it("should report a missing transaction", async () => {
    transport.transactions.set(HASH, null);
    transport.receipts.set(HASH, null);

    const err = await explorer.getTransaction(HASH).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(err instanceof Error && err.message).toBe(
      `Failed to fetch transaction ${HASH} (rpc: http://fake-node:8545): Transaction ${HASH} not found (RPC returned null)`
    );
    expect(findCause(err, NotFoundError)?.data).toEqual({ kind: "transaction", id: HASH });
  });
});
