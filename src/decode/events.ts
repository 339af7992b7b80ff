import {
  hexToBigInt,
  keccak256,
  maxUint256,
  size,
  slice,
  toHex,
  type Address,
  type Hex,
} from "viem";
import { findKnownToken } from "../contract/tokens.js";
import { formatAmount } from "../format.js";
import type { Log } from "../rpc/types.js";

export interface DecodedParam {
  readonly name: string;
  /** Display value: an address, a decimal amount or "unlimited" */
  readonly value: string;
  /** True when `value` is an address a caller can navigate to */
  readonly isAddress: boolean;
}

export interface DecodedLog {
  readonly address: Address;
  readonly topics: readonly Hex[];
  readonly data: Hex;
  /** Full event signature, when topic0 is a known event */
  readonly eventName: string | null;
  readonly params: readonly DecodedParam[];
}

export interface TokenTransfer {
  readonly tokenAddress: Address;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
  readonly tokenSymbol: string | null;
  readonly decimals: number | null;
}

export const TRANSFER_EVENT = "Transfer(address,address,uint256)";
export const APPROVAL_EVENT = "Approval(address,address,uint256)";
export const SWAP_V2_EVENT = "Swap(address,uint256,uint256,uint256,uint256,address)";
export const SWAP_V3_EVENT = "Swap(address,address,int256,int256,uint160,uint128,int24)";
export const DEPOSIT_EVENT = "Deposit(address,uint256)";
export const WITHDRAWAL_EVENT = "Withdrawal(address,uint256)";

function eventTopic(signature: string): Hex {
  return keccak256(toHex(signature));
}

export const TRANSFER_TOPIC = eventTopic(TRANSFER_EVENT);
export const APPROVAL_TOPIC = eventTopic(APPROVAL_EVENT);
export const SWAP_V2_TOPIC = eventTopic(SWAP_V2_EVENT);
export const SWAP_V3_TOPIC = eventTopic(SWAP_V3_EVENT);
export const DEPOSIT_TOPIC = eventTopic(DEPOSIT_EVENT);
export const WITHDRAWAL_TOPIC = eventTopic(WITHDRAWAL_EVENT);

/** topic0 -> event signature */
export const EVENT_SIGNATURES: ReadonlyMap<string, string> = new Map([
  [TRANSFER_TOPIC, TRANSFER_EVENT],
  [APPROVAL_TOPIC, APPROVAL_EVENT],
  [SWAP_V2_TOPIC, SWAP_V2_EVENT],
  [SWAP_V3_TOPIC, SWAP_V3_EVENT],
  [DEPOSIT_TOPIC, DEPOSIT_EVENT],
  [WITHDRAWAL_TOPIC, WITHDRAWAL_EVENT],
]);

const DEFAULT_DECIMALS = 18;
const MAX_DATA_WORDS = 4;

export function decodeEventSignature(topic0: Hex): string | null {
  return EVENT_SIGNATURES.get(topic0.toLowerCase()) ?? null;
}

function topicAddress(topic: Hex): Address {
  return `0x${topic.slice(26).toLowerCase()}`;
}

function word(data: Hex, index: number): bigint {
  return hexToBigInt(slice(data, index * 32, index * 32 + 32));
}

/** First data word, or 0 when the payload is shorter */
function leadingAmount(data: Hex): bigint {
  return size(data) >= 32 ? word(data, 0) : 0n;
}

function addressParam(name: string, value: Address): DecodedParam {
  return { name, value, isAddress: true };
}

function amountParam(name: string, value: bigint, decimals = DEFAULT_DECIMALS): DecodedParam {
  return { name, value: formatAmount(value, decimals), isAddress: false };
}

function decodeTransfer(log: Log): DecodedParam[] {
  const [, from, to, tokenId] = log.topics;
  // ERC-721 indexes the token id and leaves data empty
  if (tokenId !== undefined && size(log.data) === 0) {
    return [
      addressParam("from", topicAddress(from)),
      addressParam("to", topicAddress(to)),
      { name: "tokenId", value: hexToBigInt(tokenId).toString(), isAddress: false },
    ];
  }
  const decimals = findKnownToken(log.address)?.decimals ?? DEFAULT_DECIMALS;
  return [
    addressParam("from", topicAddress(from)),
    addressParam("to", topicAddress(to)),
    amountParam("value", leadingAmount(log.data), decimals),
  ];
}

function decodeApproval(log: Log): DecodedParam[] {
  const amount = leadingAmount(log.data);
  const decimals = findKnownToken(log.address)?.decimals ?? DEFAULT_DECIMALS;
  return [
    addressParam("owner", topicAddress(log.topics[1])),
    addressParam("spender", topicAddress(log.topics[2])),
    amount === maxUint256
      ? { name: "value", value: "unlimited", isAddress: false }
      : amountParam("value", amount, decimals),
  ];
}

function decodeSwapV2(log: Log): DecodedParam[] {
  const params = [addressParam("sender", topicAddress(log.topics[1]))];
  const length = size(log.data);
  if (length >= 128) {
    params.push(
      amountParam("amount0In", word(log.data, 0)),
      amountParam("amount1In", word(log.data, 1)),
      amountParam("amount0Out", word(log.data, 2)),
      amountParam("amount1Out", word(log.data, 3))
    );
  }
  if (length >= 160) {
    params.push(addressParam("to", slice(log.data, 140, 160)));
  }
  return params;
}

function decodeWeth(log: Log, who: "dst" | "src"): DecodedParam[] {
  return [
    addressParam(who, topicAddress(log.topics[1])),
    amountParam("wad", leadingAmount(log.data)),
  ];
}

/**
 * Best-effort decoding for unknown events: zero-padded topics read as
 * addresses, other topics as uint256, then up to four data words.
 */
export function decodeGeneric(log: Log): DecodedParam[] {
  const params: DecodedParam[] = [];

  log.topics.forEach((topic, i) => {
    if (i === 0) return;
    if (/^0x0{24}/i.test(topic)) {
      params.push(addressParam(`topic${i}`, topicAddress(topic)));
    } else {
      params.push({ name: `topic${i}`, value: hexToBigInt(topic).toString(), isAddress: false });
    }
  });

  const words = Math.min(Math.floor(size(log.data) / 32), MAX_DATA_WORDS);
  for (let i = 0; i < words; i++) {
    params.push(amountParam(`data${i}`, word(log.data, i)));
  }

  return params;
}

function decodeParams(log: Log): DecodedParam[] {
  const [topic0] = log.topics;
  if (topic0 === undefined) return [];

  const count = log.topics.length;
  switch (topic0.toLowerCase()) {
    case TRANSFER_TOPIC:
      if (count >= 3) return decodeTransfer(log);
      break;
    case APPROVAL_TOPIC:
      if (count >= 3) return decodeApproval(log);
      break;
    case SWAP_V2_TOPIC:
      if (count >= 2) return decodeSwapV2(log);
      break;
    case DEPOSIT_TOPIC:
      if (count >= 2) return decodeWeth(log, "dst");
      break;
    case WITHDRAWAL_TOPIC:
      if (count >= 2) return decodeWeth(log, "src");
      break;
  }
  return decodeGeneric(log);
}

/**
 * Decode one receipt log. Pure; never throws on short or odd payloads.
 */
export function decodeLog(log: Log): DecodedLog {
  const [topic0] = log.topics;
  return {
    address: log.address,
    topics: log.topics,
    data: log.data,
    eventName: topic0 === undefined ? null : decodeEventSignature(topic0),
    params: decodeParams(log),
  };
}

/**
 * The ERC-20 transfer carried by `log`, or null when it is not
 * an ERC-20 Transfer (three topics, amount in data)
 */
export function extractTokenTransfer(log: Log): TokenTransfer | null {
  if (log.topics.length !== 3 || log.topics[0].toLowerCase() !== TRANSFER_TOPIC) {
    return null;
  }
  const token = findKnownToken(log.address);
  return {
    tokenAddress: log.address,
    from: topicAddress(log.topics[1]),
    to: topicAddress(log.topics[2]),
    amount: leadingAmount(log.data),
    tokenSymbol: token?.symbol ?? null,
    decimals: token?.decimals ?? null,
  };
}
