import { hexToBytes, type Address, type Hex } from "viem";

/** Lower-case extra-data substrings and the builder they identify, checked in order */
export const BUILDER_TAGS: readonly (readonly [string, string])[] = [
  ["flashbots", "Flashbots"],
  ["bloxroute", "bloXroute"],
  ["blxr", "bloXroute"],
  ["builder0x69", "builder0x69"],
  ["titan", "Titan"],
  ["rsync", "rsync"],
  ["beaver", "Beaver"],
  ["buildai", "BuildAI"],
  ["penguinbuild", "Penguin"],
  ["ethbuilder", "EthBuilder"],
  ["blocknative", "Blocknative"],
];

/** Fee recipients of known builders (lower-case) */
export const BUILDER_ADDRESSES: ReadonlyMap<string, string> = new Map([
  ["0x95222290dd7278aa3ddd389cc1e1d165cc4bafe5", "Flashbots"],
  ["0x690b9a9e9aa1c9db991c7721a92d351db4fac990", "builder0x69"],
  ["0x1f9090aae28b8a3dceadf281b0f12828e676c326", "rsync"],
  ["0xdafea492d9c6733ae3d56b7ed1adb60692c98bc5", "Beacon Depositor"],
]);

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Strict UTF-8 decoding of extra data; null for empty or invalid input
 */
export function decodeExtraData(extraData: Hex | Uint8Array): string | null {
  const bytes = typeof extraData === "string" ? hexToBytes(extraData) : extraData;
  if (bytes.length === 0) return null;
  try {
    return utf8.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Name of the block builder, from extra data or the fee recipient
 */
export function detectBuilderTag(extraData: Hex | Uint8Array, miner?: Address): string | null {
  const bytes = typeof extraData === "string" ? hexToBytes(extraData) : extraData;
  const text = decodeExtraData(bytes);
  if (text !== null) {
    const lower = text.toLowerCase();
    for (const [marker, tag] of BUILDER_TAGS) {
      if (lower.includes(marker)) return tag;
    }
    // short plain-word extra data is usually the builder's own name
    if (bytes.length < 32 && /^[\p{L}\p{N} _-]+$/u.test(text)) {
      return text;
    }
  }

  if (miner) {
    return BUILDER_ADDRESSES.get(miner.toLowerCase()) ?? null;
  }
  return null;
}

/**
 * Extra data as printable ASCII, for display; null when it is binary
 */
export function printableExtraData(extraData: Hex): string | null {
  const text = decodeExtraData(extraData);
  if (text === null) return null;
  return /^[\x20-\x7e]+$/.test(text) ? text : null;
}
