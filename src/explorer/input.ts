import { isHex, size, type Hex } from "viem";
import { InvalidInputError } from "../errors.js";

/**
 * Decimal or 0x-prefixed block number
 */
export function parseBlockNumber(input: string): bigint {
  const trimmed = input.trim();
  if (!/^(\d+|0x[0-9a-fA-F]+)$/.test(trimmed)) {
    throw new InvalidInputError(`Invalid block number: ${input}`, input);
  }
  return BigInt(trimmed);
}

export function parseTxHash(input: string): Hex {
  const trimmed = input.trim();
  if (!isHex(trimmed, { strict: true }) || size(trimmed) !== 32) {
    throw new InvalidInputError(`Invalid transaction hash: ${input}`, input);
  }
  return trimmed;
}
