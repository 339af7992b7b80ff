import { formatUnits } from "viem";

/**
 * Raw integer amount as a decimal string with trailing zeros trimmed:
 * formatAmount(1500000n, 6) === "1.5"
 */
export function formatAmount(value: bigint, decimals: number): string {
  return formatUnits(value, decimals);
}

/**
 * JSON.stringify replacer that writes bigints as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function toJson(value: unknown, indent?: number): string {
  return JSON.stringify(value, bigintReplacer, indent);
}
