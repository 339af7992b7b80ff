import { concat, keccak256, toBytes, zeroHash, type Hex } from "viem";

/**
 * ENS namehash: labels are hashed right to left (TLD first) into a 32-byte node,
 * starting from the zero node. The empty name is the zero node.
 *
 * Labels are hashed as given; callers normalise the name beforehand.
 */
export function namehash(name: string): Hex {
  let node: Hex = zeroHash;
  if (name === "") return node;

  const labels = name.split(".");
  for (let i = labels.length - 1; i >= 0; i--) {
    node = keccak256(concat([node, labelhash(labels[i])]));
  }
  return node;
}

export function labelhash(label: string): Hex {
  return keccak256(toBytes(label));
}
