import { bytesToHex, type Hex } from "viem";

/**
 * Well-known 4-byte function selectors. Entries without an argument list
 * cover several overloads or long tuple signatures.
 */
export const FUNCTION_SELECTORS: Readonly<Record<string, string>> = {
  // ERC-20
  "0xa9059cbb": "transfer(address,uint256)",
  "0x23b872dd": "transferFrom(address,address,uint256)",
  "0x095ea7b3": "approve(address,uint256)",
  "0x70a08231": "balanceOf(address)",
  "0xdd62ed3e": "allowance(address,address)",
  // ERC-721
  "0x42842e0e": "safeTransferFrom(address,address,uint256)",
  "0xb88d4fde": "safeTransferFrom(address,address,uint256,bytes)",
  "0x081812fc": "getApproved(uint256)",
  "0xa22cb465": "setApprovalForAll(address,bool)",
  // Uniswap V2 router
  "0x38ed1739": "swapExactTokensForTokens",
  "0x7ff36ab5": "swapExactETHForTokens",
  "0x18cbafe5": "swapExactTokensForETH",
  "0xfb3bdb41": "swapETHForExactTokens",
  // Uniswap V3 router
  "0xc04b8d59": "exactInput",
  "0x414bf389": "exactInputSingle",
  "0xf28c0498": "exactOutput",
  "0xdb3e2198": "exactOutputSingle",
  "0x5ae401dc": "multicall(uint256,bytes[])",
  "0xac9650d8": "multicall(bytes[])",
  // Common
  "0xd0e30db0": "deposit()",
  "0x2e1a7d4d": "withdraw(uint256)",
  "0x3ccfd60b": "withdraw()",
  "0x40c10f19": "mint(address,uint256)",
  "0x42966c68": "burn(uint256)",
  "0x01ffc9a7": "supportsInterface(bytes4)",
  // Proxy
  "0x5c60da1b": "implementation()",
  "0xf851a440": "admin()",
  "0x3659cfe6": "upgradeTo(address)",
  "0x8f283970": "changeAdmin(address)",
  "0x4f1ef286": "upgradeToAndCall(address,bytes)",
  // Aave V3 pool
  "0xab9c4b5d": "flashLoan",
  "0x617ba037": "supply",
  "0xa415bcad": "borrow",
  "0x573ade81": "repay",
  // ENS
  "0xd5fa2b00": "setAddr(bytes32,address)",
  "0xc47f0027": "setName(string)",
};

/**
 * Name of the function called by `input`, or null when the selector is
 * unknown or the input is shorter than 4 bytes
 */
export function decodeFunctionSelector(input: Hex | Uint8Array): string | null {
  const selector = selectorOf(input);
  if (selector === null) return null;
  return FUNCTION_SELECTORS[selector] ?? null;
}

/**
 * First 4 bytes of call input as lower-case hex
 */
export function selectorOf(input: Hex | Uint8Array): Hex | null {
  if (input instanceof Uint8Array) {
    return input.length < 4 ? null : bytesToHex(input.subarray(0, 4));
  }
  if (input.length < 10) return null;
  return `0x${input.slice(2, 10).toLowerCase()}`;
}

/**
 * "transfer(address,uint256)" -> "transfer"
 */
export function functionName(signature: string): string {
  const paren = signature.indexOf("(");
  return paren === -1 ? signature : signature.slice(0, paren);
}
