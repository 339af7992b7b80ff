import { size, type Hex } from "viem";
import { NotFoundError, type NotFoundKind } from "../errors.js";
import { decodeFunctionSelector, functionName, selectorOf } from "../decode/selectors.js";
import type { RetryExecutor } from "../rpc/retry.js";
import type { Receipt, Transaction } from "../rpc/types.js";
import { txTypeFromByte, type TxSummary } from "./types.js";

/**
 * Run a primary read through the executor, turning a null answer
 * into NotFoundError (which the executor does not retry)
 */
export function fetchRequired<T>(
  executor: RetryExecutor,
  label: string,
  kind: NotFoundKind,
  id: string,
  read: () => Promise<T | null>
): Promise<T> {
  return executor.run(async () => {
    const value = await read();
    if (value === null) throw new NotFoundError(kind, id);
    return value;
  }, label);
}

export function lookupName(names: ReadonlyMap<string, string>, address: string | null): string | null {
  if (address === null) return null;
  return names.get(address.toLowerCase()) ?? null;
}

export function receiptFee(receipt: Receipt): bigint {
  return receipt.gasUsed * receipt.effectiveGasPrice;
}

/**
 * Selector of a contract call; plain transfers and creations have none
 */
export function callSelector(tx: Pick<Transaction, "to" | "input">): Hex | null {
  return tx.to === null ? null : selectorOf(tx.input);
}

export function summarizeTransaction(
  tx: Transaction,
  names: ReadonlyMap<string, string>,
  receipt?: Receipt
): TxSummary {
  const method = decodeFunctionSelector(tx.input);
  return {
    hash: tx.hash,
    from: tx.from,
    to: tx.to,
    value: tx.value,
    gasLimit: tx.gas,
    type: txTypeFromByte(tx.type),
    isContractCreation: tx.to === null,
    fromName: lookupName(names, tx.from),
    toName: lookupName(names, tx.to),
    inputSize: size(tx.input),
    methodSelector: callSelector(tx),
    decodedMethod: method === null ? null : functionName(method),
    blobCount: tx.blobVersionedHashes.length,
    feePaid: receipt ? receiptFee(receipt) : null,
  };
}
