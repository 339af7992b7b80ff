export { Explorer, createExplorer, type ExplorerOptions } from "./explorer/explorer.js";
export { BlockAssembler, computeBlockStats, toBlockInfo } from "./explorer/block.js";
export { TransactionAssembler, toTxInfo, toReceiptInfo } from "./explorer/transaction.js";
export { AddressAssembler } from "./explorer/address.js";
export { NetworkAssembler } from "./explorer/network.js";
export { parseBlockNumber, parseTxHash } from "./explorer/input.js";
export * from "./explorer/types.js";

export { JsonRpcClient, type JsonRpcClientOptions } from "./rpc/client.js";
export { RpcTransport, type Transport, type CallRequest } from "./rpc/transport.js";
export {
  RetryExecutor,
  isRetryableError,
  RETRYABLE_MARKERS,
  type RetryOptions,
  type RetryEvent,
} from "./rpc/retry.js";
export type { Block, Transaction, Receipt, Log, FeeHistory } from "./rpc/types.js";

export { NameResolver, ENS_REGISTRY, ENS_REVERSE_RECORDS } from "./ens/resolver.js";
export { namehash, labelhash } from "./ens/namehash.js";

export { ContractInspector, EIP1967_IMPLEMENTATION_SLOT } from "./contract/inspector.js";
export { TokenBalanceScanner, dustThreshold } from "./contract/token-balances.js";
export { POPULAR_TOKENS, findKnownToken, type KnownToken } from "./contract/tokens.js";

export { decodeLog, decodeEventSignature, extractTokenTransfer, EVENT_SIGNATURES } from "./decode/events.js";
export { decodeFunctionSelector, functionName, FUNCTION_SELECTORS } from "./decode/selectors.js";
export { detectBuilderTag, decodeExtraData } from "./decode/builders.js";

export * from "./errors.js";
export { formatAmount, toJson } from "./format.js";
export { loadConfig, resolveConfig, resolveRpcUrl, type Config, type LogConfig, type RetryConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { buildServer, startServer } from "./server.js";
