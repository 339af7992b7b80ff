import Fastify, { type FastifyInstance } from "fastify";
import chalk from "chalk";
import {
  ExplorerError,
  InvalidInputError,
  NotFoundError,
  ResolutionError,
  describeError,
  findCause,
} from "./errors.js";
import type { Explorer } from "./explorer/explorer.js";
import { parseBlockNumber, parseTxHash } from "./explorer/input.js";
import { toJson } from "./format.js";
import type { Logger } from "./logger.js";

export interface ServerOptions {
  explorer: Explorer;
  logger?: Logger;
  /** Log each incoming HTTP request (default: true) */
  logRequests?: boolean;
}

export interface ErrorBody {
  error: { code: number; message: string };
}

/**
 * HTTP status for a failed lookup: 404 when the node has no such object
 * or the name does not resolve, 400 for unparseable input, 502 when the
 * node could not be read
 */
export function statusForError(err: unknown): number {
  if (findCause(err, InvalidInputError)) return 400;
  if (findCause(err, NotFoundError)) return 404;
  const resolution = findCause(err, ResolutionError);
  // a ResolutionError with a cause failed on the wire
  if (resolution && resolution.cause === undefined) return 404;
  return 502;
}

export function errorBody(err: unknown): ErrorBody {
  return {
    error: {
      code: err instanceof ExplorerError ? err.code : -32000,
      message: describeError(err),
    },
  };
}

/**
 * Read-only JSON API over an Explorer. Not listening; see startServer.
 */
export function buildServer(options: ServerOptions): FastifyInstance {
  const { explorer, logger, logRequests = true } = options;
  const server = Fastify();

  // bigint fields go out as decimal strings
  server.setReplySerializer((payload) => toJson(payload));

  server.addHook("onRequest", async (request, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Methods", "GET, OPTIONS");
    if (logRequests && logger) {
      logger.info(chalk.yellow(`← ${request.method} ${request.url}`));
    }
  });

  server.setErrorHandler(async (err, _request, reply) => {
    const status = statusForError(err);
    if (status === 502) {
      logger?.error(`✖ ${describeError(err)}`);
    }
    return reply.status(status).send(errorBody(err));
  });

  server.get("/network", async () => explorer.getNetworkSnapshot());

  server.get<{ Params: { number: string }; Querystring: { transactions?: string } }>(
    "/blocks/:number",
    async (request) => {
      const number = parseBlockNumber(request.params.number);
      if (request.query.transactions === "true") {
        return explorer.getBlockWithTransactions(number);
      }
      return explorer.getBlock(number);
    }
  );

  server.get<{ Params: { hash: string } }>("/tx/:hash", async (request) => {
    return explorer.getTransaction(parseTxHash(request.params.hash));
  });

  server.get<{ Params: { id: string } }>("/address/:id", async (request) => {
    return explorer.lookupAddress(request.params.id);
  });

  server.get<{ Params: { name: string } }>("/ens/:name", async (request) => {
    const name = request.params.name.toLowerCase();
    const address = await explorer.resolveName(name);
    return { name, address };
  });

  return server;
}

export async function startServer(options: ServerOptions & { port: number; host?: string }) {
  const { port, host = "0.0.0.0", explorer, logger } = options;
  const server = buildServer(options);

  await server.listen({ port, host });

  logger?.info(chalk.green(`\nchainlens API running on http://localhost:${port}`));
  logger?.info(chalk.dim(`RPC endpoint: ${explorer.transport.url}\n`));

  process.on("SIGINT", () => {
    server.close().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  });

  return server;
}
