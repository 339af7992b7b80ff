#!/usr/bin/env node
import { Command } from "commander";
import { existsSync, writeFileSync, unlinkSync } from "node:fs";
import { join } from "node:path";
import chalk from "chalk";
import {
  CONFIG_BASENAME,
  DEFAULT_CONFIG,
  loadConfig,
  resolveConfig,
  resolveRpcUrl,
  type Config,
  type ConfigFormat,
  type ResolvedConfig,
} from "./config.js";
import { describeError } from "./errors.js";
import { createExplorer, type Explorer } from "./explorer/explorer.js";
import { parseBlockNumber, parseTxHash } from "./explorer/input.js";
import { toJson } from "./format.js";
import { createLogger, type Logger } from "./logger.js";
import { startServer } from "./server.js";

interface GlobalOptions {
  rpc?: string;
  config?: string;
}

const INIT_CONFIG: Config = {
  rpcUrl: "http://localhost:8545",
  port: DEFAULT_CONFIG.port,
  requestTimeoutMs: DEFAULT_CONFIG.requestTimeoutMs,
  retry: { ...DEFAULT_CONFIG.retry },
  tokenScanTimeoutMs: DEFAULT_CONFIG.tokenScanTimeoutMs,
  logging: { ...DEFAULT_CONFIG.logging },
};

/**
 * Config file content for `init`
 */
function renderConfig(config: Config, format: ConfigFormat): string {
  if (format === "json") {
    return JSON.stringify(config, null, 2) + "\n";
  }

  const body = `{
  rpcUrl: "${config.rpcUrl ?? ""}",
  port: ${config.port},
  requestTimeoutMs: ${config.requestTimeoutMs},
  retry: {
    maxRetries: ${config.retry?.maxRetries},
    baseDelayMs: ${config.retry?.baseDelayMs},
  },
  tokenScanTimeoutMs: ${config.tokenScanTimeoutMs},
  logging: {
    requests: ${config.logging?.requests},
    retries: ${config.logging?.retries},
  },
}`;

  if (format === "js") {
    return `/** @type {import("chainlens").Config} */\nexport default ${body};\n`;
  }
  return `import type { Config } from "chainlens";\n\nexport default ${body} satisfies Config;\n`;
}

function findExistingConfig(): string | null {
  for (const ext of [".ts", ".js", ".json"]) {
    const path = join(process.cwd(), `${CONFIG_BASENAME}${ext}`);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

interface Context {
  config: ResolvedConfig;
  logger: Logger;
  explorer: Explorer;
}

async function setup(command: Command): Promise<Context> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = resolveConfig(await loadConfig(process.cwd(), options.config));
  const logger = createLogger(config.logging);
  const rpcUrl = resolveRpcUrl(options.rpc, config);
  return { config, logger, explorer: createExplorer(rpcUrl, config, logger) };
}

/**
 * Action handler that prints the body's result as JSON on stdout
 */
function run(body: (context: Context, args: string[]) => Promise<unknown>) {
  return async (...args: unknown[]): Promise<void> => {
    const command = args.at(-1);
    if (!(command instanceof Command)) return;
    try {
      const context = await setup(command);
      const result = await body(context, command.args);
      process.stdout.write(toJson(result, 2) + "\n");
    } catch (err) {
      console.error(chalk.red(`\n✖ ${describeError(err)}\n`));
      process.exitCode = 1;
    }
  };
}

const program = new Command();

program
  .name("chainlens")
  .description("Inspect blocks, transactions and addresses on an Ethereum node")
  .version("0.1.0")
  .option("-r, --rpc <url>", "JSON-RPC endpoint (overrides config and CHAINLENS_RPC_URL)")
  .option("-c, --config <path>", "Path to config file");

program
  .command("block")
  .description("Show a block with its transactions and fee statistics")
  .argument("<number>", "Block number (decimal or 0x-hex)")
  .action(run(({ explorer }, [number]) => explorer.getBlockWithTransactions(parseBlockNumber(number))));

program
  .command("tx")
  .description("Show a transaction with its receipt, decoded logs and token transfers")
  .argument("<hash>", "Transaction hash")
  .action(run(({ explorer }, [hash]) => explorer.getTransaction(parseTxHash(hash))));

program
  .command("address")
  .description("Show balance, nonce and contract details of an address or ENS name")
  .argument("<id>", "Address or ENS name")
  .action(run(({ explorer }, [id]) => explorer.lookupAddress(id)));

program
  .command("resolve")
  .description("Resolve an ENS name to an address")
  .argument("<name>", "ENS name")
  .action(
    run(async ({ explorer }, [name]) => ({
      name,
      address: await explorer.resolveName(name.toLowerCase()),
    }))
  );

program
  .command("network")
  .description("Show latest block, gas price, client version and fee trend")
  .action(run(({ explorer }) => explorer.getNetworkSnapshot()));

program
  .command("serve")
  .description("Start the read-only HTTP API")
  .option("-p, --port <number>", "Port to run the server on")
  .action(async (options: { port?: string }, command: Command) => {
    try {
      const { config, logger, explorer } = await setup(command);
      const port = options.port ? parseInt(options.port, 10) : config.port;
      await startServer({ explorer, logger, port, logRequests: config.logging.requests });
    } catch (err) {
      console.error(chalk.red(`\n✖ ${describeError(err)}\n`));
      process.exitCode = 1;
    }
  });

program
  .command("init")
  .description(`Create ${CONFIG_BASENAME} with default settings`)
  .option("-f, --force", "Overwrite existing config file")
  .option("--ts", `Create TypeScript config (${CONFIG_BASENAME}.ts)`)
  .option("--js", `Create JavaScript config (${CONFIG_BASENAME}.js)`)
  .action((options: { force?: boolean; ts?: boolean; js?: boolean }) => {
    const existingConfig = findExistingConfig();

    if (existingConfig && !options.force) {
      const fileName = existingConfig.split("/").pop();
      console.error(chalk.red(`\n✖ Error: ${fileName} already exists\n`));
      console.log(chalk.dim("Use --force to overwrite the existing file:\n"));
      console.log(chalk.cyan("  chainlens init --force\n"));
      process.exitCode = 1;
      return;
    }

    const format: ConfigFormat = options.ts ? "ts" : options.js ? "js" : "json";
    const fileName = `${CONFIG_BASENAME}.${format}`;

    if (existingConfig) {
      unlinkSync(existingConfig);
    }
    writeFileSync(join(process.cwd(), fileName), renderConfig(INIT_CONFIG, format));

    console.log(chalk.green(`\n✔ Created ${fileName}\n`));
    console.log("Next steps:");
    console.log(chalk.dim("  1. Point rpcUrl at your node"));
    console.log(chalk.dim("  2. Look something up:"));
    console.log(chalk.cyan("     chainlens network\n"));
  });

await program.parseAsync();
