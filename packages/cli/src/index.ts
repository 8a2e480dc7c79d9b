#!/usr/bin/env node
import * as path from "node:path";
import {
  createNodeServer,
  defaultConfig,
  filteredLogger,
  NodeFileSystem,
  prefixedLogger,
  type ServerConfig,
} from "@linehttp/engine";
import { type CliArgs, CliUsageError, HELP_TEXT, parseArgs } from "./args.js";
import { createRouter } from "./routes.js";
import { VERSION } from "./version.js";

function readArgs(): CliArgs {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const args = readArgs();
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.version) {
    console.log(VERSION);
    return;
  }

  const directory = path.resolve(args.directory);
  const base = prefixedLogger("linehttp");
  const logger = args.quiet ? filteredLogger("warn", base) : base;

  const defaults = defaultConfig();
  const config: ServerConfig = {
    ...defaults,
    port: args.port,
    host: args.host,
    quiet: args.quiet,
    maxBodySize: args.maxBodySize ?? defaults.maxBodySize,
    idleTimeoutMs: args.idleTimeoutMs ?? defaults.idleTimeoutMs,
    requestTimeoutMs: args.requestTimeoutMs ?? defaults.requestTimeoutMs,
  };

  const router = createRouter({ directory, fs: new NodeFileSystem() });
  const server = createNodeServer({ config, router, logger });
  const port = await server.start();

  const displayHost = config.host === "0.0.0.0" ? "localhost" : config.host;
  console.log(`\n  linehttp serving ${directory}\n`);
  console.log(`  Local:   http://${displayHost}:${port}`);
  console.log();

  const shutdown = () => {
    console.log("\nShutting down...");
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Shutdown failed:", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
