#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import {
  createStreams,
  createTap,
  loadConfig,
  TAP_NAME,
  TAP_VERSION,
} from "../tiingo/index.js";
import { buildCatalog, loadCatalogSelections } from "./catalog.js";
import { AuthenticationError, ConfigError, StateStoreError } from "./errors.js";
import { createLogger } from "./logger.js";
import { createMessageWriter } from "./output.js";
import { EXIT_FAILURE, exitCodeFor, formatSummary } from "./report.js";
import { FileStateStore, MemoryStateStore } from "./state.js";
import type { StateStore } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

const logger = createLogger(TAP_NAME);

function fail(err: unknown): never {
  if (err instanceof ConfigError) {
    logger.error(err.message);
  } else if (err instanceof AuthenticationError) {
    logger.error(`Authentication failed, run aborted: ${err.message}`);
  } else if (err instanceof StateStoreError) {
    logger.error(`State store failure, run aborted: ${err.message}`);
  } else {
    logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  }
  process.exit(EXIT_FAILURE);
}

const program = new Command()
  .name(TAP_NAME)
  .description("Extract Tiingo ticker metadata and daily prices as a message stream")
  .version(TAP_VERSION);

program
  .command("discover")
  .description("Print the catalog of available streams")
  .action(() => {
    const catalog = buildCatalog(createStreams({ symbols: [] }));
    process.stdout.write(`${JSON.stringify(catalog, null, 2)}\n`);
  });

program
  .command("sync")
  .description("Emit SCHEMA, RECORD and STATE messages for the selected streams")
  .option("--config <file>", "Config file (JSON or YAML)")
  .option("--state <file>", "State file to resume from and checkpoint to")
  .option("--catalog <file>", "Catalog with stream and field selections")
  .action(async (opts: { config?: string; state?: string; catalog?: string }) => {
    try {
      const config = loadConfig({ configPath: opts.config });
      const selections = opts.catalog ? loadCatalogSelections(opts.catalog) : undefined;
      const stateStore: StateStore = opts.state
        ? new FileStateStore(opts.state)
        : new MemoryStateStore();

      const ac = new AbortController();
      const onSignal = () => {
        logger.warn("Received interrupt, finishing current page...");
        ac.abort();
      };
      process.on("SIGINT", onSignal);
      process.on("SIGTERM", onSignal);

      const tap = createTap(config, {
        stateStore,
        writer: createMessageWriter(),
        logger,
        selections,
        signal: ac.signal,
      });

      try {
        const result = await tap.run();
        for (const line of formatSummary(result)) logger.info(line);
        process.exitCode = exitCodeFor(result);
      } finally {
        process.removeListener("SIGINT", onSignal);
        process.removeListener("SIGTERM", onSignal);
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("status")
  .description("Show saved bookmarks")
  .requiredOption("--state <file>", "State file")
  .action(async (opts: { state: string }) => {
    try {
      const state = await new FileStateStore(opts.state).load();
      const streams = Object.entries(state.bookmarks);
      if (streams.length === 0) {
        console.log("No bookmarks saved");
        return;
      }
      for (const [stream, bookmark] of streams) {
        for (const p of bookmark.partitions) {
          const context = Object.values(p.context).join(",");
          console.log(`${stream} ${context}: ${p.replication_key} = ${p.replication_key_value}`);
        }
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("streams")
  .description("List available streams")
  .action(() => {
    for (const stream of createStreams({ symbols: [] })) {
      const key = stream.replicationKey === null ? "" : ` on ${stream.replicationKey}`;
      console.log(
        `  - ${stream.name}: ${stream.replicationMethod}${key}, keys [${stream.keyProperties.join(", ")}]`,
      );
    }
  });

await program.parseAsync(process.argv);
