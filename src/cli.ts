#!/usr/bin/env node
/**
 * CLI entry point for running feeds
 */
import { Effect, Logger, LogLevel } from "effect";
import { NodeRuntime } from "@effect/platform-node";
import { loadConfig } from "./core/config-loader.js";
import { buildFeed } from "./core/pipeline-builder.js";
import type { FeedResult } from "./core/types.js";
import { formatError } from "./core/format-error.js";
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

// Get package version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, "../package.json"), "utf-8"),
);
const appVersion =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

class UsageError extends Error {
  readonly _tag = "UsageError";
}

/**
 * Show help message
 */
function showHelp() {
  console.error(`
product-feed v${appVersion}

Streams product catalogues into XML feeds, one product at a time

Usage:
  product-feed <command> [options]

Commands:
  run <config-file>    Run a feed from a YAML configuration file
  check <config-file>  Load and build a feed without running it

Options:
  -h, --help          Show this help message
  -v, --version       Show version information
  --debug             Enable debug logging

Examples:
  product-feed run feeds/catalogue.yaml
  product-feed run feeds/catalogue.yaml --debug > catalogue.xml
  product-feed check feeds/catalogue.yaml
`);
}

const reportResult = (result: FeedResult) =>
  Effect.gen(function* () {
    if (result.success) {
      yield* Effect.log("✓ Feed completed successfully!");
    } else {
      yield* Effect.logWarning("Feed completed with rejected items");
    }
    yield* Effect.log(`  Destination: ${result.destination}`);
    yield* Effect.log(`  Emitted: ${result.stats.emitted} products`);
    yield* Effect.log(`  Filtered: ${result.stats.filtered} items`);
    yield* Effect.log(`  Rejected: ${result.stats.rejected} items`);
    yield* Effect.log(`  Duration: ${result.stats.duration}ms`);
    for (const { error } of result.rejected) {
      yield* Effect.logWarning(`    - ${error.message}`);
    }
  });

/**
 * Main CLI function
 */
const main = Effect.gen(function* () {
  const args = process.argv.slice(2);

  // Handle help flag
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    showHelp();
    return;
  }

  // Handle version flag
  if (args.includes("--version") || args.includes("-v")) {
    console.log(`product-feed v${appVersion}`);
    return;
  }

  const debugMode = args.includes("--debug");
  const command = args[0];

  if (command !== "run" && command !== "check") {
    return yield* Effect.fail(
      new UsageError(
        `Unknown command '${command}'. Run "product-feed --help" for usage information.`,
      ),
    );
  }

  // Get config file path (filter out flags)
  const configPath = args.slice(1).find((arg) => !arg.startsWith("--"));
  if (!configPath) {
    return yield* Effect.fail(
      new UsageError(
        `Missing config file argument\nUsage: product-feed ${command} <config-file.yaml>`,
      ),
    );
  }

  yield* Effect.log(`Loading configuration from: ${configPath}`);
  const config = yield* loadConfig(configPath);
  const { feed, source } = yield* buildFeed(config, { debug: debugMode });

  if (command === "check") {
    yield* Effect.log(`✓ Feed "${feed.name}" is valid`);
    return;
  }

  const result = yield* feed.writeEffect(source);
  yield* reportResult(result);
}).pipe(
  Effect.catchAll((error) =>
    Effect.gen(function* () {
      yield* Effect.logError(`Fatal error: ${formatError(error)}`);
      process.exitCode = 1;
    }),
  ),
);

// Logs go to stderr so that the feed itself can be written to stdout
const debugMode = process.argv.includes("--debug");
NodeRuntime.runMain(
  main.pipe(
    Effect.provide(
      Logger.replace(
        Logger.defaultLogger,
        Logger.withConsoleError(Logger.stringLogger),
      ),
    ),
    Logger.withMinimumLogLevel(debugMode ? LogLevel.Debug : LogLevel.Info),
  ),
);
