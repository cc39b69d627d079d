/**
 * Destination resolution - maps a URI-like descriptor to a sink
 *
 * Supported descriptors:
 * - `stdout:`, `stdout://` or `-`: standard output
 * - `file:///absolute/path.xml`, `file:relative/path.xml` or a bare path: local file
 */
import { Effect } from "effect";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { FeedSink } from "../core/types.js";
import { ConfigurationError, describeCause } from "../core/errors.js";
import { createFileSink } from "./file-sink.js";
import { createStdoutSink } from "./stream-sink.js";

export const DEFAULT_DESTINATION = "stdout:";

export interface DestinationOptions {
  readonly fsync?: boolean;
  readonly cwd?: string; // base for relative paths (default: process.cwd())
}

const SCHEME = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

const resolveFilePath = (
  descriptor: string,
  options: DestinationOptions,
): Effect.Effect<string, ConfigurationError> => {
  if (descriptor.startsWith("file://")) {
    return Effect.try({
      try: () => fileURLToPath(descriptor),
      catch: (error) =>
        new ConfigurationError(
          `Invalid file destination "${descriptor}": ${describeCause(error)}`,
          error,
        ),
    });
  }

  const path = descriptor.startsWith("file:")
    ? descriptor.slice("file:".length)
    : descriptor;

  if (path.trim() === "") {
    return Effect.fail(
      new ConfigurationError(`File destination "${descriptor}" has no path`),
    );
  }

  return Effect.succeed(resolve(options.cwd ?? process.cwd(), path));
};

/**
 * Resolve a destination descriptor to a sink
 */
export const resolveDestination = (
  descriptor: string,
  options: DestinationOptions = {},
): Effect.Effect<FeedSink, ConfigurationError> => {
  const trimmed = descriptor.trim();

  if (trimmed === "") {
    return Effect.fail(new ConfigurationError("Destination cannot be empty"));
  }

  if (trimmed === "-" || trimmed === "stdout:" || trimmed === "stdout://") {
    return Effect.succeed(createStdoutSink());
  }

  const match = SCHEME.exec(trimmed);
  const scheme = match?.[1]?.toLowerCase();

  // No scheme, or a Windows drive letter: a plain path
  if (scheme === undefined || scheme.length === 1 || scheme === "file") {
    return resolveFilePath(trimmed, options).pipe(
      Effect.map((path) => createFileSink({ path, fsync: options.fsync })),
    );
  }

  return Effect.fail(
    new ConfigurationError(
      `Unsupported destination scheme "${scheme}:" in "${descriptor}" (expected file: or stdout:)`,
    ),
  );
};
