/**
 * NDJSON Input - Streams items from newline-delimited JSON files
 */
import * as Schema from "effect/Schema";
import { glob } from "glob";
import { createReadStream } from "node:fs";
import * as path from "node:path";
import { createInterface } from "node:readline";
import { describeCause } from "../core/errors.js";
import { validateSync } from "../core/validation.js";

export interface NdjsonInputConfig {
  /**
   * File path or glob pattern(s). Matches are read in sorted order.
   */
  readonly path: string | ReadonlyArray<string>;
  readonly cwd?: string;
}

/**
 * Validation schema for NDJSON Input configuration
 */
export const NdjsonInputConfigSchema = Schema.Struct({
  path: Schema.Union(
    Schema.String.pipe(Schema.minLength(1)),
    Schema.Array(Schema.String.pipe(Schema.minLength(1))).pipe(Schema.minItems(1)),
  ),
  cwd: Schema.optional(Schema.String),
});

/**
 * A line that is not valid JSON, or a pattern that matches no file
 */
export class NdjsonInputError extends Error {
  readonly _tag = "NdjsonInputError";

  constructor(
    message: string,
    readonly file?: string,
    readonly line?: number,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = "NdjsonInputError";
  }
}

/**
 * Resolve the configured patterns to a sorted, de-duplicated file list
 */
export const resolveNdjsonFiles = async (
  config: NdjsonInputConfig,
): Promise<string[]> => {
  const cwd = config.cwd ?? process.cwd();
  const patterns = typeof config.path === "string" ? [config.path] : [...config.path];

  const files = new Set<string>();
  for (const pattern of patterns) {
    const matches = await glob(pattern, { cwd, absolute: true, nodir: true });
    if (matches.length === 0) {
      throw new NdjsonInputError(`No files match ${pattern}`);
    }
    for (const match of matches) {
      files.add(path.resolve(match));
    }
  }

  return [...files].sort();
};

async function* readLines(file: string): AsyncGenerator<unknown> {
  const lines = createInterface({
    input: createReadStream(file, { encoding: "utf-8" }),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;
  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim() === "") {
        continue;
      }

      let item: unknown;
      try {
        item = JSON.parse(line);
      } catch (error) {
        throw new NdjsonInputError(
          `${file}:${lineNumber}: invalid JSON: ${describeCause(error)}`,
          file,
          lineNumber,
          error,
        );
      }
      yield item;
    }
  } finally {
    lines.close();
  }
}

/**
 * Create an NDJSON input
 *
 * Returns an item source for `Feed.write`. Files are opened one at a time
 * and read line by line; nothing is buffered beyond the current line.
 *
 * @example
 * ```typescript
 * await feed.write(createNdjsonInput({ path: "exports/products-*.ndjson" }));
 * ```
 */
export const createNdjsonInput = (
  config: NdjsonInputConfig,
): (() => AsyncIterable<unknown>) => {
  validateSync(NdjsonInputConfigSchema, config, "NDJSON input configuration");

  return async function* ndjsonInput() {
    const files = await resolveNdjsonFiles(config);
    for (const file of files) {
      yield* readLines(file);
    }
  };
};
