/**
 * Pipeline Builder - Constructs a feed and its item source from configuration
 */
import { Effect } from "effect";
import type {
  FeedFileConfig,
  FeedSectionConfig,
  FilterConfig,
  InputConfig,
  MapperConfig,
  ProcessorConfig,
} from "./config-loader.js";
import type { FeedConfig } from "./config.js";
import { ComponentError, type ErrorCategory, describeCause } from "./errors.js";
import { createFeed, type Feed } from "./feed.js";
import type {
  EffectFilterFn,
  EffectMapperFn,
  EffectProcessorFn,
  ItemSource,
  StageDefinition,
} from "./types.js";
import { createNdjsonInput } from "../inputs/ndjson-input.js";
import { createLoggingProcessor } from "../processors/logging-processor.js";
import { createMappingProcessor } from "../processors/mapping-processor.js";
import { createExpressionFilter } from "../filters/expression-filter.js";
import { createExpressionMapper } from "../mappers/expression-mapper.js";
import { resolveDestination } from "../outputs/destination.js";
// Testing utility
import { generateItems } from "../testing/generate-input.js";

export class BuildError extends ComponentError {
  readonly _tag = "BuildError";
  readonly category: ErrorCategory = "fatal";

  constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}

export interface BuildOptions {
  readonly cwd?: string; // base for relative input and destination paths (default: process.cwd())
  readonly debug?: boolean;
}

export interface BuiltFeed {
  readonly feed: Feed<unknown>;
  readonly source: ItemSource<unknown>;
  readonly inputType: "ndjson" | "generate";
}

/**
 * Create a stage, reporting a bad expression as a BuildError
 */
const buildStage = <F>(
  label: string,
  create: () => StageDefinition<F>,
): Effect.Effect<StageDefinition<F>, BuildError> =>
  Effect.try({
    try: create,
    catch: (error) =>
      new BuildError(`Invalid ${label}: ${describeCause(error)}`, error),
  });

/**
 * Build input from configuration
 */
const buildInput = (
  config: InputConfig,
  cwd: string,
): Effect.Effect<Omit<BuiltFeed, "feed">, BuildError> => {
  if (config.ndjson && config.generate) {
    return Effect.fail(
      new BuildError("Only one input may be configured (found ndjson and generate)"),
    );
  }

  if (config.ndjson) {
    const ndjson = config.ndjson;
    return Effect.try({
      try: () =>
        createNdjsonInput({ path: ndjson.path, cwd: ndjson.cwd ?? cwd }),
      catch: (error) =>
        new BuildError(`Invalid ndjson input: ${describeCause(error)}`, error),
    }).pipe(
      Effect.map((source) => ({ inputType: "ndjson" as const, source })),
    );
  }

  // Testing utility: generate input
  if (config.generate) {
    const generate = config.generate;
    return Effect.succeed({
      inputType: "generate" as const,
      source: () =>
        generateItems({
          count: generate.count,
          template: generate.template,
          startIndex: generate.start_index,
          padIndex: generate.pad_index,
        }),
    });
  }

  return Effect.fail(new BuildError("No valid input configuration found"));
};

/**
 * Build processor from configuration
 */
const buildProcessor = (
  config: ProcessorConfig,
  position: number,
): Effect.Effect<StageDefinition<EffectProcessorFn<unknown>>, BuildError> => {
  if (config.log && config.mapping) {
    return Effect.fail(
      new BuildError(`Processor #${position} declares more than one type`),
    );
  }

  if (config.log) {
    const log = config.log;
    return buildStage("log processor", () =>
      createLoggingProcessor({
        level: log.level,
        includeItem: log.include_item,
      }),
    );
  }

  if (config.mapping) {
    const mapping = config.mapping;
    return buildStage(`mapping processor #${position}`, () =>
      createMappingProcessor({
        expression: mapping.expression,
        bindings: mapping.bindings,
      }),
    );
  }

  return Effect.fail(
    new BuildError(`No valid processor configuration found at #${position}`),
  );
};

const buildFilter = (
  config: FilterConfig,
  position: number,
): Effect.Effect<StageDefinition<EffectFilterFn<unknown>>, BuildError> => {
  const expression = config.expression;
  if (expression) {
    return buildStage(`expression filter #${position}`, () =>
      createExpressionFilter({
        expression: expression.expression,
        bindings: expression.bindings,
      }),
    );
  }

  return Effect.fail(
    new BuildError(`No valid filter configuration found at #${position}`),
  );
};

const buildMapper = (
  config: MapperConfig,
  position: number,
): Effect.Effect<StageDefinition<EffectMapperFn<unknown>>, BuildError> => {
  const expression = config.expression;
  if (expression) {
    return buildStage(`expression mapper #${position}`, () =>
      createExpressionMapper({
        expression: expression.expression,
        bindings: expression.bindings,
      }),
    );
  }

  return Effect.fail(
    new BuildError(`No valid mapper configuration found at #${position}`),
  );
};

/**
 * Build complete feed from configuration
 *
 * The destination is resolved here so that a bad descriptor is reported
 * before anything runs.
 */
export const buildFeed = (
  config: FeedFileConfig,
  options: BuildOptions = {},
): Effect.Effect<BuiltFeed, BuildError> =>
  Effect.gen(function* () {
    const cwd = options.cwd ?? process.cwd();
    const section: FeedSectionConfig = config.feed ?? {};

    if (options.debug) {
      yield* Effect.logDebug(
        `buildFeed received config: ${JSON.stringify(config, null, 2)}`,
      );
    }

    const input = yield* buildInput(config.input, cwd);

    const processors = yield* Effect.forEach(
      config.pipeline?.processors ?? [],
      buildProcessor,
      { concurrency: 1 },
    );
    const filters = yield* Effect.forEach(
      config.pipeline?.filters ?? [],
      buildFilter,
      { concurrency: 1 },
    );
    const mappers = yield* Effect.forEach(
      config.pipeline?.mappers ?? [],
      buildMapper,
      { concurrency: 1 },
    );

    const sink =
      section.destination === undefined
        ? undefined
        : yield* resolveDestination(section.destination, {
            fsync: section.fsync,
            cwd,
          }).pipe(
            Effect.mapError(
              (error) => new BuildError(error.message, error),
            ),
          );

    const feedConfig: FeedConfig = {
      destination: sink,
      platform:
        section.platform === undefined
          ? undefined
          : {
              name: section.platform.name,
              version:
                section.platform.version === undefined
                  ? undefined
                  : String(section.platform.version),
            },
      attributes: section.attributes,
      errorPolicy: section.error_policy,
      onAbort: section.on_abort,
      fsync: section.fsync,
      metricsInterval: section.metrics_interval,
      maxRejected: section.max_rejected,
      logLevel: options.debug ? "debug" : section.log_level,
    };

    const feed = createFeed<unknown>(feedConfig, {
      name: section.name ?? `${input.inputType}-feed`,
    });

    for (const stage of processors) {
      feed.addProcessorEffect(stage.run, stage.name);
    }
    for (const stage of filters) {
      feed.addFilterEffect(stage.run, stage.name);
    }
    for (const stage of mappers) {
      feed.addMapperEffect(stage.run, stage.name);
    }

    return { feed, ...input };
  });
