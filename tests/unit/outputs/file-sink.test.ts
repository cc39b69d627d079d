import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Effect, Exit } from "effect";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { createFileSink } from "../../../src/outputs/file-sink.js";
import { IOError } from "../../../src/core/errors.js";

describe("FileSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "file-sink-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should write chunks in order", async () => {
    const path = join(dir, "feed.xml");
    const sink = createFileSink({ path });

    await Effect.runPromise(
      Effect.gen(function* () {
        yield* sink.open();
        yield* sink.write("<feed>\n");
        yield* sink.flush();
        yield* sink.write("</feed>\n");
        yield* sink.flush();
        yield* sink.close();
      }),
    );

    expect(await readFile(path, "utf-8")).toBe("<feed>\n</feed>\n");
  });

  it("should report its destination as a file URL", () => {
    const path = join(dir, "feed.xml");

    expect(createFileSink({ path }).destination).toBe(pathToFileURL(path).href);
  });

  it("should create missing parent directories", async () => {
    const path = join(dir, "nested", "deeper", "feed.xml");
    const sink = createFileSink({ path });

    await Effect.runPromise(
      sink.open().pipe(Effect.zipRight(sink.close())),
    );

    expect((await stat(path)).isFile()).toBe(true);
  });

  it("should write with fsync enabled", async () => {
    const path = join(dir, "feed.xml");
    const sink = createFileSink({ path, fsync: true });

    await Effect.runPromise(
      Effect.gen(function* () {
        yield* sink.open();
        yield* sink.write("synced");
        yield* sink.flush();
        yield* sink.close();
      }),
    );

    expect(await readFile(path, "utf-8")).toBe("synced");
  });

  it("should fail to write before open", async () => {
    const sink = createFileSink({ path: join(dir, "feed.xml") });

    const exit = await Effect.runPromiseExit(sink.write("x"));

    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
      expect(exit.cause.error).toBeInstanceOf(IOError);
      expect(exit.cause.error.operation).toBe("write");
    }
  });

  it("should fail to open when the parent is not a directory", async () => {
    const blocker = join(dir, "blocker");
    const first = createFileSink({ path: blocker });
    await Effect.runPromise(first.open().pipe(Effect.zipRight(first.close())));

    const sink = createFileSink({ path: join(blocker, "feed.xml") });
    const exit = await Effect.runPromiseExit(sink.open());

    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit) && exit.cause._tag === "Fail") {
      expect(exit.cause.error.operation).toBe("open");
    }
  });

  it("should close only once", async () => {
    const path = join(dir, "feed.xml");
    const sink = createFileSink({ path });

    await Effect.runPromise(
      Effect.gen(function* () {
        yield* sink.open();
        yield* sink.close();
        yield* sink.close();
      }),
    );

    const exit = await Effect.runPromiseExit(sink.write("late"));
    expect(Exit.isFailure(exit)).toBe(true);
  });

  it("should remove the file on discard", async () => {
    const path = join(dir, "feed.xml");
    const sink = createFileSink({ path });

    await Effect.runPromise(
      Effect.gen(function* () {
        yield* sink.open();
        yield* sink.write("partial");
        yield* sink.close();
        yield* sink.discard();
      }),
    );

    await expect(stat(path)).rejects.toThrow();
  });
});
