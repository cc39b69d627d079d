import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { access, mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { XMLParser } from "fast-xml-parser"
import { createFeed } from "../../src/core/feed.js"
import { PipelineStageError, SourceError, ValidationError } from "../../src/core/errors.js"
import type { MapperFn } from "../../src/core/types.js"
import { createCaptureSink } from "../../src/testing/capture-sink.js"
import { generateItems } from "../../src/testing/generate-input.js"

interface Row {
  readonly sku: number
  readonly stock: number
}

const mapRow: MapperFn<Row> = (row, product) => {
  product.setReference(row.sku).setName(`Product ${row.sku}`).setPrice(5.99).setQuantity(row.stock)
}

const parser = new XMLParser({
  ignoreAttributes: false,
  ignoreDeclaration: true,
  isArray: (name) => ["product", "variation", "attribute"].includes(name),
})

describe("E2E: feed pipeline", () => {
  it("should write one product per item that passes every filter", async () => {
    const sink = createCaptureSink()

    const result = await createFeed<Row>({ destination: sink, logLevel: "none" })
      .addFilter((row) => row.stock > 0)
      .addFilter((row) => row.sku % 2 === 1)
      .addMapper(mapRow)
      .write([
        { sku: 1, stock: 1 },
        { sku: 2, stock: 1 },
        { sku: 3, stock: 0 },
        { sku: 5, stock: 4 },
      ])

    expect(result.stats).toMatchObject({ pulled: 4, emitted: 2, filtered: 2, rejected: 0 })
    expect(sink.getOutput().match(/<product>/g)).toHaveLength(2)
  })

  it("should drop an item rejected by a filter", async () => {
    const sink = createCaptureSink()

    await createFeed<{ sku: number }>({ destination: sink, logLevel: "none" })
      .addFilter((row) => row.sku !== 2)
      .addMapper((row, product) => {
        product.setReference(row.sku).setName("Item").setPrice(1).setQuantity(1)
      })
      .write([{ sku: 1 }, { sku: 2 }])

    expect(sink.getOutput()).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n' +
        "<feed>\n" +
        "<product>\n" +
        "  <reference>1</reference>\n" +
        "  <name>Item</name>\n" +
        "  <price>1</price>\n" +
        "  <quantity>1</quantity>\n" +
        "</product>\n" +
        "</feed>\n"
    )
  })

  it("should produce a document that parses back to the mapped values", async () => {
    const sink = createCaptureSink()

    await createFeed<Row>({
      destination: sink,
      attributes: { currency: "EUR" },
      logLevel: "none",
    })
      .addMapper(mapRow)
      .addMapper((row, product) => {
        product.setAttribute("color", "red").setAttribute("size", "L").setAttribute("color", "blue")
        product.createVariation().setReference(`${row.sku}-S`).setQuantity(1)
        product.createVariation().setReference(`${row.sku}-M`).setQuantity(2)
      })
      .write([{ sku: 1, stock: 3 }])

    expect(parser.parse(sink.getOutput())).toEqual({
      feed: {
        attributes: { attribute: [{ "@_name": "currency", "#text": "EUR" }] },
        product: [
          {
            reference: 1,
            name: "Product 1",
            price: 5.99,
            quantity: 3,
            attributes: {
              attribute: [
                { "@_name": "color", "#text": "blue" },
                { "@_name": "size", "#text": "L" },
              ],
            },
            variations: {
              variation: [
                { reference: "1-S", quantity: 1 },
                { reference: "1-M", quantity: 2 },
              ],
            },
          },
        ],
      },
    })
  })

  it("should escape markup in text and attribute values", async () => {
    const sink = createCaptureSink()

    await createFeed<Row>({ destination: sink, logLevel: "none" })
      .addMapper(mapRow)
      .addMapper((_, product) => {
        product.setName("Salt & <Pepper>").setAttribute("note", '"fresh"')
      })
      .write([{ sku: 1, stock: 1 }])

    expect(sink.getOutput()).toContain("  <name>Salt &amp; &lt;Pepper&gt;</name>\n")
    expect(sink.getOutput()).toContain('<attribute name="note">&quot;fresh&quot;</attribute>')
  })

  it("should keep pending output bounded by one product regardless of item count", async () => {
    const peakFor = async (count: number) => {
      const sink = createCaptureSink({ retain: false })

      const result = await createFeed<Record<string, unknown>>({
        destination: sink,
        logLevel: "none",
        metricsInterval: 0,
      })
        .addMapper((item, product) => {
          product.setReference(String(item.sku)).setName("Fixed width").setPrice(1).setQuantity(1)
        })
        .write(() => generateItems({ count, padIndex: 5, template: { sku: "SKU-{{index}}" } }))

      expect(result.stats.emitted).toBe(count)
      return sink.getStats()
    }

    const small = await peakFor(10)
    const large = await peakFor(10_000)

    expect(large.peakPendingBytes).toBe(small.peakPendingBytes)
    expect(large.bytesWritten).toBeGreaterThan(small.bytesWritten)
    expect(large.flushCount).toBe(large.writeCount)
  })

  it("should close the sink exactly once on success", async () => {
    const sink = createCaptureSink()

    await createFeed<Row>({ destination: sink, logLevel: "none" })
      .addMapper(mapRow)
      .write([{ sku: 1, stock: 1 }])

    expect(sink.getStats().closeCount).toBe(1)
    expect(sink.getCalls().at(-1)).toBe("close")
  })

  it("should close the sink exactly once when a stage fails", async () => {
    const sink = createCaptureSink()

    const write = createFeed<Row>({ destination: sink, logLevel: "none" })
      .addMapper(mapRow)
      .addFilter((row) => {
        if (row.sku === 2) {
          throw new Error("lookup failed")
        }
        return true
      })
      .write([
        { sku: 1, stock: 1 },
        { sku: 2, stock: 1 },
      ])

    await expect(write).rejects.toBeInstanceOf(PipelineStageError)
    expect(sink.getStats().closeCount).toBe(1)
  })

  it("should close the sink exactly once when a product is invalid", async () => {
    const sink = createCaptureSink()

    const write = createFeed<Row>({ destination: sink, logLevel: "none" })
      .addMapper((row, product) => {
        product.setReference(row.sku).setName("No stock").setPrice(1)
      })
      .write([{ sku: 1, stock: 1 }])

    await expect(write).rejects.toBeInstanceOf(ValidationError)
    expect(sink.getStats().closeCount).toBe(1)
  })

  it("should close the sink exactly once when the source fails", async () => {
    const sink = createCaptureSink()
    function* rows(): Generator<Row> {
      yield { sku: 1, stock: 1 }
      throw new Error("cursor lost")
    }

    const write = createFeed<Row>({ destination: sink, logLevel: "none" })
      .addMapper(mapRow)
      .write(rows)

    await expect(write).rejects.toBeInstanceOf(SourceError)
    expect(sink.getStats().closeCount).toBe(1)
  })

  describe("with a file destination", () => {
    let dir: string

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "feed-pipeline-"))
    })

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    it("should delete the partial file when a stage fails and onAbort is delete", async () => {
      const path = join(dir, "feed.xml")
      const feed = createFeed<Row>({
        destination: `file:${path}`,
        onAbort: "delete",
        logLevel: "none",
      })
        .addMapper(mapRow)
        .addMapper((row) => {
          if (row.sku === 2) {
            throw new Error("price service down")
          }
        }, "pricing")

      let failure: unknown
      try {
        await feed.write([
          { sku: 1, stock: 1 },
          { sku: 2, stock: 1 },
        ])
      } catch (error) {
        failure = error
      }

      expect(failure).toBeInstanceOf(PipelineStageError)
      expect(feed.state).toBe("failed")
      await expect(access(path)).rejects.toThrow()
    })
  })
})
