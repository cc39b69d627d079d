/**
 * XML Serializer - Streams one product element at a time to a sink
 */
import { Effect } from "effect";
import { XMLBuilder } from "fast-xml-parser";
import type { FeedMetadata, FeedSink } from "../core/types.js";
import type { IOError } from "../core/errors.js";
import type { Scalar, ValidProduct, VariationData } from "../core/product.js";

/**
 * Record-oriented streaming serializer. `begin` and `end` frame the
 * document; `writeProduct` emits and flushes one record and returns the
 * number of bytes written.
 */
export interface FeedSerializer {
  readonly begin: (metadata: FeedMetadata) => Effect.Effect<number, IOError>;
  readonly writeProduct: (product: ValidProduct) => Effect.Effect<number, IOError>;
  readonly end: () => Effect.Effect<number, IOError>;
}

export interface XmlSerializerConfig {
  readonly indent?: string; // indentation inside elements (default: two spaces)
}

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';
export const ROOT_OPEN = "<feed>\n";
export const ROOT_CLOSE = "</feed>\n";

interface XmlAttributeNode {
  readonly "@_name": string;
  readonly "#text": string;
}

type XmlNode = { readonly [tag: string]: string | XmlNode | ReadonlyArray<XmlNode | XmlAttributeNode> };

// Code points outside the XML 1.0 Char production, lone surrogates included
const INVALID_XML_CHARS = /[^\t\n\r\x20-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu;

/**
 * Text content with characters XML cannot carry removed
 */
const text = (value: Scalar): string => String(value).replace(INVALID_XML_CHARS, "");

const attributeNodes = (
  attributes: ReadonlyArray<readonly [string, Scalar]>,
): ReadonlyArray<XmlAttributeNode> =>
  attributes.map(([name, value]) => ({ "@_name": text(name), "#text": text(value) }));

const variationNode = (variation: VariationData): XmlNode => {
  const node: Record<string, string> = {};
  if (variation.reference !== undefined) node.reference = text(variation.reference);
  if (variation.name !== undefined) node.name = text(variation.name);
  if (variation.price !== undefined) node.price = text(variation.price);
  if (variation.quantity !== undefined) node.quantity = text(variation.quantity);
  return node;
};

/**
 * Required fields first, then attributes, then variations in creation order
 */
const productNode = (product: ValidProduct): XmlNode => ({
  reference: text(product.reference),
  name: text(product.name),
  price: text(product.price),
  quantity: text(product.quantity),
  ...(product.attributes.length > 0
    ? { attributes: { attribute: attributeNodes(product.attributes) } }
    : {}),
  ...(product.variations.length > 0
    ? { variations: { variation: product.variations.map(variationNode) } }
    : {}),
});

const metadataNode = (metadata: FeedMetadata): XmlNode => ({
  ...(metadata.platform !== undefined ? { platform: text(metadata.platform.name) } : {}),
  ...(metadata.platform?.version !== undefined
    ? { version: text(metadata.platform.version) }
    : {}),
  ...(metadata.attributes.length > 0
    ? { attributes: { attribute: attributeNodes(metadata.attributes) } }
    : {}),
});

/**
 * Create an XML serializer writing to the given sink
 *
 * Output shape:
 * ```xml
 * <?xml version="1.0" encoding="UTF-8"?>
 * <feed>
 * <platform>Shop</platform>
 * <version>1.2.0</version>
 * <product>
 *   <reference>1</reference>
 *   <name>Product 1</name>
 *   <price>5.99</price>
 *   <quantity>3</quantity>
 * </product>
 * </feed>
 * ```
 */
export const createXmlSerializer = (
  sink: FeedSink,
  config: XmlSerializerConfig = {},
): FeedSerializer => {
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    textNodeName: "#text",
    format: true,
    indentBy: config.indent ?? "  ",
    suppressEmptyNode: false,
    suppressBooleanAttributes: false,
  });

  const commit = (chunk: string) =>
    sink.write(chunk).pipe(
      Effect.zipRight(sink.flush()),
      Effect.as(Buffer.byteLength(chunk, "utf-8")),
    );

  return {
    begin: (metadata) =>
      commit(XML_DECLARATION + ROOT_OPEN + builder.build(metadataNode(metadata))),

    writeProduct: (product) => commit(builder.build({ product: productNode(product) })),

    end: () => commit(ROOT_CLOSE),
  };
};
