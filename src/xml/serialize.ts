/**
 * XML serialization of the assembled tree.
 *
 * Uses fast-xml-parser's XMLBuilder with `preserveOrder: true` so that mixed
 * content (text interleaved with inline tags) keeps its document order.
 */

import { XMLBuilder } from "fast-xml-parser";
import { ATTRIBUTE_PREFIX, COMMENT_NODE, TEXT_NODE, toOrderedNode } from "./ordered.js";
import type { XmlElement } from "./tree.js";

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

export interface SerializeOptions {
  /** Put nested elements on their own lines; needs a non-empty `indent` */
  pretty?: boolean;
  /** Indent unit used when pretty printing; an empty string gives compact output */
  indent?: string;
}

/** Serialize an element without the XML declaration. */
export function serializeElement(element: XmlElement, options: SerializeOptions = {}): string {
  const indent = options.indent ?? "";
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    textNodeName: TEXT_NODE,
    commentPropName: COMMENT_NODE,
    suppressEmptyNode: true,
    format: options.pretty === true && indent.length > 0,
    indentBy: indent,
  });
  const xml: string = builder.build([toOrderedNode(element)]);
  return xml;
}

/** Serialize a document root, prefixed with the XML declaration. */
export function serializeXml(root: XmlElement, options: SerializeOptions = {}): string {
  return XML_DECLARATION + serializeElement(root, options);
}
