/**
 * Conversion between the deposit XML tree and fast-xml-parser's
 * `preserveOrder` representation.
 *
 * A node in the preserveOrder output is either a text node
 * `{ "#text": string | number }`, a comment `{ "#comment": [{ "#text": string }] }`
 * or an element node `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */

import type { XmlElement, XmlNode } from "./tree.js";

export type OrderedNode = Record<string, unknown>;

export const TEXT_NODE = "#text";
export const COMMENT_NODE = "#comment";
export const ATTRIBUTE_PREFIX = "@_";

// ─── Navigation Helpers ──────────────────────────────────────────────

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
export function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== TEXT_NODE) return key;
  }
  return undefined;
}

/** Get the children array of an element node. */
export function getChildren(node: OrderedNode): OrderedNode[] {
  const tag = getTagName(node);
  if (!tag) return [];
  const children = node[tag];
  return Array.isArray(children) ? (children as OrderedNode[]) : [];
}

/** Get all attributes of an element node (strips the @_ prefix). */
export function getAttrs(node: OrderedNode): Record<string, string> {
  const attrs = node[":@"];
  if (attrs == null || typeof attrs !== "object") return {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      result[key.slice(ATTRIBUTE_PREFIX.length)] = String(value);
    }
  }
  return result;
}

/** Get text content from a #text node. */
export function getTextContent(node: OrderedNode): string | undefined {
  if (TEXT_NODE in node) {
    const val = node[TEXT_NODE];
    return val != null ? String(val) : undefined;
  }
  return undefined;
}

// ─── Conversion ──────────────────────────────────────────────────────

/** Convert parsed preserveOrder nodes into tree nodes. Comments are dropped. */
export function fromOrderedNodes(nodes: OrderedNode[]): XmlNode[] {
  const result: XmlNode[] = [];
  for (const node of nodes) {
    const text = getTextContent(node);
    if (text != null) {
      if (text) result.push({ type: "text", text });
      continue;
    }
    const tag = getTagName(node);
    if (!tag || tag === COMMENT_NODE) continue;
    result.push({
      type: "element",
      name: tag,
      attributes: getAttrs(node),
      children: fromOrderedNodes(getChildren(node)),
    });
  }
  return result;
}

/** Convert a tree node into its preserveOrder form for XMLBuilder. */
export function toOrderedNode(node: XmlNode): OrderedNode {
  switch (node.type) {
    case "text":
      return { [TEXT_NODE]: node.text };
    case "comment":
      return { [COMMENT_NODE]: [{ [TEXT_NODE]: node.text }] };
    case "element":
      return toOrderedElement(node);
  }
}

function toOrderedElement(element: XmlElement): OrderedNode {
  const ordered: OrderedNode = { [element.name]: element.children.map(toOrderedNode) };
  const names = Object.keys(element.attributes);
  if (names.length > 0) {
    const attrs: Record<string, string> = {};
    for (const name of names) {
      attrs[`${ATTRIBUTE_PREFIX}${name}`] = element.attributes[name] ?? "";
    }
    ordered[":@"] = attrs;
  }
  return ordered;
}
