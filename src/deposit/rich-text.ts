/**
 * Rich text reparser.
 *
 * Titles, abstracts, digests and synthesized citation text arrive as raw JATS
 * markup strings. Each one is sanitized, re-tagged into the deposit vocabulary,
 * wrapped in a temporary root carrying the namespace declarations, parsed in
 * isolation and spliced into the output tree as real nodes.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { FragmentParseError } from "../errors.js";
import { ATTRIBUTE_PREFIX, TEXT_NODE, fromOrderedNodes, type OrderedNode } from "../xml/ordered.js";
import { appendChild, createElement, type XmlElement } from "../xml/tree.js";
import { REPARSING_NAMESPACES } from "./namespaces.js";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  trimValues: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
  parseTagValue: false,
  parseAttributeValue: false,
});

// ─── Sanitization ────────────────────────────────────────────────────

/** Source tags that survive sanitization. MathML tags are allowed by prefix. */
export const ALLOWED_TAGS: readonly string[] = [
  "p",
  "italic",
  "bold",
  "underline",
  "sub",
  "sup",
  "sc",
  "inline-formula",
  "ext-link",
  "sec",
  "title",
];

const MATHML_PREFIX = "mml:";
const MATHML_TAG = /<\/?mml:[^<>]*>/g;
const TAG_PATTERN = /^<\/?([A-Za-z][\w.:-]*)(?:\s[^<>]*)?\/?>$/;

function isAllowedTag(name: string): boolean {
  return ALLOWED_TAGS.includes(name) || name.startsWith(MATHML_PREFIX);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Escape every `&` that does not start an XML entity or character reference. */
export function escapeAmpersands(markup: string): string {
  return markup.replace(/&(?!(?:amp|lt|gt|quot|apos|#\d+|#x[0-9a-fA-F]+);)/g, "&amp;");
}

/** Escape angle brackets that are not part of an allowed tag. */
export function escapeUnmatchedAngleBrackets(markup: string): string {
  return markup
    .split(/(<[^<>]*>)/)
    .map((piece) => {
      const name = TAG_PATTERN.exec(piece)?.[1];
      if (name !== undefined && isAllowedTag(name)) return piece;
      return piece.replace(/</g, "&lt;").replace(/>/g, "&gt;");
    })
    .join("");
}

/** Make a raw fragment safe to parse as XML. */
export function sanitizeMarkup(markup: string): string {
  return escapeUnmatchedAngleBrackets(escapeAmpersands(markup));
}

// ─── Re-tagging ──────────────────────────────────────────────────────

/** Rename opening, closing and empty tags, keeping their attributes. */
export function renameTag(markup: string, from: string, to: string): string {
  const pattern = new RegExp(`<(/?)${escapeRegExp(from)}(?=[\\s/>])`, "g");
  return markup.replace(pattern, `<$1${to}`);
}

/** Remove a tag, keeping its content. */
export function removeTag(markup: string, name: string): string {
  const pattern = new RegExp(`</?${escapeRegExp(name)}(?:\\s[^<>]*)?/?>`, "g");
  return markup.replace(pattern, "");
}

function stripTags(markup: string, keep: readonly string[], keepMathml: boolean): string {
  let result = markup;
  for (const tag of ALLOWED_TAGS) {
    if (!keep.includes(tag)) result = removeTag(result, tag);
  }
  return keepMathml ? result : result.replace(MATHML_TAG, "");
}

/** Tags mapped one-for-one to JATS tags in abstracts. */
const JATS_TAGS = ["p", "italic", "bold", "underline", "sub", "sup", "sc", "sec", "title"];

/** Face markup equivalents of the source inline tags. */
const FACE_TAGS: Readonly<Record<string, string>> = {
  italic: "i",
  bold: "b",
  underline: "u",
  sc: "scp",
  sub: "sub",
  sup: "sup",
};

/**
 * Full abstract conversion: paragraphs, sections and inline formatting become
 * `jats:` tags; inline formulas and external links are unwrapped.
 */
export function toJatsMarkup(markup: string): string {
  let result = markup;
  for (const tag of JATS_TAGS) {
    result = renameTag(result, tag, `jats:${tag}`);
  }
  result = removeTag(result, "inline-formula");
  return removeTag(result, "ext-link");
}

/** Unwrap sections, turning each section title into a paragraph. */
export function flattenSections(markup: string): string {
  return renameTag(removeTag(markup, "sec"), "title", "p");
}

/**
 * Stripped abstract conversion: only paragraphs (as `jats:p`) and MathML
 * remain.
 */
export function toStrippedMarkup(markup: string): string {
  const stripped = stripTags(flattenSections(markup), ["p"], true);
  return renameTag(stripped, "p", "jats:p");
}

/** Inline face markup for titles and citation text. */
export function toFaceMarkup(markup: string): string {
  let result = stripTags(markup, Object.keys(FACE_TAGS), true);
  for (const [from, to] of Object.entries(FACE_TAGS)) {
    if (from !== to) result = renameTag(result, from, to);
  }
  return result;
}

/** Remove every allowed tag. */
export function toCleanText(markup: string): string {
  return stripTags(markup, [], false);
}

// ─── Parsing ─────────────────────────────────────────────────────────

export type FragmentResult =
  | { ok: true; element: XmlElement }
  | { ok: false; markup: string; reason: string; line: number; col: number };

/**
 * Wrap markup in a temporary `tagName` root and parse it in isolation.
 * The root carries the reparsing namespace declarations plus `rootAttributes`.
 */
export function parseFragment(
  tagName: string,
  markup: string,
  rootAttributes: Readonly<Record<string, string>> = {}
): FragmentResult {
  const attributes = { ...REPARSING_NAMESPACES, ...rootAttributes };
  const attrText = Object.entries(attributes)
    .map(([name, value]) => ` ${name}="${value}"`)
    .join("");
  const wrapped = `<${tagName}${attrText}>${markup}</${tagName}>`;

  const validation = XMLValidator.validate(wrapped);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    return { ok: false, markup: wrapped, reason: msg, line, col };
  }

  const parsed: OrderedNode[] = parser.parse(wrapped);
  const [root] = fromOrderedNodes(parsed);
  if (root?.type !== "element") {
    return { ok: false, markup: wrapped, reason: "No root element", line: 1, col: 1 };
  }
  return { ok: true, element: root };
}

export interface ReparseOptions {
  /** Extra attributes for the temporary root */
  rootAttributes?: Readonly<Record<string, string>>;
  /** Root attributes copied onto the resulting element */
  copyAttributes?: readonly string[];
}

/**
 * Parse markup into a detached `tagName` element.
 *
 * @throws FragmentParseError if the markup is not well-formed
 */
export function reparse(tagName: string, markup: string, options: ReparseOptions = {}): XmlElement {
  const result = parseFragment(tagName, markup, options.rootAttributes);
  if (!result.ok) {
    throw new FragmentParseError(tagName, result.markup, result.reason, result.line, result.col);
  }
  const attributes: Record<string, string> = {};
  for (const name of options.copyAttributes ?? []) {
    const value = result.element.attributes[name];
    if (value !== undefined) attributes[name] = value;
  }
  const element = createElement(tagName, attributes);
  element.children.push(...result.element.children);
  return element;
}

/** Parse markup and append it to `parent` as a new `tagName` element. */
export function reparseInto(
  parent: XmlElement,
  tagName: string,
  markup: string,
  options: ReparseOptions = {}
): XmlElement {
  return appendChild(parent, reparse(tagName, markup, options));
}

// ─── Tag Builders ────────────────────────────────────────────────────

/** `tagName` keeping face markup (<i>, <b>, <u>, <sub>, <sup>, <scp>). */
export function inlineTag(tagName: string, markup: string): XmlElement {
  return reparse(tagName, toFaceMarkup(sanitizeMarkup(markup)));
}

/** `tagName` with all markup removed. */
export function cleanTag(tagName: string, markup: string): XmlElement {
  return reparse(tagName, toCleanText(sanitizeMarkup(markup)));
}

/** Title, subtitle and citation text: inline or clean per the face markup setting. */
export function titleTag(tagName: string, markup: string, faceMarkup: boolean): XmlElement {
  return faceMarkup ? inlineTag(tagName, markup) : cleanTag(tagName, markup);
}

export type AbstractType = "abstract" | "executive-summary";

/**
 * A `jats:abstract`. A digest is an executive summary and keeps the
 * `abstract-type` attribute of its temporary root.
 */
export function abstractTag(
  markup: string,
  options: { abstractType: AbstractType; jatsAbstract: boolean }
): XmlElement {
  const sanitized = sanitizeMarkup(markup);
  const converted = options.jatsAbstract ? toJatsMarkup(sanitized) : toStrippedMarkup(sanitized);
  const rootAttributes: Record<string, string> =
    options.abstractType === "executive-summary" ? { "abstract-type": "executive-summary" } : {};
  return reparse("jats:abstract", converted, {
    rootAttributes,
    copyAttributes: ["abstract-type"],
  });
}
