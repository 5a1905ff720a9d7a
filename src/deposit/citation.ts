/**
 * Citation list construction.
 *
 * Each reference becomes a `<citation>` whose fields are produced by small
 * field functions, applied in a fixed order. Some reference types also get a
 * synthesized `<unstructured_citation>`, and data citations with an identifier
 * get a related item in the article's relations container.
 */

import { appendText, createElement, subElement, type XmlElement } from "../xml/tree.js";
import type { Article, Reference, ReferenceAuthor } from "../types.js";
import { pickFirstIdentifier, type IdentifierCandidate } from "./identifiers.js";
import { LEGACY_ELOCATION_SCHEMA_VERSIONS } from "./namespaces.js";
import { citationRelatedItem, type RelationsProgram } from "./relations.js";
import { cleanTag, titleTag } from "./rich-text.js";

/** Longest volume value the deposit schema accepts. */
export const MAX_VOLUME_LENGTH = 31;

export interface CitationOptions {
  faceMarkup: boolean;
  schemaVersion: string;
}

type CitationField = (ref: Reference, options: CitationOptions) => XmlElement | undefined;

/** Types that always get an unstructured citation. */
const UNSTRUCTURED_TYPES: ReadonlySet<string> = new Set([
  "confproc",
  "patent",
  "software",
  "thesis",
  "web",
  "webpage",
]);

const AUTHOR_NAMES: ReadonlyArray<IdentifierCandidate<ReferenceAuthor, "surname" | "collab">> = [
  ["surname", (author) => author.surname],
  ["collab", (author) => author.collab],
];

function textElement(name: string, text: string | undefined): XmlElement | undefined {
  if (!text) return undefined;
  const element = createElement(name);
  appendText(element, text);
  return element;
}

// ─── Author Selection ────────────────────────────────────────────────

/** Authors with group type "author", or the editors when there are none. */
export function filterCitationAuthors(ref: Reference): ReferenceAuthor[] {
  const authors = ref.authors.filter((author) => author.groupType === "author");
  if (authors.length > 0) return authors;
  return ref.authors.filter((author) => author.groupType === "editor");
}

/** Every author's display name regardless of group type, joined with ", ". */
export function citationAuthorLine(ref: Reference): string | undefined {
  const names: string[] = [];
  for (const author of ref.authors) {
    if (author.surname) {
      names.push(author.givenNames ? `${author.surname} ${author.givenNames}` : author.surname);
    } else if (author.collab) {
      names.push(author.collab);
    }
  }
  return names.length > 0 ? names.join(", ") : undefined;
}

// ─── Unstructured Citation ───────────────────────────────────────────

/** Decide if a citation should have an unstructured citation added. */
export function doUnstructuredCitation(ref: Reference): boolean {
  const type = ref.publicationType;
  if (!type) return false;
  if (UNSTRUCTURED_TYPES.has(type)) return true;
  if (type === "preprint") return !ref.doi;
  if (type === "report") return !ref.isbn;
  return false;
}

/** "location: name" from whichever publisher parts are present. */
export function citationPublisher(ref: Reference): string | undefined {
  const parts = [ref.publisherLoc, ref.publisherName].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(": ") : undefined;
}

/** The uri, with the access date appended when known. */
export function citationUri(ref: Reference): string | undefined {
  if (!ref.uri) return undefined;
  return ref.dateInCitation ? `${ref.uri} [Accessed ${ref.dateInCitation}]` : ref.uri;
}

/**
 * Free-text citation: the present values in a fixed order, each without its
 * trailing periods, joined by ". " and ending with a single period.
 */
export function unstructuredCitationText(ref: Reference): string | undefined {
  const year = ref.year || (ref.yearNumeric ? String(ref.yearNumeric) : undefined);
  const parts = [
    citationAuthorLine(ref),
    year,
    ref.articleTitle || ref.dataTitle,
    citationPublisher(ref),
    ref.source,
    ref.version,
    ref.patent,
    ref.confName,
    citationUri(ref),
  ]
    .map((part) => (part ?? "").replace(/\.+$/, ""))
    .filter((part) => part !== "");
  return parts.length > 0 ? `${parts.join(". ")}.` : undefined;
}

// ─── Fields ──────────────────────────────────────────────────────────

const sourceField: CitationField = (ref) =>
  textElement(ref.publicationType === "journal" ? "journal_title" : "volume_title", ref.source);

const authorField: CitationField = (ref) => {
  const [first] = filterCitationAuthors(ref);
  if (!first) return undefined;
  const name = pickFirstIdentifier(first, AUTHOR_NAMES);
  if (!name) return undefined;
  return name.type === "surname" ? textElement("author", name.value) : cleanTag("author", name.value);
};

const volumeField: CitationField = (ref) =>
  textElement("volume", ref.volume?.slice(0, MAX_VOLUME_LENGTH));

const issueField: CitationField = (ref) => textElement("issue", ref.issue);

const firstPageField: CitationField = (ref) => textElement("first_page", ref.fpage);

// Prefer the numeric year value if available
const yearField: CitationField = (ref) =>
  textElement("cYear", ref.yearNumeric ? String(ref.yearNumeric) : ref.year);

const articleTitleField: CitationField = (ref) => {
  const title = ref.articleTitle || ref.dataTitle;
  return title ? cleanTag("article_title", title) : undefined;
};

const doiField: CitationField = (ref) => textElement("doi", ref.doi);

const isbnField: CitationField = (ref) => textElement("isbn", ref.isbn);

// Older schemas have no elocation_id element, so it stands in for the first page
const elocationIdField: CitationField = (ref, options) =>
  textElement(
    LEGACY_ELOCATION_SCHEMA_VERSIONS.includes(options.schemaVersion) ? "first_page" : "elocation_id",
    ref.elocationId
  );

const unstructuredCitationField: CitationField = (ref, options) => {
  if (!doUnstructuredCitation(ref)) return undefined;
  const text = unstructuredCitationText(ref);
  return text ? titleTag("unstructured_citation", text, options.faceMarkup) : undefined;
};

const CITATION_FIELDS: readonly CitationField[] = [
  sourceField,
  authorField,
  volumeField,
  issueField,
  firstPageField,
  yearField,
  articleTitleField,
  doiField,
  isbnField,
  elocationIdField,
  unstructuredCitationField,
];

/**
 * Build a `<citation>` keyed by the reference id, or by its 1-based position.
 */
export function buildCitation(ref: Reference, ordinal: number, options: CitationOptions): XmlElement {
  const citation = createElement("citation", { key: ref.id || String(ordinal) });
  for (const field of CITATION_FIELDS) {
    const element = field(ref, options);
    if (element) citation.children.push(element);
  }
  return citation;
}

/**
 * Append the `<citation_list>` and, for data citations, their related items.
 * The relations container must already be in place when any are needed.
 */
export function setCitationList(
  parent: XmlElement,
  article: Article,
  program: RelationsProgram,
  options: CitationOptions
): void {
  if (article.references.length === 0) return;
  const citationList = subElement(parent, "citation_list");
  article.references.forEach((ref, index) => {
    const relatedItem = citationRelatedItem(ref);
    if (relatedItem) program.addRelatedItem(relatedItem);
    citationList.children.push(buildCitation(ref, index + 1, options));
  });
}
