/**
 * Deposit document assembly.
 *
 * Builds the `doi_batch` envelope, then one `journal` record per article with
 * its `journal_article` sections composed in a fixed order. The result is a
 * fresh tree per call; serialization and disk output sit on top of it.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { findDate, hasLicense } from "../article.js";
import type { DepositConfig } from "../config.js";
import { createChildLogger, logger as baseLogger, type Logger } from "../logger.js";
import type { Article, Component } from "../types.js";
import { serializeXml } from "../xml/serialize.js";
import { appendChild, appendComment, createElement, subElement, type XmlElement } from "../xml/tree.js";
import { calculateJournalVolume, formatGeneratedAt, formatTimestamp, generateBatchId } from "./batch.js";
import { setCitationList, type CitationOptions } from "./citation.js";
import { buildContributors, type SubtreeBuilder } from "./contributors.js";
import { buildFunding } from "./funding.js";
import { depositMimeType } from "./mime-type.js";
import {
  NS_ACCESS_INDICATORS,
  NS_CLINICAL_TRIALS,
  NS_FUNDREF,
  NS_JATS,
  NS_MATHML,
  NS_RELATIONS,
  NS_XSI,
  OLDEST_SCHEMA_VERSION,
} from "./namespaces.js";
import { RelationsProgram, needsRelationsProgram, setDatasets } from "./relations.js";
import {
  articleResourceUrl,
  componentResourceUrl,
  doTextMiningCollection,
  doTextMiningPdf,
  doTextMiningXml,
} from "./resource-url.js";
import { abstractTag, removeTag, titleTag } from "./rich-text.js";

export interface BuildDepositOptions {
  /** Run date: batch id, timestamp and fallback publication date. Defaults to now */
  pubDate?: Date;
  /** Add the generated-by comment (default: true) */
  addComment?: boolean;
  /** Builds the `<contributors>` block (default: buildContributors) */
  contributors?: SubtreeBuilder;
  /** Builds the funding block (default: buildFunding) */
  funding?: SubtreeBuilder;
  logger?: Logger;
}

export interface DepositXmlOptions extends BuildDepositOptions {
  pretty?: boolean;
  indent?: string;
}

export interface Deposit {
  root: XmlElement;
  batchId: string;
}

export interface WrittenDeposit {
  batchId: string;
  path: string;
}

interface AssemblyContext {
  config: DepositConfig;
  runDate: Date;
  contributors: SubtreeBuilder;
  funding: SubtreeBuilder;
  log: Logger;
}

// ─── Envelope ────────────────────────────────────────────────────────

/** Root element with version, namespace and schema location attributes. */
export function createRoot(schemaVersion: string): XmlElement {
  const schema = `http://www.crossref.org/schema/${schemaVersion}`;
  const root = createElement("doi_batch", {
    version: schemaVersion,
    xmlns: schema,
    "xmlns:xsi": NS_XSI,
    "xmlns:fr": NS_FUNDREF,
    "xmlns:ai": NS_ACCESS_INDICATORS,
  });
  if (schemaVersion !== OLDEST_SCHEMA_VERSION) {
    root.attributes["xmlns:ct"] = NS_CLINICAL_TRIALS;
    root.attributes["xmlns:rel"] = NS_RELATIONS;
  }
  root.attributes["xsi:schemaLocation"] =
    `${schema} http://www.crossref.org/schemas/crossref${schemaVersion}.xsd`;
  root.attributes["xmlns:mml"] = NS_MATHML;
  root.attributes["xmlns:jats"] = NS_JATS;
  return root;
}

function setHead(parent: XmlElement, batchId: string, ctx: AssemblyContext): void {
  const head = subElement(parent, "head");
  subElement(head, "doi_batch_id", {}, batchId);
  subElement(head, "timestamp", {}, formatTimestamp(ctx.runDate));
  const depositor = subElement(head, "depositor");
  subElement(depositor, "depositor_name", {}, ctx.config.depositorName);
  subElement(depositor, "email_address", {}, ctx.config.emailAddress);
  subElement(head, "registrant", {}, ctx.config.registrant);
}

// ─── Journal ─────────────────────────────────────────────────────────

/** First configured date type present on the article, else the run date. */
export function resolvePubDate(article: Article, config: DepositConfig, runDate: Date): Date {
  return findDate(article, config.pubDateTypes) ?? runDate;
}

/** The article's volume, else one computed from the publication year. */
export function resolveVolume(article: Article, config: DepositConfig, pubDate: Date): string | undefined {
  if (article.volume) return article.volume;
  if (config.yearOfFirstVolume === undefined) return undefined;
  return calculateJournalVolume(pubDate, config.yearOfFirstVolume);
}

function setPublicationDate(parent: XmlElement, pubDate: Date): void {
  const publicationDate = subElement(parent, "publication_date", { media_type: "online" });
  subElement(publicationDate, "month", {}, String(pubDate.getUTCMonth() + 1).padStart(2, "0"));
  subElement(publicationDate, "day", {}, String(pubDate.getUTCDate()).padStart(2, "0"));
  subElement(publicationDate, "year", {}, String(pubDate.getUTCFullYear()));
}

function setJournalMetadata(parent: XmlElement, article: Article): void {
  const metadata = subElement(parent, "journal_metadata", { language: "en" });
  subElement(metadata, "full_title", {}, article.journalTitle);
  subElement(metadata, "issn", { media_type: "electronic" }, article.journalIssn);
}

function setJournal(parent: XmlElement, article: Article, ctx: AssemblyContext): void {
  const journal = subElement(parent, "journal");
  setJournalMetadata(journal, article);

  const pubDate = resolvePubDate(article, ctx.config, ctx.runDate);
  const issue = subElement(journal, "journal_issue");
  setPublicationDate(issue, pubDate);
  const volume = resolveVolume(article, ctx.config, pubDate);
  if (volume) {
    subElement(subElement(issue, "journal_volume"), "volume", {}, volume);
  }

  setJournalArticle(journal, article, pubDate, ctx);
}

// ─── Journal Article ─────────────────────────────────────────────────

function setTitles(parent: XmlElement, article: Article, config: DepositConfig): void {
  const titles = subElement(parent, "titles");
  appendChild(titles, titleTag("title", removeTag(article.title, "ext-link"), config.faceMarkup));
}

function setAbstracts(parent: XmlElement, article: Article, config: DepositConfig): void {
  if (article.abstract) {
    appendChild(
      parent,
      abstractTag(article.abstract, { abstractType: "abstract", jatsAbstract: config.jatsAbstract })
    );
  }
  if (article.digest) {
    appendChild(
      parent,
      abstractTag(article.digest, { abstractType: "executive-summary", jatsAbstract: config.jatsAbstract })
    );
  }
}

function setPublisherItem(parent: XmlElement, article: Article, config: DepositConfig): void {
  const publisherItem = subElement(parent, "publisher_item");
  if (config.elocationId && article.elocationId) {
    subElement(publisherItem, "item_number", { item_number_type: "article_number" }, article.elocationId);
  }
  subElement(publisherItem, "identifier", { id_type: "doi" }, article.doi);
}

/** One license_ref per configured scope, for licensed articles only. */
function setAccessIndicators(parent: XmlElement, article: Article, config: DepositConfig): void {
  const href = article.license?.href;
  if (!hasLicense(article) || !href || config.accessIndicatorsAppliesTo.length === 0) return;
  const program = subElement(parent, "ai:program", { name: "AccessIndicators" });
  for (const appliesTo of config.accessIndicatorsAppliesTo) {
    subElement(program, "ai:license_ref", { applies_to: appliesTo }, href);
  }
}

function setArchiveLocations(parent: XmlElement, archiveLocations: readonly string[]): void {
  if (archiveLocations.length === 0) return;
  const locations = subElement(parent, "archive_locations");
  for (const name of archiveLocations) {
    subElement(locations, "archive", { name });
  }
}

function setTextMiningCollection(parent: XmlElement, article: Article, config: DepositConfig): void {
  if (!doTextMiningCollection(article, config)) return;
  const collection = subElement(parent, "collection", { property: "text-mining" });
  if (doTextMiningPdf(article, config)) {
    const item = subElement(collection, "item");
    subElement(item, "resource", { mime_type: "application/pdf" }, articleResourceUrl(article, config, "textMiningPdf"));
  }
  if (doTextMiningXml(config)) {
    const item = subElement(collection, "item");
    subElement(item, "resource", { mime_type: "application/xml" }, articleResourceUrl(article, config, "textMiningXml"));
  }
}

function setDoiData(parent: XmlElement, article: Article, ctx: AssemblyContext): void {
  const doiData = subElement(parent, "doi_data");
  subElement(doiData, "doi", {}, article.doi);
  const resource = articleResourceUrl(article, ctx.config);
  if (resource) {
    subElement(doiData, "resource", {}, resource);
  } else {
    ctx.log.debug({ doi: article.doi }, "No resource URL for article");
  }
  setTextMiningCollection(doiData, article, ctx.config);
}

// ─── Components ──────────────────────────────────────────────────────

function setComponentPermissions(parent: XmlElement, component: Component, config: DepositConfig): void {
  if (!config.componentLicenseRef) return;
  const licensed = component.permissions.some(
    (permission) => permission.copyrightStatement || permission.license
  );
  if (!licensed) return;
  const program = subElement(parent, "ai:program", { name: "AccessIndicators" });
  subElement(program, "ai:license_ref", {}, config.componentLicenseRef);
}

function setComponent(parent: XmlElement, component: Component, article: Article, ctx: AssemblyContext): void {
  const { config, log } = ctx;
  const element = subElement(parent, "component", { parent_relation: "isPartOf" });

  const titles = subElement(element, "titles");
  subElement(titles, "title", {}, component.title ?? "");
  if (component.subtitle) {
    appendChild(titles, titleTag("subtitle", component.subtitle, config.faceMarkup));
  }

  if (component.mimeType) {
    const mimeType = depositMimeType(component.mimeType);
    if (mimeType) {
      subElement(element, "format", { mime_type: mimeType });
    } else {
      log.warn({ component: component.id, mimeType: component.mimeType }, "Unrecognized mime type");
    }
  }

  setComponentPermissions(element, component, config);

  if (component.doi) {
    const resource = componentResourceUrl(component, article, config);
    if (resource) {
      const doiData = subElement(element, "doi_data");
      subElement(doiData, "doi", {}, component.doi);
      subElement(doiData, "resource", {}, resource);
    } else {
      log.debug({ component: component.id }, "No resource URL for component");
    }
  }
}

function setComponentList(parent: XmlElement, article: Article, ctx: AssemblyContext): void {
  if (article.components.length === 0) return;
  const componentList = subElement(parent, "component_list");
  for (const component of article.components) {
    setComponent(componentList, component, article, ctx);
  }
}

function setJournalArticle(parent: XmlElement, article: Article, pubDate: Date, ctx: AssemblyContext): void {
  const { config } = ctx;
  const journalArticle = subElement(parent, "journal_article", { publication_type: "full_text" });
  if (config.referenceDistributionOpts) {
    journalArticle.attributes["reference_distribution_opts"] = config.referenceDistributionOpts;
  }

  setTitles(journalArticle, article, config);

  const contributors = ctx.contributors(article, config);
  if (contributors) appendChild(journalArticle, contributors);

  setAbstracts(journalArticle, article, config);
  setPublicationDate(journalArticle, pubDate);
  setPublisherItem(journalArticle, article, config);

  const funding = ctx.funding(article, config);
  if (funding) appendChild(journalArticle, funding);

  setAccessIndicators(journalArticle, article, config);

  // The container is placed here even though entries arrive later
  const relations = new RelationsProgram(journalArticle);
  if (needsRelationsProgram(article)) relations.ensure();
  setDatasets(relations, article);

  setArchiveLocations(journalArticle, config.archiveLocations);
  setDoiData(journalArticle, article, ctx);

  const citationOptions: CitationOptions = {
    faceMarkup: config.faceMarkup,
    schemaVersion: config.schemaVersion,
  };
  setCitationList(journalArticle, article, relations, citationOptions);

  setComponentList(journalArticle, article, ctx);
}

// ─── Public API ──────────────────────────────────────────────────────

/**
 * Assemble the deposit document tree for a batch of articles.
 *
 * @throws FragmentParseError if a markup fragment cannot be parsed
 */
export function buildDeposit(
  articles: readonly Article[],
  config: DepositConfig,
  options: BuildDepositOptions = {}
): Deposit {
  const runDate = options.pubDate ?? new Date();
  const batchId = generateBatchId(config.batchFilePrefix, articles, runDate);
  const log = options.logger ? options.logger.child({ batchId }) : createChildLogger({ batchId });
  const ctx: AssemblyContext = {
    config,
    runDate,
    contributors: options.contributors ?? buildContributors,
    funding: options.funding ?? buildFunding,
    log,
  };

  log.debug({ articles: articles.length }, "Assembling deposit");

  const root = createRoot(config.schemaVersion);
  if (options.addComment ?? true) {
    appendComment(root, `generated by ${config.generator} at ${formatGeneratedAt(runDate)}`);
  }
  setHead(root, batchId, ctx);

  const body = subElement(root, "body");
  for (const article of articles) {
    log.debug({ doi: article.doi }, "Adding article");
    setJournal(body, article, ctx);
  }

  return { root, batchId };
}

/** Assemble and serialize a deposit document. */
export function depositXml(
  articles: readonly Article[],
  config: DepositConfig,
  options: DepositXmlOptions = {}
): string {
  const { root } = buildDeposit(articles, config, options);
  return serializeXml(root, { pretty: options.pretty, indent: options.indent });
}

/** Assemble a deposit and write it to `<outputDir>/<batchId>.xml`. */
export async function writeDeposit(
  articles: readonly Article[],
  config: DepositConfig,
  outputDir: string,
  options: DepositXmlOptions = {}
): Promise<WrittenDeposit> {
  const { root, batchId } = buildDeposit(articles, config, options);
  const xml = serializeXml(root, { pretty: options.pretty, indent: options.indent });
  const path = join(outputDir, `${batchId}.xml`);
  await mkdir(outputDir, { recursive: true });
  await writeFile(path, xml, "utf-8");
  (options.logger ?? baseLogger).info({ batchId, path }, "Wrote deposit");
  return { batchId, path };
}
