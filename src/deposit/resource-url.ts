/**
 * Resource URL generation from configured templates.
 *
 * Templates use `{name}` placeholders. Each template kind has its own typed
 * substitution record; the configuration schema rejects any other placeholder.
 */

import { getSelfUri, hasLicense } from "../article.js";
import type { DepositConfig } from "../config.js";
import type { Article, Component } from "../types.js";
import { styledComponentAttributes } from "./component-naming.js";

export type ArticlePatternKind = "doi" | "textMiningPdf" | "textMiningXml";

export type ArticleSubstitutions = {
  doi: string;
  manuscript: string | undefined;
  volume: string | undefined;
  version: string | undefined;
};

export type ComponentSubstitutions = {
  doi: string;
  manuscript: string | undefined;
  volume: string | undefined;
  id: string;
  prefix: string;
};

const ARTICLE_PATTERN_KEYS = {
  doi: "doiPattern",
  textMiningPdf: "textMiningPdfPattern",
  textMiningXml: "textMiningXmlPattern",
} as const satisfies Record<ArticlePatternKind, keyof DepositConfig>;

/** Replace `{name}` placeholders; absent values become empty strings. */
export function formatTemplate(
  template: string,
  values: Readonly<Record<string, string | undefined>>
): string {
  return template.replace(/\{(\w*)\}/g, (_match, name: string) => values[name] ?? "");
}

/**
 * Article version label: the version number when known, otherwise the
 * `-vN` suffix of the PDF self URI.
 */
export function articleVersion(article: Article): string | undefined {
  if (article.version !== undefined) return String(article.version);
  const pdf = getSelfUri(article, "pdf");
  const match = pdf ? /-v(\d+)\.pdf$/i.exec(pdf.href) : null;
  return match?.[1];
}

export function articleSubstitutions(article: Article): ArticleSubstitutions {
  return {
    doi: article.doi,
    manuscript: article.manuscript,
    volume: article.volume,
    version: articleVersion(article),
  };
}

/**
 * Resource URL for the article. Without a configured template the generic
 * self URI (the one with no content type) is used.
 */
export function articleResourceUrl(
  article: Article,
  config: DepositConfig,
  kind: ArticlePatternKind = "doi"
): string | undefined {
  const template = config[ARTICLE_PATTERN_KEYS[kind]];
  if (template) return formatTemplate(template, articleSubstitutions(article));
  return article.selfUris.find((uri) => uri.contentType === undefined)?.href;
}

/** Resource URL for a component, or undefined when no component template is configured. */
export function componentResourceUrl(
  component: Component,
  article: Article,
  config: DepositConfig
): string | undefined {
  if (!config.componentDoiPattern) return undefined;
  const { id, prefix } = config.styledComponentDoi
    ? styledComponentAttributes(component)
    : { id: component.id, prefix: "" };
  const values: ComponentSubstitutions = {
    doi: article.doi,
    manuscript: article.manuscript,
    volume: article.volume,
    id,
    prefix,
  };
  return formatTemplate(config.componentDoiPattern, values);
}

/** Text mining PDF resource: needs its template and a PDF self URI. */
export function doTextMiningPdf(article: Article, config: DepositConfig): boolean {
  return config.textMiningPdfPattern !== "" && getSelfUri(article, "pdf") !== undefined;
}

/** Text mining XML resource: needs its template. */
export function doTextMiningXml(config: DepositConfig): boolean {
  return config.textMiningXmlPattern !== "";
}

/** Text and data mining links are only added for licensed articles. */
export function doTextMiningCollection(article: Article, config: DepositConfig): boolean {
  if (!hasLicense(article)) return false;
  return doTextMiningPdf(article, config) || doTextMiningXml(config);
}
