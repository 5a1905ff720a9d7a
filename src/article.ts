/**
 * Read-only lookups on the article model.
 */

import type { Article, SelfUri } from "./types.js";

/** First self URI with the given content type, e.g. "pdf". */
export function getSelfUri(article: Article, contentType: string): SelfUri | undefined {
  return article.selfUris.find((uri) => uri.contentType === contentType);
}

/** Check the article has the minimum requirements of a license: an href. */
export function hasLicense(article: Article): boolean {
  return Boolean(article.license?.href);
}

/** First date present on the article among `dateTypes`, in the given order. */
export function findDate(article: Article, dateTypes: readonly string[]): Date | undefined {
  for (const dateType of dateTypes) {
    if (!Object.hasOwn(article.dates, dateType)) continue;
    const date = article.dates[dateType];
    if (date) return date;
  }
  return undefined;
}
