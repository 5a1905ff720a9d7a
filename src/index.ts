/**
 * # crossref-deposit
 *
 * Assemble Crossref deposit XML (`doi_batch`) from parsed article metadata.
 *
 * ## Workflow
 *
 * 1. **Configure**: Validate deposit settings with {@link parseDepositConfig} or {@link loadDepositConfig}.
 * 2. **Assemble**: Build the document tree for a batch of articles with {@link buildDeposit}.
 * 3. **Output**: Serialize with {@link depositXml}, or write `<batchId>.xml` with {@link writeDeposit}.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { depositXml, parseDepositConfig } from "crossref-deposit";
 *
 * const config = parseDepositConfig({
 *   depositorName: "Example Press",
 *   emailAddress: "deposits@example.org",
 *   registrant: "Example Press",
 *   doiPattern: "https://example.org/articles/{manuscript}",
 *   accessIndicatorsAppliesTo: ["vor", "tdm"],
 * });
 *
 * const xml = depositXml(articles, config, { pretty: true, indent: "  " });
 * ```
 *
 * ## Configuration
 *
 * - **schemaVersion**: Deposit schema version. Default: `"4.4.1"`. Version 4.3.5 omits the
 *   clinical trials and relations namespaces.
 * - **doiPattern**, **componentDoiPattern**, **textMiningPdfPattern**, **textMiningXmlPattern**:
 *   Resource URL templates with `{doi}`, `{manuscript}`, `{volume}`, `{version}` placeholders
 *   (components: `{id}` and `{prefix}` instead of `{version}`).
 * - **jatsAbstract**: Convert abstract markup to JATS tags. Default: `true`.
 * - **faceMarkup**: Keep `<i>`, `<b>`, ... in titles and unstructured citations. Default: `false`.
 *
 * ## Modules
 *
 * - **Assembly**: {@link buildDeposit}, {@link depositXml}, {@link writeDeposit}
 * - **Rich text**: {@link sanitizeMarkup}, {@link parseFragment}, {@link reparse}, {@link reparseInto}
 * - **Citations**: {@link buildCitation}, {@link setCitationList}, {@link unstructuredCitationText}
 * - **Relations**: {@link RelationsProgram}, {@link datasetRelatedItem}, {@link citationRelatedItem}
 * - **Resource URLs**: {@link articleResourceUrl}, {@link componentResourceUrl}, {@link formatTemplate}
 *
 * @module crossref-deposit
 */

// === Assembly ===
export { buildDeposit, createRoot, depositXml, writeDeposit } from "./deposit/assembler.js";
export type {
  BuildDepositOptions,
  Deposit,
  DepositXmlOptions,
  WrittenDeposit,
} from "./deposit/assembler.js";
export { buildContributors } from "./deposit/contributors.js";
export type { SubtreeBuilder } from "./deposit/contributors.js";
export { buildFunding } from "./deposit/funding.js";

// === Rich Text ===
export {
  abstractTag,
  cleanTag,
  inlineTag,
  parseFragment,
  reparse,
  reparseInto,
  sanitizeMarkup,
  titleTag,
} from "./deposit/rich-text.js";
export type { AbstractType, FragmentResult, ReparseOptions } from "./deposit/rich-text.js";

// === Citations & Relations ===
export { buildCitation, setCitationList, unstructuredCitationText } from "./deposit/citation.js";
export type { CitationOptions } from "./deposit/citation.js";
export {
  RelationsProgram,
  citationRelatedItem,
  datasetRelatedItem,
  needsRelationsProgram,
} from "./deposit/relations.js";
export type { RelatedItem } from "./deposit/relations.js";
export { pickFirstIdentifier } from "./deposit/identifiers.js";

// === Resource URLs ===
export {
  articleResourceUrl,
  componentResourceUrl,
  formatTemplate,
} from "./deposit/resource-url.js";
export type { ArticlePatternKind } from "./deposit/resource-url.js";
export { depositMimeType } from "./deposit/mime-type.js";
export { cleanString } from "./deposit/batch.js";

// === Configuration & Errors ===
export { loadDepositConfig, parseDepositConfig, validateDepositConfig } from "./config.js";
export type { DepositConfig, DepositConfigInput, DepositConfigResult } from "./config.js";
export { DepositConfigError, FragmentParseError } from "./errors.js";
export type { ConfigIssue } from "./errors.js";

// === XML ===
export { serializeXml } from "./xml/serialize.js";
export type { SerializeOptions } from "./xml/serialize.js";
export type { XmlElement, XmlNode } from "./xml/tree.js";

// === Types ===
export type {
  Article,
  Component,
  Contributor,
  Dataset,
  FundingAward,
  Reference,
  ReferenceAuthor,
} from "./types.js";
