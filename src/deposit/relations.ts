/**
 * Related items (`rel:program`) for datasets and data citations.
 *
 * Each article has at most one `rel:program`. The assembler creates it at its
 * fixed position when any entry will be needed; dataset and citation entries
 * are appended to it later through the same handle.
 */

import { subElement, type XmlElement } from "../xml/tree.js";
import type { Article, Dataset, Reference } from "../types.js";
import { pickFirstIdentifier, type IdentifierCandidate } from "./identifiers.js";

export type IdentifierType = "doi" | "accession" | "pmid" | "uri";
export type RelationshipType = "references" | "isSupplementedBy";

/** One inter-work relation with a single identifier. */
export interface RelatedItem {
  description?: string;
  relationshipType: RelationshipType;
  identifierType: IdentifierType;
  identifier: string;
}

const DATASET_IDENTIFIERS: ReadonlyArray<IdentifierCandidate<Dataset, IdentifierType>> = [
  ["doi", (dataset) => dataset.doi],
  ["accession", (dataset) => dataset.accessionId],
  ["uri", (dataset) => dataset.uri],
];

const REFERENCE_IDENTIFIERS: ReadonlyArray<IdentifierCandidate<Reference, IdentifierType>> = [
  ["doi", (ref) => ref.doi],
  ["accession", (ref) => ref.accession],
  ["pmid", (ref) => ref.pmid],
  ["uri", (ref) => ref.uri],
];

/** Relationship type depending on the dataset type; unspecified means supplementary. */
export function datasetRelationshipType(dataset: Dataset): RelationshipType {
  return dataset.datasetType === "previously-published" ? "references" : "isSupplementedBy";
}

/** Related item for a dataset, if it has at least one identifier. */
export function datasetRelatedItem(dataset: Dataset): RelatedItem | undefined {
  const picked = pickFirstIdentifier(dataset, DATASET_IDENTIFIERS);
  if (!picked) return undefined;
  const item: RelatedItem = {
    relationshipType: datasetRelationshipType(dataset),
    identifierType: picked.type,
    identifier: picked.value,
  };
  if (dataset.title) item.description = dataset.title;
  return item;
}

/** Related item for a data citation, if it has at least one identifier. */
export function citationRelatedItem(ref: Reference): RelatedItem | undefined {
  if (ref.publicationType !== "data") return undefined;
  const picked = pickFirstIdentifier(ref, REFERENCE_IDENTIFIERS);
  if (!picked) return undefined;
  const item: RelatedItem = {
    relationshipType: "references",
    identifierType: picked.type,
    identifier: picked.value,
  };
  if (ref.dataTitle) item.description = ref.dataTitle;
  return item;
}

export function doDatasetRelatedItem(dataset: Dataset): boolean {
  return datasetRelatedItem(dataset) !== undefined;
}

export function doCitationRelatedItem(ref: Reference): boolean {
  return citationRelatedItem(ref) !== undefined;
}

/** Whether any dataset or reference of the article needs a related item. */
export function needsRelationsProgram(article: Article): boolean {
  return article.datasets.some(doDatasetRelatedItem) || article.references.some(doCitationRelatedItem);
}

/** Append a `rel:related_item` to a relations container. */
export function setRelatedItem(container: XmlElement, item: RelatedItem): XmlElement {
  const relatedItem = subElement(container, "rel:related_item");
  if (item.description) subElement(relatedItem, "rel:description", {}, item.description);
  subElement(
    relatedItem,
    "rel:inter_work_relation",
    { "relationship-type": item.relationshipType, "identifier-type": item.identifierType },
    item.identifier
  );
  return relatedItem;
}

/**
 * Per-article handle on the `rel:program` element, created on first use.
 */
export class RelationsProgram {
  private readonly parent: XmlElement;
  private program: XmlElement | undefined;

  constructor(parent: XmlElement) {
    this.parent = parent;
  }

  /** Get the container, appending it to the parent on the first call. */
  ensure(): XmlElement {
    if (!this.program) {
      this.program = subElement(this.parent, "rel:program");
    }
    return this.program;
  }

  addRelatedItem(item: RelatedItem): XmlElement {
    return setRelatedItem(this.ensure(), item);
  }
}

/** Append a related item for each dataset that has an identifier. */
export function setDatasets(program: RelationsProgram, article: Article): void {
  for (const dataset of article.datasets) {
    const item = datasetRelatedItem(dataset);
    if (item) program.addRelatedItem(item);
  }
}
