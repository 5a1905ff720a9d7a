/**
 * Article model type definitions.
 * Describes the parsed article metadata that a deposit document is assembled from.
 * All entities are built upstream and treated as read-only here.
 */

/**
 * Publication type of a bibliographic reference.
 */
export type PublicationType =
  | "journal"
  | "book"
  | "confproc"
  | "patent"
  | "preprint"
  | "report"
  | "software"
  | "thesis"
  | "web"
  | "webpage"
  | "data"
  | "other";

/**
 * An author or editor listed in a reference.
 */
export interface ReferenceAuthor {
  /** Role within the reference: "author", "editor", ... */
  groupType: string;
  surname?: string;
  givenNames?: string;
  /** Group or consortium name, used when there is no surname */
  collab?: string;
}

/**
 * A bibliographic reference from the article's reference list.
 */
export interface Reference {
  /** Stable id from the source document, e.g. "bib12" */
  id?: string;
  publicationType?: PublicationType;
  /** Journal, book or site title */
  source?: string;
  authors: ReferenceAuthor[];
  volume?: string;
  issue?: string;
  fpage?: string;
  elocationId?: string;
  /** Year as written, e.g. "2020a" */
  year?: string;
  yearNumeric?: number;
  articleTitle?: string;
  dataTitle?: string;
  doi?: string;
  isbn?: string;
  accession?: string;
  pmid?: string;
  uri?: string;
  /** Access date annotation for web references */
  dateInCitation?: string;
  publisherLoc?: string;
  publisherName?: string;
  version?: string;
  patent?: string;
  confName?: string;
}

/**
 * A dataset declared by the article.
 */
export interface Dataset {
  title?: string;
  /** Whether the dataset was published before the article or generated for it */
  datasetType?: "previously-published" | "current";
  doi?: string;
  accessionId?: string;
  uri?: string;
}

/**
 * A permissions record attached to a component.
 */
export interface Permission {
  copyrightStatement?: string;
  license?: string;
}

/**
 * A sub-part of an article that can carry its own DOI (figure, table, video, file).
 */
export interface Component {
  id: string;
  /** Component kind from the source document: "fig", "table-wrap", "media", ... */
  type?: string;
  title?: string;
  /** Raw markup */
  subtitle?: string;
  mimeType?: string;
  permissions: Permission[];
  doi?: string;
}

/**
 * An alternate location of the article itself.
 */
export interface SelfUri {
  href: string;
  /** "pdf" for the PDF rendition; unset for the generic landing page */
  contentType?: string;
}

export interface License {
  href?: string;
}

/**
 * An article contributor, consumed by the contributors builder.
 */
export interface Contributor {
  /** "author", "editor", "senior_editor", ... */
  contribType: string;
  surname?: string;
  givenNames?: string;
  suffix?: string;
  collab?: string;
  /** ORCID URL */
  orcid?: string;
  orcidAuthenticated?: boolean;
  affiliations: string[];
}

/**
 * A funding award, consumed by the funding builder.
 */
export interface FundingAward {
  institutionName?: string;
  /** Funder registry identifier, e.g. "10.13039/100000002" */
  institutionId?: string;
  awardIds: string[];
}

/**
 * A parsed article ready to be deposited.
 */
export interface Article {
  doi: string;
  /** Manuscript id, e.g. "00666" */
  manuscript?: string;
  journalTitle: string;
  journalIssn: string;
  volume?: string;
  /** Article version number */
  version?: number;
  elocationId?: string;
  /** Raw markup */
  title: string;
  /** Raw markup, may contain <p> and <sec> tags */
  abstract?: string;
  /** Raw markup of the plain-language summary */
  digest?: string;
  license?: License;
  selfUris: SelfUri[];
  datasets: Dataset[];
  references: Reference[];
  components: Component[];
  contributors: Contributor[];
  fundingAwards: FundingAward[];
  /** Named dates, keyed by date type: "pub", "posted_date", ... */
  dates: Record<string, Date>;
}
