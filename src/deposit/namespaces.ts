/**
 * Namespace URIs used in deposit documents.
 */

export const NS_XSI = "http://www.w3.org/2001/XMLSchema-instance";
export const NS_FUNDREF = "http://www.crossref.org/fundref.xsd";
export const NS_ACCESS_INDICATORS = "http://www.crossref.org/AccessIndicators.xsd";
export const NS_CLINICAL_TRIALS = "http://www.crossref.org/clinicaltrials.xsd";
export const NS_RELATIONS = "http://www.crossref.org/relations.xsd";
export const NS_MATHML = "http://www.w3.org/1998/Math/MathML";
export const NS_JATS = "http://www.ncbi.nlm.nih.gov/JATS1";

/** Declarations carried by the temporary root when a fragment is reparsed. */
export const REPARSING_NAMESPACES: Readonly<Record<string, string>> = {
  "xmlns:ai": NS_ACCESS_INDICATORS,
  "xmlns:ct": NS_CLINICAL_TRIALS,
  "xmlns:fr": NS_FUNDREF,
  "xmlns:jats": NS_JATS,
  "xmlns:mml": NS_MATHML,
  "xmlns:rel": NS_RELATIONS,
  "xmlns:xsi": NS_XSI,
};

/** Schema version without the clinical trials and relations namespaces. */
export const OLDEST_SCHEMA_VERSION = "4.3.5";

/** Schema versions without a citation elocation_id element. */
export const LEGACY_ELOCATION_SCHEMA_VERSIONS: readonly string[] = ["4.3.5", "4.3.7", "4.4.0"];
