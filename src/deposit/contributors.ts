/**
 * Default `<contributors>` builder.
 *
 * Only contributors whose type is mapped in `contributorRoles` are written,
 * people as `<person_name>` and groups as `<organization>`.
 */

import type { DepositConfig } from "../config.js";
import type { Article, Contributor } from "../types.js";
import { createElement, subElement, type XmlElement } from "../xml/tree.js";
import { cleanTag } from "./rich-text.js";

/** Builds an optional sub-tree of the journal article from the article. */
export type SubtreeBuilder = (article: Article, config: DepositConfig) => XmlElement | undefined;

function setPersonName(
  parent: XmlElement,
  contributor: Contributor,
  surname: string,
  attributes: Record<string, string>
): void {
  const person = subElement(parent, "person_name", attributes);
  if (contributor.givenNames) subElement(person, "given_name", {}, contributor.givenNames);
  subElement(person, "surname", {}, surname);
  if (contributor.suffix) subElement(person, "suffix", {}, contributor.suffix);
  for (const affiliation of contributor.affiliations) {
    if (affiliation) subElement(person, "affiliation", {}, affiliation);
  }
  if (contributor.orcid) {
    subElement(
      person,
      "ORCID",
      { authenticated: contributor.orcidAuthenticated ? "true" : "false" },
      contributor.orcid
    );
  }
}

export const buildContributors: SubtreeBuilder = (article, config) => {
  const roles = new Map(config.contributorRoles.map((mapping) => [mapping.contribType, mapping.role]));
  const listed = article.contributors.filter(
    (contributor) => roles.has(contributor.contribType) && (contributor.surname || contributor.collab)
  );
  if (listed.length === 0) return undefined;

  const contributors = createElement("contributors");
  listed.forEach((contributor, index) => {
    const attributes = {
      contributor_role: roles.get(contributor.contribType) ?? contributor.contribType,
      sequence: index === 0 ? "first" : "additional",
    };
    if (contributor.surname) {
      setPersonName(contributors, contributor, contributor.surname, attributes);
    } else if (contributor.collab) {
      const organization = cleanTag("organization", contributor.collab);
      Object.assign(organization.attributes, attributes);
      contributors.children.push(organization);
    }
  });
  return contributors;
};
