/**
 * Default funding (`fr:program`) builder.
 */

import { createElement, subElement } from "../xml/tree.js";
import type { SubtreeBuilder } from "./contributors.js";

/** One fundgroup per award that names its funder. */
export const buildFunding: SubtreeBuilder = (article) => {
  const awards = article.fundingAwards.filter((award) => award.institutionName);
  if (awards.length === 0) return undefined;

  const program = createElement("fr:program", { name: "fundref" });
  for (const award of awards) {
    const fundGroup = subElement(program, "fr:assertion", { name: "fundgroup" });
    const funderName = subElement(fundGroup, "fr:assertion", { name: "funder_name" }, award.institutionName);
    if (award.institutionId) {
      subElement(funderName, "fr:assertion", { name: "funder_identifier" }, award.institutionId);
    }
    for (const awardId of award.awardIds) {
      if (awardId) subElement(fundGroup, "fr:assertion", { name: "award_number" }, awardId);
    }
  }
  return program;
};
