/**
 * Component naming convention for styled component resource URLs.
 *
 * The URL prefix is chosen from the component kind (its type, or the letters
 * leading its id), and figure supplement ids such as "fig1s2" are rewritten to
 * "fig1-figsupp2".
 */

import type { Component } from "../types.js";

const PREFIX_BY_KIND: ReadonlyMap<string, string> = new Map([
  ["fig", "figures"],
  ["table-wrap", "figures"],
  ["table", "figures"],
  ["tbl", "figures"],
  ["media", "media"],
  ["video", "media"],
  ["supplementary-material", "supplementary"],
  ["supp", "supplementary"],
  ["data", "supplementary"],
]);

function componentKind(component: Component): string {
  if (component.type) return component.type;
  return /^[a-z-]+/i.exec(component.id)?.[0]?.toLowerCase() ?? "";
}

export interface StyledComponentAttributes {
  id: string;
  prefix: string;
}

/** Id and URL prefix for a component under the styled naming convention. */
export function styledComponentAttributes(component: Component): StyledComponentAttributes {
  const prefix = PREFIX_BY_KIND.get(componentKind(component)) ?? "";
  const id = component.id.replace(/^fig(\d+)s(\d+)$/, "fig$1-figsupp$2");
  return { id, prefix };
}
