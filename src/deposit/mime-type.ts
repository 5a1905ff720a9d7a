/**
 * Mime type normalization for component `<format>` elements.
 *
 * Only mime types the deposit schema accepts are written. Known aliases
 * (file extensions, legacy names) are mapped; anything else is dropped.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const MimeTypeTableSchema = z.object({
  accepted: z.array(z.string()),
  aliases: z.record(z.string()),
});

const TABLE_URL = new URL("../../data/mime-types.json", import.meta.url);

const table = MimeTypeTableSchema.parse(JSON.parse(readFileSync(TABLE_URL, "utf-8")));
const ACCEPTED: ReadonlySet<string> = new Set(table.accepted);
const ALIASES: ReadonlyMap<string, string> = new Map(Object.entries(table.aliases));

/** Convert a mime type to one the deposit schema accepts, if known. */
export function depositMimeType(mimeType: string | undefined): string | undefined {
  if (!mimeType) return undefined;
  const normalized = mimeType.trim().toLowerCase();
  if (ACCEPTED.has(normalized)) return normalized;
  return ALIASES.get(normalized);
}
