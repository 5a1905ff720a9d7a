/**
 * Batch id, timestamps and volume numbers.
 * All times are formatted in UTC.
 */

import anyAscii from "any-ascii";
import type { Article } from "../types.js";

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Transliterate to ASCII and keep only characters safe in a file name. */
export function cleanString(value: string): string {
  return anyAscii(value).replace(/[^A-Za-z0-9._-]/g, "");
}

/** Format as YYYYMMDDHHMMSS. */
export function formatTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/** Format as YYYY-MM-DD HH:MM:SS. */
export function formatGeneratedAt(date: Date): string {
  const day = `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Batch id: prefix, then the first article's manuscript id (if any) and a dash,
 * then the timestamp.
 */
export function generateBatchId(prefix: string, articles: readonly Article[], date: Date): string {
  const manuscript = articles[0]?.manuscript;
  const manuscriptPart = manuscript ? `${cleanString(manuscript)}-` : "";
  return `${prefix}${manuscriptPart}${formatTimestamp(date)}`;
}

/** Volume number from the publication year, counting the first volume's year as 1. */
export function calculateJournalVolume(pubDate: Date, yearOfFirstVolume: number): string {
  return String(pubDate.getUTCFullYear() - yearOfFirstVolume + 1);
}
