/**
 * Inline citation extraction.
 *
 * A citation is a markdown link to an http(s) URL: `[Label, June 2025](https://…)`.
 * The label is where the writer is asked to put the source date; the
 * sentence around the link decides whether it supports market or
 * allocation data.
 */

import type { DataClass } from "../config/pipeline/index.js";
import type { Citation } from "../types/index.js";

const LINK_RE = /\[([^\]\n]+)\]\((https?:\/\/[^\s)]+)\)/g;

// ---------------------------------------------------------------------------
// Domains
// ---------------------------------------------------------------------------

/**
 * Host name of a URL, lowercased, without a leading "www.".
 * Returns undefined for strings the URL parser rejects.
 */
export function domainOf(url: string): string | undefined {
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    return undefined;
  }
  const domain = host.toLowerCase().replace(/^www\./, "");
  return domain === "" ? undefined : domain;
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

const ISO_DATE_RE = /\b(\d{4})-(\d{2})-(\d{2})\b/;
const MONTH_DATE_RE =
  /\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?\s+(?:(\d{1,2}),?\s+)?(\d{4})\b/i;
const QUARTER_RE = /\bQ([1-4])\s+(\d{4})\b/i;
const YEAR_RE = /\b(19\d{2}|20\d{2})\b/;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function lastDayOfMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isoDate(year: number, month: number, day: number): string | undefined {
  if (month < 1 || month > 12 || day < 1 || day > lastDayOfMonth(year, month)) {
    return undefined;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Parse the as-of date from a citation label.
 *
 * Periods resolve to their last day: "June 2025" → 2025-06-30,
 * "Q1 2025" → 2025-03-31, "2024" → 2024-12-31.
 */
export function parseLabelDate(label: string): string | undefined {
  const iso = ISO_DATE_RE.exec(label);
  if (iso) return isoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const named = MONTH_DATE_RE.exec(label);
  if (named) {
    const month = MONTHS[named[1].toLowerCase()];
    const year = Number(named[3]);
    if (month === undefined) return undefined;
    const day = named[2] ? Number(named[2]) : lastDayOfMonth(year, month);
    return isoDate(year, month, day);
  }

  const quarter = QUARTER_RE.exec(label);
  if (quarter) {
    const month = Number(quarter[1]) * 3;
    const year = Number(quarter[2]);
    return isoDate(year, month, lastDayOfMonth(year, month));
  }

  const year = YEAR_RE.exec(label);
  if (year) return isoDate(Number(year[1]), 12, 31);

  return undefined;
}

// ---------------------------------------------------------------------------
// Data classes
// ---------------------------------------------------------------------------

const ALLOCATION_RE =
  /\b(allocat\w*|commitments?|asset mix|portfolio weights?|aum|assets under management)\b/i;
const MARKET_RE =
  /\b(yields?|returns?|spreads?|prices?|pricing|index|indices|inflation|interest rates?|default rates?|valuations?|fundraising|inflows?|outflows?|basis points|bps)\b/i;

/**
 * Data class a citing sentence supports, if any. Allocation keywords win
 * over market keywords.
 */
export function classifySentence(sentence: string): DataClass | undefined {
  if (ALLOCATION_RE.test(sentence)) return "allocation_data";
  if (MARKET_RE.test(sentence)) return "market_data";
  return undefined;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

function isTerminator(text: string, i: number): boolean {
  const ch = text[i];
  if (ch !== "." && ch !== "!" && ch !== "?") return false;
  return i + 1 >= text.length || /\s/.test(text[i + 1]);
}

/**
 * The sentence containing text[start, end).
 */
export function sentenceAround(text: string, start: number, end: number): string {
  let from = 0;
  for (let i = start - 1; i >= 0; i--) {
    if (text[i] === "\n" || isTerminator(text, i)) {
      from = i + 1;
      break;
    }
  }

  let to = text.length;
  for (let j = end; j < text.length; j++) {
    if (text[j] === "\n") {
      to = j;
      break;
    }
    if (isTerminator(text, j)) {
      to = j + 1;
      break;
    }
  }

  return text.slice(from, to).replace(/^[\s>*+-]+/, "").trim();
}

/**
 * Extract every inline citation from a markdown body, in document order.
 */
export function extractCitations(body: string): Citation[] {
  const citations: Citation[] = [];

  for (const match of body.matchAll(LINK_RE)) {
    const label = match[1].trim();
    const url = match[2];
    const domain = domainOf(url);
    if (!domain) continue;

    const start = match.index ?? 0;
    const sentence = sentenceAround(body, start, start + match[0].length);
    const date = parseLabelDate(label);
    const dataClass = classifySentence(sentence);

    citations.push({
      label,
      url,
      domain,
      ...(date ? { date } : {}),
      ...(dataClass ? { dataClass } : {}),
      sentence,
    });
  }

  return citations;
}
