/**
 * Draft parsing.
 *
 * Turns the writer or revision stage's text into a Draft: body without
 * front matter or an enclosing code fence, headings, citations and a
 * word count.
 */

import type { Draft, Section } from "../types/index.js";
import { extractCitations } from "./citations.js";

const FRONT_MATTER_RE = /^---[ \t]*\r?\n[\s\S]*?\r?\n---[ \t]*(?:\r?\n|$)/;
const FENCE_RE = /^```(?:markdown|md)?[ \t]*\r?\n([\s\S]*?)\r?\n```\s*$/;
const HEADING_RE = /^(#{1,6})[ \t]+(.+?)[ \t]*#*[ \t]*$/;
const IMAGE_RE = /!\[[^\]]*\]\([^)]*\)/g;
const LINK_RE = /\[([^\]]*)\]\([^)]*\)/g;
const WORD_RE = /[\p{L}\p{N}]/u;

/**
 * Remove an enclosing ```markdown fence and a leading front matter block.
 */
export function stripWrapper(raw: string): string {
  let text = raw.trim();
  const fence = FENCE_RE.exec(text);
  if (fence) text = fence[1].trim();
  return text.replace(FRONT_MATTER_RE, "").trim();
}

function cleanHeading(title: string): string {
  return title.replace(/[*_`]/g, "").trim();
}

/**
 * Headings of the body, in document order. Lines inside fenced code
 * blocks are not headings.
 */
export function extractHeadings(body: string): Section[] {
  const headings: Section[] = [];
  let inFence = false;

  for (const line of body.split(/\r?\n/)) {
    if (line.trim().startsWith("```")) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const match = HEADING_RE.exec(line);
    if (!match) continue;
    const title = cleanHeading(match[2]);
    if (title !== "") headings.push({ level: match[1].length, title });
  }
  return headings;
}

/**
 * Count words: whitespace-separated tokens with at least one letter or
 * digit, after links are replaced by their text and images dropped.
 */
export function countWords(body: string): number {
  const text = body.replace(IMAGE_RE, " ").replace(LINK_RE, "$1");
  let count = 0;
  for (const token of text.split(/\s+/)) {
    if (WORD_RE.test(token)) count++;
  }
  return count;
}

/**
 * Parse stage output into a Draft. The first level-1 heading is the
 * title; level 2 and deeper headings are the sections.
 */
export function parseDraft(raw: string): Draft {
  const body = stripWrapper(raw);
  const headings = extractHeadings(body);
  const title = headings.find((h) => h.level === 1)?.title;

  return Object.freeze({
    body,
    raw,
    ...(title ? { title } : {}),
    citations: Object.freeze(extractCitations(body)),
    wordCount: countWords(body),
    sections: Object.freeze(headings.filter((h) => h.level > 1)),
  });
}
