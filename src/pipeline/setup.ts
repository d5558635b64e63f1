/**
 * Setup stage: run metadata derived from the topic. Local, no provider
 * call.
 */

import { ConfigError } from "../config/env.js";
import { ZERO_USAGE, type RunSetup, type StageResult } from "../types/index.js";

const SLUG_MAX = 50;
const PREFIX_MAX = 15;
const FALLBACK_SLUG = "article";

/**
 * URL-safe slug: lowercase, punctuation dropped, whitespace and hyphen
 * runs collapsed to one hyphen, at most 50 characters.
 */
export function slugify(topic: string): string {
  const slug = topic
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, "")
    .trim()
    .replace(/[\s-]+/g, "-")
    .slice(0, SLUG_MAX)
    .replace(/^-+|-+$/g, "");
  return slug === "" ? FALLBACK_SLUG : slug;
}

/** Artifact filename prefix: the slug cut to 15 characters. */
export function filePrefix(slug: string): string {
  return slug.slice(0, PREFIX_MAX).replace(/-+$/, "");
}

export function deriveSetup(topic: string, createdAt: Date): RunSetup {
  const trimmed = topic.trim();
  if (trimmed === "") {
    throw new ConfigError("Topic must not be empty");
  }

  const slug = slugify(trimmed);
  const date = createdAt.toISOString().slice(0, 10);

  return Object.freeze({
    topic: trimmed,
    slug,
    prefix: filePrefix(slug),
    date,
    folder: `${date}-${slug}`,
  });
}

/**
 * The history entry recorded for the setup stage.
 */
export function setupResult(setup: RunSetup): StageResult {
  return Object.freeze({
    success: true,
    stageName: "setup",
    output: JSON.stringify(setup),
    usage: ZERO_USAGE,
    durationMs: 0,
    sources: Object.freeze([]),
  });
}
