/**
 * Editorial standards schema definitions.
 *
 * Editorial standards are DECLARATIVE CONSTRAINTS on every generated article:
 * who it is written for, the voice it uses, phrases it must never contain,
 * the disclaimer it carries and the SEO lengths its metadata must respect.
 *
 * They are loaded from a JSON file so the editorial team can change them
 * without code changes. Prompt templates receive them as `standards.*` and
 * `seo.*` variables; the validation gate turns the forbidden phrases into a
 * warning-level rule.
 */

import { z } from "zod";

/**
 * Tone descriptor for content voice.
 */
export const ToneDescriptor = z.enum([
  "authoritative",
  "data-driven",
  "educational",
  "professional",
  "clear",
  "conversational",
  "promotional",
  "sensational",
]);
export type ToneDescriptor = z.infer<typeof ToneDescriptor>;

export const ToneRulesSchema = z
  .object({
    /** Tone qualities the content must embody */
    primary: z.array(ToneDescriptor).min(1),
    /** Tone qualities the content must avoid */
    avoid: z.array(ToneDescriptor).default([]),
    /** Narrative perspective */
    perspective: z.enum(["first_person_plural", "second_person", "third_person"]),
  })
  .strict();

export type ToneRules = z.infer<typeof ToneRulesSchema>;

export const SeoLimitsSchema = z
  .object({
    /** Maximum meta title length in characters */
    titleMaxLength: z.number().int().min(10).max(120),
    /** Meta description length range in characters */
    descriptionMinLength: z.number().int().min(50),
    descriptionMaxLength: z.number().int().max(320),
    /** Maximum number of keywords in the metadata */
    maxKeywords: z.number().int().min(1).max(30),
  })
  .strict();

export type SeoLimits = z.infer<typeof SeoLimitsSchema>;

/**
 * Source credibility scoring. Each cited URL's domain is scored 0-10 from
 * `domainScores` (a key also covers its subdomains); unlisted domains get
 * `defaultScore`.
 */
export const SourceCredibilitySchema = z
  .object({
    domainScores: z.record(z.string().min(1), z.number().min(0).max(10)),
    defaultScore: z.number().min(0).max(10).default(5),
    /** Warn when the mean score of cited sources is below this */
    minAverage: z.number().min(0).max(10).default(6),
    /** Sources scoring at or below this count as low credibility */
    lowScore: z.number().min(0).max(10).default(4),
    /** Warn when the share of low-credibility sources exceeds this */
    maxLowShare: z.number().min(0).max(1).default(0.2),
  })
  .strict();

export type SourceCredibility = z.infer<typeof SourceCredibilitySchema>;

export const EditorialStandardsSchema = z
  .object({
    /** Human-readable name of this standards set */
    name: z.string().min(1),

    /** Reader profile the article is written for */
    audience: z.string().min(1),

    tone: ToneRulesSchema,

    /** Exact phrases that must not appear (case-insensitive) */
    forbiddenPhrases: z.array(z.string().min(1)).default([]),

    /** Domains that count as first-party sources */
    preferredDomains: z.array(z.string().min(1)).default([]),

    /** Source credibility scoring; no scoring when absent */
    sourceCredibility: SourceCredibilitySchema.optional(),

    /** Unattributed appeals to authority, e.g. "studies show" */
    vagueReferences: z.array(z.string().min(1)).default([]),

    /** Disclaimer appended to every article */
    disclaimer: z.string().min(1),

    seo: SeoLimitsSchema,

    /** Distribution channels the social stage writes for */
    socialChannels: z.array(z.enum(["linkedin", "twitter", "email"])).min(1),
  })
  .strict();

export type EditorialStandards = z.infer<typeof EditorialStandardsSchema>;
