/**
 * Shared test fixtures: standards, configs and article text of a known
 * shape.
 */

import {
  DEFAULT_PIPELINE_CONFIG,
  LlmStageName,
  loadPipelineConfig,
  type PipelineConfig,
  type RunPolicy,
} from "../config/pipeline/index.js";
import { loadEditorialStandards, type EditorialStandards } from "../standards/index.js";
import { countWords } from "../validation/draft.js";

export function testStandards(
  overrides: Partial<EditorialStandards> = {}
): Readonly<EditorialStandards> {
  return loadEditorialStandards({
    name: "Test standards",
    audience: "institutional allocators",
    tone: { primary: ["educational"], avoid: ["promotional"], perspective: "third_person" },
    forbiddenPhrases: ["guaranteed returns"],
    preferredDomains: ["sec.gov"],
    disclaimer: "Educational content only.",
    seo: {
      titleMaxLength: 60,
      descriptionMinLength: 150,
      descriptionMaxLength: 160,
      maxKeywords: 10,
    },
    socialChannels: ["linkedin"],
    ...overrides,
  });
}

/** The model each stage is given in testConfig(): `fake-<stage>`. */
export function fakeModel(stage: LlmStageName): string {
  return `fake-${stage}`;
}

/**
 * Pipeline config with one model per stage, so fakes can route on the
 * model name, and no freshness rule.
 */
export function testConfig(policy: Partial<RunPolicy> = {}): Readonly<PipelineConfig> {
  const stages = Object.fromEntries(
    LlmStageName.options.map((stage) => [stage, { model: fakeModel(stage), maxOutputTokens: 100 }])
  );

  return loadPipelineConfig({
    ...DEFAULT_PIPELINE_CONFIG,
    policy: {
      ...DEFAULT_PIPELINE_CONFIG.policy,
      requiredSections: ["Key Insights", "Conclusion"],
      forbiddenSections: [],
      freshness: { ...DEFAULT_PIPELINE_CONFIG.policy.freshness, enabled: false },
      ...policy,
    },
    stages,
  });
}

export interface ArticleShape {
  words: number;
  citations: number;
  domains: number;
  sections: readonly string[];
  /** Level-1 title; defaults to "Private credit outlook" */
  title?: string;
}

/**
 * Markdown article with exactly `words` words, `citations` distinct
 * citation URLs spread over `domains` domains, and the given level-2
 * sections. Citation sentences carry no figures or data keywords.
 */
export function articleText(shape: ArticleShape): string {
  const lines: string[] = [`# ${shape.title ?? "Private credit outlook"}`];
  for (const section of shape.sections) lines.push(`## ${section}`);
  for (let i = 0; i < shape.citations; i++) {
    lines.push(`See [ref](https://source${i % shape.domains}.com/report-${i}).`);
  }

  const used = countWords(lines.join("\n\n"));
  if (shape.words < used) {
    throw new Error(`articleText: ${shape.words} words is below the ${used} the skeleton needs`);
  }
  lines.push(Array.from({ length: shape.words - used }, () => "word").join(" "));

  return lines.join("\n\n");
}
