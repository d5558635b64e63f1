/**
 * Editorial standards module.
 *
 * Standards are loaded from configuration files and validated at startup,
 * then passed to each run as immutable constraints:
 *
 * ```typescript
 * const standards = loadEditorialStandardsFromFile("config/editorial-standards.json");
 * const rules = buildRuleSet(config.policy, standards, run.createdAt);
 * ```
 */

export {
  EditorialStandardsSchema,
  ToneRulesSchema,
  SeoLimitsSchema,
  SourceCredibilitySchema,
  ToneDescriptor,
  type EditorialStandards,
  type ToneRules,
  type SeoLimits,
  type SourceCredibility,
} from "./editorial-schema.js";

export {
  loadEditorialStandards,
  loadEditorialStandardsFromFile,
  StandardsValidationError,
  type StandardsIssue,
} from "./loader.js";
