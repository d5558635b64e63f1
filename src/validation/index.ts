/**
 * Draft validation: parsing, rule sets, the gate and fix requests.
 */

export { parseDraft, countWords, extractHeadings, stripWrapper } from "./draft.js";
export {
  extractCitations,
  domainOf,
  parseLabelDate,
  classifySentence,
  sentenceAround,
} from "./citations.js";
export { buildRuleSet, type RuleSet, type DraftRule, type FreshnessRule } from "./rules.js";
export { validate, headingMatches } from "./gate.js";
export { checkFreshness, ageInDays } from "./freshness.js";
export {
  unsourcedStatisticsRule,
  forbiddenPhrasesRule,
  vagueReferencesRule,
  sourceCredibilityRule,
  credibilityOf,
  proseSentences,
} from "./extra-rules.js";
