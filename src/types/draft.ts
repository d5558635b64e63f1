/**
 * The evolving candidate article.
 */

import type { DataClass } from "../config/pipeline/index.js";

export interface Citation {
  /** Link text, e.g. "Preqin, Q2 2025" */
  readonly label: string;
  readonly url: string;
  /** Lowercased host without a leading "www." */
  readonly domain: string;
  /** ISO date (YYYY-MM-DD) parsed from the label, if any */
  readonly date?: string;
  /** Data class inferred from the citing sentence, if any */
  readonly dataClass?: DataClass;
  /** The sentence the citation appears in */
  readonly sentence: string;
}

export interface Section {
  /** Markdown heading level (2-6; the level-1 heading is the title) */
  readonly level: number;
  readonly title: string;
}

export interface Draft {
  /** Markdown body with any front matter removed */
  readonly body: string;
  /** The text exactly as the writer or revision stage returned it */
  readonly raw: string;
  /** First level-1 heading, if present */
  readonly title?: string;
  readonly citations: readonly Citation[];
  readonly wordCount: number;
  readonly sections: readonly Section[];
}
