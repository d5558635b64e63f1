/**
 * Shared type foundations for the article pipeline.
 */

export * from "./stage.js";
export * from "./draft.js";
export * from "./verdict.js";
export * from "./run.js";
