/**
 * Prompt template loader.
 *
 * Loads prompt templates from disk (.md or .txt files), parses and validates
 * them, and exposes them for rendering.
 *
 * USAGE:
 *
 *   const loader = new PromptTemplateLoader(DEFAULT_PROMPTS_DIR);
 *
 *   // Load a single template
 *   const tmpl = loader.load("writer.md");
 *
 *   // Load all templates in the directory (fails on the first invalid one)
 *   const all = loader.loadAll();
 *
 * Templates are loaded and parsed once, then cached in memory. Concurrent
 * runs can share one loader: only the context changes per stage call.
 */

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, extname, basename, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { parseTemplate, type ParsedTemplate } from "./template.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load template: ${filePath}`);
    this.name = "TemplateLoadError";
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** File extensions recognized as prompt templates. */
const TEMPLATE_EXTENSIONS = new Set([".md", ".txt"]);

/** The prompts/ directory shipped at the repository root. */
export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL("../../prompts", import.meta.url));

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export class PromptTemplateLoader {
  private readonly baseDir: string;
  private readonly cache = new Map<string, ParsedTemplate>();

  /**
   * @param baseDir - Directory containing prompt template files
   */
  constructor(baseDir: string = DEFAULT_PROMPTS_DIR) {
    this.baseDir = resolve(baseDir);

    if (!existsSync(this.baseDir)) {
      throw new TemplateLoadError(
        this.baseDir,
        `Template directory does not exist: ${this.baseDir}`
      );
    }
  }

  /** Resolved template directory. */
  get directory(): string {
    return this.baseDir;
  }

  /**
   * Load and parse a single template file. Results are cached.
   *
   * @param filename - Filename relative to baseDir (e.g. "writer.md")
   * @throws TemplateLoadError   if file is missing or unreadable
   * @throws TemplateParseError  if template contains invalid variables
   */
  load(filename: string): ParsedTemplate {
    const cached = this.cache.get(filename);
    if (cached) return cached;

    const filePath = join(this.baseDir, filename);

    if (!existsSync(filePath)) {
      throw new TemplateLoadError(
        filePath,
        `Template file not found: ${filePath}`
      );
    }

    const ext = extname(filename).toLowerCase();
    if (!TEMPLATE_EXTENSIONS.has(ext)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${ext}". Use: ${[...TEMPLATE_EXTENSIONS].join(", ")}`
      );
    }

    const source = readFileSync(filePath, "utf-8");
    const parsed = parseTemplate(source, basename(filename, ext));

    this.cache.set(filename, parsed);
    return parsed;
  }

  /**
   * Load all template files in the base directory.
   * Non-template files are skipped; subdirectories are not traversed.
   */
  loadAll(): Map<string, ParsedTemplate> {
    const result = new Map<string, ParsedTemplate>();

    for (const entry of PromptTemplateLoader.listTemplates(this.baseDir)) {
      result.set(entry, this.load(entry));
    }

    return result;
  }

  /**
   * Clear the internal template cache.
   * Useful if template files have been modified on disk.
   */
  clearCache(): void {
    this.cache.clear();
  }

  /**
   * List template filenames in a directory without loading them.
   */
  static listTemplates(dir: string): string[] {
    const resolved = resolve(dir);
    if (!existsSync(resolved)) return [];

    return readdirSync(resolved)
      .filter((entry) => {
        const full = join(resolved, entry);
        if (!statSync(full).isFile()) return false;
        return TEMPLATE_EXTENSIONS.has(extname(entry).toLowerCase());
      })
      .sort();
  }
}
