/**
 * Entry-point detection for the CLIs.
 */

import { existsSync, realpathSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * True when `scriptPath` (usually `process.argv[1]`) is the module at
 * `moduleUrl`. Symlinks such as `node_modules/.bin` shims are resolved
 * first.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined) return false;
  const script = resolve(scriptPath);
  if (!existsSync(script)) return false;
  return realpathSync(script) === realpathSync(fileURLToPath(moduleUrl));
}
