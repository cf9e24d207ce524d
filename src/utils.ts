/**
 * Shared utility functions.
 *
 * Module-relative file access for ESM, where `__dirname` does not exist.
 * Paths are resolved with `node:path` and `node:url`.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * ESM equivalent of the CommonJS `__dirname` global.
 *
 * ```ts
 * const __dirname = esmDirname(import.meta.url);
 * ```
 */
export function esmDirname(importMetaUrl: string): string {
  return dirname(fileURLToPath(importMetaUrl));
}

/**
 * Read a UTF-8 text file resolved relative to the calling module's directory.
 *
 * @param importMetaUrl — pass `import.meta.url` from the calling module.
 * @param pathSegments  — path segments joined via `resolve`.
 */
export function readRelativeFile(importMetaUrl: string, ...pathSegments: string[]): string {
  return readFileSync(resolve(esmDirname(importMetaUrl), ...pathSegments), "utf-8");
}
