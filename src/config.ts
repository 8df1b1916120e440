// src/config.ts — Export option resolution
// Library-only: options come from the caller, merged over DEFAULTS.

import type { ExportOptions } from "./types.js";

export const DEFAULTS: ExportOptions = {
  verbose: false,
  prefixCollisions: "warn",
};

/**
 * Merge caller options over the defaults. Undefined values fall back to the default.
 */
export function resolveExportOptions(
  options: Partial<ExportOptions> = {},
): ExportOptions {
  return {
    verbose: options.verbose ?? DEFAULTS.verbose,
    prefixCollisions: options.prefixCollisions ?? DEFAULTS.prefixCollisions,
  };
}
