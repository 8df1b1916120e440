// src/overlays/prefix-block.ts — Per-prefix conditional block shared by the next-hop and propagation overlays

import type { ResolvedPrefix } from "../types.js";

/**
 * Build one `\ifdefined\prefix<id> … \fi` block per prefix, in order,
 * and join them. A prefix with no lines still gets its (empty) block.
 */
export function formatPrefixBlocks<P>(
  prefixes: readonly ResolvedPrefix<P>[],
  linesFor: (prefix: P) => string[],
): string {
  return prefixes
    .map(({ prefix, toggle }) => `    \\ifdefined\\${toggle}\n${linesFor(prefix).join("\n")}\n  \\fi`)
    .join("\n");
}
