// src/overlays/next-hop.ts — Forwarding next hops per prefix

import { resolvePrefixes } from "../prefix-identifier.js";
import type { NetworkModel, ResolvedPrefix } from "../types.js";
import { formatPrefixBlocks } from "./prefix-block.js";

/**
 * For every prefix, one directed `next hop` line per (internal router, next hop) pair.
 * Multipath routers yield one line per hop; routers without a next hop yield nothing.
 */
export function formatNextHops<P>(
  model: NetworkModel<P>,
  prefixes: readonly ResolvedPrefix<P>[] = resolvePrefixes(model),
): string {
  return formatPrefixBlocks(prefixes, (prefix) => {
    const lines: string[] = [];
    for (const router of model.internalRouters()) {
      for (const hop of model.nextHops(prefix, router)) {
        lines.push(`      \\draw[next hop] (r${router}) -- (r${hop});`);
      }
    }
    return lines;
  });
}
