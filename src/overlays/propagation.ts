// src/overlays/propagation.ts — BGP route propagation per prefix

import { resolvePrefixes } from "../prefix-identifier.js";
import type { NetworkModel, ResolvedPrefix } from "../types.js";
import { formatPrefixBlocks } from "./prefix-block.js";

export function formatPropagations<P>(
  model: NetworkModel<P>,
  prefixes: readonly ResolvedPrefix<P>[] = resolvePrefixes(model),
): string {
  return formatPrefixBlocks(prefixes, (prefix) =>
    model
      .propagations(prefix)
      .map(({ source, destination }) =>
        `      \\draw[bgp propagation] (r${source}) to[bend left=20] (r${destination});`,
      ),
  );
}
