// src/overlays/link-weight.ts — Link weight labels

import type { NetworkModel } from "../types.js";

/**
 * One label per stored edge entry, placed at `\linkweightdist` along the segment.
 * Not deduplicated: a link stored in both directions gets a label near each end.
 */
export function formatLinkWeights<P>(model: NetworkModel<P>): string {
  const lines: string[] = [];
  for (const { a, b, weight } of model.edges()) {
    lines.push(
      `    \\draw ($(r${a})!\\linkweightdist!(r${b})$) node[link weight] { ${formatWeight(weight)} };`,
    );
  }
  return lines.join("\n");
}

/**
 * Weight rounded to an integer, ties to even: `100` → "100", `2.5` → "2", `3.5` → "4".
 * Large values print every digit; infinite weights print `inf`/`-inf`.
 */
export function formatWeight(weight: number): string {
  if (Number.isNaN(weight)) return "NaN";
  if (weight === Infinity) return "inf";
  if (weight === -Infinity) return "-inf";
  return BigInt(roundHalfEven(weight)).toString();
}

function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  // exact for doubles: below 2^52 the fraction is representable, above it every value is an integer
  const fraction = value - floor;
  if (fraction < 0.5) return floor;
  if (fraction > 0.5) return floor + 1;
  return floor % 2 === 0 ? floor : floor + 1;
}
