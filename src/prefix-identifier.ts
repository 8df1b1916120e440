// src/prefix-identifier.ts — Prefix → TeX-safe identifier
// The same identifier names the toggle macro and guards every per-prefix block.

import type { NetworkModel, PrefixCollision, ResolvedPrefix } from "./types.js";

const TOGGLE_PREFIX = "prefix";

/**
 * Replace every `.` and `/` with `_`.
 */
export function sanitizePrefixId(prefix: string): string {
  return prefix.replace(/[./]/g, "_");
}

/**
 * Name of the per-prefix toggle macro, e.g. `10.0.0.0/8` → `prefix10_0_0_0_8`.
 */
export function prefixToggleName(prefix: string): string {
  return TOGGLE_PREFIX + sanitizePrefixId(prefix);
}

/**
 * Read the model's prefix list once, with each prefix's string form and toggle name.
 */
export function resolvePrefixes<P>(model: NetworkModel<P>): ResolvedPrefix<P>[] {
  return model.knownPrefixes().map((prefix) => {
    const text = model.prefixString(prefix);
    return { prefix, text, toggle: prefixToggleName(text) };
  });
}

/**
 * Find distinct prefixes that sanitize to the same identifier.
 * Groups are returned in first-seen order; repeated identical strings are not collisions.
 */
export function findPrefixCollisions(prefixes: readonly string[]): PrefixCollision[] {
  const byIdentifier = new Map<string, string[]>();

  for (const prefix of prefixes) {
    const identifier = sanitizePrefixId(prefix);
    const group = byIdentifier.get(identifier);
    if (!group) {
      byIdentifier.set(identifier, [prefix]);
    } else if (!group.includes(prefix)) {
      group.push(prefix);
    }
  }

  const collisions: PrefixCollision[] = [];
  for (const [identifier, group] of byIdentifier) {
    if (group.length > 1) {
      collisions.push({ identifier, prefixes: group });
    }
  }
  return collisions;
}
