// src/exporter.ts — Export orchestrator
// Builds all eight sections from one model snapshot, then renders the skeleton once.

import type {
  DocumentSections,
  ExportOptions,
  NetworkModel,
  ResolvedPrefix,
  Warning,
} from "./types.js";
import { PLACEHOLDER_NAMES, PrefixCollisionError } from "./types.js";
import { resolveExportOptions } from "./config.js";
import { findPrefixCollisions, resolvePrefixes } from "./prefix-identifier.js";
import { formatInternalNodes, formatExternalNodes, formatEdges } from "./graph-section.js";
import { formatNextHops } from "./overlays/next-hop.js";
import { formatLinkWeights } from "./overlays/link-weight.js";
import { formatBgpSessions } from "./overlays/bgp-session.js";
import { formatPropagations } from "./overlays/propagation.js";
import { renderTemplate } from "./template-engine.js";

/** Verbose logger — writes to stderr only when verbose is enabled. */
function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

/**
 * Comma-separated toggle macro names, one per known prefix, in model order.
 */
export function formatPrefixChoices<P>(
  model: NetworkModel<P>,
  prefixes: readonly ResolvedPrefix<P>[] = resolvePrefixes(model),
): string {
  return prefixes.map((p) => p.toggle).join(", ");
}

/**
 * Build every document section from the model.
 * The prefix list is read once and shared by every prefix-keyed section.
 * Prefix identifier collisions are reported into `warnings`, or thrown under the "error" policy.
 */
export function buildSections<P>(
  model: NetworkModel<P>,
  options: Partial<ExportOptions> = {},
  warnings: Warning[] = [],
): DocumentSections {
  const config = resolveExportOptions(options);

  const prefixes = resolvePrefixes(model);
  checkPrefixCollisions(prefixes, config, warnings);

  const sections: DocumentSections = {
    PREFIXES: formatPrefixChoices(model, prefixes),
    INTERNAL_NODES: formatInternalNodes(model),
    EXTERNAL_NODES: formatExternalNodes(model),
    EDGES: formatEdges(model),
    NEXT_HOPS: formatNextHops(model, prefixes),
    LINK_WEIGHTS: formatLinkWeights(model),
    BGP_SESSIONS: formatBgpSessions(model),
    BGP_PROPAGATIONS: formatPropagations(model, prefixes),
  };

  if (config.verbose) {
    for (const name of PLACEHOLDER_NAMES) {
      vlog(true, `  ${name}: ${countLines(sections[name])} line(s)`);
    }
  }

  return sections;
}

/**
 * Export the model as a standalone TikZ document.
 * Pure in the model: the same snapshot always yields byte-identical text.
 */
export function exportDocument<P>(
  model: NetworkModel<P>,
  options: Partial<ExportOptions> = {},
  warnings: Warning[] = [],
): string {
  const { verbose } = resolveExportOptions(options);
  const startTime = performance.now();

  const document = renderTemplate(buildSections(model, options, warnings));

  vlog(verbose, `Exported ${document.length} characters in ${Math.round(performance.now() - startTime)}ms`);
  return document;
}

function checkPrefixCollisions<P>(
  prefixes: readonly ResolvedPrefix<P>[],
  config: ExportOptions,
  warnings: Warning[],
): void {
  vlog(config.verbose, `Known prefixes: ${prefixes.length}`);

  const collisions = findPrefixCollisions(prefixes.map((p) => p.text));
  if (collisions.length === 0) return;

  if (config.prefixCollisions === "error") {
    const detail = collisions
      .map((c) => `${c.prefixes.join(", ")} → prefix${c.identifier}`)
      .join("; ");
    throw new PrefixCollisionError(`Prefixes share a toggle identifier: ${detail}`, collisions);
  }

  for (const collision of collisions) {
    warnings.push({
      level: "warn",
      module: "exporter",
      message: `Prefixes ${collision.prefixes.join(", ")} share the toggle prefix${collision.identifier}`,
    });
  }
}

function countLines(text: string): number {
  return text === "" ? 0 : text.split("\n").length;
}
