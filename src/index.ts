// src/index.ts — Library API
// One entry point: exportDocument(). The section builders are exported for callers
// that assemble their own skeleton.

export { exportDocument, buildSections, formatPrefixChoices } from "./exporter.js";
export { renderTemplate, listPlaceholders } from "./template-engine.js";
export { TIKZ_STANDALONE_TEMPLATE } from "./templates/tikz-standalone.js";
export { formatInternalNodes, formatExternalNodes, formatEdges } from "./graph-section.js";
export { formatNextHops } from "./overlays/next-hop.js";
export { formatLinkWeights, formatWeight } from "./overlays/link-weight.js";
export { formatBgpSessions, sessionStyle } from "./overlays/bgp-session.js";
export type { SessionStyle } from "./overlays/bgp-session.js";
export { formatPropagations } from "./overlays/propagation.js";
export { sanitizePrefixId, prefixToggleName, findPrefixCollisions, resolvePrefixes } from "./prefix-identifier.js";
export { resolveExportOptions, DEFAULTS } from "./config.js";
export { createSnapshotModel, parseSnapshot } from "./snapshot-model.js";
export type {
  NetworkSnapshot,
  RouterSnapshot,
  LinkSnapshot,
} from "./snapshot-model.js";

// Re-export all public types
export type {
  RouterId,
  Position,
  TopologyEdge,
  SessionKind,
  BgpSessionEntry,
  PropagationEntry,
  NetworkModel,
  PlaceholderName,
  DocumentSections,
  CollisionPolicy,
  ExportOptions,
  Warning,
  PrefixCollision,
  ResolvedPrefix,
} from "./types.js";

export {
  ENGINE_VERSION,
  PLACEHOLDER_NAMES,
  ExportError,
  TemplateError,
  PrefixCollisionError,
  SnapshotError,
} from "./types.js";
