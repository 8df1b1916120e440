// src/types.ts — ALL shared types for the network diagram exporter

export const ENGINE_VERSION = "0.1.0";

// ─── Model contract ──────────────────────────────────────────────────────────

/** Stable router index. Used as the TikZ node name `r<id>`. */
export type RouterId = number;

export interface Position {
  x: number;
  y: number;
}

/** One entry of the topology's native edge enumeration. */
export interface TopologyEdge {
  a: RouterId;
  b: RouterId;
  weight: number;
}

export type SessionKind = "ebgp" | "ibgp-peer" | "ibgp-client";

export interface BgpSessionEntry {
  source: RouterId;
  destination: RouterId;
  kind: SessionKind;
}

export interface PropagationEntry {
  source: RouterId;
  destination: RouterId;
  detail?: unknown; // not rendered
}

/**
 * Read-only view of an already-computed network snapshot.
 * The exporter only calls these queries; it never mutates or retains the model.
 */
export interface NetworkModel<P = string> {
  internalRouters(): readonly RouterId[];
  externalRouters(): readonly RouterId[];
  routerName(router: RouterId): string | undefined;
  routerPosition(router: RouterId): Position | undefined;
  edges(): Iterable<TopologyEdge>;
  knownPrefixes(): readonly P[];
  prefixString(prefix: P): string;
  nextHops(prefix: P, router: RouterId): readonly RouterId[];
  bgpSessions(): readonly BgpSessionEntry[];
  propagations(prefix: P): readonly PropagationEntry[];
}

/** A known prefix with its canonical string and toggle macro name, resolved once per export. */
export interface ResolvedPrefix<P> {
  prefix: P;
  text: string;
  toggle: string;
}

// ─── Output ──────────────────────────────────────────────────────────────────

export const PLACEHOLDER_NAMES = [
  "PREFIXES",
  "INTERNAL_NODES",
  "EXTERNAL_NODES",
  "EDGES",
  "NEXT_HOPS",
  "LINK_WEIGHTS",
  "BGP_SESSIONS",
  "BGP_PROPAGATIONS",
] as const;

export type PlaceholderName = (typeof PLACEHOLDER_NAMES)[number];

export type DocumentSections = Record<PlaceholderName, string>;

// ─── Options ─────────────────────────────────────────────────────────────────

export type CollisionPolicy = "warn" | "error";

export interface ExportOptions {
  verbose: boolean;
  prefixCollisions: CollisionPolicy;
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class ExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExportError";
  }
}

export class TemplateError extends ExportError {
  constructor(
    message: string,
    public readonly placeholder: string,
  ) {
    super(message);
    this.name = "TemplateError";
  }
}

export class PrefixCollisionError extends ExportError {
  constructor(
    message: string,
    public readonly collisions: PrefixCollision[],
  ) {
    super(message);
    this.name = "PrefixCollisionError";
  }
}

export class SnapshotError extends ExportError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "SnapshotError";
  }
}

export interface PrefixCollision {
  identifier: string;
  prefixes: string[];
}
