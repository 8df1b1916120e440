// src/snapshot-model.ts — NetworkModel over plain, JSON-compatible snapshot data
// Links are exposed in both directions, the way a simulator topology stores them.

import { SnapshotError } from "./types.js";
import type {
  BgpSessionEntry,
  NetworkModel,
  Position,
  PropagationEntry,
  RouterId,
  SessionKind,
  TopologyEdge,
} from "./types.js";

export interface RouterSnapshot {
  id: RouterId;
  name?: string;
  position?: Position;
  external?: boolean;
}

export interface LinkSnapshot {
  a: RouterId;
  b: RouterId;
  weight: number;
  /** Weight of the b→a direction; defaults to `weight`. */
  reverseWeight?: number;
}

export interface NetworkSnapshot {
  routers: RouterSnapshot[];
  links: LinkSnapshot[];
  prefixes: string[];
  /** prefix → router id → next hops */
  nextHops?: Record<string, Record<string, RouterId[]>>;
  sessions?: BgpSessionEntry[];
  /** prefix → propagation entries */
  propagations?: Record<string, PropagationEntry[]>;
}

const SESSION_KINDS: readonly SessionKind[] = ["ebgp", "ibgp-peer", "ibgp-client"];

/**
 * Wrap a snapshot as a read-only NetworkModel keyed by prefix strings.
 * Routers are indexed by id once; every other query reads the snapshot directly.
 */
export function createSnapshotModel(snapshot: NetworkSnapshot): NetworkModel<string> {
  const byId = new Map<RouterId, RouterSnapshot>();
  for (const router of snapshot.routers) {
    byId.set(router.id, router);
  }

  return {
    internalRouters: () => snapshot.routers.filter((r) => !r.external).map((r) => r.id),
    externalRouters: () => snapshot.routers.filter((r) => r.external === true).map((r) => r.id),
    routerName: (router) => byId.get(router)?.name,
    routerPosition: (router) => byId.get(router)?.position,
    edges: () => directedEdges(snapshot.links),
    knownPrefixes: () => snapshot.prefixes,
    prefixString: (prefix) => prefix,
    nextHops: (prefix, router) => {
      const perRouter = ownEntry(snapshot.nextHops, prefix);
      return ownEntry(perRouter, String(router)) ?? [];
    },
    bgpSessions: () => snapshot.sessions ?? [],
    propagations: (prefix) => ownEntry(snapshot.propagations, prefix) ?? [],
  };
}

/** Keyed lookup that ignores inherited members such as `constructor`. */
function ownEntry<T>(record: Record<string, T> | undefined, key: string): T | undefined {
  return record !== undefined && Object.hasOwn(record, key) ? record[key] : undefined;
}

function* directedEdges(links: readonly LinkSnapshot[]): Generator<TopologyEdge> {
  for (const link of links) {
    yield { a: link.a, b: link.b, weight: link.weight };
    yield { a: link.b, b: link.a, weight: link.reverseWeight ?? link.weight };
  }
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Parse and shape-check a JSON snapshot. Throws SnapshotError naming the first bad path.
 * Referential integrity (links to unknown routers etc.) is not checked.
 */
export function parseSnapshot(text: string): NetworkSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new SnapshotError(`Invalid JSON: ${msg}`, "$");
  }

  const root = expectRecord(raw, "$");
  const routers = expectArray(root.routers, "$.routers").map((r, i) =>
    parseRouter(r, `$.routers[${i}]`),
  );

  const seen = new Set<RouterId>();
  routers.forEach((router, i) => {
    if (seen.has(router.id)) {
      throw new SnapshotError(`Duplicate router id ${router.id}`, `$.routers[${i}].id`);
    }
    seen.add(router.id);
  });

  const snapshot: NetworkSnapshot = {
    routers,
    links: expectArray(root.links, "$.links").map((l, i) => parseLink(l, `$.links[${i}]`)),
    prefixes: expectArray(root.prefixes, "$.prefixes").map((p, i) =>
      expectString(p, `$.prefixes[${i}]`),
    ),
  };

  if (root.nextHops !== undefined) {
    snapshot.nextHops = parseNextHops(root.nextHops, "$.nextHops");
  }
  if (root.sessions !== undefined) {
    snapshot.sessions = expectArray(root.sessions, "$.sessions").map((s, i) =>
      parseSession(s, `$.sessions[${i}]`),
    );
  }
  if (root.propagations !== undefined) {
    snapshot.propagations = parsePropagations(root.propagations, "$.propagations");
  }
  return snapshot;
}

function parseRouter(value: unknown, path: string): RouterSnapshot {
  const obj = expectRecord(value, path);
  const router: RouterSnapshot = { id: expectRouterId(obj.id, `${path}.id`) };
  if (obj.name !== undefined) router.name = expectString(obj.name, `${path}.name`);
  if (obj.position !== undefined) {
    const pos = expectRecord(obj.position, `${path}.position`);
    router.position = {
      x: expectNumber(pos.x, `${path}.position.x`),
      y: expectNumber(pos.y, `${path}.position.y`),
    };
  }
  if (obj.external !== undefined) {
    if (typeof obj.external !== "boolean") {
      throw new SnapshotError("Expected a boolean", `${path}.external`);
    }
    router.external = obj.external;
  }
  return router;
}

function parseLink(value: unknown, path: string): LinkSnapshot {
  const obj = expectRecord(value, path);
  const link: LinkSnapshot = {
    a: expectRouterId(obj.a, `${path}.a`),
    b: expectRouterId(obj.b, `${path}.b`),
    weight: expectNumber(obj.weight, `${path}.weight`),
  };
  if (obj.reverseWeight !== undefined) {
    link.reverseWeight = expectNumber(obj.reverseWeight, `${path}.reverseWeight`);
  }
  return link;
}

function parseSession(value: unknown, path: string): BgpSessionEntry {
  const obj = expectRecord(value, path);
  const kind = expectString(obj.kind, `${path}.kind`);
  const known = SESSION_KINDS.find((k) => k === kind);
  if (!known) {
    throw new SnapshotError(
      `Unknown session kind "${kind}" (expected ${SESSION_KINDS.join(", ")})`,
      `${path}.kind`,
    );
  }
  return {
    source: expectRouterId(obj.source, `${path}.source`),
    destination: expectRouterId(obj.destination, `${path}.destination`),
    kind: known,
  };
}

function parseNextHops(
  value: unknown,
  path: string,
): Record<string, Record<string, RouterId[]>> {
  // fromEntries defines own properties: a "__proto__" key is stored as data
  return Object.fromEntries(
    Object.entries(expectRecord(value, path)).map(([prefix, perRouter]): [string, Record<string, RouterId[]>] => {
      const prefixPath = `${path}[${JSON.stringify(prefix)}]`;
      const hops = Object.fromEntries(
        Object.entries(expectRecord(perRouter, prefixPath)).map(([router, list]): [string, RouterId[]] => {
          const routerPath = `${prefixPath}[${JSON.stringify(router)}]`;
          const ids = expectArray(list, routerPath).map((h, i) =>
            expectRouterId(h, `${routerPath}[${i}]`),
          );
          return [router, ids];
        }),
      );
      return [prefix, hops];
    }),
  );
}

function parsePropagations(
  value: unknown,
  path: string,
): Record<string, PropagationEntry[]> {
  return Object.fromEntries(
    Object.entries(expectRecord(value, path)).map(([prefix, list]): [string, PropagationEntry[]] => {
      const prefixPath = `${path}[${JSON.stringify(prefix)}]`;
      const entries = expectArray(list, prefixPath).map((entry, i): PropagationEntry => {
        const obj = expectRecord(entry, `${prefixPath}[${i}]`);
        return {
          source: expectRouterId(obj.source, `${prefixPath}[${i}].source`),
          destination: expectRouterId(obj.destination, `${prefixPath}[${i}].destination`),
          detail: obj.detail,
        };
      });
      return [prefix, entries];
    }),
  );
}

// ─── Guards ──────────────────────────────────────────────────────────────────

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new SnapshotError("Expected an object", path);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new SnapshotError("Expected an array", path);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new SnapshotError("Expected a string", path);
  }
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number") {
    throw new SnapshotError("Expected a number", path);
  }
  return value;
}

function expectRouterId(value: unknown, path: string): RouterId {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new SnapshotError("Expected a nonnegative integer router id", path);
  }
  return value;
}
