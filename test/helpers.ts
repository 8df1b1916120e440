import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { createSnapshotModel, parseSnapshot } from "../src/snapshot-model.js";
import type { NetworkModel } from "../src/types.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));

export function loadFixture(name: string): NetworkModel<string> {
  return createSnapshotModel(parseSnapshot(readFileSync(FIXTURES + name, "utf-8")));
}

/** An empty model; override only the queries a test cares about. */
export function makeModel(overrides: Partial<NetworkModel<string>> = {}): NetworkModel<string> {
  return {
    internalRouters: () => [],
    externalRouters: () => [],
    routerName: () => undefined,
    routerPosition: () => undefined,
    edges: () => [],
    knownPrefixes: () => [],
    prefixString: (prefix) => prefix,
    nextHops: () => [],
    bgpSessions: () => [],
    propagations: () => [],
    ...overrides,
  };
}
