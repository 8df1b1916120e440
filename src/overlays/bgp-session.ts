// src/overlays/bgp-session.ts — BGP session connectors

import { ExportError } from "../types.js";
import type { NetworkModel, SessionKind } from "../types.js";

export type SessionStyle = "ebgp session" | "ibgp peer session" | "ibgp client session";

/**
 * TikZ style for a session kind. Exhaustive over SessionKind: adding a kind
 * without a style fails to compile.
 */
export function sessionStyle(kind: SessionKind): SessionStyle {
  switch (kind) {
    case "ebgp":
      return "ebgp session";
    case "ibgp-peer":
      return "ibgp peer session";
    case "ibgp-client":
      return "ibgp client session";
    default: {
      const unreachable: never = kind;
      throw new ExportError(`Unknown BGP session kind: ${String(unreachable)}`);
    }
  }
}

/**
 * One curved connector per session, in model order, endpoints exactly as stored.
 */
export function formatBgpSessions<P>(model: NetworkModel<P>): string {
  return model
    .bgpSessions()
    .map(({ source, destination, kind }) =>
      `    \\draw[${sessionStyle(kind)}] (r${source}) to[bend left=20] (r${destination});`,
    )
    .join("\n");
}
