// src/graph-section.ts — Base diagram: router nodes and links

import type { NetworkModel, Position, RouterId } from "./types.js";

const ORIGIN: Position = { x: 0, y: 0 };

type NodeStyle = "router" | "external";

/**
 * One positioned `router` node per internal router, in model order.
 */
export function formatInternalNodes<P>(model: NetworkModel<P>): string {
  return formatNodes(model, model.internalRouters(), "router");
}

/**
 * One positioned `external` node per external router, in model order.
 */
export function formatExternalNodes<P>(model: NetworkModel<P>): string {
  return formatNodes(model, model.externalRouters(), "external");
}

/**
 * One `link` line per undirected connection.
 * Keeps only edges with `a < b`, so a topology listing both directions yields each link once.
 */
export function formatEdges<P>(model: NetworkModel<P>): string {
  const lines: string[] = [];
  for (const { a, b } of model.edges()) {
    if (a < b) {
      lines.push(`  \\draw[link] (r${a}) -- (r${b});`);
    }
  }
  return lines.join("\n");
}

function formatNodes<P>(
  model: NetworkModel<P>,
  routers: readonly RouterId[],
  style: NodeStyle,
): string {
  return routers
    .map((router) => {
      const { x, y } = model.routerPosition(router) ?? ORIGIN;
      const name = model.routerName(router) ?? "";
      return `  \\node[${style}] at (${x}, ${y}) (r${router}) {}; % ${name}`;
    })
    .join("\n");
}
