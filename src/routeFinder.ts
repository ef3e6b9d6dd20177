import { NoRouteFoundError, UnknownStopError } from "./errors.js";
import { hasStop, neighbors, type GraphEdge, type NetworkGraph } from "./networkGraph.js";
import type { Hop, Route } from "./types.js";

type Frontier = {
    stopId: string;
    hops: Hop[];
};

// Edges on the line we are already riding go first; the rest keep graph order.
function preferLine(edges: readonly GraphEdge[], currentLine: string | undefined): GraphEdge[] {
    if (currentLine === undefined) return edges.slice();
    return edges.slice().sort((a, b) => Number(a.lineId !== currentLine) - Number(b.lineId !== currentLine));
}

/**
 * Breadth-first search from `from` to `to`, every edge costing one hop.
 *
 * Not a shortest-path search. The only preference is staying on the current
 * line when a stop offers both that and a change; the first path to reach
 * `to` wins. Each stop is expanded once, so the search always terminates.
 */
export function findRoute(graph: NetworkGraph, from: string, to: string): Route {
    if (!hasStop(graph, from)) throw new UnknownStopError(from);
    if (!hasStop(graph, to)) throw new UnknownStopError(to);
    if (from === to) return { from, to, hops: [] };

    const queue: Frontier[] = [{ stopId: from, hops: [] }];
    const visited = new Set<string>();

    for (let head = 0; head < queue.length; head++) {
        const current = queue[head];
        if (current.stopId === to) return { from, to, hops: current.hops };
        if (visited.has(current.stopId)) continue;
        visited.add(current.stopId);

        const last = current.hops[current.hops.length - 1];
        for (const edge of preferLine(neighbors(graph, current.stopId), last?.lineId)) {
            if (visited.has(edge.stopId)) continue;
            queue.push({
                stopId: edge.stopId,
                hops: [...current.hops, { stopId: edge.stopId, lineId: edge.lineId }],
            });
        }
    }

    throw new NoRouteFoundError(from, to);
}
