import type { LineCatalog } from "./lineCatalog.js";

// "clique": every pair of stops on a line is joined (one hop rides any distance).
// "adjacent": only consecutive stops in the line's listed order are joined.
export type GraphTopology = "clique" | "adjacent";

export type GraphOptions = {
    topology?: GraphTopology;
};

export type GraphEdge = {
    stopId: string;         // the other endpoint
    lineId: string;
};

export type NetworkGraph = {
    topology: GraphTopology;
    adjacency: ReadonlyMap<string, readonly GraphEdge[]>;
    membership: ReadonlyMap<string, ReadonlySet<string>>;
};

export type UndirectedEdge = {
    from: string;
    to: string;
    lineId: string;
};

const NO_EDGES: readonly GraphEdge[] = [];
const NO_LINES: ReadonlySet<string> = new Set();

function linePairs(stopIds: readonly string[], topology: GraphTopology): [string, string][] {
    const pairs: [string, string][] = [];
    for (let i = 0; i < stopIds.length - 1; i++) {
        if (topology === "adjacent") {
            pairs.push([stopIds[i], stopIds[i + 1]]);
            continue;
        }
        for (let j = i + 1; j < stopIds.length; j++) {
            pairs.push([stopIds[i], stopIds[j]]);
        }
    }
    return pairs;
}

/**
 * Undirected multigraph over stops: one edge per (stop pair, shared line),
 * stored on both endpoints. Stops whose line has no other stop stay in the
 * graph with no edges.
 */
export function buildNetworkGraph(catalog: LineCatalog, options: GraphOptions = {}): NetworkGraph {
    const topology = options.topology ?? "clique";
    const adjacency = new Map<string, GraphEdge[]>();
    for (const stopId of catalog.membership.keys()) adjacency.set(stopId, []);

    const seen = new Set<string>();
    for (const line of catalog.lines) {
        for (const [a, b] of linePairs(line.stopIds, topology)) {
            if (a === b) continue;
            // hand-built catalogs can repeat a line id; don't double its edges
            const key = a < b ? `${a}|${b}|${line.id}` : `${b}|${a}|${line.id}`;
            if (seen.has(key)) continue;
            seen.add(key);

            adjacency.get(a)?.push({ stopId: b, lineId: line.id });
            adjacency.get(b)?.push({ stopId: a, lineId: line.id });
        }
    }

    return { topology, adjacency, membership: catalog.membership };
}

export function hasStop(graph: NetworkGraph, stopId: string): boolean {
    return graph.adjacency.has(stopId);
}

export function neighbors(graph: NetworkGraph, stopId: string): readonly GraphEdge[] {
    return graph.adjacency.get(stopId) ?? NO_EDGES;
}

export function linesAt(graph: NetworkGraph, stopId: string): ReadonlySet<string> {
    return graph.membership.get(stopId) ?? NO_LINES;
}

// Each undirected edge once, oriented from whichever endpoint was indexed first.
export function graphEdges(graph: NetworkGraph): UndirectedEdge[] {
    const out: UndirectedEdge[] = [];
    const emitted = new Set<string>();
    for (const [from, edges] of graph.adjacency) {
        for (const e of edges) {
            const key = from < e.stopId ? `${from}|${e.stopId}|${e.lineId}` : `${e.stopId}|${from}|${e.lineId}`;
            if (emitted.has(key)) continue;
            emitted.add(key);
            out.push({ from, to: e.stopId, lineId: e.lineId });
        }
    }
    return out;
}
