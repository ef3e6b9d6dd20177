import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";

import { graphEdges } from "./networkGraph.js";
import { lineName, type SubwayNetwork } from "./subwayNetwork.js";

export type NodeRow = {
    id: string;
    name: string;
    lines: string;          // line ids joined with ";"
    lineCount: number;
    stopType: "transfer" | "single";
};

export type EdgeRow = {
    from: string;
    to: string;
    lineId: string;
    lineName: string;
};

export function graphRows(network: SubwayNetwork): { nodes: NodeRow[]; edges: EdgeRow[] } {
    const nodes: NodeRow[] = [];
    for (const stop of network.catalog.stops.values()) {
        const lineIds = Array.from(network.catalog.membership.get(stop.id) ?? []);
        nodes.push({
            id: stop.id,
            name: stop.name,
            lines: lineIds.join(";"),
            lineCount: lineIds.length,
            stopType: lineIds.length > 1 ? "transfer" : "single",
        });
    }

    const edges: EdgeRow[] = graphEdges(network.graph).map(e => ({
        from: e.from,
        to: e.to,
        lineId: e.lineId,
        lineName: lineName(network, e.lineId),
    }));

    return { nodes, edges };
}

/**
 * Dumps the graph as nodes/edges CSV plus a combined JSON file, named after
 * the topology so clique and adjacent dumps can sit side by side.
 */
export function writeGraphFiles(network: SubwayNetwork, outDir: string): string[] {
    fs.mkdirSync(outDir, { recursive: true });
    const { nodes, edges } = graphRows(network);
    const suffix = network.graph.topology;

    const nodesFile = path.join(outDir, `nodes_subway_${suffix}.csv`);
    const edgesFile = path.join(outDir, `edges_subway_${suffix}.csv`);
    const jsonFile = path.join(outDir, `graph_subway_${suffix}.json`);

    fs.writeFileSync(nodesFile, Papa.unparse(nodes));
    fs.writeFileSync(edgesFile, Papa.unparse(edges));
    fs.writeFileSync(jsonFile, JSON.stringify({ topology: suffix, nodes, edges }, null, 2));

    console.log(`Wrote ${nodes.length} nodes and ${edges.length} edges to ${outDir}`);
    return [nodesFile, edgesFile, jsonFile];
}
