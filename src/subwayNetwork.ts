import { UnknownStopError } from "./errors.js";
import { buildLineCatalog, type LineCatalog } from "./lineCatalog.js";
import { buildNetworkGraph, type GraphOptions, type NetworkGraph } from "./networkGraph.js";
import type { SubwayLineRecord } from "./types.js";

/**
 * Everything one run knows about the subway, built once from a single fetch
 * and passed to every query. Nothing here is mutated after construction.
 */
export type SubwayNetwork = {
    catalog: LineCatalog;
    graph: NetworkGraph;
    stopIdsByName: ReadonlyMap<string, string>;
    stopIdsByNormalizedName: ReadonlyMap<string, string>;
};

export function normalizeName(name: string): string {
    return name.trim().replace(/\s+/g, " ").toLowerCase();
}

export function buildSubwayNetwork(records: readonly SubwayLineRecord[], options: GraphOptions = {}): SubwayNetwork {
    const catalog = buildLineCatalog(records);
    const graph = buildNetworkGraph(catalog, options);

    // first stop in catalog order wins a shared name
    const stopIdsByName = new Map<string, string>();
    const stopIdsByNormalizedName = new Map<string, string>();
    for (const stop of catalog.stops.values()) {
        if (!stopIdsByName.has(stop.name)) stopIdsByName.set(stop.name, stop.id);
        const key = normalizeName(stop.name);
        if (!stopIdsByNormalizedName.has(key)) stopIdsByNormalizedName.set(key, stop.id);
    }

    return { catalog, graph, stopIdsByName, stopIdsByNormalizedName };
}

export function resolveStop(network: SubwayNetwork, name: string): string {
    const id = network.stopIdsByName.get(name) ?? network.stopIdsByNormalizedName.get(normalizeName(name));
    if (id === undefined) throw new UnknownStopError(name);
    return id;
}

export function stopName(network: SubwayNetwork, stopId: string): string {
    return network.catalog.stops.get(stopId)?.name ?? stopId;
}

export function lineName(network: SubwayNetwork, lineId: string): string {
    return network.catalog.lines.find(l => l.id === lineId)?.name ?? lineId;
}
