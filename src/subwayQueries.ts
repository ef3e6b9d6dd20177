import { NoRouteFoundError } from "./errors.js";
import { maxStopsLines, minStopsLines, transferStops as transferStopIds } from "./lineCatalog.js";
import { findRoute as searchRoute } from "./routeFinder.js";
import { lineName, resolveStop, stopName, type SubwayNetwork } from "./subwayNetwork.js";
import type { Line, Route } from "./types.js";

export type LineSummary = {
    id: string;
    name: string;
};

export type StopExtremes = {
    maxLines: readonly Line[];
    maxCount: number;
    minLines: readonly Line[];
    minCount: number;
};

export type RouteLeg = {
    from: string;
    to: string;
    line: string;
};

export function listSubwayLines(network: SubwayNetwork): LineSummary[] {
    return network.catalog.lines.map(l => ({ id: l.id, name: l.name }));
}

export function stopExtremes(network: SubwayNetwork): StopExtremes {
    const max = maxStopsLines(network.catalog);
    const min = minStopsLines(network.catalog);
    return { maxLines: max.lines, maxCount: max.count, minLines: min.lines, minCount: min.count };
}

// Stop name -> line names, keyed in name order.
export function transferStops(network: SubwayNetwork): Map<string, Set<string>> {
    const byName = new Map<string, Set<string>>();
    for (const [stopId, lineIds] of transferStopIds(network.catalog)) {
        const name = stopName(network, stopId);
        const names = byName.get(name) ?? new Set<string>();
        for (const id of lineIds) names.add(lineName(network, id));
        byName.set(name, names);
    }
    return new Map([...byName].sort(([a], [b]) => a.localeCompare(b)));
}

export function stopExtremesAndTransfers(network: SubwayNetwork) {
    return { extremes: stopExtremes(network), transfers: transferStops(network) };
}

export function findRoute(network: SubwayNetwork, startName: string, endName: string): Route {
    const from = resolveStop(network, startName);
    const to = resolveStop(network, endName);
    try {
        return searchRoute(network.graph, from, to);
    } catch (err) {
        // report the names the caller asked for, not stop ids
        if (err instanceof NoRouteFoundError) throw new NoRouteFoundError(startName, endName);
        throw err;
    }
}

export function listStopNames(network: SubwayNetwork): string[] {
    const names = new Set([...network.catalog.stops.values()].map(s => s.name));
    return [...names].sort((a, b) => a.localeCompare(b));
}

export function describeRoute(network: SubwayNetwork, route: Route): RouteLeg[] {
    const legs: RouteLeg[] = [];
    let from = route.from;
    for (const hop of route.hops) {
        legs.push({ from: stopName(network, from), to: stopName(network, hop.stopId), line: lineName(network, hop.lineId) });
        from = hop.stopId;
    }
    return legs;
}
