import type { MbtaApi } from "./mbtaClient.js";
import type { GraphOptions } from "./networkGraph.js";
import { buildSubwayNetwork, type SubwayNetwork } from "./subwayNetwork.js";
import type { SubwayLineRecord } from "./types.js";

// 0 = light rail (Green Line branches, Mattapan), 1 = heavy rail (Red, Orange, Blue)
export const SUBWAY_ROUTE_TYPES = [0, 1];

export type FetchOptions = {
    requestDelayMs?: number;
};

const sleep = (ms: number) => new Promise(res => setTimeout(res, ms));

export async function fetchSubwayLines(api: MbtaApi, options: FetchOptions = {}): Promise<SubwayLineRecord[]> {
    const delay = options.requestDelayMs ?? 0;

    // filter by type server-side, every question only needs subway routes
    const routes = await api.getRoutes(SUBWAY_ROUTE_TYPES);
    console.log(`Fetched ${routes.length} subway routes`);

    const lines: SubwayLineRecord[] = [];
    for (const route of routes) {
        if (delay > 0) await sleep(delay);
        const stops = await api.getStops([route.id]);
        lines.push({
            id: route.id,
            name: route.attributes.long_name || route.attributes.short_name || route.id,
            stops: stops.map(s => ({ id: s.id, name: s.attributes.name })),
        });
    }

    const total = lines.reduce((n, l) => n + l.stops.length, 0);
    console.log(`Fetched ${total} route stops across ${lines.length} lines`);
    return lines;
}

export async function loadSubwayNetwork(api: MbtaApi, options: FetchOptions & GraphOptions = {}): Promise<SubwayNetwork> {
    const lines = await fetchSubwayLines(api, options);
    return buildSubwayNetwork(lines, { topology: options.topology });
}
