export type Stop = {
    id: string;             // MBTA stop id, e.g. "place-pktrm"
    name: string;
};

export type Line = {
    id: string;             // route id, e.g. "Red", "Green-B"
    name: string;           // long name, e.g. "Red Line"
    stopIds: readonly string[]; // ordered as the source lists them, no duplicates
};

// What the data collaborator hands the core: one record per subway route,
// stops embedded.
export type SubwayLineRecord = {
    id: string;
    name: string;
    stops: Stop[];
};

export type Hop = {
    stopId: string;         // stop arrived at
    lineId: string;         // line ridden to get there
};

export type Route = {
    from: string;
    to: string;
    hops: readonly Hop[];
};

export type LineExtreme = {
    lines: readonly Line[];
    count: number;
};
