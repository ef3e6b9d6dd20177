import { EmptyDatasetError } from "./errors.js";
import type { Line, LineExtreme, Stop, SubwayLineRecord } from "./types.js";

export type LineCatalog = {
    lines: readonly Line[];
    stops: ReadonlyMap<string, Stop>;
    // stop id -> ids of every line serving it
    membership: ReadonlyMap<string, ReadonlySet<string>>;
};

/**
 * Groups stops under their lines and inverts that into the membership index.
 * A stop listed twice on the same line counts once, and records sharing a
 * line id are folded into one line (first record's name, unseen stops
 * appended in order).
 */
export function buildLineCatalog(records: readonly SubwayLineRecord[]): LineCatalog {
    if (!records.length) throw new EmptyDatasetError();

    const byId = new Map<string, { name: string; stopIds: string[]; seen: Set<string> }>();
    const stops = new Map<string, Stop>();
    const membership = new Map<string, Set<string>>();

    for (const r of records) {
        let acc = byId.get(r.id);
        if (!acc) {
            acc = { name: r.name, stopIds: [], seen: new Set() };
            byId.set(r.id, acc);
        }
        for (const s of r.stops) {
            if (acc.seen.has(s.id)) continue;
            acc.seen.add(s.id);
            acc.stopIds.push(s.id);

            if (!stops.has(s.id)) stops.set(s.id, { id: s.id, name: s.name });
            let at = membership.get(s.id);
            if (!at) {
                at = new Set();
                membership.set(s.id, at);
            }
            at.add(r.id);
        }
    }

    const lines: Line[] = Array.from(byId, ([id, l]) => ({ id, name: l.name, stopIds: l.stopIds }));
    return { lines, stops, membership };
}

export function stopCount(line: Line): number {
    return line.stopIds.length;
}

function extreme(catalog: LineCatalog, pick: (a: number, b: number) => number): LineExtreme {
    // a hand-built catalog can skip buildLineCatalog's check
    if (!catalog.lines.length) throw new EmptyDatasetError();
    const count = catalog.lines.map(stopCount).reduce((a, b) => pick(a, b));
    // every line at the extreme, not just the first
    return { lines: catalog.lines.filter(l => stopCount(l) === count), count };
}

export function maxStopsLines(catalog: LineCatalog): LineExtreme {
    return extreme(catalog, Math.max);
}

export function minStopsLines(catalog: LineCatalog): LineExtreme {
    return extreme(catalog, Math.min);
}

export function transferStops(catalog: LineCatalog): Map<string, Set<string>> {
    const out = new Map<string, Set<string>>();
    for (const [stopId, lineIds] of catalog.membership) {
        if (lineIds.size >= 2) out.set(stopId, new Set(lineIds));
    }
    return out;
}
