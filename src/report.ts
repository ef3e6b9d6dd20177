import {
    ConfigError,
    EmptyDatasetError,
    NoRouteFoundError,
    UnknownStopError,
    UpstreamFetchError,
    UpstreamValidationError,
} from "./errors.js";
import { stopName, type SubwayNetwork } from "./subwayNetwork.js";
import type { LineSummary, RouteLeg, StopExtremes } from "./subwayQueries.js";
import type { Line } from "./types.js";

// ------------------------------
// answers
// ------------------------------

const RULE = "=".repeat(60);
const STOPS_PER_ROW = 5;

export function banner(title: string): string[] {
    return [RULE, title, RULE];
}

export function linesReport(lines: readonly LineSummary[]): string[] {
    return [...banner(`Subway lines (${lines.length})`), ...lines.map(l => `  • ${l.name}`)];
}

function lineWithStops(network: SubwayNetwork, label: string, line: Line, count: number): string[] {
    const names = line.stopIds.map(id => stopName(network, id));
    const out = [`${label}: ${line.name} (${count} stops)`, "  Stops:"];
    for (let i = 0; i < names.length; i += STOPS_PER_ROW) {
        out.push(`    ${names.slice(i, i + STOPS_PER_ROW).join(", ")}`);
    }
    return out;
}

export function extremesReport(network: SubwayNetwork, extremes: StopExtremes): string[] {
    return [
        ...banner("Line statistics"),
        ...extremes.maxLines.flatMap(l => lineWithStops(network, "Most stops", l, extremes.maxCount)),
        "",
        ...extremes.minLines.flatMap(l => lineWithStops(network, "Fewest stops", l, extremes.minCount)),
    ];
}

export function transfersReport(transfers: ReadonlyMap<string, ReadonlySet<string>>): string[] {
    if (!transfers.size) return ["No stops connect multiple lines."];

    // dot leaders so the line lists start in one column
    const width = Math.max(...Array.from(transfers.keys(), s => s.length));
    const out = [`Transfer stops (${transfers.size} total):`, "-".repeat(60)];
    for (const [stop, lines] of transfers) {
        const padding = ".".repeat(width - stop.length + 2);
        out.push(`  ${stop} ${padding} [${[...lines].sort().join(", ")}]`);
    }
    return out;
}

export function routeReport(start: string, end: string, legs: readonly RouteLeg[]): string[] {
    const changes = legs.filter((leg, i) => i > 0 && leg.line !== legs[i - 1].line).length;
    const out = banner(`Route from ${start} to ${end}`);
    if (!legs.length) return [...out, "  Already there, no travel needed."];
    out.push(`  ${legs.length} hop(s), ${changes} line change(s)`);
    for (const leg of legs) out.push(`  ${leg.from} --[${leg.line}]--> ${leg.to}`);
    return out;
}

export function stopNamesReport(names: readonly string[]): string[] {
    return ["Stops available for --start and --stop:", ...names.map(n => `  • ${n}`)];
}

// ------------------------------
// errors
// ------------------------------

// One message per error kind; the CLI prints this instead of a stack.
export function describeError(err: unknown): string {
    if (err instanceof UnknownStopError) return `Stop "${err.stop}" not found. Run list-stops to see valid names.`;
    if (err instanceof NoRouteFoundError) return `No route connects ${err.from} and ${err.to}.`;
    if (err instanceof EmptyDatasetError) return "The transit API returned no subway lines.";
    if (err instanceof UpstreamValidationError) return `The transit API sent an unexpected response: ${err.message}`;
    if (err instanceof UpstreamFetchError) return `Could not reach the transit API: ${err.message}`;
    if (err instanceof ConfigError) return `Configuration error: ${err.message}`;
    if (err instanceof Error) return `${err.name}: ${err.message}`;
    return String(err);
}
