import { parseArgs } from "node:util";
import { writeGraphFiles } from "./graphExport.js";
import type { GraphTopology } from "./networkGraph.js";
import {
    extremesReport,
    linesReport,
    routeReport,
    stopNamesReport,
    transfersReport,
} from "./report.js";
import type { SubwayNetwork } from "./subwayNetwork.js";
import {
    describeRoute,
    findRoute,
    listStopNames,
    listSubwayLines,
    stopExtremesAndTransfers,
} from "./subwayQueries.js";

// ------------------------------
// argument parsing
// ------------------------------

export const COMMANDS = ["lines", "stats", "route", "all", "list-stops", "export"] as const;
export type Command = (typeof COMMANDS)[number];

export const USAGE = `usage: subway-answers <command> [options]

commands:
  lines                             list subway lines
  stats                             most/fewest stops and transfer stops
  route --start <name> --stop <name>
                                    find a route between two stops
  all --start <name> --stop <name>  answer all three questions
  list-stops                        list stop names accepted by --start/--stop
  export [--out <dir>]              write graph nodes/edges as CSV and JSON

options:
  --topology clique|adjacent        how stops on a line are joined (default clique)`;

export class UsageError extends Error {
    constructor(message: string) {
        super(`${message}\n\n${USAGE}`);
        this.name = "UsageError";
    }
}

export type CliArgs = {
    command: Command;
    start?: string;
    stop?: string;
    out: string;
    topology: GraphTopology;
};

function isCommand(value: string): value is Command {
    return COMMANDS.some(c => c === value);
}

function readArgs(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                start: { type: "string", short: "s" },
                stop: { type: "string", short: "e" },
                out: { type: "string", short: "o" },
                topology: { type: "string" },
            },
        });
    } catch (err) {
        throw new UsageError(err instanceof Error ? err.message : String(err));
    }
}

export function parseCli(argv: string[]): CliArgs {
    const { positionals, values } = readArgs(argv);
    const [command] = positionals;
    if (!command) throw new UsageError("missing command");
    if (!isCommand(command)) throw new UsageError(`unknown command: ${command}`);

    const topology = values.topology ?? "clique";
    if (topology !== "clique" && topology !== "adjacent") {
        throw new UsageError(`unknown topology: ${topology}`);
    }
    if ((command === "route" || command === "all") && (!values.start || !values.stop)) {
        throw new UsageError(`${command} needs --start and --stop`);
    }

    return { command, start: values.start, stop: values.stop, out: values.out ?? "out", topology };
}

// ------------------------------
// commands
// ------------------------------

export type Print = (line: string) => void;

function printAll(print: Print, lines: readonly string[]) {
    for (const line of lines) print(line);
}

function statsLines(network: SubwayNetwork): string[] {
    const { extremes, transfers } = stopExtremesAndTransfers(network);
    return [...extremesReport(network, extremes), "", ...transfersReport(transfers)];
}

function routeLines(network: SubwayNetwork, start: string, stop: string): string[] {
    const route = findRoute(network, start, stop);
    return routeReport(start, stop, describeRoute(network, route));
}

/**
 * Runs one command against an already-built network, printing each answer
 * as soon as it is ready. For `all`, a bad stop name only costs the route
 * answer: the line list and stats are already out before the lookup throws.
 * Only `export` touches the filesystem.
 */
export function runCommand(network: SubwayNetwork, args: CliArgs, print: Print): void {
    const start = args.start ?? "";
    const stop = args.stop ?? "";
    switch (args.command) {
        case "lines":
            return printAll(print, linesReport(listSubwayLines(network)));
        case "stats":
            return printAll(print, statsLines(network));
        case "route":
            return printAll(print, routeLines(network, start, stop));
        case "all":
            printAll(print, [...linesReport(listSubwayLines(network)), ""]);
            printAll(print, [...statsLines(network), ""]);
            return printAll(print, routeLines(network, start, stop));
        case "list-stops":
            return printAll(print, stopNamesReport(listStopNames(network)));
        case "export":
            return printAll(print, writeGraphFiles(network, args.out).map(f => `  ${f}`));
    }
}
