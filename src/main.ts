#!/usr/bin/env node
/**
 * Entry point. Pulls the subway routes and their stops from the MBTA API
 * once, builds the network, and answers whichever question the command asks.
 * Run `subway-answers all --start "Davis" --stop "Copley"` for the lot.
 */
import "dotenv/config";

import { parseCli, runCommand, UsageError } from "./cli.js";
import { loadConfig } from "./config.js";
import { MbtaClient } from "./mbtaClient.js";
import { describeError } from "./report.js";
import { loadSubwayNetwork } from "./subwayRepository.js";

async function run() {
    const args = parseCli(process.argv.slice(2));
    const config = loadConfig();
    const client = new MbtaClient(config);

    const network = await loadSubwayNetwork(client, {
        requestDelayMs: config.requestDelayMs,
        topology: args.topology,
    });

    runCommand(network, args, line => console.log(line));
}

run().catch(err => {
    console.error(err instanceof UsageError ? err.message : describeError(err));
    process.exit(1);
});
