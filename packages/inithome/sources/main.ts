#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { Command, Option } from "commander";

import { provisionCommand } from "./commands/provisionCommand.js";
import { INITHOME_EXIT_UNEXPECTED } from "./constants.js";
import { initLogging } from "./log.js";
import type { ProvisionCliOptions } from "./types.js";

const pkg = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")) as { version: string };

initLogging();

const program = new Command();

program
    .name("inithome")
    .description("Create the user's home directory with the right owner and mode before the workload starts")
    .version(pkg.version)
    .option("-c, --config <path>", "YAML config file (env: INITHOME_CONFIG)")
    .option("--home <path>", "Existing base home directory (env: INITHOME_HOME)")
    .option("--subdirectory <path>", "Relative path under the base home to provision (env: INITHOME_SUBDIRECTORY)")
    .option("--uid <uid>", "Numeric owner UID (env: INITHOME_UID)")
    .option("--gid <gid>", "Numeric owner GID (env: INITHOME_GID)")
    .option("--mode <octal>", "Directory permission bits, e.g. 0700 (env: INITHOME_MODE)")
    .addOption(
        new Option("--foreign-home <policy>", "What to do with an existing home owned by someone else").choices([
            "reown",
            "refuse"
        ])
    )
    .action(async (options: ProvisionCliOptions) => {
        process.exitCode = await provisionCommand(options);
    });

try {
    await program.parseAsync(process.argv);
} catch (error) {
    const details = error instanceof Error && error.message ? error.message : "unknown error";
    console.error(`inithome failed: ${details}`);
    process.exit(INITHOME_EXIT_UNEXPECTED);
}
