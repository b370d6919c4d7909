import { provisionConfigLoad } from "../config/provisionConfigLoad.js";
import { INITHOME_EXIT_SUCCESS } from "../constants.js";
import { ProvisionError } from "../errors/provisionError.js";
import type { HomeFs } from "../fs/homeFs.js";
import { getLogger } from "../log.js";
import { homeProvisionRun } from "../provision/homeProvisionRun.js";
import type { ProvisionCliOptions, ProvisionRequest } from "../types.js";
import { provisionExitCodeResolve } from "./provisionExitCodeResolve.js";

const logger = getLogger("cli");

interface ProvisionCommandDependencies {
    env?: NodeJS.ProcessEnv;
    fs?: HomeFs;
}

/**
 * Loads configuration, provisions the home directory and returns the exit status.
 * Expects: runs once per container start, before the workload.
 */
export async function provisionCommand(
    options: ProvisionCliOptions,
    dependencies: ProvisionCommandDependencies = {}
): Promise<number> {
    let request: ProvisionRequest;
    try {
        request = await provisionConfigLoad(options, dependencies.env ?? process.env);
    } catch (error) {
        if (!(error instanceof ProvisionError)) {
            throw error;
        }
        logger.error(`fail: Invalid configuration kind=${error.kind} reason=${error.message}`);
        return provisionExitCodeResolve(error);
    }

    const result = await homeProvisionRun(request, { fs: dependencies.fs });
    if (result.status === "failed") {
        return provisionExitCodeResolve(result.error);
    }
    return INITHOME_EXIT_SUCCESS;
}
