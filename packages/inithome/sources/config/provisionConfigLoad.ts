import { INITHOME_CONFIG_ENV } from "../constants.js";
import type { ProvisionCliOptions, ProvisionRequest } from "../types.js";
import { envValueRead } from "../utils/envValueRead.js";
import { provisionConfigEnvRead } from "./provisionConfigEnvRead.js";
import { provisionConfigRead } from "./provisionConfigRead.js";
import { provisionConfigResolve } from "./provisionConfigResolve.js";

/**
 * Builds the provisioning request from command line flags, the environment and an optional YAML file.
 * Flags win over environment variables, which win over the file.
 */
export async function provisionConfigLoad(
    options: ProvisionCliOptions,
    env: NodeJS.ProcessEnv
): Promise<ProvisionRequest> {
    const configPath = options.config ?? envValueRead(env, INITHOME_CONFIG_ENV);
    const fileConfig = configPath ? await provisionConfigRead(configPath) : {};

    const flagConfig = definedOnly({
        baseHomeDir: options.home,
        subdirectory: options.subdirectory,
        ownerUid: options.uid,
        ownerGid: options.gid,
        dirMode: options.mode,
        foreignHomePolicy: options.foreignHome
    });

    return provisionConfigResolve({
        ...fileConfig,
        ...provisionConfigEnvRead(env),
        ...flagConfig
    });
}

function definedOnly(values: Record<string, string | undefined>): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}
