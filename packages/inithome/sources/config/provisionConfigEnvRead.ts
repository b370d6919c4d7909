import {
    INITHOME_FOREIGN_HOME_ENV,
    INITHOME_GID_ENV,
    INITHOME_HOME_ENV,
    INITHOME_MODE_ENV,
    INITHOME_SUBDIRECTORY_ENV,
    INITHOME_UID_ENV
} from "../constants.js";
import { envValueRead } from "../utils/envValueRead.js";

const ENV_KEYS = {
    baseHomeDir: INITHOME_HOME_ENV,
    subdirectory: INITHOME_SUBDIRECTORY_ENV,
    ownerUid: INITHOME_UID_ENV,
    ownerGid: INITHOME_GID_ENV,
    dirMode: INITHOME_MODE_ENV,
    foreignHomePolicy: INITHOME_FOREIGN_HOME_ENV
} as const;

/**
 * Collects configuration values from the environment. Blank variables count as unset.
 */
export function provisionConfigEnvRead(env: NodeJS.ProcessEnv): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, envKey] of Object.entries(ENV_KEYS)) {
        const value = envValueRead(env, envKey);
        if (value !== null) {
            result[key] = value;
        }
    }
    return result;
}
