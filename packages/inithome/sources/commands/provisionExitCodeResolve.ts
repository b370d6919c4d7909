import {
    INITHOME_EXIT_CONFIGURATION,
    INITHOME_EXIT_PATH_CONFLICT,
    INITHOME_EXIT_PERMISSION,
    INITHOME_EXIT_UNEXPECTED,
    INITHOME_EXIT_VERIFICATION
} from "../constants.js";
import { ProvisionError } from "../errors/provisionError.js";

/**
 * Maps a failure to the process exit status reported to the container runtime.
 */
export function provisionExitCodeResolve(error: unknown): number {
    if (!(error instanceof ProvisionError)) {
        return INITHOME_EXIT_UNEXPECTED;
    }
    switch (error.kind) {
        case "configuration":
            return INITHOME_EXIT_CONFIGURATION;
        case "path_conflict":
            return INITHOME_EXIT_PATH_CONFLICT;
        case "permission":
            return INITHOME_EXIT_PERMISSION;
        case "verification":
            return INITHOME_EXIT_VERIFICATION;
    }
}
