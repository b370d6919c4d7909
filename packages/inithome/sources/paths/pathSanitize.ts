import { ConfigurationError } from "../errors/provisionError.js";

const MAX_PATH_LENGTH = 4096;

/**
 * Rejects path input that cannot name a directory safely.
 *
 * Checks for:
 * - Null bytes (truncate strings in C libraries)
 * - Control characters (ASCII 0-31)
 * - Paths longer than PATH_MAX
 */
export function pathSanitize(target: string, label: string): void {
    if (target.length > MAX_PATH_LENGTH) {
        throw new ConfigurationError(`${label} exceeds maximum length of ${MAX_PATH_LENGTH} characters`);
    }
    if (target.includes("\x00")) {
        throw new ConfigurationError(`${label} contains null byte`);
    }
    for (let i = 0; i < target.length; i++) {
        if (target.charCodeAt(i) < 32) {
            throw new ConfigurationError(`${label} contains invalid control character`);
        }
    }
}
