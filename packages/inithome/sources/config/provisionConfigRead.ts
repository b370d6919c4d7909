import { readFile } from "node:fs/promises";
import { parse } from "yaml";

import { ConfigurationError } from "../errors/provisionError.js";

/**
 * Reads a YAML configuration file into a raw key/value map.
 * Scalars stay text, the same as flag and environment values, so `dirMode: 700` is read as octal later.
 * Expects: configPath points to a YAML mapping; values are validated later by provisionConfigResolve.
 */
export async function provisionConfigRead(configPath: string): Promise<Record<string, unknown>> {
    let rawText: string;
    try {
        rawText = await readFile(configPath, "utf-8");
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "could not read config";
        throw new ConfigurationError(`Failed to read config at ${configPath}: ${details}`, {
            path: configPath,
            cause: error
        });
    }

    let parsed: unknown;
    try {
        parsed = parse(rawText, { schema: "failsafe" });
    } catch (error) {
        const details = error instanceof Error && error.message ? error.message : "invalid yaml";
        throw new ConfigurationError(`Failed to parse config at ${configPath}: ${details}`, {
            path: configPath,
            cause: error
        });
    }

    // An empty document parses to null.
    if (parsed === null || parsed === undefined) {
        return {};
    }
    if (typeof parsed !== "object" || Array.isArray(parsed)) {
        throw new ConfigurationError(`Invalid config at ${configPath}: expected a mapping`, { path: configPath });
    }
    return Object.fromEntries(Object.entries(parsed));
}
