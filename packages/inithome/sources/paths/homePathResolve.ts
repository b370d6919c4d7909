import path from "node:path";

import { ConfigurationError } from "../errors/provisionError.js";
import { errnoCodeResolve, provisionErrorClassify } from "../errors/provisionErrorClassify.js";
import type { HomeFs } from "../fs/homeFs.js";
import type { ProvisionRequest, ResolvedPath } from "../types.js";
import { pathSanitize } from "./pathSanitize.js";
import { pathWithinIs } from "./pathWithinIs.js";

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR"]);

/**
 * Resolves the target home directory and the segments that still have to be created.
 * Expects: the base directory is already mounted. Only stat calls are made.
 */
export async function homePathResolve(
    request: Pick<ProvisionRequest, "baseHomeDir" | "subdirectory">,
    fs: HomeFs
): Promise<ResolvedPath> {
    const baseHomeDir = baseHomeDirNormalize(request.baseHomeDir);
    const components = subdirectoryComponentsResolve(request.subdirectory);

    const segments: string[] = [];
    let current = baseHomeDir;
    for (const component of components) {
        current = path.join(current, component);
        segments.push(current);
    }
    const targetPath = current;
    if (!pathWithinIs(baseHomeDir, targetPath)) {
        throw new ConfigurationError(`subdirectory resolves outside ${baseHomeDir}: ${targetPath}`, {
            path: targetPath
        });
    }

    await baseHomeDirEnsure(baseHomeDir, fs);
    const realBaseHomeDir = await fs.realpath(baseHomeDir).catch((error: unknown) => {
        throw provisionErrorClassify(error, "resolve", baseHomeDir);
    });
    const frontier = await frontierResolve(segments, fs);

    return { baseHomeDir, realBaseHomeDir, targetPath, segments, frontier };
}

function baseHomeDirNormalize(baseHomeDir: string): string {
    if (baseHomeDir.length === 0) {
        throw new ConfigurationError("baseHomeDir is required");
    }
    pathSanitize(baseHomeDir, "baseHomeDir");
    if (!path.isAbsolute(baseHomeDir)) {
        throw new ConfigurationError(`baseHomeDir must be an absolute path: ${baseHomeDir}`);
    }
    return path.resolve(baseHomeDir);
}

function subdirectoryComponentsResolve(subdirectory: string | undefined): string[] {
    if (!subdirectory) {
        return [];
    }
    pathSanitize(subdirectory, "subdirectory");
    if (path.isAbsolute(subdirectory)) {
        throw new ConfigurationError(`subdirectory must be a relative path: ${subdirectory}`);
    }
    const components = subdirectory.split("/").filter((component) => component !== "" && component !== ".");
    if (components.includes("..")) {
        throw new ConfigurationError(`subdirectory must not contain ".." components: ${subdirectory}`);
    }
    return components;
}

async function baseHomeDirEnsure(baseHomeDir: string, fs: HomeFs): Promise<void> {
    let baseStat: Awaited<ReturnType<HomeFs["stat"]>>;
    try {
        baseStat = await fs.stat(baseHomeDir);
    } catch (error) {
        const code = errnoCodeResolve(error);
        if (code && MISSING_CODES.has(code)) {
            throw new ConfigurationError(`baseHomeDir does not exist: ${baseHomeDir}`, {
                path: baseHomeDir,
                cause: error
            });
        }
        throw provisionErrorClassify(error, "inspect", baseHomeDir);
    }

    if (!baseStat.isDirectory()) {
        throw new ConfigurationError(`baseHomeDir is not a directory: ${baseHomeDir}`, { path: baseHomeDir });
    }
}

async function frontierResolve(segments: string[], fs: HomeFs): Promise<string[]> {
    for (const [index, segment] of segments.entries()) {
        try {
            await fs.lstat(segment);
        } catch (error) {
            const code = errnoCodeResolve(error);
            if (code && MISSING_CODES.has(code)) {
                return segments.slice(index);
            }
            throw provisionErrorClassify(error, "inspect", segment);
        }
    }
    return [];
}
