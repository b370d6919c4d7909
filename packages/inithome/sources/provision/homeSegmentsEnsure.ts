import { errnoCodeResolve, provisionErrorClassify } from "../errors/provisionErrorClassify.js";
import type { HomeFs } from "../fs/homeFs.js";
import { getLogger } from "../log.js";
import type { ProvisionRequest, ResolvedPath } from "../types.js";
import { homeOwnershipApply } from "./homeOwnershipApply.js";
import { homeSegmentDirectoryEnsure } from "./homeSegmentDirectoryEnsure.js";

const logger = getLogger("provision.walk");

export type HomeSegmentsEnsureResult = {
    createdSegments: string[];
};

/**
 * Walks from the base toward the target and creates every missing segment.
 * Frontier segments get owner and mode right after creation, before the next segment is made;
 * the leaf is left for the caller. Segments that existed when the path was resolved are never modified.
 */
export async function homeSegmentsEnsure(
    resolved: ResolvedPath,
    request: Pick<ProvisionRequest, "ownerUid" | "ownerGid" | "dirMode">,
    fs: HomeFs
): Promise<HomeSegmentsEnsureResult> {
    const frontier = new Set(resolved.frontier);
    const createdSegments: string[] = [];

    for (const segment of resolved.segments) {
        if (!frontier.has(segment)) {
            await homeSegmentDirectoryEnsure(segment, fs);
            logger.debug(`walk: Directory exists path=${segment}`);
            continue;
        }

        if (await segmentCreate(segment, request.dirMode, fs)) {
            createdSegments.push(segment);
            logger.info(`create: Created directory path=${segment}`);
        } else {
            logger.info(`create: Directory was created concurrently path=${segment}`);
        }
        await homeSegmentDirectoryEnsure(segment, fs);

        // Applied even when another run created the segment, in case that run died before re-owning it.
        if (segment !== resolved.targetPath) {
            await homeOwnershipApply(segment, request, fs);
        }
    }

    return { createdSegments };
}

async function segmentCreate(segment: string, mode: number, fs: HomeFs): Promise<boolean> {
    try {
        await fs.mkdir(segment, mode);
        return true;
    } catch (error) {
        if (errnoCodeResolve(error) === "EEXIST") {
            return false;
        }
        throw provisionErrorClassify(error, "create", segment);
    }
}
