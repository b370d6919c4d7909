import { provisionModeFormat } from "../config/provisionModeParse.js";
import { INITHOME_MODE_MASK } from "../constants.js";
import { PathConflictError } from "../errors/provisionError.js";
import { provisionErrorClassify } from "../errors/provisionErrorClassify.js";
import type { HomeFs } from "../fs/homeFs.js";
import { getLogger } from "../log.js";
import type { ProvisionRequest } from "../types.js";

const logger = getLogger("provision.own");

/**
 * Inspects a home directory that existed before this run, ahead of re-owning it.
 * Expects: targetPath is a directory. Under the "refuse" policy, a non-empty directory owned by
 * someone else is a conflict; every other ownership or mode difference is logged and then corrected.
 */
export async function homeForeignCheck(
    targetPath: string,
    request: Pick<ProvisionRequest, "ownerUid" | "ownerGid" | "dirMode" | "foreignHomePolicy">,
    fs: HomeFs
): Promise<void> {
    const current = await fs.stat(targetPath).catch((error: unknown) => {
        throw provisionErrorClassify(error, "inspect", targetPath);
    });

    if (current.uid !== request.ownerUid || current.gid !== request.ownerGid) {
        const owner = `${targetPath} is owned by ${current.uid}:${current.gid}, not ${request.ownerUid}:${request.ownerGid}`;
        if (request.foreignHomePolicy === "refuse") {
            const entries = await fs.readdir(targetPath).catch((error: unknown) => {
                throw provisionErrorClassify(error, "list", targetPath);
            });
            if (entries.length > 0) {
                throw new PathConflictError(`${owner} and is not empty`, { path: targetPath });
            }
            logger.warn(`own: ${owner} but is empty, resetting ownership`);
        } else {
            logger.warn(`own: ${owner}, resetting ownership`);
        }
    }

    const mode = current.mode & INITHOME_MODE_MASK;
    if (mode !== request.dirMode) {
        logger.warn(
            `own: ${targetPath} has unexpected permissions: ${provisionModeFormat(mode)} != ${provisionModeFormat(request.dirMode)}, resetting mode`
        );
    }
}
