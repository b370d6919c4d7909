import { provisionModeFormat } from "../config/provisionModeParse.js";
import { provisionErrorClassify } from "../errors/provisionErrorClassify.js";
import type { HomeFs } from "../fs/homeFs.js";
import { getLogger } from "../log.js";
import type { ProvisionRequest } from "../types.js";

const logger = getLogger("provision.own");

/**
 * Applies the requested owner and mode to one directory.
 * Expects: target is a directory. Owner goes first since chown may clear setuid/setgid bits.
 */
export async function homeOwnershipApply(
    target: string,
    request: Pick<ProvisionRequest, "ownerUid" | "ownerGid" | "dirMode">,
    fs: HomeFs
): Promise<void> {
    await fs.chown(target, request.ownerUid, request.ownerGid).catch((error: unknown) => {
        throw provisionErrorClassify(error, "change owner of", target);
    });
    await fs.chmod(target, request.dirMode).catch((error: unknown) => {
        throw provisionErrorClassify(error, "change mode of", target);
    });
    logger.info(
        `own: Applied owner and mode path=${target} uid=${request.ownerUid} gid=${request.ownerGid} mode=${provisionModeFormat(request.dirMode)}`
    );
}
