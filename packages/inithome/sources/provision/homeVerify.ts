import { provisionModeFormat } from "../config/provisionModeParse.js";
import { INITHOME_MODE_MASK } from "../constants.js";
import { VerificationError } from "../errors/provisionError.js";
import type { HomeFs } from "../fs/homeFs.js";
import type { HomeOwnership, ProvisionRequest } from "../types.js";

/**
 * Re-reads the provisioned directory and confirms owner, group and mode.
 * A mismatch means the changes were made but the filesystem did not keep them.
 */
export async function homeVerify(
    targetPath: string,
    request: Pick<ProvisionRequest, "ownerUid" | "ownerGid" | "dirMode">,
    fs: HomeFs
): Promise<HomeOwnership> {
    const current = await fs.stat(targetPath).catch((error: unknown) => {
        const details = error instanceof Error && error.message ? error.message : String(error);
        throw new VerificationError(`cannot read ${targetPath} after provisioning: ${details}`, [details], {
            path: targetPath,
            cause: error
        });
    });

    const observed: HomeOwnership = {
        uid: current.uid,
        gid: current.gid,
        mode: current.mode & INITHOME_MODE_MASK
    };
    const mismatches: string[] = [];
    if (!current.isDirectory()) {
        mismatches.push("not a directory");
    }
    if (observed.uid !== request.ownerUid) {
        mismatches.push(`uid is ${observed.uid}, expected ${request.ownerUid}`);
    }
    if (observed.gid !== request.ownerGid) {
        mismatches.push(`gid is ${observed.gid}, expected ${request.ownerGid}`);
    }
    if (observed.mode !== request.dirMode) {
        mismatches.push(`mode is ${provisionModeFormat(observed.mode)}, expected ${provisionModeFormat(request.dirMode)}`);
    }

    if (mismatches.length > 0) {
        throw new VerificationError(`${targetPath} does not match the requested state: ${mismatches.join("; ")}`, mismatches, {
            path: targetPath
        });
    }
    return observed;
}
