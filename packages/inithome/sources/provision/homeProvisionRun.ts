import { provisionModeFormat } from "../config/provisionModeParse.js";
import { ProvisionError } from "../errors/provisionError.js";
import { type HomeFs, homeFsNode } from "../fs/homeFs.js";
import { getLogger } from "../log.js";
import { homePathResolve } from "../paths/homePathResolve.js";
import type { ProvisionFailed, ProvisionRequest, ProvisionResult, ProvisionState } from "../types.js";
import { homeForeignCheck } from "./homeForeignCheck.js";
import { homeOwnershipApply } from "./homeOwnershipApply.js";
import { homeSegmentsEnsure } from "./homeSegmentsEnsure.js";
import { homeVerify } from "./homeVerify.js";

const logger = getLogger("provision");

export interface HomeProvisionRunDependencies {
    fs?: HomeFs;
    onStateChange?: (state: ProvisionState) => void;
}

/**
 * Provisions the home directory once: resolve, walk, set ownership, verify.
 * Classified failures come back as a failed result; anything else is rethrown.
 * Nothing is retried and nothing is rolled back, a later run picks up where this one stopped.
 */
export async function homeProvisionRun(
    request: ProvisionRequest,
    dependencies: HomeProvisionRunDependencies = {}
): Promise<ProvisionResult> {
    const fs = dependencies.fs ?? homeFsNode;
    let state: ProvisionFailed["state"] = "resolving";
    let targetPath: string | undefined;
    const enter = (next: ProvisionState) => {
        logger.debug(`state: ${next}`);
        dependencies.onStateChange?.(next);
    };

    try {
        enter(state);
        logger.info(
            `resolve: Resolving home directory baseHomeDir=${request.baseHomeDir} subdirectory=${request.subdirectory ?? "-"}`
        );
        const resolved = await homePathResolve(request, fs);
        targetPath = resolved.targetPath;
        logger.debug(
            `resolve: Resolved home directory path=${resolved.targetPath} realBase=${resolved.realBaseHomeDir} missing=${resolved.frontier.length}`
        );

        state = "walking";
        enter(state);
        const { createdSegments } = await homeSegmentsEnsure(resolved, request, fs);

        state = "setting_ownership";
        enter(state);
        if (!resolved.frontier.includes(resolved.targetPath)) {
            await homeForeignCheck(resolved.targetPath, request, fs);
        }
        await homeOwnershipApply(resolved.targetPath, request, fs);

        state = "verifying";
        enter(state);
        const observed = await homeVerify(resolved.targetPath, request, fs);

        enter("succeeded");
        logger.info(
            `done: Home directory verified path=${resolved.targetPath} uid=${observed.uid} gid=${observed.gid} mode=${provisionModeFormat(observed.mode)} created=${createdSegments.length}`
        );
        return {
            status: "succeeded",
            targetPath: resolved.targetPath,
            created: createdSegments.length > 0,
            createdSegments,
            ...observed
        };
    } catch (error) {
        if (!(error instanceof ProvisionError)) {
            throw error;
        }
        enter("failed");
        logger.error(`fail: Provisioning failed kind=${error.kind} state=${state} reason=${error.message}`);
        return { status: "failed", targetPath, state, error };
    }
}
