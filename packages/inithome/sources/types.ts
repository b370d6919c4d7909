import type { ProvisionError } from "./errors/provisionError.js";

export type ForeignHomePolicy = "reown" | "refuse";

export interface ProvisionRequest {
    baseHomeDir: string;
    subdirectory?: string;
    ownerUid: number;
    ownerGid: number;
    dirMode: number;
    foreignHomePolicy: ForeignHomePolicy;
}

export interface ResolvedPath {
    readonly baseHomeDir: string;
    readonly realBaseHomeDir: string;
    readonly targetPath: string;
    /** Absolute path of every segment below the base, in walk order. */
    readonly segments: readonly string[];
    /** Segments that did not exist when the path was resolved. */
    readonly frontier: readonly string[];
}

export type ProvisionState = "resolving" | "walking" | "setting_ownership" | "verifying" | "succeeded" | "failed";

export interface HomeOwnership {
    uid: number;
    gid: number;
    mode: number;
}

export interface ProvisionSucceeded extends HomeOwnership {
    status: "succeeded";
    targetPath: string;
    created: boolean;
    createdSegments: string[];
}

export interface ProvisionFailed {
    status: "failed";
    targetPath?: string;
    state: Exclude<ProvisionState, "succeeded" | "failed">;
    error: ProvisionError;
}

export type ProvisionResult = ProvisionSucceeded | ProvisionFailed;

export interface ProvisionCliOptions {
    config?: string;
    home?: string;
    subdirectory?: string;
    uid?: string;
    gid?: string;
    mode?: string;
    foreignHome?: string;
}
