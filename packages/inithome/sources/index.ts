export { provisionConfigLoad } from "./config/provisionConfigLoad.js";
export { provisionConfigResolve } from "./config/provisionConfigResolve.js";
export {
    ConfigurationError,
    PathConflictError,
    PermissionError,
    ProvisionError,
    type ProvisionErrorKind,
    VerificationError
} from "./errors/provisionError.js";
export { type HomeFs, homeFsNode } from "./fs/homeFs.js";
export { homePathResolve } from "./paths/homePathResolve.js";
export { homeProvisionRun, type HomeProvisionRunDependencies } from "./provision/homeProvisionRun.js";
export { homeVerify } from "./provision/homeVerify.js";
export type {
    ForeignHomePolicy,
    HomeOwnership,
    ProvisionRequest,
    ProvisionResult,
    ProvisionState,
    ResolvedPath
} from "./types.js";
