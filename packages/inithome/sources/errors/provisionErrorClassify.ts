import { PathConflictError, PermissionError, ProvisionError } from "./provisionError.js";

const PERMISSION_CODES = new Set(["EACCES", "EPERM", "EROFS"]);
const CONFLICT_CODES = new Set(["ENOTDIR", "EISDIR", "ELOOP"]);

/**
 * Converts a failed filesystem call into a classified provisioning error.
 * Expects: action is a short verb phrase such as "create" or "change owner of".
 * Errors without a known errno code are returned unchanged.
 */
export function provisionErrorClassify(error: unknown, action: string, path: string): unknown {
    if (error instanceof ProvisionError) {
        return error;
    }
    const code = errnoCodeResolve(error);
    const details = error instanceof Error && error.message ? error.message : String(error);
    if (code && PERMISSION_CODES.has(code)) {
        return new PermissionError(`cannot ${action} ${path}: ${details}`, { path, cause: error });
    }
    if (code && CONFLICT_CODES.has(code)) {
        return new PathConflictError(`cannot ${action} ${path}: ${details}`, { path, cause: error });
    }
    return error;
}

export function errnoCodeResolve(error: unknown): string | null {
    if (typeof error !== "object" || error === null || !("code" in error)) {
        return null;
    }
    return typeof error.code === "string" ? error.code : null;
}
