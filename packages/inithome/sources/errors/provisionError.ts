export type ProvisionErrorKind = "configuration" | "path_conflict" | "permission" | "verification";

type ProvisionErrorOptions = {
    path?: string;
    cause?: unknown;
};

/**
 * Base class for every failure the provisioner classifies.
 * Expects: kind is stable and decides the process exit code.
 */
export class ProvisionError extends Error {
    readonly kind: ProvisionErrorKind;
    readonly path?: string;

    constructor(kind: ProvisionErrorKind, message: string, options: ProvisionErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = "ProvisionError";
        this.kind = kind;
        this.path = options.path;
    }
}

/** Invalid or unsafe input. Raised before any filesystem mutation. */
export class ConfigurationError extends ProvisionError {
    constructor(message: string, options?: ProvisionErrorOptions) {
        super("configuration", message, options);
        this.name = "ConfigurationError";
    }
}

/** An existing filesystem entry blocks the intended directory. */
export class PathConflictError extends ProvisionError {
    constructor(message: string, options?: ProvisionErrorOptions) {
        super("path_conflict", message, options);
        this.name = "PathConflictError";
    }
}

/** The process lacks the rights to create or re-own a directory. */
export class PermissionError extends ProvisionError {
    constructor(message: string, options?: ProvisionErrorOptions) {
        super("permission", message, options);
        this.name = "PermissionError";
    }
}

/** The directory was changed but the filesystem does not report the requested state. */
export class VerificationError extends ProvisionError {
    readonly mismatches: string[];

    constructor(message: string, mismatches: string[], options?: ProvisionErrorOptions) {
        super("verification", message, options);
        this.name = "VerificationError";
        this.mismatches = mismatches;
    }
}
