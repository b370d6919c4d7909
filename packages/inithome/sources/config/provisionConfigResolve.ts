import { z } from "zod";

import { INITHOME_DEFAULT_MODE, INITHOME_MAX_ID, INITHOME_MODE_MASK } from "../constants.js";
import { ConfigurationError } from "../errors/provisionError.js";
import type { ProvisionRequest } from "../types.js";
import { provisionModeParse } from "./provisionModeParse.js";

const INTEGER_PATTERN = /^-?\d+$/;

const idSchema = z.preprocess(
    (value) => (typeof value === "string" && INTEGER_PATTERN.test(value.trim()) ? Number(value.trim()) : value),
    z
        .number({ required_error: "is required", invalid_type_error: "must be an integer" })
        .int({ message: "must be an integer" })
        .min(0, { message: "must be nonnegative" })
        .max(INITHOME_MAX_ID, { message: `out of range (> ${INITHOME_MAX_ID})` })
);

const modeSchema = z.preprocess(
    (value) => (typeof value === "string" ? (provisionModeParse(value) ?? value) : value),
    z
        .number({ invalid_type_error: "must be an octal permission mode such as 0700" })
        .int({ message: "must be an integer" })
        .min(0, { message: "must be nonnegative" })
        .max(INITHOME_MODE_MASK, { message: "must not exceed 07777" })
);

const provisionConfigSchema = z
    .object({
        baseHomeDir: z.string({ required_error: "is required" }).min(1, { message: "is required" }),
        subdirectory: z.string().optional(),
        ownerUid: idSchema,
        ownerGid: idSchema,
        dirMode: modeSchema.optional(),
        foreignHomePolicy: z.enum(["reown", "refuse"]).optional()
    })
    .strict();

/**
 * Validates merged configuration input and applies defaults.
 * Expects: rawConfig is a plain object; numbers may arrive as strings from flags or the environment.
 */
export function provisionConfigResolve(rawConfig: unknown): ProvisionRequest {
    const parsed = provisionConfigSchema.safeParse(rawConfig);
    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "config"}: ${issue.message}`)
            .join("; ");
        throw new ConfigurationError(`invalid configuration: ${details}`, { cause: parsed.error });
    }

    const config = parsed.data;
    return {
        baseHomeDir: config.baseHomeDir,
        subdirectory: config.subdirectory && config.subdirectory.length > 0 ? config.subdirectory : undefined,
        ownerUid: config.ownerUid,
        ownerGid: config.ownerGid,
        dirMode: config.dirMode ?? INITHOME_DEFAULT_MODE,
        foreignHomePolicy: config.foreignHomePolicy ?? "reown"
    };
}
