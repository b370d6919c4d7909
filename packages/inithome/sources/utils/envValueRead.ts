/**
 * Reads an environment variable, trimmed. Blank or missing values come back as null.
 */
export function envValueRead(env: NodeJS.ProcessEnv, key: string): string | null {
    const value = env[key];
    if (typeof value !== "string") {
        return null;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}
