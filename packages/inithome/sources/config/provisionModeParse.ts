const MODE_PATTERN = /^(?:0o?)?([0-7]{1,4})$/i;

/**
 * Parses an octal permission mode written as "700", "0700" or "0o700".
 * Returns null when the text is not an octal mode.
 */
export function provisionModeParse(value: string): number | null {
    const match = MODE_PATTERN.exec(value.trim());
    if (!match?.[1]) {
        return null;
    }
    return Number.parseInt(match[1], 8);
}

/** Formats permission bits the way ls and chmod print them, e.g. 0700. */
export function provisionModeFormat(mode: number): string {
    return `0${mode.toString(8).padStart(3, "0")}`;
}
