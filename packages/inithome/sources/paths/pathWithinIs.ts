import path from "node:path";

/**
 * Checks that target is base itself or lies below it. Purely lexical: resolve symlinks first.
 */
export function pathWithinIs(base: string, target: string): boolean {
    const relative = path.relative(base, target);
    if (relative === "") {
        return true;
    }
    const escapes = relative === ".." || relative.startsWith(`..${path.sep}`);
    return !escapes && !path.isAbsolute(relative);
}
