import { PathConflictError } from "../errors/provisionError.js";
import { provisionErrorClassify } from "../errors/provisionErrorClassify.js";
import type { HomeFs } from "../fs/homeFs.js";

/**
 * Checks that an existing path segment is a real directory.
 * Symbolic links below the base are refused: owner and mode changes would land on whatever they point at.
 */
export async function homeSegmentDirectoryEnsure(segment: string, fs: HomeFs): Promise<void> {
    const entry = await fs.lstat(segment).catch((error: unknown) => {
        throw provisionErrorClassify(error, "inspect", segment);
    });
    if (entry.isDirectory()) {
        return;
    }
    if (entry.isSymbolicLink()) {
        throw new PathConflictError(`${segment} is a symbolic link`, { path: segment });
    }
    throw new PathConflictError(`${segment} exists but is not a directory`, { path: segment });
}
