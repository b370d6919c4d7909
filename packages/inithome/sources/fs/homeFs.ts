import { promises as fs, type Stats } from "node:fs";

/**
 * Filesystem calls the provisioner makes. Injected so runs can be exercised against
 * filesystems that refuse or ignore ownership changes.
 */
export interface HomeFs {
    lstat(target: string): Promise<Stats>;
    stat(target: string): Promise<Stats>;
    realpath(target: string): Promise<string>;
    mkdir(target: string, mode: number): Promise<void>;
    chown(target: string, uid: number, gid: number): Promise<void>;
    chmod(target: string, mode: number): Promise<void>;
    readdir(target: string): Promise<string[]>;
}

export const homeFsNode: HomeFs = {
    lstat: (target) => fs.lstat(target),
    stat: (target) => fs.stat(target),
    realpath: (target) => fs.realpath(target),
    mkdir: async (target, mode) => {
        await fs.mkdir(target, { mode });
    },
    chown: (target, uid, gid) => fs.chown(target, uid, gid),
    chmod: (target, mode) => fs.chmod(target, mode),
    readdir: (target) => fs.readdir(target)
};
