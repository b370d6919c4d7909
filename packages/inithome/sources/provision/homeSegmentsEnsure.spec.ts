import { chmod, mkdir, mkdtemp, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { PermissionError } from "../errors/provisionError.js";
import { type HomeFs, homeFsNode } from "../fs/homeFs.js";
import { homePathResolve } from "../paths/homePathResolve.js";
import { homeSegmentsEnsure } from "./homeSegmentsEnsure.js";

const OWNER = { ownerUid: process.getuid?.() ?? 0, ownerGid: process.getgid?.() ?? 0 };
const tempDirectories: string[] = [];

afterEach(async () => {
    for (const directory of tempDirectories.splice(0, tempDirectories.length)) {
        await rm(directory, { recursive: true, force: true });
    }
});

async function baseCreate(): Promise<string> {
    const directory = await mkdtemp(join(tmpdir(), "inithome-walk-"));
    tempDirectories.push(directory);
    return directory;
}

describe("homeSegmentsEnsure", () => {
    it("creates missing segments and owns every one except the leaf", async () => {
        const base = await baseCreate();
        const resolved = await homePathResolve({ baseHomeDir: base, subdirectory: "j/josephk/lab" }, homeFsNode);
        const chown = vi.fn(homeFsNode.chown);
        const fs: HomeFs = { ...homeFsNode, chown };

        const result = await homeSegmentsEnsure(resolved, { ...OWNER, dirMode: 0o750 }, fs);

        expect(result.createdSegments).toEqual([join(base, "j"), join(base, "j", "josephk"), join(base, "j", "josephk", "lab")]);
        expect(chown.mock.calls.map((call) => call[0])).toEqual([join(base, "j"), join(base, "j", "josephk")]);
        expect((await stat(join(base, "j"))).mode & 0o7777).toBe(0o750);
        expect((await stat(join(base, "j", "josephk"))).mode & 0o7777).toBe(0o750);
    });

    it("re-owns a frontier segment another run created first", async () => {
        const base = await baseCreate();
        const resolved = await homePathResolve({ baseHomeDir: base, subdirectory: "alice/labhome" }, homeFsNode);
        await mkdir(join(base, "alice"));
        await chmod(join(base, "alice"), 0o755);

        const result = await homeSegmentsEnsure(resolved, { ...OWNER, dirMode: 0o700 }, homeFsNode);

        expect(result.createdSegments).toEqual([join(base, "alice", "labhome")]);
        expect((await stat(join(base, "alice"))).mode & 0o7777).toBe(0o700);
    });

    it("leaves segments that already existed untouched", async () => {
        const base = await baseCreate();
        await mkdir(join(base, "alice"));
        await chmod(join(base, "alice"), 0o755);
        const resolved = await homePathResolve({ baseHomeDir: base, subdirectory: "alice/labhome" }, homeFsNode);
        const chmodSpy = vi.fn(homeFsNode.chmod);

        await homeSegmentsEnsure(resolved, { ...OWNER, dirMode: 0o700 }, { ...homeFsNode, chmod: chmodSpy });

        expect(chmodSpy).not.toHaveBeenCalled();
        expect((await stat(join(base, "alice"))).mode & 0o7777).toBe(0o755);
    });

    it("stops at the first segment it may not re-own and keeps what it made", async () => {
        const base = await baseCreate();
        const resolved = await homePathResolve({ baseHomeDir: base, subdirectory: "alice/labhome" }, homeFsNode);
        const fs: HomeFs = {
            ...homeFsNode,
            chown: async () => {
                throw Object.assign(new Error("operation not permitted"), { code: "EPERM" });
            }
        };

        await expect(homeSegmentsEnsure(resolved, { ...OWNER, dirMode: 0o700 }, fs)).rejects.toThrow(PermissionError);
        expect((await stat(join(base, "alice"))).isDirectory()).toBe(true);
        await expect(stat(join(base, "alice", "labhome"))).rejects.toMatchObject({ code: "ENOENT" });
    });
});
