import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { provisionConfigLoad } from "./provisionConfigLoad.js";

const tempDirectories: string[] = [];

afterEach(async () => {
    for (const directory of tempDirectories.splice(0, tempDirectories.length)) {
        await rm(directory, { recursive: true, force: true });
    }
});

async function configWrite(contents: string): Promise<string> {
    const directory = await mkdtemp(join(tmpdir(), "inithome-load-"));
    tempDirectories.push(directory);
    const configPath = join(directory, "inithome.yaml");
    await writeFile(configPath, contents);
    return configPath;
}

describe("provisionConfigLoad", () => {
    it("builds a request from flags alone", async () => {
        const request = await provisionConfigLoad({ home: "/home", subdirectory: "alice", uid: "1000", gid: "1000" }, {});

        expect(request).toEqual({
            baseHomeDir: "/home",
            subdirectory: "alice",
            ownerUid: 1000,
            ownerGid: 1000,
            dirMode: 0o700,
            foreignHomePolicy: "reown"
        });
    });

    it("prefers flags over environment over file", async () => {
        const configPath = await configWrite(
            ["baseHomeDir: /file/home", "ownerUid: 1", "ownerGid: 1", 'dirMode: "0755"', "subdirectory: from-file"].join(
                "\n"
            )
        );

        const request = await provisionConfigLoad(
            { config: configPath, uid: "3000" },
            { INITHOME_HOME: "/env/home", INITHOME_UID: "2000", INITHOME_GID: "2001" }
        );

        expect(request.baseHomeDir).toBe("/env/home");
        expect(request.ownerUid).toBe(3000);
        expect(request.ownerGid).toBe(2001);
        expect(request.dirMode).toBe(0o755);
        expect(request.subdirectory).toBe("from-file");
    });

    it("finds the config file through the environment", async () => {
        const configPath = await configWrite("baseHomeDir: /file/home\nownerUid: 5\nownerGid: 6\n");

        const request = await provisionConfigLoad({}, { INITHOME_CONFIG: configPath });

        expect(request.baseHomeDir).toBe("/file/home");
        expect(request.ownerUid).toBe(5);
        expect(request.ownerGid).toBe(6);
    });

    it("reads an unquoted file mode the same way as the environment", async () => {
        const plainPath = await configWrite("baseHomeDir: /home\nownerUid: 1000\nownerGid: 1000\ndirMode: 700\n");
        const zeroPath = await configWrite("baseHomeDir: /home\nownerUid: 1000\nownerGid: 1000\ndirMode: 0700\n");

        const fromFile = await provisionConfigLoad({ config: plainPath }, {});
        const fromZeroFile = await provisionConfigLoad({ config: zeroPath }, {});
        const fromEnv = await provisionConfigLoad(
            {},
            { INITHOME_HOME: "/home", INITHOME_UID: "1000", INITHOME_GID: "1000", INITHOME_MODE: "700" }
        );

        expect(fromEnv.dirMode).toBe(0o700);
        expect(fromFile.dirMode).toBe(fromEnv.dirMode);
        expect(fromZeroFile.dirMode).toBe(fromEnv.dirMode);
    });

    it("rejects a file mode with non-octal digits", async () => {
        const configPath = await configWrite("baseHomeDir: /home\nownerUid: 1000\nownerGid: 1000\ndirMode: 780\n");

        await expect(provisionConfigLoad({ config: configPath }, {})).rejects.toThrow(
            "dirMode: must be an octal permission mode such as 0700"
        );
    });

    it("fails when required values are missing everywhere", async () => {
        await expect(provisionConfigLoad({ home: "/home" }, {})).rejects.toThrow("ownerUid: is required");
    });
});
