import { afterEach, describe, expect, it } from "vitest";

import { formatPrettyMessage, initLogging, resetLogging, resolveLogConfig } from "./log.js";

const ENV_KEYS = [
    "VITEST",
    "INITHOME_LOG_LEVEL",
    "LOG_LEVEL",
    "INITHOME_LOG_FORMAT",
    "INITHOME_LOG_JSON",
    "INITHOME_LOG_DEST"
] as const;
const savedEnv = new Map<string, string | undefined>(ENV_KEYS.map((key) => [key, process.env[key]]));

afterEach(() => {
    resetLogging();
    for (const [key, value] of savedEnv) {
        if (value === undefined) {
            delete process.env[key];
        } else {
            process.env[key] = value;
        }
    }
});

function envClear(): void {
    for (const key of ENV_KEYS) {
        if (key !== "VITEST") {
            delete process.env[key];
        }
    }
}

describe("initLogging", () => {
    it("defaults to silent level when running in vitest", () => {
        envClear();
        process.env.VITEST = "true";
        resetLogging();

        expect(initLogging().level).toBe("silent");
    });

    it("returns the same root logger on repeated calls", () => {
        envClear();
        expect(initLogging()).toBe(initLogging());
    });
});

describe("resolveLogConfig", () => {
    it("defaults to pretty output on stderr", () => {
        envClear();

        const config = resolveLogConfig();

        expect(config.format).toBe("pretty");
        expect(config.destination).toBe("stderr");
        expect(config.service).toBe("inithome");
    });

    it("uses json format when INITHOME_LOG_JSON is enabled", () => {
        envClear();
        process.env.INITHOME_LOG_JSON = "yes";

        expect(resolveLogConfig().format).toBe("json");
    });

    it("prefers INITHOME_LOG_LEVEL over LOG_LEVEL", () => {
        envClear();
        process.env.INITHOME_LOG_LEVEL = "warn";
        process.env.LOG_LEVEL = "trace";

        expect(resolveLogConfig().level).toBe("warn");
    });

    it("forces json when logging to a file", () => {
        envClear();
        process.env.INITHOME_LOG_FORMAT = "pretty";

        const config = resolveLogConfig({ destination: "/var/log/inithome.log" });

        expect(config.format).toBe("json");
    });
});

describe("formatPrettyMessage", () => {
    it("includes module label and structured fields", () => {
        const output = formatPrettyMessage(
            {
                time: "2026-01-02T03:04:05.000Z",
                level: 30,
                module: "provision",
                msg: "create: Created directory",
                path: "/home/alice/labhome",
                uid: 2247
            },
            "msg"
        );

        expect(output).toMatch(
            /^\[\d{2}:\d{2}:\d{2}\] \[provision {7}\] create: Created directory path=\/home\/alice\/labhome uid=2247$/
        );
    });

    it("quotes values with spaces and summarizes errors", () => {
        const output = formatPrettyMessage(
            {
                time: 0,
                module: "cli",
                msg: "fail: Provisioning failed",
                reason: "not a directory",
                error: { type: "PathConflictError", message: "boom" }
            },
            "msg"
        );

        expect(output).toContain('fail: Provisioning failed reason="not a directory" error="boom"');
    });
});
