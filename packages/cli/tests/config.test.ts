import {
    ConfigError,
    DEFAULT_CONFIG,
    loadConfig,
    parseConfig,
} from "../src/config";
import { join } from "node:path";
import { scratch } from "./helpers";

describe("parseConfig", () => {
    test("empty file gives the defaults", () => {
        expect(parseConfig("", "wisp.config.yml")).toEqual(DEFAULT_CONFIG);
        expect(DEFAULT_CONFIG).toEqual({
            maxCallDepth: 1000,
            color: true,
            prompt: "> ",
        });
    });

    test("reads every setting", () => {
        const text = "maxCallDepth: 200\ncolor: false\nprompt: 'wisp> '\n";
        expect(parseConfig(text, "wisp.config.yml")).toEqual({
            maxCallDepth: 200,
            color: false,
            prompt: "wisp> ",
        });
    });

    test.each([
        ["maxCallDepth: 0", "f.yml: 'maxCallDepth' must be a positive integer"],
        ["maxCallDepth: 2.5", "f.yml: 'maxCallDepth' must be a positive integer"],
        ["color: maybe", "f.yml: 'color' must be true or false"],
        ["prompt: 3", "f.yml: 'prompt' must be a string"],
        ["colour: false", "f.yml: unknown setting 'colour'"],
        ["- a\n- b", "f.yml: expected a mapping of settings"],
    ])("rejects %j", (text, message) => {
        expect(() => parseConfig(text, "f.yml")).toThrow(message);
    });

    test("malformed YAML is a configuration error", () => {
        expect(() => parseConfig("key: [unclosed", "f.yml")).toThrow(ConfigError);
    });
});

describe("loadConfig", () => {
    test("no file anywhere gives the defaults", async () => {
        const files = await scratch({});
        try {
            expect(await loadConfig([files.dir])).toEqual(DEFAULT_CONFIG);
        } finally {
            await files.cleanup();
        }
    });

    test("first directory with a file wins", async () => {
        const first = await scratch({ "wisp.config.yml": "prompt: 'one> '" });
        const second = await scratch({ "wisp.config.yml": "prompt: 'two> '" });
        try {
            const config = await loadConfig([first.dir, second.dir]);
            expect(config.prompt).toBe("one> ");
        } finally {
            await first.cleanup();
            await second.cleanup();
        }
    });

    test("skips directories without a file, even ones that do not exist", async () => {
        const files = await scratch({ "wisp.config.yml": "prompt: 'found> '" });
        try {
            const config = await loadConfig([join(files.dir, "absent"), files.dir]);
            expect(config.prompt).toBe("found> ");
        } finally {
            await files.cleanup();
        }
    });

    test("flags override the file", async () => {
        const files = await scratch({
            "wisp.config.yml": "maxCallDepth: 10\ncolor: false",
        });
        try {
            const config = await loadConfig([files.dir], {
                maxCallDepth: 20,
                color: true,
            });
            expect(config).toEqual({ maxCallDepth: 20, color: true, prompt: "> " });
        } finally {
            await files.cleanup();
        }
    });

    test("rejects a non-positive depth flag", async () => {
        await expect(loadConfig([], { maxCallDepth: 0 })).rejects.toThrow(
            "--max-call-depth: must be a positive integer",
        );
    });
});
