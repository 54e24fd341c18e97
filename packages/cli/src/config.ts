import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { load, YAMLException } from "js-yaml";
import { DEFAULT_MAX_CALL_DEPTH } from "@wisp/core";

export const CONFIG_FILE = "wisp.config.yml";

export interface CliConfig {
    maxCallDepth: number;
    color: boolean;
    prompt: string;
}

/** Command-line flags that take precedence over the file */
export interface CliFlags {
    maxCallDepth?: number;
    color?: boolean;
}

export const DEFAULT_CONFIG: CliConfig = {
    maxCallDepth: DEFAULT_MAX_CALL_DEPTH,
    color: true,
    prompt: "> ",
};

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly path: string,
    ) {
        super(`${path}: ${message}`);
        this.name = "ConfigError";
    }
}

/**
 * Validates the parsed YAML document. An empty file gives the defaults.
 */
export function parseConfig(text: string, path: string): CliConfig {
    let raw: unknown;
    try {
        raw = load(text);
    } catch (e) {
        if (e instanceof YAMLException) {
            throw new ConfigError(e.message, path);
        }
        throw e;
    }

    const config: CliConfig = { ...DEFAULT_CONFIG };
    if (raw === undefined || raw === null) return config;

    if (typeof raw !== "object" || Array.isArray(raw)) {
        throw new ConfigError("expected a mapping of settings", path);
    }

    for (const [key, entry] of Object.entries(raw)) {
        const value: unknown = entry;
        switch (key) {
            case "maxCallDepth":
                if (
                    typeof value !== "number" ||
                    !Number.isInteger(value) ||
                    value < 1
                ) {
                    throw new ConfigError(
                        "'maxCallDepth' must be a positive integer",
                        path,
                    );
                }
                config.maxCallDepth = value;
                break;
            case "color":
                if (typeof value !== "boolean") {
                    throw new ConfigError("'color' must be true or false", path);
                }
                config.color = value;
                break;
            case "prompt":
                if (typeof value !== "string") {
                    throw new ConfigError("'prompt' must be a string", path);
                }
                config.prompt = value;
                break;
            default:
                throw new ConfigError(`unknown setting '${key}'`, path);
        }
    }
    return config;
}

/**
 * Reads the first config file found in `dirs`, in order, then applies the
 * flags on top.
 */
export async function loadConfig(
    dirs: string[],
    flags: CliFlags = {},
): Promise<CliConfig> {
    let config = DEFAULT_CONFIG;
    for (const dir of dirs) {
        const path = join(dir, CONFIG_FILE);
        const text = await readOptional(path);
        if (text !== undefined) {
            config = parseConfig(text, path);
            break;
        }
    }

    if (
        flags.maxCallDepth !== undefined &&
        !(Number.isInteger(flags.maxCallDepth) && flags.maxCallDepth > 0)
    ) {
        throw new ConfigError(
            "must be a positive integer",
            "--max-call-depth",
        );
    }

    return {
        ...config,
        maxCallDepth: flags.maxCallDepth ?? config.maxCallDepth,
        color: flags.color ?? config.color,
    };
}

async function readOptional(path: string): Promise<string | undefined> {
    try {
        return await readFile(path, "utf-8");
    } catch (e) {
        if (isNotFound(e)) return undefined;
        throw e;
    }
}

function isNotFound(e: unknown): boolean {
    return (
        typeof e === "object" && e !== null && "code" in e && e.code === "ENOENT"
    );
}
