import { readFile } from "node:fs/promises";
import chalk from "chalk";
import { WispError } from "@wisp/core";

import { CliConfig, CliFlags, ConfigError, loadConfig } from "../config";
import { Io } from "../io";

/**
 * Loads the configuration and applies its color setting. Prints the problem
 * and returns `undefined` when the file is invalid.
 */
export async function loadSettings(
    dirs: string[],
    flags: CliFlags,
    io: Io,
): Promise<CliConfig | undefined> {
    try {
        const config = await loadConfig(dirs, flags);
        if (!config.color) chalk.level = 0;
        return config;
    } catch (e) {
        if (e instanceof ConfigError) {
            io.err(chalk.red(`Configuration error: ${e.message}`));
            return undefined;
        }
        throw e;
    }
}

export async function readSource(
    file: string,
    io: Io,
): Promise<string | undefined> {
    try {
        return await readFile(file, "utf-8");
    } catch (e) {
        const reason =
            typeof e === "object" && e !== null && "message" in e
                ? String(e.message)
                : String(e);
        io.err(chalk.red(`Could not read ${file}: ${reason}`));
        return undefined;
    }
}

export function reportErrors(errors: WispError[], io: Io): void {
    for (const error of errors) {
        io.err(error.message);
    }
    const count = errors.length;
    io.err(chalk.red(`\nFound ${count} error${count === 1 ? "" : "s"}.`));
}
