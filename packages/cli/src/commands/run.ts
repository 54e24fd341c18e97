import { dirname, resolve } from "node:path";
import { Session } from "@wisp/core";

import { CliFlags } from "../config";
import { ExitCode, Io, consoleIo } from "../io";
import { loadSettings, readSource, reportErrors } from "./shared";

/**
 * `wisp run <file>`. Looks for the config beside the script first, then in
 * the working directory.
 * @returns the process exit code
 */
export async function runFile(
    file: string,
    flags: CliFlags = {},
    io: Io = consoleIo,
): Promise<number> {
    const config = await loadSettings(
        [dirname(resolve(file)), process.cwd()],
        flags,
        io,
    );
    if (!config) return ExitCode.Config;

    const source = await readSource(file, io);
    if (source === undefined) return ExitCode.NoInput;

    const session = new Session({
        output: io.out,
        maxCallDepth: config.maxCallDepth,
    });
    const result = session.run(source);

    switch (result.status) {
        case "ok":
            return ExitCode.Ok;
        case "compile-error":
            reportErrors(result.errors, io);
            return ExitCode.CompileError;
        case "runtime-error":
            io.err(result.error.message);
            return ExitCode.RuntimeError;
    }
}
