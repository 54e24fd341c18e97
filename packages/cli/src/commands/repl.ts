import { createInterface } from "node:readline";
import chalk from "chalk";
import { RunResult, Session, stringify } from "@wisp/core";

import { CliFlags } from "../config";
import { ExitCode, Io, consoleIo } from "../io";
import { loadSettings } from "./shared";

/**
 * Runs one REPL line. A line that fails to compile and does not end in `;`
 * or `}` is retried with a `;` on a line of its own, so `1 + 2` works as an
 * expression even with a trailing `//` comment.
 */
export function evalLine(session: Session, line: string, io: Io): RunResult {
    const trimmed = line.trim();
    if (trimmed === "") return { status: "ok" };

    let result = session.run(line);
    if (
        result.status === "compile-error" &&
        !trimmed.endsWith(";") &&
        !trimmed.endsWith("}")
    ) {
        const retry = session.run(`${line}\n;`);
        if (retry.status !== "compile-error") result = retry;
    }

    switch (result.status) {
        case "ok":
            if (result.value !== undefined) io.out(stringify(result.value));
            break;
        case "compile-error":
            for (const error of result.errors) io.err(error.message);
            break;
        case "runtime-error":
            io.err(result.error.message);
            break;
    }
    return result;
}

/** `wisp repl`: reads lines from stdin until it closes */
export async function startRepl(
    flags: CliFlags = {},
    io: Io = consoleIo,
): Promise<number> {
    const config = await loadSettings([process.cwd()], flags, io);
    if (!config) return ExitCode.Config;

    const session = new Session({
        output: io.out,
        maxCallDepth: config.maxCallDepth,
    });

    const rl = createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: config.prompt,
    });

    io.out(chalk.gray("wisp REPL. Press Ctrl+D to exit."));
    rl.prompt();
    for await (const line of rl) {
        evalLine(session, line, io);
        rl.prompt();
    }
    return ExitCode.Ok;
}
