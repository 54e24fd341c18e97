#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { runFile } from "./commands/run";
import { startRepl } from "./commands/repl";
import { printAst, printTokens } from "./commands/inspect";

yargs(hideBin(process.argv))
    .scriptName("wisp")
    .usage("$0 <cmd> [args]")
    .option("max-call-depth", {
        describe: "Nested calls allowed before a stack overflow",
        type: "number",
    })
    .option("color", {
        describe: "Color diagnostics (--no-color to disable)",
        type: "boolean",
    })
    .command(
        "run <file>",
        "Run a wisp script",
        (yargs) =>
            yargs.positional("file", {
                describe: "Path to the script",
                type: "string",
                demandOption: true,
            }),
        async (argv) => {
            process.exitCode = await runFile(argv.file, {
                maxCallDepth: argv.maxCallDepth,
                color: argv.color,
            });
        },
    )
    .command(
        ["repl", "$0"],
        "Start an interactive session",
        (yargs) => yargs,
        async (argv) => {
            process.exitCode = await startRepl({
                maxCallDepth: argv.maxCallDepth,
                color: argv.color,
            });
        },
    )
    .command(
        "tokens <file>",
        "Print the tokens of a script",
        (yargs) =>
            yargs.positional("file", {
                describe: "Path to the script",
                type: "string",
                demandOption: true,
            }),
        async (argv) => {
            process.exitCode = await printTokens(argv.file);
        },
    )
    .command(
        "ast <file>",
        "Print the syntax tree of a script",
        (yargs) =>
            yargs.positional("file", {
                describe: "Path to the script",
                type: "string",
                demandOption: true,
            }),
        async (argv) => {
            process.exitCode = await printAst(argv.file);
        },
    )
    .strict()
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        console.error(e);
        process.exitCode = 1;
    });
