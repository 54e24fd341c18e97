import { Lexer, Parser, printStatement } from "@wisp/core";

import { ExitCode, Io, consoleIo } from "../io";
import { readSource, reportErrors } from "./shared";

/** `wisp tokens <file>`: one `line:col TYPE lexeme` line per token */
export async function printTokens(
    file: string,
    io: Io = consoleIo,
): Promise<number> {
    const source = await readSource(file, io);
    if (source === undefined) return ExitCode.NoInput;

    const { tokens, errors } = new Lexer(source).tokenize();
    for (const token of tokens) {
        const lexeme = token.lexeme === "" ? "" : ` ${token.lexeme}`;
        io.out(`${token.line}:${token.col} ${token.type}${lexeme}`);
    }

    if (errors.length > 0) {
        reportErrors(errors, io);
        return ExitCode.CompileError;
    }
    return ExitCode.Ok;
}

/** `wisp ast <file>`: each top-level statement in prefix form */
export async function printAst(
    file: string,
    io: Io = consoleIo,
): Promise<number> {
    const source = await readSource(file, io);
    if (source === undefined) return ExitCode.NoInput;

    const lexed = new Lexer(source).tokenize();
    const { ast, errors } = new Parser(lexed.tokens, source).parse();

    const all = [...lexed.errors, ...errors];
    if (all.length > 0) {
        reportErrors(all, io);
        return ExitCode.CompileError;
    }

    for (const stmt of ast.statements) {
        io.out(printStatement(stmt));
    }
    return ExitCode.Ok;
}
