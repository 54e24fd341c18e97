import { Lexer } from "./lexer/Lexer";
import { Parser } from "./parser/Parser";
import { AST } from "./parser/types";
import { Resolver, ResolutionTable, ResolveResult } from "./resolver/Resolver";
import { Interpreter } from "./interpreter/Interpreter";
import { InterpreterOptions } from "./interpreter/Config";
import { Value } from "./interpreter/values";
import { Diagnostic, WispError, isHostRangeError } from "./utils/Error";

export type RunResult =
    | { status: "ok"; value?: Value }
    | {
          status: "compile-error";
          diagnostics: Diagnostic[];
          errors: WispError[];
      }
    | { status: "runtime-error"; diagnostic: Diagnostic; error: WispError };

export type CompileResult =
    | { ok: true; ast: AST; locals: ResolutionTable }
    | { ok: false; errors: WispError[] };

/**
 * Scans, parses and resolves `source`. Lexical and syntax errors are
 * collected together; resolution only runs on a clean parse.
 */
export function compile(source: string): CompileResult {
    const { tokens, errors: lexErrors } = new Lexer(source).tokenize();
    const { ast, errors: parseErrors } = new Parser(tokens, source).parse();

    const errors = [...lexErrors, ...parseErrors];
    if (errors.length > 0) {
        return { ok: false, errors: sortByLocation(errors) };
    }

    let resolved: ResolveResult;
    try {
        resolved = new Resolver(source).resolve(ast);
    } catch (e) {
        if (!isHostRangeError(e)) throw e;
        const error = new WispError(
            "syntax",
            "Program nested too deeply.",
            { line: 1, col: 1 },
            { source },
        );
        return { ok: false, errors: [error] };
    }
    if (resolved.errors.length > 0) {
        return { ok: false, errors: resolved.errors };
    }

    return { ok: true, ast, locals: resolved.locals };
}

function sortByLocation(errors: WispError[]): WispError[] {
    return [...errors].sort(
        (a, b) => a.loc.line - b.loc.line || a.loc.col - b.loc.col,
    );
}

/**
 * A long-lived interpreter. Each `run` sees the globals left by the ones
 * before it.
 */
export class Session {
    private readonly interpreter: Interpreter;

    constructor(options: InterpreterOptions = {}) {
        this.interpreter = new Interpreter(options);
    }

    public run(source: string): RunResult {
        const compiled = compile(source);
        if (!compiled.ok) {
            return {
                status: "compile-error",
                diagnostics: compiled.errors.map((e) => e.toDiagnostic()),
                errors: compiled.errors,
            };
        }

        try {
            const value = this.interpreter.run(
                compiled.ast,
                compiled.locals,
                source,
            );
            return value === undefined ? { status: "ok" } : { status: "ok", value };
        } catch (e) {
            if (e instanceof WispError) {
                return {
                    status: "runtime-error",
                    diagnostic: e.toDiagnostic(),
                    error: e,
                };
            }
            throw e;
        }
    }

    public getGlobal(name: string): Value | undefined {
        return this.interpreter.getGlobal(name);
    }
}

/** Runs one program in a fresh session */
export function run(source: string, options: InterpreterOptions = {}): RunResult {
    return new Session(options).run(source);
}
