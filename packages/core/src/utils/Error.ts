import chalk from "chalk";

import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";

export type ErrorCategory = "lexical" | "syntax" | "resolution" | "runtime";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
}

/**
 * Plain-data form of a {@link WispError}, handed to hosts.
 */
export interface Diagnostic {
    category: ErrorCategory;
    message: string;
    line: number;
    col: number;
    /** `at 'lexeme'` or `at end`, when the error points at a token */
    where?: string;
}

export interface WispErrorOptions {
    where?: string;
    source?: string;
    hint?: string;
}

const CATEGORY_LABELS: Record<ErrorCategory, string> = {
    lexical: "Lexical error",
    syntax: "Syntax error",
    resolution: "Resolution error",
    runtime: "Runtime error",
};

export class WispError extends Error {
    public readonly rawMessage: string;
    public readonly category: ErrorCategory;
    public readonly loc: ErrorLocation;
    public readonly where?: string;
    public readonly source?: string;
    public readonly hint?: string;

    constructor(
        category: ErrorCategory,
        message: string,
        loc: ErrorLocation,
        options: WispErrorOptions = {},
    ) {
        super(formatReport(category, message, loc, options));
        this.name = "WispError";
        this.rawMessage = message;
        this.category = category;
        this.loc = loc;
        this.where = options.where;
        this.source = options.source;
        this.hint = options.hint;
    }

    public toDiagnostic(): Diagnostic {
        const diagnostic: Diagnostic = {
            category: this.category,
            message: this.rawMessage,
            line: this.loc.line,
            col: this.loc.col,
        };
        if (this.where) diagnostic.where = this.where;
        return diagnostic;
    }
}

/**
 * Renders the colored report:
 *
 *   Syntax error: Expect ';' after value. (at end)
 *    --> line 1:10
 *     |
 *   1 | print 1 + 2
 *     |          ^
 */
function formatReport(
    category: ErrorCategory,
    message: string,
    loc: ErrorLocation,
    options: WispErrorOptions,
): string {
    const where = options.where ? ` ${chalk.gray(`(${options.where})`)}` : "";
    const errorHeader = `${chalk.red.bold(`${CATEGORY_LABELS[category]}:`)} ${chalk.bold(message)}${where}`;

    if (!options.source) {
        return `${errorHeader} ${chalk.blue(`[line ${loc.line}]`)}`;
    }

    const lines = options.source.split("\n");
    const lineContent = lines[loc.line - 1] ?? "";

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);

    const locationLine = `${chalk.blue(padding)} ${chalk.blue("-->")} line ${loc.line}:${loc.col}`;
    const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
    const codeLine = `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`;

    const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
    const underlineLen = Math.max(1, loc.len ?? 1);
    const pointer = chalk.red.bold("^".repeat(underlineLen));
    const pointerLine = `${chalk.blue(padding)} ${chalk.blue("|")} ${pointerSpace}${pointer}`;

    const output = [errorHeader, locationLine, pipeLine, codeLine, pointerLine];

    if (options.hint) {
        output.push(`${chalk.blue(padding)} ${chalk.blue("=")} ${options.hint}`);
    }

    return output.join("\n");
}

/**
 * True for a RangeError raised by the host, e.g. on stack exhaustion or an
 * oversized string. Checked by name so errors from another realm match.
 */
export function isHostRangeError(e: unknown): e is RangeError {
    return (
        typeof e === "object" &&
        e !== null &&
        "name" in e &&
        e.name === "RangeError" &&
        "message" in e &&
        typeof e.message === "string"
    );
}

/**
 * One-line, uncolored form: `[line 3] Error at 'x': message`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
    const where = diagnostic.where ? ` ${diagnostic.where}` : "";
    return `[line ${diagnostic.line}] Error${where}: ${diagnostic.message}`;
}

/**
 * Creates an error pointing at a token, with the `at '...'` / `at end`
 * location the diagnostics print.
 */
export function makeError(
    category: ErrorCategory,
    token: Token,
    message: string,
    source?: string,
    hint?: string,
): WispError {
    const where =
        token.type === TokenType.EOF ? "at end" : `at '${token.lexeme}'`;
    return new WispError(
        category,
        message,
        { line: token.line, col: token.col, len: token.lexeme.length },
        { where, source, hint },
    );
}
