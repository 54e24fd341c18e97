import { Token } from "./Token";
import { TokenType } from "./TokenType";
import { WispError } from "../utils/Error";

const KEYWORDS = new Map<string, TokenType>([
    ["and", TokenType.And],
    ["class", TokenType.Class],
    ["else", TokenType.Else],
    ["false", TokenType.False],
    ["for", TokenType.For],
    ["fun", TokenType.Fun],
    ["if", TokenType.If],
    ["nil", TokenType.Nil],
    ["or", TokenType.Or],
    ["print", TokenType.Print],
    ["return", TokenType.Return],
    ["super", TokenType.Super],
    ["this", TokenType.This],
    ["true", TokenType.True],
    ["var", TokenType.Var],
    ["while", TokenType.While],
]);

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
    "(": TokenType.LParen,
    ")": TokenType.RParen,
    "{": TokenType.LBrace,
    "}": TokenType.RBrace,
    ",": TokenType.Comma,
    ".": TokenType.Dot,
    ";": TokenType.Semicolon,
    "+": TokenType.PlusOp,
    "-": TokenType.MinusOp,
    "*": TokenType.MultiplyOp,
};

// Operators that may be followed by '=' to form a two-character operator
const EQUALS_PAIRS: Record<string, [TokenType, TokenType]> = {
    "!": [TokenType.Bang, TokenType.BangEquals],
    "=": [TokenType.Equals, TokenType.EqualsEquals],
    "<": [TokenType.Less, TokenType.LessEquals],
    ">": [TokenType.Greater, TokenType.GreaterEquals],
};

export interface LexResult {
    tokens: Token[];
    errors: WispError[];
}

export class Lexer {
    private input: string;
    private position: number = 0;
    private line: number = 1;
    private col: number = 1;

    // Start of the token being scanned
    private start: number = 0;
    private startLine: number = 1;
    private startCol: number = 1;

    private errors: WispError[] = [];

    constructor(input: string) {
        this.input = input;
    }

    public tokenize(): LexResult {
        const tokens: Token[] = [];
        this.errors = [];

        while (this.position < this.input.length) {
            this.start = this.position;
            this.startLine = this.line;
            this.startCol = this.col;

            const char = this.currentChar();

            if (this.isWhitespace(char)) {
                this.advance();
                continue;
            }

            if (char === "/" && this.peekChar() === "/") {
                this.skipComment();
                continue;
            }

            if (char === "/") {
                this.advance();
                tokens.push(this.createToken(TokenType.DivideOp));
                continue;
            }

            const single = SINGLE_CHAR_TOKENS[char];
            if (single) {
                this.advance();
                tokens.push(this.createToken(single));
                continue;
            }

            const pair = EQUALS_PAIRS[char];
            if (pair) {
                this.advance();
                if (this.currentChar() === "=") {
                    this.advance();
                    tokens.push(this.createToken(pair[1]));
                } else {
                    tokens.push(this.createToken(pair[0]));
                }
                continue;
            }

            if (char === '"') {
                const token = this.readString();
                if (token) tokens.push(token);
                continue;
            }

            if (this.isAlpha(char)) {
                tokens.push(this.readIdentifier());
                continue;
            }

            if (this.isDigit(char)) {
                tokens.push(this.readNumber());
                continue;
            }

            this.advance();
            this.errors.push(
                this.error(`Unexpected character '${char}'.`, 1),
            );
        }

        this.start = this.position;
        this.startLine = this.line;
        this.startCol = this.col;
        tokens.push(this.createToken(TokenType.EOF));

        return { tokens, errors: this.errors };
    }

    private createToken(type: TokenType, literal?: number | string): Token {
        const lexeme = this.input.substring(this.start, this.position);
        const token: Token =
            literal === undefined
                ? { type, lexeme, line: this.startLine, col: this.startCol }
                : {
                      type,
                      lexeme,
                      literal,
                      line: this.startLine,
                      col: this.startCol,
                  };
        return token;
    }

    private error(message: string, len: number): WispError {
        return new WispError(
            "lexical",
            message,
            { line: this.startLine, col: this.startCol, len },
            { source: this.input },
        );
    }

    private advance() {
        if (this.currentChar() === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        this.position++;
    }

    private currentChar(): string {
        return this.input.charAt(this.position);
    }

    private peekChar(offset = 1): string {
        return this.input.charAt(this.position + offset);
    }

    private isWhitespace(char: string): boolean {
        return /\s/.test(char);
    }

    private isAlpha(char: string): boolean {
        return /[a-zA-Z_]/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /[a-zA-Z0-9_]/.test(char);
    }

    private isDigit(char: string): boolean {
        return /[0-9]/.test(char);
    }

    private readNumber(): Token {
        while (
            this.position < this.input.length &&
            this.isDigit(this.currentChar())
        ) {
            this.advance();
        }

        if (this.currentChar() === "." && this.isDigit(this.peekChar())) {
            this.advance(); // consume dot

            while (
                this.position < this.input.length &&
                this.isDigit(this.currentChar())
            ) {
                this.advance();
            }
        }

        const text = this.input.substring(this.start, this.position);
        return this.createToken(TokenType.NumberLiteral, parseFloat(text));
    }

    /**
     * Strings end at the closing quote and may not span lines. When a
     * newline or the end of input comes first, the error is recorded and
     * scanning picks up on the next line.
     */
    private readString(): Token | null {
        this.advance(); // skip opening quote

        while (
            this.position < this.input.length &&
            this.currentChar() !== '"' &&
            this.currentChar() !== "\n"
        ) {
            this.advance();
        }

        if (this.currentChar() !== '"') {
            this.errors.push(
                this.error(
                    "Unterminated string.",
                    this.position - this.start,
                ),
            );
            if (this.currentChar() === "\n") this.advance();
            return null;
        }

        this.advance(); // skip closing quote

        const value = this.input.substring(this.start + 1, this.position - 1);
        return this.createToken(TokenType.StringLiteral, value);
    }

    private readIdentifier(): Token {
        while (
            this.position < this.input.length &&
            this.isAlphaNumeric(this.currentChar())
        ) {
            this.advance();
        }

        const value = this.input.substring(this.start, this.position);
        const type = KEYWORDS.get(value) ?? TokenType.Identifier;
        return this.createToken(type);
    }

    private skipComment() {
        while (
            this.position < this.input.length &&
            this.currentChar() !== "\n"
        ) {
            this.advance();
        }
    }
}
