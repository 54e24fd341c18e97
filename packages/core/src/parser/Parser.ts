import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { AST } from "./types";
import { Expression, FunctionExpression } from "./expressions";
import {
    Statement,
    BlockStatement,
    ClassStatement,
    ExpressionStatement,
    ForStatement,
    FunctionStatement,
    IfStatement,
    PrintStatement,
    ReturnStatement,
    VarStatement,
    WhileStatement,
} from "./statements";
import { WispError, isHostRangeError, makeError } from "../utils/Error";

export const MAX_ARITY = 255;

export interface ParseResult {
    ast: AST;
    errors: WispError[];
}

type FunctionKind = "function" | "method";

// Tokens that begin a statement; panic-mode recovery stops in front of them
const STATEMENT_STARTS: TokenType[] = [
    TokenType.Class,
    TokenType.Fun,
    TokenType.Var,
    TokenType.For,
    TokenType.If,
    TokenType.While,
    TokenType.Print,
    TokenType.Return,
];

export class Parser {
    private tokens: Token[];
    private source?: string;
    private current: number = 0;
    private errors: WispError[] = [];

    constructor(tokens: Token[], source?: string) {
        this.tokens = tokens;
        this.source = source;
    }

    public parse(): ParseResult {
        this.current = 0;
        this.errors = [];

        const statements: Statement[] = [];
        while (!this.isAtEnd()) {
            const stmt = this.declaration();
            if (stmt) statements.push(stmt);
        }
        return { ast: { statements }, errors: this.errors };
    }

    /**
     * Parses one declaration. A syntax error is recorded, the parser skips
     * to the next statement boundary and `null` is returned in its place.
     */
    private declaration(): Statement | null {
        try {
            if (this.match(TokenType.Class)) {
                return this.classDeclaration();
            }
            if (
                this.check(TokenType.Fun) &&
                this.peekNext().type === TokenType.Identifier
            ) {
                this.advance();
                return this.functionDeclaration("function");
            }
            if (this.match(TokenType.Var)) {
                return this.varDeclaration();
            }
            return this.statement();
        } catch (e) {
            if (e instanceof WispError) {
                this.errors.push(e);
                this.synchronize();
                return null;
            }
            if (isHostRangeError(e)) {
                this.errors.push(
                    this.error(this.peek(), "Expression nested too deeply."),
                );
                this.synchronize();
                return null;
            }
            throw e;
        }
    }

    private classDeclaration(): ClassStatement {
        const name = this.consume(TokenType.Identifier, "Expect class name.");

        let superclass: ClassStatement["superclass"] = null;
        if (this.match(TokenType.Less)) {
            const superName = this.consume(
                TokenType.Identifier,
                "Expect superclass name.",
            );
            superclass = { type: "Variable", name: superName };
        }

        this.consume(TokenType.LBrace, "Expect '{' before class body.");

        const methods: FunctionStatement[] = [];
        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            methods.push(this.functionDeclaration("method"));
        }

        this.consume(TokenType.RBrace, "Expect '}' after class body.");

        return new ClassStatement(name, superclass, methods);
    }

    private functionDeclaration(kind: FunctionKind): FunctionStatement {
        const name = this.consume(TokenType.Identifier, `Expect ${kind} name.`);
        this.consume(TokenType.LParen, `Expect '(' after ${kind} name.`);
        const params = this.parameters();
        this.consume(TokenType.LBrace, `Expect '{' before ${kind} body.`);
        const body = this.blockStatements();

        return { kind: "FunctionStatement", name, params, body };
    }

    // Parameter list after '(' up to and including ')'
    private parameters(): Token[] {
        const params: Token[] = [];
        if (!this.check(TokenType.RParen)) {
            do {
                if (params.length >= MAX_ARITY) {
                    this.report(
                        this.peek(),
                        `Can't have more than ${MAX_ARITY} parameters.`,
                    );
                }
                params.push(
                    this.consume(TokenType.Identifier, "Expect parameter name."),
                );
            } while (this.match(TokenType.Comma));
        }
        this.consume(TokenType.RParen, "Expect ')' after parameters.");
        return params;
    }

    private varDeclaration(): VarStatement {
        const name = this.consume(
            TokenType.Identifier,
            "Expect variable name.",
        );

        let initializer: Expression | null = null;
        if (this.match(TokenType.Equals)) {
            initializer = this.expression();
        }

        this.consume(
            TokenType.Semicolon,
            "Expect ';' after variable declaration.",
        );
        return new VarStatement(name, initializer);
    }

    private statement(): Statement {
        if (this.match(TokenType.For)) return this.forStatement();
        if (this.match(TokenType.If)) return this.ifStatement();
        if (this.match(TokenType.Print)) return this.printStatement();
        if (this.match(TokenType.Return)) return this.returnStatement();
        if (this.match(TokenType.While)) return this.whileStatement();
        if (this.match(TokenType.LBrace)) return this.blockStatement();

        return this.expressionStatement();
    }

    private forStatement(): ForStatement {
        const keyword = this.previous();
        this.consume(TokenType.LParen, "Expect '(' after 'for'.");

        let initializer: ForStatement["initializer"];
        if (this.match(TokenType.Semicolon)) {
            initializer = null;
        } else if (this.match(TokenType.Var)) {
            initializer = this.varDeclaration();
        } else {
            initializer = this.expressionStatement();
        }

        let condition: Expression | null = null;
        if (!this.check(TokenType.Semicolon)) {
            condition = this.expression();
        }
        this.consume(TokenType.Semicolon, "Expect ';' after loop condition.");

        let increment: Expression | null = null;
        if (!this.check(TokenType.RParen)) {
            increment = this.expression();
        }
        this.consume(TokenType.RParen, "Expect ')' after for clauses.");

        const body = this.statement();

        return {
            kind: "ForStatement",
            keyword,
            initializer,
            condition,
            increment,
            body,
        };
    }

    private ifStatement(): IfStatement {
        const keyword = this.previous();
        this.consume(TokenType.LParen, "Expect '(' after 'if'.");
        const condition = this.expression();
        this.consume(TokenType.RParen, "Expect ')' after if condition.");

        const thenBranch = this.statement();
        let elseBranch: Statement | null = null;
        if (this.match(TokenType.Else)) {
            elseBranch = this.statement();
        }

        return new IfStatement(keyword, condition, thenBranch, elseBranch);
    }

    private printStatement(): PrintStatement {
        const keyword = this.previous();
        const expression = this.expression();
        this.consume(TokenType.Semicolon, "Expect ';' after value.");
        return { kind: "PrintStatement", keyword, expression };
    }

    private returnStatement(): ReturnStatement {
        const keyword = this.previous();
        let value: Expression | null = null;

        if (!this.check(TokenType.Semicolon)) {
            value = this.expression();
        }

        this.consume(TokenType.Semicolon, "Expect ';' after return value.");
        return { kind: "ReturnStatement", keyword, value };
    }

    private whileStatement(): WhileStatement {
        const keyword = this.previous();
        this.consume(TokenType.LParen, "Expect '(' after 'while'.");
        const condition = this.expression();
        this.consume(TokenType.RParen, "Expect ')' after condition.");
        const body = this.statement();

        return { kind: "WhileStatement", keyword, condition, body };
    }

    private blockStatement(): BlockStatement {
        return { kind: "BlockStatement", statements: this.blockStatements() };
    }

    // Declarations after '{' up to and including '}'
    private blockStatements(): Statement[] {
        const statements: Statement[] = [];

        while (!this.check(TokenType.RBrace) && !this.isAtEnd()) {
            const stmt = this.declaration();
            if (stmt) statements.push(stmt);
        }

        this.consume(TokenType.RBrace, "Expect '}' after block.");
        return statements;
    }

    private expressionStatement(): ExpressionStatement {
        const expression = this.expression();
        this.consume(TokenType.Semicolon, "Expect ';' after expression.");
        return { kind: "ExpressionStatement", expression };
    }

    private expression(): Expression {
        return this.assignment();
    }

    private assignment(): Expression {
        const expr = this.or();

        if (this.match(TokenType.Equals)) {
            const equals = this.previous();
            const value = this.assignment();

            if (expr.type === "Variable") {
                return { type: "Assign", name: expr.name, value };
            }
            if (expr.type === "Get") {
                return {
                    type: "Set",
                    object: expr.object,
                    name: expr.name,
                    value,
                };
            }

            // Reported without unwinding: the parser is not confused here
            this.report(equals, "Invalid assignment target.");
        }

        return expr;
    }

    private or(): Expression {
        let left = this.and();

        while (this.match(TokenType.Or)) {
            const operator = this.previous();
            const right = this.and();
            left = { type: "Logical", left, operator, right };
        }

        return left;
    }

    private and(): Expression {
        let left = this.equality();

        while (this.match(TokenType.And)) {
            const operator = this.previous();
            const right = this.equality();
            left = { type: "Logical", left, operator, right };
        }

        return left;
    }

    private equality(): Expression {
        let left = this.comparison();

        while (this.match(TokenType.BangEquals, TokenType.EqualsEquals)) {
            const operator = this.previous();
            const right = this.comparison();
            left = { type: "Binary", left, operator, right };
        }

        return left;
    }

    private comparison(): Expression {
        let left = this.term();

        while (
            this.match(
                TokenType.Greater,
                TokenType.GreaterEquals,
                TokenType.Less,
                TokenType.LessEquals,
            )
        ) {
            const operator = this.previous();
            const right = this.term();
            left = { type: "Binary", left, operator, right };
        }

        return left;
    }

    private term(): Expression {
        let left = this.factor();

        while (this.match(TokenType.PlusOp, TokenType.MinusOp)) {
            const operator = this.previous();
            const right = this.factor();
            left = { type: "Binary", left, operator, right };
        }

        return left;
    }

    private factor(): Expression {
        let left = this.unary();

        while (this.match(TokenType.MultiplyOp, TokenType.DivideOp)) {
            const operator = this.previous();
            const right = this.unary();
            left = { type: "Binary", left, operator, right };
        }

        return left;
    }

    private unary(): Expression {
        if (this.match(TokenType.Bang, TokenType.MinusOp)) {
            const operator = this.previous();
            const right = this.unary();
            return { type: "Unary", operator, right };
        }

        return this.call();
    }

    private call(): Expression {
        let expr = this.primary();

        for (;;) {
            if (this.match(TokenType.LParen)) {
                expr = this.finishCall(expr);
            } else if (this.match(TokenType.Dot)) {
                const name = this.consume(
                    TokenType.Identifier,
                    "Expect property name after '.'.",
                );
                expr = { type: "Get", object: expr, name };
            } else {
                break;
            }
        }

        return expr;
    }

    private finishCall(callee: Expression): Expression {
        const args: Expression[] = [];
        if (!this.check(TokenType.RParen)) {
            do {
                if (args.length >= MAX_ARITY) {
                    this.report(
                        this.peek(),
                        `Can't have more than ${MAX_ARITY} arguments.`,
                    );
                }
                args.push(this.expression());
            } while (this.match(TokenType.Comma));
        }
        const paren = this.consume(
            TokenType.RParen,
            "Expect ')' after arguments.",
        );
        return { type: "Call", callee, paren, arguments: args };
    }

    private primary(): Expression {
        if (this.match(TokenType.False)) {
            return { type: "Literal", value: false, token: this.previous() };
        }
        if (this.match(TokenType.True)) {
            return { type: "Literal", value: true, token: this.previous() };
        }
        if (this.match(TokenType.Nil)) {
            return { type: "Literal", value: null, token: this.previous() };
        }
        if (this.match(TokenType.NumberLiteral, TokenType.StringLiteral)) {
            const token = this.previous();
            return { type: "Literal", value: token.literal ?? null, token };
        }
        if (this.match(TokenType.This)) {
            return { type: "This", keyword: this.previous() };
        }
        if (this.match(TokenType.Super)) {
            const keyword = this.previous();
            this.consume(TokenType.Dot, "Expect '.' after 'super'.");
            const method = this.consume(
                TokenType.Identifier,
                "Expect superclass method name.",
            );
            return { type: "Super", keyword, method };
        }
        if (this.match(TokenType.Identifier)) {
            return { type: "Variable", name: this.previous() };
        }
        if (this.match(TokenType.Fun)) {
            return this.functionLiteral();
        }
        if (this.match(TokenType.LParen)) {
            const expression = this.expression();
            this.consume(TokenType.RParen, "Expect ')' after expression.");
            return { type: "Grouping", expression };
        }

        throw this.error(this.peek(), "Expect expression.");
    }

    private functionLiteral(): FunctionExpression {
        const keyword = this.previous();
        this.consume(TokenType.LParen, "Expect '(' after 'fun'.");
        const params = this.parameters();
        this.consume(TokenType.LBrace, "Expect '{' before function body.");
        const body = this.blockStatements();

        return { type: "Function", keyword, params, body };
    }

    /**
     * Skips tokens until just past a ';' or just before a keyword that
     * starts a statement.
     */
    private synchronize() {
        this.advance();

        while (!this.isAtEnd()) {
            if (this.previous().type === TokenType.Semicolon) return;
            if (STATEMENT_STARTS.includes(this.peek().type)) return;
            this.advance();
        }
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();
        throw this.error(this.peek(), message);
    }

    private check(...types: TokenType[]): boolean {
        if (this.isAtEnd()) return false;
        const currentType = this.peek().type;
        return types.includes(currentType);
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private peekNext(): Token {
        if (this.current + 1 >= this.tokens.length)
            return this.tokens[this.tokens.length - 1]; // Return EOF if out of bounds
        return this.tokens[this.current + 1];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private report(token: Token, message: string) {
        this.errors.push(this.error(token, message));
    }

    private error(token: Token, message: string): WispError {
        return makeError("syntax", token, message, this.source);
    }
}
