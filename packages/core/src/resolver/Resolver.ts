import { Token } from "../lexer/Token";
import { AST } from "../parser/types";
import {
    Expression,
    ResolvableExpression,
} from "../parser/expressions";
import {
    Statement,
    ClassStatement,
    ForStatement,
    FunctionStatement,
} from "../parser/statements";
import { WispError, makeError } from "../utils/Error";
import { assertNever } from "../utils/ast";

/** Hop counts from each local reference to the scope that declares it */
export type ResolutionTable = Map<ResolvableExpression, number>;

export interface ResolveResult {
    locals: ResolutionTable;
    errors: WispError[];
}

type FunctionContext = "none" | "function" | "method" | "initializer";
type ClassContext = "none" | "class" | "subclass";

/**
 * Name → "defined yet". A name is `false` between its declaration and the
 * end of its initializer.
 */
type Scope = Map<string, boolean>;

/**
 * Static pass between parsing and execution. Walks the scopes the
 * interpreter will create and records, for every local variable reference,
 * how many environments out its declaration lives. References that match no
 * enclosing scope are left out of the table and looked up as globals.
 */
export class Resolver {
    private source?: string;
    private scopes: Scope[] = [];
    private locals: ResolutionTable = new Map();
    private errors: WispError[] = [];
    private currentFunction: FunctionContext = "none";
    private currentClass: ClassContext = "none";

    constructor(source?: string) {
        this.source = source;
    }

    public resolve(ast: AST): ResolveResult {
        this.scopes = [];
        this.locals = new Map();
        this.errors = [];
        this.currentFunction = "none";
        this.currentClass = "none";

        this.resolveStatements(ast.statements);
        return { locals: this.locals, errors: this.errors };
    }

    private resolveStatements(statements: Statement[]) {
        for (const stmt of statements) {
            this.resolveStatement(stmt);
        }
    }

    private resolveStatement(stmt: Statement) {
        switch (stmt.kind) {
            case "BlockStatement":
                this.beginScope();
                this.resolveStatements(stmt.statements);
                this.endScope();
                return;

            case "VarStatement":
                this.declare(stmt.name);
                if (stmt.initializer) {
                    this.resolveExpression(stmt.initializer);
                }
                this.define(stmt.name);
                return;

            case "FunctionStatement":
                // Defined before the body so the function can recurse
                this.declare(stmt.name);
                this.define(stmt.name);
                this.resolveFunction(stmt.params, stmt.body, "function");
                return;

            case "ClassStatement":
                this.resolveClass(stmt);
                return;

            case "ExpressionStatement":
            case "PrintStatement":
                this.resolveExpression(stmt.expression);
                return;

            case "IfStatement":
                this.resolveExpression(stmt.condition);
                this.resolveStatement(stmt.thenBranch);
                if (stmt.elseBranch) this.resolveStatement(stmt.elseBranch);
                return;

            case "WhileStatement":
                this.resolveExpression(stmt.condition);
                this.resolveStatement(stmt.body);
                return;

            case "ForStatement":
                this.resolveFor(stmt);
                return;

            case "ReturnStatement":
                if (this.currentFunction === "none") {
                    this.error(stmt.keyword, "Can't return from top-level code.");
                }
                if (stmt.value) {
                    if (this.currentFunction === "initializer") {
                        this.error(
                            stmt.keyword,
                            "Can't return a value from an initializer.",
                        );
                    }
                    this.resolveExpression(stmt.value);
                }
                return;

            default:
                assertNever(stmt, "statement");
        }
    }

    private resolveFor(stmt: ForStatement) {
        // The loop variables live in their own scope, which the interpreter
        // re-creates for each iteration
        this.beginScope();
        if (stmt.initializer) this.resolveStatement(stmt.initializer);
        if (stmt.condition) this.resolveExpression(stmt.condition);
        if (stmt.increment) this.resolveExpression(stmt.increment);
        this.resolveStatement(stmt.body);
        this.endScope();
    }

    private resolveClass(stmt: ClassStatement) {
        const enclosingClass = this.currentClass;
        this.currentClass = "class";

        this.declare(stmt.name);
        this.define(stmt.name);

        if (stmt.superclass) {
            if (stmt.superclass.name.lexeme === stmt.name.lexeme) {
                this.error(
                    stmt.superclass.name,
                    "A class can't inherit from itself.",
                );
            }

            this.currentClass = "subclass";
            this.resolveExpression(stmt.superclass);

            this.beginScope();
            this.currentScope().set("super", true);
        }

        this.beginScope();
        this.currentScope().set("this", true);

        for (const method of stmt.methods) {
            const context: FunctionContext =
                method.name.lexeme === "init" ? "initializer" : "method";
            this.resolveFunction(method.params, method.body, context);
        }

        this.endScope();
        if (stmt.superclass) this.endScope();

        this.currentClass = enclosingClass;
    }

    private resolveFunction(
        params: Token[],
        body: FunctionStatement["body"],
        context: FunctionContext,
    ) {
        const enclosingFunction = this.currentFunction;
        this.currentFunction = context;

        this.beginScope();
        for (const param of params) {
            this.declare(param);
            this.define(param);
        }
        this.resolveStatements(body);
        this.endScope();

        this.currentFunction = enclosingFunction;
    }

    private resolveExpression(expr: Expression) {
        switch (expr.type) {
            case "Variable":
                if (this.scopes.length > 0) {
                    const scope = this.currentScope();
                    if (scope.get(expr.name.lexeme) === false) {
                        this.error(
                            expr.name,
                            "Can't read local variable in its own initializer.",
                        );
                    }
                }
                this.resolveLocal(expr, expr.name);
                return;

            case "Assign":
                this.resolveExpression(expr.value);
                this.resolveLocal(expr, expr.name);
                return;

            case "Binary":
            case "Logical":
                this.resolveExpression(expr.left);
                this.resolveExpression(expr.right);
                return;

            case "Unary":
                this.resolveExpression(expr.right);
                return;

            case "Call":
                this.resolveExpression(expr.callee);
                for (const arg of expr.arguments) {
                    this.resolveExpression(arg);
                }
                return;

            case "Get":
                this.resolveExpression(expr.object);
                return;

            case "Set":
                this.resolveExpression(expr.value);
                this.resolveExpression(expr.object);
                return;

            case "Grouping":
                this.resolveExpression(expr.expression);
                return;

            case "Literal":
                return;

            case "This":
                if (this.currentClass === "none") {
                    this.error(
                        expr.keyword,
                        "Can't use 'this' outside of a class.",
                    );
                    return;
                }
                this.resolveLocal(expr, expr.keyword);
                return;

            case "Super":
                if (this.currentClass === "none") {
                    this.error(
                        expr.keyword,
                        "Can't use 'super' outside of a class.",
                    );
                    return;
                }
                if (this.currentClass !== "subclass") {
                    this.error(
                        expr.keyword,
                        "Can't use 'super' in a class with no superclass.",
                    );
                    return;
                }
                this.resolveLocal(expr, expr.keyword);
                return;

            case "Function":
                this.resolveFunction(expr.params, expr.body, "function");
                return;

            default:
                assertNever(expr, "expression");
        }
    }

    private resolveLocal(expr: ResolvableExpression, name: Token) {
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            if (this.scopes[i].has(name.lexeme)) {
                this.locals.set(expr, this.scopes.length - 1 - i);
                return;
            }
        }
        // Not found: global
    }

    private beginScope() {
        this.scopes.push(new Map());
    }

    private endScope() {
        this.scopes.pop();
    }

    private currentScope(): Scope {
        return this.scopes[this.scopes.length - 1];
    }

    private declare(name: Token) {
        if (this.scopes.length === 0) return;

        const scope = this.currentScope();
        if (scope.has(name.lexeme)) {
            this.error(name, "Already a variable with this name in this scope.");
        }
        scope.set(name.lexeme, false);
    }

    private define(name: Token) {
        if (this.scopes.length === 0) return;
        this.currentScope().set(name.lexeme, true);
    }

    private error(token: Token, message: string) {
        this.errors.push(makeError("resolution", token, message, this.source));
    }
}
