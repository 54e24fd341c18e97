import { NativeHost, natives as standardLibrary } from "@wisp/library";

import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { AST } from "../parser/types";
import {
    BinaryExpression,
    CallExpression,
    Expression,
    ResolvableExpression,
    SuperExpression,
} from "../parser/expressions";
import {
    Statement,
    ClassStatement,
    ForStatement,
} from "../parser/statements";
import { ResolutionTable } from "../resolver/Resolver";
import { WispError, isHostRangeError, makeError } from "../utils/Error";
import { assertNever } from "../utils/ast";
import {
    DEFAULT_MAX_CALL_DEPTH,
    InterpreterOptions,
    writeToStdout,
} from "./Config";
import { Environment } from "./Environment";
import {
    Callable,
    ClassObject,
    Instance,
    NativeFunction,
    UserFunction,
    Value,
    describeValue,
    isEqual,
    isTruthy,
    stringify,
} from "./values";

/**
 * How a statement finished. `return` travels back up through blocks and
 * loops as a value until a call consumes it.
 */
export type Completion = { type: "normal" } | { type: "return"; value: Value };

const NORMAL: Completion = { type: "normal" };

/**
 * One interpreter session. It owns the global environment; every `run`
 * executes against the same globals, so definitions persist between runs.
 */
export class Interpreter {
    public readonly globals: Environment = new Environment();
    public readonly host: NativeHost = { stringify };

    private environment: Environment = this.globals;
    // Keyed weakly: entries go once no surviving code refers to the node
    private locals = new WeakMap<ResolvableExpression, number>();
    private source?: string;

    private readonly output: (line: string) => void;
    private readonly maxCallDepth: number;
    private callDepth = 0;

    constructor(options: InterpreterOptions = {}) {
        this.output = options.output ?? writeToStdout;
        this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
        this.initializeBuiltins(options.natives ?? standardLibrary);
    }

    private initializeBuiltins(natives: NonNullable<InterpreterOptions["natives"]>) {
        for (const [name, definition] of Object.entries(natives)) {
            this.globals.define(name, new NativeFunction(name, definition));
        }
    }

    /**
     * Executes a resolved program. Throws a runtime {@link WispError} on the
     * first failure; output printed before it stays printed.
     *
     * @returns the value of the final statement when it is an expression
     * statement, for REPL echo
     */
    public run(
        ast: AST,
        locals: ResolutionTable,
        source?: string,
    ): Value | undefined {
        this.source = source;
        this.environment = this.globals;
        this.callDepth = 0;
        for (const [expr, distance] of locals) {
            this.locals.set(expr, distance);
        }

        let last: Value | undefined;
        for (const stmt of ast.statements) {
            if (stmt.kind === "ExpressionStatement") {
                last = this.evaluate(stmt.expression);
                continue;
            }
            last = undefined;
            this.execute(stmt);
        }
        return last;
    }

    public getGlobal(name: string): Value | undefined {
        return this.globals.get(name);
    }

    public execute(stmt: Statement): Completion {
        switch (stmt.kind) {
            case "ExpressionStatement":
                this.evaluate(stmt.expression);
                return NORMAL;

            case "PrintStatement":
                this.output(stringify(this.evaluate(stmt.expression)));
                return NORMAL;

            case "VarStatement": {
                const value = stmt.initializer
                    ? this.evaluate(stmt.initializer)
                    : null;
                this.environment.define(stmt.name.lexeme, value);
                return NORMAL;
            }

            case "BlockStatement":
                return this.executeBlock(
                    stmt.statements,
                    new Environment(this.environment),
                );

            case "IfStatement":
                if (isTruthy(this.evaluate(stmt.condition))) {
                    return this.execute(stmt.thenBranch);
                }
                if (stmt.elseBranch) {
                    return this.execute(stmt.elseBranch);
                }
                return NORMAL;

            case "WhileStatement":
                while (isTruthy(this.evaluate(stmt.condition))) {
                    const completion = this.execute(stmt.body);
                    if (completion.type === "return") return completion;
                }
                return NORMAL;

            case "ForStatement":
                return this.executeFor(stmt);

            case "FunctionStatement": {
                const fn = new UserFunction(
                    stmt.name.lexeme,
                    stmt.params,
                    stmt.body,
                    this.environment,
                );
                this.environment.define(stmt.name.lexeme, fn);
                return NORMAL;
            }

            case "ReturnStatement": {
                const value = stmt.value ? this.evaluate(stmt.value) : null;
                return { type: "return", value };
            }

            case "ClassStatement":
                this.executeClass(stmt);
                return NORMAL;

            default:
                return assertNever(stmt, "statement");
        }
    }

    /**
     * Runs statements in `environment`, restoring the current environment
     * afterwards even when a runtime error unwinds through here.
     */
    public executeBlock(
        statements: Statement[],
        environment: Environment,
    ): Completion {
        const previous = this.environment;
        try {
            this.environment = environment;
            for (const stmt of statements) {
                const completion = this.execute(stmt);
                if (completion.type === "return") return completion;
            }
            return NORMAL;
        } finally {
            this.environment = previous;
        }
    }

    /**
     * The initializer runs once in the loop scope. Each iteration then works
     * on its own copy of that scope, taken before the condition and again
     * before the increment, so closures made in the body keep the values of
     * their iteration.
     */
    private executeFor(stmt: ForStatement): Completion {
        const previous = this.environment;
        try {
            const loopScope = new Environment(previous);
            this.environment = loopScope;
            if (stmt.initializer) this.execute(stmt.initializer);

            let iteration = loopScope.copy();
            for (;;) {
                this.environment = iteration;
                if (
                    stmt.condition &&
                    !isTruthy(this.evaluate(stmt.condition))
                ) {
                    return NORMAL;
                }

                const completion = this.execute(stmt.body);
                if (completion.type === "return") return completion;

                iteration = iteration.copy();
                this.environment = iteration;
                if (stmt.increment) this.evaluate(stmt.increment);
            }
        } finally {
            this.environment = previous;
        }
    }

    private executeClass(stmt: ClassStatement) {
        let superclass: ClassObject | null = null;
        if (stmt.superclass) {
            const value = this.evaluate(stmt.superclass);
            if (!(value instanceof ClassObject)) {
                throw this.runtimeError(
                    stmt.superclass.name,
                    "Superclass must be a class.",
                    `'${stmt.superclass.name.lexeme}' is ${describeValue(value)}.`,
                );
            }
            superclass = value;
        }

        // Declared first so methods can refer to the class by name
        this.environment.define(stmt.name.lexeme, null);

        let methodScope = this.environment;
        if (superclass) {
            methodScope = new Environment(this.environment);
            methodScope.define("super", superclass);
        }

        const methods = new Map<string, UserFunction>();
        for (const method of stmt.methods) {
            const name = method.name.lexeme;
            methods.set(
                name,
                new UserFunction(
                    name,
                    method.params,
                    method.body,
                    methodScope,
                    name === "init",
                ),
            );
        }

        const klass = new ClassObject(stmt.name.lexeme, superclass, methods);
        this.environment.assign(stmt.name.lexeme, klass);
    }

    public evaluate(expr: Expression): Value {
        switch (expr.type) {
            case "Literal":
                return expr.value;

            case "Grouping":
                return this.evaluate(expr.expression);

            case "Variable":
                return this.lookUpVariable(expr.name, expr);

            case "Assign": {
                const value = this.evaluate(expr.value);
                const distance = this.locals.get(expr);
                if (distance !== undefined) {
                    this.environment.assignAt(
                        distance,
                        expr.name.lexeme,
                        value,
                    );
                } else if (!this.globals.assign(expr.name.lexeme, value)) {
                    throw this.runtimeError(
                        expr.name,
                        `Undefined variable '${expr.name.lexeme}'.`,
                    );
                }
                return value;
            }

            case "Unary": {
                const right = this.evaluate(expr.right);
                if (expr.operator.type === TokenType.Bang) {
                    return !isTruthy(right);
                }
                if (typeof right !== "number") {
                    throw this.runtimeError(
                        expr.operator,
                        "Operand must be a number.",
                    );
                }
                return -right;
            }

            case "Binary":
                return this.evaluateBinary(expr);

            case "Logical": {
                const left = this.evaluate(expr.left);
                if (expr.operator.type === TokenType.Or) {
                    if (isTruthy(left)) return left;
                } else if (!isTruthy(left)) {
                    return left;
                }
                return this.evaluate(expr.right);
            }

            case "Call":
                return this.evaluateCall(expr);

            case "Get": {
                const object = this.evaluate(expr.object);
                if (!(object instanceof Instance)) {
                    throw this.runtimeError(
                        expr.name,
                        "Only instances have properties.",
                    );
                }
                const value = object.get(expr.name.lexeme);
                if (value === undefined) {
                    throw this.undefinedProperty(expr.name);
                }
                return value;
            }

            case "Set": {
                const object = this.evaluate(expr.object);
                if (!(object instanceof Instance)) {
                    throw this.runtimeError(
                        expr.name,
                        "Only instances have fields.",
                    );
                }
                const value = this.evaluate(expr.value);
                object.set(expr.name.lexeme, value);
                return value;
            }

            case "This":
                return this.lookUpVariable(expr.keyword, expr);

            case "Super":
                return this.evaluateSuper(expr);

            case "Function":
                return new UserFunction(
                    null,
                    expr.params,
                    expr.body,
                    this.environment,
                );

            default:
                return assertNever(expr, "expression");
        }
    }

    private evaluateBinary(expr: BinaryExpression): Value {
        const left = this.evaluate(expr.left);
        const right = this.evaluate(expr.right);
        const operator = expr.operator;

        switch (operator.type) {
            case TokenType.PlusOp:
                if (typeof left === "number" && typeof right === "number") {
                    return left + right;
                }
                if (typeof left === "string" && typeof right === "string") {
                    return this.concat(left, right, operator);
                }
                throw this.runtimeError(
                    operator,
                    "Operands must be two numbers or two strings.",
                );

            case TokenType.MinusOp: {
                const [l, r] = this.numberOperands(operator, left, right);
                return l - r;
            }
            case TokenType.MultiplyOp: {
                const [l, r] = this.numberOperands(operator, left, right);
                return l * r;
            }
            case TokenType.DivideOp: {
                const [l, r] = this.numberOperands(operator, left, right);
                if (r === 0) {
                    throw this.runtimeError(operator, "Division by zero.");
                }
                return l / r;
            }

            case TokenType.Greater: {
                const [l, r] = this.numberOperands(operator, left, right);
                return l > r;
            }
            case TokenType.GreaterEquals: {
                const [l, r] = this.numberOperands(operator, left, right);
                return l >= r;
            }
            case TokenType.Less: {
                const [l, r] = this.numberOperands(operator, left, right);
                return l < r;
            }
            case TokenType.LessEquals: {
                const [l, r] = this.numberOperands(operator, left, right);
                return l <= r;
            }

            case TokenType.EqualsEquals:
                return isEqual(left, right);
            case TokenType.BangEquals:
                return !isEqual(left, right);

            default:
                throw new Error(`Unknown binary operator ${operator.type}`);
        }
    }

    private evaluateCall(expr: CallExpression): Value {
        const callee = this.evaluate(expr.callee);

        const args: Value[] = [];
        for (const argument of expr.arguments) {
            args.push(this.evaluate(argument));
        }

        if (!(callee instanceof Callable)) {
            throw this.runtimeError(
                expr.paren,
                "Can only call functions and classes.",
                `The callee is ${describeValue(callee)}.`,
            );
        }

        if (args.length !== callee.arity()) {
            throw this.runtimeError(
                expr.paren,
                `Expected ${callee.arity()} arguments but got ${args.length}.`,
            );
        }

        return this.callFunction(callee, args, expr.paren);
    }

    private callFunction(callee: Callable, args: Value[], paren: Token): Value {
        if (this.callDepth >= this.maxCallDepth) {
            throw this.runtimeError(paren, "Stack overflow.");
        }

        this.callDepth++;
        try {
            return callee.call(this, args, paren);
        } catch (e) {
            // The host stack can run out before maxCallDepth is reached
            if (isHostRangeError(e) && /call stack/i.test(e.message)) {
                throw this.runtimeError(paren, "Stack overflow.");
            }
            throw e;
        } finally {
            this.callDepth--;
        }
    }

    /**
     * `super` sits one scope outside the `this` scope of the method being
     * run, so both are read at fixed distances from the resolved hop count.
     */
    private evaluateSuper(expr: SuperExpression): Value {
        const distance = this.locals.get(expr);
        if (distance === undefined) {
            throw new Error("Unresolved 'super' expression.");
        }

        const superclass = this.environment.getAt(distance, "super");
        const object = this.environment.getAt(distance - 1, "this");
        if (
            !(superclass instanceof ClassObject) ||
            !(object instanceof Instance)
        ) {
            throw new Error("Malformed 'super' binding.");
        }

        const method = superclass.findMethod(expr.method.lexeme);
        if (!method) {
            throw this.undefinedProperty(expr.method);
        }
        return method.bind(object);
    }

    private lookUpVariable(name: Token, expr: ResolvableExpression): Value {
        const distance = this.locals.get(expr);
        const value =
            distance !== undefined
                ? this.environment.getAt(distance, name.lexeme)
                : this.globals.get(name.lexeme);

        if (value === undefined) {
            throw this.runtimeError(
                name,
                `Undefined variable '${name.lexeme}'.`,
            );
        }
        return value;
    }

    private numberOperands(
        operator: Token,
        left: Value,
        right: Value,
    ): [number, number] {
        if (typeof left === "number" && typeof right === "number") {
            return [left, right];
        }
        throw this.runtimeError(operator, "Operands must be numbers.");
    }

    private undefinedProperty(name: Token): WispError {
        return this.runtimeError(
            name,
            `Undefined property '${name.lexeme}'.`,
        );
    }

    private concat(left: string, right: string, operator: Token): string {
        try {
            return left + right;
        } catch (e) {
            if (isHostRangeError(e)) {
                throw this.runtimeError(operator, "String too long.");
            }
            throw e;
        }
    }

    public runtimeError(token: Token, message: string, hint?: string): WispError {
        return makeError("runtime", token, message, this.source, hint);
    }
}
