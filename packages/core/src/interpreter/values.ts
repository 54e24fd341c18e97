import {
    NativeFunction as NativeDefinition,
    NativeError,
    RuntimeValue,
} from "@wisp/library";

import { Token } from "../lexer/Token";
import { Statement } from "../parser/statements";
import { Environment } from "./Environment";
import { Interpreter } from "./Interpreter";

export type Value = null | boolean | number | string | Callable | Instance;

export abstract class Callable {
    abstract arity(): number;

    /**
     * Invoked with arguments already checked against {@link arity}.
     * @param paren closing paren of the call, for error locations
     */
    abstract call(interpreter: Interpreter, args: Value[], paren: Token): Value;

    abstract toString(): string;
}

export class UserFunction extends Callable {
    constructor(
        public readonly name: string | null,
        private readonly params: Token[],
        private readonly body: Statement[],
        private readonly closure: Environment,
        private readonly isInitializer: boolean = false,
    ) {
        super();
    }

    /** A copy of this method whose closure has `this` bound to `instance` */
    public bind(instance: Instance): UserFunction {
        const environment = new Environment(this.closure);
        environment.define("this", instance);
        return new UserFunction(
            this.name,
            this.params,
            this.body,
            environment,
            this.isInitializer,
        );
    }

    public arity(): number {
        return this.params.length;
    }

    public call(interpreter: Interpreter, args: Value[]): Value {
        const environment = new Environment(this.closure);
        this.params.forEach((param, i) => {
            environment.define(param.lexeme, args[i]);
        });

        const completion = interpreter.executeBlock(this.body, environment);

        // `init` always hands back the instance, even on a bare `return;`
        if (this.isInitializer) {
            return this.closure.getAt(0, "this") ?? null;
        }
        return completion.type === "return" ? completion.value : null;
    }

    public toString(): string {
        return this.name === null ? "<fn>" : `<fn ${this.name}>`;
    }
}

/** A library function installed as a global */
export class NativeFunction extends Callable {
    constructor(
        public readonly name: string,
        private readonly definition: NativeDefinition,
    ) {
        super();
    }

    public arity(): number {
        return this.definition.signature.params.length;
    }

    public call(interpreter: Interpreter, args: Value[], paren: Token): Value {
        try {
            return this.definition(args, interpreter.host);
        } catch (e) {
            if (e instanceof NativeError) {
                throw interpreter.runtimeError(paren, e.message);
            }
            throw e;
        }
    }

    public toString(): string {
        return "<native fn>";
    }
}

export class ClassObject extends Callable {
    constructor(
        public readonly name: string,
        public readonly superclass: ClassObject | null,
        private readonly methods: Map<string, UserFunction>,
    ) {
        super();
    }

    /** Looks in this class, then up the superclass chain */
    public findMethod(name: string): UserFunction | undefined {
        return this.methods.get(name) ?? this.superclass?.findMethod(name);
    }

    public arity(): number {
        return this.findMethod("init")?.arity() ?? 0;
    }

    public call(interpreter: Interpreter, args: Value[]): Value {
        const instance = new Instance(this);
        const initializer = this.findMethod("init");
        if (initializer) {
            initializer.bind(instance).call(interpreter, args);
        }
        return instance;
    }

    public toString(): string {
        return this.name;
    }
}

export class Instance {
    private readonly fields: Map<string, Value> = new Map();

    constructor(public readonly klass: ClassObject) {}

    /** Own fields shadow methods; `undefined` when neither exists */
    public get(name: string): Value | undefined {
        if (this.fields.has(name)) {
            return this.fields.get(name);
        }

        const method = this.klass.findMethod(name);
        if (method) return method.bind(this);

        return undefined;
    }

    public set(name: string, value: Value): void {
        this.fields.set(name, value);
    }

    public toString(): string {
        return `${this.klass.name} instance`;
    }
}

/** Type of a value with its article, for error hints: `a number`, `nil` */
export function describeValue(value: Value): string {
    if (value === null) return "nil";
    if (value instanceof Instance) return `an instance of ${value.klass.name}`;
    if (value instanceof ClassObject) return "a class";
    if (value instanceof Callable) return "a function";
    return `a ${typeof value}`;
}

export function isTruthy(value: Value): boolean {
    if (value === null) return false;
    if (typeof value === "boolean") return value;
    return true;
}

/** Primitives compare by value, everything else by identity */
export function isEqual(a: Value, b: Value): boolean {
    return a === b;
}

export function stringify(value: RuntimeValue): string {
    if (value === null) return "nil";
    if (typeof value === "number") return formatNumber(value);
    return String(value);
}

function formatNumber(value: number): string {
    // Keep the sign of negative zero, which String() drops
    if (Object.is(value, -0)) return "-0";
    return String(value);
}
