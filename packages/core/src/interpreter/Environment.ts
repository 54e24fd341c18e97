import { Value } from "./values";

/**
 * One scope of variables, linked to the scope it is nested in. Lookups
 * return `undefined` for a missing name (nil is `null`), leaving the error
 * to the caller, which knows the offending token.
 */
export class Environment {
    private variables: Map<string, Value> = new Map();
    public readonly enclosing?: Environment;

    constructor(enclosing?: Environment) {
        this.enclosing = enclosing;
    }

    public define(name: string, value: Value): void {
        this.variables.set(name, value);
    }

    /** Searches this scope and then each enclosing one */
    public get(name: string): Value | undefined {
        if (this.variables.has(name)) {
            return this.variables.get(name);
        }
        if (this.enclosing) {
            return this.enclosing.get(name);
        }
        return undefined;
    }

    /** @returns false when no scope in the chain declares `name` */
    public assign(name: string, value: Value): boolean {
        if (this.variables.has(name)) {
            this.variables.set(name, value);
            return true;
        }
        if (this.enclosing) {
            return this.enclosing.assign(name, value);
        }
        return false;
    }

    public getAt(distance: number, name: string): Value | undefined {
        return this.ancestor(distance).variables.get(name);
    }

    public assignAt(distance: number, name: string, value: Value): void {
        this.ancestor(distance).variables.set(name, value);
    }

    /**
     * A sibling scope holding the same bindings. Later writes to either one
     * are not seen by the other.
     */
    public copy(): Environment {
        const copy = new Environment(this.enclosing);
        for (const [name, value] of this.variables) {
            copy.variables.set(name, value);
        }
        return copy;
    }

    private ancestor(distance: number): Environment {
        let environment: Environment = this;
        for (let i = 0; i < distance; i++) {
            if (!environment.enclosing) {
                throw new Error(
                    `Scope chain is shorter than resolved distance ${distance}.`,
                );
            }
            environment = environment.enclosing;
        }
        return environment;
    }
}
