import { FunctionSignature, NativeFunction, NativeImplementation } from "../types";

/**
 * Thrown by a native to report bad input. The interpreter turns it into a
 * runtime error located at the call.
 */
export class NativeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "NativeError";
    }
}

/**
 * Define a native function with signature
 * @param fn Implementation
 * @param signature Signature metadata; its `params` fix the arity
 */
export function native(
    fn: NativeImplementation,
    signature: FunctionSignature,
): NativeFunction {
    return Object.assign(fn, { signature });
}
