export type PrimitiveValue = null | boolean | number | string;

/**
 * What the interpreter hands to a native: a primitive, or one of its own
 * runtime objects (functions, classes, instances), which natives treat as
 * opaque.
 */
export type RuntimeValue = PrimitiveValue | object;

export interface FunctionSignature {
    params: { name: string; type: string; description?: string }[];
    returnType: string;
    description?: string;
}

/** Services the interpreter lends to natives */
export interface NativeHost {
    stringify(value: RuntimeValue): string;
}

export type NativeImplementation = (
    args: RuntimeValue[],
    host: NativeHost,
) => PrimitiveValue;

export type NativeFunction = NativeImplementation & {
    signature: FunctionSignature;
};
