import { native, NativeError } from "../utils/native";

const NUMERIC = /^-?\d+(\.\d+)?$/;

export const string = {
    /**
     * Convert any value to its printed form
     * @param value value to convert
     * @returns string
     */
    str: native(([value], host) => host.stringify(value), {
        params: [{ name: "value", type: "any" }],
        returnType: "string",
        description: "Convert any value to its printed form",
    }),

    /**
     * Length of a string
     * @param text string to measure
     * @returns number of characters
     */
    len: native(
        ([text]) => {
            if (typeof text !== "string") {
                throw new NativeError("len() expects a string.");
            }
            return text.length;
        },
        {
            params: [{ name: "text", type: "string" }],
            returnType: "number",
            description: "Length of a string",
        },
    ),

    /**
     * Parse a decimal number
     * @param text digits with an optional sign and fraction
     * @returns the number, or nil when the text is not a number
     */
    num: native(
        ([text]) => {
            if (typeof text !== "string") {
                throw new NativeError("num() expects a string.");
            }
            const trimmed = text.trim();
            return NUMERIC.test(trimmed) ? parseFloat(trimmed) : null;
        },
        {
            params: [{ name: "text", type: "string" }],
            returnType: "number | nil",
            description: "Parse a decimal number, nil when invalid",
        },
    ),
};
