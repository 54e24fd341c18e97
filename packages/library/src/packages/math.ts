import { native, NativeError } from "../utils/native";

export const math = {
    /**
     * Round down to the nearest integer
     * @param n number
     */
    floor: native(
        ([n]) => {
            if (typeof n !== "number") {
                throw new NativeError("floor() expects a number.");
            }
            return Math.floor(n);
        },
        {
            params: [{ name: "n", type: "number" }],
            returnType: "number",
        },
    ),

    /**
     * Square root
     * @param n non-negative number
     */
    sqrt: native(
        ([n]) => {
            if (typeof n !== "number" || n < 0) {
                throw new NativeError("sqrt() expects a non-negative number.");
            }
            return Math.sqrt(n);
        },
        {
            params: [{ name: "n", type: "number" }],
            returnType: "number",
        },
    ),
};
