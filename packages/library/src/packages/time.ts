import { native } from "../utils/native";

export const time = {
    /**
     * Seconds since the Unix epoch, with millisecond precision
     * @returns seconds
     */
    clock: native(() => Date.now() / 1000, {
        params: [],
        returnType: "number",
        description: "Seconds since the Unix epoch",
    }),
};
