import { NativeFunction } from "./types";
import { time } from "./packages/time";
import { string } from "./packages/string";
import { math } from "./packages/math";

export * from "./types";
export { native, NativeError } from "./utils/native";

export const packages: Record<string, Record<string, NativeFunction>> = {
    time,
    string,
    math,
};

/** Every native, by the global name it is installed under */
export const natives: Record<string, NativeFunction> = {
    ...time,
    ...string,
    ...math,
};
