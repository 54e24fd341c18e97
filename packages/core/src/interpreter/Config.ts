import { NativeFunction } from "@wisp/library";

export interface InterpreterOptions {
    /** Receives each printed line, without its trailing newline */
    output?: (line: string) => void;
    /** Nested calls allowed before `Stack overflow.` */
    maxCallDepth?: number;
    /** Globals to install in place of the standard library */
    natives?: Record<string, NativeFunction>;
}

export const DEFAULT_MAX_CALL_DEPTH = 1000;

export function writeToStdout(line: string): void {
    process.stdout.write(line + "\n");
}
