/** Where command output goes; swapped for an in-memory writer in tests */
export interface Io {
    out(line: string): void;
    err(line: string): void;
}

export const consoleIo: Io = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

export const ExitCode = {
    Ok: 0,
    CompileError: 65,
    NoInput: 66,
    RuntimeError: 70,
    Config: 78,
} as const;
