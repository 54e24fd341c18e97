import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { Io } from "../src/io";

export function memoryIo() {
    const out: string[] = [];
    const err: string[] = [];
    const io: Io = {
        out: (line) => out.push(line),
        err: (line) => err.push(line),
    };
    return { io, out, err };
}

/** A scratch directory holding the given files, removed by `cleanup` */
export async function scratch(files: Record<string, string>) {
    const dir = await mkdtemp(join(tmpdir(), "wisp-cli-"));
    for (const [name, content] of Object.entries(files)) {
        await writeFile(join(dir, name), content, "utf-8");
    }
    return {
        dir,
        path: (name: string) => join(dir, name),
        cleanup: () => rm(dir, { recursive: true, force: true }),
    };
}
