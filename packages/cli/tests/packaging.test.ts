import { readFileSync } from "node:fs";
import { join, posix } from "node:path";

const root = join(__dirname, "..", "..", "..");

function readJson(path: string): Record<string, unknown> {
    const parsed: unknown = JSON.parse(readFileSync(join(root, path), "utf-8"));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        throw new Error(`${path}: expected an object`);
    }
    return Object.fromEntries(Object.entries(parsed));
}

describe("packaging", () => {
    const build = readJson("tsconfig.build.json");
    const options = build.compilerOptions;

    test("the build writes packages/<name>/src to dist/<name>/src", () => {
        expect(options).toMatchObject({ rootDir: "packages", outDir: "dist" });
    });

    test.each(["cli", "core", "library"])(
        "@wisp/%s loads compiled output at run time and sources for types",
        (name) => {
            const manifest = readJson(posix.join("packages", name, "package.json"));
            expect(manifest.main).toBe(`../../dist/${name}/src/index.js`);
            expect(manifest.types).toBe("src/index.ts");
        },
    );

    test("the bin points into the compiled cli", () => {
        expect(readJson("package.json").bin).toEqual({
            wisp: "dist/cli/src/index.js",
        });
    });
});
