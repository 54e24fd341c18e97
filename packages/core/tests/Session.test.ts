import { native } from "@wisp/library";

import { Session, compile, run } from "../src/Session";
import { formatDiagnostic } from "../src/utils/Error";

describe("Session", () => {
    function session() {
        const lines: string[] = [];
        return { lines, session: new Session({ output: (l) => lines.push(l) }) };
    }

    test("definitions persist between runs", () => {
        const { lines, session: s } = session();
        expect(s.run("var a = 1; fun inc() { a = a + 1; }").status).toBe("ok");
        expect(s.run("inc(); inc();").status).toBe("ok");
        s.run("print a;");
        expect(lines).toEqual(["3"]);
        expect(s.getGlobal("a")).toBe(3);
    });

    test("a trailing expression statement yields its value", () => {
        const { session: s } = session();
        expect(s.run("1 + 2;")).toEqual({ status: "ok", value: 3 });
        expect(s.run("var x = 1;")).toEqual({ status: "ok" });
        expect(s.run('print "x"; "done";')).toEqual({ status: "ok", value: "done" });
    });

    test("a failed run leaves earlier definitions intact", () => {
        const { lines, session: s } = session();
        s.run("var kept = 42;");
        expect(s.run("print kept +;").status).toBe("compile-error");
        expect(s.run("print missing;").status).toBe("runtime-error");
        s.run("print kept;");
        expect(lines).toEqual(["42"]);
    });

    test("closures from an earlier run keep their resolved locals", () => {
        const { lines, session: s } = session();
        s.run("fun counter() { var n = 0; fun next() { n = n + 1; return n; } return next; }");
        s.run("var c = counter();");
        s.run("c(); c();");
        s.run("print c();");
        expect(lines).toEqual(["3"]);
    });

    test("separate sessions do not share globals", () => {
        const first = session();
        const second = session();
        first.session.run("var only = 1;");
        expect(second.session.run("print only;").status).toBe("runtime-error");
    });
});

describe("run", () => {
    test("lexical and syntax errors are reported together, in source order", () => {
        const result = run('print ;\n"oops\nvar = 2;', { output: () => undefined });
        expect(result.status).toBe("compile-error");
        if (result.status !== "compile-error") return;

        expect(result.diagnostics.map(formatDiagnostic)).toEqual([
            "[line 1] Error at ';': Expect expression.",
            "[line 2] Error: Unterminated string.",
            "[line 3] Error at '=': Expect variable name.",
        ]);
        expect(result.diagnostics.map((d) => d.category)).toEqual([
            "syntax",
            "lexical",
            "syntax",
        ]);
    });

    test("resolution errors only when the parse is clean", () => {
        expect(compile("return 1;")).toMatchObject({ ok: false });
        const parseFailure = run("return 1; print ;", { output: () => undefined });
        if (parseFailure.status !== "compile-error") {
            throw new Error(`unexpected ${parseFailure.status}`);
        }
        expect(parseFailure.diagnostics.map((d) => d.category)).toEqual(["syntax"]);
    });

    test("nothing runs when the program has a compile error", () => {
        const lines: string[] = [];
        const result = run('print "first";\nfun f() { return; }\nreturn 2;', {
            output: (l) => lines.push(l),
        });
        expect(lines).toEqual([]);
        if (result.status !== "compile-error") {
            throw new Error(`unexpected ${result.status}`);
        }
        expect(result.diagnostics).toEqual([
            {
                category: "resolution",
                message: "Can't return from top-level code.",
                line: 3,
                col: 1,
                where: "at 'return'",
            },
        ]);
    });

    test("natives can be replaced", () => {
        const lines: string[] = [];
        const result = run('print shout("hi"); print clock;', {
            output: (l) => lines.push(l),
            natives: {
                shout: native(([text], host) => host.stringify(text) + "!", {
                    params: [{ name: "text", type: "any" }],
                    returnType: "string",
                }),
            },
        });
        expect(lines).toEqual(["hi!"]);
        expect(result.status).toBe("runtime-error");
    });

    test("standard library natives", () => {
        const lines: string[] = [];
        run(
            'print str(12) + "px"; print len("four"); print num("2.5") + 1; print num("x"); print floor(2.7); print sqrt(16); print clock() > 0;',
            { output: (l) => lines.push(l) },
        );
        expect(lines).toEqual(["12px", "4", "3.5", "nil", "2", "4", "true"]);
    });

    test("nesting past the host stack is a syntax error", () => {
        const source = "print " + "(".repeat(20000) + "1" + ")".repeat(20000) + ";";
        const result = run(source, { output: () => undefined });
        if (result.status !== "compile-error") {
            throw new Error(`unexpected ${result.status}`);
        }
        expect(result.diagnostics).toHaveLength(1);
        expect(result.diagnostics[0]).toMatchObject({
            category: "syntax",
            message: "Expression nested too deeply.",
            line: 1,
        });
    });

    test("runtime error report includes the source line", () => {
        const result = run("var a = 1;\nprint a + nil;", { output: () => undefined });
        if (result.status !== "runtime-error") {
            throw new Error(`unexpected ${result.status}`);
        }
        expect(result.error.source).toBe("var a = 1;\nprint a + nil;");
        expect(result.error.loc).toEqual({ line: 2, col: 9, len: 1 });
        expect(formatDiagnostic(result.diagnostic)).toBe(
            "[line 2] Error at '+': Operands must be two numbers or two strings.",
        );
    });
});
