import { run, RunResult } from "../src/Session";
import { InterpreterOptions } from "../src/interpreter/Config";
import { Diagnostic } from "../src/utils/Error";

describe("Interpreter", () => {
    function execute(source: string, options: InterpreterOptions = {}) {
        const lines: string[] = [];
        const result = run(source, {
            ...options,
            output: (line) => lines.push(line),
        });
        return { lines, result };
    }

    function output(source: string): string[] {
        const { lines, result } = execute(source);
        expect(result.status).toBe("ok");
        return lines;
    }

    function runtimeError(result: RunResult): Diagnostic | undefined {
        return result.status === "runtime-error" ? result.diagnostic : undefined;
    }

    describe("expressions", () => {
        test("arithmetic", () => {
            expect(
                output(
                    "print 1 + 2 * 3; print (1 + 2) * 3; print 10 / 4; print -3 - -3; print 0.1 + 0.2;",
                ),
            ).toEqual(["7", "9", "2.5", "0", "0.30000000000000004"]);
        });

        test("string concatenation", () => {
            expect(output('print "foo" + "bar";')).toEqual(["foobar"]);
        });

        test("comparison and equality", () => {
            expect(
                output(
                    'print 1 < 2; print 2 <= 1; print 1 == 1; print "a" == "a"; print nil == false; print 1 == "1"; print nil != nil;',
                ),
            ).toEqual(["true", "false", "true", "true", "false", "false", "false"]);
        });

        test("truthiness: only nil and false are falsey", () => {
            expect(output('print !nil; print !false; print !0; print !"";')).toEqual([
                "true",
                "true",
                "false",
                "false",
            ]);
        });

        test("logical operators return an operand", () => {
            expect(
                output('print nil or "yes"; print false and 1; print 1 and 2; print "a" or 2;'),
            ).toEqual(["yes", "false", "2", "a"]);
        });

        test("logical operators short-circuit", () => {
            expect(
                output('fun boom() { print "evaluated"; return true; } print false and boom(); print true or boom();'),
            ).toEqual(["false", "true"]);
        });

        test("integral numbers print without a fraction", () => {
            expect(output("print 3.0; print 2.50; print -0;")).toEqual(["3", "2.5", "-0"]);
        });
    });

    describe("variables and scope", () => {
        test("uninitialized variables are nil", () => {
            expect(output("var a; print a;")).toEqual(["nil"]);
        });

        test("assignment is an expression", () => {
            expect(output("var a; var b; a = b = 2; print a; print b;")).toEqual([
                "2",
                "2",
            ]);
        });

        test("blocks shadow and restore", () => {
            expect(
                output('var a = "outer"; { var a = "inner"; print a; } print a;'),
            ).toEqual(["inner", "outer"]);
        });

        test("closures bind to the declaration they saw", () => {
            const source = `
                var a = "global";
                {
                    fun showA() { print a; }
                    showA();
                    var a = "block";
                    showA();
                }
            `;
            expect(output(source)).toEqual(["global", "global"]);
        });
    });

    describe("control flow", () => {
        test("if / else", () => {
            expect(output('if (1 > 2) print "a"; else print "b";')).toEqual(["b"]);
        });

        test("while loop", () => {
            expect(output("var i = 0; while (i < 3) { print i; i = i + 1; }")).toEqual(
                ["0", "1", "2"],
            );
        });

        test("for loop", () => {
            expect(output("for (var i = 0; i < 3; i = i + 1) print i;")).toEqual([
                "0",
                "1",
                "2",
            ]);
        });

        test("each for iteration gets its own binding", () => {
            const source = `
                var a; var b; var c;
                for (var i = 0; i < 3; i = i + 1) {
                    fun f() { print i; }
                    if (i == 0) a = f;
                    if (i == 1) b = f;
                    if (i == 2) c = f;
                }
                a(); b(); c();
            `;
            expect(output(source)).toEqual(["0", "1", "2"]);
        });

        test("return exits nested loops", () => {
            const source = `
                fun find() {
                    for (var i = 0; i < 10; i = i + 1) {
                        while (true) {
                            if (i == 3) return i;
                            i = i + 1;
                        }
                    }
                    return -1;
                }
                print find();
            `;
            expect(output(source)).toEqual(["3"]);
        });
    });

    describe("functions", () => {
        test("recursion", () => {
            const source = `
                fun fib(n) { if (n < 2) return n; return fib(n - 1) + fib(n - 2); }
                print fib(10);
            `;
            expect(output(source)).toEqual(["55"]);
        });

        test("functions without return give nil", () => {
            expect(output("fun f() {} print f();")).toEqual(["nil"]);
        });

        test("closures keep their own state", () => {
            const source = `
                fun makeCounter() {
                    var i = 0;
                    fun count() { i = i + 1; return i; }
                    return count;
                }
                var c1 = makeCounter();
                var c2 = makeCounter();
                print c1(); print c1(); print c2();
            `;
            expect(output(source)).toEqual(["1", "2", "1"]);
        });

        test("function literals", () => {
            expect(
                output("var twice = fun (f, x) { return f(f(x)); }; print twice(fun (n) { return n * 3; }, 2);"),
            ).toEqual(["18"]);
        });

        test("printed forms", () => {
            expect(
                output("fun foo() {} print foo; print fun () {}; print clock; class K {} print K; print K();"),
            ).toEqual(["<fn foo>", "<fn>", "<native fn>", "K", "K instance"]);
        });
    });

    describe("classes", () => {
        test("fields and methods", () => {
            const source = `
                class Point {
                    init(x, y) { this.x = x; this.y = y; }
                    sum() { return this.x + this.y; }
                }
                var p = Point(2, 3);
                p.x = 10;
                print p.sum();
            `;
            expect(output(source)).toEqual(["13"]);
        });

        test("fields shadow methods", () => {
            expect(
                output('class A { m() { return "method"; } } var a = A(); a.m = "field"; print a.m;'),
            ).toEqual(["field"]);
        });

        test("bound methods remember their instance", () => {
            const source = `
                class Greeter { init(name) { this.name = name; } hi() { print "hi " + this.name; } }
                var hi = Greeter("ada").hi;
                hi();
            `;
            expect(output(source)).toEqual(["hi ada"]);
        });

        test("inherited initializer", () => {
            expect(
                output("class A { init(x) { this.x = x; } } class B < A { } var b = B(5); print b.x;"),
            ).toEqual(["5"]);
        });

        test("super calls the superclass method", () => {
            const source = `
                class A { method() { print "A method"; } }
                class B < A {
                    method() { print "B method"; }
                    test() { super.method(); }
                }
                class C < B {}
                C().test();
            `;
            expect(output(source)).toEqual(["A method"]);
        });

        test("calling init again returns the instance", () => {
            expect(
                output("class Foo { init() { this.x = 1; return; } } var f = Foo(); print f.init();"),
            ).toEqual(["Foo instance"]);
        });
    });

    describe("runtime errors", () => {
        test.each<[string, Diagnostic]>([
            [
                'print -"a";',
                { category: "runtime", message: "Operand must be a number.", line: 1, col: 7, where: "at '-'" },
            ],
            [
                'print 1 + "a";',
                {
                    category: "runtime",
                    message: "Operands must be two numbers or two strings.",
                    line: 1,
                    col: 9,
                    where: "at '+'",
                },
            ],
            [
                'print "a" < 1;',
                { category: "runtime", message: "Operands must be numbers.", line: 1, col: 11, where: "at '<'" },
            ],
            [
                "print 1 / 0;",
                { category: "runtime", message: "Division by zero.", line: 1, col: 9, where: "at '/'" },
            ],
            [
                "print x;",
                { category: "runtime", message: "Undefined variable 'x'.", line: 1, col: 7, where: "at 'x'" },
            ],
            [
                "y = 1;",
                { category: "runtime", message: "Undefined variable 'y'.", line: 1, col: 1, where: "at 'y'" },
            ],
            [
                '"str"();',
                {
                    category: "runtime",
                    message: "Can only call functions and classes.",
                    line: 1,
                    col: 7,
                    where: "at ')'",
                },
            ],
            [
                "fun f(a) {} f(1, 2);",
                {
                    category: "runtime",
                    message: "Expected 1 arguments but got 2.",
                    line: 1,
                    col: 19,
                    where: "at ')'",
                },
            ],
            [
                "class A {}\nA().missing();",
                {
                    category: "runtime",
                    message: "Undefined property 'missing'.",
                    line: 2,
                    col: 5,
                    where: "at 'missing'",
                },
            ],
            [
                "var n = 1; print n.y;",
                {
                    category: "runtime",
                    message: "Only instances have properties.",
                    line: 1,
                    col: 20,
                    where: "at 'y'",
                },
            ],
            [
                "var n = 1; n.y = 2;",
                {
                    category: "runtime",
                    message: "Only instances have fields.",
                    line: 1,
                    col: 14,
                    where: "at 'y'",
                },
            ],
            [
                "var NotClass = 1; class B < NotClass {}",
                {
                    category: "runtime",
                    message: "Superclass must be a class.",
                    line: 1,
                    col: 29,
                    where: "at 'NotClass'",
                },
            ],
            [
                'len(1);',
                { category: "runtime", message: "len() expects a string.", line: 1, col: 6, where: "at ')'" },
            ],
        ])("%s", (source, diagnostic) => {
            expect(runtimeError(execute(source).result)).toEqual(diagnostic);
        });

        test("output before the error stays printed", () => {
            const { lines, result } = execute('print "before"; print nil + 1; print "after";');
            expect(lines).toEqual(["before"]);
            expect(result.status).toBe("runtime-error");
        });

        test("unbounded recursion is a stack overflow", () => {
            const { result } = execute("fun f() { f(); } f();", { maxCallDepth: 100 });
            expect(runtimeError(result)?.message).toBe("Stack overflow.");
        });

        test("a string past the host's length limit is a runtime error", () => {
            const { result } = execute('var s = "ab"; while (true) { s = s + s; }');
            expect(runtimeError(result)).toEqual({
                category: "runtime",
                message: "String too long.",
                line: 1,
                col: 36,
                where: "at '+'",
            });
        });

        test.each([
            ["var NotClass = 1; class B < NotClass {}", "'NotClass' is a number."],
            ["var C = nil; class D < C {}", "'C' is nil."],
            ["fun f() {} class E < f {}", "'f' is a function."],
            ['"str"();', "The callee is a string."],
            ["class K {} K()();", "The callee is an instance of K."],
        ])("%s names the offending value in its hint", (source, hint) => {
            const { result } = execute(source);
            expect(result.status === "runtime-error" && result.error.hint).toBe(hint);
        });

        test("the hint is printed under the source line", () => {
            const { result } = execute("var C = nil; class D < C {}");
            if (result.status !== "runtime-error") {
                throw new Error(`unexpected ${result.status}`);
            }
            const lines = result.error.message.split("\n");
            expect(lines).toHaveLength(6);
            expect(lines[5].endsWith(" 'C' is nil.")).toBe(true);
        });

        test("deep recursion within the limit succeeds", () => {
            const source = "fun down(n) { if (n == 0) return 0; return down(n - 1); } print down(50);";
            const { lines, result } = execute(source, { maxCallDepth: 100 });
            expect(result.status).toBe("ok");
            expect(lines).toEqual(["0"]);
        });
    });

    test("running the same program twice gives the same output", () => {
        const source = "var s = 0; for (var i = 1; i <= 4; i = i + 1) s = s + i * i; print s;";
        expect(output(source)).toEqual(output(source));
        expect(output(source)).toEqual(["30"]);
    });
});
