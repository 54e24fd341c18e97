import { Token } from "../lexer/Token";
import { Expression, LiteralValue } from "../parser/expressions";
import { Statement } from "../parser/statements";
import { stringify } from "../interpreter/values";
import { assertNever } from "./ast";

/**
 * Renders nodes in parenthesized prefix form, e.g. `(<= (+ 1 2) (+ 5 7))`.
 * Used by `wisp ast` and by the parser tests.
 */
export function printExpression(expr: Expression): string {
    switch (expr.type) {
        case "Literal":
            return printLiteral(expr.value);
        case "Variable":
            return expr.name.lexeme;
        case "Assign":
            return parenthesize("=", expr.name.lexeme, printExpression(expr.value));
        case "Unary":
            return parenthesize(expr.operator.lexeme, printExpression(expr.right));
        case "Binary":
        case "Logical":
            return parenthesize(
                expr.operator.lexeme,
                printExpression(expr.left),
                printExpression(expr.right),
            );
        case "Grouping":
            return parenthesize("group", printExpression(expr.expression));
        case "Call":
            return parenthesize(
                "call",
                printExpression(expr.callee),
                ...expr.arguments.map(printExpression),
            );
        case "Get":
            return parenthesize(".", printExpression(expr.object), expr.name.lexeme);
        case "Set":
            return parenthesize(
                "=",
                parenthesize(".", printExpression(expr.object), expr.name.lexeme),
                printExpression(expr.value),
            );
        case "This":
            return "this";
        case "Super":
            return parenthesize("super", expr.method.lexeme);
        case "Function":
            return parenthesize("fun", printParams(expr.params), ...expr.body.map(printStatement));
        default:
            return assertNever(expr, "expression");
    }
}

export function printStatement(stmt: Statement): string {
    switch (stmt.kind) {
        case "ExpressionStatement":
            return parenthesize(";", printExpression(stmt.expression));
        case "PrintStatement":
            return parenthesize("print", printExpression(stmt.expression));
        case "VarStatement":
            return stmt.initializer
                ? parenthesize("var", stmt.name.lexeme, printExpression(stmt.initializer))
                : parenthesize("var", stmt.name.lexeme);
        case "BlockStatement":
            return parenthesize("block", ...stmt.statements.map(printStatement));
        case "IfStatement":
            return stmt.elseBranch
                ? parenthesize(
                      "if",
                      printExpression(stmt.condition),
                      printStatement(stmt.thenBranch),
                      printStatement(stmt.elseBranch),
                  )
                : parenthesize(
                      "if",
                      printExpression(stmt.condition),
                      printStatement(stmt.thenBranch),
                  );
        case "WhileStatement":
            return parenthesize(
                "while",
                printExpression(stmt.condition),
                printStatement(stmt.body),
            );
        case "ForStatement":
            return parenthesize(
                "for",
                stmt.initializer ? printStatement(stmt.initializer) : ";",
                stmt.condition ? printExpression(stmt.condition) : ";",
                stmt.increment ? printExpression(stmt.increment) : ";",
                printStatement(stmt.body),
            );
        case "FunctionStatement":
            return parenthesize(
                "fun",
                stmt.name.lexeme,
                printParams(stmt.params),
                ...stmt.body.map(printStatement),
            );
        case "ReturnStatement":
            return stmt.value
                ? parenthesize("return", printExpression(stmt.value))
                : parenthesize("return");
        case "ClassStatement": {
            const name = stmt.superclass
                ? `${stmt.name.lexeme} < ${stmt.superclass.name.lexeme}`
                : stmt.name.lexeme;
            return parenthesize("class", name, ...stmt.methods.map(printStatement));
        }
        default:
            return assertNever(stmt, "statement");
    }
}

function printLiteral(value: LiteralValue): string {
    if (typeof value === "string") return `"${value}"`;
    return stringify(value);
}

function printParams(params: Token[]): string {
    return `(${params.map((p) => p.lexeme).join(" ")})`;
}

function parenthesize(name: string, ...parts: string[]): string {
    return parts.length === 0 ? `(${name})` : `(${name} ${parts.join(" ")})`;
}
