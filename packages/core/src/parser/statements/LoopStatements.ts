import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { ExpressionStatement } from "./ExpressionStatement";
import { VarStatement } from "./VarStatement";
import { Statement } from "./index";
import { Token } from "../../lexer/Token";

export interface WhileStatement extends BaseStatement {
    kind: "WhileStatement";
    keyword: Token;
    condition: Expression;
    body: Statement;
}

/**
 * Kept as its own node rather than lowered to `while`: variables declared
 * by the initializer get a fresh binding on every iteration.
 */
export interface ForStatement extends BaseStatement {
    kind: "ForStatement";
    keyword: Token;
    initializer: VarStatement | ExpressionStatement | null;
    condition: Expression | null;
    increment: Expression | null;
    body: Statement;
}
