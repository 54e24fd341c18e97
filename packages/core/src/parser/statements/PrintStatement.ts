import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { Token } from "../../lexer/Token";

export interface PrintStatement extends BaseStatement {
    kind: "PrintStatement";
    keyword: Token;
    expression: Expression;
}
