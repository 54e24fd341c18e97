import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { Token } from "../../lexer/Token";

export interface ReturnStatement extends BaseStatement {
    kind: "ReturnStatement";
    keyword: Token;
    value: Expression | null;
}
