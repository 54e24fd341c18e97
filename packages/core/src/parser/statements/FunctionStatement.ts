import { BaseStatement } from "./BaseStatement";
import { Statement } from "./index";
import { Token } from "../../lexer/Token";

export interface FunctionStatement extends BaseStatement {
    kind: "FunctionStatement";
    name: Token;
    params: Token[];
    body: Statement[];
}
