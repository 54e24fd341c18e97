import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { Token } from "../../lexer/Token";

export class VarStatement implements BaseStatement {
    kind = "VarStatement" as const;

    constructor(
        public name: Token,
        /** `null` when declared without `=`; the variable starts as nil */
        public initializer: Expression | null,
    ) {}
}
