import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { Statement } from "./index";
import { Token } from "../../lexer/Token";

export class IfStatement implements BaseStatement {
    kind = "IfStatement" as const;

    constructor(
        public keyword: Token,
        public condition: Expression,
        public thenBranch: Statement,
        public elseBranch: Statement | null,
    ) {}
}
