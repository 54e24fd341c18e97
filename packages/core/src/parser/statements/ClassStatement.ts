import { BaseStatement } from "./BaseStatement";
import { FunctionStatement } from "./FunctionStatement";
import { VariableExpression } from "../expressions";
import { Token } from "../../lexer/Token";

export class ClassStatement implements BaseStatement {
    kind = "ClassStatement" as const;

    constructor(
        public name: Token,
        public superclass: VariableExpression | null,
        public methods: FunctionStatement[],
    ) {}
}
