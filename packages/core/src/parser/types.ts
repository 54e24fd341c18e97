import { Statement } from "./statements";
import { Expression } from "./expressions";

export type ASTNode = Statement | Expression;

export interface AST {
    statements: Statement[];
}

export { Expression } from "./expressions";
export { Statement } from "./statements";
