import { ExpressionStatement } from "./ExpressionStatement";
import { PrintStatement } from "./PrintStatement";
import { VarStatement } from "./VarStatement";
import { BlockStatement } from "./BlockStatement";
import { IfStatement } from "./IfStatement";
import { WhileStatement, ForStatement } from "./LoopStatements";
import { FunctionStatement } from "./FunctionStatement";
import { ReturnStatement } from "./ReturnStatement";
import { ClassStatement } from "./ClassStatement";

export * from "./BaseStatement";
export * from "./ExpressionStatement";
export * from "./PrintStatement";
export * from "./VarStatement";
export * from "./BlockStatement";
export * from "./IfStatement";
export * from "./LoopStatements";
export * from "./FunctionStatement";
export * from "./ReturnStatement";
export * from "./ClassStatement";

export type Statement =
    | ExpressionStatement
    | PrintStatement
    | VarStatement
    | BlockStatement
    | IfStatement
    | WhileStatement
    | ForStatement
    | FunctionStatement
    | ReturnStatement
    | ClassStatement;
