import { Token } from "../../lexer/Token";
import { Statement } from "../statements";

export type LiteralValue = null | boolean | number | string;

export type Expression =
    | LiteralExpression
    | VariableExpression
    | AssignExpression
    | UnaryExpression
    | BinaryExpression
    | LogicalExpression
    | CallExpression
    | GetExpression
    | SetExpression
    | ThisExpression
    | SuperExpression
    | GroupingExpression
    | FunctionExpression;

export interface LiteralExpression {
    type: "Literal";
    value: LiteralValue;
    token: Token;
}

export interface VariableExpression {
    type: "Variable";
    name: Token;
}

export interface AssignExpression {
    type: "Assign";
    name: Token;
    value: Expression;
}

export interface UnaryExpression {
    type: "Unary";
    operator: Token;
    right: Expression;
}

export interface BinaryExpression {
    type: "Binary";
    left: Expression;
    operator: Token;
    right: Expression;
}

/** `and` / `or`, kept apart from Binary because they short-circuit */
export interface LogicalExpression {
    type: "Logical";
    left: Expression;
    operator: Token;
    right: Expression;
}

export interface CallExpression {
    type: "Call";
    callee: Expression;
    /** Closing paren, used to locate call errors */
    paren: Token;
    arguments: Expression[];
}

export interface GetExpression {
    type: "Get";
    object: Expression;
    name: Token;
}

export interface SetExpression {
    type: "Set";
    object: Expression;
    name: Token;
    value: Expression;
}

export interface ThisExpression {
    type: "This";
    keyword: Token;
}

export interface SuperExpression {
    type: "Super";
    keyword: Token;
    method: Token;
}

export interface GroupingExpression {
    type: "Grouping";
    expression: Expression;
}

/** Anonymous `fun (a, b) { ... }` */
export interface FunctionExpression {
    type: "Function";
    keyword: Token;
    params: Token[];
    body: Statement[];
}

/** Expressions the resolver records a scope distance for */
export type ResolvableExpression =
    | VariableExpression
    | AssignExpression
    | ThisExpression
    | SuperExpression;
