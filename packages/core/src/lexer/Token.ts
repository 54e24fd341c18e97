import { TokenType } from "./TokenType";

export interface Token {
    readonly type: TokenType;
    readonly lexeme: string;
    readonly literal?: number | string;
    readonly line: number;
    readonly col: number;
}
