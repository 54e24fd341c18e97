export { Lexer, LexResult } from "./lexer/Lexer";
export { Token } from "./lexer/Token";
export { TokenType } from "./lexer/TokenType";
export { Parser, ParseResult, MAX_ARITY } from "./parser/Parser";
export { AST, ASTNode } from "./parser/types";
export * from "./parser/statements";
export * from "./parser/expressions";
export { Resolver, ResolveResult, ResolutionTable } from "./resolver/Resolver";
export { Interpreter, Completion } from "./interpreter/Interpreter";
export { Environment } from "./interpreter/Environment";
export * from "./interpreter/Config";
export {
    Value,
    Callable,
    UserFunction,
    NativeFunction,
    ClassObject,
    Instance,
    isTruthy,
    isEqual,
    describeValue,
    stringify,
} from "./interpreter/values";
export {
    WispError,
    ErrorCategory,
    ErrorLocation,
    Diagnostic,
    makeError,
    formatDiagnostic,
    isHostRangeError,
} from "./utils/Error";
export { printExpression, printStatement } from "./utils/AstPrinter";
export { Session, RunResult, CompileResult, compile, run } from "./Session";
