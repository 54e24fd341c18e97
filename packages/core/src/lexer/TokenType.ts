export enum TokenType {
    // Keywords
    And = "And",
    Class = "Class",
    Else = "Else",
    False = "False",
    For = "For",
    Fun = "Fun",
    If = "If",
    Nil = "Nil",
    Or = "Or",
    Print = "Print",
    Return = "Return",
    Super = "Super",
    This = "This",
    True = "True",
    Var = "Var",
    While = "While",

    // Identifiers
    Identifier = "Identifier",

    // Symbols
    LParen = "LParen", // (
    RParen = "RParen", // )
    LBrace = "LBrace", // {
    RBrace = "RBrace", // }
    Comma = "Comma", // ,
    Dot = "Dot", // .
    Semicolon = "Semicolon", // ;

    // Math Operators
    PlusOp = "PlusOp", // +
    MinusOp = "MinusOp", // -
    DivideOp = "DivideOp", // /
    MultiplyOp = "MultiplyOp", // *

    // Comparison & Logic
    Bang = "Bang", // !
    BangEquals = "BangEquals", // !=
    Equals = "Equals", // =
    EqualsEquals = "EqualsEquals", // ==
    Greater = "Greater", // >
    GreaterEquals = "GreaterEquals", // >=
    Less = "Less", // <
    LessEquals = "LessEquals", // <=

    // Literals
    StringLiteral = "StringLiteral",
    NumberLiteral = "NumberLiteral",

    EOF = "EOF",
}
