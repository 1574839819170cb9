// --- 1. 词法单元 (Token) ---

export enum TokenType {
    Name,
    Number, // 十进制
    Hex, // 0x...
    String,
    True,
    False,
    ListStart, // (list
    RParen, // )
    StructStart, // struct{
    StructEnd, // }
    ChrStart, // chr(
    Assign, // =
    Define, // :=
    Comma,
    Semicolon,
    Expression, // [op a b]
    EOF,
}

export interface Token {
    readonly type: TokenType;
    readonly value: string; // 原始文本 (字符串保留引号)
    readonly line: number;
    readonly column: number;
}

/**
 * 关键字表。复合模式必须排在其单字符前缀之前 (`:=` 在 `=` 之前)。
 */
export const KEYWORDS: ReadonlyArray<readonly [string, TokenType]> = [
    ["struct{", TokenType.StructStart],
    ["(list", TokenType.ListStart],
    ["chr(", TokenType.ChrStart],
    [":=", TokenType.Define],
    [";", TokenType.Semicolon],
    ["=", TokenType.Assign],
    [",", TokenType.Comma],
    ["}", TokenType.StructEnd],
    [")", TokenType.RParen],
    ["true", TokenType.True],
    ["false", TokenType.False],
];

export function describeTokenType(type: TokenType): string {
    const keyword = KEYWORDS.find(([, t]) => t === type);
    return keyword ? `'${keyword[0]}'` : TokenType[type];
}
