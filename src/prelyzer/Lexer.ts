// --- 3. 词法分析器 (Lexer) ---

import { KEYWORDS, type Token, TokenType } from "../types/Lexer.js";

const OPERATORS = ["+", "-", "*", "/"];

const isIdentifierStart = (char: string): boolean => /[_a-zA-Z]/.test(char);
const isIdentifierPart = (char: string): boolean => /[_a-zA-Z0-9]/.test(char);
const isDigit = (char: string): boolean => /[0-9]/.test(char);
const isHexDigit = (char: string): boolean => /[0-9a-fA-F]/.test(char);

/**
 * 流式词法分析器。游标只前进不回退，无法识别的字符被静默跳过。
 */
export class Lexer {
    private pos = 0;
    private line = 1;
    private column = 1;
    private input: string;

    constructor(input: string) {
        this.input = input;
    }

    nextToken(): Token {
        while (this.pos < this.input.length) {
            const char = this.input[this.pos] ?? "";

            // 1. 行注释 # ... (连同换行一起吃掉)
            if (char === "#") {
                this.skipLineComment();
                continue;
            }

            // 2. 块注释 {- ... -}
            if (this.input.startsWith("{-", this.pos)) {
                this.skipBlockComment();
                continue;
            }

            // 3. 空白
            if (/\s/.test(char)) {
                this.advance(1);
                continue;
            }

            // 4. 方括号表达式 [op a b]
            if (char === "[") {
                const expression = this.scanExpression();
                if (expression) return expression;
            }

            const token =
                this.scanKeyword() ?? this.scanIdentifier() ?? this.scanNumber() ?? this.scanString();
            if (token) return token;

            // 其余字符一律跳过
            this.advance(1);
        }
        return { type: TokenType.EOF, value: "", line: this.line, column: this.column };
    }

    tokenize(): Token[] {
        const tokens: Token[] = [];
        let token: Token;
        do {
            token = this.nextToken();
            tokens.push(token);
        } while (token.type !== TokenType.EOF);
        return tokens;
    }

    private skipLineComment(): void {
        while (this.pos < this.input.length && this.input[this.pos] !== "\n") {
            this.advance(1);
        }
        this.advance(1);
    }

    // 未闭合的块注释一直吃到输入结尾
    private skipBlockComment(): void {
        this.advance(2);
        while (this.pos < this.input.length) {
            if (this.input.startsWith("-}", this.pos)) {
                this.advance(2);
                return;
            }
            this.advance(1);
        }
    }

    private scanExpression(): Token | null {
        let depth = 0;
        let end = this.pos;
        for (; end < this.input.length; end++) {
            const char = this.input[end];
            if (char === "[") {
                depth++;
            } else if (char === "]") {
                depth--;
                if (depth === 0) break;
            }
        }
        if (end >= this.input.length) return null;

        const parts = this.input
            .slice(this.pos + 1, end)
            .trim()
            .split(/\s+/)
            .filter((part) => part.length > 0);
        const operator = parts[0];
        if (parts.length < 2 || operator === undefined || !OPERATORS.includes(operator)) return null;

        return this.emit(TokenType.Expression, end + 1 - this.pos);
    }

    private scanKeyword(): Token | null {
        for (const [pattern, type] of KEYWORDS) {
            if (this.input.startsWith(pattern, this.pos)) {
                return this.emit(type, pattern.length);
            }
        }
        return null;
    }

    private scanIdentifier(): Token | null {
        if (!isIdentifierStart(this.input[this.pos] ?? "")) return null;
        let end = this.pos + 1;
        while (end < this.input.length && isIdentifierPart(this.input[end] ?? "")) {
            end++;
        }
        return this.emit(TokenType.Name, end - this.pos);
    }

    private scanNumber(): Token | null {
        const start = this.pos;
        if (
            this.input[start] === "0" &&
            (this.input[start + 1] === "x" || this.input[start + 1] === "X") &&
            isHexDigit(this.input[start + 2] ?? "")
        ) {
            let end = start + 2;
            while (end < this.input.length && isHexDigit(this.input[end] ?? "")) {
                end++;
            }
            return this.emit(TokenType.Hex, end - start);
        }

        if (!isDigit(this.input[start] ?? "")) return null;
        let end = start;
        while (end < this.input.length && isDigit(this.input[end] ?? "")) {
            end++;
        }
        return this.emit(TokenType.Number, end - start);
    }

    // 反斜杠后的引号不结束字符串；未闭合时只跳过开引号
    private scanString(): Token | null {
        const quote = this.input[this.pos];
        if (quote !== '"' && quote !== "'") return null;

        for (let end = this.pos + 1; end < this.input.length; end++) {
            if (this.input[end] === quote && this.input[end - 1] !== "\\") {
                return this.emit(TokenType.String, end + 1 - this.pos);
            }
        }
        return null;
    }

    private emit(type: TokenType, length: number): Token {
        const token: Token = {
            type,
            value: this.input.slice(this.pos, this.pos + length),
            line: this.line,
            column: this.column,
        };
        this.advance(length);
        return token;
    }

    private advance(count: number): void {
        for (let i = 0; i < count && this.pos < this.input.length; i++) {
            if (this.input[this.pos] === "\n") {
                this.line++;
                this.column = 1;
            } else {
                this.column++;
            }
            this.pos++;
        }
    }
}
