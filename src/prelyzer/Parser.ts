// --- 4. 语法分析器 (Parser) ---

import { ConstantTable } from "../resolver/ConstantTable.js";
import { ConfigSyntaxError } from "../types/Errors.js";
import { describeTokenType, type Token, TokenType } from "../types/Lexer.js";
import {
    BARE_VALUE_KEY,
    boolean,
    type ConfigDocument,
    identifier,
    integer,
    list,
    struct,
    text,
    type Value,
} from "../types/Value.js";
import { evaluateExpression } from "./Evaluator.js";
import { Lexer } from "./Lexer.js";

/**
 * 解析上下文，显式传入每个递归解析函数。
 */
export interface ParseContext {
    constants: ConstantTable;
}

/**
 * 单遍递归下降解析器，单 token 前瞻。
 */
export class ConfigParser {
    private lexer: Lexer;
    private current: Token;

    constructor(input: string | Lexer) {
        this.lexer = typeof input === "string" ? new Lexer(input) : input;
        this.current = this.lexer.nextToken();
    }

    parse(context: ParseContext = { constants: new ConstantTable() }): ConfigDocument {
        const document: ConfigDocument = new Map();
        while (!this.check(TokenType.EOF)) {
            this.parseStatement(document, context);
        }
        return document;
    }

    private parseStatement(document: ConfigDocument, context: ParseContext): void {
        // 空语句
        if (this.match(TokenType.Semicolon)) return;

        if (!this.check(TokenType.Name)) {
            // 裸值只保留最后一个
            document.set(BARE_VALUE_KEY, this.parseValue(context));
            return;
        }

        const name = this.advance().value;

        if (this.match(TokenType.Define)) {
            const value = this.parseValue(context);
            context.constants.define(name, value);
            this.match(TokenType.Semicolon);
            document.set(name, value);
        } else if (this.match(TokenType.Assign)) {
            const value = this.parseValue(context);
            this.match(TokenType.Semicolon);
            document.set(name, value);
        } else if (this.check(TokenType.StructStart)) {
            document.set(name, this.parseStruct(context));
        } else {
            document.set(name, identifier(name));
        }
    }

    parseValue(context: ParseContext): Value {
        const token = this.current;

        switch (token.type) {
            case TokenType.Number:
            case TokenType.Hex:
                this.advance();
                return integer(BigInt(token.value));
            case TokenType.String:
                this.advance();
                return text(unquote(token.value));
            case TokenType.True:
                this.advance();
                return boolean(true);
            case TokenType.False:
                this.advance();
                return boolean(false);
            case TokenType.Name:
                this.advance();
                return context.constants.lookup(token.value) ?? identifier(token.value);
            case TokenType.ListStart:
                return this.parseList(context);
            case TokenType.StructStart:
                return this.parseStruct(context);
            case TokenType.ChrStart:
                return this.parseChr(context);
            case TokenType.Expression:
                this.advance();
                return evaluateExpression(token, context.constants);
            default:
                throw new ConfigSyntaxError(token.line, token.column, "value", describeTokenType(token.type));
        }
    }

    private parseList(context: ParseContext): Value {
        this.consume(TokenType.ListStart);
        const items: Value[] = [];
        while (!this.check(TokenType.RParen) && !this.check(TokenType.EOF)) {
            items.push(this.parseValue(context));
            this.match(TokenType.Comma);
        }
        this.consume(TokenType.RParen);
        return list(items);
    }

    private parseStruct(context: ParseContext): Value {
        this.consume(TokenType.StructStart);
        const fields = new Map<string, Value>();

        while (!this.check(TokenType.StructEnd) && !this.check(TokenType.EOF)) {
            // 字段名位置上的其他 token 直接跳过
            if (!this.check(TokenType.Name)) {
                this.advance();
                continue;
            }

            const name = this.advance().value;
            this.consume(TokenType.Assign);
            fields.set(name, this.parseValue(context));
            this.match(TokenType.Comma);
        }

        this.consume(TokenType.StructEnd);
        return struct(fields);
    }

    private parseChr(context: ParseContext): Value {
        const start = this.consume(TokenType.ChrStart);
        const argument = this.parseValue(context);
        this.consume(TokenType.RParen);

        if (argument.type !== "Integer") return text("?");
        if (argument.value < 0n || argument.value > 0x10ffffn) {
            throw new ConfigSyntaxError(start.line, start.column, "code point", argument.value.toString());
        }
        return text(String.fromCodePoint(Number(argument.value)));
    }

    // --- 辅助函数 ---

    private check(type: TokenType): boolean {
        return this.current.type === type;
    }

    private match(type: TokenType): boolean {
        if (this.check(type)) {
            this.advance();
            return true;
        }
        return false;
    }

    private advance(): Token {
        const token = this.current;
        this.current = this.lexer.nextToken();
        return token;
    }

    private consume(type: TokenType): Token {
        if (this.check(type)) {
            return this.advance();
        }
        throw new ConfigSyntaxError(
            this.current.line,
            this.current.column,
            describeTokenType(type),
            describeTokenType(this.current.type)
        );
    }
}

// 去掉两侧引号，只还原 \" 和 \'
function unquote(raw: string): string {
    return raw.slice(1, -1).replace(/\\"/g, '"').replace(/\\'/g, "'");
}
