import { describe, expect, it } from "vitest";
import { parseConfig } from "../src/builder.js";
import { Lexer } from "../src/prelyzer/Lexer.js";
import { type Token, TokenType } from "../src/types/Lexer.js";

const kinds = (tokens: Token[]) => tokens.map((token) => token.type);
const values = (tokens: Token[]) => tokens.map((token) => token.value);

describe("Lexer", () => {
    it("tokenizes a definition statement", () => {
        const tokens = new Lexer("a := 0xFF;").tokenize();
        expect(kinds(tokens)).toEqual([
            TokenType.Name,
            TokenType.Define,
            TokenType.Hex,
            TokenType.Semicolon,
            TokenType.EOF,
        ]);
        expect(values(tokens)).toEqual(["a", ":=", "0xFF", ";", ""]);
    });

    it("tracks line and column across line comments", () => {
        const tokens = new Lexer("# comment\nx = 1").tokenize();
        expect(tokens.slice(0, 3).map((token) => [token.line, token.column])).toEqual([
            [2, 1],
            [2, 3],
            [2, 5],
        ]);
    });

    it("skips block comments spanning lines", () => {
        const [token] = new Lexer("{- one\ntwo -} y").tokenize();
        expect(token).toEqual({ type: TokenType.Name, value: "y", line: 2, column: 8 });
    });

    it("stops at end of input inside an unterminated block comment", () => {
        expect(kinds(new Lexer("z {- never closed").tokenize())).toEqual([TokenType.Name, TokenType.EOF]);
    });

    it("reads a bracket expression as one token", () => {
        const tokens = new Lexer("[+ 2 3]").tokenize();
        expect(kinds(tokens)).toEqual([TokenType.Expression, TokenType.EOF]);
        expect(tokens[0]?.value).toBe("[+ 2 3]");
    });

    it("advances line and column through a bracket expression spanning lines", () => {
        const content = "a = [+\n 1\n 2] b = 1";
        const tokens = new Lexer(content).tokenize();
        expect(tokens[2]).toEqual({ type: TokenType.Expression, value: "[+\n 1\n 2]", line: 1, column: 5 });
        expect(tokens[3]).toEqual({ type: TokenType.Name, value: "b", line: 3, column: 5 });
        expect(parseConfig(content).get("a")).toEqual({ type: "Integer", value: 3n });
    });

    it("skips a bracket that does not open an arithmetic expression", () => {
        const tokens = new Lexer("[x 1]").tokenize();
        expect(kinds(tokens)).toEqual([TokenType.Name, TokenType.Number, TokenType.EOF]);
        expect(kinds(new Lexer("[+]").tokenize())).toEqual([TokenType.EOF]);
    });

    it("matches compound keywords before their prefixes", () => {
        expect(kinds(new Lexer("struct{ (list chr( := = } )").tokenize())).toEqual([
            TokenType.StructStart,
            TokenType.ListStart,
            TokenType.ChrStart,
            TokenType.Define,
            TokenType.Assign,
            TokenType.StructEnd,
            TokenType.RParen,
            TokenType.EOF,
        ]);
    });

    it("matches boolean keywords as prefixes of longer words", () => {
        const tokens = new Lexer("trueish").tokenize();
        expect(kinds(tokens)).toEqual([TokenType.True, TokenType.Name, TokenType.EOF]);
        expect(values(tokens)).toEqual(["true", "ish", ""]);
    });

    it("keeps escaped quotes inside strings", () => {
        const [token] = new Lexer('"a\\"b" rest').tokenize();
        expect(token?.type).toBe(TokenType.String);
        expect(token?.value).toBe('"a\\"b"');
    });

    it("skips the opening quote of an unterminated string", () => {
        const tokens = new Lexer("'abc").tokenize();
        expect(tokens[0]).toEqual({ type: TokenType.Name, value: "abc", line: 1, column: 2 });
    });

    it("silently skips unknown characters", () => {
        const [token] = new Lexer("@ $x").tokenize();
        expect(token).toEqual({ type: TokenType.Name, value: "x", line: 1, column: 4 });
    });

    it("reads 0x without digits as a decimal zero", () => {
        const tokens = new Lexer("0x").tokenize();
        expect(kinds(tokens)).toEqual([TokenType.Number, TokenType.Name, TokenType.EOF]);
    });

    it("keeps returning EOF once the input is exhausted", () => {
        const lexer = new Lexer("a");
        lexer.nextToken();
        expect(lexer.nextToken().type).toBe(TokenType.EOF);
        expect(lexer.nextToken()).toEqual({ type: TokenType.EOF, value: "", line: 1, column: 2 });
    });
});
