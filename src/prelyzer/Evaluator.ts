import type { ConstantTable } from "../resolver/ConstantTable.js";
import { ConfigSyntaxError } from "../types/Errors.js";
import type { Token } from "../types/Lexer.js";
import { integer, type Value } from "../types/Value.js";

export type Operator = "+" | "-" | "*" | "/";

const isOperator = (op: string): op is Operator => op === "+" || op === "-" || op === "*" || op === "/";

/**
 * 整数除法，向负无穷取整；除数为 0 时结果为 0。
 */
export function floorDivide(a: bigint, b: bigint): bigint {
    if (b === 0n) return 0n;
    const quotient = a / b;
    return a % b !== 0n && (a < 0n) !== (b < 0n) ? quotient - 1n : quotient;
}

export function applyOperator(op: Operator, a: bigint, b: bigint): bigint {
    switch (op) {
        case "+":
            return a + b;
        case "-":
            return a - b;
        case "*":
            return a * b;
        case "/":
            return floorDivide(a, b);
    }
}

/**
 * 求值方括号表达式 `[op a b]`。
 * 只有一个操作数时忽略运算符，原样返回该操作数。
 */
export function evaluateExpression(token: Token, constants: ConstantTable): Value {
    const parts = token.value
        .slice(1, -1)
        .trim()
        .split(/\s+/)
        .filter((part) => part.length > 0);
    const [op, first, second] = parts;

    if (op === undefined || first === undefined) {
        throw new ConfigSyntaxError(token.line, token.column, "operator and operand", token.value);
    }
    if (!isOperator(op)) {
        throw new ConfigSyntaxError(token.line, token.column, "one of + - * /", op);
    }

    const left = resolveOperand(first, token, constants);
    if (second === undefined) return left;

    const right = resolveOperand(second, token, constants);
    if (left.type !== "Integer" || right.type !== "Integer") {
        throw new ConfigSyntaxError(token.line, token.column, "numeric arguments", token.value);
    }
    return integer(applyOperator(op, left.value, right.value));
}

// 常量优先，其次按 0x 十六进制或十进制字面量解析
function resolveOperand(operand: string, token: Token, constants: ConstantTable): Value {
    const constant = constants.lookup(operand);
    if (constant) return constant;

    if (/^0[xX][0-9a-fA-F]+$/.test(operand) || /^[+-]?[0-9]+$/.test(operand)) {
        return integer(BigInt(operand));
    }
    throw new ConfigSyntaxError(token.line, token.column, "integer literal or constant", operand);
}
