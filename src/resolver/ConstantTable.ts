import { cloneValue, type Value } from "../types/Value.js";

/**
 * 单次解析会话内的常量表。
 * 存入与取出都做深拷贝，之后的重定义不会影响已经替换出去的值。
 */
export class ConstantTable {
    private constants: Map<string, Value> = new Map();

    // 允许重定义，后写覆盖
    define(name: string, value: Value): void {
        this.constants.set(name, cloneValue(value));
    }

    lookup(name: string): Value | undefined {
        const value = this.constants.get(name);
        return value ? cloneValue(value) : undefined;
    }

    names(): string[] {
        return Array.from(this.constants.keys());
    }
}
