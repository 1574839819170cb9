/**
 * 语法错误：带位置以及期望/实际的词法单元类型。
 */
export class ConfigSyntaxError extends Error {
    constructor(
        readonly line: number,
        readonly column: number,
        readonly expected: string,
        readonly actual: string
    ) {
        super(`${line}:${column}: Expected ${expected}, got ${actual}`);
        this.name = "ConfigSyntaxError";
    }
}
