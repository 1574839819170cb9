import type { ConfigDocument, Value } from "../types/Value.js";

/**
 * JsonGenerator 类：将解析得到的文档序列化为 JSON 字符串。
 * 字段保持插入顺序，非 ASCII 字符不转义，整数按完整十进制位输出。
 */
export class JsonGenerator {
    /**
     * @param indent 每一级缩进的空格数
     */
    constructor(private readonly indent: number = 2) {}

    private generateFields(fields: Map<string, Value>, depth: number): string {
        if (fields.size === 0) return "{}";

        const space = " ".repeat(this.indent * (depth + 1));
        const entries: string[] = [];
        for (const [key, value] of fields) {
            entries.push(`${space}${JSON.stringify(key)}: ${this.generateValue(value, depth + 1)}`);
        }
        return `{\n${entries.join(",\n")}\n${" ".repeat(this.indent * depth)}}`;
    }

    private generateValue(value: Value, depth: number): string {
        switch (value.type) {
            case "Integer":
                return value.value.toString();
            case "Text":
                return JSON.stringify(value.value);
            case "Boolean":
                return value.value ? "true" : "false";
            case "Identifier":
                return JSON.stringify(value.name);
            case "Struct":
                return this.generateFields(value.fields, depth);
            case "List": {
                if (value.items.length === 0) return "[]";
                const space = " ".repeat(this.indent * (depth + 1));
                const items = value.items.map((item) => `${space}${this.generateValue(item, depth + 1)}`);
                return `[\n${items.join(",\n")}\n${" ".repeat(this.indent * depth)}]`;
            }
        }
    }

    public generate(document: ConfigDocument): string {
        return this.generateFields(document, 0);
    }
}
