// --- 2. 值模型 (Value) ---

export interface IntegerValue {
    type: "Integer";
    value: bigint;
}

export interface TextValue {
    type: "Text";
    value: string;
}

export interface BooleanValue {
    type: "Boolean";
    value: boolean;
}

export interface ListValue {
    type: "List";
    items: Value[];
}

// Map 保留插入顺序，重复字段覆盖但位置不变
export interface StructValue {
    type: "Struct";
    fields: Map<string, Value>;
}

/**
 * 没有常量绑定的裸名字，作为字面占位符输出。
 */
export interface IdentifierValue {
    type: "Identifier";
    name: string;
}

export type Value = IntegerValue | TextValue | BooleanValue | ListValue | StructValue | IdentifierValue;

/**
 * 顶层文档：名字 -> 值，按插入顺序。
 */
export type ConfigDocument = Map<string, Value>;

export const BARE_VALUE_KEY = "_value";

export const integer = (value: bigint): IntegerValue => ({ type: "Integer", value });
export const text = (value: string): TextValue => ({ type: "Text", value });
export const boolean = (value: boolean): BooleanValue => ({ type: "Boolean", value });
export const list = (items: Value[]): ListValue => ({ type: "List", items });
export const struct = (fields: Map<string, Value>): StructValue => ({ type: "Struct", fields });
export const identifier = (name: string): IdentifierValue => ({ type: "Identifier", name });

export function cloneValue(value: Value): Value {
    switch (value.type) {
        case "List":
            return list(value.items.map(cloneValue));
        case "Struct":
            return struct(new Map(Array.from(value.fields, ([key, field]) => [key, cloneValue(field)] as const)));
        default:
            return { ...value };
    }
}

export type PlainValue = number | bigint | string | boolean | PlainValue[] | { [key: string]: PlainValue };

/**
 * 转换为普通 JS 值。超出安全整数范围的整数保留为 bigint。
 */
export function toPlainValue(value: Value): PlainValue {
    switch (value.type) {
        case "Integer":
            return value.value >= BigInt(Number.MIN_SAFE_INTEGER) && value.value <= BigInt(Number.MAX_SAFE_INTEGER)
                ? Number(value.value)
                : value.value;
        case "Text":
        case "Boolean":
            return value.value;
        case "Identifier":
            return value.name;
        case "List":
            return value.items.map(toPlainValue);
        case "Struct":
            return fieldsToPlain(value.fields);
    }
}

export function documentToPlain(document: ConfigDocument): { [key: string]: PlainValue } {
    return fieldsToPlain(document);
}

// fromEntries 定义自有属性，`__proto__` 字段不会被吞掉
function fieldsToPlain(fields: Map<string, Value>): { [key: string]: PlainValue } {
    return Object.fromEntries(Array.from(fields, ([key, field]) => [key, toPlainValue(field)] as const));
}
