import * as fs from "fs";
import * as path from "path";
import { JsonGenerator } from "./generator/JsonGenerator.js";
import { ConfigParser } from "./prelyzer/Parser.js";
import type { ConfigDocument } from "./types/Value.js";

// --- 配置常量 ---
export const ENCODING = "utf-8";
export const DEFAULT_OUTPUT = "output.json";

export interface BuildOptions {
    input?: string;
    output: string;
    /** 未给出输入文件时读取标准输入 */
    readStdin?: () => string;
}

export function parseConfig(content: string): ConfigDocument {
    return new ConfigParser(content).parse();
}

export function convertConfig(content: string): string {
    return new JsonGenerator().generate(parseConfig(content));
}

const readProcessStdin = (): string => fs.readFileSync(0, ENCODING);

function loadInput(options: BuildOptions): string {
    const readStdin = options.readStdin ?? readProcessStdin;

    if (options.input) {
        if (fs.existsSync(options.input)) {
            const content = fs.readFileSync(options.input, ENCODING);
            console.error(`[Step 1] 已加载: ${options.input}`);
            return content;
        }
        console.warn(`[WARN] 输入文件不存在: ${options.input}，改为读取标准输入。`);
    }
    return readStdin();
}

/**
 * 完整的转换流程：读取 -> 解析 -> 序列化 -> 写出。返回进程退出码。
 * 出错时不会写出任何文件。
 */
export function runBuild(options: BuildOptions): number {
    try {
        const content = loadInput(options);
        if (!content.trim()) {
            console.error(`[Fatal Error] 输入为空。`);
            return 1;
        }

        console.error(`[Step 2] 正在解析...`);
        const json = convertConfig(content);

        const outputPath = path.resolve(process.cwd(), options.output);
        fs.mkdirSync(path.dirname(outputPath), { recursive: true }); // 确保输出目录存在
        fs.writeFileSync(outputPath, json, ENCODING);
        console.error(`[SUCCESS] 已保存: ${outputPath}`);

        console.log(json);
        return 0;
    } catch (error) {
        console.error(`[Fatal Error] 转换失败:`, error instanceof Error ? error.message : error);
        return 1;
    }
}
