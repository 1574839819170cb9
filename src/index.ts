#!/usr/bin/env node
import { Command } from "commander";
import { DEFAULT_OUTPUT, runBuild } from "./builder.js";

// --- CLI 应用程序配置 ---

const program = new Command();

program
    .name("cfg2json")
    .description("cfg2json - 将配置语言文件转换为 JSON")
    .version("1.0.0")
    .argument("[input]", "输入配置文件路径 (缺省时读取标准输入)")
    .option("-o, --output <path>", "输出 JSON 文件路径", DEFAULT_OUTPUT)
    .action((input: string | undefined, options: { output: string }) => {
        process.exitCode = runBuild({ input, output: options.output });
    });

// 解析命令行参数并执行
program.parse(process.argv);
