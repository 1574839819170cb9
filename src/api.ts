export { convertConfig, parseConfig, runBuild, type BuildOptions } from "./builder.js";
export { JsonGenerator } from "./generator/JsonGenerator.js";
export { applyOperator, evaluateExpression, floorDivide, type Operator } from "./prelyzer/Evaluator.js";
export { Lexer } from "./prelyzer/Lexer.js";
export { ConfigParser, type ParseContext } from "./prelyzer/Parser.js";
export { ConstantTable } from "./resolver/ConstantTable.js";
export { ConfigSyntaxError } from "./types/Errors.js";
export { type Token, TokenType } from "./types/Lexer.js";
export * from "./types/Value.js";
