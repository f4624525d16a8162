export * from "./ast";
export * from "./builtins";
export * from "./config";
export * from "./couchlisp";
export * from "./env";
export * from "./errors";
export * from "./evaluator";
export * from "./lexer";
export * from "./parser";
export * from "./printer";
export * from "./reader";
export * from "./repl";
export * from "./value";
