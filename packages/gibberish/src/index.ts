export { compile, compileFile } from "./compiler";
export type { CompileOptions, CompileResult } from "./compiler";
export { Lexer, MAX_INT } from "./lexer/lexer";
export { Parser } from "./parser/parser";
export type { SyntaxDiagnostic } from "./parser/parser";
export { unparse } from "./ast/unparse";
export * as AST from "./ast/ast";
export { SymbolTable, SymbolTableError } from "./analysis/symbol_table";
export { SymbolArena, symbolToString } from "./analysis/symbols";
export type { Sym, SymbolId, Storage } from "./analysis/symbols";
export { NameResolver } from "./analysis/resolver";
export { TypeChecker } from "./analysis/type_checker";
export { typeToString } from "./analysis/types";
export type { Type } from "./analysis/types";
export { CodeGenerator, CodegenError } from "./codegen/code_generator";
export { DiagnosticCollector, ParseError, formatDiagnostic, formatError } from "./errors";
export type { Diagnostic, DiagnosticSink, Severity } from "./errors";
