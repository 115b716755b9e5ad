import * as fs from "fs";
import * as path from "path";
import { Lexer } from "./lexer/lexer";
import { Parser, SyntaxDiagnostic } from "./parser/parser";
import { NameResolver } from "./analysis/resolver";
import { TypeChecker } from "./analysis/type_checker";
import { SymbolArena } from "./analysis/symbols";
import { CodeGenerator } from "./codegen/code_generator";
import { Diagnostic, DiagnosticCollector, ParseError } from "./errors";
import * as AST from "./ast/ast";

export interface CompileOptions {
    file?: string;
    // Set to false to stop after type checking.
    generate?: boolean;
}

export interface CompileResult {
    file: string;
    source: string;
    program: AST.Program;
    arena: SymbolArena;
    // Lexer warnings and errors, syntax errors and semantic errors, in the order found.
    diagnostics: Diagnostic[];
    syntaxErrors: SyntaxDiagnostic[];
    // Null whenever any stage reported an error, or when generation was not asked for.
    assembly: string | null;
}

/**
 * Runs the whole pipeline over one source text. Each stage runs only when
 * the ones before it succeeded: syntax errors stop after parsing, a missing
 * `main` stops after name resolution, and any error skips code generation.
 */
export function compile(source: string, options: CompileOptions = {}): CompileResult {
    const file = options.file ?? "<input>";
    const collector = new DiagnosticCollector(options.file);
    const arena = new SymbolArena();

    const parser = new Parser(new Lexer(source, collector));
    const program = parser.ParseProgram();
    const syntaxErrors = parser.getErrors();

    const result: CompileResult = {
        file,
        source,
        program,
        arena,
        diagnostics: collector.diagnostics,
        syntaxErrors,
        assembly: null,
    };

    for (const err of syntaxErrors) {
        collector.fatal(err.line, err.col, err.msg);
    }
    if (syntaxErrors.length > 0) {
        return result;
    }

    const resolver = new NameResolver(arena, collector);
    resolver.resolve(program);
    if (!resolver.hasMain) {
        return result;
    }

    new TypeChecker(arena, collector).check(program);

    if (options.generate !== false && !collector.hasErrors()) {
        result.assembly = new CodeGenerator(arena).generate(program);
    }
    return result;
}

/**
 * Reads and compiles a file. Syntax errors are thrown as a `ParseError`
 * carrying every error found so far; semantic diagnostics come back on the
 * result.
 */
export function compileFile(filePath: string, options: Omit<CompileOptions, "file"> = {}): CompileResult {
    const absolute = path.resolve(filePath);
    if (!fs.existsSync(absolute)) {
        throw new Error(`file not found: ${filePath}`);
    }
    const source = fs.readFileSync(absolute, "utf-8");
    const result = compile(source, { ...options, file: absolute });
    if (result.syntaxErrors.length > 0) {
        // lexer errors travel with the syntax errors they usually cause
        const errors = result.diagnostics
            .filter(d => d.severity === "error")
            .map(d => ({ msg: d.message, line: d.line, col: d.col }));
        throw new ParseError(errors, absolute, source);
    }
    return result;
}
