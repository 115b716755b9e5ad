import * as fs from "fs";
import * as path from "path";
import { compileFile, CompileResult } from "./compiler";
import { unparse } from "./ast/unparse";
import { Diagnostic, ParseError, formatDiagnostic, formatError } from "./errors";

export const VERSION = "1.0.0";

/** Where the CLI prints; the default goes to the console. */
export interface CliIO {
    log(message: string): void;
    error(message: string): void;
}

export const consoleIO: CliIO = {
    log: message => console.log(message),
    error: message => console.error(message),
};

interface BuildArgs {
    filename?: string;
    output?: string;
    plain: boolean;
}

function usage(): string {
    return `gibberish ${VERSION} - a compiler for the Gibberish teaching language

USAGE:
    gibberish <command> <file.gib> [options]

COMMANDS:
    build       Compile a source file to MIPS assembly
    check       Report errors without generating code
    unparse     Print the program back with the type of every name
    help        Show this help message
    version     Print version

OPTIONS:
    -o <file>   Where build writes the assembly (default: <file>.s)
    --plain     Print diagnostics as "line:col ***ERROR*** message"

EXAMPLES:
    gibberish build fib.gib
    gibberish check fib.gib --plain`;
}

function parseArgs(args: string[]): BuildArgs {
    const parsed: BuildArgs = { plain: false };
    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === "--plain") {
            parsed.plain = true;
        } else if (arg === "-o") {
            parsed.output = args[++i];
        } else if (!arg.startsWith("-") && parsed.filename === undefined) {
            parsed.filename = arg;
        }
    }
    return parsed;
}

function report(io: CliIO, diagnostics: Diagnostic[], file: string, source: string, plain: boolean) {
    for (const d of diagnostics) {
        if (plain) {
            io.error(formatDiagnostic(d));
        } else {
            io.error(formatError(d.message, d.file ?? file, d.line, d.col, source, d.severity));
            io.error("");
        }
    }
}

/**
 * Compiles the named file and prints what it finds. Returns the result when
 * no stage reported an error, or null after printing the errors.
 */
function load(io: CliIO, command: string, parsed: BuildArgs, generate: boolean): CompileResult | null {
    if (parsed.filename === undefined) {
        io.error("error: no input file specified\n");
        io.error(`Usage: gibberish ${command} <file.gib> [--plain]`);
        return null;
    }

    try {
        const result = compileFile(parsed.filename, { generate });
        report(io, result.diagnostics, result.file, result.source, parsed.plain);
        return result.diagnostics.some(d => d.severity === "error") ? null : result;
    } catch (e: unknown) {
        if (e instanceof ParseError) {
            const diagnostics: Diagnostic[] = e.errors.map(err => ({
                message: err.msg,
                line: err.line,
                col: err.col,
                severity: "error",
            }));
            report(io, diagnostics, e.file, e.source, parsed.plain);
            return null;
        }
        throw e;
    }
}

function build(io: CliIO, args: string[]): number {
    const parsed = parseArgs(args);
    const result = load(io, "build", parsed, true);
    if (result === null || result.assembly === null) return 1;

    const outFilename = parsed.output ?? result.file.replace(/\.[^/.]+$/, "") + ".s";
    fs.writeFileSync(outFilename, result.assembly);
    io.log(`Compiled ${path.basename(result.file)} to ${path.basename(outFilename)}`);
    return 0;
}

function check(io: CliIO, args: string[]): number {
    const parsed = parseArgs(args);
    const result = load(io, "check", parsed, false);
    if (result === null) return 1;
    io.log(`${path.basename(result.file)}: no errors`);
    return 0;
}

function printUnparsed(io: CliIO, args: string[]): number {
    const parsed = parseArgs(args);
    const result = load(io, "unparse", parsed, false);
    if (result === null) return 1;
    io.log(unparse(result.program, result.arena).trimEnd());
    return 0;
}

/**
 * Runs one CLI invocation and returns its exit code. `args` excludes the
 * node binary and script path.
 */
export function run(args: string[], io: CliIO = consoleIO): number {
    const command: string | undefined = args[0];

    try {
        switch (command) {
            case "build":
                return build(io, args.slice(1));
            case "check":
                return check(io, args.slice(1));
            case "unparse":
                return printUnparsed(io, args.slice(1));
            case "version":
            case "--version":
            case "-v":
                io.log(`gibberish ${VERSION}`);
                return 0;
            case "help":
            case "--help":
            case "-h":
            case undefined:
                io.log(usage());
                return 0;
            default:
                // a bare file name means build
                if (command.endsWith(".gib")) {
                    return build(io, args);
                }
                io.error(`error: unknown command '${command}'\n`);
                io.log(usage());
                return 1;
        }
    } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        io.error(`error: ${message}`);
        return 1;
    }
}
