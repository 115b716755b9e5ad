import * as path from "path";

// ANSI color codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";

const useColor = process.stderr.isTTY === true && !process.env.NO_COLOR;

function c(code: string, text: string): string {
    return useColor ? `${code}${text}${RESET}` : text;
}

export type Severity = "error" | "warning";

export interface Diagnostic {
    message: string;
    line: number;
    col: number;
    severity: Severity;
    file?: string;
}

/**
 * Where the lexer and the semantic passes send what they find.
 * Both calls return normally; the caller keeps going after a report.
 */
export interface DiagnosticSink {
    fatal(line: number, col: number, message: string): void;
    warn(line: number, col: number, message: string): void;
}

export class DiagnosticCollector implements DiagnosticSink {
    public diagnostics: Diagnostic[] = [];
    private file?: string;

    constructor(file?: string) {
        this.file = file;
    }

    public fatal(line: number, col: number, message: string) {
        this.diagnostics.push({ message, line, col, severity: "error", file: this.file });
    }

    public warn(line: number, col: number, message: string) {
        this.diagnostics.push({ message, line, col, severity: "warning", file: this.file });
    }

    public hasErrors(): boolean {
        return this.diagnostics.some(d => d.severity === "error");
    }

    public errors(): Diagnostic[] {
        return this.diagnostics.filter(d => d.severity === "error");
    }
}

/**
 * Syntax errors from one source file, thrown by `compileFile` callers that
 * want an exception instead of a result object.
 */
export class ParseError extends Error {
    public errors: Array<{ msg: string; line: number; col: number }>;
    public file: string;
    public source: string;

    constructor(
        errors: Array<{ msg: string; line: number; col: number }>,
        file: string,
        source: string,
    ) {
        super(`Parse errors in ${file}`);
        this.errors = errors;
        this.file = file;
        this.source = source;
    }
}

/**
 * The conventional one-line form: `3:7 ***ERROR*** Undeclared identifier`.
 */
export function formatDiagnostic(d: Diagnostic): string {
    const label = d.severity === "error" ? "***ERROR***" : "***WARNING***";
    return `${d.line}:${d.col} ${label} ${d.message}`;
}

/**
 * Format a compiler error with source context.
 *
 * Example output:
 *   error: Undeclared identifier
 *    --> src/main.gib:12:5
 *      |
 *   12 |     y = x + 1;
 *      |         ^
 */
export function formatError(
    message: string,
    file: string,
    line: number,
    col: number,
    source: string,
    severity: Severity = "error",
): string {
    const lines = source.split("\n");
    const lineIdx = line - 1;
    const sourceLine = lineIdx >= 0 && lineIdx < lines.length ? lines[lineIdx] : null;

    const gutterWidth = String(line).length;
    const emptyGutter = " ".repeat(gutterWidth);

    const relFile = path.relative(process.cwd(), file) || file;

    const sevLabel =
        severity === "error"
            ? c(BOLD + RED, "error")
            : c(BOLD + YELLOW, "warning");

    const parts: string[] = [
        `${sevLabel}${c(BOLD, ": " + message)}`,
        ` ${c(BLUE, "-->")} ${relFile}:${line}:${col}`,
    ];

    if (sourceLine !== null) {
        // col is 1-indexed from the lexer, so caret offset is col - 1 spaces
        const caretOffset = Math.max(0, col - 1);
        parts.push(
            ` ${emptyGutter} ${c(BLUE, "|")}`,
            ` ${c(BLUE, String(line).padStart(gutterWidth))} ${c(BLUE, "|")} ${sourceLine}`,
            ` ${emptyGutter} ${c(BLUE, "|")} ${" ".repeat(caretOffset)}${c(RED, "^")}`,
        );
    }

    return parts.join("\n");
}
