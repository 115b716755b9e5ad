import { describe, it, expect } from "vitest";
import { Lexer } from "../lexer/lexer";
import { Parser } from "../parser/parser";
import { NameResolver } from "./resolver";
import { TypeChecker } from "./type_checker";
import { SymbolArena } from "./symbols";
import { DiagnosticCollector } from "../errors";
import * as AST from "../ast/ast";

function check(input: string) {
    const collector = new DiagnosticCollector();
    const parser = new Parser(new Lexer(input, collector));
    const program = parser.ParseProgram();
    expect(parser.getErrors()).toEqual([]);

    const arena = new SymbolArena();
    new NameResolver(arena, collector).resolve(program);
    const checker = new TypeChecker(arena, collector);
    checker.check(program);
    return { program, checker, collector };
}

// Every statement below sits on line 9, starting in column 5.
const PRELUDE = `int i;
bool b;
struct S { int f; };
struct S s;
struct S t;
void v() { }
int g(int a, bool c) { return a; }
void main() {
`;

function checkStatement(stmt: string) {
    const { collector } = check(`${PRELUDE}    ${stmt}\n}`);
    return collector.diagnostics.map(d => [d.message, d.line, d.col]);
}

describe("TypeChecker", () => {
    it("should accept a well-typed statement", () => {
        expect(checkStatement("i = g(1, true) + s.f * 2;")).toEqual([]);
        expect(checkStatement("b = i < 3 && !b || s.f == i;")).toEqual([]);
        expect(checkStatement("s.f = i = 4;")).toEqual([]);
    });

    describe("operators", () => {
        it("should reject non-int operands of arithmetic", () => {
            expect(checkStatement("i = b + 1;")).toEqual([["Arithmetic operator applied to non-numeric operand", 9, 9]]);
            expect(checkStatement("i = 1 + b;")).toEqual([["Arithmetic operator applied to non-numeric operand", 9, 13]]);
            expect(checkStatement("i = -b;")).toEqual([["Arithmetic operator applied to non-numeric operand", 9, 10]]);
            expect(checkStatement("b++;")).toEqual([["Arithmetic operator applied to non-numeric operand", 9, 5]]);
        });

        it("should report each bad operand", () => {
            expect(checkStatement("i = b * true;")).toEqual([
                ["Arithmetic operator applied to non-numeric operand", 9, 9],
                ["Arithmetic operator applied to non-numeric operand", 9, 13],
            ]);
        });

        it("should reject non-int operands of relational operators", () => {
            expect(checkStatement("b = i < true;")).toEqual([["Relational operator applied to non-numeric operand", 9, 13]]);
        });

        it("should reject non-bool operands of logical operators", () => {
            expect(checkStatement("b = i && b;")).toEqual([["Logical operator applied to non-bool operand", 9, 9]]);
            expect(checkStatement("b = !i;")).toEqual([["Logical operator applied to non-bool operand", 9, 10]]);
        });
    });

    describe("equality", () => {
        it("should reject comparing two functions even though their types match", () => {
            expect(checkStatement("b = v == g;")).toEqual([["Equality operator applied to functions", 9, 9]]);
        });

        it("should reject comparing the results of void calls", () => {
            expect(checkStatement("b = v() == v();")).toEqual([["Equality operator applied to void functions", 9, 9]]);
        });

        it("should reject comparing struct variables of the same struct type", () => {
            expect(checkStatement("b = s == t;")).toEqual([["Equality operator applied to struct variables", 9, 9]]);
        });

        it("should reject comparing struct names", () => {
            expect(checkStatement("b = S == S;")).toEqual([["Equality operator applied to struct names", 9, 9]]);
        });

        it("should add a mismatch when the struct variables differ in type", () => {
            const { collector } = check(`struct S { int a; };
struct T { int b; };
struct S s;
struct T t;
bool b;
void main() {
    b = s == t;
}`);
            expect(collector.diagnostics.map(d => [d.message, d.line, d.col])).toEqual([
                ["Equality operator applied to struct variables", 7, 9],
                ["Type mismatch", 7, 9],
            ]);
        });

        it("should reject operands of different types", () => {
            expect(checkStatement("b = i == b;")).toEqual([["Type mismatch", 9, 9]]);
        });
    });

    describe("assignment", () => {
        it("should reject a value of another type", () => {
            expect(checkStatement("b = i;")).toEqual([["Type mismatch", 9, 5]]);
        });

        it("should reject assigning functions, struct names and struct variables", () => {
            expect(checkStatement("v = g;")).toEqual([["Function assignment", 9, 5]]);
            expect(checkStatement("S = S;")).toEqual([["Struct name assignment", 9, 5]]);
            expect(checkStatement("s = t;")).toEqual([["Struct variable assignment", 9, 5]]);
        });

        it("should report one error for struct variables of different types", () => {
            const { collector } = check(`struct S { int a; };
struct T { int b; };
struct S s;
struct T t;
void main() {
    s = t;
}`);
            expect(collector.diagnostics.map(d => [d.message, d.line, d.col])).toEqual([
                ["Struct variable assignment", 6, 5],
            ]);
        });

        it("should stay quiet about names that failed to resolve", () => {
            expect(checkStatement("i = z + 1;")).toEqual([["Undeclared identifier", 9, 9]]);
            expect(checkStatement("b = z;")).toEqual([["Undeclared identifier", 9, 9]]);
        });
    });

    describe("conditions", () => {
        it("should require bool conditions and an int repeat count", () => {
            expect(checkStatement("if (i) { }")).toEqual([["Non-bool expression used as an if condition", 9, 9]]);
            expect(checkStatement("if (i) { } else { }")).toEqual([["Non-bool expression used as an if condition", 9, 9]]);
            expect(checkStatement("while (i) { }")).toEqual([["Non-bool expression used as a while condition", 9, 12]]);
            expect(checkStatement("repeat (b) { }")).toEqual([["Non-integer expression used as a repeat clause", 9, 13]]);
        });

        it("should check the statements inside a body", () => {
            expect(checkStatement("while (b) { i = b; }")).toEqual([["Type mismatch", 9, 17]]);
        });
    });

    describe("calls", () => {
        it("should reject calling something that is not a function", () => {
            expect(checkStatement("i(1);")).toEqual([["Attempt to call a non-function", 9, 5]]);
        });

        it("should reject a call with the wrong number of arguments", () => {
            expect(checkStatement("g(1);")).toEqual([["Function call with wrong number of args", 9, 5]]);
        });

        it("should keep the declared return type when the argument count is wrong", () => {
            expect(checkStatement("cout << g(1, true, 3);")).toEqual([["Function call with wrong number of args", 9, 13]]);
            expect(checkStatement("b = g(1);")).toEqual([
                ["Function call with wrong number of args", 9, 9],
                ["Type mismatch", 9, 5],
            ]);
        });

        it("should report each argument whose type does not match its formal", () => {
            expect(checkStatement("g(b, i);")).toEqual([
                ["Type of actual does not match type of formal", 9, 7],
                ["Type of actual does not match type of formal", 9, 10],
            ]);
        });
    });

    describe("input and output", () => {
        it("should reject reading into functions, struct names and struct variables", () => {
            expect(checkStatement("cin >> g;")).toEqual([["Attempt to read a function", 9, 12]]);
            expect(checkStatement("cin >> S;")).toEqual([["Attempt to read a struct name", 9, 12]]);
            expect(checkStatement("cin >> s;")).toEqual([["Attempt to read a struct variable", 9, 12]]);
            expect(checkStatement("cin >> s.f;")).toEqual([]);
        });

        it("should reject writing functions, struct names, struct variables and void", () => {
            expect(checkStatement("cout << g;")).toEqual([["Attempt to write a function", 9, 13]]);
            expect(checkStatement("cout << S;")).toEqual([["Attempt to write a struct name", 9, 13]]);
            expect(checkStatement("cout << s;")).toEqual([["Attempt to write a struct variable", 9, 13]]);
            expect(checkStatement("cout << v();")).toEqual([["Attempt to write void", 9, 13]]);
        });

        it("should record the type of each written value", () => {
            const { program } = check(`${PRELUDE}    cout << b; cout << "x"; cout << i + 1;\n}`);
            const main = program.decls[program.decls.length - 1] as AST.FnDecl;
            const written = main.body.stmts.map(stmt => (stmt.kind === "WriteStatement" ? stmt.valueType : null));
            expect(written).toEqual([
                { kind: "primitive", name: "bool" },
                { kind: "primitive", name: "string" },
                { kind: "primitive", name: "int" },
            ]);
        });
    });

    describe("returns", () => {
        it("should check return values against the declared type", () => {
            const { collector } = check(`int f() {
    return;
}
int h() {
    return true;
}
void main() {
    return 1;
}`);
            expect(collector.diagnostics.map(d => [d.message, d.line, d.col])).toEqual([
                ["Missing return value", 2, 5],
                ["Bad return value", 5, 12],
                ["Return with a value in a void function", 8, 12],
            ]);
        });
    });

    it("should add nothing when run again over a checked tree", () => {
        const { program, checker, collector } = check(`${PRELUDE}    i = g(i, b);\n    cout << "ok";\n}`);
        expect(collector.diagnostics).toEqual([]);

        checker.check(program);
        expect(collector.diagnostics).toEqual([]);
    });
});
