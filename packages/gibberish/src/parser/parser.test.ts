import { describe, it, expect } from "vitest";
import { Lexer } from "../lexer/lexer";
import { Parser } from "./parser";
import { unparse } from "../ast/unparse";
import * as AST from "../ast/ast";

function parse(input: string) {
  const lexer = new Lexer(input);
  const parser = new Parser(lexer);
  const program = parser.ParseProgram();
  return { program, errors: parser.getErrors() };
}

// Parses `stmt` as the only statement of main and prints it back.
function roundTrip(stmt: string): string {
  const { program, errors } = parse(`void main() { ${stmt} }`);
  expect(errors).toEqual([]);
  return unparse(program).split("\n")[1].trim();
}

describe("Parser", () => {
  it("should parse every kind of declaration", () => {
    const { program, errors } = parse(`
    int x;
    struct Point { int x; int y; };
    struct Point p;
    void main() { int a; a = 1; }
    `);

    expect(errors).toEqual([]);
    expect(program.decls.map(d => d.kind)).toEqual(["VarDecl", "StructDecl", "VarDecl", "FnDecl"]);

    const point = program.decls[1] as AST.StructDecl;
    expect(point.name.name).toBe("Point");
    expect(point.fields.map(f => f.name.name)).toEqual(["x", "y"]);

    const p = program.decls[2] as AST.VarDecl;
    expect(p.type.kind).toBe("StructType");

    const main = program.decls[3] as AST.FnDecl;
    expect(main.body.decls.length).toBe(1);
    expect(main.body.stmts.map(s => s.kind)).toEqual(["AssignStatement"]);
  });

  it("should parse formals in order", () => {
    const { program, errors } = parse("int add(int a, bool b) { return a; }");
    expect(errors).toEqual([]);
    const fn = program.decls[0] as AST.FnDecl;
    expect(fn.returnType.name).toBe("int");
    expect(fn.formals.map(f => [f.type.name, f.name.name])).toEqual([["int", "a"], ["bool", "b"]]);
  });

  it("should respect operator precedence", () => {
    expect(roundTrip("x = 1 + 2 * 3 - 4;")).toBe("x = ((1 + (2 * 3)) - 4);");
    expect(roundTrip("x = a || b && c == d < e;")).toBe("x = (a || (b && (c == (d < e))));");
    expect(roundTrip("x = -a * !b;")).toBe("x = ((-a) * (!b));");
    expect(roundTrip("x = (1 + 2) * 3;")).toBe("x = ((1 + 2) * 3);");
  });

  it("should group assignment to the right", () => {
    expect(roundTrip("a = b = c;")).toBe("a = (b = c);");
  });

  it("should parse dot chains and calls", () => {
    expect(roundTrip("p.q.r = 1;")).toBe("p.q.r = 1;");
    expect(roundTrip("f(1, g(x), y + 1);")).toBe("f(1, g(x), (y + 1));");
    expect(roundTrip("f();")).toBe("f();");
  });

  it("should parse increments, reads and writes", () => {
    expect(roundTrip("x++;")).toBe("x++;");
    expect(roundTrip("s.count--;")).toBe("s.count--;");
    expect(roundTrip("cin >> s.count;")).toBe("cin >> s.count;");
    expect(roundTrip('cout << "hi\\n";')).toBe('cout << "hi\\n";');
  });

  it("should parse control flow", () => {
    const { program, errors } = parse(`
    void main() {
        if (a) { x = 1; } else { x = 2; }
        while (b) { x--; }
        repeat (3) { cin >> x; }
        return;
    }`);

    expect(errors).toEqual([]);
    expect(unparse(program)).toBe(
      "void main() {\n" +
      "    if (a) {\n" +
      "        x = 1;\n" +
      "    }\n" +
      "    else {\n" +
      "        x = 2;\n" +
      "    }\n" +
      "    while (b) {\n" +
      "        x--;\n" +
      "    }\n" +
      "    repeat (3) {\n" +
      "        cin >> x;\n" +
      "    }\n" +
      "    return;\n" +
      "}\n" +
      "\n",
    );
  });

  it("should clamp oversized integer literals", () => {
    const { program } = parse("void main() { x = 2147483648; }");
    const main = program.decls[0] as AST.FnDecl;
    const stmt = main.body.stmts[0] as AST.AssignStatement;
    expect(stmt.assign.value).toMatchObject({ kind: "IntegerLiteral", value: 2147483647 });
  });

  describe("errors", () => {
    it("should report a missing semicolon at end of file", () => {
      const { errors } = parse("int x");
      expect(errors).toEqual([
        { msg: "expected next token to be ';', got end of file instead", line: 1, col: 6 },
      ]);
    });

    it("should report a token that cannot start a declaration", () => {
      const { errors } = parse("x;");
      expect(errors).toEqual([{ msg: "expected a declaration, got identifier 'x'", line: 1, col: 1 }]);
    });

    it("should report a token that cannot start a statement", () => {
      const { program, errors } = parse("void main() { 5; }");
      expect(errors).toEqual([{ msg: "expected a statement, got integer literal 5", line: 1, col: 15 }]);
      expect((program.decls[0] as AST.FnDecl).body.stmts).toEqual([]);
    });

    it("should reject an expression that does nothing", () => {
      const { errors } = parse("void main() { x + 1; }");
      expect(errors).toEqual([
        { msg: "expected an assignment, increment, decrement or call", line: 1, col: 15 },
      ]);
    });

    it("should reject assignment to a call", () => {
      const { errors } = parse("void main() { f() = 2; }");
      expect(errors).toEqual([{ msg: "invalid assignment target", line: 1, col: 19 }]);
    });

    it("should reject reading into a literal", () => {
      const { errors } = parse("void main() { cin >> 3; }");
      expect(errors).toEqual([{ msg: "expected a variable or field to read into", line: 1, col: 22 }]);
    });

    it("should require a field in every struct", () => {
      const { program, errors } = parse("struct S { };");
      expect(errors).toEqual([{ msg: "struct 'S' must declare at least one field", line: 1, col: 12 }]);
      expect(program.decls.map(d => d.kind)).toEqual(["StructDecl"]);
    });

    it("should recover at the next statement", () => {
      const { program, errors } = parse(`void main() {
    x = ;
    y = 2;
}`);
      expect(errors).toEqual([{ msg: "unexpected ';' in expression", line: 2, col: 9 }]);
      const main = program.decls[0] as AST.FnDecl;
      expect(main.body.stmts.length).toBe(1);
      expect(unparse(program)).toBe("void main() {\n    y = 2;\n}\n\n");
    });

    it("should keep the closing brace when a statement is cut short", () => {
      const { program, errors } = parse(`void f() {
    x = 1
}
void main() {}`);
      expect(errors).toEqual([{ msg: "expected next token to be ';', got '}' instead", line: 3, col: 1 }]);
      expect(program.decls.map(d => (d as AST.FnDecl).name.name)).toEqual(["f", "main"]);
    });
  });
});
