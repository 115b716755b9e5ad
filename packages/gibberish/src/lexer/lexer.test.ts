import { describe, it, expect } from "vitest";
import { Lexer, MAX_INT } from "./lexer";
import { TokenType } from "../token";
import { DiagnosticCollector } from "../errors";

function lex(input: string) {
  const collector = new DiagnosticCollector();
  const tokens = new Lexer(input, collector).tokenize();
  return { tokens, diagnostics: collector.diagnostics };
}

describe("Lexer", () => {
  it("should tokenize basic symbols", () => {
    const input = "=+(){},;.*/";
    const lexer = new Lexer(input);

    const tests = [
      { type: TokenType.Assign, literal: "=" },
      { type: TokenType.Plus, literal: "+" },
      { type: TokenType.LParen, literal: "(" },
      { type: TokenType.RParen, literal: ")" },
      { type: TokenType.LBrace, literal: "{" },
      { type: TokenType.RBrace, literal: "}" },
      { type: TokenType.Comma, literal: "," },
      { type: TokenType.Semi, literal: ";" },
      { type: TokenType.Dot, literal: "." },
      { type: TokenType.Star, literal: "*" },
      { type: TokenType.Slash, literal: "/" },
      { type: TokenType.EOF, literal: "" },
    ];

    tests.forEach((tt) => {
      const tok = lexer.nextToken();
      expect(tok.type).toBe(tt.type);
      expect(tok.literal).toBe(tt.literal);
    });
  });

  it("should tokenize two-character operators", () => {
    const { tokens } = lex("<< >> ++ -- && || == != <= >= < > = ! -");
    expect(tokens.map(t => t.type)).toEqual([
      TokenType.Write,
      TokenType.Read,
      TokenType.PlusPlus,
      TokenType.MinusMinus,
      TokenType.AmpAmp,
      TokenType.PipePipe,
      TokenType.EqEq,
      TokenType.NotEq,
      TokenType.LtEq,
      TokenType.GtEq,
      TokenType.LT,
      TokenType.GT,
      TokenType.Assign,
      TokenType.Bang,
      TokenType.Minus,
      TokenType.EOF,
    ]);
  });

  it("should recognize keywords and identifiers", () => {
    const { tokens } = lex("int bool void true false struct cin cout if else while repeat return main _x1");
    expect(tokens.map(t => t.type)).toEqual([
      TokenType.Int,
      TokenType.Bool,
      TokenType.Void,
      TokenType.True,
      TokenType.False,
      TokenType.Struct,
      TokenType.Cin,
      TokenType.Cout,
      TokenType.If,
      TokenType.Else,
      TokenType.While,
      TokenType.Repeat,
      TokenType.Return,
      TokenType.Identifier,
      TokenType.Identifier,
      TokenType.EOF,
    ]);
    expect(tokens[14].literal).toBe("_x1");
  });

  it("should track lines and 1-based columns", () => {
    const { tokens } = lex("int x = 42;\n  cout << x;");
    const positions = tokens.map(t => [t.literal, t.line, t.column]);
    expect(positions).toEqual([
      ["int", 1, 1],
      ["x", 1, 5],
      ["=", 1, 7],
      ["42", 1, 9],
      [";", 1, 11],
      ["cout", 2, 3],
      ["<<", 2, 8],
      ["x", 2, 11],
      [";", 2, 12],
      ["", 2, 13],
    ]);
  });

  it("should skip both comment styles", () => {
    const { tokens } = lex("x // to end of line\n# whole line\ny");
    expect(tokens.map(t => [t.literal, t.line, t.column])).toEqual([
      ["x", 1, 1],
      ["y", 3, 1],
      ["", 3, 2],
    ]);
  });

  it("should keep a string literal's quotes and escapes", () => {
    const { tokens, diagnostics } = lex('"a\\tb\\n" "say \\"hi\\""');
    expect(diagnostics).toEqual([]);
    expect(tokens[0].type).toBe(TokenType.StringLiteral);
    expect(tokens[0].literal).toBe('"a\\tb\\n"');
    expect(tokens[1].literal).toBe('"say \\"hi\\""');
  });

  it("should drop a string literal with a bad escape", () => {
    const { tokens, diagnostics } = lex('"a\\qb" x');
    expect(tokens.map(t => t.literal)).toEqual(["x", ""]);
    expect(diagnostics).toEqual([
      { message: "String literal with bad escaped character ignored", line: 1, col: 1, severity: "error", file: undefined },
    ]);
  });

  it("should drop an unterminated string literal and continue on the next line", () => {
    const { tokens, diagnostics } = lex('"abc\nx');
    expect(tokens.map(t => [t.literal, t.line, t.column])).toEqual([["x", 2, 1], ["", 2, 2]]);
    expect(diagnostics.map(d => d.message)).toEqual(["Unterminated string literal ignored"]);
  });

  it("should name both problems in an unterminated literal with a bad escape", () => {
    const { diagnostics } = lex('"a\\q');
    expect(diagnostics.map(d => d.message)).toEqual([
      "Unterminated string literal with bad escaped character ignored",
    ]);
  });

  it("should clamp integer literals that overflow and warn", () => {
    const { tokens, diagnostics } = lex("2147483647 2147483648");
    expect(tokens[0].intValue).toBe(MAX_INT);
    expect(tokens[1].intValue).toBe(MAX_INT);
    expect(tokens[1].literal).toBe("2147483648");
    expect(diagnostics).toEqual([
      { message: "Integer literal too large; using max value", line: 1, col: 12, severity: "warning", file: undefined },
    ]);
  });

  it("should report and skip illegal characters", () => {
    const { tokens, diagnostics } = lex("a $ b & c");
    expect(tokens.map(t => t.literal)).toEqual(["a", "b", "c", ""]);
    expect(diagnostics.map(d => [d.message, d.line, d.col])).toEqual([
      ["Illegal character ignored: $", 1, 3],
      ["Illegal character ignored: &", 1, 7],
    ]);
  });

  it("should get through long runs of dropped characters", () => {
    const { tokens, diagnostics } = lex("void main() { }\n" + "@".repeat(20000));
    expect(tokens.map(t => t.literal)).toEqual(["void", "main", "(", ")", "{", "}", ""]);
    expect(diagnostics.length).toBe(20000);
    expect(diagnostics[19999]).toMatchObject({ message: "Illegal character ignored: @", line: 2, col: 20000 });
  });

  it("should get through long runs of dropped strings", () => {
    const { tokens, diagnostics } = lex('"\n'.repeat(20000));
    expect(tokens.map(t => t.type)).toEqual([TokenType.EOF]);
    expect(diagnostics.length).toBe(20000);
    expect(diagnostics[19999]).toMatchObject({ message: "Unterminated string literal ignored", line: 20000, col: 1 });
  });
});
