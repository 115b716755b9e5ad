import { Token, TokenType, lookupIdent } from "../token";
import { DiagnosticCollector } from "../errors";
import type { DiagnosticSink } from "../errors";

export const MAX_INT = 2147483647;

const ESCAPABLE = new Set(["n", "t", "'", '"', "\\", "?"]);

export class Lexer {
  private input: string;
  private position: number = 0; // current position in input (points to current char)
  private readPosition: number = 0; // current reading position in input (after current char)
  private ch: string | null = null; // current char under examination
  private line: number = 1;
  private column: number = 0;
  private sink: DiagnosticSink;

  constructor(input: string, sink: DiagnosticSink = new DiagnosticCollector()) {
    this.input = input;
    this.sink = sink;
    this.readChar();
  }

  public nextToken(): Token {
    for (;;) {
      const tok = this.scanToken();
      if (tok !== null) return tok;
    }
  }

  // null when the characters scanned were reported and dropped
  private scanToken(): Token | null {
    this.skipWhitespaceAndComments();

    let tok: Token;
    const line = this.line;
    const col = this.column;

    if (this.ch === null) {
      return { type: TokenType.EOF, literal: "", line, column: col };
    }

    switch (this.ch) {
      case "=":
        tok = this.either("=", TokenType.EqEq, TokenType.Assign, line, col);
        break;
      case "!":
        tok = this.either("=", TokenType.NotEq, TokenType.Bang, line, col);
        break;
      case "<":
        if (this.peekChar() === "<") {
          this.readChar();
          tok = { type: TokenType.Write, literal: "<<", line, column: col };
        } else {
          tok = this.either("=", TokenType.LtEq, TokenType.LT, line, col);
        }
        break;
      case ">":
        if (this.peekChar() === ">") {
          this.readChar();
          tok = { type: TokenType.Read, literal: ">>", line, column: col };
        } else {
          tok = this.either("=", TokenType.GtEq, TokenType.GT, line, col);
        }
        break;
      case "+":
        tok = this.either("+", TokenType.PlusPlus, TokenType.Plus, line, col);
        break;
      case "-":
        tok = this.either("-", TokenType.MinusMinus, TokenType.Minus, line, col);
        break;
      case "&":
        if (this.peekChar() === "&") {
          this.readChar();
          tok = { type: TokenType.AmpAmp, literal: "&&", line, column: col };
          break;
        }
        return this.illegal(line, col);
      case "|":
        if (this.peekChar() === "|") {
          this.readChar();
          tok = { type: TokenType.PipePipe, literal: "||", line, column: col };
          break;
        }
        return this.illegal(line, col);
      case ";":
        tok = { type: TokenType.Semi, literal: this.ch, line, column: col };
        break;
      case ",":
        tok = { type: TokenType.Comma, literal: this.ch, line, column: col };
        break;
      case ".":
        tok = { type: TokenType.Dot, literal: this.ch, line, column: col };
        break;
      case "(":
        tok = { type: TokenType.LParen, literal: this.ch, line, column: col };
        break;
      case ")":
        tok = { type: TokenType.RParen, literal: this.ch, line, column: col };
        break;
      case "{":
        tok = { type: TokenType.LBrace, literal: this.ch, line, column: col };
        break;
      case "}":
        tok = { type: TokenType.RBrace, literal: this.ch, line, column: col };
        break;
      case "*":
        tok = { type: TokenType.Star, literal: this.ch, line, column: col };
        break;
      case "/":
        tok = { type: TokenType.Slash, literal: this.ch, line, column: col };
        break;
      case '"': {
        // readString advances past the literal, so we return immediately
        const literal = this.readString(line, col);
        if (literal === null) return null;
        return { type: TokenType.StringLiteral, literal, line, column: col };
      }
      default:
        if (this.isLetter(this.ch)) {
          const literal = this.readIdentifier();
          return { type: lookupIdent(literal), literal, line, column: col };
        } else if (this.isDigit(this.ch)) {
          const literal = this.readNumber();
          let intValue = Number(literal);
          if (intValue > MAX_INT) {
            this.sink.warn(line, col, "Integer literal too large; using max value");
            intValue = MAX_INT;
          }
          return { type: TokenType.IntLiteral, literal, line, column: col, intValue };
        }
        return this.illegal(line, col);
    }

    this.readChar();
    return tok;
  }

  /** Every remaining token, EOF included. */
  public tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const tok = this.nextToken();
      tokens.push(tok);
      if (tok.type === TokenType.EOF) return tokens;
    }
  }

  private either(next: string, double: TokenType, single: TokenType, line: number, column: number): Token {
    const first = this.ch ?? "";
    if (this.peekChar() === next) {
      this.readChar();
      return { type: double, literal: first + next, line, column };
    }
    return { type: single, literal: first, line, column };
  }

  private illegal(line: number, col: number): null {
    this.sink.fatal(line, col, `Illegal character ignored: ${this.ch}`);
    this.readChar();
    return null;
  }

  private readChar() {
    if (this.readPosition >= this.input.length) {
      this.ch = null;
    } else {
      this.ch = this.input[this.readPosition];
    }
    this.position = this.readPosition;
    this.readPosition += 1;
    this.column += 1;
  }

  private peekChar(): string | null {
    if (this.readPosition >= this.input.length) {
      return null;
    } else {
      return this.input[this.readPosition];
    }
  }

  private readIdentifier(): string {
    const position = this.position;
    while (this.ch !== null && (this.isLetter(this.ch) || this.isDigit(this.ch))) {
      this.readChar();
    }
    return this.input.slice(position, this.position);
  }

  private readNumber(): string {
    const position = this.position;
    while (this.ch !== null && this.isDigit(this.ch)) {
      this.readChar();
    }
    return this.input.slice(position, this.position);
  }

  /**
   * Reads a string literal starting at the opening quote and returns its raw
   * text, quotes included. A literal that is unterminated on its line or has a
   * bad escape is reported and dropped (null).
   */
  private readString(line: number, col: number): string | null {
    const position = this.position;
    let badEscape = false;
    this.readChar(); // opening quote

    while (this.ch !== null && this.ch !== '"' && this.ch !== "\n") {
      if (this.ch === "\\") {
        const escaped = this.peekChar();
        if (escaped === null || escaped === "\n") {
          this.readChar();
          break;
        }
        if (!ESCAPABLE.has(escaped)) {
          badEscape = true;
        }
        this.readChar();
      }
      this.readChar();
    }

    if (this.ch !== '"') {
      this.sink.fatal(line, col, badEscape
        ? "Unterminated string literal with bad escaped character ignored"
        : "Unterminated string literal ignored");
      return null;
    }

    this.readChar(); // closing quote
    if (badEscape) {
      this.sink.fatal(line, col, "String literal with bad escaped character ignored");
      return null;
    }
    return this.input.slice(position, this.position);
  }

  private skipWhitespaceAndComments() {
    for (;;) {
      if (this.ch === " " || this.ch === "\t" || this.ch === "\n" || this.ch === "\r" || this.ch === "\f") {
        if (this.ch === "\n") {
          this.line += 1;
          this.column = 0;
        }
        this.readChar();
      } else if (this.ch === "#" || (this.ch === "/" && this.peekChar() === "/")) {
        this.skipComment();
      } else {
        return;
      }
    }
  }

  private skipComment() {
    while (this.ch !== null && this.ch !== "\n") {
      this.readChar();
    }
  }

  private isLetter(ch: string): boolean {
    return ("a" <= ch && ch <= "z") || ("A" <= ch && ch <= "Z") || ch === "_";
  }

  private isDigit(ch: string): boolean {
    return "0" <= ch && ch <= "9";
  }
}
