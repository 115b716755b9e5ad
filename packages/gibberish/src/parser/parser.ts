import { Lexer } from "../lexer/lexer";
import { Token, TokenType, describeToken } from "../token";
import * as AST from "../ast/ast";

enum Precedence {
  LOWEST = 1,
  ASSIGN,      // =
  LOGICAL_OR,  // ||
  LOGICAL_AND, // &&
  EQUALS,      // == !=
  LESSGREATER, // < > <= >=
  SUM,         // + -
  PRODUCT,     // * /
  PREFIX,      // -X or !X
  CALL,        // f(X) or X.Y
}

const PRECEDENCES: Partial<Record<TokenType, Precedence>> = {
  [TokenType.Assign]: Precedence.ASSIGN,
  [TokenType.PipePipe]: Precedence.LOGICAL_OR,
  [TokenType.AmpAmp]: Precedence.LOGICAL_AND,
  [TokenType.EqEq]: Precedence.EQUALS,
  [TokenType.NotEq]: Precedence.EQUALS,
  [TokenType.LT]: Precedence.LESSGREATER,
  [TokenType.GT]: Precedence.LESSGREATER,
  [TokenType.LtEq]: Precedence.LESSGREATER,
  [TokenType.GtEq]: Precedence.LESSGREATER,
  [TokenType.Plus]: Precedence.SUM,
  [TokenType.Minus]: Precedence.SUM,
  [TokenType.Star]: Precedence.PRODUCT,
  [TokenType.Slash]: Precedence.PRODUCT,
  [TokenType.Dot]: Precedence.CALL,
  [TokenType.LParen]: Precedence.CALL,
};

const BINARY_OPERATORS: Partial<Record<TokenType, AST.BinaryOperator>> = {
  [TokenType.PipePipe]: "||",
  [TokenType.AmpAmp]: "&&",
  [TokenType.EqEq]: "==",
  [TokenType.NotEq]: "!=",
  [TokenType.LT]: "<",
  [TokenType.GT]: ">",
  [TokenType.LtEq]: "<=",
  [TokenType.GtEq]: ">=",
  [TokenType.Plus]: "+",
  [TokenType.Minus]: "-",
  [TokenType.Star]: "*",
  [TokenType.Slash]: "/",
};

// How an expected token reads in "expected next token to be ..." messages.
const EXPECTED_TEXT: Partial<Record<TokenType, string>> = {
  [TokenType.Identifier]: "an identifier",
  [TokenType.LBrace]: "'{'",
  [TokenType.RBrace]: "'}'",
  [TokenType.LParen]: "'('",
  [TokenType.RParen]: "')'",
  [TokenType.Semi]: "';'",
  [TokenType.Write]: "'<<'",
  [TokenType.Read]: "'>>'",
};

type PrefixParseFn = () => AST.Expression | null;
type InfixParseFn = (left: AST.Expression) => AST.Expression | null;

export interface SyntaxDiagnostic {
  msg: string;
  line: number;
  col: number;
}

export class Parser {
  private tokens: Token[];
  private pos: number = 0;
  private curToken: Token;
  private peekToken: Token;
  private peekAheadToken: Token; // 3rd token lookahead for struct declarations
  private errors: SyntaxDiagnostic[] = [];

  private prefixParseFns: Partial<Record<TokenType, PrefixParseFn>> = {};
  private infixParseFns: Partial<Record<TokenType, InfixParseFn>> = {};

  constructor(lexer: Lexer) {
    this.tokens = lexer.tokenize();
    this.curToken = this.tokenAt(0);
    this.peekToken = this.tokenAt(1);
    this.peekAheadToken = this.tokenAt(2);

    this.registerPrefix(TokenType.Identifier, this.parseIdentifier.bind(this));
    this.registerPrefix(TokenType.IntLiteral, this.parseIntegerLiteral.bind(this));
    this.registerPrefix(TokenType.StringLiteral, this.parseStringLiteral.bind(this));
    this.registerPrefix(TokenType.True, this.parseBoolean.bind(this));
    this.registerPrefix(TokenType.False, this.parseBoolean.bind(this));
    this.registerPrefix(TokenType.Bang, this.parsePrefixExpression.bind(this));
    this.registerPrefix(TokenType.Minus, this.parsePrefixExpression.bind(this));
    this.registerPrefix(TokenType.LParen, this.parseGroupedExpression.bind(this));

    this.registerInfix(TokenType.Plus, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Minus, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Star, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Slash, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.EqEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.NotEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.LT, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.GT, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.LtEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.GtEq, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.AmpAmp, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.PipePipe, this.parseInfixExpression.bind(this));
    this.registerInfix(TokenType.Assign, this.parseAssignExpression.bind(this));
    this.registerInfix(TokenType.Dot, this.parseDotAccess.bind(this));
    this.registerInfix(TokenType.LParen, this.parseCallExpression.bind(this));
  }

  public nextToken() {
    if (this.pos < this.tokens.length - 1) {
      this.pos += 1;
    }
    this.syncWindow();
  }

  public ParseProgram(): AST.Program {
    const program: AST.Program = { kind: "Program", decls: [] };

    while (!this.curTokenIs(TokenType.EOF)) {
      const start = this.pos;
      const decl = this.parseDeclaration();
      if (decl !== null) {
        program.decls.push(decl);
      } else {
        this.synchronize(start);
      }
      this.nextToken();
    }
    return program;
  }

  public getErrors(): SyntaxDiagnostic[] {
    return this.errors;
  }

  // -------------------------------------------------------------------------
  // Declarations

  private parseDeclaration(): AST.Declaration | null {
    switch (this.curToken.type) {
      case TokenType.Struct:
        if (this.peekTokenIs(TokenType.Identifier) && this.peekAheadTokenIs(TokenType.LBrace)) {
          return this.parseStructDeclaration();
        }
        return this.parseVarDecl();
      case TokenType.Int:
      case TokenType.Bool:
      case TokenType.Void: {
        const type = this.parsePrimitiveType();
        if (type === null) return null;
        if (!this.expectPeek(TokenType.Identifier)) return null;
        const name = AST.identifier(this.curToken);
        if (this.peekTokenIs(TokenType.LParen)) {
          return this.parseFunctionDeclaration(type, name);
        }
        if (!this.expectPeek(TokenType.Semi)) return null;
        return { kind: "VarDecl", type, name };
      }
      default:
        this.error(`expected a declaration, got ${describeToken(this.curToken)}`, this.curToken);
        return null;
    }
  }

  /** `int x;`, `bool x;`, `void x;` or `struct S x;`; leaves curToken on the `;`. */
  private parseVarDecl(): AST.VarDecl | null {
    let type: AST.TypeNode | null;
    if (this.curTokenIs(TokenType.Struct)) {
      const token = this.curToken;
      if (!this.expectPeek(TokenType.Identifier)) return null;
      type = { kind: "StructType", token, name: AST.identifier(this.curToken) };
    } else {
      type = this.parsePrimitiveType();
    }
    if (type === null) return null;

    if (!this.expectPeek(TokenType.Identifier)) return null;
    const name = AST.identifier(this.curToken);
    if (!this.expectPeek(TokenType.Semi)) return null;
    return { kind: "VarDecl", type, name };
  }

  private parsePrimitiveType(): AST.PrimitiveTypeNode | null {
    const token = this.curToken;
    switch (token.type) {
      case TokenType.Int:
        return { kind: "PrimitiveType", token, name: "int" };
      case TokenType.Bool:
        return { kind: "PrimitiveType", token, name: "bool" };
      case TokenType.Void:
        return { kind: "PrimitiveType", token, name: "void" };
      default:
        this.error(`expected a type, got ${describeToken(token)}`, token);
        return null;
    }
  }

  private parseStructDeclaration(): AST.StructDecl | null {
    const token = this.curToken; // struct
    this.nextToken();
    const name = AST.identifier(this.curToken);
    this.nextToken(); // {
    this.nextToken();

    const fields: AST.VarDecl[] = [];
    while (!this.curTokenIs(TokenType.RBrace) && !this.curTokenIs(TokenType.EOF)) {
      const start = this.pos;
      const field = this.isTypeToken(this.curToken) ? this.parseVarDecl() : null;
      if (field !== null) {
        fields.push(field);
      } else {
        if (!this.isTypeToken(this.curToken)) {
          this.error(`expected a field declaration, got ${describeToken(this.curToken)}`, this.curToken);
        }
        this.synchronize(start);
      }
      this.nextToken();
    }

    if (!this.curTokenIs(TokenType.RBrace)) {
      this.error(`expected '}', got ${describeToken(this.curToken)}`, this.curToken);
      return null;
    }
    if (fields.length === 0) {
      this.error(`struct '${name.name}' must declare at least one field`, this.curToken);
    }
    if (!this.expectPeek(TokenType.Semi)) return null;
    return { kind: "StructDecl", token, name, fields };
  }

  private parseFunctionDeclaration(returnType: AST.PrimitiveTypeNode, name: AST.Identifier): AST.FnDecl | null {
    this.nextToken(); // (
    const formals = this.parseFormals();
    if (formals === null) return null;
    if (!this.expectPeek(TokenType.LBrace)) return null;
    const body = this.parseBlock();
    if (body === null) return null;
    return { kind: "FnDecl", returnType, name, formals, body };
  }

  private parseFormals(): AST.FormalDecl[] | null {
    const formals: AST.FormalDecl[] = [];
    if (this.peekTokenIs(TokenType.RParen)) {
      this.nextToken();
      return formals;
    }

    for (;;) {
      this.nextToken();
      const type = this.parsePrimitiveType();
      if (type === null) return null;
      if (!this.expectPeek(TokenType.Identifier)) return null;
      formals.push({ kind: "FormalDecl", type, name: AST.identifier(this.curToken) });

      if (!this.peekTokenIs(TokenType.Comma)) break;
      this.nextToken();
    }

    if (!this.expectPeek(TokenType.RParen)) return null;
    return formals;
  }

  /** Parses `{ decls stmts }` starting on the `{`; leaves curToken on the `}`. */
  private parseBlock(): AST.Block | null {
    const block: AST.Block = { decls: [], stmts: [] };
    this.nextToken();

    while (this.isTypeToken(this.curToken)) {
      const start = this.pos;
      const decl = this.parseVarDecl();
      if (decl !== null) {
        block.decls.push(decl);
      } else {
        this.synchronize(start);
      }
      this.nextToken();
    }

    while (!this.curTokenIs(TokenType.RBrace) && !this.curTokenIs(TokenType.EOF)) {
      const start = this.pos;
      const stmt = this.parseStatement();
      if (stmt !== null) {
        block.stmts.push(stmt);
      } else {
        this.synchronize(start);
      }
      this.nextToken();
    }

    if (!this.curTokenIs(TokenType.RBrace)) {
      this.error(`expected '}', got ${describeToken(this.curToken)}`, this.curToken);
      return null;
    }
    return block;
  }

  // -------------------------------------------------------------------------
  // Statements

  private parseStatement(): AST.Statement | null {
    switch (this.curToken.type) {
      case TokenType.Cin:
        return this.parseReadStatement();
      case TokenType.Cout:
        return this.parseWriteStatement();
      case TokenType.If:
        return this.parseIfStatement();
      case TokenType.While:
      case TokenType.Repeat:
        return this.parseLoopStatement();
      case TokenType.Return:
        return this.parseReturnStatement();
      case TokenType.Identifier:
        return this.parseExpressionStatement();
      default:
        this.error(`expected a statement, got ${describeToken(this.curToken)}`, this.curToken);
        return null;
    }
  }

  private parseReadStatement(): AST.ReadStatement | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.Read)) return null;
    this.nextToken();
    const target = this.parseExpression(Precedence.LOWEST);
    if (target === null) return null;
    if (!AST.isLocation(target)) {
      const at = AST.position(target);
      this.errors.push({ msg: "expected a variable or field to read into", line: at.line, col: at.col });
      return null;
    }
    if (!this.expectPeek(TokenType.Semi)) return null;
    return { kind: "ReadStatement", token, target };
  }

  private parseWriteStatement(): AST.WriteStatement | null {
    const token = this.curToken;
    if (!this.expectPeek(TokenType.Write)) return null;
    this.nextToken();
    const value = this.parseExpression(Precedence.LOWEST);
    if (value === null) return null;
    if (!this.expectPeek(TokenType.Semi)) return null;
    return { kind: "WriteStatement", token, value, valueType: null };
  }

  private parseIfStatement(): AST.IfStatement | AST.IfElseStatement | null {
    const token = this.curToken;
    const condition = this.parseCondition();
    if (condition === null) return null;
    if (!this.expectPeek(TokenType.LBrace)) return null;
    const then = this.parseBlock();
    if (then === null) return null;

    if (!this.peekTokenIs(TokenType.Else)) {
      return { kind: "IfStatement", token, condition, then };
    }
    this.nextToken();
    if (!this.expectPeek(TokenType.LBrace)) return null;
    const otherwise = this.parseBlock();
    if (otherwise === null) return null;
    return { kind: "IfElseStatement", token, condition, then, otherwise };
  }

  private parseLoopStatement(): AST.WhileStatement | AST.RepeatStatement | null {
    const token = this.curToken;
    const condition = this.parseCondition();
    if (condition === null) return null;
    if (!this.expectPeek(TokenType.LBrace)) return null;
    const body = this.parseBlock();
    if (body === null) return null;

    if (token.type === TokenType.Repeat) {
      return { kind: "RepeatStatement", token, count: condition, body };
    }
    return { kind: "WhileStatement", token, condition, body };
  }

  /** `( exp )` after if, while or repeat; leaves curToken on the `)`. */
  private parseCondition(): AST.Expression | null {
    if (!this.expectPeek(TokenType.LParen)) return null;
    this.nextToken();
    const condition = this.parseExpression(Precedence.LOWEST);
    if (condition === null) return null;
    if (!this.expectPeek(TokenType.RParen)) return null;
    return condition;
  }

  private parseReturnStatement(): AST.ReturnStatement | null {
    const token = this.curToken;
    if (this.peekTokenIs(TokenType.Semi)) {
      this.nextToken();
      return { kind: "ReturnStatement", token, value: null };
    }

    this.nextToken();
    const value = this.parseExpression(Precedence.LOWEST);
    if (value === null) return null;
    if (!this.expectPeek(TokenType.Semi)) return null;
    return { kind: "ReturnStatement", token, value };
  }

  /** Statements that start with a location or a call: `x = e;`, `x++;`, `x--;`, `f(a);`. */
  private parseExpressionStatement(): AST.Statement | null {
    const expr = this.parseExpression(Precedence.LOWEST);
    if (expr === null) return null;

    let stmt: AST.Statement;
    if (this.peekTokenIs(TokenType.PlusPlus) || this.peekTokenIs(TokenType.MinusMinus)) {
      this.nextToken();
      const token = this.curToken;
      if (!AST.isLocation(expr)) {
        this.error(`'${token.literal}' needs a variable or field`, token);
        return null;
      }
      stmt = token.type === TokenType.PlusPlus
        ? { kind: "PostIncStatement", token, target: expr }
        : { kind: "PostDecStatement", token, target: expr };
    } else if (expr.kind === "AssignExpression") {
      stmt = { kind: "AssignStatement", assign: expr };
    } else if (expr.kind === "CallExpression") {
      stmt = { kind: "CallStatement", call: expr };
    } else {
      const at = AST.position(expr);
      this.errors.push({ msg: "expected an assignment, increment, decrement or call", line: at.line, col: at.col });
      return null;
    }

    if (!this.expectPeek(TokenType.Semi)) return null;
    return stmt;
  }

  // -------------------------------------------------------------------------
  // Expressions

  private parseExpression(precedence: number): AST.Expression | null {
    const prefix = this.prefixParseFns[this.curToken.type];
    if (!prefix) {
      this.noPrefixParseFnError(this.curToken);
      return null;
    }

    let leftExp = prefix();

    while (leftExp !== null && !this.peekTokenIs(TokenType.Semi) && precedence < this.peekPrecedence()) {
      const infix = this.infixParseFns[this.peekToken.type];
      if (!infix) {
        return leftExp;
      }
      this.nextToken();
      leftExp = infix(leftExp);
    }

    return leftExp;
  }

  private parseIdentifier(): AST.Expression {
    return AST.identifier(this.curToken);
  }

  private parseIntegerLiteral(): AST.Expression {
    const token = this.curToken;
    return { kind: "IntegerLiteral", token, value: token.intValue ?? parseInt(token.literal, 10) };
  }

  private parseStringLiteral(): AST.Expression {
    return { kind: "StringLiteral", token: this.curToken, value: this.curToken.literal };
  }

  private parseBoolean(): AST.Expression {
    return { kind: "BooleanLiteral", token: this.curToken, value: this.curTokenIs(TokenType.True) };
  }

  private parsePrefixExpression(): AST.Expression | null {
    const token = this.curToken;
    const operator: AST.UnaryOperator = token.type === TokenType.Bang ? "!" : "-";
    this.nextToken();
    const operand = this.parseExpression(Precedence.PREFIX);
    if (operand === null) return null;
    return { kind: "UnaryExpression", token, operator, operand };
  }

  private parseInfixExpression(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    const operator = BINARY_OPERATORS[token.type];
    if (operator === undefined) {
      this.noPrefixParseFnError(token);
      return null;
    }
    const precedence = this.curPrecedence();
    this.nextToken();
    const right = this.parseExpression(precedence);
    if (right === null) return null;
    return { kind: "BinaryExpression", token, operator, left, right };
  }

  private parseAssignExpression(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    if (!AST.isLocation(left)) {
      this.error("invalid assignment target", token);
      return null;
    }
    this.nextToken();
    // one level below ASSIGN so that a = b = c groups to the right
    const value = this.parseExpression(Precedence.LOWEST);
    if (value === null) return null;
    return { kind: "AssignExpression", token, target: left, value };
  }

  private parseDotAccess(left: AST.Expression): AST.Expression | null {
    const token = this.curToken;
    if (!AST.isLocation(left)) {
      this.error("'.' must follow a variable or field", token);
      return null;
    }
    if (!this.expectPeek(TokenType.Identifier)) return null;
    return { kind: "DotAccess", token, base: left, field: AST.identifier(this.curToken), badAccess: false, structDef: null };
  }

  private parseCallExpression(callee: AST.Expression): AST.Expression | null {
    if (callee.kind !== "Identifier") {
      this.error("only a function name can be called", this.curToken);
      return null;
    }
    const args = this.parseCallArguments();
    if (args === null) return null;
    return { kind: "CallExpression", callee, args };
  }

  private parseCallArguments(): AST.Expression[] | null {
    const args: AST.Expression[] = [];

    if (this.peekTokenIs(TokenType.RParen)) {
      this.nextToken();
      return args;
    }

    this.nextToken();
    const first = this.parseExpression(Precedence.LOWEST);
    if (first === null) return null;
    args.push(first);

    while (this.peekTokenIs(TokenType.Comma)) {
      this.nextToken();
      this.nextToken();
      const arg = this.parseExpression(Precedence.LOWEST);
      if (arg === null) return null;
      args.push(arg);
    }

    if (!this.expectPeek(TokenType.RParen)) return null;
    return args;
  }

  private parseGroupedExpression(): AST.Expression | null {
    this.nextToken();
    const exp = this.parseExpression(Precedence.LOWEST);
    if (exp === null) return null;
    if (!this.expectPeek(TokenType.RParen)) return null;
    return exp;
  }

  // -------------------------------------------------------------------------
  // Token window and error recovery

  /**
   * Skips the rest of a broken declaration or statement. Stops on the next
   * `;`, or just before the next `}` so the enclosing block still sees it.
   */
  private synchronize(start: number) {
    for (;;) {
      if (this.curTokenIs(TokenType.Semi) || this.curTokenIs(TokenType.EOF)) return;
      if (this.curTokenIs(TokenType.RBrace)) {
        if (this.pos > start) {
          this.pos -= 1;
          this.syncWindow();
        }
        return;
      }
      this.nextToken();
    }
  }

  private syncWindow() {
    this.curToken = this.tokenAt(this.pos);
    this.peekToken = this.tokenAt(this.pos + 1);
    this.peekAheadToken = this.tokenAt(this.pos + 2);
  }

  private tokenAt(index: number): Token {
    // the lexer always ends the stream with EOF
    return this.tokens[Math.min(index, this.tokens.length - 1)];
  }

  private isTypeToken(tok: Token): boolean {
    return tok.type === TokenType.Int || tok.type === TokenType.Bool
      || tok.type === TokenType.Void || tok.type === TokenType.Struct;
  }

  private registerPrefix(tokenType: TokenType, fn: PrefixParseFn) {
    this.prefixParseFns[tokenType] = fn;
  }

  private registerInfix(tokenType: TokenType, fn: InfixParseFn) {
    this.infixParseFns[tokenType] = fn;
  }

  private curTokenIs(t: TokenType): boolean {
    return this.curToken.type === t;
  }

  private peekTokenIs(t: TokenType): boolean {
    return this.peekToken.type === t;
  }

  private peekAheadTokenIs(t: TokenType): boolean {
    return this.peekAheadToken.type === t;
  }

  private expectPeek(t: TokenType): boolean {
    if (this.peekTokenIs(t)) {
      this.nextToken();
      return true;
    } else {
      this.peekError(t);
      return false;
    }
  }

  private peekPrecedence(): number {
    return PRECEDENCES[this.peekToken.type] ?? Precedence.LOWEST;
  }

  private curPrecedence(): number {
    return PRECEDENCES[this.curToken.type] ?? Precedence.LOWEST;
  }

  private error(msg: string, at: Token) {
    this.errors.push({ msg, line: at.line, col: at.column });
  }

  private peekError(t: TokenType) {
    const expected = EXPECTED_TEXT[t] ?? t;
    this.error(`expected next token to be ${expected}, got ${describeToken(this.peekToken)} instead`, this.peekToken);
  }

  private noPrefixParseFnError(tok: Token) {
    this.error(`unexpected ${describeToken(tok)} in expression`, tok);
  }
}
