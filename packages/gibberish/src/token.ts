export enum TokenType {
  // Keywords
  Int = "INT",
  Bool = "BOOL",
  Void = "VOID",
  True = "TRUE",
  False = "FALSE",
  Struct = "STRUCT",
  Cin = "CIN",
  Cout = "COUT",
  If = "IF",
  Else = "ELSE",
  While = "WHILE",
  Repeat = "REPEAT",
  Return = "RETURN",

  // Literals
  Identifier = "IDENTIFIER",
  IntLiteral = "INTLITERAL",
  StringLiteral = "STRINGLITERAL",

  // Symbols
  LBrace = "LBRACE",       // {
  RBrace = "RBRACE",       // }
  LParen = "LPAREN",       // (
  RParen = "RPAREN",       // )
  Semi = "SEMI",           // ;
  Comma = "COMMA",         // ,
  Dot = "DOT",             // .
  Write = "WRITE",         // <<
  Read = "READ",           // >>
  PlusPlus = "PLUSPLUS",   // ++
  MinusMinus = "MINUSMINUS", // --
  Plus = "PLUS",           // +
  Minus = "MINUS",         // -
  Star = "STAR",           // *
  Slash = "SLASH",         // /
  Bang = "BANG",           // !
  AmpAmp = "AMPAMP",       // &&
  PipePipe = "PIPEPIPE",   // ||
  EqEq = "EQEQ",           // ==
  NotEq = "NOTEQ",         // !=
  LT = "LT",               // <
  GT = "GT",               // >
  LtEq = "LTEQ",           // <=
  GtEq = "GTEQ",           // >=
  Assign = "ASSIGN",       // =

  EOF = "EOF",
}

export interface Token {
  type: TokenType;
  literal: string;
  line: number;
  column: number;
  // Only set for IntLiteral tokens, after clamping to the 32-bit range.
  intValue?: number;
}

export const Keywords: Record<string, TokenType> = {
  int: TokenType.Int,
  bool: TokenType.Bool,
  void: TokenType.Void,
  true: TokenType.True,
  false: TokenType.False,
  struct: TokenType.Struct,
  cin: TokenType.Cin,
  cout: TokenType.Cout,
  if: TokenType.If,
  else: TokenType.Else,
  while: TokenType.While,
  repeat: TokenType.Repeat,
  return: TokenType.Return,
};

export function lookupIdent(ident: string): TokenType {
  return Object.prototype.hasOwnProperty.call(Keywords, ident) ? Keywords[ident] : TokenType.Identifier;
}

/** How a token type reads in a syntax error message. */
export function describeToken(tok: Token): string {
  switch (tok.type) {
    case TokenType.EOF:
      return "end of file";
    case TokenType.Identifier:
      return `identifier '${tok.literal}'`;
    case TokenType.IntLiteral:
      return `integer literal ${tok.literal}`;
    case TokenType.StringLiteral:
      return `string literal ${tok.literal}`;
    default:
      return `'${tok.literal}'`;
  }
}
