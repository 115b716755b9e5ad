import type { Token } from "../token";
import type { SymbolId } from "../analysis/symbols";
import type { Type } from "../analysis/types";

/*
 * The tree is a closed union of plain objects discriminated by `kind`.
 * Passes are functions that switch over `kind`; the only state they leave
 * behind lives in the few mutable fields noted below.
 */

export interface Program {
  kind: "Program";
  decls: Declaration[];
}

// ---------------------------------------------------------------------------
// Declarations

export type TypeName = "int" | "bool" | "void";

export interface PrimitiveTypeNode {
  kind: "PrimitiveType";
  token: Token;
  name: TypeName;
}

export interface StructTypeNode {
  kind: "StructType";
  token: Token; // struct
  name: Identifier;
}

export type TypeNode = PrimitiveTypeNode | StructTypeNode;

export interface VarDecl {
  kind: "VarDecl";
  type: TypeNode;
  name: Identifier;
}

export interface FormalDecl {
  kind: "FormalDecl";
  type: PrimitiveTypeNode;
  name: Identifier;
}

export interface FnDecl {
  kind: "FnDecl";
  returnType: PrimitiveTypeNode;
  name: Identifier;
  formals: FormalDecl[];
  body: Block;
}

export interface StructDecl {
  kind: "StructDecl";
  token: Token; // struct
  name: Identifier;
  fields: VarDecl[];
}

export type Declaration = VarDecl | FnDecl | StructDecl;

/** A braced body: local declarations first, then statements. */
export interface Block {
  decls: VarDecl[];
  stmts: Statement[];
}

// ---------------------------------------------------------------------------
// Statements

export interface AssignStatement {
  kind: "AssignStatement";
  assign: AssignExpression;
}

export interface PostIncStatement {
  kind: "PostIncStatement";
  token: Token; // ++
  target: Location;
}

export interface PostDecStatement {
  kind: "PostDecStatement";
  token: Token; // --
  target: Location;
}

export interface ReadStatement {
  kind: "ReadStatement";
  token: Token; // cin
  target: Location;
}

export interface WriteStatement {
  kind: "WriteStatement";
  token: Token; // cout
  value: Expression;
  // Filled in by the type checker; the code generator picks the syscall from it.
  valueType: Type | null;
}

export interface IfStatement {
  kind: "IfStatement";
  token: Token;
  condition: Expression;
  then: Block;
}

export interface IfElseStatement {
  kind: "IfElseStatement";
  token: Token;
  condition: Expression;
  then: Block;
  otherwise: Block;
}

export interface WhileStatement {
  kind: "WhileStatement";
  token: Token;
  condition: Expression;
  body: Block;
}

export interface RepeatStatement {
  kind: "RepeatStatement";
  token: Token;
  count: Expression;
  body: Block;
}

export interface CallStatement {
  kind: "CallStatement";
  call: CallExpression;
}

export interface ReturnStatement {
  kind: "ReturnStatement";
  token: Token;
  value: Expression | null;
}

export type Statement =
  | AssignStatement
  | PostIncStatement
  | PostDecStatement
  | ReadStatement
  | WriteStatement
  | IfStatement
  | IfElseStatement
  | WhileStatement
  | RepeatStatement
  | CallStatement
  | ReturnStatement;

// ---------------------------------------------------------------------------
// Expressions

export interface IntegerLiteral {
  kind: "IntegerLiteral";
  token: Token;
  value: number;
}

export interface StringLiteral {
  kind: "StringLiteral";
  token: Token;
  value: string; // raw source text, quotes and escapes included
}

export interface BooleanLiteral {
  kind: "BooleanLiteral";
  token: Token;
  value: boolean;
}

export interface Identifier {
  kind: "Identifier";
  token: Token;
  name: string;
  // Handle into the symbol arena, set by name resolution. Null means unresolved.
  symbol: SymbolId | null;
}

export interface DotAccess {
  kind: "DotAccess";
  token: Token; // .
  base: Location;
  field: Identifier;
  // Set by name resolution. `badAccess` stops cascading errors up a chain;
  // `structDef` is the definition of the field's struct type, when it has one.
  badAccess: boolean;
  structDef: SymbolId | null;
}

export interface AssignExpression {
  kind: "AssignExpression";
  token: Token; // =
  target: Location;
  value: Expression;
}

export interface CallExpression {
  kind: "CallExpression";
  callee: Identifier;
  args: Expression[];
}

export type UnaryOperator = "-" | "!";

export interface UnaryExpression {
  kind: "UnaryExpression";
  token: Token;
  operator: UnaryOperator;
  operand: Expression;
}

export type ArithmeticOperator = "+" | "-" | "*" | "/";
export type LogicalOperator = "&&" | "||";
export type EqualityOperator = "==" | "!=";
export type RelationalOperator = "<" | ">" | "<=" | ">=";
export type BinaryOperator = ArithmeticOperator | LogicalOperator | EqualityOperator | RelationalOperator;

export interface BinaryExpression {
  kind: "BinaryExpression";
  token: Token;
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export type Location = Identifier | DotAccess;

export type Expression =
  | IntegerLiteral
  | StringLiteral
  | BooleanLiteral
  | Identifier
  | DotAccess
  | AssignExpression
  | CallExpression
  | UnaryExpression
  | BinaryExpression;

export type Node = Program | Declaration | Statement | Expression | TypeNode | FormalDecl;

// ---------------------------------------------------------------------------
// Helpers

export function identifier(token: Token): Identifier {
  return { kind: "Identifier", token, name: token.literal, symbol: null };
}

export function isArithmetic(op: BinaryOperator): op is ArithmeticOperator {
  return op === "+" || op === "-" || op === "*" || op === "/";
}

export function isLogical(op: BinaryOperator): op is LogicalOperator {
  return op === "&&" || op === "||";
}

export function isEquality(op: BinaryOperator): op is EqualityOperator {
  return op === "==" || op === "!=";
}

export function isRelational(op: BinaryOperator): op is RelationalOperator {
  return op === "<" || op === ">" || op === "<=" || op === ">=";
}

export function isLocation(expr: Expression): expr is Location {
  return expr.kind === "Identifier" || expr.kind === "DotAccess";
}

/**
 * Where diagnostics about an expression point: operators report at their
 * (left) operand, calls at the callee, dot-accesses at the field name.
 */
export function position(expr: Expression): { line: number; col: number } {
  switch (expr.kind) {
    case "IntegerLiteral":
    case "StringLiteral":
    case "BooleanLiteral":
    case "Identifier":
      return { line: expr.token.line, col: expr.token.column };
    case "DotAccess":
      return position(expr.field);
    case "AssignExpression":
      return position(expr.target);
    case "CallExpression":
      return position(expr.callee);
    case "UnaryExpression":
      return position(expr.operand);
    case "BinaryExpression":
      return position(expr.left);
  }
}
