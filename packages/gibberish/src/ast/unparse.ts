import * as AST from "./ast";
import { SymbolArena, symbolToString } from "../analysis/symbols";

const INDENT = 4;

/**
 * Prints a program back as source. Every expression is fully parenthesised,
 * and when an arena is given each resolved identifier use is followed by
 * its symbol's type, e.g. `x(int)` or `f(int,bool->void)`.
 */
export function unparse(program: AST.Program, arena?: SymbolArena): string {
  return new Unparser(arena).program(program);
}

class Unparser {
  private out: string[] = [];
  private arena?: SymbolArena;

  constructor(arena?: SymbolArena) {
    this.arena = arena;
  }

  public program(program: AST.Program): string {
    for (const decl of program.decls) {
      this.decl(decl, 0);
    }
    return this.out.join("");
  }

  private line(indent: number, text: string) {
    this.out.push(" ".repeat(indent) + text + "\n");
  }

  private decl(decl: AST.Declaration, indent: number) {
    switch (decl.kind) {
      case "VarDecl":
        this.line(indent, `${this.type(decl.type)} ${decl.name.name};`);
        break;
      case "FnDecl": {
        const formals = decl.formals.map(f => `${this.type(f.type)} ${f.name.name}`).join(", ");
        this.line(indent, `${this.type(decl.returnType)} ${decl.name.name}(${formals}) {`);
        this.block(decl.body, indent + INDENT);
        this.line(indent, "}");
        this.line(0, "");
        break;
      }
      case "StructDecl":
        this.line(indent, `struct ${decl.name.name} {`);
        for (const field of decl.fields) {
          this.decl(field, indent + INDENT);
        }
        this.line(indent, "};");
        this.line(0, "");
        break;
    }
  }

  private type(type: AST.TypeNode): string {
    return type.kind === "PrimitiveType" ? type.name : `struct ${type.name.name}`;
  }

  private block(block: AST.Block, indent: number) {
    for (const decl of block.decls) {
      this.decl(decl, indent);
    }
    for (const stmt of block.stmts) {
      this.stmt(stmt, indent);
    }
  }

  private braced(indent: number, head: string, block: AST.Block) {
    this.line(indent, `${head} {`);
    this.block(block, indent + INDENT);
    this.line(indent, "}");
  }

  private stmt(stmt: AST.Statement, indent: number) {
    switch (stmt.kind) {
      case "AssignStatement":
        // the outermost assignment goes unparenthesised
        this.line(indent, `${this.assignment(stmt.assign)};`);
        break;
      case "PostIncStatement":
        this.line(indent, `${this.exp(stmt.target)}++;`);
        break;
      case "PostDecStatement":
        this.line(indent, `${this.exp(stmt.target)}--;`);
        break;
      case "ReadStatement":
        this.line(indent, `cin >> ${this.exp(stmt.target)};`);
        break;
      case "WriteStatement":
        this.line(indent, `cout << ${this.exp(stmt.value)};`);
        break;
      case "IfStatement":
        this.braced(indent, `if (${this.exp(stmt.condition)})`, stmt.then);
        break;
      case "IfElseStatement":
        this.braced(indent, `if (${this.exp(stmt.condition)})`, stmt.then);
        this.braced(indent, "else", stmt.otherwise);
        break;
      case "WhileStatement":
        this.braced(indent, `while (${this.exp(stmt.condition)})`, stmt.body);
        break;
      case "RepeatStatement":
        this.braced(indent, `repeat (${this.exp(stmt.count)})`, stmt.body);
        break;
      case "CallStatement":
        this.line(indent, `${this.exp(stmt.call)};`);
        break;
      case "ReturnStatement":
        this.line(indent, stmt.value === null ? "return;" : `return ${this.exp(stmt.value)};`);
        break;
    }
  }

  private assignment(assign: AST.AssignExpression): string {
    return `${this.exp(assign.target)} = ${this.exp(assign.value)}`;
  }

  private exp(expr: AST.Expression): string {
    switch (expr.kind) {
      case "IntegerLiteral":
        return String(expr.value);
      case "StringLiteral":
        return expr.value;
      case "BooleanLiteral":
        return expr.value ? "true" : "false";
      case "Identifier":
        if (this.arena !== undefined && expr.symbol !== null) {
          return `${expr.name}(${symbolToString(this.arena.get(expr.symbol))})`;
        }
        return expr.name;
      case "DotAccess":
        return `${this.exp(expr.base)}.${this.exp(expr.field)}`;
      case "AssignExpression":
        return `(${this.assignment(expr)})`;
      case "CallExpression":
        return `${this.exp(expr.callee)}(${expr.args.map(a => this.exp(a)).join(", ")})`;
      case "UnaryExpression":
        return `(${expr.operator}${this.exp(expr.operand)})`;
      case "BinaryExpression":
        return `(${this.exp(expr.left)} ${expr.operator} ${this.exp(expr.right)})`;
    }
  }
}
