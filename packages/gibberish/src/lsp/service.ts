import {
  Diagnostic,
  DiagnosticSeverity,
  CompletionItem,
  CompletionItemKind,
  Hover,
} from 'vscode-languageserver/node';

import { compile } from '../compiler';
import { Keywords, Token } from '../token';
import * as AST from '../ast/ast';
import { SymbolArena, symbolToString } from '../analysis/symbols';

const KEYWORD_DOCS: Record<string, { detail: string; documentation: string }> = {
  struct: { detail: 'Struct declaration', documentation: 'Declares a struct type, or a variable of one.' },
  cin: { detail: 'Read statement', documentation: 'cin >> x; reads an integer into a variable or field.' },
  cout: { detail: 'Write statement', documentation: 'cout << e; writes an int, bool or string.' },
  repeat: { detail: 'Repeat loop', documentation: 'repeat (n) { ... } runs the body n times.' },
  while: { detail: 'While loop', documentation: 'Runs the body while the bool condition holds.' },
};

/**
 * Every problem in a document, as LSP diagnostics. Semantic checks only run
 * when the document parses.
 */
export function validate(text: string): Diagnostic[] {
  const result = compile(text, { generate: false });
  const lines = text.split('\n');

  return result.diagnostics.map(d => {
    const line = Math.max(0, d.line - 1);
    const character = Math.max(0, d.col - 1);
    return {
      severity: d.severity === 'error' ? DiagnosticSeverity.Error : DiagnosticSeverity.Warning,
      range: {
        start: { line, character },
        end: { line, character: character + wordLength(lines[line] ?? '', character) },
      },
      message: d.message,
      source: 'gibberish',
    };
  });
}

function wordLength(lineText: string, from: number): number {
  const match = /^(\w+|\S)/.exec(lineText.slice(from));
  return match === null ? 1 : match[0].length;
}

/** The resolved type of the name under a zero-based position, when there is one. */
export function hover(text: string, line: number, character: number): Hover | null {
  const result = compile(text, { generate: false });
  const node = findIdentifierAt(result.program, line + 1, character + 1);
  if (node === null) return null;

  return { contents: { kind: 'markdown', value: describe(node, result.arena) } };
}

function describe(id: AST.Identifier, arena: SymbolArena): string {
  if (id.symbol === null) {
    return `**Identifier** \`${id.name}\``;
  }
  const sym = arena.get(id.symbol);
  switch (sym.kind) {
    case 'function':
      return `**Function** \`${id.name}\`: \`${symbolToString(sym)}\``;
    case 'struct_def':
      return `**Struct** \`${id.name}\``;
    default:
      return `**Variable** \`${id.name}\`: \`${symbolToString(sym)}\``;
  }
}

export function completions(): CompletionItem[] {
  return Object.keys(Keywords).map((label, i) => ({
    label,
    kind: CompletionItemKind.Keyword,
    data: i + 1,
  }));
}

export function resolveCompletion(item: CompletionItem): CompletionItem {
  const docs = KEYWORD_DOCS[item.label];
  if (docs !== undefined) {
    item.detail = docs.detail;
    item.documentation = docs.documentation;
  }
  return item;
}

// ---------------------------------------------------------------------------
// Finding the identifier under the cursor

export function findIdentifierAt(program: AST.Program, line: number, col: number): AST.Identifier | null {
  for (const decl of program.decls) {
    const res = inDeclaration(decl, line, col);
    if (res) return res;
  }
  return null;
}

function inDeclaration(decl: AST.Declaration, line: number, col: number): AST.Identifier | null {
  switch (decl.kind) {
    case 'VarDecl':
      if (decl.type.kind === 'StructType' && isInside(decl.type.name.token, line, col)) return decl.type.name;
      return isInside(decl.name.token, line, col) ? decl.name : null;
    case 'FnDecl':
      if (isInside(decl.name.token, line, col)) return decl.name;
      for (const f of decl.formals) {
        if (isInside(f.name.token, line, col)) return f.name;
      }
      return inBlock(decl.body, line, col);
    case 'StructDecl':
      if (isInside(decl.name.token, line, col)) return decl.name;
      for (const field of decl.fields) {
        const res = inDeclaration(field, line, col);
        if (res) return res;
      }
      return null;
  }
}

function inBlock(block: AST.Block, line: number, col: number): AST.Identifier | null {
  for (const decl of block.decls) {
    const res = inDeclaration(decl, line, col);
    if (res) return res;
  }
  for (const stmt of block.stmts) {
    const res = inStatement(stmt, line, col);
    if (res) return res;
  }
  return null;
}

function inStatement(stmt: AST.Statement, line: number, col: number): AST.Identifier | null {
  switch (stmt.kind) {
    case 'AssignStatement':
      return inExpression(stmt.assign, line, col);
    case 'PostIncStatement':
    case 'PostDecStatement':
    case 'ReadStatement':
      return inExpression(stmt.target, line, col);
    case 'WriteStatement':
      return inExpression(stmt.value, line, col);
    case 'IfStatement':
      return inExpression(stmt.condition, line, col) ?? inBlock(stmt.then, line, col);
    case 'IfElseStatement':
      return inExpression(stmt.condition, line, col)
        ?? inBlock(stmt.then, line, col)
        ?? inBlock(stmt.otherwise, line, col);
    case 'WhileStatement':
      return inExpression(stmt.condition, line, col) ?? inBlock(stmt.body, line, col);
    case 'RepeatStatement':
      return inExpression(stmt.count, line, col) ?? inBlock(stmt.body, line, col);
    case 'CallStatement':
      return inExpression(stmt.call, line, col);
    case 'ReturnStatement':
      return stmt.value === null ? null : inExpression(stmt.value, line, col);
  }
}

function inExpression(expr: AST.Expression, line: number, col: number): AST.Identifier | null {
  switch (expr.kind) {
    case 'IntegerLiteral':
    case 'StringLiteral':
    case 'BooleanLiteral':
      return null;
    case 'Identifier':
      return isInside(expr.token, line, col) ? expr : null;
    case 'DotAccess':
      return inExpression(expr.base, line, col) ?? inExpression(expr.field, line, col);
    case 'AssignExpression':
      return inExpression(expr.target, line, col) ?? inExpression(expr.value, line, col);
    case 'CallExpression': {
      const res = inExpression(expr.callee, line, col);
      if (res) return res;
      for (const arg of expr.args) {
        const res2 = inExpression(arg, line, col);
        if (res2) return res2;
      }
      return null;
    }
    case 'UnaryExpression':
      return inExpression(expr.operand, line, col);
    case 'BinaryExpression':
      return inExpression(expr.left, line, col) ?? inExpression(expr.right, line, col);
  }
}

function isInside(token: Token, line: number, col: number): boolean {
  if (token.line !== line) return false;
  const len = token.literal.length;
  return col >= token.column && col < token.column + len;
}
