import * as AST from "../ast/ast";
import type { DiagnosticSink } from "../errors";
import { SymbolTable } from "./symbol_table";
import { SymbolArena, SymbolId, Storage, Sym, StructDefinitionSymbol, FunctionSymbol } from "./symbols";
import { Type, IntType, BoolType, VoidType } from "./types";

const WORD = 4;
// saved $ra and $fp sit between the parameters and the locals
const SAVED_REGISTERS = 8;

interface Frame {
    next: number; // offset of the next free slot, counting down from 0
}

type Allocator = (size: number) => Storage;

export function primitiveType(node: AST.PrimitiveTypeNode): Type {
    switch (node.name) {
        case "int": return IntType;
        case "bool": return BoolType;
        case "void": return VoidType;
    }
}

/**
 * Binds every identifier in a program to its declaration and lays out
 * storage: globals by label, parameters and locals in the function's frame,
 * struct fields inside their instance.
 *
 * Reports through the sink and never stops early. The table is discarded
 * once resolution finishes; the AST keeps ids into the arena.
 */
export class NameResolver {
    private table: SymbolTable = new SymbolTable();
    private arena: SymbolArena;
    private sink: DiagnosticSink;
    private frame: Frame | null = null;
    private mainDeclared: boolean = false;

    constructor(arena: SymbolArena, sink: DiagnosticSink) {
        this.arena = arena;
        this.sink = sink;
    }

    /** True once a file-scope function named `main` has been declared. */
    public get hasMain(): boolean {
        return this.mainDeclared;
    }

    public resolve(program: AST.Program) {
        this.table = new SymbolTable();
        this.mainDeclared = false;

        for (const decl of program.decls) {
            switch (decl.kind) {
                case "VarDecl":
                    this.declareVariable(decl, this.table, this.table, () => ({ kind: "global" }));
                    break;
                case "FnDecl":
                    this.declareFunction(decl);
                    break;
                case "StructDecl":
                    this.declareStruct(decl);
                    break;
            }
        }

        if (!this.mainDeclared) {
            this.sink.fatal(0, 0, "No main function");
        }
    }

    // -------------------------------------------------------------------------
    // Declarations

    /**
     * `scope` receives the new name; struct type names are looked up in
     * `structScope`. The two differ only for struct fields.
     */
    private declareVariable(decl: AST.VarDecl, scope: SymbolTable, structScope: SymbolTable, allocate: Allocator) {
        const name = decl.name;
        let badDecl = false;
        let definition: StructDefinitionSymbol | null = null;

        if (decl.type.kind === "PrimitiveType" && decl.type.name === "void") {
            this.sink.fatal(name.token.line, name.token.column, "Non-function declared void");
            badDecl = true;
        } else if (decl.type.kind === "StructType") {
            const typeName = decl.type.name;
            const id = structScope.lookupGlobal(typeName.name);
            const sym = id === undefined ? undefined : this.arena.get(id);
            if (sym === undefined || sym.kind !== "struct_def") {
                this.sink.fatal(typeName.token.line, typeName.token.column, "Invalid name of struct type");
                badDecl = true;
            } else {
                typeName.symbol = sym.id;
                definition = sym;
            }
        }

        if (scope.lookupLocal(name.name) !== undefined) {
            this.sink.fatal(name.token.line, name.token.column, "Multiply declared identifier");
            badDecl = true;
        }

        if (badDecl) return;

        let sym: Sym;
        if (definition !== null) {
            sym = this.arena.structVariable(name.name, definition, allocate(definition.size));
        } else if (decl.type.kind === "PrimitiveType") {
            sym = this.arena.variable(name.name, primitiveType(decl.type), allocate(WORD));
        } else {
            return;
        }
        scope.addDecl(name.name, sym.id);
        name.symbol = sym.id;
    }

    private declareFunction(decl: AST.FnDecl) {
        const name = decl.name;
        let fn: FunctionSymbol | null = null;

        if (this.table.lookupLocal(name.name) !== undefined) {
            this.sink.fatal(name.token.line, name.token.column, "Multiply declared identifier");
        } else {
            const paramTypes = decl.formals.map(f => primitiveType(f.type));
            fn = this.arena.function(name.name, primitiveType(decl.returnType), paramTypes);
            this.table.addDecl(name.name, fn.id);
            name.symbol = fn.id;
            if (name.name === "main") {
                this.mainDeclared = true;
            }
        }

        // Even a duplicate gets its body resolved, in a scope of its own.
        const frame: Frame = { next: 0 };
        this.frame = frame;
        this.table.addScope();

        for (const formal of decl.formals) {
            this.declareFormal(formal, frame);
        }
        const paramSize = -frame.next;

        frame.next -= SAVED_REGISTERS;
        const localStart = frame.next;
        this.resolveBody(decl.body);

        if (fn !== null) {
            fn.paramSize = paramSize;
            fn.localSize = localStart - frame.next;
        }

        this.table.removeScope();
        this.frame = null;
    }

    private declareFormal(formal: AST.FormalDecl, frame: Frame) {
        const name = formal.name;
        let badDecl = false;

        // every formal owns a slot so that argument offsets match call sites
        const offset = frame.next;
        frame.next -= WORD;

        if (formal.type.name === "void") {
            this.sink.fatal(name.token.line, name.token.column, "Non-function declared void");
            badDecl = true;
        }
        if (this.table.lookupLocal(name.name) !== undefined) {
            this.sink.fatal(name.token.line, name.token.column, "Multiply declared identifier");
            badDecl = true;
        }
        if (badDecl) return;

        const sym = this.arena.variable(name.name, primitiveType(formal.type), { kind: "frame", offset });
        this.table.addDecl(name.name, sym.id);
        name.symbol = sym.id;
    }

    private declareStruct(decl: AST.StructDecl) {
        const name = decl.name;
        const duplicate = this.table.lookupLocal(name.name) !== undefined;
        if (duplicate) {
            this.sink.fatal(name.token.line, name.token.column, "Multiply declared identifier");
        }

        // The fields are checked even for a duplicate. The struct's own name is
        // not yet declared, so a struct cannot contain itself.
        const fields = new SymbolTable();
        let size = 0;
        for (const field of decl.fields) {
            this.declareVariable(field, fields, this.table, fieldSize => {
                const storage: Storage = { kind: "field", offset: size };
                size += fieldSize;
                return storage;
            });
        }

        if (duplicate) return;

        const sym = this.arena.structDefinition(name.name, fields, size);
        this.table.addDecl(name.name, sym.id);
        name.symbol = sym.id;
    }

    private allocateLocal(size: number): Storage {
        if (this.frame === null) {
            return { kind: "global" };
        }
        // the slot's address is its lowest word so struct fields count upward
        const offset = this.frame.next - size + WORD;
        this.frame.next -= size;
        return { kind: "frame", offset };
    }

    // -------------------------------------------------------------------------
    // Statements

    private resolveBody(block: AST.Block) {
        for (const decl of block.decls) {
            this.declareVariable(decl, this.table, this.table, size => this.allocateLocal(size));
        }
        for (const stmt of block.stmts) {
            this.resolveStatement(stmt);
        }
    }

    private resolveScopedBlock(block: AST.Block) {
        this.table.addScope();
        this.resolveBody(block);
        this.table.removeScope();
    }

    private resolveStatement(stmt: AST.Statement) {
        switch (stmt.kind) {
            case "AssignStatement":
                this.resolveExpression(stmt.assign);
                break;
            case "PostIncStatement":
            case "PostDecStatement":
            case "ReadStatement":
                this.resolveExpression(stmt.target);
                break;
            case "WriteStatement":
                this.resolveExpression(stmt.value);
                break;
            case "IfStatement":
                this.resolveExpression(stmt.condition);
                this.resolveScopedBlock(stmt.then);
                break;
            case "IfElseStatement":
                this.resolveExpression(stmt.condition);
                this.resolveScopedBlock(stmt.then);
                this.resolveScopedBlock(stmt.otherwise);
                break;
            case "WhileStatement":
                this.resolveExpression(stmt.condition);
                this.resolveScopedBlock(stmt.body);
                break;
            case "RepeatStatement":
                this.resolveExpression(stmt.count);
                this.resolveScopedBlock(stmt.body);
                break;
            case "CallStatement":
                this.resolveExpression(stmt.call);
                break;
            case "ReturnStatement":
                if (stmt.value !== null) this.resolveExpression(stmt.value);
                break;
        }
    }

    // -------------------------------------------------------------------------
    // Expressions

    private resolveExpression(expr: AST.Expression) {
        switch (expr.kind) {
            case "IntegerLiteral":
            case "StringLiteral":
            case "BooleanLiteral":
                break;
            case "Identifier":
                this.resolveIdentifier(expr);
                break;
            case "DotAccess":
                this.resolveDotAccess(expr);
                break;
            case "AssignExpression":
                this.resolveExpression(expr.target);
                this.resolveExpression(expr.value);
                break;
            case "CallExpression":
                this.resolveIdentifier(expr.callee);
                expr.args.forEach(arg => this.resolveExpression(arg));
                break;
            case "UnaryExpression":
                this.resolveExpression(expr.operand);
                break;
            case "BinaryExpression":
                this.resolveExpression(expr.left);
                this.resolveExpression(expr.right);
                break;
        }
    }

    private resolveIdentifier(id: AST.Identifier) {
        const sym = this.table.lookupGlobal(id.name);
        if (sym === undefined) {
            this.sink.fatal(id.token.line, id.token.column, "Undeclared identifier");
            id.symbol = null;
            return;
        }
        id.symbol = sym;
    }

    /**
     * Resolves `base.field`. The base is resolved first; its struct definition
     * supplies the table the field is looked up in. A failure anywhere in a
     * chain is reported once and marks every enclosing access bad.
     */
    private resolveDotAccess(expr: AST.DotAccess) {
        expr.badAccess = false;
        expr.structDef = null;
        this.resolveExpression(expr.base);

        let definition: StructDefinitionSymbol | null = null;
        const base = expr.base;

        if (base.kind === "Identifier") {
            if (base.symbol === null) {
                // already reported as undeclared
                expr.badAccess = true;
            } else {
                const sym = this.arena.get(base.symbol);
                if (sym.kind === "struct_var") {
                    definition = this.structDefinition(sym.definition);
                } else {
                    this.sink.fatal(base.token.line, base.token.column, "Dot-access of non-struct type");
                    expr.badAccess = true;
                }
            }
        } else if (base.badAccess) {
            expr.badAccess = true;
        } else if (base.structDef === null) {
            this.sink.fatal(base.field.token.line, base.field.token.column, "Dot-access of non-struct type");
            expr.badAccess = true;
        } else {
            definition = this.structDefinition(base.structDef);
        }

        if (expr.badAccess || definition === null) return;

        const field = expr.field;
        const id = definition.fields.lookupGlobal(field.name);
        if (id === undefined) {
            this.sink.fatal(field.token.line, field.token.column, "Invalid struct field name");
            expr.badAccess = true;
            return;
        }

        field.symbol = id;
        const sym = this.arena.get(id);
        if (sym.kind === "struct_var") {
            expr.structDef = sym.definition;
        }
    }

    private structDefinition(id: SymbolId): StructDefinitionSymbol | null {
        const sym = this.arena.get(id);
        return sym.kind === "struct_def" ? sym : null;
    }
}
