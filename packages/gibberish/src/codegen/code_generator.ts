import * as AST from "../ast/ast";
import { SymbolArena, Sym, FunctionSymbol, storageSize } from "../analysis/symbols";
import { isStringType } from "../analysis/types";
import { AssemblyWriter, START_LABEL, globalLabel, TRUE, FALSE, FP, SP, RA, V0, A0, T0, T1 } from "./assembly";

/** A tree that should never have reached code generation. */
export class CodegenError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CodegenError";
    }
}

const ARITHMETIC_OPCODES: Record<"+" | "-" | "==" | "!=" | "<" | ">" | "<=" | ">=", string> = {
    "+": "add",
    "-": "sub",
    "==": "seq",
    "!=": "sne",
    "<": "slt",
    ">": "sgt",
    "<=": "sle",
    ">=": "sge",
};

export function functionLabel(name: string): string {
    return name === "main" ? "main" : globalLabel(name);
}

// identifiers cannot contain '.', so exit labels never meet a user label
export function exitLabel(name: string): string {
    return `_${name}.Exit`;
}

/**
 * Lowers a resolved, type-checked program to stack-machine assembly.
 *
 * Every expression leaves exactly one word on the stack; every statement
 * leaves the stack as it found it. Boolean conditions of if and while are
 * compiled as jumps instead of values.
 */
export class CodeGenerator {
    private arena: SymbolArena;
    private out: AssemblyWriter = new AssemblyWriter();
    private exitLabel: string = "";

    constructor(arena: SymbolArena) {
        this.arena = arena;
    }

    public generate(program: AST.Program): string {
        this.out = new AssemblyWriter();

        for (const decl of program.decls) {
            switch (decl.kind) {
                case "VarDecl": {
                    const sym = this.symbolOf(decl.name);
                    this.out.genGlobal(sym.name, storageSize(this.arena, sym));
                    break;
                }
                case "FnDecl":
                    this.genFunction(decl);
                    break;
                case "StructDecl":
                    // struct definitions take no storage
                    break;
            }
        }
        return this.out.toString();
    }

    private symbolOf(id: AST.Identifier): Sym {
        if (id.symbol === null) {
            throw new CodegenError(`'${id.name}' at ${id.token.line}:${id.token.column} was never resolved`);
        }
        return this.arena.get(id.symbol);
    }

    private functionOf(id: AST.Identifier): FunctionSymbol {
        const sym = this.symbolOf(id);
        if (sym.kind !== "function") {
            throw new CodegenError(`'${id.name}' is not a function`);
        }
        return sym;
    }

    // -------------------------------------------------------------------------
    // Functions

    private genFunction(decl: AST.FnDecl) {
        const fn = this.functionOf(decl.name);
        const isMain = fn.name === "main";
        this.exitLabel = exitLabel(fn.name);

        this.out.directive(".text");
        if (isMain) {
            this.out.directive(".globl main");
            this.out.line("main:\t\t# METHOD ENTRY");
            this.out.line(`${START_LABEL}:\t# add __start label for main only`);
        } else {
            this.out.genLabel(functionLabel(fn.name));
        }

        // prologue
        this.out.genPush(RA);
        this.out.genPush(FP);
        this.out.generate("addu", FP, SP, fn.paramSize + 8);
        this.out.generate("subu", SP, SP, fn.localSize);

        this.genBlock(decl.body);

        // epilogue
        this.out.comment("FUNCTION EXIT");
        this.out.genLabel(this.exitLabel);
        this.out.generateIndexed("lw", RA, FP, -fn.paramSize);
        this.out.generateWithComment("move", " save control link", T0, FP);
        this.out.generateIndexed("lw", FP, FP, -(fn.paramSize + 4), " restore FP");
        this.out.generateWithComment("move", " restore SP", SP, T0);
        if (isMain) {
            this.out.generateWithComment("li", " load exit code for syscall", V0, 10);
            this.out.generateWithComment("syscall", " only do this for main");
        } else {
            this.out.generate("jr", RA);
        }
    }

    // -------------------------------------------------------------------------
    // Statements

    private genBlock(block: AST.Block) {
        for (const stmt of block.stmts) {
            this.genStatement(stmt);
        }
    }

    private genStatement(stmt: AST.Statement) {
        switch (stmt.kind) {
            case "AssignStatement":
                this.genExpression(stmt.assign);
                this.out.genPop(T0);
                break;
            case "PostIncStatement":
            case "PostDecStatement":
                this.genExpression(stmt.target);
                this.out.genPop(T0);
                this.out.generate(stmt.kind === "PostIncStatement" ? "add" : "sub", T0, T0, 1);
                this.genStore(stmt.target, T0);
                break;
            case "ReadStatement":
                this.out.generate("li", V0, 5);
                this.out.generate("syscall");
                this.genStore(stmt.target, V0);
                break;
            case "WriteStatement":
                this.genWrite(stmt);
                break;
            case "IfStatement": {
                const trueLabel = this.out.nextLabel();
                const doneLabel = this.out.nextLabel();
                this.genJump(stmt.condition, trueLabel, doneLabel);
                this.out.genLabel(trueLabel);
                this.genBlock(stmt.then);
                this.out.genLabel(doneLabel);
                break;
            }
            case "IfElseStatement": {
                const trueLabel = this.out.nextLabel();
                const falseLabel = this.out.nextLabel();
                const doneLabel = this.out.nextLabel();
                this.genJump(stmt.condition, trueLabel, falseLabel);
                this.out.genLabel(trueLabel);
                this.genBlock(stmt.then);
                this.out.generate("j", doneLabel);
                this.out.genLabel(falseLabel);
                this.genBlock(stmt.otherwise);
                this.out.genLabel(doneLabel);
                break;
            }
            case "WhileStatement": {
                const entryLabel = this.out.nextLabel();
                const bodyLabel = this.out.nextLabel();
                const doneLabel = this.out.nextLabel();
                this.out.genLabel(entryLabel);
                this.genJump(stmt.condition, bodyLabel, doneLabel);
                this.out.genLabel(bodyLabel);
                this.genBlock(stmt.body);
                this.out.generate("j", entryLabel);
                this.out.genLabel(doneLabel);
                break;
            }
            case "RepeatStatement":
                this.genRepeat(stmt);
                break;
            case "CallStatement":
                this.genExpression(stmt.call);
                this.out.genPop(T0);
                break;
            case "ReturnStatement":
                if (stmt.value !== null) {
                    this.genExpression(stmt.value);
                    this.out.genPop(V0);
                }
                this.out.generate("j", this.exitLabel);
                break;
        }
    }

    private genWrite(stmt: AST.WriteStatement) {
        if (stmt.valueType === null) {
            throw new CodegenError(`write at ${stmt.token.line}:${stmt.token.column} was never type-checked`);
        }
        this.out.comment("WRITE");
        this.genExpression(stmt.value);
        this.out.genPop(A0);
        this.out.generate("li", V0, isStringType(stmt.valueType) ? 4 : 1);
        this.out.generate("syscall");
    }

    /**
     * The count is evaluated once and stays on the stack as the loop
     * counter until the loop ends.
     */
    private genRepeat(stmt: AST.RepeatStatement) {
        const loopLabel = this.out.nextLabel();
        const doneLabel = this.out.nextLabel();

        this.genExpression(stmt.count);
        this.out.genLabel(loopLabel, "REPEAT");
        this.out.generateIndexed("lw", T0, SP, 4);
        this.out.generate("blez", T0, doneLabel);
        this.out.generate("sub", T0, T0, 1);
        this.out.generateIndexed("sw", T0, SP, 4);
        this.genBlock(stmt.body);
        this.out.generate("j", loopLabel);
        this.out.genLabel(doneLabel);
        this.out.genPop(T0);
    }

    /** Stores `reg` into a location. Uses $t0 and $t1 as scratch. */
    private genStore(target: AST.Location, reg: string) {
        if (target.kind === "Identifier") {
            const sym = this.symbolOf(target);
            if (sym.kind === "variable" && sym.storage.kind === "global") {
                this.out.generate("sw", reg, globalLabel(sym.name));
                return;
            }
            if (sym.kind === "variable" && sym.storage.kind === "frame") {
                this.out.generateIndexed("sw", reg, FP, sym.storage.offset);
                return;
            }
        }
        this.out.genPush(reg);
        this.genAddress(target);
        this.out.genPop(T0);
        this.out.genPop(T1);
        this.out.generateIndexed("sw", T1, T0, 0);
    }

    // -------------------------------------------------------------------------
    // Expressions

    private genExpression(expr: AST.Expression) {
        switch (expr.kind) {
            case "IntegerLiteral":
                this.out.generate("li", T0, expr.value);
                this.out.genPush(T0);
                break;
            case "BooleanLiteral":
                this.out.generate("li", T0, expr.value ? TRUE : FALSE);
                this.out.genPush(T0);
                break;
            case "StringLiteral":
                this.out.generate("la", T0, this.out.stringLabel(expr.value));
                this.out.genPush(T0);
                break;
            case "Identifier":
                this.genLoad(expr);
                break;
            case "DotAccess":
                this.genAddress(expr);
                this.out.genPop(T0);
                this.out.generateIndexed("lw", T0, T0, 0);
                this.out.genPush(T0);
                break;
            case "AssignExpression":
                this.genExpression(expr.value);
                this.genAddress(expr.target);
                this.out.genPop(T0);
                this.out.genPop(T1);
                this.out.generateIndexed("sw", T1, T0, 0);
                this.out.genPush(T1);
                break;
            case "CallExpression": {
                const fn = this.functionOf(expr.callee);
                expr.args.forEach(arg => this.genExpression(arg));
                this.out.generateWithComment("jal", "FUNCTION CALL", functionLabel(fn.name));
                this.out.genPush(V0);
                break;
            }
            case "UnaryExpression":
                this.genExpression(expr.operand);
                this.out.genPop(T0);
                if (expr.operator === "-") {
                    this.out.generate("li", T1, -1);
                    this.out.generate("mult", T0, T1);
                    this.out.generate("mflo", T0);
                } else {
                    this.out.generate("seq", T0, T0, FALSE);
                }
                this.out.genPush(T0);
                break;
            case "BinaryExpression":
                if (AST.isLogical(expr.operator)) {
                    this.genShortCircuit(expr);
                } else {
                    this.genBinary(expr);
                }
                break;
        }
    }

    private genLoad(id: AST.Identifier) {
        const sym = this.symbolOf(id);
        if (sym.kind !== "variable") {
            throw new CodegenError(`'${id.name}' has no scalar value`);
        }
        if (sym.storage.kind === "frame") {
            this.out.generateIndexed("lw", T0, FP, sym.storage.offset);
        } else {
            this.out.generate("lw", T0, globalLabel(sym.name));
        }
        this.out.genPush(T0);
    }

    /** Pushes the address of a location. */
    private genAddress(loc: AST.Location) {
        if (loc.kind === "DotAccess") {
            const field = this.symbolOf(loc.field);
            if (field.kind !== "variable" && field.kind !== "struct_var") {
                throw new CodegenError(`'${loc.field.name}' is not a field`);
            }
            const offset = field.storage.kind === "field" ? field.storage.offset : 0;
            this.genAddress(loc.base);
            this.out.genPop(T0);
            this.out.generateIndexed("la", T0, T0, offset);
            this.out.genPush(T0);
            return;
        }

        const sym = this.symbolOf(loc);
        if (sym.kind !== "variable" && sym.kind !== "struct_var") {
            throw new CodegenError(`'${loc.name}' has no storage`);
        }
        if (sym.storage.kind === "frame") {
            this.out.generateIndexed("la", T0, FP, sym.storage.offset);
        } else {
            this.out.generate("la", T0, globalLabel(sym.name));
        }
        this.out.genPush(T0);
    }

    private genBinary(expr: AST.BinaryExpression) {
        this.genExpression(expr.left);
        this.genExpression(expr.right);
        this.out.genPop(T1);
        this.out.genPop(T0);

        switch (expr.operator) {
            case "*":
                this.out.generate("mult", T0, T1);
                this.out.generate("mflo", T0);
                break;
            case "/":
                this.out.generate("div", T0, T1);
                this.out.generate("mflo", T0);
                break;
            case "&&":
            case "||":
                throw new CodegenError(`'${expr.operator}' is compiled by genShortCircuit`);
            default:
                this.out.generate(ARITHMETIC_OPCODES[expr.operator], T0, T0, T1);
        }
        this.out.genPush(T0);
    }

    /** `&&` and `||` as values: the right operand runs only when it decides the result. */
    private genShortCircuit(expr: AST.BinaryExpression) {
        const skipLabel = this.out.nextLabel();
        const doneLabel = this.out.nextLabel();
        const isAnd = expr.operator === "&&";

        this.genExpression(expr.left);
        this.out.genPop(T0);
        this.out.generate(isAnd ? "beq" : "bne", T0, FALSE, skipLabel);
        this.genExpression(expr.right);
        this.out.generate("j", doneLabel);

        this.out.genLabel(skipLabel);
        this.out.generate("li", T0, isAnd ? FALSE : TRUE);
        this.out.genPush(T0);
        this.out.genLabel(doneLabel);
    }

    /** Jumps to `trueLabel` or `falseLabel` on a boolean expression, leaving the stack unchanged. */
    private genJump(expr: AST.Expression, trueLabel: string, falseLabel: string) {
        if (expr.kind === "BooleanLiteral") {
            this.out.generate("j", expr.value ? trueLabel : falseLabel);
            return;
        }
        if (expr.kind === "UnaryExpression" && expr.operator === "!") {
            this.genJump(expr.operand, falseLabel, trueLabel);
            return;
        }
        if (expr.kind === "BinaryExpression" && expr.operator === "&&") {
            const rightLabel = this.out.nextLabel();
            this.genJump(expr.left, rightLabel, falseLabel);
            this.out.genLabel(rightLabel);
            this.genJump(expr.right, trueLabel, falseLabel);
            return;
        }
        if (expr.kind === "BinaryExpression" && expr.operator === "||") {
            const rightLabel = this.out.nextLabel();
            this.genJump(expr.left, trueLabel, rightLabel);
            this.out.genLabel(rightLabel);
            this.genJump(expr.right, trueLabel, falseLabel);
            return;
        }

        this.genExpression(expr);
        this.out.genPop(T0);
        this.out.generate("beq", T0, FALSE, falseLabel);
        this.out.generate("j", trueLabel);
    }
}
