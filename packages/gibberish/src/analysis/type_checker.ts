import * as AST from "../ast/ast";
import type { DiagnosticSink } from "../errors";
import { SymbolArena } from "./symbols";
import { primitiveType } from "./resolver";
import {
    Type, IntType, BoolType, StringType, ErrorType,
    isIntType, isBoolType, isVoidType, isStructType, isStructDefType, isFnType, isErrorType,
    typesEqual,
} from "./types";

/**
 * Computes a type for every expression of a resolved program and reports
 * every rule it breaks. `error` marks a subtree that was already reported:
 * any check that sees it stays quiet and passes `error` upward.
 *
 * The only state written back to the tree is the type of each `cout`
 * operand, so running the checker twice reports nothing new.
 */
export class TypeChecker {
    private arena: SymbolArena;
    private sink: DiagnosticSink;

    constructor(arena: SymbolArena, sink: DiagnosticSink) {
        this.arena = arena;
        this.sink = sink;
    }

    public check(program: AST.Program) {
        for (const decl of program.decls) {
            if (decl.kind === "FnDecl") {
                this.checkBlock(decl.body, primitiveType(decl.returnType));
            }
        }
    }

    private report(at: { line: number; col: number }, message: string) {
        this.sink.fatal(at.line, at.col, message);
    }

    // -------------------------------------------------------------------------
    // Statements

    private checkBlock(block: AST.Block, returnType: Type) {
        for (const stmt of block.stmts) {
            this.checkStatement(stmt, returnType);
        }
    }

    private checkStatement(stmt: AST.Statement, returnType: Type) {
        switch (stmt.kind) {
            case "AssignStatement":
                this.checkExpression(stmt.assign);
                break;
            case "PostIncStatement":
            case "PostDecStatement": {
                const type = this.checkExpression(stmt.target);
                if (!isErrorType(type) && !isIntType(type)) {
                    this.report(AST.position(stmt.target), "Arithmetic operator applied to non-numeric operand");
                }
                break;
            }
            case "ReadStatement":
                this.checkReadable(stmt.target);
                break;
            case "WriteStatement":
                stmt.valueType = this.checkWritable(stmt.value);
                break;
            case "IfStatement":
                this.checkCondition(stmt.condition, "Non-bool expression used as an if condition");
                this.checkBlock(stmt.then, returnType);
                break;
            case "IfElseStatement":
                this.checkCondition(stmt.condition, "Non-bool expression used as an if condition");
                this.checkBlock(stmt.then, returnType);
                this.checkBlock(stmt.otherwise, returnType);
                break;
            case "WhileStatement":
                this.checkCondition(stmt.condition, "Non-bool expression used as a while condition");
                this.checkBlock(stmt.body, returnType);
                break;
            case "RepeatStatement": {
                const type = this.checkExpression(stmt.count);
                if (!isErrorType(type) && !isIntType(type)) {
                    this.report(AST.position(stmt.count), "Non-integer expression used as a repeat clause");
                }
                this.checkBlock(stmt.body, returnType);
                break;
            }
            case "CallStatement":
                this.checkExpression(stmt.call);
                break;
            case "ReturnStatement":
                this.checkReturn(stmt, returnType);
                break;
        }
    }

    private checkCondition(condition: AST.Expression, message: string) {
        const type = this.checkExpression(condition);
        if (!isErrorType(type) && !isBoolType(type)) {
            this.report(AST.position(condition), message);
        }
    }

    private checkReadable(target: AST.Location) {
        const type = this.checkExpression(target);
        const at = AST.position(target);
        if (isFnType(type)) this.report(at, "Attempt to read a function");
        if (isStructDefType(type)) this.report(at, "Attempt to read a struct name");
        if (isStructType(type)) this.report(at, "Attempt to read a struct variable");
    }

    private checkWritable(value: AST.Expression): Type {
        const type = this.checkExpression(value);
        const at = AST.position(value);
        if (isFnType(type)) this.report(at, "Attempt to write a function");
        if (isStructDefType(type)) this.report(at, "Attempt to write a struct name");
        if (isStructType(type)) this.report(at, "Attempt to write a struct variable");
        if (isVoidType(type)) this.report(at, "Attempt to write void");
        return type;
    }

    private checkReturn(stmt: AST.ReturnStatement, returnType: Type) {
        if (stmt.value === null) {
            if (!isVoidType(returnType)) {
                this.report({ line: stmt.token.line, col: stmt.token.column }, "Missing return value");
            }
            return;
        }

        const type = this.checkExpression(stmt.value);
        const at = AST.position(stmt.value);
        if (isVoidType(returnType)) {
            this.report(at, "Return with a value in a void function");
        } else if (!isErrorType(returnType) && !isErrorType(type) && !typesEqual(returnType, type)) {
            this.report(at, "Bad return value");
        }
    }

    // -------------------------------------------------------------------------
    // Expressions

    private checkExpression(expr: AST.Expression): Type {
        switch (expr.kind) {
            case "IntegerLiteral":
                return IntType;
            case "StringLiteral":
                return StringType;
            case "BooleanLiteral":
                return BoolType;
            case "Identifier":
                return this.identifierType(expr);
            case "DotAccess":
                return this.identifierType(expr.field);
            case "AssignExpression":
                return this.checkAssign(expr);
            case "CallExpression":
                return this.checkCall(expr);
            case "UnaryExpression":
                return this.checkUnary(expr);
            case "BinaryExpression":
                return this.checkBinary(expr);
        }
    }

    private identifierType(id: AST.Identifier): Type {
        if (id.symbol === null) return ErrorType;
        return this.arena.get(id.symbol).type;
    }

    private checkAssign(expr: AST.AssignExpression): Type {
        const lhs = this.checkExpression(expr.target);
        const rhs = this.checkExpression(expr.value);
        const at = AST.position(expr);

        if (isFnType(lhs) && isFnType(rhs)) {
            this.report(at, "Function assignment");
            return ErrorType;
        }
        if (isStructDefType(lhs) && isStructDefType(rhs)) {
            this.report(at, "Struct name assignment");
            return ErrorType;
        }
        if (isStructType(lhs) && isStructType(rhs)) {
            this.report(at, "Struct variable assignment");
            return ErrorType;
        }
        if (isErrorType(lhs) || isErrorType(rhs)) {
            return ErrorType;
        }
        if (!typesEqual(lhs, rhs)) {
            this.report(at, "Type mismatch");
            return ErrorType;
        }
        return lhs;
    }

    private checkCall(expr: AST.CallExpression): Type {
        const callee = expr.callee;
        const argTypes = expr.args.map(arg => this.checkExpression(arg));

        if (callee.symbol === null) return ErrorType;
        const fn = this.arena.get(callee.symbol);
        if (fn.kind !== "function") {
            this.report(AST.position(callee), "Attempt to call a non-function");
            return ErrorType;
        }

        if (expr.args.length !== fn.paramTypes.length) {
            this.report(AST.position(callee), "Function call with wrong number of args");
            return fn.returnType;
        }

        expr.args.forEach((arg, i) => {
            const actual = argTypes[i];
            if (!isErrorType(actual) && !typesEqual(fn.paramTypes[i], actual)) {
                this.report(AST.position(arg), "Type of actual does not match type of formal");
            }
        });
        return fn.returnType;
    }

    private checkUnary(expr: AST.UnaryExpression): Type {
        const type = this.checkExpression(expr.operand);
        if (isErrorType(type)) return ErrorType;

        if (expr.operator === "-") {
            if (!isIntType(type)) {
                this.report(AST.position(expr), "Arithmetic operator applied to non-numeric operand");
                return ErrorType;
            }
            return IntType;
        }

        if (!isBoolType(type)) {
            this.report(AST.position(expr), "Logical operator applied to non-bool operand");
            return ErrorType;
        }
        return BoolType;
    }

    private checkBinary(expr: AST.BinaryExpression): Type {
        const left = this.checkExpression(expr.left);
        const right = this.checkExpression(expr.right);
        const op = expr.operator;

        if (AST.isEquality(op)) {
            return this.checkEquality(expr, left, right);
        }

        let operandOk: (t: Type) => boolean;
        let message: string;
        let result: Type;
        if (AST.isArithmetic(op)) {
            operandOk = isIntType;
            message = "Arithmetic operator applied to non-numeric operand";
            result = IntType;
        } else if (AST.isRelational(op)) {
            operandOk = isIntType;
            message = "Relational operator applied to non-numeric operand";
            result = BoolType;
        } else {
            operandOk = isBoolType;
            message = "Logical operator applied to non-bool operand";
            result = BoolType;
        }

        if (!isErrorType(left) && !operandOk(left)) {
            this.report(AST.position(expr.left), message);
            result = ErrorType;
        }
        if (!isErrorType(right) && !operandOk(right)) {
            this.report(AST.position(expr.right), message);
            result = ErrorType;
        }
        if (isErrorType(left) || isErrorType(right)) {
            result = ErrorType;
        }
        return result;
    }

    private checkEquality(expr: AST.BinaryExpression, left: Type, right: Type): Type {
        const at = AST.position(expr);
        let result: Type = BoolType;

        if (isVoidType(left) && isVoidType(right)) {
            this.report(at, "Equality operator applied to void functions");
            result = ErrorType;
        }
        if (isFnType(left) && isFnType(right)) {
            this.report(at, "Equality operator applied to functions");
            result = ErrorType;
        }
        if (isStructDefType(left) && isStructDefType(right)) {
            this.report(at, "Equality operator applied to struct names");
            result = ErrorType;
        }
        if (isStructType(left) && isStructType(right)) {
            this.report(at, "Equality operator applied to struct variables");
            result = ErrorType;
        }
        if (!isErrorType(left) && !isErrorType(right) && !typesEqual(left, right)) {
            this.report(at, "Type mismatch");
            result = ErrorType;
        }
        if (isErrorType(left) || isErrorType(right)) {
            result = ErrorType;
        }
        return result;
    }
}
