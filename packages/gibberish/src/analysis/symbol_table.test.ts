import { describe, it, expect } from "vitest";
import { SymbolTable, SymbolTableError } from "./symbol_table";

function codeOf(fn: () => unknown): string | null {
    try {
        fn();
    } catch (e) {
        if (e instanceof SymbolTableError) return e.code;
        throw e;
    }
    return null;
}

describe("SymbolTable", () => {
    it("should start with one scope", () => {
        const table = new SymbolTable();
        expect(table.depth).toBe(1);
        expect(table.lookupGlobal("x")).toBeUndefined();
    });

    it("should return the inner symbol while shadowed and the outer one after", () => {
        const table = new SymbolTable();
        table.addDecl("x", 0);
        table.addScope();
        table.addDecl("x", 1);

        expect(table.lookupGlobal("x")).toBe(1);
        expect(table.lookupLocal("x")).toBe(1);

        table.removeScope();
        expect(table.lookupGlobal("x")).toBe(0);
    });

    it("should report not-found after leaving the only scope that declared a name", () => {
        const table = new SymbolTable();
        table.addScope();
        table.addDecl("y", 3);
        table.removeScope();
        expect(table.lookupGlobal("y")).toBeUndefined();
    });

    it("should only look in the innermost scope for lookupLocal", () => {
        const table = new SymbolTable();
        table.addDecl("x", 0);
        table.addScope();
        expect(table.lookupLocal("x")).toBeUndefined();
        expect(table.lookupGlobal("x")).toBe(0);
    });

    it("should reject a duplicate in the same scope and keep the first binding", () => {
        const table = new SymbolTable();
        table.addDecl("x", 0);
        expect(codeOf(() => table.addDecl("x", 1))).toBe("DuplicateSymbol");
        expect(table.lookupLocal("x")).toBe(0);
    });

    it("should allow the same name in a nested scope", () => {
        const table = new SymbolTable();
        table.addDecl("x", 0);
        table.addScope();
        expect(codeOf(() => table.addDecl("x", 1))).toBeNull();
    });

    it("should reject empty names and invalid handles", () => {
        const table = new SymbolTable();
        expect(codeOf(() => table.addDecl("", 0))).toBe("InvalidArgument");
        expect(codeOf(() => table.addDecl("x", -1))).toBe("InvalidArgument");
        expect(codeOf(() => table.addDecl("x", 1.5))).toBe("InvalidArgument");
    });

    it("should fail every operation once no scope is left", () => {
        const table = new SymbolTable();
        table.removeScope();
        expect(table.depth).toBe(0);

        expect(codeOf(() => table.removeScope())).toBe("EmptyTable");
        expect(codeOf(() => table.addDecl("x", 0))).toBe("EmptyTable");
        expect(codeOf(() => table.lookupLocal("x"))).toBe("EmptyTable");
        expect(codeOf(() => table.lookupGlobal("x"))).toBe("EmptyTable");
    });

    it("should come back to the same state after a scope round trip", () => {
        const table = new SymbolTable();
        table.addDecl("x", 0);
        const before = table.entries();

        table.addScope();
        table.addDecl("y", 1);
        table.removeScope();

        expect(table.entries()).toEqual(before);
        expect(table.lookupGlobal("x")).toBe(0);
        expect(table.lookupGlobal("y")).toBeUndefined();
    });

    it("should list scopes outermost first", () => {
        const table = new SymbolTable();
        table.addDecl("a", 0);
        table.addScope();
        table.addDecl("b", 1);
        table.addDecl("c", 2);
        expect(table.entries()).toEqual([[["a", 0]], [["b", 1], ["c", 2]]]);
    });
});
