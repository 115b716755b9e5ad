import type { SymbolId } from "./symbols";

export type SymbolTableErrorCode = "EmptyTable" | "DuplicateSymbol" | "InvalidArgument";

/** Thrown only when a caller breaks the table's preconditions. */
export class SymbolTableError extends Error {
    public code: SymbolTableErrorCode;

    constructor(code: SymbolTableErrorCode, message: string) {
        super(message);
        this.name = "SymbolTableError";
        this.code = code;
    }
}

/**
 * A stack of scopes mapping names to symbol handles. The innermost scope is
 * the last one pushed. A new table starts with one (global) scope.
 */
export class SymbolTable {
    private scopes: Map<string, SymbolId>[] = [new Map()];

    public get depth(): number {
        return this.scopes.length;
    }

    public addScope() {
        this.scopes.push(new Map());
    }

    public removeScope() {
        if (this.scopes.length === 0) {
            throw new SymbolTableError("EmptyTable", "removeScope on a table with no scopes");
        }
        this.scopes.pop();
    }

    public addDecl(name: string, id: SymbolId) {
        if (name === "" || !Number.isInteger(id) || id < 0) {
            throw new SymbolTableError("InvalidArgument", `Invalid declaration '${name}'`);
        }
        const scope = this.innermost("addDecl");
        if (scope.has(name)) {
            throw new SymbolTableError("DuplicateSymbol", `'${name}' is already declared in this scope`);
        }
        scope.set(name, id);
    }

    /** Looks only in the innermost scope. */
    public lookupLocal(name: string): SymbolId | undefined {
        return this.innermost("lookupLocal").get(name);
    }

    /** Looks from the innermost scope outward. */
    public lookupGlobal(name: string): SymbolId | undefined {
        if (this.scopes.length === 0) {
            throw new SymbolTableError("EmptyTable", "lookupGlobal on a table with no scopes");
        }
        for (let i = this.scopes.length - 1; i >= 0; i--) {
            const id = this.scopes[i].get(name);
            if (id !== undefined) return id;
        }
        return undefined;
    }

    /** Scopes from outermost to innermost, as name/handle pairs. */
    public entries(): Array<Array<[string, SymbolId]>> {
        return this.scopes.map(scope => Array.from(scope.entries()));
    }

    private innermost(op: string): Map<string, SymbolId> {
        const scope = this.scopes[this.scopes.length - 1];
        if (scope === undefined) {
            throw new SymbolTableError("EmptyTable", `${op} on a table with no scopes`);
        }
        return scope;
    }
}
