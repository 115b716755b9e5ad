import type { SymbolTable } from "./symbol_table";
import { Type, FunctionType, StructDefType, structType, typeToString } from "./types";

export type SymbolId = number;

/**
 * Where a variable lives at run time. Globals are addressed by label; frame
 * slots by a signed byte offset from $fp; struct fields by a byte offset
 * from the start of the enclosing instance.
 */
export type Storage =
    | { kind: "global" }
    | { kind: "frame", offset: number }
    | { kind: "field", offset: number };

export interface VariableSymbol {
    kind: "variable";
    id: SymbolId;
    name: string;
    type: Type;
    storage: Storage;
}

export interface FunctionSymbol {
    kind: "function";
    id: SymbolId;
    name: string;
    type: Type;
    returnType: Type;
    paramTypes: Type[];
    paramSize: number; // bytes
    localSize: number; // bytes
}

export interface StructVariableSymbol {
    kind: "struct_var";
    id: SymbolId;
    name: string;
    type: Type;
    structName: string;
    definition: SymbolId;
    storage: Storage;
}

export interface StructDefinitionSymbol {
    kind: "struct_def";
    id: SymbolId;
    name: string;
    type: Type;
    fields: SymbolTable;
    size: number; // bytes in one instance
}

export type Sym = VariableSymbol | FunctionSymbol | StructVariableSymbol | StructDefinitionSymbol;

/**
 * Owns every symbol created while resolving one program. The AST and the
 * symbol tables only hold ids, so the tables can be dropped after name
 * resolution while the arena stays alive for the later passes.
 */
export class SymbolArena {
    private symbols: Sym[] = [];

    public get size(): number {
        return this.symbols.length;
    }

    public get(id: SymbolId): Sym {
        const sym = this.symbols[id];
        if (sym === undefined) {
            throw new RangeError(`No symbol with id ${id}`);
        }
        return sym;
    }

    public variable(name: string, type: Type, storage: Storage): VariableSymbol {
        return this.add({ kind: "variable", id: this.symbols.length, name, type, storage });
    }

    public function(name: string, returnType: Type, paramTypes: Type[]): FunctionSymbol {
        return this.add({
            kind: "function",
            id: this.symbols.length,
            name,
            type: FunctionType,
            returnType,
            paramTypes,
            paramSize: 0,
            localSize: 0,
        });
    }

    public structVariable(name: string, definition: StructDefinitionSymbol, storage: Storage): StructVariableSymbol {
        return this.add({
            kind: "struct_var",
            id: this.symbols.length,
            name,
            type: structType(definition.name),
            structName: definition.name,
            definition: definition.id,
            storage,
        });
    }

    public structDefinition(name: string, fields: SymbolTable, size: number): StructDefinitionSymbol {
        return this.add({ kind: "struct_def", id: this.symbols.length, name, type: StructDefType, fields, size });
    }

    private add<T extends Sym>(sym: T): T {
        this.symbols.push(sym);
        return sym;
    }
}

/** Byte size of the storage a variable symbol needs. */
export function storageSize(arena: SymbolArena, sym: Sym): number {
    if (sym.kind === "struct_var") {
        const def = arena.get(sym.definition);
        return def.kind === "struct_def" ? def.size : 4;
    }
    return 4;
}

/** `int,bool->void` for functions, the type name for everything else. */
export function symbolToString(sym: Sym): string {
    if (sym.kind === "function") {
        return `${sym.paramTypes.map(typeToString).join(",")}->${typeToString(sym.returnType)}`;
    }
    return typeToString(sym.type);
}
