export type Type =
    | { kind: "primitive", name: "int" | "bool" | "void" | "string" }
    | { kind: "struct", name: string } // a variable of struct type
    | { kind: "struct_def" }           // the name of a struct type itself
    | { kind: "function" }             // signatures live on the function symbol
    | { kind: "error" };               // poison: never reported, silences what it touches

export const IntType: Type = { kind: "primitive", name: "int" };
export const BoolType: Type = { kind: "primitive", name: "bool" };
export const VoidType: Type = { kind: "primitive", name: "void" };
export const StringType: Type = { kind: "primitive", name: "string" };
export const StructDefType: Type = { kind: "struct_def" };
export const FunctionType: Type = { kind: "function" };
export const ErrorType: Type = { kind: "error" };

export function structType(name: string): Type {
    return { kind: "struct", name };
}

export function isIntType(t: Type): boolean {
    return t.kind === "primitive" && t.name === "int";
}

export function isBoolType(t: Type): boolean {
    return t.kind === "primitive" && t.name === "bool";
}

export function isVoidType(t: Type): boolean {
    return t.kind === "primitive" && t.name === "void";
}

export function isStringType(t: Type): boolean {
    return t.kind === "primitive" && t.name === "string";
}

export function isStructType(t: Type): boolean {
    return t.kind === "struct";
}

export function isStructDefType(t: Type): boolean {
    return t.kind === "struct_def";
}

export function isFnType(t: Type): boolean {
    return t.kind === "function";
}

export function isErrorType(t: Type): boolean {
    return t.kind === "error";
}

export function typesEqual(a: Type, b: Type): boolean {
    if (a.kind !== b.kind) return false;

    if (a.kind === "primitive" && b.kind === "primitive") {
        return a.name === b.name;
    }
    if (a.kind === "struct" && b.kind === "struct") {
        return a.name === b.name;
    }
    // function, struct_def and error carry no structure
    return true;
}

export function typeToString(t: Type): string {
    switch (t.kind) {
        case "primitive":
            return t.name;
        case "struct":
            return t.name;
        case "struct_def":
            return "struct-def";
        case "function":
            return "function";
        case "error":
            return "ERROR";
    }
}
