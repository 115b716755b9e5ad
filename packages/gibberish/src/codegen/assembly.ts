export const TRUE = "1";
export const FALSE = "0";

export const FP = "$fp";
export const SP = "$sp";
export const RA = "$ra";
export const V0 = "$v0";
export const A0 = "$a0";
export const T0 = "$t0";
export const T1 = "$t1";

// opcodes are padded to this width before their operands
const MAXLEN = 4;

type Operand = string | number;

// main's entry carries this label as well as `main`
export const START_LABEL = "__start";

/**
 * The label of a global variable or function. User labels are the name with
 * a leading underscore; the one that would land on `__start` moves aside.
 */
export function globalLabel(name: string): string {
    const label = `_${name}`;
    return label === START_LABEL ? `${label}.0` : label;
}

/**
 * The output of one code generation run: the instruction lines, the label
 * counter and the string literals already placed in the data segment.
 */
export class AssemblyWriter {
    private lines: string[] = [];
    private labelCounter: number = 0;
    private stringLabels: Map<string, string> = new Map();

    public toString(): string {
        return this.lines.length === 0 ? "" : this.lines.join("\n") + "\n";
    }

    public nextLabel(): string {
        return `.L${this.labelCounter++}`;
    }

    public generate(opcode: string, ...args: Operand[]) {
        this.generateWithComment(opcode, "", ...args);
    }

    public generateWithComment(opcode: string, comment: string, ...args: Operand[]) {
        let line = "\t" + opcode;
        if (args.length > 0) {
            line += pad(opcode) + args.join(", ");
        }
        if (comment !== "") {
            line += "\t\t#" + comment;
        }
        this.lines.push(line);
    }

    /** `lw $t0, -8($fp)` and friends. */
    public generateIndexed(opcode: string, reg: string, base: string, offset: number, comment: string = "") {
        let line = `\t${opcode}${pad(opcode)}${reg}, ${offset}(${base})`;
        if (comment !== "") {
            line += "\t#" + comment;
        }
        this.lines.push(line);
    }

    public genPush(reg: string) {
        this.generateIndexed("sw", reg, SP, 0, "PUSH");
        this.generate("subu", SP, SP, 4);
    }

    public genPop(reg: string) {
        this.generateIndexed("lw", reg, SP, 4, "POP");
        this.generate("addu", SP, SP, 4);
    }

    public genLabel(label: string, comment: string = "") {
        this.lines.push(comment === "" ? `${label}:` : `${label}:\t\t# ${comment}`);
    }

    public comment(text: string) {
        this.lines.push("\t\t\t# " + text);
    }

    public directive(text: string) {
        this.lines.push("\t\t" + text);
    }

    /** Raw line, for labels that carry their own layout. */
    public line(text: string) {
        this.lines.push(text);
    }

    public genGlobal(name: string, size: number) {
        this.directive(".data");
        this.directive(".align 2");
        const blank = name.length < 2 ? "\t" : "";
        this.lines.push(`${globalLabel(name)}:${blank}\t.space ${size}`);
    }

    /**
     * The label of a string literal's data, emitted the first time the
     * literal is seen. `raw` keeps its quotes and escapes, which the
     * assembler understands as written.
     */
    public stringLabel(raw: string): string {
        const existing = this.stringLabels.get(raw);
        if (existing !== undefined) return existing;

        const label = this.nextLabel();
        this.directive(".data");
        this.lines.push(`${label}:\t.asciiz ${raw}`);
        this.directive(".text");
        this.stringLabels.set(raw, label);
        return label;
    }
}

function pad(opcode: string): string {
    return " ".repeat(Math.max(1, MAXLEN - opcode.length + 2));
}
