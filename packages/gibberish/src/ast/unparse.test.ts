import { describe, it, expect } from "vitest";
import { unparse } from "./unparse";
import { compile } from "../compiler";

const SOURCE = `struct Point {
    int x;
    int y;
};
int g;
struct Point p;
int add(int a, int b) {
    return a + b;
}
void main() {
    bool ok;
    p.x = add(g, 2);
    ok = !(p.y < 3) || true;
    cout << "done";
}`;

describe("unparse", () => {
  it("should print the program back without types before resolution", () => {
    const { program } = compile(SOURCE, { generate: false });
    const fresh = compile(unparse(program), { generate: false });
    expect(fresh.diagnostics).toEqual([]);
    expect(unparse(fresh.program)).toBe(unparse(program));
  });

  it("should annotate every resolved name with its type", () => {
    const { program, arena, diagnostics } = compile(SOURCE, { generate: false });
    expect(diagnostics).toEqual([]);

    expect(unparse(program, arena)).toBe(
      "struct Point {\n" +
      "    int x;\n" +
      "    int y;\n" +
      "};\n" +
      "\n" +
      "int g;\n" +
      "struct Point p;\n" +
      "int add(int a, int b) {\n" +
      "    return (a(int) + b(int));\n" +
      "}\n" +
      "\n" +
      "void main() {\n" +
      "    bool ok;\n" +
      "    p(Point).x(int) = add(int,int->int)(g(int), 2);\n" +
      "    ok(bool) = ((!(p(Point).y(int) < 3)) || true);\n" +
      "    cout << \"done\";\n" +
      "}\n" +
      "\n",
    );
  });

  it("should print unresolved names bare", () => {
    const { program, arena } = compile("void main() { x = 1; }", { generate: false });
    expect(unparse(program, arena)).toBe("void main() {\n    x = 1;\n}\n\n");
  });
});
