import { describe, it, expect } from "vitest";
import {
  arrayOf,
  formatFieldList,
  formatTypeExpr,
  forward,
  literal,
  mapNamed,
  mapOf,
  named,
  primitive,
  recordOf,
  referencedNames,
  tupleOf,
  unionOf,
} from "@rpcforge/compiler";

describe("referencedNames", () => {
  it("lists names left to right without duplicates", () => {
    const expr = unionOf([named("A"), arrayOf(named("B")), mapOf(named("C"), named("A"))]);
    expect(referencedNames(expr)).toEqual(["A", "B", "C"]);
  });

  it("walks inline record fields", () => {
    const expr = recordOf([
      { name: "x", type: named("X"), optional: false, docs: {} },
      { name: "y", type: tupleOf([named("Y"), primitive("integer")]), optional: true, docs: {} },
    ]);
    expect(referencedNames(expr)).toEqual(["X", "Y"]);
  });

  it("includes forward references unless asked not to", () => {
    const expr = unionOf([forward("LSPObject"), named("Other")]);
    expect(referencedNames(expr)).toEqual(["LSPObject", "Other"]);
    expect(referencedNames(expr, { includeForward: false })).toEqual(["Other"]);
  });

  it("ignores primitives and literals", () => {
    expect(referencedNames(unionOf([primitive("string"), literal("Named")]))).toEqual([]);
  });
});

describe("mapNamed", () => {
  it("replaces named nodes at any depth", () => {
    const expr = arrayOf(unionOf([named("A"), named("B")]));
    const mapped = mapNamed(expr, node => (node.name === "A" ? forward("A") : node));
    expect(mapped).toEqual(arrayOf(unionOf([forward("A"), named("B")])));
  });
});

describe("formatTypeExpr", () => {
  it("prints every numeric primitive as number", () => {
    expect(formatTypeExpr(tupleOf([primitive("integer"), primitive("uinteger"), primitive("float")]))).toBe(
      "[number, number, number]",
    );
  });

  it("parenthesizes union elements of arrays", () => {
    expect(formatTypeExpr(arrayOf(unionOf([named("Range"), primitive("null")])))).toBe("(Range | null)[]");
    expect(formatTypeExpr(arrayOf(unionOf([named("Range")])))).toBe("Range[]");
  });

  it("prints maps as index signatures", () => {
    expect(formatTypeExpr(mapOf(named("DocumentUri"), arrayOf(named("TextEdit"))))).toBe(
      "{ [key: DocumentUri]: TextEdit[] }",
    );
  });

  it("prints an empty union as never", () => {
    expect(formatTypeExpr(unionOf([]))).toBe("never");
  });

  it("quotes string literals", () => {
    expect(formatTypeExpr(literal('say "hi"'))).toBe('"say \\"hi\\""');
    expect(formatTypeExpr(literal(2))).toBe("2");
    expect(formatTypeExpr(literal(true))).toBe("true");
  });
});

describe("formatFieldList", () => {
  it("prints optional markers and quotes non-identifier names", () => {
    const text = formatFieldList([
      { name: "label", type: primitive("string"), optional: false, docs: {} },
      { name: "is-default", type: primitive("boolean"), optional: true, docs: {} },
    ]);
    expect(text).toBe('{ label: string; "is-default"?: boolean }');
  });

  it("prints an empty list as {}", () => {
    expect(formatFieldList([])).toBe("{}");
  });
});
