import { describe, it, expect } from "vitest";
import {
  compileParams,
  compileProperty,
  compileType,
  formatTypeExpr,
  literal,
  named,
  primitive,
  recordOf,
  tupleOf,
  unionOf,
} from "@rpcforge/compiler";
import { and, array, base, inline, map, or, prop, ref, str, tuple } from "../_helpers/metamodel.js";

describe("compileType", () => {
  it("maps base kinds to primitives", () => {
    expect(compileType(base("string"))).toEqual(primitive("string"));
    expect(compileType(base("uinteger"))).toEqual(primitive("uinteger"));
    expect(compileType(base("decimal"))).toEqual(primitive("float"));
    expect(compileType(base("null"))).toEqual(primitive("null"));
  });

  it("passes other base names through as names", () => {
    expect(compileType(base("DocumentUri"))).toEqual(named("DocumentUri"));
    expect(compileType(base("URI"))).toEqual(named("URI"));
    expect(compileType(base("Timestamp"))).toEqual(named("Timestamp"));
  });

  it("does not mistake inherited object keys for base names", () => {
    expect(compileType(base("toString"))).toEqual(named("toString"));
    expect(compileType(base("constructor"))).toEqual(named("constructor"));
  });

  it("copies references verbatim, resolved or not", () => {
    expect(compileType(ref("NoSuchStructure"))).toEqual(named("NoSuchStructure"));
  });

  it("compiles or and and to the same union", () => {
    const items = [ref("A"), base("null")];
    expect(compileType(or(...items))).toEqual(unionOf([named("A"), primitive("null")]));
    expect(compileType(and(...items))).toEqual(compileType(or(...items)));
  });

  it("compiles nested containers", () => {
    const type = map(base("DocumentUri"), array(or(ref("TextEdit"), ref("AnnotatedTextEdit"))));
    expect(formatTypeExpr(compileType(type))).toBe("{ [key: DocumentUri]: (TextEdit | AnnotatedTextEdit)[] }");
  });

  it("compiles tuples positionally", () => {
    expect(compileType(tuple(base("uinteger"), base("string")))).toEqual(
      tupleOf([primitive("uinteger"), primitive("string")]),
    );
  });

  it("compiles value literals to literal types", () => {
    expect(compileType(str("full"))).toEqual(literal("full"));
    expect(compileType({ kind: "integerLiteral", value: 3 })).toEqual(literal(3));
    expect(compileType({ kind: "booleanLiteral", value: false })).toEqual(literal(false));
  });

  it("renders inline records as their field-list text by default", () => {
    const type = inline(prop("start", ref("Position")), prop("label", base("string"), true));
    expect(compileType(type)).toEqual(literal("{ start: Position; label?: string }"));
  });

  it("compiles inline records structurally when asked", () => {
    const type = inline(prop("start", ref("Position")));
    expect(compileType(type, { inlineRecords: "structural" })).toEqual(
      recordOf([{ name: "start", type: named("Position"), optional: false, docs: {} }]),
    );
  });
});

describe("compileProperty", () => {
  it("keeps optionality separate from the type", () => {
    const field = compileProperty({ name: "range", type: or(ref("Range"), base("null")), optional: true });
    expect(field.optional).toBe(true);
    expect(formatTypeExpr(field.type)).toBe("Range | null");
  });

  it("carries documentation attributes", () => {
    const field = compileProperty({
      name: "tags",
      type: array(ref("Tag")),
      documentation: "Tags of the item.",
      since: "3.16.0",
      proposed: true,
    });
    expect(field).toEqual({
      name: "tags",
      type: { kind: "array", element: named("Tag") },
      optional: false,
      docs: { text: "Tags of the item.", since: "3.16.0", proposed: true },
    });
  });
});

describe("compileParams", () => {
  it("returns null for absent params", () => {
    expect(compileParams(undefined)).toBeNull();
  });

  it("compiles a list of params to a tuple", () => {
    expect(compileParams([ref("A"), base("integer")])).toEqual(tupleOf([named("A"), primitive("integer")]));
  });

  it("compiles a single params type as is", () => {
    expect(compileParams(ref("HoverParams"))).toEqual(named("HoverParams"));
  });
});
