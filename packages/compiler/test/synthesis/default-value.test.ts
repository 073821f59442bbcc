import { describe, it, expect } from "vitest";
import {
  GenerationErrorCode,
  MissingValue,
  arrayOf,
  isGenerationError,
  literal,
  mapOf,
  named,
  primitive,
  recordOf,
  synthesizeDefault,
  tupleOf,
  unionOf,
  type Definition,
  type FieldDefinition,
  type TypeExpr,
} from "@rpcforge/compiler";

const field = (name: string, type: TypeExpr, optional = false): FieldDefinition => ({ name, type, optional, docs: {} });
const rec = (name: string, fields: FieldDefinition[], parents: TypeExpr[] = []): Definition => ({
  kind: "record",
  name,
  parents,
  fields,
  docs: {},
});

const definitions: Definition[] = [
  { kind: "enum", name: "Kind", backing: "string", entries: [
    { name: "Text", value: "text", docs: {} },
    { name: "Markdown", value: "markdown", docs: {} },
  ], supportsCustomValues: false, docs: {} },
  { kind: "alias", name: "DocumentUri", type: primitive("string"), docs: {} },
  rec("Position", [field("line", primitive("uinteger")), field("character", primitive("uinteger"))]),
  rec("Range", [field("start", named("Position")), field("end", named("Position"))]),
  rec("Base", [field("id", primitive("integer"))]),
  rec("Location", [
    field("uri", named("DocumentUri")),
    field("range", named("Range")),
    field("kind", named("Kind")),
    field("label", primitive("string"), true),
  ], [named("Base")]),
  rec("Capabilities", [
    field("valueSet", arrayOf(named("Kind"))),
    field("dynamic", primitive("boolean"), true),
    field("extra", mapOf(primitive("string"), primitive("float"))),
    field("empty", primitive("null")),
    field("mode", unionOf([literal("full"), primitive("string")])),
  ]),
  rec("Node", [field("child", named("Node"))]),
  rec("WithTuple", [field("pair", tupleOf([primitive("integer"), primitive("integer")]))]),
  rec("WithInline", [field("inline", recordOf([field("x", primitive("integer"))]))]),
  rec("WithMissing", [field("other", named("Nowhere"))]),
];

function codeOf(run: () => unknown): string | undefined {
  try {
    run();
  } catch (error) {
    return isGenerationError(error) ? error.code : "not a generation error";
  }
  return undefined;
}

describe("synthesizeDefault", () => {
  it("fills primitives with empty values", () => {
    expect(synthesizeDefault(definitions, "Position")).toEqual({ line: 0, character: 0 });
  });

  it("puts inherited fields first and marks nested records as missing", () => {
    const value = synthesizeDefault(definitions, "Location");
    expect(Object.keys(value)).toEqual(["id", "uri", "range", "kind", "label"]);
    expect(value).toEqual({ id: 0, uri: "", range: new MissingValue("Range"), kind: "text", label: "" });
  });

  it("expands nested records when recursive", () => {
    expect(synthesizeDefault(definitions, "Location", { recursive: true, onlyRequired: true })).toEqual({
      id: 0,
      uri: "",
      range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } },
      kind: "text",
    });
  });

  it("handles containers, unions and value sets", () => {
    expect(synthesizeDefault(definitions, "Capabilities")).toEqual({
      valueSet: ["text", "markdown"],
      dynamic: false,
      extra: {},
      empty: null,
      mode: "full",
    });
  });

  it("expands inline records when recursive", () => {
    expect(synthesizeDefault(definitions, "WithInline", { recursive: true })).toEqual({ inline: { x: 0 } });
  });

  it("rejects shapes it cannot fill", () => {
    const unsupported = GenerationErrorCode.UNSUPPORTED_TYPE_DEFAULT;
    expect(codeOf(() => synthesizeDefault(definitions, "WithTuple"))).toBe(unsupported);
    expect(codeOf(() => synthesizeDefault(definitions, "WithInline"))).toBe(unsupported);
    expect(codeOf(() => synthesizeDefault(definitions, "WithMissing"))).toBe(unsupported);
    expect(codeOf(() => synthesizeDefault(definitions, "Unknown"))).toBe(unsupported);
    expect(codeOf(() => synthesizeDefault(definitions, "Kind"))).toBe(unsupported);
  });

  it("rejects recursive records when expanding", () => {
    expect(() => synthesizeDefault(definitions, "Node", { recursive: true })).toThrow(
      'Cannot produce a default for recursive type "Node"',
    );
    expect(synthesizeDefault(definitions, "Node")).toEqual({ child: new MissingValue("Node") });
  });
});
