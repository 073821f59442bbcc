/**
 * Emit Package - Dispatcher Module Tests
 */

import { describe, it, expect } from "vitest";
import { generate } from "@rpcforge/compiler";
import { EmitError, EmitErrorCode, emitDispatcherModule } from "@rpcforge/emit";
import { hoverModel } from "./_helpers/hover-model.js";

const result = generate(hoverModel, { baseAliases: false });

describe("emitDispatcherModule", () => {
  it("emits the Responder with its tables, stubs and routing", () => {
    expect(emitDispatcherModule(result.responder, { version: result.version })).toBe(
      [
        "/**",
        " * Responder dispatcher for protocol version 3.17.0.",
        " *",
        " * Generated by rpcforge. Do not edit.",
        " */",
        "",
        'import type { HoverParams, Hover } from "./types.js";',
        'import * as runtime from "@rpcforge/runtime";',
        "",
        "export abstract class Responder extends runtime.Endpoint {",
        "  static readonly dispatchTable: runtime.HandlerTable = Object.freeze({",
        '    "textDocument/hover": "handle_hover",',
        '    exit: "handle_exit",',
        "  });",
        "",
        "  static readonly resultTable: runtime.HandlerTable = Object.freeze({});",
        "",
        "  /** Request hover information. */",
        "  abstract handle_hover(context: runtime.HandlerContext, params: HoverParams): Hover;",
        "",
        "  abstract handle_exit(context: runtime.HandlerContext): void;",
        "",
        "  override handle(method: string, payload: unknown, context: runtime.HandlerContext = {}): unknown {",
        "    switch (method) {",
        '      case "textDocument/hover":',
        "        return this.handle_hover(context, payload as HoverParams);",
        '      case "exit":',
        "        return this.handle_exit(context);",
        "      default:",
        '        throw new runtime.LookupFailure(method, "Responder");',
        "    }",
        "  }",
        "",
        "  override handleResult(method: string, result: unknown, context: runtime.HandlerContext = {}): void {",
        "    switch (method) {",
        "      default:",
        '        throw new runtime.LookupFailure(method, "Responder", "result");',
        "    }",
        "  }",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("emits Initiator senders that call the transport", () => {
    const text = emitDispatcherModule(result.initiator);
    expect(text).toContain(
      [
        "  /** Request hover information. */",
        "  hover(params: HoverParams): void {",
        '    this.request("textDocument/hover", params);',
        "  }",
      ].join("\n"),
    );
    expect(text).toContain('  exit(): void {\n    this.notify("exit");\n  }');
  });

  it("routes results to the result handler stubs", () => {
    const text = emitDispatcherModule(result.initiator);
    expect(text).toContain("  abstract handle_hover_result(context: runtime.HandlerContext, result: Hover): void;");
    expect(text).toContain(
      [
        '      case "textDocument/hover":',
        "        this.handle_hover_result(context, result as Hover);",
        "        return;",
      ].join("\n"),
    );
  });

  it("takes the module specifiers from the options", () => {
    const text = emitDispatcherModule(result.initiator, { typesModule: "./protocol.js", runtimeModule: "../runtime.js" });
    expect(text).toContain('import type { HoverParams, Hover } from "./protocol.js";\nimport * as runtime from "../runtime.js";');
  });

  it("leaves out the type import when nothing is referenced", () => {
    const bare = generate({ ...hoverModel, requests: [] }, { baseAliases: false });
    const text = emitDispatcherModule(bare.initiator);
    expect(text).not.toContain("import type");
    expect(text).toContain('import * as runtime from "@rpcforge/runtime";');
  });

  it("refuses members that collide with built-in members", () => {
    const clash = generate(
      { ...hoverModel, requests: [], notifications: [{ method: "custom/request", typeName: "Request", messageDirection: "clientToServer" }] },
      { baseAliases: false },
    );
    let caught: unknown;
    try {
      emitDispatcherModule(clash.initiator);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(EmitError);
    expect(caught).toMatchObject({
      code: EmitErrorCode.RESERVED_MEMBER_NAME,
      message: 'Initiator member "request" (custom/request) collides with a built-in member',
    });
  });
});
