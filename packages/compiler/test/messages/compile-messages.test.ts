import { describe, it, expect } from "vitest";
import {
  GenerationErrorCode,
  compileMessages,
  named,
  type MethodSignature,
} from "@rpcforge/compiler";
import { base, metamodel, notification, ref, request } from "../_helpers/metamodel.js";

function summary(members: readonly MethodSignature[]): string[] {
  return members.map(member => `${member.kind}:${member.name}`);
}

describe("compileMessages", () => {
  describe("textDocument/hover end-to-end", () => {
    const { initiator, responder } = compileMessages(
      metamodel({
        requests: [
          request("textDocument/hover", "Hover", {
            params: ref("HoverParams"),
            result: ref("Hover"),
            documentation: "Request hover information.",
          }),
        ],
      }),
    );

    it("gives the Initiator a sender calling the request method", () => {
      expect(initiator.members[0]).toEqual({
        kind: "sender",
        name: "hover",
        method: "textDocument/hover",
        message: "request",
        context: false,
        parameters: [{ name: "params", type: named("HoverParams") }],
        returns: null,
        docs: { text: "Request hover information." },
      });
    });

    it("gives the Initiator a result handler stub registered in its result table", () => {
      expect(initiator.members[1]).toEqual({
        kind: "result-handler",
        name: "handle_hover_result",
        method: "textDocument/hover",
        message: "request",
        context: true,
        parameters: [{ name: "result", type: named("Hover") }],
        returns: null,
        docs: {},
      });
      expect(initiator.resultTable.entries).toEqual([{ method: "textDocument/hover", handler: "handle_hover_result" }]);
      expect(initiator.dispatchTable.size).toBe(0);
    });

    it("gives the Responder a handler stub and a dispatch entry", () => {
      expect(responder.members).toEqual([
        {
          kind: "request-handler",
          name: "handle_hover",
          method: "textDocument/hover",
          message: "request",
          context: true,
          parameters: [{ name: "params", type: named("HoverParams") }],
          returns: named("Hover"),
          docs: { text: "Request hover information." },
        },
      ]);
      expect(responder.dispatchTable.get("textDocument/hover")).toBe("handle_hover");
      expect(responder.resultTable.size).toBe(0);
    });

    it("names the roles", () => {
      expect([initiator.role, initiator.className]).toEqual(["initiator", "Initiator"]);
      expect([responder.role, responder.className]).toEqual(["responder", "Responder"]);
    });
  });

  it("puts server-to-client messages on the opposite roles", () => {
    const { initiator, responder } = compileMessages(
      metamodel({
        requests: [request("workspace/configuration", "ConfigurationRequest", { messageDirection: "serverToClient" })],
        notifications: [notification("window/logMessage", "LogMessage", { messageDirection: "serverToClient" })],
      }),
    );
    expect(summary(responder.members)).toEqual([
      "sender:configuration_request",
      "result-handler:handle_configuration_request_result",
      "sender:log_message",
    ]);
    expect(summary(initiator.members)).toEqual([
      "request-handler:handle_configuration_request",
      "notification-handler:handle_log_message",
    ]);
    expect(initiator.dispatchTable.entries).toEqual([
      { method: "workspace/configuration", handler: "handle_configuration_request" },
      { method: "window/logMessage", handler: "handle_log_message" },
    ]);
  });

  it("gives a both-direction notification a sender, a handler and a dispatch entry on each role", () => {
    const { initiator, responder } = compileMessages(
      metamodel({
        notifications: [notification("$/progress", "Progress", { params: ref("ProgressParams"), messageDirection: "both" })],
      }),
    );
    expect(summary(initiator.members)).toEqual(["sender:progress", "notification-handler:handle_progress"]);
    expect(summary(responder.members)).toEqual(["notification-handler:handle_progress", "sender:progress"]);
    for (const role of [initiator, responder]) {
      expect(role.dispatchTable.entries).toEqual([{ method: "$/progress", handler: "handle_progress" }]);
      expect(role.members.every(member => member.returns === null)).toBe(true);
    }
  });

  it("gives a both-direction request every member on each role", () => {
    const { initiator, responder } = compileMessages(
      metamodel({ requests: [request("$/ping", "Ping", { messageDirection: "both" })] }),
    );
    expect(summary(initiator.members)).toEqual([
      "sender:ping",
      "result-handler:handle_ping_result",
      "request-handler:handle_ping",
    ]);
    expect(summary(responder.members)).toEqual([
      "request-handler:handle_ping",
      "sender:ping",
      "result-handler:handle_ping_result",
    ]);
    expect(initiator.dispatchTable.get("$/ping")).toBe("handle_ping");
    expect(responder.resultTable.get("$/ping")).toBe("handle_ping_result");
  });

  it("processes requests before notifications, each in declaration order", () => {
    const { initiator } = compileMessages(
      metamodel({
        notifications: [notification("initialized", "Initialized"), notification("exit", "Exit")],
        requests: [request("initialize", "Initialize"), request("shutdown", "Shutdown")],
      }),
    );
    expect(initiator.members.filter(member => member.kind === "sender").map(member => member.name)).toEqual([
      "initialize",
      "shutdown",
      "initialized",
      "exit",
    ]);
  });

  it("leaves out the params parameter when a message has none", () => {
    const { initiator, responder } = compileMessages(metamodel({ notifications: [notification("exit", "Exit")] }));
    expect(initiator.members[0]?.parameters).toEqual([]);
    expect(responder.members[0]?.parameters).toEqual([]);
  });

  it("types list params as a tuple", () => {
    const { initiator } = compileMessages(
      metamodel({ notifications: [notification("custom/pair", "Pair", { params: [ref("A"), base("integer")] })] }),
    );
    expect(initiator.members[0]?.parameters).toEqual([
      { name: "params", type: { kind: "tuple", items: [named("A"), { kind: "primitive", name: "integer" }] } },
    ]);
  });

  it("rejects two notifications with the same method", () => {
    const model = metamodel({
      notifications: [notification("custom/event", "First"), notification("custom/event", "Second")],
    });
    expect(() => compileMessages(model)).toThrow(
      'Responder dispatch table already maps "custom/event" to handle_first; cannot also map it to handle_second',
    );
  });

  it("rejects two requests with the same method", () => {
    const model = metamodel({ requests: [request("custom/query", "First"), request("custom/query", "Second")] });
    let caught: unknown;
    try {
      compileMessages(model);
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({
      code: GenerationErrorCode.DUPLICATE_DISPATCH_ENTRY,
      subject: "custom/query",
      message: 'Initiator result table already maps "custom/query" to handle_first_result; cannot also map it to handle_second_result',
    });
  });
});
