/**
 * A small made-up protocol used across emit tests.
 */

import type { Metamodel } from "@rpcforge/compiler";

export const hoverModel: Metamodel = {
  metaData: { version: "3.17.0" },
  structures: [
    {
      name: "HoverParams",
      properties: [{ name: "position", type: { kind: "reference", name: "Position" } }],
    },
    {
      name: "Position",
      properties: [{ name: "line", type: { kind: "base", name: "uinteger" } }],
    },
    {
      name: "Hover",
      properties: [{ name: "contents", type: { kind: "base", name: "string" } }],
    },
  ],
  enumerations: [],
  typeAliases: [],
  requests: [
    {
      method: "textDocument/hover",
      typeName: "Hover",
      params: { kind: "reference", name: "HoverParams" },
      result: { kind: "reference", name: "Hover" },
      messageDirection: "clientToServer",
      documentation: "Request hover information.",
    },
  ],
  notifications: [
    {
      method: "exit",
      typeName: "Exit",
      messageDirection: "clientToServer",
    },
  ],
};
