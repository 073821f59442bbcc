/**
 * Emit Package - Dispatcher Modules
 *
 * Renders a dispatcher artifact as an abstract class extending the runtime
 * `Endpoint`: frozen method tables, sender methods, abstract handler stubs,
 * and the `handle`/`handleResult` switches that route incoming payloads.
 */

import {
  debug,
  formatTypeExpr,
  type DispatchTable,
  type DispatcherArtifact,
  type MethodSignature,
  type ParameterSignature,
} from "@rpcforge/compiler";
import { EmitError, EmitErrorCode } from "./errors.js";
import { formatTable, indent, memberAccess, memberName, quote, withDocs } from "./format.js";
import { generatedHeader } from "./definitions.js";
import { normalizeEmitOptions, type EmitOptions } from "./options.js";

/** Runtime namespace alias inside generated modules. */
const RUNTIME = "runtime";

/** Names the generated class inherits or declares itself. */
export const RESERVED_MEMBER_NAMES: ReadonlySet<string> = new Set([
  "constructor",
  "transport",
  "request",
  "notify",
  "handle",
  "handleResult",
  "dispatchTable",
  "resultTable",
]);

export interface DispatcherModuleOptions extends Pick<EmitOptions, "indent" | "typesModule" | "runtimeModule"> {
  /** Protocol version named in the header. */
  version?: string;
}

/**
 * @throws EmitError `EMIT_RESERVED_MEMBER_NAME` when a member would shadow
 * an inherited or generated member.
 */
export function emitDispatcherModule(artifact: DispatcherArtifact, options: DispatcherModuleOptions = {}): string {
  const { indent: indentStr, typesModule, runtimeModule } = normalizeEmitOptions(options);
  for (const member of artifact.members) {
    if (RESERVED_MEMBER_NAMES.has(member.name)) {
      throw new EmitError(
        `${artifact.className} member "${member.name}" (${member.method}) collides with a built-in member`,
        EmitErrorCode.RESERVED_MEMBER_NAME,
      );
    }
  }

  const title = options.version === undefined
    ? `${artifact.className} dispatcher.`
    : `${artifact.className} dispatcher for protocol version ${options.version}.`;

  const imports: string[] = [];
  if (artifact.imports.length > 0) {
    imports.push(`import type { ${artifact.imports.join(", ")} } from ${quote(typesModule)};`);
  }
  imports.push(`import * as ${RUNTIME} from ${quote(runtimeModule)};`);

  const body = [
    emitTable("dispatchTable", artifact.dispatchTable, indentStr),
    emitTable("resultTable", artifact.resultTable, indentStr),
    ...artifact.members.map(member => emitMember(member, indentStr)),
    emitHandle(artifact, indentStr),
    emitHandleResult(artifact, indentStr),
  ];

  debug.emit("dispatcher-module", {
    role: artifact.role,
    members: artifact.members.length,
    imports: artifact.imports.length,
  });

  return [
    generatedHeader(title),
    imports.join("\n"),
    `export abstract class ${artifact.className} extends ${RUNTIME}.Endpoint {\n${indent(body.join("\n\n"), indentStr)}\n}`,
  ].join("\n\n") + "\n";
}

/* =============================================================================
 * MEMBERS
 * ============================================================================= */

function emitTable(name: string, table: DispatchTable, indentStr: string): string {
  const entries = table.entries.map(entry => [entry.method, entry.handler] as const);
  return `static readonly ${name}: ${RUNTIME}.HandlerTable = Object.freeze(${formatTable(entries, indentStr)});`;
}

function emitMember(member: MethodSignature, indentStr: string): string {
  const parameters = member.context
    ? [`context: ${RUNTIME}.HandlerContext`, ...member.parameters.map(formatParameter)]
    : member.parameters.map(formatParameter);
  const signature = `${memberName(member.name)}(${parameters.join(", ")})`;

  if (member.kind !== "sender") {
    const returns = member.returns ? formatTypeExpr(member.returns) : "void";
    return withDocs(member.docs, `abstract ${signature}: ${returns};`);
  }

  const send = member.message === "request" ? "request" : "notify";
  const args = [quote(member.method), ...member.parameters.map(parameter => parameter.name)];
  return withDocs(member.docs, `${signature}: void {\n${indentStr}this.${send}(${args.join(", ")});\n}`);
}

function formatParameter(parameter: ParameterSignature): string {
  return `${parameter.name}: ${formatTypeExpr(parameter.type)}`;
}

/* =============================================================================
 * ROUTING
 * ============================================================================= */

function emitHandle(artifact: DispatcherArtifact, indentStr: string): string {
  const cases = artifact.dispatchTable.entries.map(entry => {
    const call = handlerCall(artifact, entry.handler, "payload");
    return `case ${quote(entry.method)}:\n${indentStr}return ${call};`;
  });
  const fallback = `default:\n${indentStr}throw new ${RUNTIME}.LookupFailure(method, ${quote(artifact.className)});`;
  return [
    `override handle(method: string, payload: unknown, context: ${RUNTIME}.HandlerContext = {}): unknown {`,
    indent(`switch (method) {\n${indent([...cases, fallback].join("\n"), indentStr)}\n}`, indentStr),
    "}",
  ].join("\n");
}

function emitHandleResult(artifact: DispatcherArtifact, indentStr: string): string {
  const cases = artifact.resultTable.entries.map(entry => {
    const call = handlerCall(artifact, entry.handler, "result");
    return `case ${quote(entry.method)}:\n${indentStr}${call};\n${indentStr}return;`;
  });
  const fallback = `default:\n${indentStr}throw new ${RUNTIME}.LookupFailure(method, ${quote(artifact.className)}, "result");`;
  return [
    `override handleResult(method: string, result: unknown, context: ${RUNTIME}.HandlerContext = {}): void {`,
    indent(`switch (method) {\n${indent([...cases, fallback].join("\n"), indentStr)}\n}`, indentStr),
    "}",
  ].join("\n");
}

/** `this.handle_x(context, payload as T)`, typed after the stub's own parameter. */
function handlerCall(artifact: DispatcherArtifact, handler: string, value: string): string {
  const stub = artifact.members.find(member => member.kind !== "sender" && member.name === handler);
  const parameter = stub?.parameters[0];
  const args = parameter ? ["context", `${value} as ${formatTypeExpr(parameter.type)}`] : ["context"];
  return `this${memberAccess(handler)}(${args.join(", ")})`;
}
