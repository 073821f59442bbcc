/**
 * Compiler Package - Message Compiler
 *
 * Turns requests and notifications into the members of the two dispatcher
 * roles. The direction of a message decides which role sends it and which
 * one handles it:
 *
 * | direction        | sender    | handler stub + dispatch entry |
 * |------------------|-----------|-------------------------------|
 * | clientToServer   | Initiator | Responder                     |
 * | serverToClient   | Responder | Initiator                     |
 * | both             | both      | both                          |
 *
 * Handler stubs carry no body; whoever extends the generated class supplies
 * the behavior.
 */

import type { Documentation } from "../model/definitions.js";
import type { MessageDirection, Metamodel, Notification, Request } from "../model/metamodel.js";
import {
  ROLE_CLASS_NAMES,
  type DispatcherArtifact,
  type MethodSignature,
  type ParameterSignature,
  type Role,
} from "../model/dispatcher.js";
import type { TypeExpr } from "../model/type-expr.js";
import { debug } from "../shared/debug.js";
import { toHandlerName, toResultHandlerName, toSnakeCase } from "../shared/identifiers.js";
import { compileParams, compileType, type CompileTypeOptions } from "../types/compile-type.js";
import { toDocumentation } from "../types/documentation.js";
import { DispatchTableBuilder } from "./dispatch-table.js";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/** A dispatcher before its imports are resolved against the types artifact. */
export type CompiledRole = Omit<DispatcherArtifact, "imports">;

export interface CompiledMessages {
  initiator: CompiledRole;
  responder: CompiledRole;
}

/**
 * Compile every request, then every notification, in declaration order.
 *
 * @throws GenerationError `DUPLICATE_DISPATCH_ENTRY` when two messages share
 * a wire method within one role.
 */
export function compileMessages(
  model: Pick<Metamodel, "requests" | "notifications">,
  options: CompileTypeOptions = {},
): CompiledMessages {
  const roles: Record<Role, RoleBuilder> = {
    initiator: new RoleBuilder("initiator"),
    responder: new RoleBuilder("responder"),
  };

  for (const request of model.requests) {
    compileRequest(request, roles, options);
  }
  for (const notification of model.notifications) {
    compileNotification(notification, roles, options);
  }

  const initiator = roles.initiator.build();
  const responder = roles.responder.build();
  debug.messages("compiled", {
    requests: model.requests.length,
    notifications: model.notifications.length,
    initiatorHandlers: initiator.dispatchTable.size,
    responderHandlers: responder.dispatchTable.size,
  });
  return { initiator, responder };
}

/* =============================================================================
 * REQUESTS & NOTIFICATIONS
 * ============================================================================= */

function compileRequest(request: Request, roles: Record<Role, RoleBuilder>, options: CompileTypeOptions): void {
  const name = toSnakeCase(request.typeName);
  const handler = toHandlerName(request.typeName);
  const resultHandler = toResultHandlerName(request.typeName);
  const parameters = paramsSignature(compileParams(request.params, options));
  const result = compileType(request.result, options);
  const docs = toDocumentation(request);

  const sender = member("sender", name, request.method, "request", false, parameters, null, docs);
  const resultStub = member("result-handler", resultHandler, request.method, "request", true, [{ name: "result", type: result }], null, {});
  const requestStub = member("request-handler", handler, request.method, "request", true, parameters, result, docs);

  for (const [from, to] of routes(request.messageDirection, roles)) {
    from.addMember(sender);
    from.addMember(resultStub);
    from.results.add(request.method, resultHandler);

    to.addMember(requestStub);
    to.dispatch.add(request.method, handler);
  }
}

function compileNotification(
  notification: Notification,
  roles: Record<Role, RoleBuilder>,
  options: CompileTypeOptions,
): void {
  const name = toSnakeCase(notification.typeName);
  const handler = toHandlerName(notification.typeName);
  const parameters = paramsSignature(compileParams(notification.params, options));
  const docs = toDocumentation(notification);

  const sender = member("sender", name, notification.method, "notification", false, parameters, null, docs);
  const stub = member("notification-handler", handler, notification.method, "notification", true, parameters, null, docs);

  for (const [from, to] of routes(notification.messageDirection, roles)) {
    from.addMember(sender);

    to.addMember(stub);
    to.dispatch.add(notification.method, handler);
  }
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

class RoleBuilder {
  readonly #members: MethodSignature[] = [];
  readonly dispatch: DispatchTableBuilder;
  readonly results: DispatchTableBuilder;

  constructor(readonly role: Role) {
    this.dispatch = new DispatchTableBuilder(`${ROLE_CLASS_NAMES[role]} dispatch table`);
    this.results = new DispatchTableBuilder(`${ROLE_CLASS_NAMES[role]} result table`);
  }

  addMember(signature: MethodSignature): void {
    this.#members.push(signature);
  }

  build(): CompiledRole {
    return {
      role: this.role,
      className: ROLE_CLASS_NAMES[this.role],
      members: Object.freeze([...this.#members]),
      dispatchTable: this.dispatch.build(),
      resultTable: this.results.build(),
    };
  }
}

/** Sender → receiver pairs for a direction. */
function routes(direction: MessageDirection, roles: Record<Role, RoleBuilder>): [RoleBuilder, RoleBuilder][] {
  switch (direction) {
    case "clientToServer":
      return [[roles.initiator, roles.responder]];
    case "serverToClient":
      return [[roles.responder, roles.initiator]];
    case "both":
      return [
        [roles.initiator, roles.responder],
        [roles.responder, roles.initiator],
      ];
  }
}

function paramsSignature(params: TypeExpr | null): ParameterSignature[] {
  return params ? [{ name: "params", type: params }] : [];
}

function member(
  kind: MethodSignature["kind"],
  name: string,
  method: string,
  message: MethodSignature["message"],
  context: boolean,
  parameters: readonly ParameterSignature[],
  returns: TypeExpr | null,
  docs: Documentation,
): MethodSignature {
  return {
    kind,
    name,
    method,
    message,
    context,
    parameters,
    returns,
    docs,
  };
}
