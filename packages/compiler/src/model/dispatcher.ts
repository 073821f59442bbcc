/**
 * Compiler Package - Dispatcher Artifacts
 *
 * One artifact per role. Both roles can send and receive; which members land
 * on which role follows the message direction.
 */

import type { Documentation } from "./definitions.js";
import type { TypeExpr } from "./type-expr.js";

export type Role = "initiator" | "responder";

export const ROLE_CLASS_NAMES = {
  initiator: "Initiator",
  responder: "Responder",
} as const satisfies Record<Role, string>;

export type RoleClassName = (typeof ROLE_CLASS_NAMES)[Role];

export type MemberKind =
  | "sender"
  | "request-handler"
  | "result-handler"
  | "notification-handler";

export interface ParameterSignature {
  readonly name: string;
  readonly type: TypeExpr;
}

/**
 * A sender method or a handler stub.
 *
 * Senders have a body (they call the transport); handler stubs have none and
 * must be supplied by whoever extends the generated class.
 */
export interface MethodSignature {
  readonly kind: MemberKind;
  readonly name: string;
  /** Wire method string of the message the member belongs to. */
  readonly method: string;
  readonly message: "request" | "notification";
  /** Whether a handler context parameter precedes `parameters`. */
  readonly context: boolean;
  readonly parameters: readonly ParameterSignature[];
  /** `null` when the member returns nothing. */
  readonly returns: TypeExpr | null;
  readonly docs: Documentation;
}

export interface DispatchEntry {
  readonly method: string;
  readonly handler: string;
}

/**
 * Frozen mapping from wire method string to handler identifier, in
 * insertion order.
 */
export interface DispatchTable {
  readonly entries: readonly DispatchEntry[];
  readonly size: number;
  get(method: string): string | undefined;
  has(method: string): boolean;
}

export interface DispatcherArtifact {
  readonly role: Role;
  readonly className: RoleClassName;
  /** Senders and stubs in message declaration order. */
  readonly members: readonly MethodSignature[];
  /** Incoming requests and notifications. */
  readonly dispatchTable: DispatchTable;
  /** Results of requests this role sent. */
  readonly resultTable: DispatchTable;
  /** Names to import from the types artifact. */
  readonly imports: readonly string[];
}
