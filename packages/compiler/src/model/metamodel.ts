/**
 * Compiler Package - Metamodel Input Types
 *
 * The declarative protocol description handed to the compiler by the model
 * loader. Shapes mirror the JSON metamodel document one-to-one; nothing here
 * is validated beyond what the loader's structural schema checks.
 */

/* =============================================================================
 * TYPE AST
 * ============================================================================= */

/** Base type names with a canonical meaning. Other names pass through as opaque. */
export type KnownBaseTypeName =
  | "URI"
  | "DocumentUri"
  | "integer"
  | "uinteger"
  | "decimal"
  | "RegExp"
  | "string"
  | "boolean"
  | "null";

export interface BaseType {
  kind: "base";
  name: string;
}

/** Reference to a structure, enumeration or type alias by name. */
export interface ReferenceType {
  kind: "reference";
  name: string;
}

export interface ArrayType {
  kind: "array";
  element: Type;
}

/**
 * JSON object map. The key is by convention a `URI`, `DocumentUri`, `string`
 * or `integer` base type, or a reference resolving to one of those.
 */
export interface MapType {
  kind: "map";
  key: Type;
  value: Type;
}

export interface AndType {
  kind: "and";
  items: readonly Type[];
}

export interface OrType {
  kind: "or";
  items: readonly Type[];
}

export interface TupleType {
  kind: "tuple";
  items: readonly Type[];
}

/** Inline anonymous record, e.g. `{ start: uinteger; end: uinteger }`. */
export interface StructureLiteralType {
  kind: "literal";
  value: StructureLiteral;
}

export interface StringLiteralType {
  kind: "stringLiteral";
  value: string;
}

export interface IntegerLiteralType {
  kind: "integerLiteral";
  value: number;
}

export interface BooleanLiteralType {
  kind: "booleanLiteral";
  value: boolean;
}

export type Type =
  | BaseType
  | ReferenceType
  | ArrayType
  | MapType
  | AndType
  | OrType
  | TupleType
  | StructureLiteralType
  | StringLiteralType
  | IntegerLiteralType
  | BooleanLiteralType;

/* =============================================================================
 * DOCUMENTED ENTITIES
 * ============================================================================= */

/** Documentation attributes shared by every named metamodel entity. */
export interface Documented {
  documentation?: string;
  /** Release in which the entity became available. */
  since?: string;
  sinceTags?: readonly string[];
  /** Whether the entity is a proposal rather than final. */
  proposed?: boolean;
  /** Deprecation message, present when the entity is deprecated. */
  deprecated?: string;
}

export interface Property extends Documented {
  name: string;
  type: Type;
  optional?: boolean;
}

export interface StructureLiteral extends Documented {
  properties: readonly Property[];
}

export interface Structure extends Documented {
  name: string;
  /** Polymorphic parents: the structure is assignable to each of them. */
  extends?: readonly Type[];
  /** Structures whose own properties are copied in. No subtype relation. */
  mixins?: readonly Type[];
  properties: readonly Property[];
}

export type EnumerationBackingKind = "string" | "integer" | "uinteger";

export interface EnumerationType {
  kind: "base";
  name: EnumerationBackingKind;
}

export interface EnumerationEntry extends Documented {
  name: string;
  value: string | number;
}

export interface Enumeration extends Documented {
  name: string;
  type: EnumerationType;
  values: readonly EnumerationEntry[];
  /** Whether values outside `values` are accepted on the wire. */
  supportsCustomValues?: boolean;
}

export interface TypeAlias extends Documented {
  name: string;
  type: Type;
}

/* =============================================================================
 * MESSAGES
 * ============================================================================= */

/**
 * Which role sends a message. `clientToServer` is Initiator → Responder,
 * `serverToClient` is Responder → Initiator.
 */
export type MessageDirection = "clientToServer" | "serverToClient" | "both";

/** A single parameter type, or positional parameter types. */
export type MessageParams = Type | readonly Type[];

export interface Request extends Documented {
  /** Wire method string, the stable identifier on the transport. */
  method: string;
  typeName: string;
  params?: MessageParams;
  result: Type;
  partialResult?: Type;
  errorData?: Type;
  registrationMethod?: string;
  registrationOptions?: Type;
  messageDirection: MessageDirection;
}

export interface Notification extends Documented {
  method: string;
  typeName: string;
  params?: MessageParams;
  registrationMethod?: string;
  registrationOptions?: Type;
  messageDirection: MessageDirection;
}

/* =============================================================================
 * METAMODEL
 * ============================================================================= */

export interface MetaData {
  version: string;
}

export interface Metamodel {
  metaData: MetaData;
  requests: readonly Request[];
  notifications: readonly Notification[];
  structures: readonly Structure[];
  enumerations: readonly Enumeration[];
  typeAliases: readonly TypeAlias[];
}
