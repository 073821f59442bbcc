/**
 * CLI Package - Metamodel Loader
 *
 * Reads a metamodel JSON document and checks its shape. Only structure is
 * checked: whether references resolve or methods are unique is left to the
 * compiler stages that care.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { debug, type Metamodel, type Type } from "@rpcforge/compiler";
import { LoaderError, LoaderErrorCode } from "./errors.js";

// ============================================================================
// Schemas
// ============================================================================

const documented = {
  documentation: z.string().optional(),
  since: z.string().optional(),
  sinceTags: z.array(z.string()).optional(),
  proposed: z.boolean().optional(),
  deprecated: z.string().optional(),
};

export const TypeSchema: z.ZodType<Type> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("base"), name: z.string() }),
    z.object({ kind: z.literal("reference"), name: z.string() }),
    z.object({ kind: z.literal("array"), element: TypeSchema }),
    z.object({ kind: z.literal("map"), key: TypeSchema, value: TypeSchema }),
    z.object({ kind: z.literal("and"), items: z.array(TypeSchema) }),
    z.object({ kind: z.literal("or"), items: z.array(TypeSchema) }),
    z.object({ kind: z.literal("tuple"), items: z.array(TypeSchema) }),
    z.object({ kind: z.literal("literal"), value: StructureLiteralSchema }),
    z.object({ kind: z.literal("stringLiteral"), value: z.string() }),
    z.object({ kind: z.literal("integerLiteral"), value: z.number().int() }),
    z.object({ kind: z.literal("booleanLiteral"), value: z.boolean() }),
  ]),
);

const PropertySchema = z.object({
  name: z.string(),
  type: TypeSchema,
  optional: z.boolean().optional(),
  ...documented,
});

const StructureLiteralSchema = z.object({
  properties: z.array(PropertySchema),
  ...documented,
});

const StructureSchema = z.object({
  name: z.string(),
  extends: z.array(TypeSchema).optional(),
  mixins: z.array(TypeSchema).optional(),
  properties: z.array(PropertySchema),
  ...documented,
});

const EnumerationSchema = z.object({
  name: z.string(),
  type: z.object({ kind: z.literal("base"), name: z.enum(["string", "integer", "uinteger"]) }),
  values: z.array(z.object({ name: z.string(), value: z.union([z.string(), z.number()]), ...documented })),
  supportsCustomValues: z.boolean().optional(),
  ...documented,
});

const TypeAliasSchema = z.object({
  name: z.string(),
  type: TypeSchema,
  ...documented,
});

const MessageDirectionSchema = z.enum(["clientToServer", "serverToClient", "both"]);

const messageFields = {
  method: z.string(),
  typeName: z.string().optional(),
  params: z.union([TypeSchema, z.array(TypeSchema)]).optional(),
  registrationMethod: z.string().optional(),
  registrationOptions: TypeSchema.optional(),
  messageDirection: MessageDirectionSchema,
  ...documented,
};

const RequestSchema = z.object({
  ...messageFields,
  result: TypeSchema,
  partialResult: TypeSchema.optional(),
  errorData: TypeSchema.optional(),
});

const NotificationSchema = z.object(messageFields);

export const MetamodelSchema = z.object({
  metaData: z.object({ version: z.string() }),
  requests: z.array(RequestSchema).default([]),
  notifications: z.array(NotificationSchema).default([]),
  structures: z.array(StructureSchema).default([]),
  enumerations: z.array(EnumerationSchema).default([]),
  typeAliases: z.array(TypeAliasSchema).default([]),
});

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate a parsed JSON document as a metamodel.
 *
 * Messages without a `typeName` get one derived from their method:
 * `textDocument/hover` → `TextDocumentHover`.
 */
export function parseMetamodel(json: unknown, file?: string): Metamodel {
  const parsed = MetamodelSchema.safeParse(json);
  if (!parsed.success) {
    throw new LoaderError(
      `Invalid metamodel${file ? ` in ${file}` : ""}:\n${formatIssues(parsed.error)}`,
      LoaderErrorCode.INVALID_METAMODEL,
      file,
    );
  }

  const data = parsed.data;
  const model: Metamodel = {
    ...data,
    requests: data.requests.map(request => ({ ...request, typeName: request.typeName ?? deriveTypeName(request.method) })),
    notifications: data.notifications.map(notification => ({
      ...notification,
      typeName: notification.typeName ?? deriveTypeName(notification.method),
    })),
  };
  debug.model("parsed", {
    version: model.metaData.version,
    requests: model.requests.length,
    notifications: model.notifications.length,
    structures: model.structures.length,
  });
  return model;
}

/** Read and validate a metamodel file (UTF-8 JSON). */
export function loadMetamodelFile(path: string): Metamodel {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw new LoaderError(
      `Cannot read metamodel ${path}: ${error instanceof Error ? error.message : String(error)}`,
      LoaderErrorCode.READ_FAILED,
      path,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new LoaderError(
      `Metamodel ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      LoaderErrorCode.INVALID_JSON,
      path,
    );
  }

  return parseMetamodel(json, path);
}

/**
 * Type name for a message that declares none: every alphanumeric run of the
 * method, capitalized and joined.
 */
export function deriveTypeName(method: string): string {
  return method
    .split(/[^A-Za-z0-9]+/)
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

/** One line per issue: `path: message`. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `  ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");
}
