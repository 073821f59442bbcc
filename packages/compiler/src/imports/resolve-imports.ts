/**
 * Compiler Package - Import Resolver
 *
 * Computes the exact set of names a consumer artifact must import from the
 * types artifact: every defined name reachable from its parents, field
 * annotations, alias bindings, method parameters and method returns.
 * Nothing referenced is left out and nothing unreferenced is pulled in.
 */

import type { Definition } from "../model/definitions.js";
import type { MethodSignature } from "../model/dispatcher.js";
import { referencedNames, type TypeExpr } from "../model/type-expr.js";
import { debug } from "../shared/debug.js";

/** Anything whose annotations can mention defined names. */
export type ImportConsumer = Definition | { readonly members: readonly MethodSignature[] };

/**
 * Names from `definedNames` the consumers reference, first-seen order, no
 * duplicates. Consumers are scanned in order; per member, parameters come
 * before the return annotation.
 *
 * @example
 * resolveImports([initiator], ["HoverParams", "Hover", "Unused"]) → ["HoverParams", "Hover"]
 */
export function resolveImports(consumers: readonly ImportConsumer[], definedNames: Iterable<string>): string[] {
  const defined = new Set(definedNames);
  const seen = new Set<string>();
  const imports: string[] = [];

  const scan = (expr: TypeExpr): void => {
    for (const name of referencedNames(expr)) {
      if (seen.has(name) || !defined.has(name)) continue;
      seen.add(name);
      imports.push(name);
    }
  };

  for (const consumer of consumers) {
    for (const expr of annotationsOf(consumer)) scan(expr);
  }

  debug.imports("resolved", { consumers: consumers.length, names: imports });
  return imports;
}

/** Every annotation of a consumer, in scan order. */
function annotationsOf(consumer: ImportConsumer): TypeExpr[] {
  if ("members" in consumer) {
    const annotations: TypeExpr[] = [];
    for (const member of consumer.members) {
      for (const parameter of member.parameters) annotations.push(parameter.type);
      if (member.returns) annotations.push(member.returns);
    }
    return annotations;
  }
  switch (consumer.kind) {
    case "record":
      return [...consumer.parents, ...consumer.fields.map(field => field.type)];
    case "alias":
      return [consumer.type];
    case "enum":
      return [];
  }
}
