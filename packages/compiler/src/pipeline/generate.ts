/**
 * Compiler Package - Pipeline
 *
 * Metamodel in, three artifacts out: the ordered types artifact and one
 * dispatcher per role, each carrying the names it imports from the types.
 * No I/O happens here; writing files is the emitter's and the CLI's job.
 */

import type { Definition } from "../model/definitions.js";
import type { DispatcherArtifact } from "../model/dispatcher.js";
import type { Metamodel } from "../model/metamodel.js";
import { BASE_SCALAR_ALIASES, buildDefinitions } from "../definitions/build.js";
import { compileMessages, type CompiledRole } from "../messages/compile-messages.js";
import { orderDefinitions, type OrderDeviation } from "../order/order-definitions.js";
import { resolveImports } from "../imports/resolve-imports.js";
import { normalizeGenerateOptions, type GenerateOptions } from "../options.js";
import { debug } from "../shared/debug.js";

export interface TypesArtifact {
  /** Definitions in dependency order. */
  readonly definitions: readonly Definition[];
}

export interface GenerationResult {
  /** Protocol version from the metamodel's metadata. */
  readonly version: string;
  readonly types: TypesArtifact;
  readonly initiator: DispatcherArtifact;
  readonly responder: DispatcherArtifact;
  /** Cycles the orderer could not break; the definitions are still emitted. */
  readonly deviations: readonly OrderDeviation[];
}

/**
 * Run every compilation stage over a metamodel.
 *
 * @throws GenerationError from the stage that failed; nothing partial is
 * returned.
 */
export function generate(model: Metamodel, options?: GenerateOptions): GenerationResult {
  const resolved = normalizeGenerateOptions(options);
  debug.model("generate", {
    version: model.metaData.version,
    structures: model.structures.length,
    enumerations: model.enumerations.length,
    typeAliases: model.typeAliases.length,
    requests: model.requests.length,
    notifications: model.notifications.length,
  });

  const built = buildDefinitions(model, options);
  const all = resolved.baseAliases ? [...BASE_SCALAR_ALIASES, ...built] : built;
  const { definitions, deviations } = orderDefinitions(all);

  const { initiator, responder } = compileMessages(model, resolved);
  const definedNames = definitions.map(definition => definition.name);

  return {
    version: model.metaData.version,
    types: { definitions },
    initiator: withImports(initiator, definedNames),
    responder: withImports(responder, definedNames),
    deviations,
  };
}

function withImports(role: CompiledRole, definedNames: readonly string[]): DispatcherArtifact {
  return { ...role, imports: resolveImports([role], definedNames) };
}
