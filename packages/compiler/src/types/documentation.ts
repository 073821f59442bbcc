import type { Documented } from "../model/metamodel.js";
import type { Documentation } from "../model/definitions.js";

/** Carry the documentation attributes of a metamodel entity, dropping absent ones. */
export function toDocumentation(entity: Documented): Documentation {
  return {
    ...(entity.documentation !== undefined ? { text: entity.documentation } : {}),
    ...(entity.since !== undefined ? { since: entity.since } : {}),
    ...(entity.proposed ? { proposed: true } : {}),
    ...(entity.deprecated !== undefined ? { deprecated: entity.deprecated } : {}),
  };
}
