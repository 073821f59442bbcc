/**
 * Compiler Package - Dependency Orderer
 *
 * Places definitions so that every definition a record, alias or parent list
 * mentions comes before the definition mentioning it.
 *
 * Depth-first and name driven: to place a definition, place each of its
 * not-yet-placed dependencies first (in the order they are mentioned), then
 * append it. Roots are visited in declaration order, so unrelated
 * definitions keep their relative order.
 *
 * Cycles are detected with an explicit in-progress stack rather than by
 * running out of recursion depth. Meeting a definition that is still in
 * progress records a forward-reference deviation and placement carries on.
 *
 * Names behind `forward` markers are not dependencies: the marker says the
 * reference is expected ahead of its definition. Each one that is still
 * unplaced when its user is placed is recorded as a deviation too.
 */

import type { Definition } from "../model/definitions.js";
import { referencedNames } from "../model/type-expr.js";
import { debug } from "../shared/debug.js";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * A reference the orderer could not satisfy because the referenced
 * definition is part of a cycle with the referencing one.
 */
export interface OrderDeviation {
  readonly code: "FORWARD_REFERENCE";
  /** Definition holding the reference. */
  readonly from: string;
  /** Definition referenced before it is placed. */
  readonly to: string;
  /**
   * The cycle, starting at `to` and ending at `from`; `[name]` for a self
   * reference, empty for a `forward` marker that closes no cycle.
   */
  readonly cycle: readonly string[];
}

export interface OrderResult {
  readonly definitions: readonly Definition[];
  readonly deviations: readonly OrderDeviation[];
}

/**
 * Order definitions so references precede their use wherever no cycle
 * prevents it. The output holds each name once (the first definition of a
 * name wins) and is identical for identical input.
 */
export function orderDefinitions(definitions: readonly Definition[]): OrderResult {
  const byName = new Map<string, Definition>();
  for (const definition of definitions) {
    if (byName.has(definition.name)) {
      debug.order("duplicate", { name: definition.name });
      continue;
    }
    byName.set(definition.name, definition);
  }

  const state = new Map<string, "in-progress" | "placed">();
  const ordered: Definition[] = [];
  const deviations: OrderDeviation[] = [];
  const record = (from: string, to: string, cycle: readonly string[]): void => {
    deviations.push({ code: "FORWARD_REFERENCE", from, to, cycle });
    debug.order("forward-reference", { from, to, cycle });
  };

  for (const root of byName.values()) {
    if (state.has(root.name)) continue;

    const stack: Frame[] = [frameFor(root)];
    state.set(root.name, "in-progress");

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;

      const dependency = frame.dependencies[frame.next];
      if (dependency === undefined) {
        for (const name of forwardReferences(frame.definition)) {
          if (!byName.has(name) || state.get(name) === "placed") continue;
          record(frame.definition.name, name, referencePath(byName, name, frame.definition.name));
        }
        stack.pop();
        state.set(frame.definition.name, "placed");
        ordered.push(frame.definition);
        continue;
      }
      frame.next++;

      const target = byName.get(dependency);
      if (!target) continue;

      const status = state.get(dependency);
      if (status === "placed") continue;
      if (status === "in-progress") {
        record(frame.definition.name, dependency, cycleOf(stack, dependency));
        continue;
      }

      state.set(dependency, "in-progress");
      stack.push(frameFor(target));
    }
  }

  debug.order("ordered", { definitions: ordered.length, deviations: deviations.length });
  return { definitions: ordered, deviations };
}

/**
 * Names a definition depends on, in mention order: parents, then field types
 * (records) or the bound expression (aliases). Forward references are not
 * dependencies.
 */
export function definitionDependencies(definition: Definition): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  const addAll = (found: readonly string[]): void => {
    for (const name of found) {
      if (seen.has(name)) continue;
      seen.add(name);
      names.push(name);
    }
  };

  switch (definition.kind) {
    case "record":
      for (const parent of definition.parents) addAll(referencedNames(parent, { includeForward: false }));
      for (const field of definition.fields) addAll(referencedNames(field.type, { includeForward: false }));
      break;
    case "alias":
      addAll(referencedNames(definition.type, { includeForward: false }));
      break;
    case "enum":
      break;
  }
  return names;
}

/**
 * Names a definition mentions only behind `forward` markers, in mention
 * order.
 */
export function forwardReferences(definition: Definition): string[] {
  const dependencies = new Set(definitionDependencies(definition));
  const all: string[] = [];
  switch (definition.kind) {
    case "record":
      for (const parent of definition.parents) all.push(...referencedNames(parent));
      for (const field of definition.fields) all.push(...referencedNames(field.type));
      break;
    case "alias":
      all.push(...referencedNames(definition.type));
      break;
    case "enum":
      break;
  }
  return [...new Set(all)].filter(name => !dependencies.has(name));
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

interface Frame {
  readonly definition: Definition;
  readonly dependencies: readonly string[];
  next: number;
}

function frameFor(definition: Definition): Frame {
  return { definition, dependencies: definitionDependencies(definition), next: 0 };
}

/**
 * Shortest reference path from `start` back to `goal` (both included),
 * following dependencies and forward references in mention order; empty
 * when `goal` is unreachable.
 */
function referencePath(byName: ReadonlyMap<string, Definition>, start: string, goal: string): string[] {
  if (start === goal) return [start];
  const previous = new Map<string, string>([[start, start]]);
  const queue = [start];
  for (let i = 0; i < queue.length; i++) {
    const current = queue[i];
    const definition = current === undefined ? undefined : byName.get(current);
    if (current === undefined || !definition) continue;
    for (const next of [...definitionDependencies(definition), ...forwardReferences(definition)]) {
      if (previous.has(next) || !byName.has(next)) continue;
      previous.set(next, current);
      if (next === goal) {
        const path = [goal];
        for (let step = current; step !== start; step = previous.get(step) ?? start) path.unshift(step);
        path.unshift(start);
        return path;
      }
      queue.push(next);
    }
  }
  return [];
}

function cycleOf(stack: readonly Frame[], name: string): string[] {
  const start = stack.findIndex(frame => frame.definition.name === name);
  return stack.slice(start).map(frame => frame.definition.name);
}
