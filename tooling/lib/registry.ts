/**
 * Resolver registry
 * Folds generator definitions and their amendments into resolved
 * generators for one activation context
 */

import {
  ActivationContext,
  Condition,
  Definition,
  GeneratorDefinition,
  LambdaBreaker,
  ResolvedGenerator,
  Resolver,
} from "./types";

export function isConditionMet(condition: Condition, activation: ActivationContext): boolean {
  return condition.kind === "always" || condition.names.every((name) => activation.has(name));
}

/**
 * Resolve generator definitions against the enabled capabilities.
 *
 * Amendments take precedence over the definitions they amend, and a later
 * amendment takes precedence over an earlier one. Amendments for an id that
 * has no active generator are dropped, as are generators whose dependency
 * is absent. Never fails.
 */
export function resolveGenerators(
  activation: ActivationContext,
  definitions: GeneratorDefinition[]
): ResolvedGenerator[] {
  const pending = new Map<string, Definition[][]>();
  const resolved: ResolvedGenerator[] = [];

  for (let index = definitions.length - 1; index >= 0; index -= 1) {
    const definition = definitions[index];

    if (definition.kind === "amendment") {
      const batches = pending.get(definition.id) ?? [];
      batches.push(definition.definitions);
      pending.set(definition.id, batches);
      continue;
    }

    const amendments = pending.get(definition.id) ?? [];
    pending.delete(definition.id);

    if (definition.dependency !== undefined && !activation.has(definition.dependency)) {
      continue;
    }

    const active = [...amendments.flat(), ...definition.definitions].filter((d) =>
      isConditionMet(d.condition, activation)
    );

    const resolvers: Resolver[] = [];
    let lambdaBreaker: LambdaBreaker | undefined;
    for (const { item } of active) {
      if (item.kind === "resolver") {
        resolvers.push(item.resolver);
      } else if (lambdaBreaker === undefined) {
        lambdaBreaker = item.wrap;
      }
    }

    resolved.push({
      id: definition.id,
      searchPattern: definition.searchPattern,
      resolvers,
      lambdaBreaker,
      makeName: definition.makeName,
      blessed: definition.blessed,
    });
  }

  return resolved.reverse();
}

export function findGenerator(generators: ResolvedGenerator[], id: string): ResolvedGenerator | undefined {
  return generators.find((generator) => generator.id === id);
}
