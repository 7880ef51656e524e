/**
 * Derivation pipeline
 * Picks the generator for a declaration's annotation, composes, simplifies,
 * breaks recursion and normalizes the emitted declarations
 */

import {
  AuxiliaryDeclaration,
  DerivationRequest,
  DerivationResult,
  EmittedDeclaration,
  KnownProvider,
  ResolvedGenerator,
  ResolvedType,
} from "./types";
import { GenerationContext, GenerationError, generate } from "./composer";
import { breakRecursion } from "./recursion";
import { describeType } from "./resolved-type";
import { matchPattern } from "./pattern";
import { normalizeDeclaration } from "./normalizer";
import { simplify } from "./simplifier";

export type GeneratorMatch = {
  generator: ResolvedGenerator;
  child: ResolvedType;
};

/**
 * First generator whose search pattern matches `annotation`
 */
export function findGeneratorFor(generators: ResolvedGenerator[], annotation: ResolvedType): GeneratorMatch | undefined {
  for (const generator of generators) {
    const child = matchPattern(generator.searchPattern, annotation);
    if (child) {
      return { generator, child };
    }
  }
  return undefined;
}

export function deriveDeclaration(
  generators: ResolvedGenerator[],
  request: DerivationRequest,
  knownProviders: KnownProvider[],
  context: GenerationContext = {}
): DerivationResult {
  const match = findGeneratorFor(generators, request.annotation);
  if (!match) {
    const error = `No generator knows how to implement ${describeType(request.annotation)}`;
    context.logger?.warn(error, { declaration: request.name });
    return { ok: false, error };
  }

  const { generator, child } = match;
  const run = (): DerivationResult => {
    const reserved = new Set([...(context.reservedNames ?? []), request.name]);
    const generated = generate(true, generator, { ...context, reservedNames: reserved }, knownProviders, child);
    if (!generated.ok) {
      return generated;
    }

    let auxiliary: AuxiliaryDeclaration[];
    try {
      auxiliary = breakRecursion(
        generated.declarations.map((declaration) => ({ ...declaration, body: simplify(declaration.body) })),
        generator.lambdaBreaker,
        generator.id
      );
    } catch (error) {
      if (error instanceof GenerationError) {
        context.audit?.recordFailure(generator.id, describeType(child), error.message);
        return { ok: false, error: error.message };
      }
      throw error;
    }

    const declaration: EmittedDeclaration = {
      ...normalizeDeclaration({ name: request.name, params: request.params, body: simplify(generated.expression) }),
      type: request.annotation,
    };
    const emitted: EmittedDeclaration[] = auxiliary.map((aux) => ({
      ...normalizeDeclaration({ name: aux.name, params: [], body: aux.body }),
      type: aux.type,
    }));

    context.logger?.debug("Derived declaration", { auxiliary: emitted.map((aux) => aux.name) });
    return { ok: true, generatorId: generator.id, declaration, auxiliary: emitted };
  };

  return context.logger
    ? context.logger.withContext({ generatorId: generator.id, declaration: request.name, phase: "derive" }, run)
    : run();
}
