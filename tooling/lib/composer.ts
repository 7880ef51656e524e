/**
 * Expression composer
 * Builds the expression implementing a generator for a resolved type,
 * recursing into children and collecting auxiliary declarations for named
 * types met below the top level
 */

import {
  AuxiliaryDeclaration,
  ConstructorBranch,
  Expression,
  GenerateResult,
  KnownProvider,
  ResolvedGenerator,
  ResolvedType,
  Resolver,
} from "./types";
import { AuditLog } from "./audit";
import { Logger } from "./logger";
import { PAIR_CONSTRUCTOR, UNIT_TYPE, describeType, typesEqual } from "./resolved-type";
import { matchPattern, rebuildPattern } from "./pattern";
import { renderExpression } from "./render";
import { lambda, local, record, refTo, tuple } from "./expression";
import { formatQualifiedName, qualifiedName, sameQualifiedName, sanitizeIdentifier, uniqueName } from "./utils";

export type GenerationContext = {
  /** Top-level names already taken in the target module */
  reservedNames?: ReadonlySet<string>;
  logger?: Logger;
  audit?: AuditLog;
};

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationError";
  }
}

type Named = Extract<ResolvedType, { kind: "customType" | "typeAlias" }>;

/**
 * Generate an expression for `type`. The outermost call for a declaration
 * passes `isTopLevel`, which keeps a named type's composition inline
 * instead of turning it into an auxiliary declaration.
 */
export function generate(
  isTopLevel: boolean,
  generator: ResolvedGenerator,
  context: GenerationContext,
  knownProviders: KnownProvider[],
  type: ResolvedType
): GenerateResult {
  const composer = new Composer(generator, context, knownProviders);
  try {
    const expression = composer.generate(isTopLevel, type);
    return { ok: true, expression, declarations: composer.getDeclarations() };
  } catch (error) {
    if (error instanceof GenerationError) {
      context.audit?.recordFailure(generator.id, describeType(type), error.message);
      context.logger?.warn("Generation failed", { error: error.message });
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

class Composer {
  private readonly providers: KnownProvider[];
  private readonly declarations: AuxiliaryDeclaration[] = [];
  private readonly namesByType = new Map<string, string>();
  private readonly usedNames = new Set<string>();
  private readonly unwrapping = new Set<string>();
  private freshCounter = 0;

  constructor(
    private readonly generator: ResolvedGenerator,
    private readonly context: GenerationContext,
    knownProviders: KnownProvider[]
  ) {
    this.providers = knownProviders.filter((provider) => provider.generatorId === generator.id);
  }

  getDeclarations(): AuxiliaryDeclaration[] {
    return [...this.declarations];
  }

  generate(isTopLevel: boolean, type: ResolvedType): Expression {
    const provided = this.findProvider(type);
    if (provided) {
      return provided;
    }

    this.context.logger?.debug("Composing", { type: describeType(type), topLevel: isTopLevel });

    switch (type.kind) {
      case "typeVariable":
        throw new GenerationError(
          `Cannot generate ${this.generator.id} for the type variable "${type.name}": generic types are not supported`
        );

      case "function":
        throw new GenerationError(
          `Cannot generate ${this.generator.id} for the function type ${describeType(type)}: function types are not supported`
        );

      case "opaque":
        return this.universal(type) ?? this.primitive(type);

      case "typeAlias":
        if (type.generics.length > 0) {
          throw new GenerationError(
            `Cannot generate ${this.generator.id} for ${describeType(type)}: type aliases with generic parameters are not supported`
          );
        }
        if (type.inner.kind === "anonymousRecord") {
          const inner = type.inner;
          return this.named(isTopLevel, type, () => this.universal(type) ?? this.generate(true, inner));
        }
        return this.unwrap(isTopLevel, type);

      case "anonymousRecord": {
        const universal = this.universal(type);
        if (universal) return universal;

        const params = type.fields.map((field) => this.fresh(field.name));
        const constructor = lambda(
          params,
          record(type.fields.map((field, index) => [field.name, local(params[index])]))
        );
        return this.combine(
          type,
          constructor,
          type.fields.map((field) => field.type)
        );
      }

      case "tuple":
        return this.tuple(isTopLevel, type);

      case "customType":
        if (type.generics.length > 0) {
          throw new GenerationError(
            `Cannot generate ${this.generator.id} for ${describeType(type)}: custom types with generic parameters are not supported`
          );
        }
        return this.named(isTopLevel, type, () => this.universal(type) ?? this.customType(type));
    }
  }

  private findProvider(type: ResolvedType): Expression | undefined {
    for (const provider of this.providers) {
      const child = matchPattern(this.generator.searchPattern, provider.declaredType);
      if (child && typesEqual(child, type)) {
        this.context.audit?.recordProviderUse(this.generator.id, describeType(type), formatQualifiedName(provider.location));
        return refTo(provider.location);
      }
    }
    return undefined;
  }

  private universal(type: ResolvedType): Expression | undefined {
    for (const resolver of this.generator.resolvers) {
      if (resolver.kind !== "universal") continue;
      const result = resolver.resolve(type);
      if (result) {
        this.applied(type, resolver);
        return result;
      }
    }
    return undefined;
  }

  private primitive(type: Extract<ResolvedType, { kind: "opaque" }>): Expression {
    const children = type.args.map((arg) => this.generate(false, arg));

    for (const resolver of this.generator.resolvers) {
      if (resolver.kind !== "primitive" || !sameQualifiedName(resolver.ref, type.ref)) continue;
      const result = resolver.resolve(type.args, children);
      if (result) {
        this.applied(type, resolver);
        return result;
      }
    }

    throw this.missing(describeType(type));
  }

  private tuple(isTopLevel: boolean, type: Extract<ResolvedType, { kind: "tuple" }>): Expression {
    switch (type.elements.length) {
      case 0:
        return this.generate(isTopLevel, UNIT_TYPE);
      case 2:
        return this.universal(type) ?? this.combine(type, refTo(PAIR_CONSTRUCTOR), type.elements);
      case 3: {
        const universal = this.universal(type);
        if (universal) return universal;
        const params = ["first", "second", "third"].map((name) => this.fresh(name));
        return this.combine(type, lambda(params, tuple(params.map(local))), type.elements);
      }
      default:
        throw new GenerationError(
          `Cannot generate ${this.generator.id} for ${describeType(type)}: illegal tuple arity ${type.elements.length}`
        );
    }
  }

  /**
   * Aliases of anything but a record are transparent. Only a record alias
   * gets a declaration of its own, so a transparent alias that reaches
   * itself has nothing to refer back to.
   */
  private unwrap(isTopLevel: boolean, type: Extract<ResolvedType, { kind: "typeAlias" }>): Expression {
    const key = formatQualifiedName(type.ref);
    if (this.unwrapping.has(key)) {
      throw new GenerationError(
        `Cannot generate ${this.generator.id} for ${key}: recursive type alias ${key} is not supported`
      );
    }

    this.unwrapping.add(key);
    try {
      return this.generate(isTopLevel, type.inner);
    } finally {
      this.unwrapping.delete(key);
    }
  }

  private customType(type: Extract<ResolvedType, { kind: "customType" }>): Expression {
    const resolver = this.generator.resolvers.find(
      (candidate): candidate is Extract<Resolver, { kind: "customType" }> => candidate.kind === "customType"
    );
    if (!resolver) {
      throw this.missing(describeType(type));
    }

    const branches: ConstructorBranch[] = type.constructors.map((constructor) => ({
      name: constructor.ref.name,
      expression: this.combine(type, refTo(constructor.ref), constructor.args),
    }));

    this.applied(type, resolver);
    return resolver.combine(type.constructors, branches);
  }

  /**
   * Generate every child, then apply the first combiner that accepts them
   */
  private combine(type: ResolvedType, constructor: Expression, childTypes: ResolvedType[]): Expression {
    const children = childTypes.map((child) => this.generate(false, child));

    for (const resolver of this.generator.resolvers) {
      if (resolver.kind !== "combiner") continue;
      const result = resolver.combine(type, constructor, children);
      if (result) {
        this.applied(type, resolver);
        return result;
      }
    }

    throw this.missing(renderExpression(constructor));
  }

  /**
   * Inline at the top level; elsewhere emit (or reuse) an auxiliary
   * declaration and return a reference to it
   */
  private named(isTopLevel: boolean, type: Named, compose: () => Expression): Expression {
    if (isTopLevel) {
      return compose();
    }

    const key = formatQualifiedName(type.ref);
    const existing = this.namesByType.get(key);
    if (existing !== undefined) {
      return refTo(qualifiedName([], existing));
    }

    const reserved = this.context.reservedNames;
    const name = uniqueName(sanitizeIdentifier(this.generator.makeName(type.ref.name)), (candidate) =>
      this.usedNames.has(candidate) || (reserved?.has(candidate) ?? false)
    );
    this.namesByType.set(key, name);
    this.usedNames.add(name);

    const body = compose();
    this.declarations.push({ name, type: rebuildPattern(this.generator.searchPattern, type), body });
    this.context.audit?.recordDeclaration(this.generator.id, key, name);
    this.context.logger?.debug("Auxiliary declaration", { name, type: key });

    return refTo(qualifiedName([], name));
  }

  private fresh(base: string): string {
    this.freshCounter += 1;
    return `${sanitizeIdentifier(base)}_${this.freshCounter}`;
  }

  private applied(type: ResolvedType, resolver: Resolver): void {
    this.context.audit?.recordResolver(this.generator.id, describeType(type), resolver.kind);
  }

  private missing(subject: string): GenerationError {
    return new GenerationError(`Don't know how to implement ${this.generator.id} for ${subject}`);
  }
}
