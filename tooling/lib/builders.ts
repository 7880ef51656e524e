/**
 * Definition API
 * Vocabulary for writing generator definitions and amendments
 */

import {
  AmendmentDefinition,
  ConstructorBranch,
  CustomTypeConstructor,
  Definition,
  Expression,
  GenericDefinition,
  LambdaBreaker,
  QualifiedName,
  ResolvedType,
  Resolver,
  TypePattern,
} from "./types";
import { BASICS } from "./resolved-type";
import { apply, refTo } from "./expression";

export type GeneratorOptions = {
  id: string;
  /** Capability the whole generator requires */
  dependency?: string;
  searchPattern: TypePattern;
  makeName: (typeName: string) => string;
  definitions: Definition[];
  blessed?: QualifiedName[];
};

export function define(options: GeneratorOptions): GenericDefinition {
  return {
    kind: "generic",
    id: options.id,
    dependency: options.dependency,
    searchPattern: options.searchPattern,
    makeName: options.makeName,
    definitions: options.definitions,
    blessed: options.blessed ?? [],
  };
}

/**
 * Extra definitions for generator `id`, tried before its own
 */
export function amend(id: string, definitions: Definition[]): AmendmentDefinition {
  return { kind: "amendment", id, definitions };
}

function always(resolver: Resolver): Definition {
  return { condition: { kind: "always" }, item: { kind: "resolver", resolver } };
}

/**
 * Gate a definition on a named optional capability
 */
export function ifUserHasDependency(name: string, definition: Definition): Definition {
  const names = definition.condition.kind === "dependencies" ? [...definition.condition.names, name] : [name];
  return { condition: { kind: "dependencies", names }, item: definition.item };
}

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export function primitive(
  ref: QualifiedName,
  resolve: (args: ResolvedType[], children: Expression[]) => Expression | undefined
): Definition {
  return always({ kind: "primitive", ref, resolve });
}

function constant(ref: QualifiedName, expression: Expression): Definition {
  return primitive(ref, () => expression);
}

function container1(ref: QualifiedName, build: (child: Expression) => Expression): Definition {
  return primitive(ref, (_args, children) => (children.length === 1 ? build(children[0]) : undefined));
}

function container2(ref: QualifiedName, build: (first: Expression, second: Expression) => Expression): Definition {
  return primitive(ref, (_args, children) => (children.length === 2 ? build(children[0], children[1]) : undefined));
}

export const bool = (expression: Expression): Definition => constant(BASICS.bool, expression);
export const int = (expression: Expression): Definition => constant(BASICS.int, expression);
export const float = (expression: Expression): Definition => constant(BASICS.float, expression);
export const string = (expression: Expression): Definition => constant(BASICS.string, expression);
export const char = (expression: Expression): Definition => constant(BASICS.char, expression);
export const unit = (expression: Expression): Definition => constant(BASICS.unit, expression);

export const list = (build: (child: Expression) => Expression): Definition => container1(BASICS.list, build);
export const array = (build: (child: Expression) => Expression): Definition => container1(BASICS.array, build);
export const set = (build: (child: Expression) => Expression): Definition => container1(BASICS.set, build);
export const maybe = (build: (child: Expression) => Expression): Definition => container1(BASICS.maybe, build);

export const dict = (build: (key: Expression, value: Expression) => Expression): Definition =>
  container2(BASICS.dict, build);
export const result = (build: (error: Expression, value: Expression) => Expression): Definition =>
  container2(BASICS.result, build);

// ---------------------------------------------------------------------------
// Combiners
// ---------------------------------------------------------------------------

/**
 * Free-form combiner. Return `undefined` to let the next combiner try.
 */
export function combiner(
  combine: (type: ResolvedType, constructor: Expression, children: Expression[]) => Expression | undefined
): Definition {
  return always({ kind: "combiner", combine });
}

/**
 * Constructor with no arguments, e.g. `fc.constant(Leaf)`
 */
export function succeed(wrap: (constructor: Expression) => Expression): Definition {
  return combiner((_type, constructor, children) => (children.length === 0 ? wrap(constructor) : undefined));
}

export function map(build: (constructor: Expression, child: Expression) => Expression): Definition {
  return combiner((_type, constructor, children) => (children.length === 1 ? build(constructor, children[0]) : undefined));
}

/**
 * `template(n)` names the function applied to the constructor and the `n`
 * children, for 2 <= n <= maxArity
 */
export function mapN(maxArity: number, template: (arity: number) => QualifiedName): Definition {
  return combiner((_type, constructor, children) => {
    if (children.length < 2 || children.length > maxArity) {
      return undefined;
    }
    return apply(refTo(template(children.length)), [constructor, ...children]);
  });
}

/**
 * Pipeline style: `step(...step(start(constructor), child1)..., childN)`
 */
export function pipeline(
  start: (constructor: Expression) => Expression,
  step: (accumulated: Expression, child: Expression) => Expression
): Definition {
  return combiner((_type, constructor, children) => children.reduce(step, start(constructor)));
}

export function tuple(build: (first: Expression, second: Expression) => Expression): Definition {
  return combiner((type, _constructor, children) =>
    type.kind === "tuple" && children.length === 2 ? build(children[0], children[1]) : undefined
  );
}

export function triple(build: (first: Expression, second: Expression, third: Expression) => Expression): Definition {
  return combiner((type, _constructor, children) =>
    type.kind === "tuple" && children.length === 3 ? build(children[0], children[1], children[2]) : undefined
  );
}

// ---------------------------------------------------------------------------
// Custom types, escape hatch and recursion
// ---------------------------------------------------------------------------

export function customType(
  combine: (constructors: CustomTypeConstructor[], branches: ConstructorBranch[]) => Expression
): Definition {
  return always({ kind: "customType", combine });
}

/**
 * Universal resolver, consulted before every other kind
 */
export function generic(resolve: (type: ResolvedType) => Expression | undefined): Definition {
  return always({ kind: "universal", resolve });
}

export function lambdaBreaker(wrap: LambdaBreaker): Definition {
  return { condition: { kind: "always" }, item: { kind: "lambdaBreaker", wrap } };
}
