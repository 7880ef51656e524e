/**
 * Type pattern matching
 * A pattern describes the outer shape of a generated annotation, e.g.
 * `fc.Arbitrary<_>` or `_ -> Json`, with a single hole for the child type.
 */

import { ResolvedType, TypePattern, QualifiedName } from "./types";
import { typesEqual } from "./resolved-type";
import { sameQualifiedName } from "./utils";

export const target: TypePattern = { kind: "target" };

export function opaquePattern(ref: QualifiedName, args: TypePattern[] = []): TypePattern {
  return { kind: "opaque", ref, args };
}

export function functionPattern(from: TypePattern, to: TypePattern): TypePattern {
  return { kind: "function", from, to };
}

export function tuplePattern(elements: TypePattern[]): TypePattern {
  return { kind: "tuple", elements };
}

/**
 * Match `annotation` against `pattern` and return the type bound at the
 * hole. Every hole must bind structurally equal types.
 */
export function matchPattern(pattern: TypePattern, annotation: ResolvedType): ResolvedType | undefined {
  const bindings: ResolvedType[] = [];
  if (!collect(pattern, annotation, bindings) || bindings.length === 0) {
    return undefined;
  }
  const [first, ...rest] = bindings;
  return rest.every((binding) => typesEqual(first, binding)) ? first : undefined;
}

function collect(pattern: TypePattern, type: ResolvedType, bindings: ResolvedType[]): boolean {
  switch (pattern.kind) {
    case "target":
      bindings.push(type);
      return true;
    case "opaque":
      return (
        type.kind === "opaque" &&
        sameQualifiedName(pattern.ref, type.ref) &&
        pattern.args.length === type.args.length &&
        pattern.args.every((arg, index) => collect(arg, type.args[index], bindings))
      );
    case "function":
      return type.kind === "function" && collect(pattern.from, type.from, bindings) && collect(pattern.to, type.to, bindings);
    case "tuple":
      return (
        type.kind === "tuple" &&
        pattern.elements.length === type.elements.length &&
        pattern.elements.every((element, index) => collect(element, type.elements[index], bindings))
      );
  }
}

/**
 * Rebuild the pattern's outer shape around `child`
 */
export function rebuildPattern(pattern: TypePattern, child: ResolvedType): ResolvedType {
  switch (pattern.kind) {
    case "target":
      return child;
    case "opaque":
      return { kind: "opaque", ref: pattern.ref, args: pattern.args.map((arg) => rebuildPattern(arg, child)) };
    case "function":
      return { kind: "function", from: rebuildPattern(pattern.from, child), to: rebuildPattern(pattern.to, child) };
    case "tuple":
      return { kind: "tuple", elements: pattern.elements.map((element) => rebuildPattern(element, child)) };
  }
}
