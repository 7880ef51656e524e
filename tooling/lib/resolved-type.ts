/**
 * Constructors, well-known references and structural comparison for
 * resolved types
 */

import { CustomTypeConstructor, QualifiedName, RecordField, ResolvedType } from "./types";
import { formatQualifiedName, qualifiedName, sameQualifiedName } from "./utils";

export const BASICS = {
  int: qualifiedName(["Basics"], "Int"),
  float: qualifiedName(["Basics"], "Float"),
  bool: qualifiedName(["Basics"], "Bool"),
  unit: qualifiedName(["Basics"], "Unit"),
  string: qualifiedName(["String"], "String"),
  char: qualifiedName(["Char"], "Char"),
  list: qualifiedName(["List"], "List"),
  array: qualifiedName(["Array"], "Array"),
  set: qualifiedName(["Set"], "Set"),
  maybe: qualifiedName(["Maybe"], "Maybe"),
  dict: qualifiedName(["Dict"], "Dict"),
  result: qualifiedName(["Result"], "Result"),
} as const;

/** Canonical pair constructor, exported by the runtime module */
export const PAIR_CONSTRUCTOR = qualifiedName(["Tuple"], "pair");

export function opaque(ref: QualifiedName, args: ResolvedType[] = []): ResolvedType {
  return { kind: "opaque", ref, args };
}

export const UNIT_TYPE: ResolvedType = opaque(BASICS.unit);

export function customType(
  ref: QualifiedName,
  constructors: CustomTypeConstructor[],
  generics: string[] = []
): Extract<ResolvedType, { kind: "customType" }> {
  return { kind: "customType", ref, generics, constructors };
}

export function typeAlias(ref: QualifiedName, inner: ResolvedType, generics: string[] = []): ResolvedType {
  return { kind: "typeAlias", ref, generics, inner };
}

export function anonymousRecord(fields: RecordField[]): ResolvedType {
  return { kind: "anonymousRecord", fields };
}

export function tupleType(elements: ResolvedType[]): ResolvedType {
  return { kind: "tuple", elements };
}

export function functionType(from: ResolvedType, to: ResolvedType): ResolvedType {
  return { kind: "function", from, to };
}

export function typeVariable(name: string): ResolvedType {
  return { kind: "typeVariable", name };
}

/**
 * Human readable form used in diagnostics. Named types print their name
 * only, so cyclic graphs terminate.
 */
export function describeType(type: ResolvedType): string {
  switch (type.kind) {
    case "opaque": {
      const name = formatQualifiedName(type.ref);
      if (type.args.length === 0) return name;
      return `${name} ${type.args.map((arg) => describeArgument(arg)).join(" ")}`;
    }
    case "customType":
    case "typeAlias": {
      const name = formatQualifiedName(type.ref);
      return type.generics.length === 0 ? name : `${name} ${type.generics.join(" ")}`;
    }
    case "anonymousRecord":
      if (type.fields.length === 0) return "{}";
      return `{ ${type.fields.map((f) => `${f.name} : ${describeType(f.type)}`).join(", ")} }`;
    case "tuple":
      return `( ${type.elements.map(describeType).join(", ")} )`;
    case "function":
      return `${describeArgument(type.from, true)} -> ${describeType(type.to)}`;
    case "typeVariable":
      return type.name;
  }
}

function describeArgument(type: ResolvedType, functionOnly: boolean = false): string {
  const text = describeType(type);
  const needsParens = functionOnly
    ? type.kind === "function"
    : type.kind === "function" || (type.kind === "opaque" && type.args.length > 0);
  return needsParens ? `(${text})` : text;
}

/**
 * Structural equality. Custom types and aliases compare by qualified name;
 * an argument-less opaque reference equals the custom type or alias of the
 * same name (bare name against full definition).
 */
export function typesEqual(a: ResolvedType, b: ResolvedType): boolean {
  const nameA = namedReference(a);
  const nameB = namedReference(b);
  if (nameA && nameB) {
    if (!sameQualifiedName(nameA.ref, nameB.ref)) return false;
    if (nameA.args.length !== nameB.args.length) return false;
    return nameA.args.every((arg, index) => typesEqual(arg, nameB.args[index]));
  }

  switch (a.kind) {
    case "anonymousRecord":
      return (
        b.kind === "anonymousRecord" &&
        a.fields.length === b.fields.length &&
        a.fields.every((field, index) => field.name === b.fields[index].name && typesEqual(field.type, b.fields[index].type))
      );
    case "tuple":
      return (
        b.kind === "tuple" &&
        a.elements.length === b.elements.length &&
        a.elements.every((element, index) => typesEqual(element, b.elements[index]))
      );
    case "function":
      return b.kind === "function" && typesEqual(a.from, b.from) && typesEqual(a.to, b.to);
    case "typeVariable":
      return b.kind === "typeVariable" && a.name === b.name;
    default:
      return false;
  }
}

function namedReference(type: ResolvedType): { ref: QualifiedName; args: ResolvedType[] } | undefined {
  switch (type.kind) {
    case "opaque":
      return { ref: type.ref, args: type.args };
    case "customType":
    case "typeAlias":
      // Generic parameters are unsupported, so a named definition stands for its bare name
      return { ref: type.ref, args: [] };
    default:
      return undefined;
  }
}
