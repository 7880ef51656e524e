/**
 * Built-in generators
 *
 * `arbitrary` derives fast-check arbitraries, `jsonEncoder` derives
 * functions from a value to its JSON form. Both are written with the
 * definition vocabulary from ./builders.
 */

import { CaseBranch, Expression, GeneratorDefinition, Pattern } from "./types";
import {
  amend,
  array,
  bool,
  char,
  combiner,
  customType,
  define,
  dict,
  float,
  ifUserHasDependency,
  int,
  lambdaBreaker,
  list,
  map,
  maybe,
  result,
  set,
  string,
  succeed,
  triple,
  tuple,
  unit,
} from "./builders";
import { access, apply, caseOf, invoke, lambda, literal, local, record, ref, varPattern } from "./expression";
import { functionPattern, opaquePattern, target } from "./pattern";
import { capitalize, qualifiedName } from "./utils";

export const ARBITRARY = qualifiedName("fc", "Arbitrary");
export const JSON_VALUE = qualifiedName("Json", "Value");

/** Capability that switches record arbitraries to `fc.record` */
export const FAST_CHECK_RECORDS = "fast-check-records";

const fc = (name: string, args: Expression[] = []): Expression => apply(ref("fc", name), args);
const UNDEFINED = ref([], "undefined");

function numbered(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_value, index) => `${prefix}${index + 1}`);
}

function tuplePatternOf(names: string[]): Pattern {
  return { kind: "tuple", elements: names.map(varPattern) };
}

// ---------------------------------------------------------------------------
// fast-check
// ---------------------------------------------------------------------------

function taggedResult(ok: boolean, field: string): Expression {
  return lambda([field], record([["ok", literal(ok)], [field, local(field)]]));
}

export const arbitrary = define({
  id: "arbitrary",
  searchPattern: opaquePattern(ARBITRARY, [target]),
  makeName: (typeName) => `arb${capitalize(typeName)}`,
  definitions: [
    int(fc("integer")),
    float(fc("double")),
    bool(fc("boolean")),
    string(fc("string")),
    char(fc("char")),
    unit(fc("constant", [UNDEFINED])),
    list((child) => fc("array", [child])),
    array((child) => fc("array", [child])),
    set((child) => invoke(fc("array", [child]), "map", [ref("Collections", "setOf")])),
    maybe((child) => fc("option", [child, record([["nil", UNDEFINED]])])),
    dict((key, value) => invoke(fc("array", [fc("tuple", [key, value])]), "map", [ref("Collections", "mapOf")])),
    result((error, value) =>
      fc("oneof", [invoke(value, "map", [taggedResult(true, "value")]), invoke(error, "map", [taggedResult(false, "error")])])
    ),
    tuple((first, second) => fc("tuple", [first, second])),
    triple((first, second, third) => fc("tuple", [first, second, third])),
    // An empty record's constructor is a function of no arguments
    succeed((constructor) => fc("constant", [constructor.kind === "lambda" ? apply(constructor, []) : constructor])),
    map((constructor, child) => invoke(child, "map", [constructor])),
    combiner((_type, constructor, children) => {
      const names = numbered("x", children.length);
      return invoke(fc("tuple", children), "map", [lambda([tuplePatternOf(names)], apply(constructor, names.map(local)))]);
    }),
    // The first constructor is the base case once the depth limit is hit
    customType((_constructors, branches) =>
      branches.length === 1
        ? branches[0].expression
        : fc("oneof", [record([["maxDepth", literal(4)]]), ...branches.map((branch) => branch.expression)])
    ),
    lambdaBreaker((expression) => invoke(fc("constant", [literal(null)]), "chain", [lambda([], expression)])),
  ],
});

export const arbitraryRecords = amend("arbitrary", [
  ifUserHasDependency(
    FAST_CHECK_RECORDS,
    combiner((type, _constructor, children) =>
      type.kind === "anonymousRecord"
        ? fc("record", [record(type.fields.map((field, index) => [field.name, children[index]]))])
        : undefined
    )
  ),
]);

// ---------------------------------------------------------------------------
// JSON encoders
// ---------------------------------------------------------------------------

const IDENTITY = lambda(["value"], local("value"));
const json = (name: string, args: Expression[]): Expression => apply(ref("Json", name), args);

function encodeEach(encoders: Expression[], names: string[]): Expression[] {
  return encoders.map((encoder, index) => apply(encoder, [local(names[index])]));
}

export const jsonEncoder = define({
  id: "jsonEncoder",
  searchPattern: functionPattern(target, opaquePattern(JSON_VALUE)),
  makeName: (typeName) => `encode${capitalize(typeName)}`,
  definitions: [
    int(IDENTITY),
    float(IDENTITY),
    bool(IDENTITY),
    string(IDENTITY),
    char(IDENTITY),
    unit(lambda([{ kind: "wildcard" }], literal(null))),
    list((child) => lambda(["value"], invoke(local("value"), "map", [child]))),
    array((child) => lambda(["value"], invoke(local("value"), "map", [child]))),
    set((child) => json("set", [child])),
    maybe((child) => json("optional", [child])),
    dict((key, value) => json("dict", [key, value])),
    result((error, value) => json("result", [error, value])),
    tuple((first, second) => {
      const names = ["first", "second"];
      return lambda([tuplePatternOf(names)], { kind: "list", elements: encodeEach([first, second], names) });
    }),
    triple((first, second, third) => {
      const names = ["first", "second", "third"];
      return lambda([tuplePatternOf(names)], { kind: "list", elements: encodeEach([first, second, third], names) });
    }),
    combiner((type, _constructor, children) => {
      if (type.kind !== "anonymousRecord") return undefined;
      return lambda(
        ["value"],
        record(type.fields.map((field, index) => [field.name, apply(children[index], [access(local("value"), field.name)])]))
      );
    }),
    // Constructor of a custom type: a handler from its arguments to `{ tag, args }`
    combiner((type, constructor, children) => {
      if (type.kind !== "customType" || constructor.kind !== "ref") return undefined;
      const names = numbered("arg", children.length);
      return lambda(
        names,
        record([
          ["tag", literal(constructor.ref.name)],
          ["args", { kind: "list", elements: encodeEach(children, names) }],
        ])
      );
    }),
    customType((constructors, branches) =>
      lambda(
        ["value"],
        caseOf(
          local("value"),
          constructors.map((constructor, index): CaseBranch => {
            const names = numbered("arg", constructor.args.length);
            return {
              pattern: { kind: "constructor", ref: constructor.ref, args: names.map(varPattern) },
              body: apply(branches[index].expression, names.map(local)),
            };
          })
        )
      )
    ),
    lambdaBreaker((expression) => lambda(["value"], apply(expression, [local("value")]))),
  ],
});

export const BUILT_IN_GENERATORS: GeneratorDefinition[] = [arbitrary, arbitraryRecords, jsonEncoder];
