/**
 * Shared resolved types and a small decoder generator for engine tests
 */

import { CustomTypeConstructor, ResolvedType } from "../../tooling/lib/types";
import {
  BASICS,
  anonymousRecord,
  customType,
  functionType,
  opaque,
  typeAlias,
} from "../../tooling/lib/resolved-type";
import { ARBITRARY, JSON_VALUE } from "../../tooling/lib/catalog";
import {
  GeneratorOptions,
  bool,
  customType as customTypeResolver,
  define,
  float,
  int,
  lambdaBreaker,
  list,
  map,
  mapN,
  maybe,
  string,
  succeed,
} from "../../tooling/lib/builders";
import { apply, lambda, list as listOf, ref } from "../../tooling/lib/expression";
import { opaquePattern, target } from "../../tooling/lib/pattern";
import { qualifiedName, uncapitalize } from "../../tooling/lib/utils";

export const INT = opaque(BASICS.int);
export const FLOAT = opaque(BASICS.float);
export const STRING = opaque(BASICS.string);
export const BOOL = opaque(BASICS.bool);

export const listType = (element: ResolvedType): ResolvedType => opaque(BASICS.list, [element]);
export const maybeType = (value: ResolvedType): ResolvedType => opaque(BASICS.maybe, [value]);
export const arbitraryOf = (type: ResolvedType): ResolvedType => opaque(ARBITRARY, [type]);
export const encoderOf = (type: ResolvedType): ResolvedType => functionType(type, opaque(JSON_VALUE));

export const DECODER = qualifiedName("Decode", "Decoder");
export const decoderOf = (type: ResolvedType): ResolvedType => opaque(DECODER, [type]);

/** `type alias Point = { x : Int, y : Int }` in module Geometry */
export function pointAlias(): ResolvedType {
  return typeAlias(
    qualifiedName("Geometry", "Point"),
    anonymousRecord([
      { name: "x", type: INT },
      { name: "y", type: INT },
    ])
  );
}

/** `type Tree = Leaf | Node Tree Int Tree` in module Trees; the graph is cyclic */
export function treeType(): ResolvedType {
  const tree = customType(qualifiedName("Trees", "Tree"), []);
  const constructors: CustomTypeConstructor[] = [
    { ref: qualifiedName("Trees", "Leaf"), args: [] },
    { ref: qualifiedName("Trees", "Node"), args: [tree, INT, tree] },
  ];
  tree.constructors.push(...constructors);
  return tree;
}

/**
 * Decoder generator in the style of a JSON decoding library, with a
 * lambda breaker unless `withBreaker` is false
 */
export function decoderOptions(id: string = "decoder", withBreaker: boolean = true): GeneratorOptions {
  const decode = (name: string) => ref("Decode", name);
  return {
    id,
    searchPattern: opaquePattern(DECODER, [target]),
    makeName: (typeName) => `${uncapitalize(typeName)}Decoder`,
    definitions: [
      int(decode("int")),
      float(decode("float")),
      string(decode("string")),
      bool(decode("bool")),
      list((child) => apply(decode("list"), [child])),
      maybe((child) => apply(decode("nullable"), [child])),
      succeed((constructor) => apply(decode("succeed"), [constructor])),
      mapN(3, (arity) => qualifiedName("Decode", `map${arity}`)),
      map((constructor, child) => apply(decode("map"), [constructor, child])),
      customTypeResolver((_constructors, branches) =>
        apply(decode("oneOf"), [listOf(branches.map((branch) => branch.expression))])
      ),
      ...(withBreaker ? [lambdaBreaker((expression) => apply(decode("lazy"), [lambda([{ kind: "wildcard" }], expression)]))] : []),
    ],
  };
}

export const decoder = define(decoderOptions());
