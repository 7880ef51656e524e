/**
 * Test suite for type patterns and resolved types
 */

import { describe, it, expect } from "@jest/globals";
import { functionPattern, matchPattern, opaquePattern, rebuildPattern, target, tuplePattern } from "../tooling/lib/pattern";
import {
  BASICS,
  anonymousRecord,
  describeType,
  functionType,
  opaque,
  tupleType,
  typeVariable,
  typesEqual,
} from "../tooling/lib/resolved-type";
import { ARBITRARY, JSON_VALUE } from "../tooling/lib/catalog";
import { INT, STRING, arbitraryOf, encoderOf, listType, pointAlias, treeType } from "./fixtures/types.fixtures";

describe("matchPattern", () => {
  const arbitraryPattern = opaquePattern(ARBITRARY, [target]);
  const encoderPattern = functionPattern(target, opaquePattern(JSON_VALUE));

  it("should bind the hole of an opaque pattern", () => {
    expect(matchPattern(arbitraryPattern, arbitraryOf(INT))).toBe(INT);
  });

  it("should bind the hole of a function pattern", () => {
    const point = pointAlias();
    expect(matchPattern(encoderPattern, encoderOf(point))).toBe(point);
  });

  it("should not match a different outer type", () => {
    expect(matchPattern(arbitraryPattern, listType(INT))).toBeUndefined();
    expect(matchPattern(encoderPattern, arbitraryOf(INT))).toBeUndefined();
    expect(matchPattern(encoderPattern, functionType(INT, STRING))).toBeUndefined();
  });

  it("should require every hole to bind equal types", () => {
    const pairPattern = tuplePattern([target, target]);
    expect(matchPattern(pairPattern, tupleType([INT, INT]))).toBe(INT);
    expect(matchPattern(pairPattern, tupleType([INT, STRING]))).toBeUndefined();
  });

  it("should not match a pattern without a hole", () => {
    expect(matchPattern(opaquePattern(BASICS.int), INT)).toBeUndefined();
  });

  it("should rebuild the outer shape around a child", () => {
    expect(rebuildPattern(arbitraryPattern, STRING)).toEqual(arbitraryOf(STRING));
    expect(rebuildPattern(encoderPattern, INT)).toEqual(encoderOf(INT));
  });
});

describe("describeType", () => {
  it("should print opaque types with their arguments", () => {
    expect(describeType(INT)).toBe("Basics.Int");
    expect(describeType(listType(listType(INT)))).toBe("List.List (List.List Basics.Int)");
  });

  it("should parenthesize every applied argument", () => {
    expect(describeType(opaque(BASICS.dict, [STRING, listType(INT)]))).toBe(
      "Dict.Dict String.String (List.List Basics.Int)"
    );
    expect(describeType(opaque(BASICS.result, [listType(INT), listType(STRING)]))).toBe(
      "Result.Result (List.List Basics.Int) (List.List String.String)"
    );
  });

  it("should print records, tuples and functions", () => {
    expect(describeType(anonymousRecord([{ name: "x", type: INT }]))).toBe("{ x : Basics.Int }");
    expect(describeType(tupleType([INT, STRING]))).toBe("( Basics.Int, String.String )");
    expect(describeType(functionType(functionType(INT, INT), STRING))).toBe(
      "(Basics.Int -> Basics.Int) -> String.String"
    );
  });

  it("should print named types by name", () => {
    expect(describeType(pointAlias())).toBe("Geometry.Point");
    expect(describeType(treeType())).toBe("Trees.Tree");
  });
});

describe("typesEqual", () => {
  it("should compare named types by qualified name", () => {
    expect(typesEqual(treeType(), treeType())).toBe(true);
    expect(typesEqual(pointAlias(), treeType())).toBe(false);
  });

  it("should equate a bare reference with the named definition", () => {
    expect(typesEqual(opaque({ modulePath: ["Geometry"], name: "Point" }), pointAlias())).toBe(true);
  });

  it("should compare structural types field by field", () => {
    const a = anonymousRecord([{ name: "x", type: INT }]);
    expect(typesEqual(a, anonymousRecord([{ name: "x", type: INT }]))).toBe(true);
    expect(typesEqual(a, anonymousRecord([{ name: "y", type: INT }]))).toBe(false);
    expect(typesEqual(typeVariable("a"), typeVariable("a"))).toBe(true);
    expect(typesEqual(listType(INT), listType(STRING))).toBe(false);
  });
});
