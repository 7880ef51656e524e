/**
 * Test suite for the expression composer
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { GenerateResult, KnownProvider, ResolvedGenerator, ResolvedType } from "../tooling/lib/types";
import { generate } from "../tooling/lib/composer";
import { resolveGenerators } from "../tooling/lib/registry";
import { renderExpression } from "../tooling/lib/render";
import { amend, define, generic } from "../tooling/lib/builders";
import { ref } from "../tooling/lib/expression";
import { AuditLog } from "../tooling/lib/audit";
import {
  anonymousRecord,
  customType,
  functionType,
  tupleType,
  typeVariable,
} from "../tooling/lib/resolved-type";
import { qualifiedName } from "../tooling/lib/utils";
import {
  INT,
  STRING,
  decoder,
  decoderOf,
  decoderOptions,
  listType,
  maybeType,
  pointAlias,
  treeType,
} from "./fixtures/types.fixtures";

function render(result: GenerateResult): string {
  if (!result.ok) {
    throw new Error(result.error);
  }
  return renderExpression(result.expression);
}

function errorOf(result: GenerateResult): string {
  return result.ok ? "" : result.error;
}

describe("generate", () => {
  let generator: ResolvedGenerator;

  beforeEach(() => {
    [generator] = resolveGenerators(new Set(), [decoder]);
  });

  describe("primitives and containers", () => {
    it("should resolve a primitive to its fragment", () => {
      const result = generate(true, generator, {}, [], INT);
      expect(render(result)).toBe("Decode.int");
      expect(result.ok && result.declarations).toEqual([]);
    });

    it("should compose containers around their children", () => {
      expect(render(generate(true, generator, {}, [], listType(maybeType(STRING))))).toBe(
        "Decode.list(Decode.nullable(Decode.string))"
      );
    });

    it("should report a primitive no resolver handles", () => {
      const result = generate(true, generator, {}, [], tupleType([]));
      expect(errorOf(result)).toBe("Don't know how to implement decoder for Basics.Unit");
    });
  });

  describe("records and tuples", () => {
    it("should build a record constructor and combine the fields", () => {
      expect(render(generate(true, generator, {}, [], pointAlias()))).toBe(
        "Decode.map2((x_1, y_2) => ({ x: x_1, y: y_2 }), Decode.int, Decode.int)"
      );
    });

    it("should dispatch pairs through the canonical pair constructor", () => {
      expect(render(generate(true, generator, {}, [], tupleType([INT, STRING])))).toBe(
        "Decode.map2(Tuple.pair, Decode.int, Decode.string)"
      );
    });

    it("should build a triple constructor", () => {
      expect(render(generate(true, generator, {}, [], tupleType([INT, INT, INT])))).toBe(
        "Decode.map3((first_1, second_2, third_3) => [first_1, second_2, third_3], Decode.int, Decode.int, Decode.int)"
      );
    });

    it("should reject tuples of other arities", () => {
      const result = generate(true, generator, {}, [], tupleType([INT, INT, INT, INT]));
      expect(errorOf(result)).toBe(
        "Cannot generate decoder for ( Basics.Int, Basics.Int, Basics.Int, Basics.Int ): illegal tuple arity 4"
      );
    });

    it("should reject single-element tuples", () => {
      const result = generate(true, generator, {}, [], tupleType([INT]));
      expect(errorOf(result)).toBe("Cannot generate decoder for ( Basics.Int ): illegal tuple arity 1");
    });

    it("should report a record no combiner accepts", () => {
      const wide = anonymousRecord(["a", "b", "c", "d"].map((name) => ({ name, type: INT })));
      const result = generate(true, generator, {}, [], wide);
      expect(errorOf(result)).toBe(
        "Don't know how to implement decoder for (a_1, b_2, c_3, d_4) => ({ a: a_1, b: b_2, c: c_3, d: d_4 })"
      );
    });
  });

  describe("named types", () => {
    it("should keep a record alias inline at the top level", () => {
      const result = generate(true, generator, {}, [], pointAlias());
      expect(result.ok && result.declarations).toEqual([]);
    });

    it("should emit an auxiliary declaration below the top level", () => {
      const result = generate(true, generator, {}, [], listType(pointAlias()));

      expect(render(result)).toBe("Decode.list(pointDecoder)");
      if (!result.ok) return;
      expect(result.declarations).toHaveLength(1);
      expect(result.declarations[0].name).toBe("pointDecoder");
      expect(renderExpression(result.declarations[0].body)).toBe(
        "Decode.map2((x_1, y_2) => ({ x: x_1, y: y_2 }), Decode.int, Decode.int)"
      );
    });

    it("should produce one auxiliary declaration for a recursive custom type", () => {
      const tree = treeType();
      const result = generate(true, generator, {}, [], tree);

      expect(render(result)).toBe(
        "Decode.oneOf([Decode.succeed(Trees.Leaf), Decode.map3(Trees.Node, treeDecoder, Decode.int, treeDecoder)])"
      );
      if (!result.ok) return;
      expect(result.declarations.map((declaration) => declaration.name)).toEqual(["treeDecoder"]);
      expect(renderExpression(result.declarations[0].body)).toBe(
        "Decode.oneOf([Decode.succeed(Trees.Leaf), Decode.map3(Trees.Node, treeDecoder, Decode.int, treeDecoder)])"
      );
      const auxType = result.declarations[0].type;
      expect(auxType.kind === "opaque" ? auxType.args[0] : undefined).toBe(tree);
    });

    it("should produce one auxiliary declaration for a recursive record alias", () => {
      const node: Extract<ResolvedType, { kind: "typeAlias" }> = { kind: "typeAlias", ref: qualifiedName("Links", "Node"), generics: [], inner: INT };
      node.inner = anonymousRecord([{ name: "next", type: maybeType(node) }]);
      const result = generate(false, generator, {}, [], node);

      expect(render(result)).toBe("nodeDecoder");
      if (!result.ok) return;
      expect(result.declarations.map((declaration) => declaration.name)).toEqual(["nodeDecoder"]);
      expect(renderExpression(result.declarations[0].body)).toBe(
        "Decode.map((next_1) => ({ next: next_1 }), Decode.nullable(nodeDecoder))"
      );
    });

    it("should reject an alias that contains itself without a record", () => {
      const rose: Extract<ResolvedType, { kind: "typeAlias" }> = { kind: "typeAlias", ref: qualifiedName("Roses", "Rose"), generics: [], inner: INT };
      rose.inner = listType(rose);

      expect(errorOf(generate(true, generator, {}, [], rose))).toBe(
        "Cannot generate decoder for Roses.Rose: recursive type alias Roses.Rose is not supported"
      );
    });

    it("should reject an alias that contains itself through a tuple", () => {
      const chain: Extract<ResolvedType, { kind: "typeAlias" }> = { kind: "typeAlias", ref: qualifiedName("Chains", "Chain"), generics: [], inner: INT };
      chain.inner = tupleType([INT, chain]);
      const audit = new AuditLog();

      expect(errorOf(generate(false, generator, { audit }, [], chain))).toBe(
        "Cannot generate decoder for Chains.Chain: recursive type alias Chains.Chain is not supported"
      );
      expect(audit.getFailures("decoder")[0].typeText).toBe("Chains.Chain");
    });

    it("should name the custom type when no resolver handles custom types", () => {
      const [bare] = resolveGenerators(new Set(), [define({ ...decoderOptions("bare"), definitions: [] })]);
      const shape = customType(qualifiedName("Shapes", "Shape"), [
        { ref: qualifiedName("Shapes", "Circle"), args: [INT] },
      ]);

      expect(errorOf(generate(true, bare, {}, [], shape))).toBe("Don't know how to implement bare for Shapes.Shape");
    });

    it("should avoid reserved names for auxiliary declarations", () => {
      const result = generate(true, generator, { reservedNames: new Set(["pointDecoder"]) }, [], listType(pointAlias()));
      expect(render(result)).toBe("Decode.list(pointDecoder2)");
    });

    it("should let a universal resolver take over a named type", () => {
      const special = amend("decoder", [
        generic((type) => (type.kind === "typeAlias" ? ref("Custom", "special") : undefined)),
      ]);
      const [withUniversal] = resolveGenerators(new Set(), [decoder, special]);

      expect(render(generate(true, withUniversal, {}, [], pointAlias()))).toBe("Custom.special");
      expect(render(generate(true, withUniversal, {}, [], INT))).toBe("Decode.int");
    });
  });

  describe("unsupported types", () => {
    it("should reject type variables", () => {
      expect(errorOf(generate(true, generator, {}, [], typeVariable("a")))).toBe(
        'Cannot generate decoder for the type variable "a": generic types are not supported'
      );
    });

    it("should reject function types", () => {
      expect(errorOf(generate(true, generator, {}, [], functionType(INT, INT)))).toBe(
        "Cannot generate decoder for the function type Basics.Int -> Basics.Int: function types are not supported"
      );
    });

    it("should reject custom types with generic parameters", () => {
      const box = customType(qualifiedName("Box", "Box"), [], ["a"]);
      box.constructors.push({ ref: qualifiedName("Box", "Box"), args: [typeVariable("a")] });

      expect(errorOf(generate(true, generator, {}, [], box))).toBe(
        "Cannot generate decoder for Box.Box a: custom types with generic parameters are not supported"
      );
    });
  });

  describe("known providers", () => {
    const provider: KnownProvider = {
      generatorId: "decoder",
      location: qualifiedName("Geometry", "pointDecoder"),
      declaredType: decoderOf(pointAlias()),
    };

    it("should reference an existing implementation instead of composing", () => {
      const audit = new AuditLog();
      const result = generate(true, generator, { audit }, [provider], listType(pointAlias()));

      expect(render(result)).toBe("Decode.list(Geometry.pointDecoder)");
      expect(result.ok && result.declarations).toEqual([]);
      expect(audit.getEntries().filter((entry) => entry.type === "provider_used")).toHaveLength(1);
    });

    it("should ignore providers of other generators", () => {
      const other: KnownProvider = { ...provider, generatorId: "encoder" };
      expect(render(generate(true, generator, {}, [other], listType(pointAlias())))).toBe("Decode.list(pointDecoder)");
    });
  });

  it("should record failures in the audit log", () => {
    const audit = new AuditLog();
    generate(true, generator, { audit }, [], typeVariable("a"));

    expect(audit.getFailures("decoder")).toHaveLength(1);
    expect(audit.getFailures("decoder")[0].typeText).toBe("a");
  });
});
