/**
 * Test suite for utility functions
 */

import { describe, it, expect } from "@jest/globals";
import {
  capitalize,
  formatQualifiedName,
  isPlainObject,
  parseQualifiedName,
  qualifiedName,
  sameQualifiedName,
  sanitizeIdentifier,
  uncapitalize,
  uniqueName,
} from "../tooling/lib/utils";

describe("Utility Functions", () => {
  describe("sanitizeIdentifier", () => {
    it("should replace non-alphanumeric characters with underscore", () => {
      expect(sanitizeIdentifier("my-identifier")).toBe("my_identifier");
    });

    it("should handle leading digits", () => {
      expect(sanitizeIdentifier("123test")).toBe("_123test");
    });

    it("should limit length to 100 characters", () => {
      expect(sanitizeIdentifier("a".repeat(150))).toHaveLength(100);
    });
  });

  describe("capitalize", () => {
    it("should change only the first letter", () => {
      expect(capitalize("shape")).toBe("Shape");
      expect(uncapitalize("TreeNode")).toBe("treeNode");
      expect(capitalize("")).toBe("");
    });
  });

  describe("qualified names", () => {
    it("should split a dotted module path", () => {
      expect(qualifiedName("Json.Decode", "int")).toEqual({ modulePath: ["Json", "Decode"], name: "int" });
      expect(qualifiedName([], "arbTree")).toEqual({ modulePath: [], name: "arbTree" });
    });

    it("should parse the last segment as the name", () => {
      expect(parseQualifiedName("Shapes.Geometry.Point")).toEqual({ modulePath: ["Shapes", "Geometry"], name: "Point" });
      expect(parseQualifiedName("Point")).toEqual({ modulePath: [], name: "Point" });
    });

    it("should format with dots, or bare without a module", () => {
      expect(formatQualifiedName(qualifiedName("Basics", "Int"))).toBe("Basics.Int");
      expect(formatQualifiedName(qualifiedName([], "arbTree"))).toBe("arbTree");
    });

    it("should compare module path and name", () => {
      expect(sameQualifiedName(qualifiedName("A.B", "c"), parseQualifiedName("A.B.c"))).toBe(true);
      expect(sameQualifiedName(qualifiedName("A", "c"), qualifiedName("B", "c"))).toBe(false);
      expect(sameQualifiedName(qualifiedName("A", "c"), qualifiedName("A.B", "c"))).toBe(false);
    });
  });

  describe("uniqueName", () => {
    it("should keep a free name", () => {
      expect(uniqueName("arbTree", () => false)).toBe("arbTree");
    });

    it("should count up from 2 until a name is free", () => {
      const taken = new Set(["arbTree", "arbTree2"]);
      expect(uniqueName("arbTree", (candidate) => taken.has(candidate))).toBe("arbTree3");
    });
  });

  describe("isPlainObject", () => {
    it("should return true for plain objects", () => {
      expect(isPlainObject({})).toBe(true);
      expect(isPlainObject({ key: "value" })).toBe(true);
    });

    it("should return false for null", () => {
      expect(isPlainObject(null)).toBe(false);
    });

    it("should return false for arrays", () => {
      expect(isPlainObject([])).toBe(false);
    });

    it("should return false for primitives", () => {
      expect(isPlainObject("string")).toBe(false);
      expect(isPlainObject(42)).toBe(false);
    });
  });
});
