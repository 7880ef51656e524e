import { describe, it, expect, beforeEach } from "@jest/globals";
import { AuditLog } from "../tooling/lib/audit";
import { ProviderRanking } from "../tooling/lib/provider-selector";
import { INT, arbitraryOf } from "./fixtures/types.fixtures";
import { qualifiedName } from "../tooling/lib/utils";

describe("AuditLog", () => {
  let auditLog: AuditLog;

  beforeEach(() => {
    auditLog = new AuditLog();
  });

  describe("recordResolver", () => {
    it("should count repeated resolver applications per type", () => {
      auditLog.recordResolver("arbitrary", "Basics.Int", "primitive");
      auditLog.recordResolver("arbitrary", "Basics.Int", "primitive");
      auditLog.recordResolver("arbitrary", "Shapes.Shape", "customType");

      const audits = auditLog.getResolverAudits();
      expect(audits.map(({ resolverKind, typeText, count }) => ({ resolverKind, typeText, count }))).toEqual([
        { resolverKind: "primitive", typeText: "Basics.Int", count: 2 },
        { resolverKind: "customType", typeText: "Shapes.Shape", count: 1 },
      ]);
    });
  });

  describe("recordDeclaration", () => {
    it("should list auxiliary declarations per generator", () => {
      auditLog.recordDeclaration("arbitrary", "Trees.Tree", "arbTree");
      auditLog.recordDeclaration("jsonEncoder", "Trees.Tree", "encodeTree");

      expect(auditLog.getDeclarations("arbitrary")).toEqual(["arbTree"]);
      expect(auditLog.getDeclarations("decoder")).toEqual([]);
    });
  });

  describe("recordFailure", () => {
    it("should keep failures per generator", () => {
      auditLog.recordFailure("decoder", "Basics.Unit", "Don't know how to implement decoder for Basics.Unit");

      const failures = auditLog.getFailures("decoder");
      expect(failures).toHaveLength(1);
      expect(failures[0].typeText).toBe("Basics.Unit");
      expect(failures[0].error).toBe("Don't know how to implement decoder for Basics.Unit");
      expect(auditLog.getFailures("arbitrary")).toEqual([]);
    });
  });

  describe("recordProviderRanking", () => {
    it("should record the selected provider and its alternatives", () => {
      const ranking: ProviderRanking = {
        provider: { generatorId: "arbitrary", location: qualifiedName("Points", "arbInt"), declaredType: arbitraryOf(INT) },
        scope: "imported-project",
        location: "Points.arbInt",
        childText: "Basics.Int",
        alternatives: ["Fixtures.arbInt"],
      };

      auditLog.recordProviderRanking([ranking]);

      const [entry] = auditLog.getEntriesForType("Basics.Int");
      expect(entry.type).toBe("providers_ranked");
      expect(entry.generatorId).toBe("arbitrary");
      expect(entry.details).toEqual({ selected: "Points.arbInt", scope: "imported-project", alternatives: ["Fixtures.arbInt"] });
    });
  });

  describe("summary and export", () => {
    beforeEach(() => {
      auditLog.recordProviderUse("arbitrary", "Geometry.Point", "arbPoint");
      auditLog.recordResolver("arbitrary", "Basics.Int", "primitive");
      auditLog.recordDeclaration("arbitrary", "Trees.Tree", "arbTree");
      auditLog.recordFailure("arbitrary", "Basics.Int -> Basics.Int", "function types are not supported");
    });

    it("should count entries by type", () => {
      expect(auditLog.getSummary()).toEqual({
        totalEntries: 4,
        providersUsed: 1,
        resolversApplied: 1,
        declarationsEmitted: 1,
        failures: 1,
      });
    });

    it("should export a JSON snapshot", () => {
      const json = auditLog.toJSON();

      expect(json.entries).toHaveLength(4);
      expect(json.declarations).toEqual({ arbitrary: ["arbTree"] });
      expect(Object.keys(json.failures)).toEqual(["arbitrary"]);
      expect(json.resolverAudits).toHaveLength(1);
    });

    it("should clear everything", () => {
      auditLog.clear();

      expect(auditLog.getSummary().totalEntries).toBe(0);
      expect(auditLog.getResolverAudits()).toEqual([]);
      expect(auditLog.getDeclarations("arbitrary")).toEqual([]);
    });
  });
});
