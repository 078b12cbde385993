import { describe, it, expect } from "vitest";

import {
  CustomFieldStrategy,
  LicensePlateStrategy,
  NameStrategy,
  defaultStrategies,
  normalizeName,
  normalizePlate,
} from "@/sync/matching/strategies";
import { resource } from "../../../fixtures/resources";

describe("matching/strategies", () => {
  describe("normalizePlate", () => {
    it("should uppercase and strip whitespace and punctuation", () => {
      expect(normalizePlate("abc 123")).toBe("ABC123");
      expect(normalizePlate("ABC-123")).toBe("ABC123");
      expect(normalizePlate(" 1.xyz_99 ")).toBe("1XYZ99");
    });

    it("should return empty string for missing plates", () => {
      expect(normalizePlate(null)).toBe("");
      expect(normalizePlate(undefined)).toBe("");
      expect(normalizePlate(" - ")).toBe("");
    });
  });

  describe("normalizeName", () => {
    it("should trim and lowercase", () => {
      expect(normalizeName("  Truck One ")).toBe("truck one");
    });
  });

  describe("CustomFieldStrategy", () => {
    it("should match on exact, case-sensitive field equality", () => {
      const strategy = new CustomFieldStrategy(["fleetno"]);
      const master = resource("M1", { customFields: { fleetno: "F-7" } });
      const lower = resource("L1", { customFields: { fleetno: "f-7" } });
      const exact = resource("L2", { customFields: { fleetno: "F-7" } });

      expect(strategy.attemptMatch(master, [lower, exact])?.id).toBe("L2");
    });

    it("should require every designated field on both sides", () => {
      const strategy = new CustomFieldStrategy(["fleetno", "depot"]);
      const master = resource("M1", { customFields: { fleetno: "F-7", depot: "North" } });
      const partial = resource("L1", { customFields: { fleetno: "F-7" } });
      const full = resource("L2", { customFields: { fleetno: "F-7", depot: "North" } });

      expect(strategy.attemptMatch(master, [partial])).toBeUndefined();
      expect(strategy.attemptMatch(master, [partial, full])?.id).toBe("L2");
    });

    it("should not match when the master lacks the field", () => {
      const strategy = new CustomFieldStrategy(["employeenumber"]);
      const master = resource("M1", { customFields: { employeenumber: "" } });
      const local = resource("L1", { customFields: { employeenumber: "" } });

      expect(strategy.attemptMatch(master, [local])).toBeUndefined();
    });

    it("should not treat inherited properties as custom fields", () => {
      const strategy = new CustomFieldStrategy(["constructor"]);

      expect(strategy.attemptMatch(resource("M1"), [resource("L1")])).toBeUndefined();
    });

    it("should match own fields whose names shadow Object members", () => {
      const strategy = new CustomFieldStrategy(["toString"]);
      const master = resource("M1", { customFields: { toString: "X1" } });
      const other = resource("L1", { customFields: {} });
      const same = resource("L2", { customFields: { toString: "X1" } });

      expect(strategy.attemptMatch(master, [other, same])?.id).toBe("L2");
    });

    it("should be named after its fields", () => {
      expect(new CustomFieldStrategy(["a", "b"]).name).toBe("custom-field:a+b");
    });

    it("should reject an empty field list", () => {
      expect(() => new CustomFieldStrategy([])).toThrow("at least one field");
    });
  });

  describe("LicensePlateStrategy", () => {
    it("should compare normalized plates", () => {
      const master = resource("M1", { licensePlate: "ABC-123" });
      const local = resource("L1", { licensePlate: "abc 123" });

      expect(new LicensePlateStrategy().attemptMatch(master, [local])?.id).toBe("L1");
    });

    it("should not match two resources without plates", () => {
      expect(new LicensePlateStrategy().attemptMatch(resource("M1"), [resource("L1")])).toBeUndefined();
    });
  });

  describe("NameStrategy", () => {
    it("should match names case-insensitively after trimming", () => {
      const master = resource("M1", { name: "Driver Jansen " });
      const local = resource("L1", { name: "driver jansen" });

      expect(new NameStrategy().attemptMatch(master, [local])?.id).toBe("L1");
    });

    it("should not match blank names", () => {
      const master = resource("M1", { name: "  " });
      const local = resource("L1", { name: "" });

      expect(new NameStrategy().attemptMatch(master, [local])).toBeUndefined();
    });
  });

  describe("defaultStrategies", () => {
    it("should order custom fields, then plate, then name", () => {
      expect(defaultStrategies().map((s) => s.name)).toEqual([
        "custom-field:employeenumber",
        "custom-field:fleetno",
        "license-plate",
        "name",
      ]);
    });

    it("should build one custom-field strategy per group", () => {
      expect(defaultStrategies([["a", "b"], ["c"]]).map((s) => s.name)).toEqual([
        "custom-field:a+b",
        "custom-field:c",
        "license-plate",
        "name",
      ]);
    });
  });
});
