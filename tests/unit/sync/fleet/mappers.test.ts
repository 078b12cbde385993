import { describe, it, expect } from "vitest";

import { mapResource, mapUnavailability, toPayload } from "@/sync/fleet/mappers";
import { unavailability } from "../../../fixtures/resources";

describe("fleet/mappers", () => {
  describe("mapResource", () => {
    it("should take the first vehicle plate and normalize it", () => {
      const mapped = mapResource({
        id: "r-1",
        name: "Unit 7",
        van: { license_plate: "" },
        tractor: { license_plate: "ab-12 cd" },
      });

      expect(mapped).toEqual({ id: "r-1", name: "Unit 7", customFields: {}, licensePlate: "AB12CD" });
    });

    it("should prefer truck over van and tractor", () => {
      const mapped = mapResource({
        id: "r-1",
        truck: { license_plate: "T-1" },
        van: { license_plate: "V-1" },
      });

      expect(mapped.licensePlate).toBe("T1");
    });

    it("should stringify custom fields and drop nulls", () => {
      const mapped = mapResource({
        id: "r-1",
        custom_fields: { fleetno: 42, employeenumber: null, depot: "North" },
      });

      expect(mapped.customFields).toEqual({ fleetno: "42", depot: "North" });
      expect(mapped.name).toBe("");
      expect(mapped.licensePlate).toBeNull();
    });
  });

  describe("mapUnavailability", () => {
    it("should map API fields onto the given resource", () => {
      expect(
        mapUnavailability(
          { id: "u-1", external_id: "m-1", start_time: "2025-01-01T00:00:00Z", end_time: "2025-01-02T00:00:00Z", reason: null },
          "L1",
        )
      ).toEqual({
        id: "u-1",
        resourceId: "L1",
        externalId: "m-1",
        startTime: "2025-01-01T00:00:00Z",
        endTime: "2025-01-02T00:00:00Z",
        reason: "",
        description: "",
      });
    });
  });

  describe("toPayload", () => {
    it("should omit external_id when there is none", () => {
      expect(toPayload(unavailability({ description: "note" }))).toEqual({
        start_time: "2025-01-01T00:00:00Z",
        end_time: "2025-01-05T00:00:00Z",
        reason: "maintenance",
        description: "note",
      });
    });

    it("should include external_id when present", () => {
      expect(toPayload(unavailability({ externalId: "m-9" })).external_id).toBe("m-9");
    });
  });
});
