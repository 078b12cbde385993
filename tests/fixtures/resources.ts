import type { Resource, ResourcePair, Unavailability } from "@/sync/types";

export function resource(id: string, overrides: Partial<Omit<Resource, "id">> = {}): Resource {
  return {
    id,
    customFields: {},
    licensePlate: null,
    name: "",
    ...overrides,
  };
}

export function pair(masterId: string, localId: string): ResourcePair {
  return { master: resource(masterId), local: resource(localId), strategy: "test" };
}

export function unavailability(overrides: Partial<Unavailability> = {}): Unavailability {
  return {
    id: null,
    resourceId: "L1",
    externalId: null,
    startTime: "2025-01-01T00:00:00Z",
    endTime: "2025-01-05T00:00:00Z",
    reason: "maintenance",
    description: "",
    ...overrides,
  };
}
