import type {
  Resource,
  ResourceSource,
  TimeWindow,
  Unavailability,
  UnavailabilityStore,
} from "@/sync/types";
import type { FleetClient } from "./client";

export class FleetResourceSource implements ResourceSource {
  constructor(private client: FleetClient) {}

  listResources(): Promise<Resource[]> {
    return this.client.getResources();
  }
}

/**
 * Unavailability CRUD for one environment. The master side is only ever
 * handed out as an UnavailabilitySource, so nothing writes to it.
 */
export class UnavailabilityRepository implements UnavailabilityStore {
  constructor(private client: FleetClient) {}

  getAllForResource(resourceId: string, window?: TimeWindow): Promise<Unavailability[]> {
    return this.client.getUnavailabilities(resourceId, window);
  }

  create(unavailability: Unavailability): Promise<Unavailability> {
    return this.client.createUnavailability(unavailability);
  }

  async update(unavailability: Unavailability): Promise<Unavailability> {
    if (!unavailability.id) {
      throw new Error("Cannot update unavailability without ID");
    }
    return this.client.updateUnavailability(unavailability);
  }

  delete(resourceId: string, unavailabilityId: string): Promise<void> {
    return this.client.deleteUnavailability(resourceId, unavailabilityId);
  }
}
