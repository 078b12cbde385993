import type { Resource, Unavailability } from "@/sync/types";
import { normalizePlate } from "@/sync/matching/strategies";
import type {
  FleetResourceResponse,
  FleetUnavailabilityPayload,
  FleetUnavailabilityResponse,
} from "./types";

const VEHICLE_KEYS = ["truck", "van", "tractor"] as const;

export function mapResource(raw: FleetResourceResponse): Resource {
  const customFields: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw.custom_fields ?? {})) {
    if (value === null || value === undefined) continue;
    customFields[key] = String(value);
  }

  let licensePlate: string | null = null;
  for (const key of VEHICLE_KEYS) {
    const plate = normalizePlate(raw[key]?.license_plate);
    if (plate) {
      licensePlate = plate;
      break;
    }
  }

  return {
    id: raw.id,
    customFields,
    licensePlate,
    name: raw.name ?? "",
  };
}

export function mapUnavailability(raw: FleetUnavailabilityResponse, resourceId: string): Unavailability {
  return {
    id: raw.id,
    resourceId,
    externalId: raw.external_id || null,
    startTime: raw.start_time,
    endTime: raw.end_time,
    reason: raw.reason ?? "",
    description: raw.description ?? "",
  };
}

export function toPayload(u: Unavailability): FleetUnavailabilityPayload {
  const payload: FleetUnavailabilityPayload = {
    start_time: u.startTime,
    end_time: u.endTime,
    reason: u.reason,
    description: u.description,
  };
  if (u.externalId) payload.external_id = u.externalId;
  return payload;
}
