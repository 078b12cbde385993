// Raw response shapes of the fleet planning REST API

export interface FleetPage<T> {
  items: T[];
  next_cursor?: string | null;
}

export interface FleetVehicle {
  license_plate?: string | null;
}

export interface FleetResourceResponse {
  id: string;
  name?: string | null;
  custom_fields?: Record<string, string | number | boolean | null> | null;
  truck?: FleetVehicle | null;
  van?: FleetVehicle | null;
  tractor?: FleetVehicle | null;
}

export interface FleetUnavailabilityResponse {
  id: string;
  external_id?: string | null;
  start_time: string;
  end_time: string;
  reason?: string | null;
  description?: string | null;
}

export interface FleetUnavailabilityPayload {
  external_id?: string;
  start_time: string;
  end_time: string;
  reason: string;
  description: string;
}
