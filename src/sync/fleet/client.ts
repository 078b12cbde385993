import type { Resource, TimeWindow, Unavailability } from "@/sync/types";
import { FleetApiError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { TokenProvider } from "./auth";
import type { FleetPage, FleetResourceResponse, FleetUnavailabilityResponse } from "./types";
import { mapResource, mapUnavailability, toPayload } from "./mappers";

const log = createChildLogger("fleet-client");

type Method = "GET" | "POST" | "PUT" | "DELETE";

interface RequestOptions {
  params?: Record<string, string | undefined>;
  body?: unknown;
}

export class FleetClient {
  private baseUrl: string;
  private auth: TokenProvider;

  constructor(auth: TokenProvider, baseUrl: string) {
    this.auth = auth;
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  private buildUrl(path: string, params?: Record<string, string | undefined>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    if (params) {
      Object.entries(params).forEach(([k, v]) => {
        if (v !== undefined && v !== "") url.searchParams.set(k, v);
      });
    }
    return url.toString();
  }

  private async send(method: Method, path: string, options?: RequestOptions): Promise<Response> {
    const url = this.buildUrl(path, options?.params);
    const init = (token: string): RequestInit => ({
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: "application/json",
        ...(options?.body !== undefined ? { "Content-Type": "application/json" } : {}),
      },
      body: options?.body !== undefined ? JSON.stringify(options.body) : undefined,
    });

    log.debug("Fleet API request", { method, path, params: options?.params });
    let response = await fetch(url, init(await this.auth.getToken()));

    if (response.status === 401) {
      // Token expired — re-authenticate and retry once
      this.auth.invalidate();
      response = await fetch(url, init(await this.auth.getToken()));
    }

    if (!response.ok) {
      throw new FleetApiError(response.status, method, path, response.statusText);
    }
    return response;
  }

  private async request<T>(method: Method, path: string, options?: RequestOptions): Promise<T> {
    const response = await this.send(method, path, options);
    return response.json() as Promise<T>;
  }

  /** Follow next_cursor until the API stops returning one. */
  private async fetchAllPages<T>(path: string, params?: Record<string, string | undefined>): Promise<T[]> {
    const all: T[] = [];
    let cursor: string | undefined;

    do {
      const page = await this.request<FleetPage<T>>("GET", path, { params: { ...params, cursor } });
      all.push(...(page.items ?? []));
      cursor = page.next_cursor || undefined;
    } while (cursor);

    return all;
  }

  // --- Resources ---

  async getResources(): Promise<Resource[]> {
    const raw = await this.fetchAllPages<FleetResourceResponse>("/resources/resource");
    log.info(`Retrieved ${raw.length} resources from API`);
    return raw.map(mapResource);
  }

  // --- Unavailabilities ---

  async getUnavailabilities(resourceId: string, window?: TimeWindow): Promise<Unavailability[]> {
    const raw = await this.fetchAllPages<FleetUnavailabilityResponse>(
      `/resources/resource/${encodeURIComponent(resourceId)}/unavailability`,
      {
        start_time: window?.start.toISOString(),
        end_time: window?.end.toISOString(),
      },
    );
    log.debug(`Retrieved ${raw.length} unavailabilities`, { resourceId });
    return raw.map((u) => mapUnavailability(u, resourceId));
  }

  async createUnavailability(unavailability: Unavailability): Promise<Unavailability> {
    const raw = await this.request<FleetUnavailabilityResponse>(
      "POST",
      `/resources/resource/${encodeURIComponent(unavailability.resourceId)}/unavailability`,
      { body: toPayload(unavailability) },
    );
    log.debug("Created unavailability", { resourceId: unavailability.resourceId, id: raw.id });
    return { ...unavailability, id: raw.id };
  }

  async updateUnavailability(unavailability: Unavailability): Promise<Unavailability> {
    if (!unavailability.id) {
      throw new Error("Cannot update unavailability without an ID");
    }
    await this.send(
      "PUT",
      `/resources/resource/${encodeURIComponent(unavailability.resourceId)}/unavailability/${encodeURIComponent(unavailability.id)}`,
      { body: toPayload(unavailability) },
    );
    log.debug("Updated unavailability", { resourceId: unavailability.resourceId, id: unavailability.id });
    return unavailability;
  }

  async deleteUnavailability(resourceId: string, unavailabilityId: string): Promise<void> {
    await this.send(
      "DELETE",
      `/resources/resource/${encodeURIComponent(resourceId)}/unavailability/${encodeURIComponent(unavailabilityId)}`,
    );
    log.debug("Deleted unavailability", { resourceId, id: unavailabilityId });
  }
}
