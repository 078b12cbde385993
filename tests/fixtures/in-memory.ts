import type {
  Resource,
  ResourceSource,
  TimeWindow,
  Unavailability,
  UnavailabilitySource,
  UnavailabilityStore,
} from "@/sync/types";

export class InMemoryResourceSource implements ResourceSource {
  constructor(private resources: Resource[], private failWith?: Error) {}

  async listResources(): Promise<Resource[]> {
    if (this.failWith) throw this.failWith;
    return [...this.resources];
  }
}

/** Stands in for one environment's unavailability endpoints. */
export class InMemoryUnavailabilityStore implements UnavailabilityStore, UnavailabilitySource {
  readonly records = new Map<string, Unavailability[]>();
  readonly calls: string[] = [];
  readonly failFetchFor = new Set<string>();
  readonly failWritesFor = new Set<string>();
  private nextId = 1;

  seed(resourceId: string, records: Unavailability[]): this {
    this.records.set(resourceId, records.map((r) => ({ ...r })));
    return this;
  }

  async getAllForResource(resourceId: string, _window?: TimeWindow): Promise<Unavailability[]> {
    this.calls.push(`get:${resourceId}`);
    if (this.failFetchFor.has(resourceId)) throw new Error(`fetch failed for ${resourceId}`);
    return (this.records.get(resourceId) ?? []).map((r) => ({ ...r }));
  }

  async create(unavailability: Unavailability): Promise<Unavailability> {
    this.calls.push(`create:${unavailability.resourceId}`);
    this.assertWritable(unavailability.resourceId);
    const created = { ...unavailability, id: `gen-${this.nextId++}` };
    this.records.set(unavailability.resourceId, [...(this.records.get(unavailability.resourceId) ?? []), created]);
    return created;
  }

  async update(unavailability: Unavailability): Promise<Unavailability> {
    this.calls.push(`update:${unavailability.resourceId}`);
    this.assertWritable(unavailability.resourceId);
    const list = this.records.get(unavailability.resourceId) ?? [];
    this.records.set(
      unavailability.resourceId,
      list.map((r) => (r.id === unavailability.id ? { ...unavailability } : r)),
    );
    return unavailability;
  }

  async delete(resourceId: string, unavailabilityId: string): Promise<void> {
    this.calls.push(`delete:${resourceId}`);
    this.assertWritable(resourceId);
    const list = this.records.get(resourceId) ?? [];
    this.records.set(resourceId, list.filter((r) => r.id !== unavailabilityId));
  }

  private assertWritable(resourceId: string): void {
    if (this.failWritesFor.has(resourceId)) {
      throw new Error(`write rejected for ${resourceId}`);
    }
  }
}
