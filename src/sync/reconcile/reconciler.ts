import type { ResourcePair, TimeWindow, Unavailability } from "@/sync/types";

export interface ReconcilePlan {
  creates: Unavailability[];
  updates: Unavailability[];
  deletes: Unavailability[];
  unchanged: number;
}

const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T/;
const HAS_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Epoch milliseconds of a timestamp, NaN when unparseable. ISO date-times
 * without an offset are read as UTC, never as host-local time.
 */
export function parseInstant(timestamp: string): number {
  const text = timestamp.trim();
  if (ISO_DATE_ONLY.test(text)) return Date.parse(`${text}T00:00:00Z`);
  if (ISO_DATE_TIME.test(text) && !HAS_OFFSET.test(text)) return Date.parse(`${text}Z`);
  return Date.parse(text);
}

/** Instants compare by value; unparseable timestamps fall back to the raw text. */
function instantKey(timestamp: string): string {
  const ms = parseInstant(timestamp);
  return Number.isNaN(ms) ? timestamp : String(ms);
}

export function equalityKey(u: Pick<Unavailability, "resourceId" | "startTime" | "endTime" | "reason">): string {
  return JSON.stringify([u.resourceId, instantKey(u.startTime), instantKey(u.endTime), u.reason]);
}

/** Inclusion is decided by the start alone, in UTC. */
export function startsInYear(u: Unavailability, year: number): boolean {
  const ms = parseInstant(u.startTime);
  return !Number.isNaN(ms) && new Date(ms).getUTCFullYear() === year;
}

export function yearWindow(year: number): TimeWindow {
  return {
    start: new Date(Date.UTC(year, 0, 1)),
    end: new Date(Date.UTC(year + 1, 0, 1)),
  };
}

function needsUpdate(existing: Unavailability, desired: Unavailability): boolean {
  return existing.description !== desired.description || existing.externalId !== desired.externalId;
}

/**
 * Work out the writes that make the local resource's unavailabilities for
 * `year` equal to the master's. Records are paired by equality key, never by
 * id. Local records starting outside the year are not looked at.
 */
export function reconcile(
  pair: ResourcePair,
  masterUnavailabilities: readonly Unavailability[],
  localUnavailabilities: readonly Unavailability[],
  year: number,
): ReconcilePlan {
  const plan: ReconcilePlan = { creates: [], updates: [], deletes: [], unchanged: 0 };

  const existingByKey = new Map<string, Unavailability[]>();
  const inScopeLocal = localUnavailabilities.filter((u) => startsInYear(u, year));
  for (const existing of inScopeLocal) {
    const key = equalityKey(existing);
    const bucket = existingByKey.get(key);
    if (bucket) bucket.push(existing);
    else existingByKey.set(key, [existing]);
  }

  const consumed = new Set<Unavailability>();

  for (const source of masterUnavailabilities) {
    if (!startsInYear(source, year)) continue;

    const desired: Unavailability = {
      ...source,
      id: null,
      resourceId: pair.local.id,
      externalId: source.id ?? source.externalId,
    };

    const existing = existingByKey.get(equalityKey(desired))?.shift();
    if (!existing) {
      plan.creates.push(desired);
      continue;
    }

    consumed.add(existing);
    if (needsUpdate(existing, desired)) {
      plan.updates.push({ ...desired, id: existing.id });
    } else {
      plan.unchanged += 1;
    }
  }

  plan.deletes = inScopeLocal.filter((u) => !consumed.has(u));
  return plan;
}
