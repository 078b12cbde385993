import type { Resource } from "@/sync/types";

/**
 * One rule for pairing a master resource with a local one.
 * Returns the first candidate the rule accepts, or undefined.
 */
export interface MatchStrategy {
  readonly name: string;
  attemptMatch(master: Resource, candidates: readonly Resource[]): Resource | undefined;
}

export function normalizePlate(plate: string | null | undefined): string {
  if (!plate) return "";
  return plate.toUpperCase().replace(/[\s\p{P}]/gu, "");
}

/** Own properties only; a field named "constructor" is not inherited from Object. */
function customField(resource: Resource, field: string): string | undefined {
  return Object.hasOwn(resource.customFields, field) ? resource.customFields[field] : undefined;
}

export function normalizeName(name: string | null | undefined): string {
  return (name ?? "").trim().toLowerCase();
}

/** Exact, case-sensitive equality on every designated custom field. */
export class CustomFieldStrategy implements MatchStrategy {
  readonly name: string;
  private readonly fields: readonly string[];

  constructor(fields: readonly string[]) {
    if (fields.length === 0) {
      throw new Error("CustomFieldStrategy needs at least one field");
    }
    this.fields = fields;
    this.name = `custom-field:${fields.join("+")}`;
  }

  attemptMatch(master: Resource, candidates: readonly Resource[]): Resource | undefined {
    const wanted = this.fields.map((f) => customField(master, f));
    if (wanted.some((v) => !v)) return undefined;

    return candidates.find((candidate) =>
      this.fields.every((f, i) => customField(candidate, f) === wanted[i])
    );
  }
}

export class LicensePlateStrategy implements MatchStrategy {
  readonly name = "license-plate";

  attemptMatch(master: Resource, candidates: readonly Resource[]): Resource | undefined {
    const plate = normalizePlate(master.licensePlate);
    if (!plate) return undefined;
    return candidates.find((c) => normalizePlate(c.licensePlate) === plate);
  }
}

/** Lowest confidence; only reached when the stronger rules fail. */
export class NameStrategy implements MatchStrategy {
  readonly name = "name";

  attemptMatch(master: Resource, candidates: readonly Resource[]): Resource | undefined {
    const name = normalizeName(master.name);
    if (!name) return undefined;
    return candidates.find((c) => normalizeName(c.name) === name);
  }
}

export function defaultStrategies(
  customFieldGroups: readonly string[][] = [["employeenumber"], ["fleetno"]],
): MatchStrategy[] {
  return [
    ...customFieldGroups.map((fields) => new CustomFieldStrategy(fields)),
    new LicensePlateStrategy(),
    new NameStrategy(),
  ];
}
