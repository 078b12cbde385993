export interface Resource {
  id: string;
  customFields: Record<string, string>;
  /** Uppercase, whitespace and punctuation stripped. */
  licensePlate: string | null;
  name: string;
}

export interface ResourcePair {
  master: Resource;
  local: Resource;
  strategy: string;
}

export interface MatchResult {
  /** master id -> local id, in master order */
  matches: Map<string, string>;
  pairs: ResourcePair[];
  unmatched: Resource[];
}

export interface Unavailability {
  /** Destination id; null until the destination assigns one. */
  id: string | null;
  resourceId: string;
  /** Id of the master record this one was copied from. */
  externalId: string | null;
  startTime: string;
  endTime: string;
  reason: string;
  description: string;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface SyncStats {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
  errors: number;
}

export type SyncAction = "created" | "updated" | "deleted" | "failed";

export interface SyncResult {
  resourceId: string;
  action: SyncAction;
  unavailabilityId?: string;
  error?: string;
  timestamp: string;
}

export interface SyncRunSummary {
  runId: string;
  startedAt: string;
  completedAt: string;
  year: number;
  dryRun: boolean;
  stats: SyncStats;
  matchedResources: number;
  totalMasterResources: number;
  unmatchedResources: string[];
  results: SyncResult[];
}

export type Environment = "master" | "local";

// --- Collaborators the orchestrator talks to ---

export interface ResourceSource {
  listResources(): Promise<Resource[]>;
}

export interface UnavailabilitySource {
  getAllForResource(resourceId: string, window?: TimeWindow): Promise<Unavailability[]>;
}

export interface UnavailabilityStore extends UnavailabilitySource {
  /** Resolves with the record carrying its assigned id. */
  create(unavailability: Unavailability): Promise<Unavailability>;
  update(unavailability: Unavailability): Promise<Unavailability>;
  delete(resourceId: string, unavailabilityId: string): Promise<void>;
}
