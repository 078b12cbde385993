import type { MatchResult, Resource, ResourcePair } from "@/sync/types";
import { createChildLogger } from "@/sync/logger";
import { defaultStrategies, type MatchStrategy } from "./strategies";

const log = createChildLogger("resource-matcher");

function firstById(resources: readonly Resource[]): Resource[] {
  const seen = new Set<string>();
  const unique: Resource[] = [];
  for (const resource of resources) {
    if (seen.has(resource.id)) continue;
    seen.add(resource.id);
    unique.push(resource);
  }
  return unique;
}

/**
 * Pair every master resource with at most one local resource.
 *
 * Strategies run in the given order for each master resource and the first one
 * that finds an unclaimed candidate wins. A claimed local resource is removed
 * from the pool, so the mapping is one-to-one and earlier master resources take
 * precedence.
 */
export function matchResources(
  masterResources: readonly Resource[],
  localResources: readonly Resource[],
  strategies: readonly MatchStrategy[] = defaultStrategies(),
): MatchResult {
  let candidates = firstById(localResources);
  const matches = new Map<string, string>();
  const pairs: ResourcePair[] = [];
  const unmatched: Resource[] = [];

  for (const master of firstById(masterResources)) {
    let pair: ResourcePair | undefined;

    for (const strategy of strategies) {
      const local = strategy.attemptMatch(master, candidates);
      if (local) {
        pair = { master, local, strategy: strategy.name };
        break;
      }
    }

    if (!pair) {
      log.warn("No match found for resource", { masterId: master.id, name: master.name || "N/A" });
      unmatched.push(master);
      continue;
    }

    log.debug("Matched resource", {
      masterId: pair.master.id,
      localId: pair.local.id,
      strategy: pair.strategy,
    });
    const claimed = pair.local.id;
    candidates = candidates.filter((c) => c.id !== claimed);
    matches.set(master.id, claimed);
    pairs.push(pair);
  }

  log.info(`Matched ${pairs.length} out of ${pairs.length + unmatched.length} resources`);
  return { matches, pairs, unmatched };
}
