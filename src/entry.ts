import {
  MAX_RECENT_SEARCHES,
  MemoryEntry,
  MemoryEntryInput,
  MemoryEntrySchema,
  RecentSearch,
} from "./types";
import { timeOf } from "./utils";

/**
 * Build a complete entry from a partial description, filling every
 * defaulted field. Entries are values: nothing here mutates its input.
 */
export function createMemoryEntry(input: MemoryEntryInput): MemoryEntry {
  return MemoryEntrySchema.parse(input);
}

export function pushRecentSearch(searches: RecentSearch[], search: RecentSearch): RecentSearch[] {
  return [...searches, search].slice(-MAX_RECENT_SEARCHES);
}

/**
 * The entry as it looks after one more access. An empty query counts the
 * access without recording a search.
 */
export function recordAccess(entry: MemoryEntry, query = "", now: Date = new Date()): MemoryEntry {
  const stamp = now.toISOString();
  const access = entry.access;
  return {
    ...entry,
    access: {
      count: access.count + 1,
      first_accessed: access.first_accessed ?? stamp,
      last_accessed: stamp,
      recent_searches: query
        ? pushRecentSearch(access.recent_searches, { query, timestamp: stamp })
        : [...access.recent_searches],
    },
  };
}

export function withSkillCandidate(
  entry: MemoryEntry,
  candidate: MemoryEntry["skill_candidate"]
): MemoryEntry {
  return { ...entry, skill_candidate: { ...candidate, related_memories: [...candidate.related_memories] } };
}

// --- Ordering ---

export function compareCreated(a: MemoryEntry, b: MemoryEntry): number {
  return (timeOf(a.created) ?? 0) - (timeOf(b.created) ?? 0);
}

/** Most recently accessed first; never-accessed entries last, newest first among them. */
export function compareRecency(a: MemoryEntry, b: MemoryEntry): number {
  const la = timeOf(a.access.last_accessed) ?? -Infinity;
  const lb = timeOf(b.access.last_accessed) ?? -Infinity;
  if (la !== lb) return lb > la ? 1 : -1;
  return compareCreated(b, a);
}
