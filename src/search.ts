import { compareRecency } from "./entry";
import { MemoryEntry, MemoryType } from "./types";

export interface SearchOptions {
  query?: string;
  /** Match any of these tags */
  tags?: string[];
  type?: MemoryType;
}

function matchesQuery(m: MemoryEntry, q: string): boolean {
  return (
    m.title.toLowerCase().includes(q) ||
    m.summary.toLowerCase().includes(q) ||
    m.keywords.some((k) => k.toLowerCase().includes(q)) ||
    m.triggers.some((t) => t.toLowerCase().includes(q))
  );
}

/**
 * Linear scan over a merged index. Results come back most recently
 * accessed first, then newest.
 */
export function searchMemories(memories: MemoryEntry[], opts: SearchOptions = {}): MemoryEntry[] {
  const q = (opts.query ?? "").toLowerCase();
  const tags = opts.tags ?? [];

  return memories
    .filter((m) => {
      if (q && !matchesQuery(m, q)) return false;
      if (tags.length && !tags.some((t) => m.tags.includes(t))) return false;
      if (opts.type && m.type !== opts.type) return false;
      return true;
    })
    .sort(compareRecency);
}

export function findMemoryById(memories: MemoryEntry[], id: string): MemoryEntry | undefined {
  return memories.find((m) => m.id === id);
}
