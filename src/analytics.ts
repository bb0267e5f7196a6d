/**
 * Read-only views over stored memories for the stats, timeline, tags and
 * health commands. Everything here works on already-merged entries; only
 * runHealthCheck touches the filesystem.
 */

import * as fs from "fs";
import * as path from "path";
import { toErrorMessage } from "./errors";
import type { MemoryManager } from "./memory";
import { activeSessionsDir } from "./session";
import { MemoryEntry, MemoryScope, MemoryType, SessionDataSchema } from "./types";
import { jaccard, readJsonFile, timeOf, tokenize } from "./utils";

const DAY_MS = 86400000;
const WEEK_WINDOW = 13;

export const DEFAULT_DUPLICATE_THRESHOLD = 0.6;
export const DEFAULT_STALE_DAYS = 180;

// --- Overview ---

export interface WeekActivity {
  count: number;
  accesses: number;
}

export interface Overview {
  total: number;
  byScope: Partial<Record<MemoryScope, number>>;
  byType: Partial<Record<MemoryType, number>>;
  totalAccesses: number;
  /** Accessed entries, most accessed first */
  mostAccessed: MemoryEntry[];
  /** Oldest first */
  neverAccessed: MemoryEntry[];
  /** "Week 13" is the current week, "Week 1" twelve weeks back */
  byWeek: Record<string, WeekActivity>;
  tags: Map<string, number>;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function createdOrMax(m: MemoryEntry): number {
  return timeOf(m.created) ?? Number.MAX_SAFE_INTEGER;
}

export function calculateOverview(memories: MemoryEntry[], now: Date = new Date()): Overview {
  const overview: Overview = {
    total: memories.length,
    byScope: {},
    byType: {},
    totalAccesses: 0,
    mostAccessed: [],
    neverAccessed: [],
    byWeek: {},
    tags: new Map(),
  };

  for (const m of memories) {
    increment(overview.byScope, m.scope);
    increment(overview.byType, m.type);
    overview.totalAccesses += m.access.count;

    if (m.access.count > 0) overview.mostAccessed.push(m);
    else overview.neverAccessed.push(m);

    const created = timeOf(m.created);
    if (created !== null) {
      const week = Math.floor(Math.floor((now.getTime() - created) / DAY_MS) / 7);
      if (week >= 0 && week < WEEK_WINDOW) {
        const key = `Week ${WEEK_WINDOW - week}`;
        const slot = overview.byWeek[key] ?? { count: 0, accesses: 0 };
        slot.count++;
        slot.accesses += m.access.count;
        overview.byWeek[key] = slot;
      }
    }

    for (const tag of m.tags) overview.tags.set(tag, (overview.tags.get(tag) ?? 0) + 1);
  }

  overview.mostAccessed.sort((a, b) => b.access.count - a.access.count);
  overview.neverAccessed.sort((a, b) => createdOrMax(a) - createdOrMax(b));
  return overview;
}

// --- Timeline ---

/** `YYYY-MM` → entries, newest month first. Entries without a date are left out. */
export function groupByMonth(memories: MemoryEntry[]): Map<string, MemoryEntry[]> {
  const grouped = new Map<string, MemoryEntry[]>();
  for (const m of memories) {
    const created = timeOf(m.created);
    if (created === null) continue;
    const key = new Date(created).toISOString().slice(0, 7);
    const bucket = grouped.get(key) ?? [];
    bucket.push(m);
    grouped.set(key, bucket);
  }
  return new Map([...grouped.entries()].sort((a, b) => b[0].localeCompare(a[0])));
}

// --- Tags ---

export interface TagStats {
  frequency: Map<string, number>;
  /** tag → (other tag → times seen together) */
  coOccurrence: Map<string, Map<string, number>>;
  /** Mean access count of the entries carrying each tag */
  averageAccess: Map<string, number>;
}

export function calculateTagStats(memories: MemoryEntry[]): TagStats {
  const frequency = new Map<string, number>();
  const coOccurrence = new Map<string, Map<string, number>>();
  const accessTotals = new Map<string, number>();

  const bump = (from: string, to: string) => {
    const row = coOccurrence.get(from) ?? new Map<string, number>();
    row.set(to, (row.get(to) ?? 0) + 1);
    coOccurrence.set(from, row);
  };

  for (const m of memories) {
    m.tags.forEach((tag, i) => {
      frequency.set(tag, (frequency.get(tag) ?? 0) + 1);
      accessTotals.set(tag, (accessTotals.get(tag) ?? 0) + m.access.count);
      for (const other of m.tags.slice(i + 1)) {
        bump(tag, other);
        bump(other, tag);
      }
    });
  }

  const averageAccess = new Map<string, number>();
  for (const [tag, count] of frequency) {
    averageAccess.set(tag, (accessTotals.get(tag) ?? 0) / count);
  }

  return { frequency, coOccurrence, averageAccess };
}

/** Tags by frequency, ties alphabetical. */
export function rankTags(stats: TagStats, minCount = 1): [string, number][] {
  return [...stats.frequency.entries()]
    .filter(([, n]) => n >= minCount)
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

// --- Health ---

export function findUntagged(memories: MemoryEntry[]): MemoryEntry[] {
  return memories.filter((m) => m.tags.length === 0);
}

export function findNeverAccessed(memories: MemoryEntry[]): MemoryEntry[] {
  return memories.filter((m) => m.access.count === 0);
}

export interface DuplicatePair {
  first: MemoryEntry;
  second: MemoryEntry;
  similarity: number;
}

/** Pairs whose titles share at least `threshold` of their tokens. */
export function findPotentialDuplicates(
  memories: MemoryEntry[],
  threshold = DEFAULT_DUPLICATE_THRESHOLD
): DuplicatePair[] {
  const tokens = memories.map((m) => tokenize(m.title));
  const pairs: DuplicatePair[] = [];

  for (let i = 0; i < memories.length; i++) {
    for (let j = i + 1; j < memories.length; j++) {
      if (tokens[i].size === 0 || tokens[j].size === 0) continue;
      const similarity = jaccard(tokens[i], tokens[j]);
      if (similarity >= threshold) {
        pairs.push({ first: memories[i], second: memories[j], similarity });
      }
    }
  }
  return pairs;
}

/** Never accessed and created more than `days` ago. */
export function findStaleMemories(
  memories: MemoryEntry[],
  days = DEFAULT_STALE_DAYS,
  now: Date = new Date()
): MemoryEntry[] {
  const cutoff = now.getTime() - days * DAY_MS;
  return memories.filter((m) => {
    const created = timeOf(m.created);
    return created !== null && created < cutoff && m.access.count === 0;
  });
}

export type CheckStatus = "OK" | "WARNING" | "ERROR";

export interface CheckResult {
  status: CheckStatus;
  issues: string[];
}

export interface HealthReport {
  indexIntegrity: CheckResult;
  sessionFiles: CheckResult;
  markdownArchives: CheckResult;
  untagged: MemoryEntry[];
  neverAccessed: MemoryEntry[];
  duplicates: DuplicatePair[];
  stale: MemoryEntry[];
}

function result(issues: string[], failure: CheckStatus): CheckResult {
  return { status: issues.length ? failure : "OK", issues };
}

function checkIndexIntegrity(manager: MemoryManager): CheckResult {
  const issues: string[] = [];
  for (const { scope, index } of manager.scopes()) {
    const label = scope === "global" ? "Global" : "Project";
    const report = index.inspect();
    if (report.snapshot === "missing") issues.push(`${label} index file missing`);
    if (report.snapshot === "corrupt") issues.push(`${label} index corrupted: ${report.snapshotError}`);
    if (report.checksumValid === false) issues.push(`${label} index checksum mismatch`);
    for (const name of report.invalidLogFiles) issues.push(`${label} log file unreadable: ${name}`);
  }
  return result(issues, "WARNING");
}

function checkSessionFiles(manager: MemoryManager): CheckResult {
  const issues: string[] = [];
  for (const { root } of manager.scopes()) {
    const dir = activeSessionsDir(root);
    if (!fs.existsSync(dir)) continue;
    for (const name of fs.readdirSync(dir).filter((f) => f.endsWith(".json"))) {
      try {
        const parsed = SessionDataSchema.safeParse(readJsonFile(path.join(dir, name)));
        if (!parsed.success) issues.push(`Invalid session file: ${name} - ${parsed.error.issues[0]?.message}`);
      } catch (e) {
        issues.push(`Invalid session file: ${name} - ${toErrorMessage(e)}`);
      }
    }
  }
  return result(issues, "ERROR");
}

function checkMarkdownArchives(manager: MemoryManager): CheckResult {
  const issues: string[] = [];
  for (const { root } of manager.scopes()) {
    const dir = path.join(root, "memory", "sessions");
    if (!fs.existsSync(dir)) continue;
    for (const name of fs.readdirSync(dir).filter((f) => f.endsWith(".md"))) {
      try {
        fs.readFileSync(path.join(dir, name), "utf-8");
      } catch (e) {
        issues.push(`Unreadable archive: ${name} - ${toErrorMessage(e)}`);
      }
    }
  }
  return result(issues, "WARNING");
}

export function runHealthCheck(
  manager: MemoryManager,
  opts: { staleDays?: number; duplicateThreshold?: number; now?: Date } = {}
): HealthReport {
  const memories = manager.listMemories();
  return {
    indexIntegrity: checkIndexIntegrity(manager),
    sessionFiles: checkSessionFiles(manager),
    markdownArchives: checkMarkdownArchives(manager),
    untagged: findUntagged(memories),
    neverAccessed: findNeverAccessed(memories),
    duplicates: findPotentialDuplicates(memories, opts.duplicateThreshold),
    stale: findStaleMemories(memories, opts.staleDays, opts.now),
  };
}

// --- Formatting ---

export function formatRelativeTime(timestamp: string | null, now: Date = new Date()): string {
  const then = timeOf(timestamp);
  if (then === null) return "never";

  const deltaMs = now.getTime() - then;
  // Future timestamps count as now
  if (deltaMs < 60_000) return "just now";

  const days = Math.floor(deltaMs / DAY_MS);
  const seconds = Math.floor((deltaMs - days * DAY_MS) / 1000);

  if (days === 0) {
    if (seconds < 3600) return `${Math.floor(seconds / 60)}m ago`;
    return `${Math.floor(seconds / 3600)}h ago`;
  }
  if (days === 1) return "yesterday";
  if (days < 7) return `${days}d ago`;
  if (days < 30) return `${Math.floor(days / 7)}w ago`;
  if (days < 365) return `${Math.floor(days / 30)}mo ago`;
  return `${Math.floor(days / 365)}y ago`;
}
