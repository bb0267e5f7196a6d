import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { DEFAULT_REBUILD_THRESHOLD } from "./config";
import { IndexCorruptedError, RebuildInProgressError, toErrorMessage } from "./errors";
import { Logger, defaultLogger } from "./log";
import {
  IndexLogEntry,
  IndexLogEntrySchema,
  IndexStats,
  MemoryEntry,
  MemoryIndex,
  MemoryIndexSchema,
  MemoryScope,
  MemoryType,
} from "./types";
import {
  calculateChecksum,
  ensureDir,
  isErrnoException,
  listJsonFiles,
  readJsonFile,
  removeIfExists,
  timeOf,
  toPrettyJson,
  writeJsonFile,
} from "./utils";

const MOST_ACCESSED_LIMIT = 5;
const DEFAULT_LOCK_STALE_MS = 10 * 60 * 1000;

export type SnapshotStatus = "ok" | "missing" | "corrupt";

export interface IndexManagerOptions {
  clock?: () => Date;
  logger?: Logger;
  /** Age after which a rebuild lock held by a live process is considered abandoned */
  lockStaleMs?: number;
}

export interface RebuildOptions {
  /** Set a corrupt snapshot aside and rebuild from the pending log alone */
  force?: boolean;
  /** Recorded in the lock file for diagnostics */
  owner?: string;
}

export interface RebuildResult {
  index: MemoryIndex;
  /** Log files folded into the snapshot and removed */
  compacted: number;
  /** Log files that could not be parsed, renamed to *.invalid */
  invalid: string[];
  /** Where a corrupt snapshot was moved, when forced */
  quarantined: string | null;
}

export interface IndexInspection {
  snapshot: SnapshotStatus;
  snapshotError: string | null;
  /** null when the snapshot carries no checksum */
  checksumValid: boolean | null;
  logFiles: number;
  invalidLogFiles: string[];
  memories: number;
}

interface SnapshotRead {
  status: SnapshotStatus;
  index: MemoryIndex;
  error: string | null;
}

interface LogRead {
  entries: IndexLogEntry[];
  invalid: string[];
}

const RebuildLockSchema = z.object({
  pid: z.number().int(),
  owner: z.string().default(""),
  acquired: z.string(),
});
type RebuildLock = z.infer<typeof RebuildLockSchema>;

const LOCK_ATTEMPTS = 3;

function parseLock(raw: string | null): RebuildLock | null {
  if (raw === null) return null;
  try {
    const parsed = RebuildLockSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

// --- Log File Naming ---

let lastStampMicros = 0n;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * `yyyymmddHHMMSSffffff` in UTC. Strictly increasing within the process, so
 * two appends in the same millisecond still sort in call order.
 */
export function nextLogStamp(now: Date): string {
  let micros = BigInt(now.getTime()) * 1000n;
  if (micros <= lastStampMicros) micros = lastStampMicros + 1n;
  lastStampMicros = micros;

  const date = new Date(Number(micros / 1000n));
  const fraction = (micros % 1_000_000n).toString().padStart(6, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}${fraction}`
  );
}

export function sanitizeSessionId(sessionId: string): string {
  const safe = sessionId.replace(/[^A-Za-z0-9._-]/g, "_");
  return safe || "anonymous";
}

export function logFileName(stamp: string, sessionId: string): string {
  return `${stamp}-${sanitizeSessionId(sessionId)}.json`;
}

// --- Merge ---

/**
 * Apply one log operation to an id-keyed mapping. Returns whether the
 * mapping changed. Updates never create: an update whose target is absent
 * is dropped.
 */
export function applyLogEntry(memories: Map<string, MemoryEntry>, entry: IndexLogEntry): boolean {
  switch (entry.operation) {
    case "add": {
      if (!entry.memory) return false;
      memories.set(entry.memory.id, entry.memory);
      return true;
    }
    case "update": {
      const target = entry.memory_id ?? entry.memory?.id;
      if (!entry.memory || !target || !memories.has(target)) return false;
      memories.set(target, entry.memory.id === target ? entry.memory : { ...entry.memory, id: target });
      return true;
    }
    case "delete": {
      const target = entry.memory_id ?? entry.memory?.id;
      if (!target) return false;
      return memories.delete(target);
    }
  }
}

export function replayLog(base: MemoryEntry[], entries: Iterable<IndexLogEntry>): Map<string, MemoryEntry> {
  const memories = new Map<string, MemoryEntry>();
  for (const m of base) memories.set(m.id, m);
  for (const entry of entries) applyLogEntry(memories, entry);
  return memories;
}

// --- Stats ---

export function calculateStats(memories: MemoryEntry[]): IndexStats {
  const byType: Partial<Record<MemoryType, number>> = {};
  let totalAccesses = 0;
  for (const m of memories) {
    byType[m.type] = (byType[m.type] ?? 0) + 1;
    totalAccesses += m.access.count;
  }

  const mostAccessed = [...memories]
    .sort((a, b) => b.access.count - a.access.count)
    .slice(0, MOST_ACCESSED_LIMIT)
    .filter((m) => m.access.count > 0)
    .map((m) => m.id);

  const unaccessed = memories.filter((m) => m.access.count === 0);
  let oldest: MemoryEntry | null = null;
  for (const m of unaccessed) {
    if (!oldest || (timeOf(m.created) ?? Infinity) < (timeOf(oldest.created) ?? Infinity)) {
      oldest = m;
    }
  }

  return {
    total_memories: memories.length,
    total_accesses: totalAccesses,
    by_type: byType,
    most_accessed: mostAccessed,
    never_accessed: unaccessed.map((m) => m.id),
    oldest_unaccessed: oldest?.id ?? null,
  };
}

/** Checksum over the canonical serialization with the checksum field blanked. */
export function indexChecksum(index: MemoryIndex): string {
  return calculateChecksum({ ...index, checksum: "" });
}

export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(e) && e.code === "EPERM";
  }
}

function readTextIfExists(file: string): string | null {
  try {
    return fs.readFileSync(file, "utf-8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return null;
    throw e;
  }
}

/**
 * Remove a lock file only if it still holds `seen`, the contents judged
 * stale. The lock is first renamed to a name private to this process, so a
 * fresh lock written by someone else in the meantime is put back instead of
 * being deleted. Returns whether the stale lock was removed.
 */
export function claimStaleLock(lockPath: string, seen: string): boolean {
  const claimed = `${lockPath}.${process.pid}-${crypto.randomBytes(4).toString("hex")}`;
  try {
    fs.renameSync(lockPath, claimed);
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return false;
    throw e;
  }

  if (readTextIfExists(claimed) === seen) {
    removeIfExists(claimed);
    return true;
  }

  try {
    fs.linkSync(claimed, lockPath);
  } catch (e) {
    // A third writer already holds a newer lock; theirs stands.
    if (!isErrnoException(e) || e.code !== "EEXIST") throw e;
  }
  removeIfExists(claimed);
  return false;
}

// --- Index Manager ---

/**
 * One scope's memory index: a snapshot file plus a directory of
 * single-operation log files. Writers only ever create new log files;
 * readers replay every log file over the snapshot; rebuild folds the log
 * into a fresh snapshot.
 *
 * Rebuilds take `memory/rebuild.lock`. Deletes during compaction are
 * delete-if-exists, so a rebuilder that loses a race only wastes work.
 */
export class IndexManager {
  readonly scope: MemoryScope;
  readonly memoryDir: string;
  readonly indexPath: string;
  readonly logDir: string;
  readonly lockPath: string;
  private clock: () => Date;
  private logger: Logger;
  private lockStaleMs: number;

  constructor(scopeRoot: string, scope: MemoryScope, opts: IndexManagerOptions = {}) {
    this.scope = scope;
    this.memoryDir = path.join(scopeRoot, "memory");
    this.indexPath = path.join(this.memoryDir, "index.json");
    this.logDir = path.join(this.memoryDir, "index-log");
    this.lockPath = path.join(this.memoryDir, "rebuild.lock");
    this.clock = opts.clock ?? (() => new Date());
    this.logger = opts.logger ?? defaultLogger;
    this.lockStaleMs = opts.lockStaleMs ?? DEFAULT_LOCK_STALE_MS;
  }

  initialize(): void {
    ensureDir(this.logDir);
    if (!fs.existsSync(this.indexPath)) {
      writeJsonFile(this.indexPath, this.emptyIndex());
    }
  }

  /**
   * The scope's current view. A missing snapshot reads as empty; so does a
   * corrupt one, with a warning, so that pending log entries stay visible.
   */
  readIndex(includeLogs = true): MemoryIndex {
    const snapshot = this.readSnapshot();
    if (snapshot.status === "corrupt") {
      this.logger.warn(`Index snapshot ${this.indexPath} is corrupt (${snapshot.error}); reading it as empty`);
    }
    if (!includeLogs) return snapshot.index;

    const { entries } = this.readLogEntries(this.listLogFiles());
    return this.merge(snapshot.index, entries);
  }

  addMemory(memory: MemoryEntry, sessionId: string): string {
    return this.appendLogEntry({
      operation: "add",
      timestamp: this.clock().toISOString(),
      session_id: sessionId,
      memory,
      memory_id: memory.id,
    });
  }

  updateMemory(memoryId: string, memory: MemoryEntry, sessionId: string): string {
    return this.appendLogEntry({
      operation: "update",
      timestamp: this.clock().toISOString(),
      session_id: sessionId,
      memory,
      memory_id: memoryId,
    });
  }

  deleteMemory(memoryId: string, sessionId: string): string {
    return this.appendLogEntry({
      operation: "delete",
      timestamp: this.clock().toISOString(),
      session_id: sessionId,
      memory: null,
      memory_id: memoryId,
    });
  }

  /**
   * Fold the pending log into a new snapshot. Only the log files listed at
   * the start are removed; anything appended meanwhile is replayed again on
   * the next read.
   */
  rebuildIndex(opts: RebuildOptions = {}): RebuildResult {
    this.acquireRebuildLock(opts.owner);
    try {
      const snapshot = this.readSnapshot();
      let quarantined: string | null = null;

      if (snapshot.status === "corrupt") {
        if (!opts.force) {
          throw new IndexCorruptedError(this.indexPath, snapshot.error ?? "unknown error");
        }
        quarantined = `${this.indexPath}.corrupt-${nextLogStamp(this.clock())}`;
        fs.renameSync(this.indexPath, quarantined);
        this.logger.warn(`Moved corrupt snapshot to ${quarantined}`);
      }

      const logFiles = this.listLogFiles();
      const { entries, invalid } = this.readLogEntries(logFiles);
      const merged = this.merge(snapshot.index, entries);

      const index: MemoryIndex = {
        ...merged,
        scope: this.scope,
        last_updated: this.clock().toISOString(),
        stats: calculateStats(merged.memories),
        checksum: "",
      };
      index.checksum = indexChecksum(index);
      writeJsonFile(this.indexPath, index);

      const invalidSet = new Set(invalid);
      for (const name of logFiles) {
        const file = path.join(this.logDir, name);
        if (invalidSet.has(name)) {
          this.setAsideInvalidLog(file);
        } else {
          removeIfExists(file);
        }
      }

      return {
        index,
        compacted: logFiles.length - invalid.length,
        invalid,
        quarantined,
      };
    } finally {
      this.releaseRebuildLock();
    }
  }

  shouldRebuild(threshold: number = DEFAULT_REBUILD_THRESHOLD): boolean {
    return this.logCount() >= threshold;
  }

  /** Pending log file names in replay order. */
  listLogFiles(): string[] {
    return listJsonFiles(this.logDir).sort();
  }

  logCount(): number {
    return listJsonFiles(this.logDir).length;
  }

  inspect(): IndexInspection {
    const snapshot = this.readSnapshot();
    const logFiles = this.listLogFiles();
    const { entries, invalid } = this.readLogEntries(logFiles);
    const merged = this.merge(snapshot.index, entries);

    let checksumValid: boolean | null = null;
    if (snapshot.status === "ok" && snapshot.index.checksum) {
      checksumValid = indexChecksum(snapshot.index) === snapshot.index.checksum;
    }

    return {
      snapshot: snapshot.status,
      snapshotError: snapshot.error,
      checksumValid,
      logFiles: logFiles.length,
      invalidLogFiles: invalid,
      memories: merged.memories.length,
    };
  }

  // --- Internals ---

  private emptyIndex(): MemoryIndex {
    return {
      version: "1.0",
      scope: this.scope,
      last_updated: this.clock().toISOString(),
      checksum: "",
      memories: [],
      stats: calculateStats([]),
    };
  }

  private readSnapshot(): SnapshotRead {
    let raw: unknown;
    try {
      raw = readJsonFile(this.indexPath);
    } catch (e) {
      return { status: "corrupt", index: this.emptyIndex(), error: toErrorMessage(e) };
    }
    if (raw === undefined) {
      return { status: "missing", index: this.emptyIndex(), error: null };
    }

    const parsed = MemoryIndexSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "<root>";
      return { status: "corrupt", index: this.emptyIndex(), error: `${where}: ${issue?.message}` };
    }
    return { status: "ok", index: parsed.data, error: null };
  }

  private readLogEntries(fileNames: string[]): LogRead {
    const entries: IndexLogEntry[] = [];
    const invalid: string[] = [];

    for (const name of fileNames) {
      const file = path.join(this.logDir, name);
      let raw: unknown;
      try {
        raw = readJsonFile(file);
      } catch (e) {
        this.logger.debug(`Skipping unreadable log file ${name}: ${toErrorMessage(e)}`);
        invalid.push(name);
        continue;
      }
      // Removed by a concurrent rebuild after listing
      if (raw === undefined) continue;

      const parsed = IndexLogEntrySchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.debug(`Skipping invalid log file ${name}: ${parsed.error.issues[0]?.message}`);
        invalid.push(name);
        continue;
      }
      entries.push(parsed.data);
    }

    return { entries, invalid };
  }

  private merge(base: MemoryIndex, entries: IndexLogEntry[]): MemoryIndex {
    const memories = replayLog(base.memories, entries);

    let lastUpdated = base.last_updated;
    for (const entry of entries) {
      if ((timeOf(entry.timestamp) ?? 0) > (timeOf(lastUpdated) ?? 0)) lastUpdated = entry.timestamp;
    }

    return { ...base, last_updated: lastUpdated, memories: [...memories.values()] };
  }

  private appendLogEntry(entry: IndexLogEntry): string {
    ensureDir(this.logDir);
    const file = path.join(this.logDir, logFileName(nextLogStamp(this.clock()), entry.session_id));
    writeJsonFile(file, entry);
    return file;
  }

  private setAsideInvalidLog(file: string): void {
    try {
      fs.renameSync(file, `${file}.invalid`);
      this.logger.warn(`Set aside unparseable log file ${path.basename(file)}`);
    } catch (e) {
      if (!isErrnoException(e) || e.code !== "ENOENT") throw e;
    }
  }

  // --- Rebuild Lock ---

  private readLock(): RebuildLock | null {
    return parseLock(readTextIfExists(this.lockPath));
  }

  private isLockStale(lock: RebuildLock): boolean {
    if (!isProcessAlive(lock.pid)) return true;
    const acquired = timeOf(lock.acquired);
    return acquired === null || this.clock().getTime() - acquired > this.lockStaleMs;
  }

  private acquireRebuildLock(owner = `pid-${process.pid}`): void {
    ensureDir(this.memoryDir);
    const record: RebuildLock = { pid: process.pid, owner, acquired: this.clock().toISOString() };

    for (let attempt = 0; attempt < LOCK_ATTEMPTS; attempt++) {
      try {
        fs.writeFileSync(this.lockPath, toPrettyJson(record), { flag: "wx" });
        return;
      } catch (e) {
        if (!isErrnoException(e) || e.code !== "EEXIST") throw e;
      }

      const seen = readTextIfExists(this.lockPath);
      if (seen === null) continue;
      const holder = parseLock(seen);
      if (holder && !this.isLockStale(holder)) {
        throw new RebuildInProgressError(this.lockPath, holder.pid);
      }
      if (claimStaleLock(this.lockPath, seen)) {
        this.logger.warn(`Took over stale rebuild lock${holder ? ` from pid ${holder.pid}` : ""}`);
      }
    }

    throw new RebuildInProgressError(this.lockPath, this.readLock()?.pid ?? -1);
  }

  private releaseRebuildLock(): void {
    const holder = this.readLock();
    if (holder && holder.pid !== process.pid) return;
    removeIfExists(this.lockPath);
  }
}
