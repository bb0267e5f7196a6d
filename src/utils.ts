import * as crypto from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";

const PROJECT_MARKERS = [
  ".git",
  ".claude",
  "package.json",
  "pyproject.toml",
  "Cargo.toml",
  "go.mod",
  "pom.xml",
];

const STOP_WORDS = new Set([
  "the", "a", "an", "is", "are", "was", "were", "using", "with", "for",
  "to", "in", "on", "of", "and", "that", "this", "it", "be", "as", "at",
  "by", "from", "or", "not", "but", "have", "has", "had", "do", "does",
  "did", "will", "would", "could", "should", "may", "might", "can",
  "we", "our", "they", "them", "its", "use", "used", "all", "each",
]);

export const TASK_SLUG_MAX = 50;

// --- Errno ---

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

function hasCode(e: unknown, code: string): boolean {
  return isErrnoException(e) && e.code === code;
}

// --- Atomic File Operations ---

export function atomicWrite(filePath: string, data: string): void {
  // pid-qualified so two processes never share a temp file
  const tmp = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, data);
  fs.renameSync(tmp, filePath);
}

export function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Returns undefined when the file does not exist. Invalid JSON throws:
 * whether that is fatal is the caller's decision.
 */
export function readJsonFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (e) {
    if (hasCode(e, "ENOENT")) return undefined;
    throw e;
  }
  return JSON.parse(raw);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint" || typeof value === "symbol" || typeof value === "function") {
    return String(value);
  }
  if (value instanceof Set) return [...value];
  if (value instanceof Map) return Object.fromEntries(value);
  return value;
}

export function toPrettyJson(data: unknown): string {
  return JSON.stringify(data, jsonReplacer, 2);
}

export function writeJsonFile(filePath: string, data: unknown): void {
  ensureDir(path.dirname(filePath));
  atomicWrite(filePath, toPrettyJson(data));
}

/** Delete a file; a file that is already gone counts as deleted. */
export function removeIfExists(filePath: string): boolean {
  try {
    fs.unlinkSync(filePath);
    return true;
  } catch (e) {
    if (hasCode(e, "ENOENT")) return false;
    throw e;
  }
}

export function listJsonFiles(dir: string): string[] {
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch (e) {
    if (hasCode(e, "ENOENT")) return [];
    throw e;
  }
  return names.filter((n) => n.endsWith(".json"));
}

// --- Checksum ---

/** JSON with object keys sorted at every depth. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value), jsonReplacer);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === "object" && !(value instanceof Set) && !(value instanceof Map)) {
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [key, v] of entries) {
      out[key] = sortKeys(v);
    }
    return out;
  }
  return value;
}

export function calculateChecksum(value: unknown): string {
  return crypto.createHash("sha256").update(canonicalJson(value)).digest("hex").slice(0, 16);
}

// --- Ids & Timestamps ---

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `yyyymmdd-HHMMSS` in UTC. */
export function compactStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function generateSessionId(now: Date = new Date()): string {
  return `session-${compactStamp(now)}-${crypto.randomBytes(3).toString("hex")}`;
}

export function generateMemoryId(prefix = "memory", now: Date = new Date()): string {
  return `${prefix}-${compactStamp(now)}-${crypto.randomBytes(2).toString("hex")}`;
}

/** `YYYY-MM-DD` of an ISO timestamp, or of today when it cannot be parsed. */
export function isoDate(timestamp: string): string {
  const ms = Date.parse(timestamp);
  return (Number.isNaN(ms) ? new Date() : new Date(ms)).toISOString().slice(0, 10);
}

/** Milliseconds since epoch, or null for a missing or unparseable timestamp. */
export function timeOf(timestamp: string | null | undefined): number | null {
  if (!timestamp) return null;
  const ms = Date.parse(timestamp);
  return Number.isNaN(ms) ? null : ms;
}

export function slugifyTask(task: string): string {
  return task
    .slice(0, TASK_SLUG_MAX)
    .toLowerCase()
    .replace(/[ _/]/g, "-");
}

// --- Project Discovery ---

export function findProjectRoot(
  startPath: string = process.cwd(),
  home: string = os.homedir()
): string | null {
  let current = path.resolve(startPath);
  const homeDir = path.resolve(home);

  while (current !== path.dirname(current)) {
    if (current === homeDir) return null;
    if (PROJECT_MARKERS.some((marker) => fs.existsSync(path.join(current, marker)))) {
      return current;
    }
    current = path.dirname(current);
  }
  return null;
}

// --- Tokenization & Similarity ---

export function tokenize(s: string): Set<string> {
  return new Set(
    s.toLowerCase()
      .replace(/[^a-z0-9\s]/g, "")
      .split(/\s+/)
      .filter((w) => w.length > 2 && !STOP_WORDS.has(w))
  );
}

export function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let intersection = 0;
  for (const x of a) {
    if (b.has(x)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

export function truncate(text: string, max: number, suffix = "..."): string {
  if (text.length <= max) return text;
  return text.slice(0, max - suffix.length) + suffix;
}
