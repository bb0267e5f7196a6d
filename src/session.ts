import * as fs from "fs";
import * as path from "path";
import {
  InvalidSessionIdError,
  SessionClosedError,
  SessionCorruptedError,
  SessionNotFoundError,
  toErrorMessage,
} from "./errors";
import { Logger, defaultLogger } from "./log";
import { SessionData, SessionDataSchema } from "./types";
import {
  ensureDir,
  generateSessionId,
  isoDate,
  listJsonFiles,
  readJsonFile,
  removeIfExists,
  slugifyTask,
  timeOf,
  writeJsonFile,
} from "./utils";

export interface SessionTrackerOptions {
  clock?: () => Date;
}

export const TRACK_KINDS = ["task", "file", "decision", "problem", "note", "todo", "done"] as const;
export type TrackKind = (typeof TRACK_KINDS)[number];

export interface TrackDetails {
  rationale?: string;
  alternatives?: string[];
  solution?: string;
}

/** Session ids name files; anything that could leave the sessions directory is rejected. */
export function checkedSessionId(sessionId: string): string {
  if (!/^[A-Za-z0-9._-]+$/.test(sessionId) || /^\.+$/.test(sessionId)) {
    throw new InvalidSessionIdError(sessionId);
  }
  return sessionId;
}

export function activeSessionsDir(scopeRoot: string): string {
  return path.join(scopeRoot, "sessions", "active");
}

export function archivedSessionsDir(scopeRoot: string): string {
  return path.join(scopeRoot, "sessions", "archived");
}

/** `<date>-<task-slug>.json`, the date taken from when the session started. */
export function archiveFileName(data: Pick<SessionData, "started" | "task">): string {
  const slug = slugifyTask(data.task) || "untitled";
  return `${isoDate(data.started)}-${slug}.json`;
}

/**
 * Sessions with no activity for at least `hours`. Pure: works on data the
 * caller already loaded.
 */
export function findStaleSessions(sessions: SessionData[], hours: number, now: Date = new Date()): SessionData[] {
  const thresholdMs = hours * 3600 * 1000;
  return sessions.filter((s) => {
    const last = timeOf(s.last_updated);
    return last !== null && now.getTime() - last >= thresholdMs;
  });
}

function loadSessionFile(file: string): SessionData | undefined {
  let raw: unknown;
  try {
    raw = readJsonFile(file);
  } catch (e) {
    throw new SessionCorruptedError(file, toErrorMessage(e));
  }
  if (raw === undefined) return undefined;
  const parsed = SessionDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SessionCorruptedError(file, parsed.error.issues[0]?.message ?? "invalid session");
  }
  return parsed.data;
}

/**
 * One in-progress unit of work, stored as a single JSON file that is
 * rewritten whole on every change.
 *
 * active → archived: file moved under sessions/archived/
 * active → discarded: file deleted
 */
export class SessionTracker {
  readonly sessionId: string;
  readonly activeDir: string;
  readonly archivedDir: string;
  readonly sessionFile: string;
  private clock: () => Date;
  private state: SessionData;

  /** Opens the session file when it exists, creates it otherwise. */
  constructor(scopeRoot: string, sessionId?: string, opts: SessionTrackerOptions = {}) {
    this.clock = opts.clock ?? (() => new Date());
    this.sessionId = sessionId === undefined ? generateSessionId(this.clock()) : checkedSessionId(sessionId);
    this.activeDir = activeSessionsDir(scopeRoot);
    this.archivedDir = archivedSessionsDir(scopeRoot);
    this.sessionFile = path.join(this.activeDir, `${this.sessionId}.json`);

    ensureDir(this.activeDir);
    ensureDir(this.archivedDir);

    const existing = loadSessionFile(this.sessionFile);
    if (existing) {
      this.state = existing;
    } else {
      const now = this.clock().toISOString();
      this.state = SessionDataSchema.parse({
        session_id: this.sessionId,
        started: now,
        last_updated: now,
      });
      this.save();
    }
  }

  /** Open an existing active session; never creates one. */
  static open(scopeRoot: string, sessionId: string, opts: SessionTrackerOptions = {}): SessionTracker {
    const file = path.join(activeSessionsDir(scopeRoot), `${checkedSessionId(sessionId)}.json`);
    if (!fs.existsSync(file)) throw new SessionNotFoundError(sessionId);
    return new SessionTracker(scopeRoot, sessionId, opts);
  }

  /** Every parseable active session; unreadable files are skipped. */
  static listActiveSessions(scopeRoot: string, logger: Logger = defaultLogger): SessionData[] {
    const dir = activeSessionsDir(scopeRoot);
    const sessions: SessionData[] = [];
    for (const name of listJsonFiles(dir).sort()) {
      try {
        const data = loadSessionFile(path.join(dir, name));
        if (data) sessions.push(data);
      } catch (e) {
        logger.debug(`Skipping session file ${name}: ${toErrorMessage(e)}`);
      }
    }
    return sessions;
  }

  /** The most recently updated active session, if any. */
  static latest(scopeRoot: string, opts: SessionTrackerOptions & { logger?: Logger } = {}): SessionTracker | null {
    const sessions = SessionTracker.listActiveSessions(scopeRoot, opts.logger);
    if (sessions.length === 0) return null;
    const newest = sessions.reduce((a, b) =>
      (timeOf(b.last_updated) ?? 0) > (timeOf(a.last_updated) ?? 0) ? b : a
    );
    return new SessionTracker(scopeRoot, newest.session_id, { clock: opts.clock });
  }

  static cleanupStaleSessions(
    scopeRoot: string,
    hours: number,
    now: Date = new Date(),
    logger: Logger = defaultLogger
  ): string[] {
    return findStaleSessions(SessionTracker.listActiveSessions(scopeRoot, logger), hours, now).map(
      (s) => s.session_id
    );
  }

  get data(): Readonly<SessionData> {
    return this.state;
  }

  // --- Mutations ---

  updateTask(task: string): void {
    this.mutate(() => {
      this.state.task = task;
    });
  }

  addFileModified(filePath: string): void {
    this.assertActive();
    if (this.state.files_modified.includes(filePath)) return;
    this.mutate(() => {
      this.state.files_modified.push(filePath);
    });
  }

  addDecision(decision: string, rationale: string, alternatives: string[] = []): void {
    this.mutate(() => {
      this.state.decisions.push({
        decision,
        rationale,
        alternatives: [...alternatives],
        timestamp: this.clock().toISOString(),
      });
    });
  }

  addProblem(problem: string, solution: string | null = null): void {
    this.mutate(() => {
      this.state.problems.push({ problem, solution, timestamp: this.clock().toISOString() });
    });
  }

  addNote(note: string): void {
    this.mutate(() => {
      this.state.notes.push(note);
    });
  }

  addTodo(todo: string): void {
    this.assertActive();
    if (this.state.todos.includes(todo)) return;
    this.mutate(() => {
      this.state.todos.push(todo);
    });
  }

  removeTodo(todo: string): void {
    this.assertActive();
    const idx = this.state.todos.indexOf(todo);
    if (idx === -1) return;
    this.mutate(() => {
      this.state.todos.splice(idx, 1);
    });
  }

  /** Record one activity by kind; `done` removes a todo. */
  track(kind: TrackKind, text: string, details: TrackDetails = {}): void {
    switch (kind) {
      case "task":
        return this.updateTask(text);
      case "file":
        return this.addFileModified(text);
      case "decision":
        return this.addDecision(text, details.rationale ?? "", details.alternatives);
      case "problem":
        return this.addProblem(text, details.solution ?? null);
      case "note":
        return this.addNote(text);
      case "todo":
        return this.addTodo(text);
      case "done":
        return this.removeTodo(text);
    }
  }

  save(): void {
    writeJsonFile(this.sessionFile, this.state);
  }

  // --- Terminal States ---

  /**
   * Move the session file under sessions/archived/. A name already taken by
   * another archive gets the session id appended.
   */
  archive(archiveName?: string): string {
    this.assertActive();
    this.state.status = "archived";
    this.save();

    let target = path.join(this.archivedDir, path.basename(archiveName ?? archiveFileName(this.state)));
    if (fs.existsSync(target)) {
      const ext = path.extname(target);
      target = `${target.slice(0, target.length - ext.length)}-${this.sessionId}${ext}`;
    }
    fs.renameSync(this.sessionFile, target);
    return target;
  }

  discard(): void {
    this.assertActive();
    this.state.status = "discarded";
    removeIfExists(this.sessionFile);
  }

  // --- Rendering ---

  toMarkdown(): string {
    const d = this.state;
    const lines: string[] = [
      `# Session: ${d.session_id}`,
      `**Started**: ${formatStamp(d.started)}`,
      `**Last Updated**: ${formatStamp(d.last_updated)}`,
      `**Task**: ${d.task || "Not specified"}`,
      `**Status**: ${d.status}`,
      "",
      "## Files Modified",
    ];

    if (d.files_modified.length) {
      for (const f of d.files_modified) lines.push(`- ${f}`);
    } else {
      lines.push("- None");
    }

    lines.push("", "## Decisions Made");
    if (d.decisions.length) {
      for (const dec of d.decisions) {
        lines.push("", `### ${dec.decision}`, `**Rationale**: ${dec.rationale}`);
        if (dec.alternatives.length) {
          lines.push("**Alternatives considered**:");
          for (const alt of dec.alternatives) lines.push(`- ${alt}`);
        }
      }
    } else {
      lines.push("- None");
    }

    lines.push("", "## Problems Encountered");
    if (d.problems.length) {
      for (const prob of d.problems) {
        lines.push("", `### ${prob.problem}`);
        if (prob.solution) lines.push(`**Solution**: ${prob.solution}`);
      }
    } else {
      lines.push("- None");
    }

    lines.push("", "## Notes");
    if (d.notes.length) {
      for (const note of d.notes) lines.push(`- ${note}`);
    } else {
      lines.push("- None");
    }

    lines.push("", "## TODOs");
    if (d.todos.length) {
      for (const todo of d.todos) lines.push(`- [ ] ${todo}`);
    } else {
      lines.push("- None");
    }

    return lines.join("\n") + "\n";
  }

  // --- Internals ---

  private assertActive(): void {
    if (this.state.status !== "active") {
      throw new SessionClosedError(this.sessionId, this.state.status);
    }
  }

  private mutate(change: () => void): void {
    this.assertActive();
    change();
    this.state.last_updated = this.clock().toISOString();
    this.save();
  }
}

/** `YYYY-MM-DD HH:MM:SS` (UTC) for display. */
export function formatStamp(timestamp: string): string {
  const ms = timeOf(timestamp);
  if (ms === null) return timestamp;
  return new Date(ms).toISOString().slice(0, 19).replace("T", " ");
}
