import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Config, configPath, defaultConfig, loadConfig } from "./config";
import { createMemoryEntry, recordAccess } from "./entry";
import { MemoryError, NoProjectScopeError, SessionNotFoundError } from "./errors";
import { IndexManager, RebuildOptions, RebuildResult } from "./index-manager";
import { Logger, createConsoleLogger, debugEnabled, defaultLogger } from "./log";
import { ManifestStore } from "./manifest";
import { SearchOptions, findMemoryById, searchMemories } from "./search";
import { SessionTracker } from "./session";
import { DetectOptions, SkillCandidate, flagSkillCandidates as detectAndFlag, renderSkillReport } from "./skills";
import { Manifest, MemoryEntry, MemoryScope, MemoryType, SessionData } from "./types";
import {
  ensureDir,
  generateMemoryId,
  isoDate,
  slugifyTask,
  writeJsonFile,
  findProjectRoot,
} from "./utils";

export const ACCESS_TRACKER_SESSION = "access-tracker";
export const SKILL_ANALYZER_SESSION = "skill-analyzer";

const KEYWORD_LIMIT = 20;
const CURRENT_WORK_LIMIT = 10;
const TRIGGER_KEYWORDS = [
  "python", "javascript", "typescript", "react", "vue", "django",
  "flask", "fastapi", "auth", "database", "api",
];

export interface MemoryManagerOptions {
  workingDir?: string;
  /** Global scope root; defaults to $SESSION_MEMORY_HOME or ~/.claude */
  globalRoot?: string;
  home?: string;
  clock?: () => Date;
  /** Defaults to a console logger whose debug output follows `config.debug` */
  logger?: Logger;
}

export interface SaveSessionOptions {
  scope: MemoryScope;
  type?: MemoryType;
  tags?: string[];
  summary?: string;
}

export interface SaveSessionResult {
  entry: MemoryEntry;
  /** Absolute path of the Markdown content blob */
  contentFile: string;
  rebuilt: boolean;
}

export interface ScopeHandle {
  scope: MemoryScope;
  root: string;
  index: IndexManager;
}

export function resolveGlobalRoot(home: string = os.homedir()): string {
  return process.env.SESSION_MEMORY_HOME || path.join(home, ".claude");
}

function fileExtension(filePath: string): string | null {
  const base = filePath.split("/").pop() ?? filePath;
  const dot = base.lastIndexOf(".");
  return dot > 0 ? base.slice(dot + 1) : null;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function extractKeywords(session: SessionData): string[] {
  const keywords: string[] = [];
  if (session.task) keywords.push(...session.task.toLowerCase().split(/\s+/));
  for (const d of session.decisions) keywords.push(...d.decision.toLowerCase().split(/\s+/));
  for (const file of session.files_modified) {
    const ext = fileExtension(file);
    if (ext) keywords.push(ext);
    keywords.push(...file.split("/").slice(0, -1));
  }
  return unique(keywords.filter((k) => k.length > 2)).slice(0, KEYWORD_LIMIT);
}

export function extractTriggers(session: SessionData, tags: string[]): string[] {
  const triggers = [...tags];
  for (const file of session.files_modified) {
    const ext = fileExtension(file);
    if (ext) triggers.push(`.${ext}`);
  }
  const task = session.task.toLowerCase();
  for (const keyword of TRIGGER_KEYWORDS) {
    if (task.includes(keyword)) triggers.push(keyword);
  }
  return unique(triggers);
}

function claudeMdTemplate(scope: MemoryScope): string {
  if (scope === "global") {
    return `# Global User Preferences

## Coding Style
(Add your global coding preferences here)

## Memory Pointers
(Memory pointers will be added here as you work)
`;
  }
  return `# Project Memory

## Project Context
(Project-specific context will be added here)

## Memory Pointers
(Project memory pointers will be added here)
`;
}

function shortStamp(timestamp: string): string {
  const ms = Date.parse(timestamp);
  return Number.isNaN(ms) ? timestamp : new Date(ms).toISOString().slice(0, 16).replace("T", " ");
}

export function renderCurrentWork(sessions: SessionData[], scopeLabel: string): string {
  if (sessions.length === 0) {
    return "## Current Work\n\n(No active sessions)\n";
  }

  const lines = [`## Current Work (${scopeLabel})`, ""];
  for (const s of sessions) {
    lines.push(
      `### ${s.task || "Untitled Session"}`,
      `**Session ID**: ${s.session_id}`,
      `**Started**: ${shortStamp(s.started)}`,
      `**Last Updated**: ${shortStamp(s.last_updated)}`
    );
    if (s.files_modified.length) {
      lines.push("", "**Files Modified**:");
      for (const f of s.files_modified.slice(0, CURRENT_WORK_LIMIT)) lines.push(`  - ${f}`);
      if (s.files_modified.length > CURRENT_WORK_LIMIT) {
        lines.push(`  - ... and ${s.files_modified.length - CURRENT_WORK_LIMIT} more`);
      }
    }
    if (s.todos.length) {
      lines.push("", "**TODOs**:");
      for (const t of s.todos.slice(0, CURRENT_WORK_LIMIT)) lines.push(`  - [ ] ${t}`);
      if (s.todos.length > CURRENT_WORK_LIMIT) {
        lines.push(`  - ... and ${s.todos.length - CURRENT_WORK_LIMIT} more`);
      }
    }
    lines.push("", "---", "");
  }
  return lines.join("\n");
}

/**
 * Replace the `## Current Work` section (up to the next `## ` heading), or
 * insert one after the first `# ` title.
 */
export function replaceCurrentWork(content: string, section: string): string {
  const start = content.indexOf("## Current Work");
  if (start !== -1) {
    const next = content.indexOf("\n## ", start + 1);
    const end = next === -1 ? content.length : next;
    return content.slice(0, start) + section.trimEnd() + "\n" + content.slice(end);
  }

  const lines = content.split("\n");
  const titleIdx = lines.findIndex((l) => l.startsWith("# "));
  lines.splice(titleIdx + 1, 0, "", section);
  return lines.join("\n");
}

/**
 * Entry point over both scopes: global (one per user) and project (one per
 * detected project root, when there is one).
 */
export class MemoryManager {
  readonly workingDir: string;
  readonly globalRoot: string;
  readonly projectRoot: string | null;
  readonly config: Config;
  readonly globalIndex: IndexManager;
  readonly projectIndex: IndexManager | null;
  private clock: () => Date;
  private logger: Logger;

  constructor(opts: MemoryManagerOptions = {}) {
    const home = opts.home ?? os.homedir();
    this.workingDir = path.resolve(opts.workingDir ?? process.cwd());
    this.globalRoot = opts.globalRoot ?? resolveGlobalRoot(home);
    const project = findProjectRoot(this.workingDir, home);
    this.projectRoot = project ? path.join(project, ".claude") : null;
    this.clock = opts.clock ?? (() => new Date());
    this.config = loadConfig(this.globalRoot, this.projectRoot, opts.logger ?? defaultLogger);
    this.logger = opts.logger ?? createConsoleLogger({ debug: this.config.debug || debugEnabled() });

    const indexOpts = {
      clock: this.clock,
      logger: this.logger,
      lockStaleMs: this.config.rebuild.lockStaleMinutes * 60 * 1000,
    };
    this.globalIndex = new IndexManager(this.globalRoot, "global", indexOpts);
    this.projectIndex = this.projectRoot ? new IndexManager(this.projectRoot, "project", indexOpts) : null;
  }

  // --- Scopes ---

  scopes(): ScopeHandle[] {
    const handles: ScopeHandle[] = [{ scope: "global", root: this.globalRoot, index: this.globalIndex }];
    if (this.projectRoot && this.projectIndex) {
      handles.push({ scope: "project", root: this.projectRoot, index: this.projectIndex });
    }
    return handles;
  }

  /** Throws NoProjectScopeError for the project scope outside a project. */
  scope(scope: MemoryScope): ScopeHandle {
    const handle = this.scopes().find((h) => h.scope === scope);
    if (!handle) throw new NoProjectScopeError(this.workingDir);
    return handle;
  }

  indexFor(scope: MemoryScope): IndexManager {
    return this.scope(scope).index;
  }

  /** Where sessions live: the project when there is one, global otherwise. */
  sessionsRoot(): string {
    return this.projectRoot ?? this.globalRoot;
  }

  initialize(): void {
    for (const { scope, root, index } of this.scopes()) {
      for (const dir of [
        path.join(root, "memory", "sessions"),
        path.join(root, "sessions", "active"),
        path.join(root, "sessions", "archived"),
        path.join(root, "skills"),
      ]) {
        ensureDir(dir);
      }

      const claudeMd = path.join(root, "CLAUDE.md");
      if (!fs.existsSync(claudeMd)) fs.writeFileSync(claudeMd, claudeMdTemplate(scope));

      if (!fs.existsSync(configPath(root))) writeJsonFile(configPath(root), defaultConfig());

      index.initialize();

      const skillsIndex = path.join(root, "skills", "index.json");
      if (!fs.existsSync(skillsIndex)) {
        writeJsonFile(skillsIndex, { version: "1.0", skills: [], last_updated: this.clock().toISOString() });
      }
    }
  }

  // --- Sessions ---

  createSession(sessionId?: string): SessionTracker {
    return new SessionTracker(this.sessionsRoot(), sessionId, { clock: this.clock });
  }

  openSession(sessionId: string): SessionTracker {
    return SessionTracker.open(this.sessionsRoot(), sessionId, { clock: this.clock });
  }

  latestSession(): SessionTracker | null {
    return SessionTracker.latest(this.sessionsRoot(), { clock: this.clock, logger: this.logger });
  }

  /** The named session, or the most recently updated one. */
  resolveSession(sessionId?: string): SessionTracker {
    if (sessionId) return this.openSession(sessionId);
    const latest = this.latestSession();
    if (!latest) throw new SessionNotFoundError("(no active session)");
    return latest;
  }

  /** Project when there is one, global otherwise. */
  defaultScope(): MemoryScope {
    return this.projectRoot ? "project" : "global";
  }

  listActiveSessions(): SessionData[] {
    return SessionTracker.listActiveSessions(this.sessionsRoot(), this.logger);
  }

  /**
   * Persist a session as a memory entry: Markdown content blob under
   * memory/sessions/, plus an `add` log operation. Compacts the index when
   * the pending log reaches the configured threshold.
   */
  saveSessionToMemory(session: SessionTracker, opts: SaveSessionOptions): SaveSessionResult {
    const { root, index } = this.scope(opts.scope);
    const data = session.data;
    const now = this.clock();
    const memoryId = generateMemoryId("session", now);
    const tags = opts.tags ?? [];

    const base = `${isoDate(data.started)}-${slugifyTask(data.task) || "untitled"}`;
    let fileName = `${base}.md`;
    if (fs.existsSync(path.join(root, "memory", "sessions", fileName))) {
      fileName = `${base}-${memoryId.split("-").pop()}.md`;
    }
    const contentFile = path.join(root, "memory", "sessions", fileName);

    let markdown = session.toMarkdown();
    if (opts.summary) markdown = `## Summary\n${opts.summary}\n\n${markdown}`;
    ensureDir(path.dirname(contentFile));
    fs.writeFileSync(contentFile, markdown);

    const entry = createMemoryEntry({
      id: memoryId,
      type: opts.type ?? "session",
      scope: opts.scope,
      file: `sessions/${fileName}`,
      title: data.task || "Untitled Session",
      created: data.started,
      updated: now.toISOString(),
      tags,
      summary: opts.summary ?? "",
      keywords: extractKeywords(data),
      triggers: extractTriggers(data, tags),
      files_modified: [...data.files_modified],
      decisions: data.decisions.map((d) => d.decision),
    });

    index.addMemory(entry, session.sessionId);

    let rebuilt = false;
    const rebuildCfg = this.config.memory.indexRebuild;
    if (rebuildCfg.strategy === "threshold" && index.shouldRebuild(rebuildCfg.thresholdEntries)) {
      rebuilt = this.tryRebuild(index);
    }

    return { entry, contentFile, rebuilt };
  }

  // --- Queries ---

  listMemories(scope?: MemoryScope): MemoryEntry[] {
    const handles = scope ? [this.scope(scope)] : this.scopes();
    return handles.flatMap((h) => h.index.readIndex(true).memories);
  }

  /** Search one or both scopes; an id present in both is reported once. */
  searchMemory(query = "", opts: Omit<SearchOptions, "query"> & { scope?: MemoryScope } = {}): MemoryEntry[] {
    const handles = opts.scope ? [this.scope(opts.scope)] : this.scopes();
    const seen = new Set<string>();
    const results: MemoryEntry[] = [];
    for (const h of handles) {
      for (const m of searchMemories(h.index.readIndex(true).memories, { ...opts, query })) {
        if (seen.has(m.id)) continue;
        seen.add(m.id);
        results.push(m);
      }
    }
    return results;
  }

  getMemory(memoryId: string): MemoryEntry | null {
    return this.locate(memoryId)?.entry ?? null;
  }

  /** Absolute path of an entry's content blob. */
  contentPath(entry: MemoryEntry): string {
    const root = this.scopes().find((h) => h.scope === entry.scope)?.root ?? this.globalRoot;
    return path.join(root, "memory", entry.file);
  }

  /**
   * Count an access and append the whole new value as an update. Returns
   * null when no scope holds the id.
   */
  recordMemoryAccess(memoryId: string, query = ""): MemoryEntry | null {
    const found = this.locate(memoryId);
    if (!found) return null;
    const updated = recordAccess(found.entry, query, this.clock());
    found.handle.index.updateMemory(memoryId, updated, ACCESS_TRACKER_SESSION);
    return updated;
  }

  // --- Maintenance ---

  rebuildIndex(scope: MemoryScope, opts: RebuildOptions = {}): RebuildResult {
    return this.indexFor(scope).rebuildIndex(opts);
  }

  manifestFor(scope: MemoryScope): ManifestStore {
    return new ManifestStore(this.scope(scope).root, scope, { clock: this.clock });
  }

  rebuildManifest(scope: MemoryScope): Manifest {
    return this.manifestFor(scope).rebuild(this.indexFor(scope).readIndex(true));
  }

  /**
   * Rewrite the Current Work section of CLAUDE.md from the active sessions.
   * Project sessions win; global ones are shown in the global CLAUDE.md
   * when the project has none.
   * Returns the file written, or null when there is no CLAUDE.md to update.
   */
  updateCurrentWork(): string | null {
    let sessions: SessionData[] = [];
    let target: string | null = null;
    let label = "Global";

    if (this.projectRoot && fs.existsSync(this.projectRoot)) {
      sessions = SessionTracker.listActiveSessions(this.projectRoot, this.logger);
      target = path.join(this.projectRoot, "CLAUDE.md");
      label = "Project";
    }
    if (sessions.length === 0) {
      const global = SessionTracker.listActiveSessions(this.globalRoot, this.logger);
      if (global.length > 0 || !target) {
        sessions = global;
        target = path.join(this.globalRoot, "CLAUDE.md");
        label = "Global";
      }
    }
    if (!target || !fs.existsSync(target)) return null;

    const content = fs.readFileSync(target, "utf-8");
    fs.writeFileSync(target, replaceCurrentWork(content, renderCurrentWork(sessions, label)));
    return target;
  }

  /**
   * Detect skill candidates per scope, flag the related entries through
   * update operations, and write skills/candidates.md.
   */
  flagSkillCandidates(scope?: MemoryScope, opts: Omit<DetectOptions, "now"> = {}): SkillCandidate[] {
    const handles = scope ? [this.scope(scope)] : this.scopes();
    const all: SkillCandidate[] = [];
    const now = this.clock();

    for (const h of handles) {
      const memories = h.index.readIndex(true).memories;
      const { candidates, flagged } = detectAndFlag(memories, { ...opts, now });
      for (const m of flagged) h.index.updateMemory(m.id, m, SKILL_ANALYZER_SESSION);

      const report = path.join(h.root, "skills", "candidates.md");
      ensureDir(path.dirname(report));
      fs.writeFileSync(report, renderSkillReport(candidates, now));
      all.push(...candidates);
    }
    return all;
  }

  // --- Internals ---

  private locate(memoryId: string): { entry: MemoryEntry; handle: ScopeHandle } | null {
    for (const handle of this.scopes()) {
      const entry = findMemoryById(handle.index.readIndex(true).memories, memoryId);
      if (entry) return { entry, handle };
    }
    return null;
  }

  /**
   * Compaction after a save. The save itself is already committed to the
   * log, so a compaction that cannot run only warns.
   */
  private tryRebuild(index: IndexManager): boolean {
    try {
      index.rebuildIndex();
      return true;
    } catch (e) {
      if (!(e instanceof MemoryError)) throw e;
      this.logger.warn(`Skipped index compaction: ${e.message}`);
      return false;
    }
  }
}
