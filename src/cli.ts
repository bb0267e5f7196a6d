#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { parseArgs } from "util";
import {
  calculateOverview,
  calculateTagStats,
  formatRelativeTime,
  groupByMonth,
  rankTags,
  runHealthCheck,
  CheckResult,
} from "./analytics";
import { setDebugFlag } from "./config";
import { DEFAULT_MEMORY_BUDGET, buildContextReport, renderContextReport } from "./context";
import { MemoryNotFoundError, toErrorMessage } from "./errors";
import { EXPORT_FORMATS, exportMemories, isExportFormat } from "./export";
import { c, err, heading, ok, skip, warn } from "./log";
import { MemoryManager } from "./memory";
import { runStdioServer } from "./server";
import { SessionTracker, TRACK_KINDS, TrackKind } from "./session";
import { MemoryEntry, MemoryScope, MemoryScopeSchema, MemoryType, MemoryTypeSchema } from "./types";
import { truncate } from "./utils";

const PACKAGE_DIR = path.resolve(__dirname, "..");

const OPTIONS = {
  scope: { type: "string" },
  tags: { type: "string" },
  type: { type: "string" },
  summary: { type: "string" },
  session: { type: "string" },
  rationale: { type: "string" },
  alternatives: { type: "string" },
  solution: { type: "string" },
  query: { type: "string" },
  limit: { type: "string" },
  hours: { type: "string" },
  days: { type: "string" },
  "min-count": { type: "string" },
  "min-occurrences": { type: "string" },
  dir: { type: "string" },
  format: { type: "string" },
  out: { type: "string" },
  budget: { type: "string" },
  force: { type: "boolean" },
  archive: { type: "boolean" },
  keep: { type: "boolean" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "v" },
} as const;

type Values = ReturnType<typeof parse>["values"];

function parse(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

class UsageError extends Error {}

// --- Argument Helpers ---

function splitList(value: string | undefined): string[] {
  return value ? value.split(",").map((t) => t.trim()).filter(Boolean) : [];
}

function intOption(value: string | undefined, fallback: number, flag: string): number {
  if (value === undefined) return fallback;
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n) || n < 0) throw new UsageError(`--${flag} expects a non-negative number`);
  return n;
}

function scopeOption(value: string | undefined): MemoryScope | undefined {
  if (value === undefined) return undefined;
  const parsed = MemoryScopeSchema.safeParse(value);
  if (!parsed.success) throw new UsageError(`--scope must be global or project`);
  return parsed.data;
}

/** "both" (or nothing) means every available scope. */
function scopesOption(manager: MemoryManager, value: string | undefined): MemoryScope[] {
  if (value === undefined || value === "both") return manager.scopes().map((h) => h.scope);
  const scope = scopeOption(value);
  return scope ? [scope] : [];
}

function typeOption(value: string | undefined): MemoryType | undefined {
  if (value === undefined) return undefined;
  const parsed = MemoryTypeSchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`--type must be one of ${MemoryTypeSchema.options.join(", ")}`);
  }
  return parsed.data;
}

function requireText(words: string[], usage: string): string {
  const joined = words.join(" ").trim();
  if (!joined) throw new UsageError(`Usage: smem ${usage}`);
  return joined;
}

function memoryLine(m: MemoryEntry): void {
  const tags = m.tags.length ? ` ${c.dim}[${m.tags.join(", ")}]${c.reset}` : "";
  const accessed = m.access.count ? ` ${c.gray}(${m.access.count}×)${c.reset}` : "";
  console.log(`  ${c.cyan}${m.type}${c.reset} ${m.title}${tags}${accessed}`);
  console.log(`  ${c.gray}${m.id} · ${m.scope} · ${formatRelativeTime(m.created)}${c.reset}`);
  console.log("");
}

function bar(value: number, max: number, width = 20): string {
  return max === 0 ? "" : "█".repeat(Math.floor((value / max) * width));
}

// --- Commands ---

function cmdInit(manager: MemoryManager) {
  heading("smem init");
  manager.initialize();
  ok(`Global memory at ${manager.globalRoot}`);
  if (manager.projectRoot) {
    ok(`Project memory at ${manager.projectRoot}`);
  } else {
    skip("Not in a project directory; project memory skipped");
  }
  console.log("");
}

function cmdStart(manager: MemoryManager, words: string[]) {
  const session = manager.createSession();
  const task = words.join(" ").trim();
  if (task) session.updateTask(task);
  manager.updateCurrentWork();

  ok(`Started session: ${c.bold}${session.sessionId}${c.reset}`);
  if (task) console.log(`    Task: ${task}`);
  console.log(`    Tracking at: ${c.dim}${session.sessionFile}${c.reset}`);
}

function cmdTrack(manager: MemoryManager, words: string[], values: Values) {
  const [kindArg, ...rest] = words;
  const kind = TRACK_KINDS.find((k) => k === kindArg);
  if (!kind) throw new UsageError(`Usage: smem track <${TRACK_KINDS.join("|")}> <text>`);

  const session = manager.resolveSession(values.session);
  const details = {
    rationale: values.rationale,
    alternatives: splitList(values.alternatives),
    solution: values.solution,
  };

  // Several files may be tracked at once
  const items: string[] = kind === "file" ? rest : [requireText(rest, `track ${kind} <text>`)];
  if (items.length === 0) throw new UsageError("Usage: smem track file <path>...");
  for (const item of items) session.track(kind, item, details);

  manager.updateCurrentWork();
  ok(`${describeTrack(kind)} in ${session.sessionId}`);
}

function describeTrack(kind: TrackKind): string {
  switch (kind) {
    case "task": return "Updated task";
    case "file": return "Tracked file";
    case "decision": return "Recorded decision";
    case "problem": return "Recorded problem";
    case "note": return "Added note";
    case "todo": return "Added todo";
    case "done": return "Completed todo";
  }
}

function cmdSave(manager: MemoryManager, values: Values) {
  const session = manager.resolveSession(values.session);
  const explicit = scopeOption(values.scope);
  const scope = explicit ?? manager.defaultScope();
  if (!explicit) skip(`Auto-selected scope: ${scope}`);

  const { entry, rebuilt } = manager.saveSessionToMemory(session, {
    scope,
    type: typeOption(values.type),
    tags: splitList(values.tags),
    summary: values.summary,
  });

  ok(`Saved session to ${scope} memory`);
  console.log(`    Memory ID: ${entry.id}`);
  console.log(`    Title: ${entry.title}`);
  console.log(`    File: ${entry.file}`);
  if (rebuilt) ok(`Compacted ${scope} index`);

  if (!values.keep) {
    session.archive();
    ok(`Archived session: ${session.sessionId}`);
  }
  manager.updateCurrentWork();
}

function cmdSearch(manager: MemoryManager, words: string[], values: Values) {
  const query = requireText(words, "search <query>");
  const results = manager
    .searchMemory(query, {
      tags: splitList(values.tags),
      type: typeOption(values.type),
      scope: scopeOption(values.scope),
    })
    .slice(0, intOption(values.limit, 10, "limit"));

  if (results.length === 0) {
    console.log(`  No memories matching "${query}".`);
    return;
  }

  heading(`${results.length} results for "${query}"`);
  for (const m of results) memoryLine(m);
}

function cmdShow(manager: MemoryManager, words: string[], values: Values) {
  const id = requireText(words, "show <memory-id>");
  const m = manager.recordMemoryAccess(id, values.query ?? "");
  if (!m) throw new MemoryNotFoundError(id);

  heading(m.title);
  console.log(`  ${c.bold}ID:${c.reset}        ${m.id}`);
  console.log(`  ${c.bold}Type:${c.reset}      ${m.type}`);
  console.log(`  ${c.bold}Scope:${c.reset}     ${m.scope}`);
  console.log(`  ${c.bold}Created:${c.reset}   ${m.created}`);
  console.log(`  ${c.bold}Updated:${c.reset}   ${m.updated}`);
  console.log(`  ${c.bold}Tags:${c.reset}      ${m.tags.join(", ")}`);
  console.log(`  ${c.bold}Keywords:${c.reset}  ${m.keywords.join(", ")}`);
  console.log(`  ${c.bold}Triggers:${c.reset}  ${m.triggers.join(", ")}`);
  if (m.summary) console.log(`\n  ${m.summary}`);

  if (m.files_modified.length) {
    console.log(`\n  ${c.bold}Files Modified:${c.reset}`);
    for (const f of m.files_modified) console.log(`    - ${f}`);
  }
  if (m.decisions.length) {
    console.log(`\n  ${c.bold}Decisions:${c.reset}`);
    for (const d of m.decisions) console.log(`    - ${d}`);
  }

  console.log(`\n  ${c.bold}Access Count:${c.reset} ${m.access.count}`);
  const info = manager.manifestFor(m.scope).getMemoryInfo(m.id);
  if (info) console.log(`  ${c.bold}Size:${c.reset} ~${info.size_tokens} tokens`);
  console.log(`  ${c.bold}Content:${c.reset} ${c.dim}${manager.contentPath(m)}${c.reset}\n`);
}

function cmdSessions(manager: MemoryManager) {
  const sessions = manager.listActiveSessions();
  if (sessions.length === 0) {
    console.log("  No active sessions.");
    return;
  }

  heading(`${sessions.length} active sessions`);
  for (const s of sessions) {
    console.log(`  ${c.bold}${s.session_id}${c.reset}`);
    console.log(`    Task: ${s.task || "N/A"}`);
    console.log(`    Started: ${s.started} ${c.gray}(updated ${formatRelativeTime(s.last_updated)})${c.reset}`);
    console.log(`    ${s.files_modified.length} files, ${s.decisions.length} decisions, ${s.todos.length} todos`);
    console.log("");
  }
}

function cmdCleanupSessions(manager: MemoryManager, values: Values) {
  const hours = intOption(values.hours, manager.config.sessions.staleHours, "hours");
  let found = 0;

  for (const { root } of manager.scopes()) {
    const stale = SessionTracker.cleanupStaleSessions(root, hours);
    if (stale.length === 0) continue;
    found += stale.length;

    heading(`${stale.length} stale sessions in ${root}`);
    for (const id of stale) {
      if (values.archive) {
        const target = SessionTracker.open(root, id).archive();
        ok(`${id} → ${path.basename(target)}`);
      } else {
        warn(id);
      }
    }
  }

  if (found === 0) {
    ok(`No sessions idle for ${hours}h or more`);
  } else if (!values.archive) {
    console.log(`\n  Run with ${c.bold}--archive${c.reset} to archive them.\n`);
  }
}

function cmdRebuildIndex(manager: MemoryManager, values: Values) {
  const scope = scopeOption(values.scope) ?? manager.defaultScope();
  const result = manager.rebuildIndex(scope, { force: values.force, owner: "smem" });

  if (result.quarantined) warn(`Corrupt snapshot moved to ${result.quarantined}`);
  for (const name of result.invalid) warn(`Set aside unparseable log file ${name}`);
  ok(`Rebuilt ${scope} index: ${result.index.memories.length} memories, ${result.compacted} log entries compacted`);
}

function cmdRebuildManifest(manager: MemoryManager, values: Values) {
  for (const scope of scopesOption(manager, values.scope)) {
    const manifest = manager.rebuildManifest(scope);
    ok(`Rebuilt ${scope} manifest (${manifest.stats.total_memories} memories, ~${manifest.stats.total_tokens} tokens)`);
  }
}

function cmdStats(manager: MemoryManager, values: Values) {
  const memories = manager.listMemories(scopeOption(values.scope));
  const o = calculateOverview(memories);

  heading("Memory stats");
  console.log(`  ${c.bold}Total memories:${c.reset} ${o.total}`);
  console.log(`  ${c.bold}Total accesses:${c.reset} ${o.totalAccesses}`);
  for (const [scope, n] of Object.entries(o.byScope)) console.log(`  ${c.bold}${scope}:${c.reset} ${n}`);

  if (Object.keys(o.byType).length) {
    console.log(`\n  ${c.bold}By type:${c.reset}`);
    for (const [type, n] of Object.entries(o.byType)) console.log(`    ${type}: ${n}`);
  }

  if (o.mostAccessed.length) {
    console.log(`\n  ${c.bold}Most accessed:${c.reset}`);
    for (const m of o.mostAccessed.slice(0, 5)) {
      console.log(`    ${String(m.access.count).padStart(4)}  ${truncate(m.title, 60)}`);
    }
  }

  if (o.neverAccessed.length) {
    console.log(`\n  ${c.bold}Never accessed:${c.reset} ${o.neverAccessed.length}`);
    for (const m of o.neverAccessed.slice(0, 5)) {
      console.log(`    ${c.gray}${formatRelativeTime(m.created).padEnd(10)}${c.reset} ${truncate(m.title, 60)}`);
    }
  }

  const weeks = Object.entries(o.byWeek);
  if (weeks.length) {
    const max = Math.max(...weeks.map(([, w]) => w.count));
    console.log(`\n  ${c.bold}Activity (last 13 weeks):${c.reset}`);
    for (const [week, w] of weeks.sort((a, b) => a[0].localeCompare(b[0], undefined, { numeric: true }))) {
      console.log(`    ${week.padEnd(8)} ${c.green}${bar(w.count, max)}${c.reset} ${w.count}`);
    }
  }

  for (const { scope, index } of manager.scopes()) {
    const pending = index.logCount();
    if (pending) console.log(`\n  ${c.gray}${scope}: ${pending} pending log entries${c.reset}`);
  }
  console.log("");
}

function cmdTimeline(manager: MemoryManager, values: Values) {
  const months = groupByMonth(manager.listMemories(scopeOption(values.scope)));
  if (months.size === 0) {
    console.log("  No memories yet.");
    return;
  }

  let shown = 0;
  const limit = intOption(values.limit, 50, "limit");
  for (const [month, entries] of months) {
    heading(month);
    for (const m of entries.sort((a, b) => b.created.localeCompare(a.created))) {
      if (shown++ >= limit) return;
      console.log(`  ${c.gray}${m.created.slice(0, 10)}${c.reset} ${c.cyan}${m.type.padEnd(14)}${c.reset} ${truncate(m.title, 60)}`);
    }
  }
  console.log("");
}

function cmdTags(manager: MemoryManager, values: Values) {
  const stats = calculateTagStats(manager.listMemories(scopeOption(values.scope)));
  const ranked = rankTags(stats, intOption(values["min-count"], 1, "min-count"));
  if (ranked.length === 0) {
    console.log("  No tags yet.");
    return;
  }

  heading(`${ranked.length} tags`);
  const max = ranked[0][1];
  for (const [tag, n] of ranked) {
    const avg = (stats.averageAccess.get(tag) ?? 0).toFixed(1);
    const related = [...(stats.coOccurrence.get(tag) ?? new Map<string, number>()).entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, 3)
      .map(([t]) => t);
    const relatedStr = related.length ? ` ${c.dim}↔ ${related.join(", ")}${c.reset}` : "";
    console.log(`  ${tag.padEnd(20)} ${c.magenta}${bar(n, max)}${c.reset} ${n} ${c.gray}(avg ${avg} accesses)${c.reset}${relatedStr}`);
  }
  console.log("");
}

function printCheck(name: string, check: CheckResult) {
  if (check.status === "OK") {
    ok(name);
    return;
  }
  const print = check.status === "ERROR" ? err : warn;
  print(`${name}: ${check.status}`);
  for (const issue of check.issues) console.log(`      ${c.gray}${issue}${c.reset}`);
}

function cmdHealth(manager: MemoryManager, values: Values) {
  const report = runHealthCheck(manager, { staleDays: intOption(values.days, 180, "days") });

  heading("Memory health");
  printCheck("Index integrity", report.indexIntegrity);
  printCheck("Session files", report.sessionFiles);
  printCheck("Markdown archives", report.markdownArchives);

  console.log("");
  console.log(`  ${c.bold}Untagged:${c.reset}        ${report.untagged.length}`);
  console.log(`  ${c.bold}Never accessed:${c.reset}  ${report.neverAccessed.length}`);
  console.log(`  ${c.bold}Stale:${c.reset}           ${report.stale.length}`);
  console.log(`  ${c.bold}Possible duplicates:${c.reset} ${report.duplicates.length}`);
  for (const d of report.duplicates.slice(0, 10)) {
    console.log(`    ${c.gray}${Math.round(d.similarity * 100)}%${c.reset} ${d.first.id} ↔ ${d.second.id}`);
  }
  console.log("");
}

function cmdAnalyzeSkills(manager: MemoryManager, values: Values) {
  const candidates = manager.flagSkillCandidates(scopeOption(values.scope), {
    minOccurrences: intOption(values["min-occurrences"], 3, "min-occurrences"),
    withinDays: intOption(values.days, 90, "days"),
  });

  if (candidates.length === 0) {
    skip("No skill candidates detected");
    return;
  }

  heading(`${candidates.length} skill candidates`);
  for (const cand of candidates) {
    console.log(`  ${c.cyan}${cand.confidence}${c.reset} ${cand.name} ${c.gray}(${cand.occurrences}×, ${cand.kind})${c.reset}`);
    console.log(`    Suggested skill: ${c.bold}${cand.suggestedSkillName}${c.reset}`);
  }
  console.log(`\n  Report written to skills/candidates.md\n`);
}

function cmdContext(manager: MemoryManager, values: Values) {
  const report = buildContextReport(manager, {
    memoryBudget: intOption(values.budget, DEFAULT_MEMORY_BUDGET, "budget"),
  });
  console.log("");
  for (const line of renderContextReport(report).split("\n")) console.log(`  ${line}`);
  console.log("");
}

function cmdDebug(manager: MemoryManager, words: string[]) {
  const [action = "status"] = words;
  switch (action) {
    case "on":
    case "off":
      setDebugFlag(manager.globalRoot, action === "on");
      ok(`Debug output ${action}`);
      return;
    case "status": {
      const fromEnv = process.env.SESSION_MEMORY_DEBUG;
      console.log(`  Debug output: ${manager.config.debug ? "on" : "off"} ${c.gray}(config)${c.reset}`);
      if (fromEnv) console.log(`  SESSION_MEMORY_DEBUG=${fromEnv}`);
      return;
    }
    default:
      throw new UsageError("Usage: smem debug on|off|status");
  }
}

function cmdExport(manager: MemoryManager, values: Values) {
  const format = values.format ?? "json";
  if (!isExportFormat(format)) throw new UsageError(`--format must be one of ${EXPORT_FORMATS.join(", ")}`);

  const memories = manager.listMemories(scopeOption(values.scope));
  const content = exportMemories(memories, format);
  if (!values.out) {
    process.stdout.write(content);
    return;
  }
  const file = path.resolve(values.out);
  fs.writeFileSync(file, content);
  ok(`Exported ${memories.length} memories to ${file}`);
}

function cmdUpdateCurrentWork(manager: MemoryManager) {
  const file = manager.updateCurrentWork();
  if (file) ok(`Updated ${file}`);
  else skip("No CLAUDE.md to update; run 'smem init' first");
}

// --- Help ---

function printHelp() {
  console.log(`
${c.bold}${c.magenta}smem${c.reset} — session tracking and long-term memory for coding assistants

${c.bold}USAGE${c.reset}
  smem <command> [options]

${c.bold}COMMANDS${c.reset}
  ${c.cyan}init${c.reset}                        Create global (and project) memory directories
  ${c.cyan}start${c.reset} [task]                 Start a new session
  ${c.cyan}track${c.reset} <kind> <text>          Record task|file|decision|problem|note|todo|done
  ${c.cyan}save${c.reset}                        Save a session to memory and archive it
  ${c.cyan}search${c.reset} <query>               Search memories
  ${c.cyan}show${c.reset} <id>                    Show one memory (counts as an access)
  ${c.cyan}sessions${c.reset}                    List active sessions
  ${c.cyan}cleanup-sessions${c.reset}            Find (and --archive) idle sessions
  ${c.cyan}rebuild-index${c.reset}               Compact the pending log into the snapshot
  ${c.cyan}rebuild-manifest${c.reset}            Regenerate the summary manifest
  ${c.cyan}stats${c.reset}                       Counts, access and activity overview
  ${c.cyan}timeline${c.reset}                    Memories by month
  ${c.cyan}tags${c.reset}                        Tag frequency and co-occurrence
  ${c.cyan}health${c.reset}                      Integrity and hygiene checks
  ${c.cyan}analyze-skills${c.reset}              Detect recurring work worth a skill
  ${c.cyan}update-current-work${c.reset}         Refresh the Current Work section of CLAUDE.md
  ${c.cyan}context${c.reset}                     Token cost of CLAUDE.md and manifests against a budget
  ${c.cyan}debug${c.reset} on|off|status          Toggle debug output in the global config
  ${c.cyan}export${c.reset}                      Export memories as json, markdown or csv
  ${c.cyan}serve${c.reset}                       Run the MCP server over stdio
  ${c.cyan}help${c.reset}                        Show this help

${c.bold}OPTIONS${c.reset}
  --scope global|project     Scope to act on (rebuild-manifest also takes "both")
  --session <id>             Session to use (default: most recently updated)
  --tags a,b                 Comma-separated tags
  --type <type>              session|decision|implementation|pattern
  --summary <text>           Summary stored with a saved session
  --rationale <text>         For track decision
  --alternatives a,b         For track decision
  --solution <text>          For track problem
  --force                    rebuild-index: set a corrupt snapshot aside
  --keep                     save: leave the session active
  --archive                  cleanup-sessions: archive what is found
  --format json|markdown|csv  export: output format (default json)
  --out <file>               export: write to a file instead of stdout
  --budget <tokens>          context: memory budget (default 5000)
  --hours, --days, --limit, --min-count, --min-occurrences
  --dir <path>               Working directory (default: cwd)

${c.bold}EXAMPLES${c.reset}
  ${c.dim}# Track a piece of work${c.reset}
  smem start "Fix login bug in auth service"
  smem track file src/auth/login.ts
  smem track decision "Use JWT" --rationale "Stateless" --alternatives "sessions,cookies"
  smem save --tags auth,bugfix --summary "Token refresh fixed"

  ${c.dim}# Find it later${c.reset}
  smem search auth
`);
}

function printVersion() {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(PACKAGE_DIR, "package.json"), "utf-8"));
  const version = pkg && typeof pkg === "object" && "version" in pkg ? String(pkg.version) : "unknown";
  console.log(`smem v${version}`);
}

// --- Main ---

async function main() {
  const { values, positionals } = parse(process.argv.slice(2));
  const [command, ...words] = positionals;

  if (values.version) return printVersion();
  if (values.help || command === "help") return printHelp();
  if (command === "version") return printVersion();
  if (!command) return printHelp();

  const manager = new MemoryManager({
    workingDir: values.dir ? path.resolve(values.dir) : process.cwd(),
  });

  switch (command) {
    case "init":
      return cmdInit(manager);
    case "start":
      return cmdStart(manager, words);
    case "track":
      return cmdTrack(manager, words, values);
    case "save":
      return cmdSave(manager, values);
    case "search":
      return cmdSearch(manager, words, values);
    case "show":
      return cmdShow(manager, words, values);
    case "sessions":
      return cmdSessions(manager);
    case "cleanup-sessions":
      return cmdCleanupSessions(manager, values);
    case "rebuild-index":
      return cmdRebuildIndex(manager, values);
    case "rebuild-manifest":
      return cmdRebuildManifest(manager, values);
    case "stats":
      return cmdStats(manager, values);
    case "timeline":
      return cmdTimeline(manager, values);
    case "tags":
      return cmdTags(manager, values);
    case "health":
      return cmdHealth(manager, values);
    case "analyze-skills":
      return cmdAnalyzeSkills(manager, values);
    case "update-current-work":
      return cmdUpdateCurrentWork(manager);
    case "context":
      return cmdContext(manager, values);
    case "debug":
      return cmdDebug(manager, words);
    case "export":
      return cmdExport(manager, values);
    case "serve":
      manager.initialize();
      return runStdioServer(manager);
    default:
      err(`Unknown command: ${command}`);
      console.log(`  Run ${c.bold}smem help${c.reset} for usage.\n`);
      process.exit(1);
  }
}

main().catch((e: unknown) => {
  err(toErrorMessage(e));
  process.exit(1);
});
