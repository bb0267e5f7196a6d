import * as fs from "fs";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { buildContextReport, renderContextReport } from "./context";
import { toErrorMessage } from "./errors";
import { MemoryManager } from "./memory";
import { TRACK_KINDS, TrackKind } from "./session";
import { MemoryEntry, MemoryScope, MemoryScopeSchema, MemoryType, MemoryTypeSchema } from "./types";

export const SERVER_NAME = "session-memory";
export const SERVER_VERSION = "1.0.0";

export interface ToolResult {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  isError?: boolean;
}

function text(body: string): ToolResult {
  return { content: [{ type: "text", text: body }] };
}

function failure(e: unknown): ToolResult {
  return { content: [{ type: "text", text: `Error: ${toErrorMessage(e)}` }], isError: true };
}

function entryLine(m: MemoryEntry): string {
  const tagStr = m.tags.length ? ` [${m.tags.join(", ")}]` : "";
  return `[${m.id}] (${m.type}/${m.scope}) ${m.title}${tagStr}`;
}

const SCOPE = MemoryScopeSchema.describe("Memory scope: global (all projects) or project (this project only)");
const TYPE = MemoryTypeSchema.describe("Memory type: session, decision, implementation or pattern");

// --- Handlers ---

/**
 * Tool bodies, kept apart from registration so they can be called without
 * a transport. Every handler reports failures as an error result.
 */
export function createToolHandlers(manager: MemoryManager) {
  const guard =
    <A>(fn: (args: A) => string) =>
    async (args: A): Promise<ToolResult> => {
      try {
        return text(fn(args));
      } catch (e) {
        return failure(e);
      }
    };

  return {
    memory_search: guard(
      (a: { query: string; tags?: string[]; type?: MemoryType; scope?: MemoryScope; limit?: number }) => {
        const results = manager
          .searchMemory(a.query, { tags: a.tags, type: a.type, scope: a.scope })
          .slice(0, a.limit ?? 10);
        if (results.length === 0) return `No memories matching "${a.query}".`;
        return `${results.length} results for "${a.query}":\n\n${results.map(entryLine).join("\n")}`;
      }
    ),

    memory_show: guard((a: { id: string; query?: string }) => {
      const m = manager.recordMemoryAccess(a.id, a.query ?? "");
      if (!m) return `Not found: ${a.id}`;
      const file = manager.contentPath(m);
      const body = fs.existsSync(file) ? fs.readFileSync(file, "utf-8") : "(content file missing)";
      return [
        entryLine(m),
        `Created: ${m.created}`,
        `Accessed: ${m.access.count} times`,
        m.summary ? `\n${m.summary}` : "",
        "",
        body,
      ].join("\n");
    }),

    memory_stats: guard((_a: Record<string, never>) => {
      const lines: string[] = [];
      for (const { scope, index } of manager.scopes()) {
        const memories = index.readIndex(true).memories;
        lines.push(
          `${scope}:`,
          `  Total memories: ${memories.length}`,
          `  Total accesses: ${memories.reduce((sum, m) => sum + m.access.count, 0)}`,
          `  Pending log entries: ${index.logCount()}`
        );
      }
      return lines.join("\n");
    }),

    memory_context: guard((a: { budget?: number }) =>
      renderContextReport(buildContextReport(manager, { memoryBudget: a.budget }))
    ),

    memory_rebuild: guard((a: { scope: MemoryScope; force?: boolean }) => {
      const result = manager.rebuildIndex(a.scope, { force: a.force, owner: SERVER_NAME });
      manager.rebuildManifest(a.scope);
      const extra = result.invalid.length ? `, ${result.invalid.length} invalid set aside` : "";
      return `Rebuilt ${a.scope} index: ${result.index.memories.length} memories, ${result.compacted} log entries compacted${extra}.`;
    }),

    session_start: guard((a: { task?: string }) => {
      const session = manager.createSession();
      if (a.task) session.updateTask(a.task);
      manager.updateCurrentWork();
      return `Started session ${session.sessionId}`;
    }),

    session_track: guard(
      (a: {
        kind: TrackKind;
        text: string;
        session_id?: string;
        rationale?: string;
        alternatives?: string[];
        solution?: string;
      }) => {
        const session = manager.resolveSession(a.session_id);
        session.track(a.kind, a.text, {
          rationale: a.rationale,
          alternatives: a.alternatives,
          solution: a.solution,
        });
        manager.updateCurrentWork();
        return `Tracked ${a.kind} in ${session.sessionId}`;
      }
    ),

    session_save: guard(
      (a: { session_id?: string; scope?: MemoryScope; type?: MemoryType; tags?: string[]; summary?: string }) => {
        const session = manager.resolveSession(a.session_id);
        const scope = a.scope ?? manager.defaultScope();
        const { entry } = manager.saveSessionToMemory(session, {
          scope,
          type: a.type,
          tags: a.tags,
          summary: a.summary,
        });
        session.archive();
        manager.updateCurrentWork();
        return `Saved ${session.sessionId} to ${scope} memory as ${entry.id}`;
      }
    ),

    manifest_lookup: guard((a: { query?: string; tags?: string[]; scope?: MemoryScope }) => {
      const scopes = a.scope ? [a.scope] : manager.scopes().map((h) => h.scope);
      const hits = scopes.flatMap((s) => manager.manifestFor(s).search(a.query ?? "", a.tags ?? []));
      if (hits.length === 0) return "No manifest entries found.";
      return hits
        .map((e) => `[${e.id}] (${e.type}/${e.scope}) ${e.title} ~${e.size_tokens} tokens`)
        .join("\n");
    }),
  };
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>;

// --- Registration ---

export function createServer(manager: MemoryManager): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const h = createToolHandlers(manager);

  server.tool(
    "memory_search",
    "Search stored memories by keyword across title, summary, keywords and triggers.",
    {
      query: z.string().describe("Search query"),
      tags: z.array(z.string()).optional().describe("Match any of these tags"),
      type: TYPE.optional(),
      scope: SCOPE.optional(),
      limit: z.number().int().positive().optional().describe("Max results (default 10)"),
    },
    h.memory_search
  );

  server.tool(
    "memory_show",
    "Show one memory with its content, and record the access.",
    {
      id: z.string().describe("Memory ID"),
      query: z.string().optional().describe("Search that led here, kept in the access history"),
    },
    h.memory_show
  );

  server.tool("memory_stats", "Memory counts and pending log size per scope.", {}, () => h.memory_stats({}));

  server.tool(
    "memory_context",
    "Token cost of the always-loaded CLAUDE.md files and the manifests, against a memory budget.",
    { budget: z.number().int().positive().optional().describe("Memory budget in tokens (default 5000)") },
    h.memory_context
  );

  server.tool(
    "memory_rebuild",
    "Compact a scope's pending log into its index snapshot and refresh the manifest.",
    {
      scope: SCOPE,
      force: z.boolean().optional().describe("Set a corrupt snapshot aside and rebuild from the log"),
    },
    h.memory_rebuild
  );

  server.tool(
    "session_start",
    "Start tracking a new work session.",
    { task: z.string().optional().describe("What the session is about") },
    h.session_start
  );

  server.tool(
    "session_track",
    "Record activity in a session: task, file, decision, problem, note, todo, or done (completes a todo).",
    {
      kind: z.enum(TRACK_KINDS),
      text: z.string().describe("Task, file path, decision, problem, note or todo text"),
      session_id: z.string().optional().describe("Defaults to the most recently updated session"),
      rationale: z.string().optional(),
      alternatives: z.array(z.string()).optional(),
      solution: z.string().optional(),
    },
    h.session_track
  );

  server.tool(
    "session_save",
    "Save a session to long-term memory and archive it.",
    {
      session_id: z.string().optional(),
      scope: SCOPE.optional(),
      type: TYPE.optional(),
      tags: z.array(z.string()).optional(),
      summary: z.string().optional(),
    },
    h.session_save
  );

  server.tool(
    "manifest_lookup",
    "Look up memories in the lightweight manifest without loading content.",
    {
      query: z.string().optional(),
      tags: z.array(z.string()).optional(),
      scope: SCOPE.optional(),
    },
    h.manifest_lookup
  );

  return server;
}

export async function runStdioServer(manager: MemoryManager): Promise<void> {
  const transport = new StdioServerTransport();
  await createServer(manager).connect(transport);
}
