/**
 * How much of the assistant's context the memory system costs. CLAUDE.md
 * files are loaded into every conversation; manifests and memory content
 * only on demand.
 */

import * as fs from "fs";
import * as path from "path";
import { estimateTokens } from "./manifest";
import type { MemoryManager } from "./memory";
import { MemoryScope } from "./types";

export const DEFAULT_CONTEXT_LIMIT = 200_000;
export const DEFAULT_MEMORY_BUDGET = 5_000;

export type ScopeCounts = Record<MemoryScope, number> & { total: number };

export interface ContextReport {
  contextLimit: number;
  memoryBudget: number;
  /** Tokens of the CLAUDE.md files */
  claudeMd: ScopeCounts;
  /** Tokens of the manifest files */
  manifests: ScopeCounts;
  /** Memory counts, from the manifests */
  memories: ScopeCounts;
  /** Content size of all memories, from the manifests */
  memoryTokens: number;
}

export interface ContextReportOptions {
  contextLimit?: number;
  memoryBudget?: number;
}

function fileTokens(file: string): number {
  try {
    return estimateTokens(fs.readFileSync(file, "utf-8"));
  } catch {
    return 0;
  }
}

function zero(): ScopeCounts {
  return { global: 0, project: 0, total: 0 };
}

export function buildContextReport(manager: MemoryManager, opts: ContextReportOptions = {}): ContextReport {
  const claudeMd = zero();
  const manifests = zero();
  const memories = zero();
  let memoryTokens = 0;

  for (const { scope, root } of manager.scopes()) {
    const store = manager.manifestFor(scope);
    claudeMd[scope] = fileTokens(path.join(root, "CLAUDE.md"));
    manifests[scope] = store.estimateTokens();
    const stats = store.load()?.stats;
    memories[scope] = stats?.total_memories ?? 0;
    memoryTokens += stats?.total_tokens ?? 0;
  }
  for (const counts of [claudeMd, manifests, memories]) counts.total = counts.global + counts.project;

  return {
    contextLimit: opts.contextLimit ?? DEFAULT_CONTEXT_LIMIT,
    memoryBudget: opts.memoryBudget ?? DEFAULT_MEMORY_BUDGET,
    claudeMd,
    manifests,
    memories,
    memoryTokens,
  };
}

export type BudgetStatus = "over" | "warning" | "ok";

/** Judged on what is always loaded, the CLAUDE.md files. */
export function budgetStatus(report: ContextReport): BudgetStatus {
  const loaded = report.claudeMd.total;
  if (loaded > report.memoryBudget) return "over";
  if (loaded > report.memoryBudget * 0.5) return "warning";
  return "ok";
}

function percent(part: number, whole: number, digits: number): string {
  return whole > 0 ? ((part / whole) * 100).toFixed(digits) : (0).toFixed(digits);
}

const n = (value: number) => value.toLocaleString("en-US");

export function renderContextReport(report: ContextReport): string {
  const { claudeMd, manifests, memories, memoryBudget } = report;
  const loaded = claudeMd.total;

  const lines = [
    "Memory System Context Usage",
    "",
    "Context Budget:",
    `  Total limit: ${n(report.contextLimit)} tokens`,
    `  Memory budget: ${n(memoryBudget)} tokens (${percent(memoryBudget, report.contextLimit, 1)}%)`,
    "",
    `Always Loaded: ${n(loaded)} tokens (${percent(loaded, memoryBudget, 1)}% of budget)`,
    "",
    "Breakdown:",
    `  CLAUDE.md files (always loaded): ${n(claudeMd.total)} tokens`,
    `    Global: ${n(claudeMd.global)}`,
    `    Project: ${n(claudeMd.project)}`,
    `  Manifest files (on demand): ${n(manifests.total)} tokens`,
    `    Global: ${n(manifests.global)}`,
    `    Project: ${n(manifests.project)}`,
    "",
    "Memory Catalog:",
    `  Total memories: ${memories.total}`,
    `    Global: ${memories.global}`,
    `    Project: ${memories.project}`,
    `  Total content size: ~${n(report.memoryTokens)} tokens (loaded on demand)`,
    "",
  ];

  switch (budgetStatus(report)) {
    case "over":
      lines.push("Always-loaded overhead exceeds budget", `  Over by: ${n(loaded - memoryBudget)} tokens`);
      break;
    case "warning":
      lines.push(
        `Always-loaded files use ${percent(loaded, memoryBudget, 0)}% of budget`,
        "  Consider trimming CLAUDE.md"
      );
      break;
    case "ok":
      lines.push("Well within memory budget", `  ${n(memoryBudget - loaded)} tokens available for on-demand loading`);
      break;
  }
  return lines.join("\n");
}
