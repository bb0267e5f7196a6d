import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ContextReport, budgetStatus, buildContextReport, renderContextReport } from "../src/context";
import { silentLogger } from "../src/log";
import { MemoryManager } from "../src/memory";
import { makeEntry, makeTempDir, removeDir, steppingClock } from "./helpers";

function reportWith(alwaysLoaded: number): ContextReport {
  return {
    contextLimit: 200_000,
    memoryBudget: 5_000,
    claudeMd: { global: 100, project: alwaysLoaded - 100, total: alwaysLoaded },
    manifests: { global: 40, project: 1200, total: 1240 },
    memories: { global: 0, project: 3, total: 3 },
    memoryTokens: 12345,
  };
}

describe("buildContextReport", () => {
  let base: string;
  let manager: MemoryManager;

  beforeEach(() => {
    base = makeTempDir("context");
    const home = path.join(base, "home");
    const project = path.join(base, "work", "app");
    fs.mkdirSync(home, { recursive: true });
    fs.mkdirSync(path.join(project, ".git"), { recursive: true });

    manager = new MemoryManager({
      workingDir: project,
      home,
      globalRoot: path.join(home, ".claude"),
      clock: steppingClock("2024-03-05T08:30:00.000Z", 1000),
      logger: silentLogger,
    });
    manager.initialize();
    fs.writeFileSync(path.join(manager.globalRoot, "CLAUDE.md"), "g".repeat(400));
    fs.writeFileSync(path.join(manager.scope("project").root, "CLAUDE.md"), "p".repeat(2000));
  });

  afterEach(() => {
    removeDir(base);
  });

  it("counts the CLAUDE.md files and no manifests before one is built", () => {
    expect(buildContextReport(manager)).toEqual({
      contextLimit: 200_000,
      memoryBudget: 5_000,
      claudeMd: { global: 100, project: 500, total: 600 },
      manifests: { global: 0, project: 0, total: 0 },
      memories: { global: 0, project: 0, total: 0 },
      memoryTokens: 0,
    });
  });

  it("takes memory counts and sizes from the manifests", () => {
    const root = manager.scope("project").root;
    fs.writeFileSync(path.join(root, "memory", "sessions", "a.md"), "z".repeat(800));
    manager.indexFor("project").addMemory(makeEntry("a"), "s1");
    manager.rebuildManifest("project");
    manager.rebuildManifest("global");

    const report = buildContextReport(manager, { memoryBudget: 1000 });
    const globalManifest = manager.manifestFor("global").estimateTokens();
    const projectManifest = manager.manifestFor("project").estimateTokens();

    expect(projectManifest).toBeGreaterThan(0);
    expect(report.manifests).toEqual({
      global: globalManifest,
      project: projectManifest,
      total: globalManifest + projectManifest,
    });
    expect(report.memories).toEqual({ global: 0, project: 1, total: 1 });
    expect(report.memoryTokens).toBe(200);
    expect(report.memoryBudget).toBe(1000);
  });
});

describe("budgetStatus", () => {
  it.each([
    [2500, "ok"],
    [2501, "warning"],
    [5000, "warning"],
    [5001, "over"],
  ] as const)("%d always-loaded tokens is %s", (loaded, status) => {
    expect(budgetStatus(reportWith(loaded))).toBe(status);
  });
});

describe("renderContextReport", () => {
  it("lays out budget, breakdown and catalog", () => {
    expect(renderContextReport(reportWith(600)).split("\n")).toEqual([
      "Memory System Context Usage",
      "",
      "Context Budget:",
      "  Total limit: 200,000 tokens",
      "  Memory budget: 5,000 tokens (2.5%)",
      "",
      "Always Loaded: 600 tokens (12.0% of budget)",
      "",
      "Breakdown:",
      "  CLAUDE.md files (always loaded): 600 tokens",
      "    Global: 100",
      "    Project: 500",
      "  Manifest files (on demand): 1,240 tokens",
      "    Global: 40",
      "    Project: 1,200",
      "",
      "Memory Catalog:",
      "  Total memories: 3",
      "    Global: 0",
      "    Project: 3",
      "  Total content size: ~12,345 tokens (loaded on demand)",
      "",
      "Well within memory budget",
      "  4,400 tokens available for on-demand loading",
    ]);
  });

  it("warns past half the budget", () => {
    expect(renderContextReport(reportWith(3000)).split("\n").slice(-2)).toEqual([
      "Always-loaded files use 60% of budget",
      "  Consider trimming CLAUDE.md",
    ]);
  });

  it("reports how far over the budget it is", () => {
    expect(renderContextReport(reportWith(5600)).split("\n").slice(-2)).toEqual([
      "Always-loaded overhead exceeds budget",
      "  Over by: 600 tokens",
    ]);
  });
});
