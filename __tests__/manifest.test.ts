import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ManifestStore, estimateTokens } from "../src/manifest";
import { MemoryIndex } from "../src/types";
import { fixedClock, makeEntry, makeTempDir, removeDir } from "./helpers";

function indexOf(...ids: string[]): MemoryIndex {
  return {
    version: "1.0",
    scope: "project",
    last_updated: "2024-03-05T00:00:00.000Z",
    checksum: "",
    memories: ids.map((id) => makeEntry(id)),
    stats: {
      total_memories: ids.length,
      total_accesses: 0,
      by_type: {},
      most_accessed: [],
      never_accessed: [],
      oldest_unaccessed: null,
    },
  };
}

describe("estimateTokens", () => {
  it("counts four bytes per token, rounding down", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abcdefg")).toBe(1);
    expect(estimateTokens("abcdefgh")).toBe(2);
    // "é" is two bytes in UTF-8
    expect(estimateTokens("éééé")).toBe(2);
  });
});

describe("ManifestStore", () => {
  let root: string;
  let store: ManifestStore;

  beforeEach(() => {
    root = makeTempDir("manifest");
    store = new ManifestStore(root, "project", { clock: fixedClock("2024-03-05T12:00:00.000Z") });
  });

  afterEach(() => {
    removeDir(root);
  });

  function writeBlob(relative: string, body: string): void {
    const file = path.join(root, "memory", relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, body);
  }

  it("summarizes each entry with its blob size", () => {
    writeBlob("sessions/a.md", "x".repeat(400));
    const index = indexOf("a", "b");
    index.memories[0] = { ...index.memories[0], summary: "s".repeat(250), tags: ["auth"] };

    const manifest = store.generate(index);
    expect(manifest.scope).toBe("project");
    expect(manifest.last_updated).toBe("2024-03-05T12:00:00.000Z");
    expect(manifest.index.map((e) => [e.id, e.size_tokens])).toEqual([
      ["a", 100],
      ["b", 0],
    ]);
    expect(manifest.index[0].summary).toHaveLength(200);
    expect(manifest.index[0].tags).toEqual(["auth"]);
    expect(manifest.stats).toEqual({ total_memories: 2, total_tokens: 100, by_type: { session: 2 } });
  });

  it("loads nothing when no manifest exists", () => {
    expect(store.load()).toBeNull();
    expect(store.search("anything")).toEqual([]);
    expect(store.getMemoryInfo("a")).toBeNull();
    expect(store.estimateTokens()).toBe(0);
  });

  it("loads nothing from an invalid manifest", () => {
    fs.mkdirSync(path.join(root, "memory"), { recursive: true });
    fs.writeFileSync(store.manifestFile, "[1, 2");
    expect(store.load()).toBeNull();
  });

  it("saves, reloads and looks up entries", () => {
    const index = indexOf("a", "b");
    index.memories[1] = { ...index.memories[1], title: "Deploy pipeline", tags: ["ci"] };
    const saved = store.rebuild(index);

    expect(store.load()).toEqual(saved);
    expect(store.getMemoryInfo("b")?.title).toBe("Deploy pipeline");
    expect(store.search("deploy").map((e) => e.id)).toEqual(["b"]);
    expect(store.search("", ["ci", "other"]).map((e) => e.id)).toEqual(["b"]);
    expect(store.search("memory").map((e) => e.id)).toEqual(["a"]);
    expect(store.estimateTokens()).toBeGreaterThan(0);
  });
});
