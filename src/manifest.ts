/**
 * Summary-only projection of a scope's index, for existence and metadata
 * checks without loading content blobs. A cache: always regenerable from
 * the index, and a missing or unreadable manifest just yields no results.
 */

import * as fs from "fs";
import * as path from "path";
import {
  Manifest,
  ManifestEntry,
  ManifestSchema,
  MemoryIndex,
  MemoryScope,
  MemoryType,
} from "./types";
import { readJsonFile, writeJsonFile } from "./utils";

const CHARS_PER_TOKEN = 4;
const SUMMARY_LIMIT = 200;

export function estimateTokens(text: string): number {
  return Math.floor(Buffer.byteLength(text, "utf-8") / CHARS_PER_TOKEN);
}

export class ManifestStore {
  readonly scope: MemoryScope;
  readonly memoryDir: string;
  readonly manifestFile: string;
  private clock: () => Date;

  constructor(scopeRoot: string, scope: MemoryScope, opts: { clock?: () => Date } = {}) {
    this.scope = scope;
    this.memoryDir = path.join(scopeRoot, "memory");
    this.manifestFile = path.join(this.memoryDir, "manifest.json");
    this.clock = opts.clock ?? (() => new Date());
  }

  generate(index: MemoryIndex): Manifest {
    const entries: ManifestEntry[] = index.memories.map((m) => ({
      id: m.id,
      title: m.title,
      type: m.type,
      scope: m.scope,
      created: m.created || null,
      tags: [...m.tags],
      file: m.file,
      size_tokens: this.blobTokens(m.file),
      access_count: m.access.count,
      last_accessed: m.access.last_accessed,
      summary: m.summary.slice(0, SUMMARY_LIMIT),
    }));

    const byType: Partial<Record<MemoryType, number>> = {};
    for (const e of entries) byType[e.type] = (byType[e.type] ?? 0) + 1;

    return {
      version: "1.0",
      scope: this.scope,
      last_updated: this.clock().toISOString(),
      index: entries,
      stats: {
        total_memories: entries.length,
        total_tokens: entries.reduce((sum, e) => sum + e.size_tokens, 0),
        by_type: byType,
      },
    };
  }

  save(manifest: Manifest): void {
    writeJsonFile(this.manifestFile, manifest);
  }

  load(): Manifest | null {
    try {
      const parsed = ManifestSchema.safeParse(readJsonFile(this.manifestFile));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  rebuild(index: MemoryIndex): Manifest {
    const manifest = this.generate(index);
    this.save(manifest);
    return manifest;
  }

  getMemoryInfo(memoryId: string): ManifestEntry | null {
    return this.load()?.index.find((e) => e.id === memoryId) ?? null;
  }

  /** Title/summary substring match, any-of tags. */
  search(query = "", tags: string[] = []): ManifestEntry[] {
    const manifest = this.load();
    if (!manifest) return [];

    const q = query.toLowerCase();
    return manifest.index.filter((e) => {
      if (q && !e.title.toLowerCase().includes(q) && !e.summary.toLowerCase().includes(q)) return false;
      if (tags.length && !tags.some((t) => e.tags.includes(t))) return false;
      return true;
    });
  }

  /** Approximate token cost of loading the manifest file itself. */
  estimateTokens(): number {
    try {
      return estimateTokens(fs.readFileSync(this.manifestFile, "utf-8"));
    } catch {
      return 0;
    }
  }

  private blobTokens(relativeFile: string): number {
    try {
      return estimateTokens(fs.readFileSync(path.join(this.memoryDir, relativeFile), "utf-8"));
    } catch {
      return 0;
    }
  }
}
