import { randomUUID } from "crypto";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { vi } from "vitest";
import { createMemoryEntry } from "../src/entry";
import { Logger } from "../src/log";
import { MemoryEntry, MemoryEntryInput } from "../src/types";

export function makeTempDir(label: string): string {
  const dir = path.join(os.tmpdir(), `session-memory-${label}-${randomUUID()}`);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** A clock that starts at `start` and moves forward `stepMs` on every call. */
export function steppingClock(start: string, stepMs = 1000): () => Date {
  let t = Date.parse(start);
  return () => {
    const now = new Date(t);
    t += stepMs;
    return now;
  };
}

export function fixedClock(at: string): () => Date {
  return () => new Date(at);
}

export function recordingLogger(): Logger & { warn: ReturnType<typeof vi.fn>; debug: ReturnType<typeof vi.fn> } {
  return { warn: vi.fn(), debug: vi.fn() };
}

export function makeEntry(id: string, overrides: Partial<MemoryEntryInput> = {}): MemoryEntry {
  return createMemoryEntry({
    id,
    type: "session",
    scope: "project",
    file: `sessions/${id}.md`,
    title: `Memory ${id}`,
    created: "2024-03-01T09:00:00.000Z",
    updated: "2024-03-01T09:00:00.000Z",
    ...overrides,
  });
}

export function byId(memories: MemoryEntry[]): MemoryEntry[] {
  return [...memories].sort((a, b) => a.id.localeCompare(b.id));
}
