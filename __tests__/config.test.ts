import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import { configPath, deepMerge, defaultConfig, loadConfig, setDebugFlag } from "../src/config";
import { makeTempDir, recordingLogger, removeDir } from "./helpers";

describe("deepMerge", () => {
  it("merges nested objects and replaces everything else", () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: [1] }, { a: { c: 3 }, d: [2] })).toEqual({ a: { b: 1, c: 3 }, d: [2] });
  });
});

describe("loadConfig", () => {
  let globalRoot: string;
  let projectRoot: string;

  beforeEach(() => {
    globalRoot = makeTempDir("config-global");
    projectRoot = makeTempDir("config-project");
  });

  afterEach(() => {
    removeDir(globalRoot);
    removeDir(projectRoot);
  });

  function write(root: string, value: unknown): void {
    fs.writeFileSync(configPath(root), typeof value === "string" ? value : JSON.stringify(value));
  }

  it("defaults when nothing is configured", () => {
    const config = loadConfig(globalRoot, null, recordingLogger());
    expect(config).toEqual(defaultConfig());
    expect(config.memory.indexRebuild.thresholdEntries).toBe(20);
    expect(config.memory.indexRebuild.strategy).toBe("threshold");
    expect(config.sessions.staleHours).toBe(24);
    expect(config.rebuild.lockStaleMinutes).toBe(10);
  });

  it("lets the project override global settings key by key", () => {
    write(globalRoot, { memory: { indexRebuild: { thresholdEntries: 50, strategy: "manual" } }, debug: true });
    write(projectRoot, { memory: { indexRebuild: { thresholdEntries: 5 } } });

    const config = loadConfig(globalRoot, projectRoot, recordingLogger());
    expect(config.memory.indexRebuild.thresholdEntries).toBe(5);
    expect(config.memory.indexRebuild.strategy).toBe("manual");
    expect(config.debug).toBe(true);
  });

  it("warns and ignores an unreadable file", () => {
    const logger = recordingLogger();
    write(projectRoot, "{ broken");
    write(globalRoot, { sessions: { staleHours: 48 } });

    const config = loadConfig(globalRoot, projectRoot, logger);
    expect(config.sessions.staleHours).toBe(48);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("falls back to defaults when a value is invalid", () => {
    const logger = recordingLogger();
    write(globalRoot, { memory: { indexRebuild: { thresholdEntries: 0 } } });

    expect(loadConfig(globalRoot, null, logger)).toEqual(defaultConfig());
    expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining("memory.indexRebuild.thresholdEntries"));
  });

  it("loads a config carrying keys it does not use, and drops them", () => {
    const logger = recordingLogger();
    write(globalRoot, {
      memory: {
        refresh: { strategy: "periodic", intervalMinutes: 5 },
        visibility: { showGlobalSessions: false },
        indexRebuild: { strategy: "threshold", thresholdEntries: 30, periodicSchedule: "daily" },
      },
    });

    const config = loadConfig(globalRoot, null, logger);
    expect(config.memory).toEqual({ indexRebuild: { strategy: "threshold", thresholdEntries: 30 } });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("ignores a config that is not an object", () => {
    const logger = recordingLogger();
    write(globalRoot, [1, 2]);
    expect(loadConfig(globalRoot, null, logger)).toEqual(defaultConfig());
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});

describe("setDebugFlag", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir("config-debug");
  });

  afterEach(() => {
    removeDir(root);
  });

  it("creates the config file when there is none", () => {
    setDebugFlag(root, true);
    expect(JSON.parse(fs.readFileSync(configPath(root), "utf-8"))).toEqual({ debug: true });
    expect(loadConfig(root, null, recordingLogger()).debug).toBe(true);
  });

  it("keeps the other keys", () => {
    fs.writeFileSync(configPath(root), JSON.stringify({ sessions: { staleHours: 48 }, debug: true }));
    setDebugFlag(root, false);
    expect(JSON.parse(fs.readFileSync(configPath(root), "utf-8"))).toEqual({ sessions: { staleHours: 48 }, debug: false });
  });

  it("leaves a config that is not an object alone", () => {
    fs.writeFileSync(configPath(root), "[1]");
    expect(() => setDebugFlag(root, true)).toThrow("is not a JSON object");
    expect(fs.readFileSync(configPath(root), "utf-8")).toBe("[1]");
  });
});
