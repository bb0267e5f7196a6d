export * from "./types";
export * from "./errors";
export { createConsoleLogger, silentLogger } from "./log";
export type { Logger } from "./log";
export { ConfigSchema, defaultConfig, loadConfig, setDebugFlag } from "./config";
export type { Config } from "./config";
export { createMemoryEntry, recordAccess, compareRecency } from "./entry";
export { IndexManager, applyLogEntry, replayLog, calculateStats } from "./index-manager";
export type { IndexManagerOptions, RebuildOptions, RebuildResult, IndexInspection } from "./index-manager";
export { SessionTracker, TRACK_KINDS, findStaleSessions, archiveFileName } from "./session";
export type { TrackKind, TrackDetails } from "./session";
export { ManifestStore, estimateTokens } from "./manifest";
export { buildContextReport, renderContextReport, budgetStatus } from "./context";
export type { ContextReport, ContextReportOptions, BudgetStatus } from "./context";
export { exportMemories, exportToJson, exportToMarkdown, exportToCsv, EXPORT_FORMATS } from "./export";
export type { ExportFormat } from "./export";
export { searchMemories, findMemoryById } from "./search";
export type { SearchOptions } from "./search";
export { SkillDetector, renderSkillReport } from "./skills";
export type { SkillCandidate } from "./skills";
export * from "./analytics";
export { MemoryManager } from "./memory";
export type { MemoryManagerOptions, SaveSessionOptions, SaveSessionResult } from "./memory";
export { createServer, createToolHandlers, runStdioServer } from "./server";
