import { z } from "zod";

/**
 * Persisted record shapes. Every file the store reads goes through one of
 * these schemas: unknown fields are stripped and missing fields take their
 * defaults, so older and newer files load side by side.
 */

export const MAX_RECENT_SEARCHES = 10;

export const MemoryScopeSchema = z.enum(["global", "project"]);
export type MemoryScope = z.infer<typeof MemoryScopeSchema>;

export const MemoryTypeSchema = z.enum(["session", "decision", "implementation", "pattern"]);
export type MemoryType = z.infer<typeof MemoryTypeSchema>;

export const SessionStatusSchema = z.enum(["active", "archived", "discarded"]);
export type SessionStatus = z.infer<typeof SessionStatusSchema>;

export const LogOperationSchema = z.enum(["add", "update", "delete"]);
export type LogOperation = z.infer<typeof LogOperationSchema>;

// --- Memory Entry ---

export const RecentSearchSchema = z.object({
  query: z.string(),
  timestamp: z.string(),
});
export type RecentSearch = z.infer<typeof RecentSearchSchema>;

export const AccessInfoSchema = z.object({
  count: z.number().int().nonnegative().default(0),
  first_accessed: z.string().nullable().default(null),
  last_accessed: z.string().nullable().default(null),
  recent_searches: z
    .array(RecentSearchSchema)
    .default([])
    .transform((searches) => searches.slice(-MAX_RECENT_SEARCHES)),
});
export type AccessInfo = z.infer<typeof AccessInfoSchema>;

export const PromotionInfoSchema = z.object({
  is_promoted: z.boolean().default(false),
  promoted_at: z.string().nullable().default(null),
  short_description: z.string().default(""),
});
export type PromotionInfo = z.infer<typeof PromotionInfoSchema>;

export const ScopeDecisionSchema = z.object({
  automatic: z.boolean().default(true),
  user_specified: z.boolean().default(false),
  reasoning: z.string().default(""),
  generalizability: z.number().min(0).max(1).default(0),
  blockers: z.array(z.string()).default([]),
});
export type ScopeDecision = z.infer<typeof ScopeDecisionSchema>;

export const SkillConfidenceSchema = z.enum(["high", "medium", "low", ""]);
export type SkillConfidence = z.infer<typeof SkillConfidenceSchema>;

export const SkillCandidateInfoSchema = z.object({
  flagged: z.boolean().default(false),
  candidate_name: z.string().default(""),
  confidence: SkillConfidenceSchema.default(""),
  related_memories: z.array(z.string()).default([]),
});
export type SkillCandidateInfo = z.infer<typeof SkillCandidateInfoSchema>;

export const MemoryEntrySchema = z.object({
  id: z.string().min(1),
  type: MemoryTypeSchema,
  scope: MemoryScopeSchema,
  file: z.string(),               // relative to <scope-root>/memory/
  title: z.string(),
  created: z.string(),
  updated: z.string(),
  tags: z.array(z.string()).default([]),
  summary: z.string().default(""),
  keywords: z.array(z.string()).default([]),
  triggers: z.array(z.string()).default([]),
  related_files: z.array(z.string()).default([]),
  files_modified: z.array(z.string()).default([]),
  decisions: z.array(z.string()).default([]),
  promoted: PromotionInfoSchema.default({}),
  access: AccessInfoSchema.default({}),
  scope_decision: ScopeDecisionSchema.default({}),
  skill_candidate: SkillCandidateInfoSchema.default({}),
});
export type MemoryEntry = z.infer<typeof MemoryEntrySchema>;
export type MemoryEntryInput = z.input<typeof MemoryEntrySchema>;

// --- Append Log ---

export const IndexLogEntrySchema = z.object({
  operation: LogOperationSchema,
  timestamp: z.string(),
  session_id: z.string(),
  memory: MemoryEntrySchema.nullable().default(null),
  memory_id: z.string().nullable().default(null),
});
export type IndexLogEntry = z.infer<typeof IndexLogEntrySchema>;

// --- Snapshot ---

export const IndexStatsSchema = z.object({
  total_memories: z.number().int().default(0),
  total_accesses: z.number().int().default(0),
  by_type: z.record(MemoryTypeSchema, z.number().int()).default({}),
  most_accessed: z.array(z.string()).default([]),
  never_accessed: z.array(z.string()).default([]),
  oldest_unaccessed: z.string().nullable().default(null),
});
export type IndexStats = z.infer<typeof IndexStatsSchema>;

export const MemoryIndexSchema = z.object({
  version: z.string().default("1.0"),
  scope: MemoryScopeSchema,
  last_updated: z.string(),
  checksum: z.string().default(""),
  // Written as an array; an id-keyed object is accepted and flattened.
  memories: z
    .union([z.array(MemoryEntrySchema), z.record(z.string(), MemoryEntrySchema)])
    .default([])
    .transform((memories) => (Array.isArray(memories) ? memories : Object.values(memories))),
  stats: IndexStatsSchema.default({}),
});
export type MemoryIndex = z.infer<typeof MemoryIndexSchema>;

// --- Sessions ---

export const DecisionRecordSchema = z.object({
  decision: z.string(),
  rationale: z.string().default(""),
  alternatives: z.array(z.string()).default([]),
  timestamp: z.string(),
});
export type DecisionRecord = z.infer<typeof DecisionRecordSchema>;

export const ProblemRecordSchema = z.object({
  problem: z.string(),
  solution: z.string().nullable().default(null),
  timestamp: z.string(),
});
export type ProblemRecord = z.infer<typeof ProblemRecordSchema>;

export const SessionDataSchema = z.object({
  session_id: z.string().min(1),
  started: z.string(),
  last_updated: z.string(),
  task: z.string().default(""),
  status: SessionStatusSchema.default("active"),
  files_modified: z.array(z.string()).default([]),
  decisions: z.array(DecisionRecordSchema).default([]),
  problems: z.array(ProblemRecordSchema).default([]),
  notes: z.array(z.string()).default([]),
  todos: z.array(z.string()).default([]),
});
export type SessionData = z.infer<typeof SessionDataSchema>;

// --- Manifest ---

export const ManifestEntrySchema = z.object({
  id: z.string(),
  title: z.string(),
  type: MemoryTypeSchema,
  scope: MemoryScopeSchema,
  created: z.string().nullable().default(null),
  tags: z.array(z.string()).default([]),
  file: z.string(),
  size_tokens: z.number().int().default(0),
  access_count: z.number().int().default(0),
  last_accessed: z.string().nullable().default(null),
  summary: z.string().default(""),
});
export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;

export const ManifestSchema = z.object({
  version: z.string().default("1.0"),
  scope: MemoryScopeSchema,
  last_updated: z.string(),
  index: z.array(ManifestEntrySchema).default([]),
  stats: z
    .object({
      total_memories: z.number().int().default(0),
      total_tokens: z.number().int().default(0),
      by_type: z.record(MemoryTypeSchema, z.number().int()).default({}),
    })
    .default({}),
});
export type Manifest = z.infer<typeof ManifestSchema>;
