/**
 * Skill-candidate detection: recurring procedures, decision frameworks and
 * problem/solution pairs across stored memories, which may be worth
 * turning into a reusable skill.
 */

import { withSkillCandidate } from "./entry";
import { MemoryEntry } from "./types";
import { timeOf } from "./utils";

export type SkillCandidateKind = "procedure" | "decision_framework" | "problem_solution";
export type CandidateConfidence = "high" | "medium" | "low";

export interface SkillCandidate {
  kind: SkillCandidateKind;
  name: string;
  confidence: CandidateConfidence;
  occurrences: number;
  relatedMemories: string[];
  tags: string[];
  suggestedSkillName: string;
}

export interface DetectOptions {
  minOccurrences?: number;
  withinDays?: number;
  now?: Date;
}

const PROCEDURE_OVERLAP = 0.6;
const DECISION_OVERLAP = 0.5;
const MERGED_TAG_LIMIT = 10;

export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[_/]/g, "-")
    .replace(/\s+/g, " ")
    .trim();
}

function words(text: string): Set<string> {
  return new Set(text.split(" ").filter(Boolean));
}

/** Shared words over the larger set's size. */
function overlap(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const w of a) if (b.has(w)) shared++;
  return shared / Math.max(a.size, b.size, 1);
}

function titleCase(text: string): string {
  return text.replace(/(^|[^a-zA-Z])([a-z])/g, (_m, pre: string, ch: string) => pre + ch.toUpperCase());
}

/** Most common tags first; ties keep first-seen order. */
function mergeTags(memories: MemoryEntry[]): string[] {
  const counts = new Map<string, number>();
  for (const m of memories) {
    for (const t of m.tags) counts.set(t, (counts.get(t) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, MERGED_TAG_LIMIT)
    .map(([tag]) => tag);
}

export function skillNameFrom(task: string): string {
  return task
    .split(/[\s-]+/)
    .filter(Boolean)
    .slice(0, 4)
    .join("-");
}

export class SkillDetector {
  private memories: MemoryEntry[];

  constructor(memories: MemoryEntry[]) {
    this.memories = memories;
  }

  detectCandidates(opts: DetectOptions = {}): SkillCandidate[] {
    const minOccurrences = opts.minOccurrences ?? 3;
    const withinDays = opts.withinDays ?? 90;
    const now = opts.now ?? new Date();
    const cutoff = now.getTime() - withinDays * 86400000;

    const recent = this.memories.filter((m) => (timeOf(m.created) ?? -Infinity) >= cutoff);

    return [
      ...this.detectProcedures(recent, minOccurrences),
      ...this.detectDecisionPatterns(recent, minOccurrences),
      ...this.detectProblemSolutions(recent, minOccurrences),
    ];
  }

  private detectProcedures(memories: MemoryEntry[], minOccurrences: number): SkillCandidate[] {
    const groups = new Map<string, MemoryEntry[]>();

    for (const m of memories) {
      const normalized = normalizeText(m.title);
      const keyWords = words(normalized);
      let placed = false;
      for (const [task, members] of groups) {
        if (overlap(keyWords, words(task)) > PROCEDURE_OVERLAP) {
          members.push(m);
          placed = true;
          break;
        }
      }
      if (!placed) groups.set(normalized, [m]);
    }

    const candidates: SkillCandidate[] = [];
    for (const [task, members] of groups) {
      if (members.length < minOccurrences) continue;
      candidates.push({
        kind: "procedure",
        name: titleCase(task.replace(/-/g, " ")),
        confidence: members.length >= minOccurrences * 2 ? "high" : "medium",
        occurrences: members.length,
        relatedMemories: members.map((m) => m.id),
        tags: mergeTags(members),
        suggestedSkillName: skillNameFrom(task),
      });
    }
    return candidates;
  }

  private detectDecisionPatterns(memories: MemoryEntry[], minOccurrences: number): SkillCandidate[] {
    const groups = new Map<string, MemoryEntry[]>();

    for (const m of memories) {
      if (m.type !== "decision" && m.decisions.length === 0) continue;

      const keywords = new Set<string>();
      for (const d of m.decisions) {
        for (const w of words(normalizeText(d))) keywords.add(w);
      }

      let placed = false;
      for (const [key, members] of groups) {
        if (overlap(keywords, words(key)) > DECISION_OVERLAP) {
          members.push(m);
          placed = true;
          break;
        }
      }
      if (!placed && keywords.size > 0) {
        groups.set([...keywords].sort().slice(0, 5).join(" "), [m]);
      }
    }

    const candidates: SkillCandidate[] = [];
    for (const [key, members] of groups) {
      if (members.length < minOccurrences) continue;
      candidates.push({
        kind: "decision_framework",
        name: `${key.slice(0, 50)} Decision Pattern`,
        confidence: "medium",
        occurrences: members.length,
        relatedMemories: members.map((m) => m.id),
        tags: mergeTags(members),
        suggestedSkillName: `decide-${key.slice(0, 20).trim().replace(/ /g, "-")}`,
      });
    }
    return candidates;
  }

  private detectProblemSolutions(memories: MemoryEntry[], minOccurrences: number): SkillCandidate[] {
    const groups = new Map<string, { signature: string[]; members: MemoryEntry[] }>();

    for (const m of memories) {
      const signature = m.tags.slice(0, 5).sort();
      if (signature.length === 0) continue;
      const key = signature.join("\u0000");
      const group = groups.get(key);
      if (group) group.members.push(m);
      else groups.set(key, { signature, members: [m] });
    }

    const candidates: SkillCandidate[] = [];
    for (const { signature, members } of groups.values()) {
      if (members.length < minOccurrences) continue;
      const tagStr = signature.join("-");
      candidates.push({
        kind: "problem_solution",
        name: `${titleCase(tagStr)} Problem Pattern`,
        confidence: "medium",
        occurrences: members.length,
        relatedMemories: members.map((m) => m.id),
        tags: signature,
        suggestedSkillName: `fix-${tagStr.slice(0, 30)}`,
      });
    }
    return candidates;
  }
}

/**
 * New values for the entries that belong to a candidate. When an entry
 * matches several candidates, the last one wins.
 */
export function flagSkillCandidates(
  memories: MemoryEntry[],
  opts: DetectOptions = {}
): { candidates: SkillCandidate[]; flagged: MemoryEntry[] } {
  const candidates = new SkillDetector(memories).detectCandidates(opts);

  const byMemory = new Map<string, SkillCandidate>();
  for (const c of candidates) {
    for (const id of c.relatedMemories) byMemory.set(id, c);
  }

  const flagged: MemoryEntry[] = [];
  for (const m of memories) {
    const c = byMemory.get(m.id);
    if (!c) continue;
    flagged.push(
      withSkillCandidate(m, {
        flagged: true,
        candidate_name: c.suggestedSkillName,
        confidence: c.confidence,
        related_memories: c.relatedMemories,
      })
    );
  }

  return { candidates, flagged };
}

function formatCandidate(c: SkillCandidate): string {
  return [
    `### ${c.name}`,
    `- **Type**: ${c.kind}`,
    `- **Occurrences**: ${c.occurrences}`,
    `- **Tags**: ${c.tags.join(", ")}`,
    `- **Suggested Skill Name**: \`${c.suggestedSkillName}\``,
    `- **Related Memories**: ${c.relatedMemories.length}`,
    "",
  ].join("\n");
}

export function renderSkillReport(candidates: SkillCandidate[], now: Date = new Date()): string {
  const lines = ["# Skill Candidates", "", `**Generated**: ${now.toISOString().slice(0, 19).replace("T", " ")}`, ""];

  if (candidates.length === 0) {
    lines.push("No skill candidates detected.");
    return lines.join("\n") + "\n";
  }

  const sections: [CandidateConfidence, string][] = [
    ["high", "## High Confidence"],
    ["medium", "## Medium Confidence"],
    ["low", "## Low Confidence"],
  ];
  for (const [level, title] of sections) {
    const group = candidates.filter((c) => c.confidence === level);
    if (group.length === 0) continue;
    lines.push(title, "");
    for (const c of group) lines.push(formatCandidate(c));
  }
  return lines.join("\n");
}
