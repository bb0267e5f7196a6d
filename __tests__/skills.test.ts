import { describe, it, expect } from "vitest";
import { SkillDetector, flagSkillCandidates, normalizeText, renderSkillReport, skillNameFrom } from "../src/skills";
import { MemoryEntry, MemoryEntryInput } from "../src/types";
import { makeEntry } from "./helpers";

const now = new Date("2024-03-10T00:00:00.000Z");
const recent = "2024-03-01T00:00:00.000Z";

function titled(id: string, title: string, extra: Partial<MemoryEntryInput> = {}): MemoryEntry {
  return makeEntry(id, { title, created: recent, ...extra });
}

describe("text helpers", () => {
  it("normalizes case, separators and whitespace", () => {
    expect(normalizeText("  Deploy_Staging/Server   now ")).toBe("deploy-staging-server now");
  });

  it("builds skill names from the first four words", () => {
    expect(skillNameFrom("deploy the staging server today")).toBe("deploy-the-staging-server");
  });
});

describe("SkillDetector", () => {
  it("groups repeated procedures by title", () => {
    const memories = [
      titled("p1", "Deploy staging server"),
      titled("p2", "deploy staging server"),
      titled("p3", "Deploy  staging server"),
      titled("other", "Write docs"),
    ];
    const candidates = new SkillDetector(memories).detectCandidates({ now });
    expect(candidates).toEqual([
      {
        kind: "procedure",
        name: "Deploy Staging Server",
        confidence: "medium",
        occurrences: 3,
        relatedMemories: ["p1", "p2", "p3"],
        tags: [],
        suggestedSkillName: "deploy-staging-server",
      },
    ]);
  });

  it("rates a procedure seen twice the minimum as high confidence", () => {
    const memories = Array.from({ length: 6 }, (_, i) => titled(`p${i}`, "Rotate api keys"));
    const [candidate] = new SkillDetector(memories).detectCandidates({ now });
    expect(candidate.confidence).toBe("high");
    expect(candidate.occurrences).toBe(6);
  });

  it("groups decisions that share their wording", () => {
    const decisions = ["Use postgres for storage"];
    const memories = [
      titled("d1", "Billing schema", { type: "decision", decisions }),
      titled("d2", "Audit log table", { type: "decision", decisions }),
      titled("d3", "User profile store", { type: "decision", decisions }),
    ];
    const candidates = new SkillDetector(memories).detectCandidates({ now });
    expect(candidates).toHaveLength(1);
    expect(candidates[0].kind).toBe("decision_framework");
    expect(candidates[0].name).toBe("for postgres storage use Decision Pattern");
    expect(candidates[0].suggestedSkillName).toBe("decide-for-postgres-storage");
    expect(candidates[0].relatedMemories).toEqual(["d1", "d2", "d3"]);
  });

  it("groups problems by their tag signature", () => {
    const tags = ["jwt", "auth"];
    const memories = [
      titled("s1", "Token refresh failure", { tags }),
      titled("s2", "Login redirect loop", { tags }),
      titled("s3", "Session cookie missing", { tags: ["auth", "jwt"] }),
    ];
    const candidates = new SkillDetector(memories).detectCandidates({ now });
    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      kind: "problem_solution",
      name: "Auth-Jwt Problem Pattern",
      tags: ["auth", "jwt"],
      suggestedSkillName: "fix-auth-jwt",
      occurrences: 3,
    });
  });

  it("ignores memories outside the window and below the minimum", () => {
    const memories = [
      titled("p1", "Deploy staging server"),
      titled("p2", "Deploy staging server"),
      titled("old", "Deploy staging server", { created: "2023-01-01T00:00:00.000Z" }),
    ];
    expect(new SkillDetector(memories).detectCandidates({ now })).toEqual([]);
    expect(new SkillDetector(memories).detectCandidates({ now, minOccurrences: 2 })).toHaveLength(1);
  });
});

describe("flagSkillCandidates", () => {
  it("returns flagged copies of the related entries", () => {
    const memories = [
      titled("p1", "Deploy staging server"),
      titled("p2", "Deploy staging server"),
      titled("p3", "Deploy staging server"),
      titled("x", "Unrelated"),
    ];
    const { candidates, flagged } = flagSkillCandidates(memories, { now });
    expect(candidates).toHaveLength(1);
    expect(flagged.map((m) => m.id)).toEqual(["p1", "p2", "p3"]);
    expect(flagged[0].skill_candidate).toEqual({
      flagged: true,
      candidate_name: "deploy-staging-server",
      confidence: "medium",
      related_memories: ["p1", "p2", "p3"],
    });
    expect(memories[0].skill_candidate.flagged).toBe(false);
  });
});

describe("renderSkillReport", () => {
  it("says so when nothing was found", () => {
    expect(renderSkillReport([], now)).toBe(
      "# Skill Candidates\n\n**Generated**: 2024-03-10 00:00:00\n\nNo skill candidates detected.\n"
    );
  });

  it("groups candidates by confidence", () => {
    const report = renderSkillReport(
      [
        {
          kind: "procedure",
          name: "Rotate Api Keys",
          confidence: "high",
          occurrences: 6,
          relatedMemories: ["a", "b"],
          tags: ["ops"],
          suggestedSkillName: "rotate-api-keys",
        },
      ],
      now
    );
    expect(report).toContain("## High Confidence\n\n### Rotate Api Keys\n- **Type**: procedure\n- **Occurrences**: 6\n");
    expect(report).toContain("- **Suggested Skill Name**: `rotate-api-keys`");
    expect(report).not.toContain("## Medium Confidence");
  });
});
