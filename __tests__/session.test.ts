import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { InvalidSessionIdError, SessionClosedError, SessionCorruptedError, SessionNotFoundError } from "../src/errors";
import { silentLogger } from "../src/log";
import { SessionTracker, archiveFileName, checkedSessionId, findStaleSessions, formatStamp } from "../src/session";
import { SessionData, SessionDataSchema } from "../src/types";
import { makeTempDir, removeDir, steppingClock } from "./helpers";

function sessionData(id: string, lastUpdated: string): SessionData {
  return SessionDataSchema.parse({ session_id: id, started: lastUpdated, last_updated: lastUpdated });
}

describe("archiveFileName", () => {
  it("uses the start date and a slug of the task", () => {
    expect(archiveFileName({ started: "2024-03-05T08:30:00.000Z", task: "Fix login bug in auth service" })).toBe(
      "2024-03-05-fix-login-bug-in-auth-service.json"
    );
  });

  it("names an untitled session", () => {
    expect(archiveFileName({ started: "2024-03-05T08:30:00.000Z", task: "" })).toBe("2024-03-05-untitled.json");
  });

  it("turns slashes and underscores into hyphens and caps the length", () => {
    const name = archiveFileName({ started: "2024-03-05T08:30:00.000Z", task: `Refactor src/auth_utils ${"x".repeat(60)}` });
    expect(name.startsWith("2024-03-05-refactor-src-auth-utils-")).toBe(true);
    expect(name).toBe(`2024-03-05-${"refactor-src-auth-utils-".padEnd(50, "x")}.json`);
  });
});

describe("findStaleSessions", () => {
  const now = new Date("2024-03-06T12:00:00.000Z");

  it("flags sessions idle for at least the threshold", () => {
    const sessions = [
      sessionData("exact", "2024-03-05T12:00:00.000Z"),
      sessionData("recent", "2024-03-06T11:00:00.000Z"),
      sessionData("old", "2024-03-01T00:00:00.000Z"),
    ];
    expect(findStaleSessions(sessions, 24, now).map((s) => s.session_id)).toEqual(["exact", "old"]);
  });

  it("returns nothing for an empty list", () => {
    expect(findStaleSessions([], 24, now)).toEqual([]);
  });
});

describe("formatStamp", () => {
  it("renders UTC date and time", () => {
    expect(formatStamp("2024-03-05T08:30:05.123Z")).toBe("2024-03-05 08:30:05");
  });

  it("passes through what it cannot parse", () => {
    expect(formatStamp("yesterday")).toBe("yesterday");
  });
});

describe("checkedSessionId", () => {
  it("accepts generated and hand-picked ids", () => {
    expect(checkedSessionId("session-20240305-083000-a1b2c3")).toBe("session-20240305-083000-a1b2c3");
    expect(checkedSessionId("fix_login.v2")).toBe("fix_login.v2");
  });

  it.each(["../escape", "a/b", "a\\b", "..", ".", ""])("rejects %j", (id) => {
    expect(() => checkedSessionId(id)).toThrow(InvalidSessionIdError);
  });
});

describe("SessionTracker", () => {
  let root: string;
  let clock: () => Date;

  beforeEach(() => {
    root = makeTempDir("session");
    clock = steppingClock("2024-03-05T08:30:00.000Z", 60_000);
  });

  afterEach(() => {
    removeDir(root);
  });

  it("creates and persists a new session", () => {
    const session = new SessionTracker(root, "session-1", { clock });
    expect(fs.existsSync(session.sessionFile)).toBe(true);
    expect(session.data.status).toBe("active");
    expect(session.data.started).toBe("2024-03-05T08:30:00.000Z");

    const reopened = SessionTracker.open(root, "session-1", { clock });
    expect(reopened.data).toEqual(session.data);
  });

  it("generates an id when none is given", () => {
    const session = new SessionTracker(root, undefined, { clock });
    expect(session.sessionId).toMatch(/^session-20240305-083000-[0-9a-f]{6}$/);
  });

  it("refuses to open a session that does not exist", () => {
    expect(() => SessionTracker.open(root, "missing")).toThrow(SessionNotFoundError);
  });

  it("will not open or create a session outside its directory", () => {
    const outside = path.join(root, "sessions", "victim.json");
    fs.mkdirSync(path.dirname(outside), { recursive: true });
    fs.writeFileSync(outside, JSON.stringify(sessionData("victim", "2024-03-05T08:00:00.000Z")));

    expect(() => SessionTracker.open(root, "../victim")).toThrow(InvalidSessionIdError);
    expect(() => new SessionTracker(root, "../../stray", { clock })).toThrow(InvalidSessionIdError);
    expect(fs.existsSync(outside)).toBe(true);
    expect(fs.existsSync(path.join(root, "stray.json"))).toBe(false);
  });

  it("reports a corrupt session file", () => {
    const session = new SessionTracker(root, "broken", { clock });
    fs.writeFileSync(session.sessionFile, "{ nope");
    expect(() => SessionTracker.open(root, "broken")).toThrow(SessionCorruptedError);
  });

  it("records activity and bumps last_updated", () => {
    const session = new SessionTracker(root, "s", { clock });
    session.updateTask("Fix login bug");
    session.addFileModified("src/auth.ts");
    session.addDecision("Use JWT", "Stateless", ["cookies"]);
    session.addProblem("Token expired early", "Fix clock skew");
    session.addNote("Check refresh flow");
    session.addTodo("Write tests");

    const data = SessionTracker.open(root, "s").data;
    expect(data.task).toBe("Fix login bug");
    expect(data.files_modified).toEqual(["src/auth.ts"]);
    expect(data.decisions).toEqual([
      { decision: "Use JWT", rationale: "Stateless", alternatives: ["cookies"], timestamp: "2024-03-05T08:33:00.000Z" },
    ]);
    expect(data.problems[0]).toEqual({
      problem: "Token expired early",
      solution: "Fix clock skew",
      timestamp: "2024-03-05T08:35:00.000Z",
    });
    expect(data.notes).toEqual(["Check refresh flow"]);
    expect(data.todos).toEqual(["Write tests"]);
    expect(data.last_updated).toBe("2024-03-05T08:38:00.000Z");
  });

  it("keeps files and todos unique in insertion order", () => {
    const session = new SessionTracker(root, "s", { clock });
    session.addFileModified("b.ts");
    session.addFileModified("a.ts");
    session.addFileModified("b.ts");
    session.addTodo("one");
    session.addTodo("two");
    session.addTodo("one");
    expect(session.data.files_modified).toEqual(["b.ts", "a.ts"]);
    expect(session.data.todos).toEqual(["one", "two"]);
  });

  it("removes todos and ignores unknown ones", () => {
    const session = new SessionTracker(root, "s", { clock });
    session.addTodo("one");
    session.addTodo("two");
    session.removeTodo("one");
    session.removeTodo("never added");
    expect(session.data.todos).toEqual(["two"]);
  });

  it("dispatches tracked activity by kind", () => {
    const session = new SessionTracker(root, "s", { clock });
    session.track("task", "Ship it");
    session.track("file", "src/a.ts");
    session.track("decision", "Use zod", { rationale: "Typed parsing", alternatives: ["io-ts"] });
    session.track("problem", "Flaky test");
    session.track("note", "Ask about CI");
    session.track("todo", "Update docs");
    session.track("done", "Update docs");

    const d = session.data;
    expect(d.task).toBe("Ship it");
    expect(d.files_modified).toEqual(["src/a.ts"]);
    expect(d.decisions[0].alternatives).toEqual(["io-ts"]);
    expect(d.problems[0].solution).toBeNull();
    expect(d.notes).toEqual(["Ask about CI"]);
    expect(d.todos).toEqual([]);
  });

  it("archives under the start date and task slug", () => {
    const session = new SessionTracker(root, "s", { clock });
    session.updateTask("Fix login bug in auth service");
    const target = session.archive();

    expect(path.basename(target)).toBe("2024-03-05-fix-login-bug-in-auth-service.json");
    expect(fs.existsSync(session.sessionFile)).toBe(false);
    const archived = SessionDataSchema.parse(JSON.parse(fs.readFileSync(target, "utf-8")));
    expect(archived.status).toBe("archived");
  });

  it("appends the session id when the archive name is taken", () => {
    const first = new SessionTracker(root, "first", { clock });
    first.updateTask("Same task");
    first.archive();

    const second = new SessionTracker(root, "second", { clock });
    second.updateTask("Same task");
    expect(path.basename(second.archive())).toBe("2024-03-05-same-task-second.json");
  });

  it("discards by deleting the file", () => {
    const session = new SessionTracker(root, "s", { clock });
    session.discard();
    expect(fs.existsSync(session.sessionFile)).toBe(false);
    expect(session.data.status).toBe("discarded");
  });

  it("rejects changes once closed", () => {
    const session = new SessionTracker(root, "s", { clock });
    session.archive();
    expect(() => session.addNote("late")).toThrow(SessionClosedError);
    expect(() => session.addTodo("late")).toThrow(SessionClosedError);
    expect(() => session.archive()).toThrow(SessionClosedError);
  });

  it("lists active sessions and skips unreadable files", () => {
    new SessionTracker(root, "a", { clock });
    new SessionTracker(root, "b", { clock });
    fs.writeFileSync(path.join(root, "sessions", "active", "c.json"), "not json");

    const ids = SessionTracker.listActiveSessions(root, silentLogger).map((s) => s.session_id);
    expect(ids).toEqual(["a", "b"]);
  });

  it("finds the most recently updated session", () => {
    const a = new SessionTracker(root, "a", { clock });
    new SessionTracker(root, "b", { clock });
    a.addNote("touch");

    expect(SessionTracker.latest(root, { logger: silentLogger })?.sessionId).toBe("a");
  });

  it("has no latest session in an empty scope", () => {
    expect(SessionTracker.latest(root, { logger: silentLogger })).toBeNull();
  });

  it("lists stale session ids for cleanup", () => {
    new SessionTracker(root, "old", { clock });
    const ids = SessionTracker.cleanupStaleSessions(root, 24, new Date("2024-03-07T00:00:00.000Z"), silentLogger);
    expect(ids).toEqual(["old"]);
  });

  it("renders Markdown", () => {
    const session = new SessionTracker(root, "s", { clock });
    session.updateTask("Fix login");
    session.addFileModified("src/auth.ts");
    session.addDecision("Use JWT", "Stateless", ["cookies"]);

    expect(session.toMarkdown()).toBe(
      [
        "# Session: s",
        "**Started**: 2024-03-05 08:30:00",
        "**Last Updated**: 2024-03-05 08:34:00",
        "**Task**: Fix login",
        "**Status**: active",
        "",
        "## Files Modified",
        "- src/auth.ts",
        "",
        "## Decisions Made",
        "",
        "### Use JWT",
        "**Rationale**: Stateless",
        "**Alternatives considered**:",
        "- cookies",
        "",
        "## Problems Encountered",
        "- None",
        "",
        "## Notes",
        "- None",
        "",
        "## TODOs",
        "- None",
        "",
      ].join("\n")
    );
  });
});
