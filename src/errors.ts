/**
 * Error types surfaced to callers of the store.
 *
 * Recoverable anomalies (a missing snapshot, a corrupt log file) never reach
 * this module; they are absorbed where they occur. What remains are
 * conditions the caller has to act on.
 */

export class MemoryError extends Error {
  /** Stable code for programmatic handling */
  readonly code: string;
  /** What the user can do about it */
  readonly guidance: string;

  constructor(message: string, code: string, guidance: string) {
    super(`${message}. ${guidance}`);
    this.name = "MemoryError";
    this.code = code;
    this.guidance = guidance;
  }
}

export class NoProjectScopeError extends MemoryError {
  readonly workingDir: string;

  constructor(workingDir: string) {
    super(
      `No project found from ${workingDir}`,
      "NO_PROJECT_SCOPE",
      "Run inside a project directory (one containing .git, package.json, ...) or use --scope global"
    );
    this.name = "NoProjectScopeError";
    this.workingDir = workingDir;
  }
}

export class MemoryNotFoundError extends MemoryError {
  readonly memoryId: string;

  constructor(memoryId: string) {
    super(
      `Memory not found: ${memoryId}`,
      "MEMORY_NOT_FOUND",
      "Check the id with 'smem search'"
    );
    this.name = "MemoryNotFoundError";
    this.memoryId = memoryId;
  }
}

export class SessionNotFoundError extends MemoryError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(
      `Session not found: ${sessionId}`,
      "SESSION_NOT_FOUND",
      "List active sessions with 'smem sessions' or start one with 'smem start'"
    );
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class InvalidSessionIdError extends MemoryError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(
      `Invalid session id: ${JSON.stringify(sessionId)}`,
      "INVALID_SESSION_ID",
      "Session ids may only contain letters, digits, '.', '_' and '-'"
    );
    this.name = "InvalidSessionIdError";
    this.sessionId = sessionId;
  }
}

export class SessionClosedError extends MemoryError {
  readonly sessionId: string;
  readonly status: string;

  constructor(sessionId: string, status: string) {
    super(
      `Session ${sessionId} is ${status}`,
      "SESSION_CLOSED",
      "Start a new session with 'smem start'"
    );
    this.name = "SessionClosedError";
    this.sessionId = sessionId;
    this.status = status;
  }
}

export class SessionCorruptedError extends MemoryError {
  readonly filePath: string;

  constructor(filePath: string, cause: string) {
    super(
      `Session file ${filePath} is unreadable (${cause})`,
      "SESSION_CORRUPTED",
      "Fix or remove the file; other sessions are unaffected"
    );
    this.name = "SessionCorruptedError";
    this.filePath = filePath;
  }
}

export class IndexCorruptedError extends MemoryError {
  readonly indexPath: string;

  constructor(indexPath: string, cause: string) {
    super(
      `Index snapshot ${indexPath} is corrupt (${cause})`,
      "INDEX_CORRUPTED",
      "Run 'smem rebuild-index --force' to set it aside and rebuild from the pending log"
    );
    this.name = "IndexCorruptedError";
    this.indexPath = indexPath;
  }
}

export class RebuildInProgressError extends MemoryError {
  readonly holderPid: number;

  constructor(lockPath: string, holderPid: number) {
    super(
      `Another rebuild holds ${lockPath} (pid ${holderPid})`,
      "REBUILD_IN_PROGRESS",
      "Wait for it to finish; a stale lock is taken over automatically"
    );
    this.name = "RebuildInProgressError";
    this.holderPid = holderPid;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
