// --- Colors (no dependencies) ---

export const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
  gray: "\x1b[90m",
};

/**
 * Diagnostics sink for library code. The store never prints on its own;
 * it reports through whichever logger its owner passes in.
 */
export interface Logger {
  warn(msg: string): void;
  debug(msg: string): void;
}

export function debugEnabled(): boolean {
  const flag = process.env.SESSION_MEMORY_DEBUG;
  return flag === "1" || flag === "true";
}

/**
 * Writes to stderr so stdout stays clean for command output and for the
 * MCP stdio transport.
 */
export function createConsoleLogger(opts: { debug?: boolean } = {}): Logger {
  const verbose = opts.debug ?? debugEnabled();
  return {
    warn(msg) {
      console.error(`  ${c.yellow}!${c.reset} ${msg}`);
    },
    debug(msg) {
      if (verbose) console.error(`  ${c.gray}[debug] ${msg}${c.reset}`);
    },
  };
}

export const silentLogger: Logger = {
  warn() {},
  debug() {},
};

export const defaultLogger: Logger = createConsoleLogger();

// --- CLI output ---

export function ok(msg: string) { console.log(`  ${c.green}✓${c.reset} ${msg}`); }
export function skip(msg: string) { console.log(`  ${c.gray}·${c.reset} ${c.gray}${msg}${c.reset}`); }
export function warn(msg: string) { console.log(`  ${c.yellow}!${c.reset} ${msg}`); }
export function err(msg: string) { console.error(`  ${c.red}✗${c.reset} ${msg}`); }
export function heading(msg: string) { console.log(`\n${c.bold}${msg}${c.reset}\n`); }
