/* eslint-disable no-console */
/**
 * CLI logging utility with colors and formatting.
 *
 * Everything goes to stderr: stdout is reserved for the JSON document.
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stderr.isTTY === true;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const BOLD = USE_COLOR ? '\x1b[1m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

let quiet = false;

export const logger = {
  /** Suppress everything except errors */
  setQuiet(value: boolean): void {
    quiet = value;
  },

  info(message: string): void {
    if (!quiet) console.error(`${BLUE}ℹ ${message}${RESET}`);
  },

  success(message: string): void {
    if (!quiet) console.error(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  warn(message: string): void {
    if (!quiet) console.error(`${YELLOW}⚠ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (process.env.DEBUG && !quiet) {
      console.error(`${DIM}🔍 ${message}${RESET}`);
    }
  },

  section(title: string): void {
    if (quiet) return;
    console.error();
    console.error(`${BOLD}━━━ ${title} ━━━${RESET}`);
  },

  progress(current: number, total: number, item: string): void {
    if (!quiet) console.error(`[${current}/${total}] ${item}`);
  },
};
