/* eslint-disable no-console */
/**
 * CLI logging. Everything goes to stderr so an SVG written to stdout stays
 * clean when piped.
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stderr.isTTY === true;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

export const logger = {
  success(message: string): void {
    console.error(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.error(`${DIM}🔍 ${message}${RESET}`);
    }
  },

  /** Uncolored, for multi-line blocks such as the parse failure display */
  log(message: string): void {
    console.error(message);
  },
};
