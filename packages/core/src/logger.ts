/**
 * @module logger
 * Build output for imageforge.
 *
 * The engine writes through the {@link BuildLogger} interface; the CLI plugs in
 * {@link ConsoleBuildLogger}, tests plug in spies.
 */

// =====================================================================
// ANSI helpers (no external dependency)
// =====================================================================

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const YELLOW = '\x1b[33m';
const GRAY = '\x1b[90m';

export interface BuildLogger {
  /** Section title, e.g. `BUILDING IMAGES` */
  heading(title: string): void;
  /** Plain line; an empty call prints a blank line */
  message(text?: string): void;
  /** Echo of an external command about to run */
  command(commandLine: string): void;
  warn(text: string): void;
  /** Detail only shown in verbose mode */
  verbose(text: string): void;
}

export interface ConsoleBuildLoggerOptions {
  verbose?: boolean;
  /** Disable ANSI colours (e.g. when stdout is not a TTY) */
  plain?: boolean;
}

/**
 * Logger that writes coloured lines to stdout / stderr.
 */
export class ConsoleBuildLogger implements BuildLogger {
  private readonly isVerbose: boolean;
  private readonly plain: boolean;

  constructor(options?: ConsoleBuildLoggerOptions) {
    this.isVerbose = options?.verbose ?? false;
    this.plain = options?.plain ?? false;
  }

  heading(title: string): void {
    const rule = '-'.repeat(title.length);
    console.log('');
    console.log(this.paint(BOLD, title));
    console.log(this.paint(BOLD, rule));
  }

  message(text = ''): void {
    console.log(text);
  }

  command(commandLine: string): void {
    console.log(this.paint(GRAY, `-- EXECUTING: ${commandLine}`));
  }

  warn(text: string): void {
    console.warn(this.paint(YELLOW, text));
  }

  verbose(text: string): void {
    if (this.isVerbose) {
      console.log(this.paint(GRAY, text));
    }
  }

  private paint(colour: string, text: string): string {
    return this.plain ? text : `${colour}${text}${RESET}`;
  }
}

/** Logger that discards everything. */
export const silentLogger: BuildLogger = {
  heading: () => undefined,
  message: () => undefined,
  command: () => undefined,
  warn: () => undefined,
  verbose: () => undefined,
};
