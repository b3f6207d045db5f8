/**
 * Output Port Interface
 *
 * Everything the run shows the user goes through here instead of console.log
 * or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI, TTY): @clack/prompts terminal UI
 *   - createPlainOutput (CLI, CI/pipes): command line on stdout, the rest on stderr
 *   - consoleOutput (default): used when no adapter is injected
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** Status line, never part of the command output */
  info(message: string): void;

  /** The echoed submission command */
  message(message: string): void;

  spinner(): UnifiedSpinner;
}
