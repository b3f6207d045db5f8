/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementations: @clack/prompts for interactive
 * terminal sessions, plain console output for CI and piped sessions.
 */

import { log, spinner as clackSpinner } from '@clack/prompts';
import { Spinner } from '../utils/spinner.js';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    message(message: string): void {
      log.message(message);
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            if (finalMessage) {
              s.stop(finalMessage);
            } else {
              s.stop();
            }
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        },
      };
    },
  };
}

/**
 * Create a plain console OutputPort for non-interactive sessions (CI, piped output).
 * Only the echoed command line goes to stdout.
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.error(message);
    },

    message(message: string): void {
      console.log(message);
    },

    spinner(): UnifiedSpinner {
      let s: Spinner | null = null;

      return {
        start(message: string) {
          s = new Spinner(message);
          s.start();
        },
        stop(finalMessage?: string) {
          if (s) {
            s.stop();
            if (finalMessage) {
              console.error(finalMessage);
            }
            s = null;
          }
        },
        message(text: string) {
          if (s) {
            s.update(text);
          }
        },
      };
    },
  };
}
