/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console implementation of OutputPort, used when no interactive UI is available.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.error(message);
  },

  message(message: string): void {
    console.log(message);
  },

  spinner(): UnifiedSpinner {
    // Progress goes to stderr; stdout carries only the command line
    return {
      start(message: string) {
        console.error(`… ${message}`);
      },
      stop(finalMessage?: string) {
        if (finalMessage) {
          console.error(`✓ ${finalMessage}`);
        }
      },
      message(text: string) {
        console.error(`… ${text}`);
      },
    };
  },
};
