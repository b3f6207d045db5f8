import { spawn } from 'child_process';
import { constants as osConstants } from 'os';
import type { TerminalAction } from '../../types/index.js';
import { LaunchError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Exit status a shell would report for the child
 */
export function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) {
    return code;
  }
  if (signal) {
    return 128 + osConstants.signals[signal];
  }
  return 1;
}

/**
 * Hand the terminal over to the submission command and resolve with its exit status.
 * Signals sent to this process are passed on to the child instead of killing us first.
 */
export function launchTerminalAction(action: TerminalAction): Promise<number> {
  return new Promise((resolve, reject) => {
    logger.debug(`Launching ${action.command}`, { args: action.args });

    const child = spawn(action.command, action.args, {
      env: action.env,
      stdio: action.inheritStdio ? 'inherit' : 'pipe'
    });

    const forward = (signal: NodeJS.Signals): void => {
      child.kill(signal);
    };
    for (const signal of FORWARDED_SIGNALS) {
      process.on(signal, forward);
    }
    const detach = (): void => {
      for (const signal of FORWARDED_SIGNALS) {
        process.off(signal, forward);
      }
    };

    child.once('error', (error) => {
      detach();
      reject(new LaunchError(action.command, error.message));
    });

    child.once('close', (code, signal) => {
      detach();
      const exitCode = exitCodeFor(code, signal);
      logger.debug(`${action.command} exited with ${exitCode}`);
      resolve(exitCode);
    });
  });
}
