/**
 * CLI Context Factory
 *
 * Creates RunExampleContext instances with CLI-specific output ports
 * (Clack in a terminal, plain console otherwise). Command handlers use this
 * instead of createDefaultRunContext() so the right port is injected.
 */

import { createDefaultRunContext, type RunExampleContext } from '../core/run-example-pipeline.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import type { OutputPort } from '../core/ports/output.js';

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedPlainOutput: OutputPort | undefined;

function getCliOutput(isInteractive: boolean): OutputPort {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  cachedPlainOutput ??= createPlainOutput();
  return cachedPlainOutput;
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(env: NodeJS.ProcessEnv = process.env): boolean {
  const isTTY = process.stdout.isTTY === true;
  return isTTY && env.CI !== 'true';
}

export function createCliRunContext(): RunExampleContext {
  return createDefaultRunContext({ output: getCliOutput(detectInteractive()) });
}
