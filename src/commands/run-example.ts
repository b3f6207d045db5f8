/**
 * @fileoverview Command setup for 'run-example'
 */

import type { Command } from 'commander';

import { LogLevel } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { printUsage } from '../utils/usage.js';
import { createCliRunContext } from '../cli/context.js';
import { runExamplePipeline, type RunExampleContext } from '../core/run-example-pipeline.js';

export interface RunExampleCommandOptions {
  projectRoot?: string;
  dryRun?: boolean;
  verbose?: boolean;
  help?: boolean;
}

/**
 * Run one example and return the exit status the CLI should end with
 */
export async function runExampleCommand(
  example: string | undefined,
  exampleArgs: string[],
  options: RunExampleCommandOptions,
  ctx: RunExampleContext
): Promise<number> {
  if (options.help || !example) {
    printUsage();
    return 1;
  }

  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const result = await runExamplePipeline(
    example,
    exampleArgs,
    { projectRoot: options.projectRoot, dryRun: options.dryRun },
    ctx
  );

  return result.data?.exitCode ?? (result.success ? 0 : 1);
}

export type RunExampleAction = (
  example: string | undefined,
  exampleArgs: string[],
  options: RunExampleCommandOptions
) => Promise<void>;

async function runAndExit(example: string | undefined, exampleArgs: string[], options: RunExampleCommandOptions): Promise<void> {
  const exitCode = await runExampleCommand(example, exampleArgs, options, createCliRunContext());
  process.exit(exitCode);
}

export function setupRunExampleCommand(program: Command, action: RunExampleAction = runAndExit): void {
  program
    .argument('[example]', 'example class name or script path')
    .argument('[args...]', 'arguments passed to the example')
    .option('--project-root <dir>', 'root of the multi-module checkout')
    .option('--dry-run', 'print the submission command without running it')
    .option('--verbose', 'log every resolution step')
    .helpOption(false)
    .option('-h, --help', 'show usage')
    .passThroughOptions()
    .action(withErrorHandling(action, printUsage));
}
