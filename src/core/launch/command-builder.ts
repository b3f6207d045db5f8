/**
 * Submission command assembly
 *
 * Builds the terminal action for either example shape:
 *   script: <submit> --packages <coordinate> <script> [args...]
 *   class:  <submit> --packages <coordinate> --class <name> <tests-jar> [args...]
 */

import { basename, delimiter, resolve } from 'path';
import type { ExampleIdentifier, ResolvedModule, RunnerConfig, TerminalAction } from '../../types/index.js';
import { SUBMIT_FLAGS } from '../../constants/index.js';
import { collectEntries } from '../../utils/file-walker.js';
import { isFile } from '../../utils/fs.js';
import { ExampleNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export type LaunchConfig = Pick<
  RunnerConfig,
  'projectRoot' | 'submitCommand' | 'scriptRootDirName' | 'scriptSearchPathVariable'
>;

export type SubmitTarget =
  | { kind: 'script'; scriptPath: string; searchPath: string[] }
  | { kind: 'class'; className: string; artifactPath: string };

/**
 * Every directory under the project root named like a script root, in walk order
 */
export async function discoverScriptRoots(config: Pick<RunnerConfig, 'projectRoot' | 'scriptRootDirName'>): Promise<string[]> {
  return collectEntries(
    config.projectRoot,
    entry => entry.isDirectory && basename(entry.path) === config.scriptRootDirName,
    { filter: (path, isDirectory) => !(isDirectory && basename(path).startsWith('.')) }
  );
}

/**
 * Locate the script to submit: as given (from cwd), then from the project root,
 * then the file the source probe matched.
 */
export async function resolveScriptPath(
  identifier: ExampleIdentifier,
  module: ResolvedModule,
  projectRoot: string,
  cwd: string = process.cwd()
): Promise<string> {
  const candidates = [resolve(cwd, identifier.raw), resolve(projectRoot, identifier.pathFragment)];
  if (module.matchedPath.replace(/\\/g, '/').endsWith(identifier.pathFragment)) {
    candidates.push(module.matchedPath);
  }

  for (const candidate of candidates) {
    if (await isFile(candidate)) {
      logger.debug(`Using script ${candidate}`);
      return candidate;
    }
  }

  throw new ExampleNotFoundError(identifier.raw, { candidates });
}

/**
 * Prepend the discovered roots to any existing value of the search-path variable
 */
export function buildSearchPath(roots: string[], existing: string | undefined): string {
  const parts = [...roots];
  if (existing) {
    parts.push(existing);
  }
  return parts.join(delimiter);
}

export function buildSubmitAction(
  coordinate: string,
  target: SubmitTarget,
  exampleArgs: string[],
  config: LaunchConfig,
  baseEnv: NodeJS.ProcessEnv = process.env
): TerminalAction {
  const env: NodeJS.ProcessEnv = { ...baseEnv };
  const args: string[] = [SUBMIT_FLAGS.PACKAGES, coordinate];

  if (target.kind === 'script') {
    env[config.scriptSearchPathVariable] = buildSearchPath(target.searchPath, baseEnv[config.scriptSearchPathVariable]);
    args.push(target.scriptPath);
  } else {
    args.push(SUBMIT_FLAGS.CLASS, target.className, target.artifactPath);
  }
  args.push(...exampleArgs);

  return {
    command: config.submitCommand,
    args,
    env,
    inheritStdio: true,
    exitWithChildStatus: true
  };
}

const SAFE_SHELL_WORD = /^[A-Za-z0-9_\-./:=@,+%^]+$/;

export function quoteShellArg(arg: string): string {
  if (SAFE_SHELL_WORD.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * Command line as echoed before launch
 */
export function formatCommandLine(action: Pick<TerminalAction, 'command' | 'args'>): string {
  return [action.command, ...action.args].map(quoteShellArg).join(' ');
}
