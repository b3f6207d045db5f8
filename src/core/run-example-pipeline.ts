import type { CommandResult, TerminalAction } from '../types/index.js';
import type { OutputPort } from './ports/output.js';
import type { BuildMetadataQuery } from './ports/metadata-query.js';
import { consoleOutput } from './ports/console-output.js';
import { checkRuntimeHome } from './environment.js';
import { loadRunnerConfig } from './config.js';
import { MavenMetadataQuery } from './maven-metadata-query.js';
import { parseExampleIdentifier } from './resolution/example-identifier.js';
import { resolveModule } from './resolution/module-resolver.js';
import { resolveTestArtifact } from './resolution/artifact-resolver.js';
import { formatDependencyCoordinate, resolveModuleVersions } from './resolution/version-resolver.js';
import {
  buildSubmitAction,
  discoverScriptRoots,
  formatCommandLine,
  resolveScriptPath,
  type SubmitTarget
} from './launch/command-builder.js';
import { launchTerminalAction } from './launch/launcher.js';
import { logger } from '../utils/logger.js';

export interface RunExampleOptions {
  projectRoot?: string;
  dryRun?: boolean;
}

/**
 * Collaborators of a run. Everything outside this process (build tool,
 * submission tool, terminal) is reached through here.
 */
export interface RunExampleContext {
  output: OutputPort;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Defaults to a Maven query using the configured build command */
  metadataQuery?: BuildMetadataQuery;
  launch: (action: TerminalAction) => Promise<number>;
}

export interface RunExampleResult {
  action: TerminalAction;
  commandLine: string;
  coordinate: string;
  /** Exit status of the submission tool; absent on a dry run */
  exitCode?: number;
}

export function createDefaultRunContext(overrides: Partial<RunExampleContext> = {}): RunExampleContext {
  return {
    output: consoleOutput,
    env: process.env,
    cwd: process.cwd(),
    launch: launchTerminalAction,
    ...overrides
  };
}

/**
 * Resolve an example identifier into a submission command and run it.
 *
 * Strictly sequential: environment, module, tests jar, versions, coordinate,
 * command. The first failing step throws and nothing after it runs.
 */
export async function runExamplePipeline(
  rawIdentifier: string,
  exampleArgs: string[],
  options: RunExampleOptions,
  ctx: RunExampleContext
): Promise<CommandResult<RunExampleResult>> {
  const runtimeHome = await checkRuntimeHome(ctx.env);
  const config = await loadRunnerConfig({
    runtimeHome,
    projectRoot: options.projectRoot,
    cwd: ctx.cwd,
    dryRun: options.dryRun
  });

  const identifier = parseExampleIdentifier(rawIdentifier, config);
  logger.debug(`Parsed ${identifier.kind} identifier`, identifier);

  const module = await resolveModule(identifier, config);
  const artifactPath = await resolveTestArtifact(module, config);

  const metadataQuery = ctx.metadataQuery ?? new MavenMetadataQuery(config.buildCommand);
  const versions = await resolveModuleVersions(module, config, metadataQuery, ctx.output.spinner());
  const coordinate = formatDependencyCoordinate(
    config.dependencyGroup,
    config.artifactPrefix,
    module.moduleName,
    versions
  );

  let target: SubmitTarget;
  if (identifier.kind === 'script') {
    target = {
      kind: 'script',
      scriptPath: await resolveScriptPath(identifier, module, config.projectRoot, ctx.cwd),
      searchPath: await discoverScriptRoots(config)
    };
  } else {
    target = { kind: 'class', className: identifier.raw, artifactPath };
  }

  const action = buildSubmitAction(coordinate, target, exampleArgs, config, ctx.env);
  const commandLine = formatCommandLine(action);
  ctx.output.message(commandLine);

  if (config.dryRun) {
    ctx.output.info('Dry run: not launching');
    return { success: true, data: { action, commandLine, coordinate } };
  }

  const exitCode = await ctx.launch(action);
  return { success: exitCode === 0, data: { action, commandLine, coordinate, exitCode } };
}
