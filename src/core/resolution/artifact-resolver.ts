import { basename } from 'path';
import { minimatch, escape } from 'minimatch';
import type { ResolvedModule, RunnerConfig } from '../../types/index.js';
import { findFirstEntry } from '../../utils/file-walker.js';
import { isFile } from '../../utils/fs.js';
import { ArtifactNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { moduleLeafName } from './module-resolver.js';

export type ArtifactConfig = Pick<RunnerConfig, 'artifactSuffix' | 'buildCommand'>;

/**
 * File-name pattern of the module's tests jar, e.g. `*streaming-akka*-tests.jar`.
 * Nested modules contribute only their last path segment.
 */
export function testArtifactPattern(moduleName: string, suffix: string): string {
  return `*${escape(moduleLeafName(moduleName))}*${escape(suffix)}`;
}

/**
 * Find the built tests jar inside the module subtree (first match in walk order)
 */
export async function resolveTestArtifact(
  module: ResolvedModule,
  config: ArtifactConfig
): Promise<string> {
  const pattern = testArtifactPattern(module.moduleName, config.artifactSuffix);
  logger.debug(`Searching ${module.modulePath} for ${pattern}`);

  const match = await findFirstEntry(
    module.modulePath,
    entry => !entry.isDirectory && minimatch(basename(entry.path), pattern, { dot: true })
  );

  if (!match || !(await isFile(match.path))) {
    throw new ArtifactNotFoundError(module.moduleName, pattern, config.buildCommand);
  }

  logger.debug(`Using tests jar: ${match.path}`);
  return match.path;
}
