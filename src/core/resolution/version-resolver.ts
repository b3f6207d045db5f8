import * as semver from 'semver';
import type { ModuleVersions, ResolvedModule, RunnerConfig } from '../../types/index.js';
import type { BuildMetadataQuery } from '../ports/metadata-query.js';
import type { UnifiedSpinner } from '../ports/output.js';
import { ValidationError, VersionUnavailableError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { moduleLeafName } from './module-resolver.js';

export type VersionConfig = Pick<RunnerConfig, 'versionExpression' | 'binaryVersionExpression'>;

/**
 * A usable version is a single token with a recognisable numeric core
 * (1.2.3, 2.4.0-SNAPSHOT, 2.12 all qualify; log noise does not).
 */
export function isWellFormedVersion(value: string): boolean {
  if (value === '' || /\s/.test(value)) {
    return false;
  }
  return semver.coerce(value) !== null;
}

async function queryVersion(
  query: BuildMetadataQuery,
  expression: string,
  modulePath: string
): Promise<string> {
  const result = await query.evaluate(expression, modulePath);
  if (result.status === 'unavailable') {
    throw new VersionUnavailableError(expression, modulePath, result.reason);
  }
  if (!isWellFormedVersion(result.value)) {
    throw new VersionUnavailableError(expression, modulePath, `'${result.value}' is not a version`);
  }
  logger.debug(`${expression} = ${result.value}`);
  return result.value;
}

/**
 * Query the module's release version, then the runtime binary version
 */
export async function resolveModuleVersions(
  module: ResolvedModule,
  config: VersionConfig,
  query: BuildMetadataQuery,
  spinner?: UnifiedSpinner
): Promise<ModuleVersions> {
  spinner?.start(`Querying versions of ${module.moduleName}`);
  try {
    const moduleVersion = await queryVersion(query, config.versionExpression, module.modulePath);
    spinner?.message(`Querying ${config.binaryVersionExpression}`);
    const binaryVersion = await queryVersion(query, config.binaryVersionExpression, module.modulePath);
    spinner?.stop(`${module.moduleName} ${moduleVersion} (binary ${binaryVersion})`);
    return { moduleVersion, binaryVersion };
  } catch (error) {
    spinner?.stop();
    throw error;
  }
}

const INVALID_COORDINATE_PART = /[\s:/]/;

/**
 * `<group>:<prefix>-<module>_<binary>:<version>`, where a nested module
 * (`connectors/streaming-twitter`) contributes its last segment only
 */
export function formatDependencyCoordinate(
  group: string,
  artifactPrefix: string,
  moduleName: string,
  versions: ModuleVersions
): string {
  const artifactModule = moduleLeafName(moduleName);
  const parts = { group, artifactPrefix, moduleName: artifactModule, ...versions };
  for (const [name, value] of Object.entries(parts)) {
    if (value === '' || INVALID_COORDINATE_PART.test(value)) {
      throw new ValidationError(`dependency coordinate part '${name}' must be non-empty and contain no whitespace, ':' or '/'`, { [name]: value });
    }
  }
  return `${group}:${artifactPrefix}-${artifactModule}_${versions.binaryVersion}:${versions.moduleVersion}`;
}
