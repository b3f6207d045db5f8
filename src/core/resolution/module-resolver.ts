import { relative, sep } from 'path';
import type { ExampleIdentifier, ResolvedModule } from '../../types/index.js';
import { ModuleNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_MODULE_PROBES, type ModuleProbe, type ProbeConfig } from './module-probes.js';

/**
 * Module path relative to the project root, with '/' separators
 */
export function toModuleName(projectRoot: string, modulePath: string): string {
  return relative(projectRoot, modulePath).split(sep).join('/');
}

/**
 * Last segment of a nested module name; jar names and artifact ids carry only this part
 */
export function moduleLeafName(moduleName: string): string {
  const segments = moduleName.split('/');
  return segments[segments.length - 1] ?? moduleName;
}

/**
 * Run the probe cascade and return the owning module of the example
 */
export async function resolveModule(
  identifier: ExampleIdentifier,
  config: ProbeConfig,
  probes: readonly ModuleProbe[] = DEFAULT_MODULE_PROBES
): Promise<ResolvedModule> {
  for (const probe of probes) {
    logger.debug(`Probing '${probe.name}' for ${identifier.raw}`);
    const match = await probe.probe(identifier, config);
    if (match) {
      const moduleName = toModuleName(config.projectRoot, match.modulePath);
      logger.debug(`Resolved module '${moduleName}' via ${probe.name} probe`, { matchedPath: match.matchedPath });
      return {
        modulePath: match.modulePath,
        moduleName,
        probe: match.probe,
        matchedPath: match.matchedPath
      };
    }
  }

  throw new ModuleNotFoundError(identifier.raw, {
    projectRoot: config.projectRoot,
    probes: probes.map(p => p.name)
  });
}
