/**
 * Module probes
 *
 * Each probe maps (identifier, config) to the first matching path in the
 * project tree and the module directory derived from it, or undefined.
 * The resolver tries them in order; the first match wins.
 */

import { basename, isAbsolute, join, relative, sep } from 'path';
import type { ExampleIdentifier, ProbeMatch, ProbeName, RunnerConfig } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { walkEntries, type WalkEntry } from '../../utils/file-walker.js';
import { logger } from '../../utils/logger.js';

export type ProbeConfig = Pick<RunnerConfig, 'projectRoot' | 'exampleSourcesMarker' | 'compiledClassesMarker'>;

export interface ModuleProbe {
  name: ProbeName;
  probe(identifier: ExampleIdentifier, config: ProbeConfig): Promise<ProbeMatch | undefined>;
}

/**
 * Root-relative form of a walked path, with '/' separators and a leading '/'
 */
export function toRootRelative(root: string, path: string): string {
  return '/' + relative(root, path).split(sep).join('/');
}

/**
 * Fragments given as absolute paths inside the project are searched root-relative
 */
function toSearchFragment(fragment: string, root: string): string {
  if (!isAbsolute(fragment)) {
    return fragment;
  }
  const rel = relative(root, fragment);
  return rel.startsWith('..') ? fragment : rel.split(sep).join('/');
}

/**
 * Hidden directories (.git, .idea, ...) never hold modules
 */
function skipHiddenDirectories(path: string, isDirectory: boolean): boolean {
  return !(isDirectory && basename(path).startsWith('.'));
}

/**
 * Walk the project and return the first entry whose root-relative path passes
 * the predicate and yields a module directory below the root.
 */
async function findFirstModuleMatch(
  root: string,
  marker: string,
  predicate: (rel: string, entry: WalkEntry) => boolean
): Promise<{ matchedPath: string; modulePath: string } | undefined> {
  for await (const entry of walkEntries(root, { filter: skipHiddenDirectories })) {
    const rel = toRootRelative(root, entry.path);
    const markerIndex = rel.indexOf(marker);
    if (markerIndex < 0 || !predicate(rel, entry)) {
      continue;
    }
    if (markerIndex === 0) {
      logger.debug(`Ignoring match at the project root itself: ${entry.path}`);
      continue;
    }
    return {
      matchedPath: entry.path,
      modulePath: join(root, ...rel.slice(1, markerIndex).split('/'))
    };
  }
  return undefined;
}

/**
 * Source-tree search for a fragment under the example-sources marker
 */
export async function searchExampleSources(
  fragment: string,
  config: ProbeConfig,
  probe: ProbeName
): Promise<ProbeMatch | undefined> {
  const searchFragment = toSearchFragment(fragment, config.projectRoot);
  const match = await findFirstModuleMatch(
    config.projectRoot,
    config.exampleSourcesMarker,
    rel => rel.includes(searchFragment)
  );
  return match ? { probe, ...match } : undefined;
}

/**
 * Step 1: the identifier's full path appears verbatim in an example source tree
 */
export const sourceProbe: ModuleProbe = {
  name: 'source',
  probe: (identifier, config) => searchExampleSources(identifier.pathFragment, config, 'source')
};

/**
 * Step 2: a compiled class under a build output directory.
 * Nested classes compile to Outer$Inner.class, so '$' counts as a path separator.
 */
export const compiledClassProbe: ModuleProbe = {
  name: 'compiled-class',
  async probe(identifier, config) {
    if (identifier.kind !== 'class') {
      return undefined;
    }
    const fragment = '/' + identifier.pathFragment;
    const match = await findFirstModuleMatch(
      config.projectRoot,
      config.compiledClassesMarker,
      (rel, entry) => {
        if (entry.isDirectory || !rel.endsWith(FILE_PATTERNS.CLASS_FILE)) {
          return false;
        }
        const classPath = rel.slice(0, -FILE_PATTERNS.CLASS_FILE.length).replace(/\$/g, '/');
        return classPath.endsWith(fragment) || classPath.includes(fragment + '/');
      }
    );
    return match ? { probe: 'compiled-class', ...match } : undefined;
  }
};

/**
 * Step 3: only the package portion appears in an example source tree
 */
export const packageProbe: ModuleProbe = {
  name: 'package',
  async probe(identifier, config) {
    if (!identifier.packageFragment) {
      return undefined;
    }
    return searchExampleSources(identifier.packageFragment, config, 'package');
  }
};

export const DEFAULT_MODULE_PROBES: readonly ModuleProbe[] = [sourceProbe, compiledClassProbe, packageProbe];
