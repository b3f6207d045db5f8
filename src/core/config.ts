import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'js-yaml';
import type { RunExampleFileConfig, RunnerConfig } from '../types/index.js';
import { DEFAULT_CONVENTIONS, FILE_PATTERNS } from '../constants/index.js';
import { exists, isDirectory, readTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Configuration for a single run of the CLI.
 * Built once at startup from flags, environment and an optional
 * run-example.yml, then passed explicitly through the pipeline.
 */

const TOOL_DIR = dirname(fileURLToPath(import.meta.url));

export interface RunnerConfigOptions {
  runtimeHome: string;
  projectRoot?: string;
  cwd?: string;
  /** Where this tool is installed; searched for the checkout before cwd */
  toolDir?: string;
  dryRun?: boolean;
}

type FileConfigSection = keyof RunExampleFileConfig;

const KNOWN_FIELDS: { [S in FileConfigSection]-?: ReadonlyArray<keyof NonNullable<RunExampleFileConfig[S]>> } = {
  dependency: ['group', 'artifactPrefix'],
  markers: ['exampleSources', 'compiledClasses'],
  artifacts: ['suffix'],
  scripts: ['extension', 'rootDirName', 'searchPathVariable'],
  build: ['command', 'versionExpression', 'binaryVersionExpression'],
  submit: ['command']
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKnownSection(name: string): name is FileConfigSection {
  return Object.prototype.hasOwnProperty.call(KNOWN_FIELDS, name);
}

/**
 * Validate the parsed YAML document: only known sections and fields,
 * every value a non-empty string.
 */
export function validateFileConfig(parsed: unknown, source: string): RunExampleFileConfig {
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${source} must contain a mapping at the top level`);
  }

  const result: Record<string, Record<string, string>> = {};

  for (const [sectionName, sectionValue] of Object.entries(parsed)) {
    if (!isKnownSection(sectionName)) {
      throw new ConfigError(`${source}: unknown section '${sectionName}'`);
    }
    if (!isRecord(sectionValue)) {
      throw new ConfigError(`${source}: section '${sectionName}' must be a mapping`);
    }

    const allowed: ReadonlyArray<string> = KNOWN_FIELDS[sectionName];
    const fields: Record<string, string> = {};
    for (const [field, value] of Object.entries(sectionValue)) {
      if (!allowed.includes(field)) {
        throw new ConfigError(`${source}: unknown field '${sectionName}.${field}'`);
      }
      if (typeof value !== 'string' || value.trim() === '') {
        throw new ConfigError(`${source}: '${sectionName}.${field}' must be a non-empty string`);
      }
      fields[field] = value;
    }
    result[sectionName] = fields;
  }

  const field = (section: FileConfigSection, name: string): string | undefined => result[section]?.[name];

  return {
    dependency: { group: field('dependency', 'group'), artifactPrefix: field('dependency', 'artifactPrefix') },
    markers: { exampleSources: field('markers', 'exampleSources'), compiledClasses: field('markers', 'compiledClasses') },
    artifacts: { suffix: field('artifacts', 'suffix') },
    scripts: {
      extension: field('scripts', 'extension'),
      rootDirName: field('scripts', 'rootDirName'),
      searchPathVariable: field('scripts', 'searchPathVariable')
    },
    build: {
      command: field('build', 'command'),
      versionExpression: field('build', 'versionExpression'),
      binaryVersionExpression: field('build', 'binaryVersionExpression')
    },
    submit: { command: field('submit', 'command') }
  };
}

/**
 * Load run-example.yml from the project root, or an empty config when absent
 */
export async function loadFileConfig(projectRoot: string): Promise<RunExampleFileConfig> {
  const configPath = join(projectRoot, FILE_PATTERNS.RUN_EXAMPLE_YML);
  if (!(await exists(configPath))) {
    logger.debug(`No ${FILE_PATTERNS.RUN_EXAMPLE_YML} in ${projectRoot}, using defaults`);
    return {};
  }

  logger.debug(`Loading config from: ${configPath}`);
  const content = await readTextFile(configPath);
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return validateFileConfig(parsed, configPath);
}

/**
 * Locate the root of the multi-module checkout above startDir.
 *
 * Nearest ancestor holding run-example.yml wins; failing that, the topmost
 * directory of the nearest chain of pom.xml files. Undefined when neither exists.
 */
export async function findProjectRoot(startDir: string): Promise<string | undefined> {
  let current = resolve(startDir);
  let topmostPom: string | undefined;

  while (true) {
    if (await exists(join(current, FILE_PATTERNS.RUN_EXAMPLE_YML))) {
      return current;
    }

    const hasPom = await exists(join(current, FILE_PATTERNS.POM_XML));
    if (hasPom) {
      topmostPom = current;
    } else if (topmostPom) {
      return topmostPom;
    }

    const parent = dirname(current);
    if (parent === current) {
      return topmostPom;
    }
    current = parent;
  }
}

/**
 * The checkout this tool lives in, or else the one holding the working directory
 */
export async function locateProjectRoot(toolDir: string, cwd: string): Promise<string> {
  for (const startDir of [toolDir, cwd]) {
    const found = await findProjectRoot(startDir);
    if (found) {
      return found;
    }
  }
  throw new ConfigError(
    `Could not find a project root above ${toolDir} or ${cwd}. ` +
      `Run inside a checkout holding ${FILE_PATTERNS.POM_XML} or ${FILE_PATTERNS.RUN_EXAMPLE_YML}, or pass --project-root.`,
    { toolDir, cwd }
  );
}

/**
 * Markers are matched as whole directory segments, so they always carry both slashes
 */
export function normalizeMarker(marker: string): string {
  const trimmed = marker.replace(/^\/+|\/+$/g, '');
  return `/${trimmed}/`;
}

/**
 * Merge flags, file config and defaults into the immutable run configuration
 */
export async function loadRunnerConfig(options: RunnerConfigOptions): Promise<RunnerConfig> {
  const cwd = options.cwd ?? process.cwd();

  let projectRoot: string;
  if (options.projectRoot) {
    projectRoot = resolve(cwd, options.projectRoot);
    if (!(await isDirectory(projectRoot))) {
      throw new ConfigError(`Project root '${options.projectRoot}' is not a directory`);
    }
  } else {
    projectRoot = await locateProjectRoot(options.toolDir ?? TOOL_DIR, cwd);
  }
  logger.debug(`Project root: ${projectRoot}`);

  const file = await loadFileConfig(projectRoot);

  return {
    runtimeHome: options.runtimeHome,
    projectRoot,
    dependencyGroup: file.dependency?.group ?? DEFAULT_CONVENTIONS.DEPENDENCY_GROUP,
    artifactPrefix: file.dependency?.artifactPrefix ?? DEFAULT_CONVENTIONS.ARTIFACT_PREFIX,
    exampleSourcesMarker: normalizeMarker(file.markers?.exampleSources ?? DEFAULT_CONVENTIONS.EXAMPLE_SOURCES_MARKER),
    compiledClassesMarker: normalizeMarker(file.markers?.compiledClasses ?? DEFAULT_CONVENTIONS.COMPILED_CLASSES_MARKER),
    artifactSuffix: file.artifacts?.suffix ?? DEFAULT_CONVENTIONS.ARTIFACT_SUFFIX,
    scriptExtension: file.scripts?.extension ?? DEFAULT_CONVENTIONS.SCRIPT_EXTENSION,
    scriptRootDirName: file.scripts?.rootDirName ?? DEFAULT_CONVENTIONS.SCRIPT_ROOT_DIR_NAME,
    scriptSearchPathVariable: file.scripts?.searchPathVariable ?? DEFAULT_CONVENTIONS.SCRIPT_SEARCH_PATH_VARIABLE,
    buildCommand: file.build?.command ?? DEFAULT_CONVENTIONS.BUILD_COMMAND,
    versionExpression: file.build?.versionExpression ?? DEFAULT_CONVENTIONS.VERSION_EXPRESSION,
    binaryVersionExpression: file.build?.binaryVersionExpression ?? DEFAULT_CONVENTIONS.BINARY_VERSION_EXPRESSION,
    submitCommand: resolve(options.runtimeHome, file.submit?.command ?? DEFAULT_CONVENTIONS.SUBMIT_COMMAND),
    dryRun: options.dryRun ?? false
  };
}
