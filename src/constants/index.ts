/**
 * Shared constants for the run-example CLI
 * Defaults for every convention the resolver relies on; each one can be
 * overridden from run-example.yml at the project root.
 */

export const FILE_PATTERNS = {
  RUN_EXAMPLE_YML: 'run-example.yml',
  POM_XML: 'pom.xml',
  CLASS_FILE: '.class'
} as const;

export const ENV_VARS = {
  RUNTIME_HOME: 'SPARK_HOME',
  VERBOSE: 'RUN_EXAMPLE_VERBOSE'
} as const;

export const DEFAULT_CONVENTIONS = {
  DEPENDENCY_GROUP: 'org.apache.bahir',
  ARTIFACT_PREFIX: 'spark',
  EXAMPLE_SOURCES_MARKER: '/examples/src/',
  COMPILED_CLASSES_MARKER: '/target/',
  ARTIFACT_SUFFIX: '-tests.jar',
  SCRIPT_EXTENSION: '.py',
  SCRIPT_ROOT_DIR_NAME: 'python',
  SCRIPT_SEARCH_PATH_VARIABLE: 'PYTHONPATH',
  BUILD_COMMAND: 'mvn',
  VERSION_EXPRESSION: 'project.version',
  BINARY_VERSION_EXPRESSION: 'scala.binary.version',
  SUBMIT_COMMAND: 'bin/spark-submit'
} as const;

/**
 * Printed by the Maven help plugin when an expression has no value
 */
export const MAVEN_UNDEFINED_MARKER = 'null object or invalid expression';

export const SUBMIT_FLAGS = {
  PACKAGES: '--packages',
  CLASS: '--class'
} as const;
