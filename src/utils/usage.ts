import { DEFAULT_CONVENTIONS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';

/**
 * Full usage text, printed for -h, for no arguments and after a failed module lookup
 */
export function getUsageText(): string {
  return [
    'Usage: run-example [options] <example-identifier> [example-args...]',
    '',
    'Resolve an example bundled in this multi-module build and submit it with',
    `${ENV_VARS.RUNTIME_HOME}/${DEFAULT_CONVENTIONS.SUBMIT_COMMAND}.`,
    '',
    'Arguments:',
    '  example-identifier    fully qualified example class, or a path to a',
    `                        ${DEFAULT_CONVENTIONS.SCRIPT_EXTENSION} example script`,
    '  example-args          passed to the example unchanged',
    '',
    'Options:',
    '  --project-root <dir>  root of the multi-module checkout',
    '  --dry-run             print the submission command without running it',
    '  --verbose             log every resolution step',
    '  -V, --version         print the tool version',
    '  -h, --help            show this help',
    '',
    'Environment:',
    `  ${ENV_VARS.RUNTIME_HOME}            runtime installation directory (required)`,
    `  ${ENV_VARS.VERBOSE}=1   same as --verbose`,
    '',
    `Conventions can be overridden in ${FILE_PATTERNS.RUN_EXAMPLE_YML} at the project root.`,
    '',
    'Examples:',
    '  run-example org.apache.spark.examples.streaming.akka.ActorWordCount localhost 9999',
    '  run-example streaming-mqtt/examples/src/main/python/mqtt_wordcount.py tcp://localhost:1883 foo',
    ''
  ].join('\n');
}

/**
 * Print usage to stderr; every caller exits 1 afterwards
 */
export function printUsage(): void {
  process.stderr.write(getUsageText());
}

/**
 * True when the arguments ask for usage: none at all, or a first argument like -h / --help
 */
export function isUsageRequest(args: readonly string[]): boolean {
  const first = args[0];
  if (first === undefined) {
    return true;
  }
  return /^--?h(elp)?$/.test(first);
}
