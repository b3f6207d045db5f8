// Example identifiers
export type ExampleKind = 'class' | 'script';

export interface ExampleIdentifier {
  /** Identifier exactly as given on the command line */
  raw: string;
  kind: ExampleKind;
  /** Identifier as a path fragment (dots converted for classes) */
  pathFragment: string;
  /** Package (or parent directory) portion, absent for a bare name */
  packageFragment?: string;
}

// Module resolution
export type ProbeName = 'source' | 'compiled-class' | 'package';

export interface ProbeMatch {
  probe: ProbeName;
  /** First path that matched the probe */
  matchedPath: string;
  /** Absolute module directory derived from the matched path */
  modulePath: string;
}

export interface ResolvedModule {
  modulePath: string;
  /** Module path relative to the project root, always with '/' separators */
  moduleName: string;
  probe: ProbeName;
  matchedPath: string;
}

// Versions
export type MetadataValue =
  | { status: 'available'; value: string }
  | { status: 'unavailable'; reason: string };

export interface ModuleVersions {
  moduleVersion: string;
  binaryVersion: string;
}

// Terminal action
export interface TerminalAction {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
  inheritStdio: true;
  exitWithChildStatus: true;
}

// Configuration
export interface RunExampleFileConfig {
  dependency?: {
    group?: string;
    artifactPrefix?: string;
  };
  markers?: {
    exampleSources?: string;
    compiledClasses?: string;
  };
  artifacts?: {
    suffix?: string;
  };
  scripts?: {
    extension?: string;
    rootDirName?: string;
    searchPathVariable?: string;
  };
  build?: {
    command?: string;
    versionExpression?: string;
    binaryVersionExpression?: string;
  };
  submit?: {
    command?: string;
  };
}

export interface RunnerConfig {
  readonly runtimeHome: string;
  readonly projectRoot: string;
  readonly dependencyGroup: string;
  readonly artifactPrefix: string;
  readonly exampleSourcesMarker: string;
  readonly compiledClassesMarker: string;
  readonly artifactSuffix: string;
  readonly scriptExtension: string;
  readonly scriptRootDirName: string;
  readonly scriptSearchPathVariable: string;
  readonly buildCommand: string;
  readonly versionExpression: string;
  readonly binaryVersionExpression: string;
  /** Absolute path of the submission tool */
  readonly submitCommand: string;
  readonly dryRun: boolean;
}

// Status and error types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export class RunExampleError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RunExampleError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  MODULE_NOT_FOUND = 'MODULE_NOT_FOUND',
  ARTIFACT_NOT_FOUND = 'ARTIFACT_NOT_FOUND',
  EXAMPLE_NOT_FOUND = 'EXAMPLE_NOT_FOUND',
  VERSION_UNAVAILABLE = 'VERSION_UNAVAILABLE',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  LAUNCH_FAILED = 'LAUNCH_FAILED'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
