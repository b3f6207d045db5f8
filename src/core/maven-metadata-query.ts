import { execFile } from 'child_process';
import { promisify } from 'util';

import type { MetadataValue } from '../types/index.js';
import type { BuildMetadataQuery } from './ports/metadata-query.js';
import { MAVEN_UNDEFINED_MARKER } from '../constants/index.js';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

/**
 * Pick the value out of `help:evaluate -q -DforceStdout` output.
 * Exported for tests; the plugin prints the bare value, possibly after stray blank lines.
 */
export function parseEvaluateOutput(stdout: string): MetadataValue {
  const lines = stdout.split(/\r?\n/).map(line => line.trim()).filter(line => line !== '');
  const value = lines[lines.length - 1];

  if (value === undefined) {
    return { status: 'unavailable', reason: 'build tool printed no value' };
  }
  if (value.includes(MAVEN_UNDEFINED_MARKER)) {
    return { status: 'unavailable', reason: 'property is not defined' };
  }
  return { status: 'available', value };
}

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return 'build tool not found on PATH';
    }
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    return stderr || error.message;
  }
  return String(error);
}

/**
 * Maven-backed metadata query: one quiet `help:evaluate` run per property
 */
export class MavenMetadataQuery implements BuildMetadataQuery {
  constructor(private readonly command: string = 'mvn') {}

  async evaluate(expression: string, modulePath: string): Promise<MetadataValue> {
    const args = ['-q', '-DforceStdout', 'help:evaluate', `-Dexpression=${expression}`];
    logger.debug(`Running ${this.command} ${args.join(' ')}`, { cwd: modulePath });

    try {
      const { stdout } = await execFileAsync(this.command, args, {
        cwd: modulePath,
        encoding: 'utf8',
        maxBuffer: 10 * 1024 * 1024
      });
      return parseEvaluateOutput(stdout);
    } catch (error) {
      const reason = describeFailure(error);
      logger.debug(`Metadata query for ${expression} failed`, { reason });
      return { status: 'unavailable', reason };
    }
  }
}
