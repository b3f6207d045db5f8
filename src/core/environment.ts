import { resolve } from 'path';
import { ENV_VARS } from '../constants/index.js';
import { isDirectory } from '../utils/fs.js';
import { PreconditionError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Verify the runtime installation variable is set and names an existing directory.
 * Returns the absolute installation root.
 */
export async function checkRuntimeHome(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const name = ENV_VARS.RUNTIME_HOME;
  const value = env[name];

  if (!value || value.trim() === '') {
    throw new PreconditionError(`${name} is not set. Point it at your runtime installation directory.`, { variable: name });
  }

  const runtimeHome = resolve(value);
  if (!(await isDirectory(runtimeHome))) {
    throw new PreconditionError(`${name} is set to '${value}', which is not an existing directory.`, { variable: name, value });
  }

  logger.debug(`Using ${name}=${runtimeHome}`);
  return runtimeHome;
}
