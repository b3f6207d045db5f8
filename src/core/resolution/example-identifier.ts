import type { ExampleIdentifier, RunnerConfig } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';

/**
 * Turn the raw command-line identifier into the fragments the probes search for.
 *
 * Class names become slash-separated paths (`a.b.C` -> `a/b/C`, package `a/b`);
 * script paths keep their dots and use their parent directory as the package.
 * `raw` stays exactly as given; surrounding whitespace is dropped only from the fragments.
 */
export function parseExampleIdentifier(
  raw: string,
  config: Pick<RunnerConfig, 'scriptExtension'>
): ExampleIdentifier {
  const trimmed = raw.trim();
  if (trimmed === '') {
    throw new ValidationError('Example identifier must not be empty');
  }

  if (trimmed.endsWith(config.scriptExtension)) {
    const pathFragment = trimmed.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
    const slash = pathFragment.lastIndexOf('/');
    return {
      raw,
      kind: 'script',
      pathFragment,
      packageFragment: slash > 0 ? pathFragment.slice(0, slash) : undefined
    };
  }

  const segments = trimmed.split('.');
  if (segments.some(segment => segment === '')) {
    throw new ValidationError(`'${trimmed}' is not a valid class name`);
  }

  return {
    raw,
    kind: 'class',
    pathFragment: segments.join('/'),
    packageFragment: segments.length > 1 ? segments.slice(0, -1).join('/') : undefined
  };
}
