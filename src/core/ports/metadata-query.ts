/**
 * Build Metadata Port
 *
 * Contract for asking the build tool for a single property of a module.
 * Implementations return one clean value or say explicitly that none is
 * available; callers never see the tool's log output.
 */

import type { MetadataValue } from '../../types/index.js';

export interface BuildMetadataQuery {
  /** Evaluate a build property (e.g. project.version) in the given module directory */
  evaluate(expression: string, modulePath: string): Promise<MetadataValue>;
}
