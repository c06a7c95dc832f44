import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Reads the version from the package.json two levels above this module,
 * which holds for both `src/utils` and the compiled `dist/utils`.
 */
function getPackageVersion(): string {
  try {
    const packagePath = join(__dirname, '..', '..', 'package.json');
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));

    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const PACKAGE_VERSION = getPackageVersion();
