/**
 * Version Checker - Node.js runtime requirement
 */

import { UnifierError } from './errors';

/** Worker threads rely on `os.availableParallelism` and global fetch */
export const MIN_NODE_VERSION = '20.0.0';

export interface VersionCheckResult {
  isCompatible: boolean;
  currentVersion: string;
  requiredVersion: string;
  errorMessage?: string;
}

/**
 * Check a Node.js version (default: the running one) against the minimum
 */
export function checkNodeVersion(
  currentVersion: string = process.versions.node,
  requiredVersion: string = MIN_NODE_VERSION
): VersionCheckResult {
  if (compareVersions(currentVersion, requiredVersion) >= 0) {
    return { isCompatible: true, currentVersion, requiredVersion };
  }
  return {
    isCompatible: false,
    currentVersion,
    requiredVersion,
    errorMessage: `filter-unifier requires Node.js ${requiredVersion} or higher. Current version: ${currentVersion}`
  };
}

/**
 * Compare dotted versions numerically; a leading `v` and any
 * prerelease suffix (`-rc.1`) are ignored.
 * @returns -1, 0 or 1
 */
export function compareVersions(version1: string, version2: string): number {
  const parts1 = parseVersion(version1);
  const parts2 = parseVersion(version2);

  for (let i = 0; i < Math.max(parts1.length, parts2.length); i++) {
    const part1 = parts1[i] ?? 0;
    const part2 = parts2[i] ?? 0;
    if (part1 !== part2) {
      return part1 < part2 ? -1 : 1;
    }
  }
  return 0;
}

/**
 * @throws UnifierError when the running Node.js is too old
 */
export function enforceNodeVersion(): void {
  const result = checkNodeVersion();
  if (!result.isCompatible) {
    throw new UnifierError(result.errorMessage ?? `Node.js ${result.requiredVersion} or higher is required`);
  }
}

function parseVersion(version: string): number[] {
  return version
    .replace(/^v/, '')
    .split('-')[0]
    .split('.')
    .map(part => {
      const value = Number.parseInt(part, 10);
      return Number.isNaN(value) ? 0 : value;
    });
}
