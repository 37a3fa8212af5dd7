/**
 * Catalog version comparison.
 *
 * Versions look like `v1.0` or `v1.2.3`; the `v` is optional.
 */

type VersionParts = [major: number, minor: number, patch: number];

const VERSION_PATTERN = /^v?(\d+)\.(\d+)(?:\.(\d+))?$/;

export function parseVersion(version: string): VersionParts | null {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    return null;
  }
  return [Number(match[1]), Number(match[2]), Number(match[3] ?? "0")];
}

/**
 * True if `version` is the same as or newer than `minimum`.
 * Unparsable versions never satisfy the minimum.
 */
export function isVersionAtLeast(version: string, minimum: string): boolean {
  const actual = parseVersion(version);
  const required = parseVersion(minimum);
  if (!actual || !required) {
    return false;
  }

  for (let i = 0; i < 3; i++) {
    if (actual[i] !== required[i]) {
      return actual[i] > required[i];
    }
  }
  return true;
}
