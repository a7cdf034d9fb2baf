/**
 * PDF version strings ("1.4", "2.0").
 */

export const VERSION_PATTERN = /^\d+\.\d+$/;

export function isValidVersion(version: string): boolean {
  return VERSION_PATTERN.test(version);
}

/**
 * Numeric comparison of two `M.N` versions: negative, zero or positive.
 * "1.10" sorts after "1.9".
 */
export function compareVersions(a: string, b: string): number {
  const [aMajor = 0, aMinor = 0] = a.split(".").map(Number);
  const [bMajor = 0, bMinor = 0] = b.split(".").map(Number);

  return aMajor - bMajor || aMinor - bMinor;
}

export function maxVersion(a: string, b: string): string {
  return compareVersions(a, b) >= 0 ? a : b;
}
