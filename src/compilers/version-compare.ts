/**
 * Default version comparator: dotted numeric precedence.
 */

/**
 * Parsed version: release segments and optional pre-release segments.
 */
interface ParsedVersion {
  release: string[];
  prerelease: string[] | null;
}

const NUMERIC_SEGMENT = /^[0-9]+$/;

function parseVersion(version: string): ParsedVersion {
  // Build metadata never takes part in precedence
  const [withoutBuild = ''] = version.trim().split('+');
  const dash = withoutBuild.indexOf('-');
  const release = dash === -1 ? withoutBuild : withoutBuild.slice(0, dash);
  const prerelease = dash === -1 ? null : withoutBuild.slice(dash + 1);

  return {
    release: release.split('.'),
    prerelease: prerelease === null ? null : prerelease.split('.'),
  };
}

function compareNumeric(a: string, b: string): number {
  // Digit strings of any length: drop leading zeros, then longer is greater
  const left = a.replace(/^0+/, '');
  const right = b.replace(/^0+/, '');
  if (left.length !== right.length) {
    return left.length < right.length ? -1 : 1;
  }
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function compareSegments(a: string, b: string): number {
  const numericA = NUMERIC_SEGMENT.test(a);
  const numericB = NUMERIC_SEGMENT.test(b);

  if (numericA && numericB) {
    return compareNumeric(a, b);
  }
  // Numeric segments sort below alphanumeric ones
  if (numericA) return -1;
  if (numericB) return 1;

  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

/**
 * Compare segment lists position by position.
 * A missing segment is replaced by `filler`, or sorts first when filler is null.
 */
function compareSegmentLists(a: string[], b: string[], filler: string | null): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = i < a.length ? a[i] : filler;
    const right = i < b.length ? b[i] : filler;
    if (left === null || right === null) {
      return left === null ? -1 : 1;
    }
    const result = compareSegments(left || filler || '', right || filler || '');
    if (result !== 0) {
      return result;
    }
  }
  return 0;
}

/**
 * Compare two dotted version strings.
 *
 * Numeric segments compare numerically at any length, other segments
 * lexically, and a numeric segment sorts below an alphanumeric one.
 * Missing or empty release segments count as 0 (so `1.2` equals `1.2.0`).
 * A pre-release (`1.2.0-rc1`) sorts below its release, a shorter
 * pre-release below a longer one with the same prefix; `+build` is ignored.
 *
 * @returns Negative if a < b, positive if a > b, zero if equal
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);

  const release = compareSegmentLists(left.release, right.release, '0');
  if (release !== 0) {
    return release;
  }

  if (left.prerelease === null && right.prerelease === null) return 0;
  if (left.prerelease === null) return 1;
  if (right.prerelease === null) return -1;
  return compareSegmentLists(left.prerelease, right.prerelease, null);
}
