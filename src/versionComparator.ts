// Version parsing and ordering for Python dependency versions.
// Follows the PEP 440 ordering rules closely enough to decide whether
// an on-disk pin already satisfies a fixed version from an alert.
// Limitations: Local version labels are compared as plain strings;
//   legacy (non-PEP 440) versions fall back to string comparison.

// Fragment for versions embedded in free text. Narrower than the parser:
// a trailing sentence period is never part of the match.
export const VERSION_PATTERN =
  "\\d+(?:\\.\\d+)*(?:(?:a|b|rc)\\d+)?(?:\\.post\\d+)?(?:\\.dev\\d+)?";

const PEP440_PATTERN =
  /^v?(?:(\d+)!)?(\d+(?:\.\d+)*)(?:[-_.]?(a|alpha|b|beta|c|rc|pre|preview)[-_.]?(\d+)?)?(?:-(\d+)|[-_.]?(post|rev|r)[-_.]?(\d+)?)?(?:[-_.]?(dev)[-_.]?(\d+)?)?(?:\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?$/i;

const PRE_RELEASE_RANK: Record<string, number> = {
  a: 0,
  alpha: 0,
  b: 1,
  beta: 1,
  c: 2,
  rc: 2,
  pre: 2,
  preview: 2,
};

export interface ParsedVersion {
  epoch: number;
  release: number[];
  pre: { rank: number; number: number } | null;
  post: number | null;
  dev: number | null;
  local: string | null;
}

export function parseVersion(text: string): ParsedVersion | null {
  const match = text.trim().match(PEP440_PATTERN);
  if (!match) {
    return null;
  }

  const [
    ,
    epoch,
    release,
    preLabel,
    preNumber,
    implicitPost,
    postLabel,
    postNumber,
    devLabel,
    devNumber,
    local,
  ] = match;

  let post: number | null = null;
  if (implicitPost !== undefined) {
    post = parseInt(implicitPost, 10);
  } else if (postLabel !== undefined) {
    post = postNumber !== undefined ? parseInt(postNumber, 10) : 0;
  }

  return {
    epoch: epoch !== undefined ? parseInt(epoch, 10) : 0,
    release: release.split(".").map((part) => parseInt(part, 10)),
    pre:
      preLabel !== undefined
        ? {
            rank: PRE_RELEASE_RANK[preLabel.toLowerCase()] ?? 0,
            number: preNumber !== undefined ? parseInt(preNumber, 10) : 0,
          }
        : null,
    post,
    dev:
      devLabel !== undefined
        ? devNumber !== undefined
          ? parseInt(devNumber, 10)
          : 0
        : null,
    local: local !== undefined ? local.toLowerCase() : null,
  };
}

export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a);
  const right = parseVersion(b);
  if (!left || !right) {
    return a.trim() < b.trim() ? -1 : a.trim() > b.trim() ? 1 : 0;
  }
  return compareParsed(left, right);
}

export function isAtLeast(version: string, floor: string): boolean {
  return compareVersions(version, floor) >= 0;
}

function compareParsed(a: ParsedVersion, b: ParsedVersion): number {
  if (a.epoch !== b.epoch) {
    return a.epoch < b.epoch ? -1 : 1;
  }

  const length = Math.max(a.release.length, b.release.length);
  for (let i = 0; i < length; i++) {
    const left = a.release[i] ?? 0;
    const right = b.release[i] ?? 0;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }

  const byPre = compareNumbers(preKey(a), preKey(b));
  if (byPre !== 0) return byPre;

  const byPost = compareNumbers(
    a.post ?? Number.NEGATIVE_INFINITY,
    b.post ?? Number.NEGATIVE_INFINITY
  );
  if (byPost !== 0) return byPost;

  const byDev = compareNumbers(
    a.dev ?? Number.POSITIVE_INFINITY,
    b.dev ?? Number.POSITIVE_INFINITY
  );
  if (byDev !== 0) return byDev;

  if (a.local === b.local) return 0;
  if (a.local === null) return -1;
  if (b.local === null) return 1;
  return a.local < b.local ? -1 : 1;
}

// A dev release of a final version (1.0.dev1) sorts before its pre-releases.
function preKey(version: ParsedVersion): number {
  if (version.pre) {
    return version.pre.rank * 1_000_000 + version.pre.number;
  }
  if (version.post === null && version.dev !== null) {
    return Number.NEGATIVE_INFINITY;
  }
  return Number.POSITIVE_INFINITY;
}

function compareNumbers(a: number, b: number): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
