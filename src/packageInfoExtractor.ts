// Extraction of package facts from vulnerability alert text.
// Each field (name, current version, fixed version, CVE) is resolved by an
// ordered list of pure strategies; the first strategy that yields a value
// wins and its source tag is recorded on the fact.
// Limitations: Tuned for English-language advisories and Python package
//   naming. The known-package list is curated, not exhaustive.

import { readFileSync } from "fs";

import {
  findPinnedVersion,
  normalizePackageName,
} from "./manifestUpdater.js";
import type {
  Alert,
  ExtractionResult,
  FactConfidence,
  ManifestSnapshot,
} from "./types.js";
import { VERSION_PATTERN } from "./versionComparator.js";

const NAME = "[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?";
const V = VERSION_PATTERN;
const CVE_PATTERN = /CVE-\d{4}-\d+/i;

const STOP_WORDS = new Set([
  "a", "an", "and", "are", "be", "dependencies", "dependency", "fix", "from",
  "in", "is", "its", "latest", "library", "of", "or", "package", "packages",
  "security", "that", "the", "this", "to", "update", "upgrade", "version",
  "versions", "vulnerability", "your",
]);

// ============================================================
// Known packages
// ============================================================

export type KnownPackages = ReadonlyMap<string, string>;

const KNOWN_PACKAGES_URL = new URL("../data/known-packages.json", import.meta.url);

let defaultKnownPackages: KnownPackages | null = null;

export function buildKnownPackages(names: readonly string[]): KnownPackages {
  return new Map(names.map((name) => [normalizePackageName(name), name]));
}

export function loadKnownPackages(): KnownPackages {
  if (!defaultKnownPackages) {
    const parsed: unknown = JSON.parse(readFileSync(KNOWN_PACKAGES_URL, "utf-8"));
    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
      throw new Error("known-packages.json must be an array of package names.");
    }
    defaultKnownPackages = buildKnownPackages(parsed);
  }
  return defaultKnownPackages;
}

// ============================================================
// Strategy plumbing
// ============================================================

export interface ExtractionContext {
  alert: Alert;
  manifests: readonly ManifestSnapshot[];
  knownPackages: KnownPackages;
}

export interface VersionContext extends ExtractionContext {
  name: string;
}

export interface FieldStrategy<C> {
  readonly source: string;
  extract(context: C): string | null;
}

function firstSuccess<C>(
  strategies: readonly FieldStrategy<C>[],
  context: C
): { value: string; source: string } | null {
  for (const strategy of strategies) {
    const value = strategy.extract(context);
    if (value !== null) {
      return { value, source: strategy.source };
    }
  }
  return null;
}

// Earliest match across several patterns; the capture group is the value.
function earliestMatch(
  text: string,
  patterns: readonly RegExp[],
  group = 1,
  accept: (value: string) => boolean = () => true
): string | null {
  let best: { index: number; value: string } | null = null;
  for (const pattern of patterns) {
    const global = new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`);
    for (const match of text.matchAll(global)) {
      const value = match[group];
      if (value === undefined || !accept(value)) continue;
      const index = match.index ?? 0;
      if (!best || index < best.index) {
        best = { index, value };
      }
      break;
    }
  }
  return best ? best.value : null;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Matches the name with any PEP 503 separator spelling.
function namePattern(name: string): string {
  return normalizePackageName(name)
    .split("-")
    .map(escapeRegExp)
    .join("[-_.]+");
}

// ============================================================
// Package name
// ============================================================

const NAME_PHRASES: readonly RegExp[] = [
  new RegExp(`\\b(?:update|upgrade|bump)\\s+\`?(${NAME})\`?\\s+(?:to|from)\\b`, "i"),
  new RegExp(`\\bvulnerable\\s+(?:package|dependency|library)\\s*:?\\s*\`?(${NAME})`, "i"),
  new RegExp(`\\bpackage\\s*:\\s*\`?(${NAME})`, "i"),
  new RegExp(
    `\`?(${NAME})\`?\\s+has\\s+(?:a\\s+|an\\s+)?(?:known\\s+|critical\\s+|high\\s+|moderate\\s+)?(?:security\\s+)?(?:issue|vulnerability|vulnerabilities|flaw)`,
    "i"
  ),
  new RegExp(
    `\\b(?:security\\s+(?:issue|vulnerability|flaw)|vulnerability)\\s+in\\s+\`?(${NAME})`,
    "i"
  ),
  new RegExp(`\`(${NAME})\``),
];

function isCandidateName(value: string): boolean {
  return !STOP_WORDS.has(value.toLowerCase()) && !CVE_PATTERN.test(value) && !/^\d/.test(value);
}

function knownPackageIn(text: string, known: KnownPackages): string | null {
  for (const match of text.matchAll(new RegExp(NAME, "g"))) {
    const canonical = known.get(normalizePackageName(match[0]));
    if (canonical) {
      return canonical;
    }
  }
  return null;
}

export const NAME_STRATEGIES: readonly FieldStrategy<ExtractionContext>[] = [
  {
    source: "title-known-package",
    extract: ({ alert, knownPackages }) => knownPackageIn(alert.title, knownPackages),
  },
  {
    source: "title-phrase",
    extract: ({ alert }) => earliestMatch(alert.title, NAME_PHRASES, 1, isCandidateName),
  },
  {
    source: "description-phrase",
    extract: ({ alert }) => earliestMatch(alert.description, NAME_PHRASES, 1, isCandidateName),
  },
  {
    source: "description-known-package",
    extract: ({ alert, knownPackages }) => knownPackageIn(alert.description, knownPackages),
  },
];

const NAME_CONFIDENCE: Record<string, FactConfidence> = {
  "title-known-package": "high",
  "title-phrase": "medium",
};

// ============================================================
// Current version
// ============================================================

const VULNERABLE_VERSION_PHRASES: readonly RegExp[] = [
  new RegExp(`\\bversion\\s+v?(${V})\\s+(?:is|are)\\s+vulnerable`, "i"),
  new RegExp(`\\baffects\\s+versions?\\s+(?:before|prior\\s+to|below|earlier\\s+than|<)\\s*v?(${V})`, "i"),
  new RegExp(`\\b(?:installed|current|detected)\\s+version\\s*:?\\s*v?(${V})`, "i"),
];

export const CURRENT_VERSION_STRATEGIES: readonly FieldStrategy<VersionContext>[] = [
  {
    source: "code-snippet",
    extract: ({ alert, name }) => {
      if (!alert.codeSnippet) return null;
      const pin = new RegExp(
        `(?:^|[^A-Za-z0-9._-])${namePattern(name)}\\s*(?:\\[[^\\]]*\\])?\\s*(?:===|==|>=|~=)\\s*v?(${V})`,
        "i"
      );
      for (const line of alert.codeSnippet.split("\n")) {
        const match = line.match(pin);
        if (match) return match[1];
      }
      return null;
    },
  },
  {
    source: "description-text",
    extract: ({ alert }) => earliestMatch(alert.description, VULNERABLE_VERSION_PHRASES),
  },
  {
    source: "manifest",
    extract: ({ manifests, name }) => {
      for (const manifest of manifests) {
        const version = findPinnedVersion(manifest.dialect, manifest.content, name);
        if (version !== null) return version;
      }
      return null;
    },
  },
];

// ============================================================
// Fixed version
// ============================================================

const RECOMMENDATION_PHRASES: readonly RegExp[] = [
  new RegExp(`\\bfrom\\s+v?${V}\\s+to\\s+v?(${V})`, "i"),
  new RegExp(`\\b(?:upgrade|update|bump)\\b[^.\\n]*?\\bto\\s+(?:at\\s+least\\s+)?(?:version\\s+)?v?(${V})`, "i"),
  new RegExp(`\\bv?(${V})\\s+or\\s+(?:later|higher|newer|above|greater)`, "i"),
  new RegExp(`\\bfixed\\s+in\\s+(?:version\\s+)?v?(${V})`, "i"),
];

const FIXED_DESCRIPTION_PHRASES: readonly RegExp[] = [
  new RegExp(`\\bfixed\\s+in\\s+(?:version\\s+)?v?(${V})`, "i"),
  new RegExp(`\\bv?(${V})\\s+or\\s+(?:later|higher|newer|above|greater)`, "i"),
  new RegExp(`\\bpatched\\s+(?:in\\s+)?(?:versions?\\s*:?\\s*)?(?:>=\\s*)?v?(${V})`, "i"),
];

const TITLE_FROM_TO = new RegExp(
  `\\b(?:update|upgrade|bump)\\s+\`?${NAME}\`?\\s+from\\s+v?${V}\\s+to\\s+v?(${V})`,
  "i"
);

export const FIXED_VERSION_STRATEGIES: readonly FieldStrategy<VersionContext>[] = [
  {
    source: "recommendation",
    extract: ({ alert }) => {
      for (const recommendation of alert.recommendations ?? []) {
        const version = earliestMatch(recommendation, RECOMMENDATION_PHRASES);
        if (version !== null) return version;
      }
      return null;
    },
  },
  {
    source: "description",
    extract: ({ alert }) => earliestMatch(alert.description, FIXED_DESCRIPTION_PHRASES),
  },
  {
    source: "title-from-to",
    extract: ({ alert }) => alert.title.match(TITLE_FROM_TO)?.[1] ?? null,
  },
];

// ============================================================
// CVE
// ============================================================

export function extractCve(alert: Alert): string | null {
  const text = [
    alert.title,
    alert.description,
    alert.codeSnippet ?? "",
    ...(alert.recommendations ?? []),
  ].join("\n");
  const match = text.match(CVE_PATTERN);
  return match ? match[0].toUpperCase() : null;
}

// ============================================================
// Public API
// ============================================================

export function extractPackageInfo(
  alert: Alert,
  manifests: readonly ManifestSnapshot[] = [],
  knownPackages: KnownPackages = loadKnownPackages()
): ExtractionResult {
  const context: ExtractionContext = { alert, manifests, knownPackages };

  const name = firstSuccess(NAME_STRATEGIES, context);
  if (!name) {
    return { status: "not-found", reason: "no-package-name" };
  }

  const versionContext: VersionContext = { ...context, name: name.value };
  const current = firstSuccess(CURRENT_VERSION_STRATEGIES, versionContext);
  const fixed = firstSuccess(FIXED_VERSION_STRATEGIES, versionContext);
  const cve = extractCve(alert);

  return {
    status: "found",
    fact: {
      name: name.value,
      currentVersion: current?.value ?? null,
      fixedVersion: fixed?.value ?? null,
      cve,
      sources: {
        name: name.source,
        currentVersion: current?.source ?? null,
        fixedVersion: fixed?.source ?? null,
        cve: cve ? "text" : null,
      },
      confidence: NAME_CONFIDENCE[name.source] ?? "low",
    },
  };
}
