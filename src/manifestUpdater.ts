// Manifest rewriting for vulnerable package pins.
// One handler per manifest dialect rewrites every entry for a package to an
// exact pin on the fixed version, leaving every other byte of the file as-is.
// Pure string-in, string-out: writing to disk is the caller's job.
// Limitations: pyproject.toml support covers PEP 621 dependency arrays and
//   PEP 735 dependency groups, not Poetry's [tool.poetry] tables.
//   Hash-pinned requirement lines keep their (now stale) --hash options.

import { isAtLeast } from "./versionComparator.js";
import type { LineRange, ManifestDialect, ManifestUpdate } from "./types.js";

const NAME = "[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?";
const ON_DISK_VERSION = "[A-Za-z0-9.*+!_-]+";

export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, "-");
}

interface DialectHandler {
  update(
    content: string,
    packageName: string,
    fixedVersion: string
  ): ManifestUpdate;
  findPinnedVersion(content: string, packageName: string): string | null;
  listRequirements(content: string): string[];
}

// ============================================================
// Line-based requirements files
// ============================================================

const REQUIREMENT_LINE = new RegExp(
  `^(\\s*)(${NAME})(\\s*\\[[^\\]]*\\])?\\s*(==|>=|~=)\\s*(${ON_DISK_VERSION})((?:\\s*,\\s*(?:===|[<>!=~]=|[<>])\\s*[^,;#\\s]+)*)(.*)$`,
  "s"
);

function matchRequirementLine(
  line: string,
  packageName: string
): RegExpMatchArray | null {
  const trimmed = line.trimStart();
  if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith("-")) {
    return null;
  }
  const match = line.match(REQUIREMENT_LINE);
  if (!match || normalizePackageName(match[2]) !== normalizePackageName(packageName)) {
    return null;
  }
  return match;
}

const requirementsLine: DialectHandler = {
  update(content, packageName, fixedVersion) {
    const lines = content.split("\n");
    const changedLines: number[] = [];
    const previousVersions: string[] = [];
    let matchedEntries = 0;

    const next = lines.map((line, index) => {
      const match = matchRequirementLine(line, packageName);
      if (!match) {
        return line;
      }
      matchedEntries++;

      const [, indent, name, extras, , version, , rest] = match;
      if (isAtLeast(version, fixedVersion)) {
        return line;
      }

      const rewritten = `${indent}${name}${(extras ?? "").trim()}==${fixedVersion}${rest}`;
      if (rewritten === line) {
        return line;
      }
      changedLines.push(index + 1);
      previousVersions.push(version);
      return rewritten;
    });

    return buildUpdate(content, next, changedLines, previousVersions, matchedEntries);
  },

  findPinnedVersion(content, packageName) {
    for (const line of content.split("\n")) {
      const match = matchRequirementLine(line, packageName);
      if (match) {
        return match[5];
      }
    }
    return null;
  },

  listRequirements(content) {
    return content
      .split("\n")
      .map((line) => line.replace(/(^|\s)#.*$/, "").replace(/\\\s*$/, "").trim())
      .filter((line) => line !== "" && !line.startsWith("-"));
  },
};

// ============================================================
// pyproject.toml dependency arrays
// ============================================================

const TABLE_HEADER = /^\s*\[\[?\s*([^\]]+?)\s*\]\]?\s*(?:#.*)?$/;
const ARRAY_KEY = /^\s*(["']?)([A-Za-z0-9_.-]+)\1\s*=\s*\[/;
const STRING_LITERAL = /(["'])((?:(?!\1)[^\\\n]|\\.)*)\1/g;
const TABLE_ENTRY = new RegExp(`^(\\s*)(${NAME})(\\s*\\[[^\\]]*\\])?([^;]*)(;.*)?$`);
const LOWER_BOUND = new RegExp(`(===|==|>=|~=)\\s*(${ON_DISK_VERSION})`);

function isDependencyArray(table: string, key: string): boolean {
  return (
    (table === "project" && key === "dependencies") ||
    table === "project.optional-dependencies" ||
    table === "dependency-groups"
  );
}

// Net bracket depth change for a slice of TOML, ignoring strings and comments.
function bracketDelta(text: string): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === "\\" && quote === '"') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === "#") break;
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "[") depth++;
    else if (ch === "]") depth--;
  }
  return depth;
}

interface ArraySpan {
  line: number;
  from: number;
}

// Yields every line (and the column its array content starts at) that sits
// inside a dependency array.
function dependencyArraySpans(lines: string[]): ArraySpan[] {
  const spans: ArraySpan[] = [];
  let table = "";
  let depth = 0;

  lines.forEach((line, index) => {
    if (depth > 0) {
      spans.push({ line: index, from: 0 });
      depth += bracketDelta(line);
      return;
    }

    const header = line.match(TABLE_HEADER);
    if (header) {
      table = header[1].replace(/["']/g, "").replace(/\s*\.\s*/g, ".");
      return;
    }

    const key = line.match(ARRAY_KEY);
    if (key && isDependencyArray(table, key[2])) {
      const from = line.indexOf("[", line.indexOf("="));
      spans.push({ line: index, from });
      depth = bracketDelta(line.slice(from));
    }
  });

  return spans;
}

// String literals in an array span, skipping inline-table values such as
// { include-group = "test" }.
function requirementLiterals(
  segment: string
): Array<{ index: number; raw: string; quote: string; body: string }> {
  const literals: Array<{ index: number; raw: string; quote: string; body: string }> = [];
  for (const match of segment.matchAll(STRING_LITERAL)) {
    const index = match.index ?? 0;
    if (/=\s*$/.test(segment.slice(0, index))) continue;
    literals.push({ index, raw: match[0], quote: match[1], body: match[2] });
  }
  return literals;
}

const pyprojectTable: DialectHandler = {
  update(content, packageName, fixedVersion) {
    const lines = content.split("\n");
    const changedLines: number[] = [];
    const previousVersions: string[] = [];
    const wanted = normalizePackageName(packageName);
    let matchedEntries = 0;

    for (const span of dependencyArraySpans(lines)) {
      const line = lines[span.line];
      const head = line.slice(0, span.from);
      let segment = line.slice(span.from);
      const lineVersions: string[] = [];

      for (const literal of requirementLiterals(segment).reverse()) {
        const entry = literal.body.match(TABLE_ENTRY);
        if (!entry || normalizePackageName(entry[2]) !== wanted) continue;
        matchedEntries++;

        const [, lead, name, extras, specifier, marker] = entry;
        if (specifier.includes("@")) continue;
        const bound = specifier.match(LOWER_BOUND);
        if (bound && isAtLeast(bound[2], fixedVersion)) continue;

        const markerText = marker ? marker.trim() : "";
        const body = `${lead}${name}${(extras ?? "").trim()}==${fixedVersion}${markerText ? `; ${markerText.slice(1).trim()}` : ""}`;
        if (body === literal.body) continue;

        if (bound) lineVersions.unshift(bound[2]);
        segment =
          segment.slice(0, literal.index) +
          `${literal.quote}${body}${literal.quote}` +
          segment.slice(literal.index + literal.raw.length);
      }

      const rewritten = head + segment;
      previousVersions.push(...lineVersions);
      if (rewritten !== line) {
        lines[span.line] = rewritten;
        changedLines.push(span.line + 1);
      }
    }

    return buildUpdate(content, lines, changedLines, previousVersions, matchedEntries);
  },

  findPinnedVersion(content, packageName) {
    const lines = content.split("\n");
    const wanted = normalizePackageName(packageName);
    for (const span of dependencyArraySpans(lines)) {
      for (const literal of requirementLiterals(lines[span.line].slice(span.from))) {
        const entry = literal.body.match(TABLE_ENTRY);
        if (!entry || normalizePackageName(entry[2]) !== wanted) continue;
        const bound = entry[4].match(LOWER_BOUND);
        if (bound) return bound[2];
      }
    }
    return null;
  },

  listRequirements(content) {
    const lines = content.split("\n");
    return dependencyArraySpans(lines).flatMap((span) =>
      requirementLiterals(lines[span.line].slice(span.from))
        .map((literal) => literal.body.trim())
        .filter((body) => TABLE_ENTRY.test(body))
    );
  },
};

// ============================================================
// Shared
// ============================================================

const HANDLERS: Record<ManifestDialect, DialectHandler> = {
  "requirements-line": requirementsLine,
  "pyproject-table": pyprojectTable,
};

function buildUpdate(
  original: string,
  lines: string[],
  changedLines: number[],
  previousVersions: string[],
  matchedEntries: number
): ManifestUpdate {
  if (changedLines.length === 0) {
    return {
      changed: false,
      matchedEntries,
      content: original,
      changedRanges: [],
      changedLineCount: 0,
      previousVersions: [],
    };
  }
  return {
    changed: true,
    matchedEntries,
    content: lines.join("\n"),
    changedRanges: toRanges(changedLines),
    changedLineCount: changedLines.length,
    previousVersions,
  };
}

export function toRanges(lineNumbers: number[]): LineRange[] {
  const sorted = [...lineNumbers].sort((a, b) => a - b);
  const ranges: LineRange[] = [];
  for (const line of sorted) {
    const last = ranges[ranges.length - 1];
    if (last && line <= last.end + 1) {
      last.end = Math.max(last.end, line);
    } else {
      ranges.push({ start: line, end: line });
    }
  }
  return ranges;
}

export function updateManifest(
  dialect: ManifestDialect,
  content: string,
  packageName: string,
  fixedVersion: string
): ManifestUpdate {
  return HANDLERS[dialect].update(content, packageName, fixedVersion);
}

export function findPinnedVersion(
  dialect: ManifestDialect,
  content: string,
  packageName: string
): string | null {
  return HANDLERS[dialect].findPinnedVersion(content, packageName);
}

export function listRequirements(
  dialect: ManifestDialect,
  content: string
): string[] {
  return HANDLERS[dialect].listRequirements(content);
}
