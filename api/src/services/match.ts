import { ValidationError } from "../errors.js";

/**
 * `substring` matches the fragment anywhere in the field; `exact` requires the
 * whole field to equal the fragment. Both ignore case.
 */
export type MatchMode = "substring" | "exact";

export interface MatchOptions {
  /** Escape regex metacharacters in substring fragments. Exact mode always escapes. */
  escape: boolean;
}

export interface MatchPattern {
  /** The fragment as the caller supplied it. */
  source: string;
  /** Applied with MongoDB's `$regex` semantics (unanchored). */
  document: RegExp;
  /**
   * Applied with Cypher's `=~`, which must match the whole value. The inline
   * flags fold case beyond ASCII and let `.` cross line breaks, as the
   * document side does.
   */
  graph: string;
}

export const DEFAULT_MATCH_OPTIONS: MatchOptions = { escape: true };

const REGEX_METACHARACTERS = /[.*+?^${}()|[\]\\]/g;

// Backslash escapes for these characters mean the same thing in the
// JavaScript/PCRE dialect MongoDB uses and the Java dialect Neo4j uses.
export function escapePattern(fragment: string): string {
  return fragment.replace(REGEX_METACHARACTERS, "\\$&");
}

export function requireFragment(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? "";
  if (trimmed.length === 0) {
    throw new ValidationError(`Parameter '${field}' must not be empty`);
  }
  return trimmed;
}

function compile(source: string, fragment: string): RegExp {
  try {
    return new RegExp(source, "i");
  } catch {
    throw new ValidationError(`Invalid search pattern: ${fragment}`);
  }
}

// Unicode mode refuses lone braces and brackets and unknown escapes, which the
// graph store's Java dialect refuses too. Lookbehind length limits are not
// checked and still fail in the store.
function checkGraphSyntax(body: string, fragment: string): void {
  try {
    new RegExp(body, "u");
  } catch {
    throw new ValidationError(`Invalid search pattern: ${fragment}`);
  }
}

export function buildMatch(
  fragment: string,
  mode: MatchMode,
  options: MatchOptions = DEFAULT_MATCH_OPTIONS,
): MatchPattern {
  if (mode === "exact") {
    const escaped = escapePattern(fragment);
    return {
      source: fragment,
      document: compile(`^${escaped}$`, fragment),
      graph: `(?iu)${escaped}`,
    };
  }

  const body = options.escape ? escapePattern(fragment) : fragment;
  const document = compile(body, fragment);
  if (!options.escape) checkGraphSyntax(body, fragment);
  return {
    source: fragment,
    document,
    graph: `(?isu).*${body}.*`,
  };
}

/**
 * Comparison key for titles and names across stores: NFC, trimmed, inner
 * whitespace collapsed, lower-cased.
 */
export function normalizeIdentityKey(value: string): string {
  return value.normalize("NFC").trim().replace(/\s+/g, " ").toLowerCase();
}
