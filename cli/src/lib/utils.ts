import { logger } from "./logger.js";
import type { Movie, RatedMovie, Reviewer } from "./types.js";

/** Reports a usage error and exits with status 2. */
export function usage(message: string): never {
  logger.error(`Error: ${message}`);
  process.exit(2);
}

/** Parses an optional positive integer flag; `null` when present but invalid. */
export function parsePositiveInt(raw: string | undefined): number | undefined | null {
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw.trim())) return null;
  const value = Number(raw);
  return value >= 1 ? value : null;
}

/** JSON literals (numbers, booleans, arrays, quoted strings) are decoded; anything else stays text. */
export function parseFieldValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/** Splits `field=value` at the first `=`; `null` when there is no field name. */
export function parseAssignment(pair: string): [string, unknown] | null {
  const eq = pair.indexOf("=");
  if (eq <= 0) return null;
  const field = pair.slice(0, eq).trim();
  if (!field) return null;
  return [field, parseFieldValue(pair.slice(eq + 1))];
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function formatMovie(movie: Movie): string {
  let line = movie.title ?? "(untitled)";
  if (movie.year !== null) line += ` (${movie.year})`;
  if (movie.rating !== null) line += ` - IMDb ${movie.rating}`;
  return line;
}

export function formatReviewer(reviewer: Reviewer): string {
  const rating = reviewer.rating === null ? "unrated" : String(reviewer.rating);
  return reviewer.summary ? `${reviewer.name}: ${rating} "${reviewer.summary}"` : `${reviewer.name}: ${rating}`;
}

export function formatRatedMovie(movie: RatedMovie): string {
  const title = movie.released === null ? movie.title : `${movie.title} (${movie.released})`;
  const rating = movie.rating === null ? "unrated" : String(movie.rating);
  return movie.summary ? `${title}: ${rating} "${movie.summary}"` : `${title}: ${rating}`;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
