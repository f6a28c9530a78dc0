import { MarkerKind } from './types.js';

/**
 * One pattern per marker kind. Each must be global and have exactly one
 * capture group holding the label text.
 */
export type MarkerPatterns = Readonly<Record<MarkerKind, RegExp>>;

/**
 * Raised when a caller-supplied marker pattern cannot be used.
 */
export class InvalidPatternError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'InvalidPatternError';
  }
}

/**
 * Escape special regex characters in a string
 */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Count capture groups by matching the pattern (or an empty alternative)
 * against the empty string.
 */
function countCaptureGroups(regex: RegExp): number {
  const probe = new RegExp(`${regex.source}|`, regex.flags.replace(/[gy]/g, ''));
  const match = probe.exec('');
  return match ? match.length - 1 : 0;
}

/**
 * Build the default marker grammar for a keyword:
 *   "[" ws* keyword ws* ":" ws* label ws* "]"
 * The keyword is case-insensitive. The label is one or more characters that
 * are neither "]" nor whitespace.
 */
export function buildMarkerPattern(keyword: string): RegExp {
  return new RegExp(`\\[\\s*${escapeRegex(keyword)}\\s*:\\s*([^\\]\\s]+)\\s*\\]`, 'gi');
}

export const DEFAULT_PATTERNS: MarkerPatterns = {
  tag: buildMarkerPattern('tag'),
  ref: buildMarkerPattern('ref'),
  file: buildMarkerPattern('file'),
  dir: buildMarkerPattern('dir')
};

/**
 * Compile a caller-supplied marker pattern. The result is always global so
 * every match on a line is found.
 */
export function compileMarkerPattern(source: string, flags = 'i'): RegExp {
  if (flags.includes('y')) {
    throw new InvalidPatternError(`Marker pattern /${source}/ cannot be sticky`, source);
  }

  let regex: RegExp;
  try {
    regex = new RegExp(source, flags.includes('g') ? flags : `${flags}g`);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidPatternError(`Invalid marker pattern /${source}/: ${reason}`, source);
  }

  const groups = countCaptureGroups(regex);
  if (groups !== 1) {
    throw new InvalidPatternError(
      `Marker pattern /${source}/ must have exactly one capture group, found ${groups}`,
      source
    );
  }

  return regex;
}

/**
 * Default patterns with any kind replaced by a compiled caller-supplied source
 */
export function createMarkerPatterns(
  overrides: Partial<Record<MarkerKind, string>> = {}
): MarkerPatterns {
  const { tag, ref, file, dir } = overrides;
  return {
    tag: tag === undefined ? DEFAULT_PATTERNS.tag : compileMarkerPattern(tag),
    ref: ref === undefined ? DEFAULT_PATTERNS.ref : compileMarkerPattern(ref),
    file: file === undefined ? DEFAULT_PATTERNS.file : compileMarkerPattern(file),
    dir: dir === undefined ? DEFAULT_PATTERNS.dir : compileMarkerPattern(dir)
  };
}
