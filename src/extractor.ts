import { Catalogue, ExtractionResult, Marker, MarkerKind, SourceLine } from './types.js';
import { MarkerPatterns } from './patterns.js';

/**
 * Create an empty catalogue
 */
export function createCatalogue(): Catalogue {
  return { tags: [], references: [], fileLabels: [], dirLabels: [] };
}

/**
 * Get the marker sequence for one kind
 */
export function markersOfKind(catalogue: Catalogue, kind: MarkerKind): Marker[] {
  switch (kind) {
    case 'tag':
      return catalogue.tags;
    case 'ref':
      return catalogue.references;
    case 'file':
      return catalogue.fileLabels;
    case 'dir':
      return catalogue.dirLabels;
  }
}

// A fresh global, non-sticky copy per call. matchAll starts from the
// lastIndex of the regex it is given, so the caller's own lastIndex and
// sticky flag never affect a scan.
function scanningCopy(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, `${pattern.flags.replace(/[gy]/g, '')}g`);
}

function collectMatches(
  line: string,
  pattern: RegExp,
  kind: MarkerKind,
  source: string,
  lineNum: number,
  into: Marker[]
): void {
  for (const match of line.matchAll(pattern)) {
    const text = match[1];
    if (text === undefined) continue;
    into.push({ kind, text, source, line: lineNum });
  }
}

/**
 * Extract every marker from the lines of one input.
 *
 * Line numbers count every physical line, including ones that failed to
 * decode (`null`). Those contribute no markers and are tallied in
 * `skippedLines`. Each pattern runs against the full original line, so
 * markers of different kinds never compete for the same text.
 */
export function extractMarkers(
  patterns: MarkerPatterns,
  sourceId: string,
  lines: Iterable<SourceLine>
): ExtractionResult {
  const catalogue = createCatalogue();
  const tagPattern = scanningCopy(patterns.tag);
  const refPattern = scanningCopy(patterns.ref);
  const filePattern = scanningCopy(patterns.file);
  const dirPattern = scanningCopy(patterns.dir);
  let skippedLines = 0;
  let lineNum = 0;

  for (const line of lines) {
    lineNum++;
    if (line === null) {
      skippedLines++;
      continue;
    }

    collectMatches(line, tagPattern, 'tag', sourceId, lineNum, catalogue.tags);
    collectMatches(line, refPattern, 'ref', sourceId, lineNum, catalogue.references);
    collectMatches(line, filePattern, 'file', sourceId, lineNum, catalogue.fileLabels);
    collectMatches(line, dirPattern, 'dir', sourceId, lineNum, catalogue.dirLabels);
  }

  return { catalogue, skippedLines };
}

/**
 * Positional form of `extractMarkers` returning only the catalogue.
 */
export function extract(
  tagPattern: RegExp,
  refPattern: RegExp,
  filePattern: RegExp,
  dirPattern: RegExp,
  sourceId: string,
  lines: Iterable<SourceLine>
): Catalogue {
  const patterns: MarkerPatterns = {
    tag: tagPattern,
    ref: refPattern,
    file: filePattern,
    dir: dirPattern
  };
  return extractMarkers(patterns, sourceId, lines).catalogue;
}

/**
 * Concatenate catalogues per kind, preserving the given order.
 */
export function mergeCatalogues(catalogues: Iterable<Catalogue>): Catalogue {
  const merged = createCatalogue();

  for (const catalogue of catalogues) {
    merged.tags.push(...catalogue.tags);
    merged.references.push(...catalogue.references);
    merged.fileLabels.push(...catalogue.fileLabels);
    merged.dirLabels.push(...catalogue.dirLabels);
  }

  return merged;
}
