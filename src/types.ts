/**
 * The four marker kinds. A tag declares an anchor, a ref points at a tag,
 * file and dir labels point at filesystem paths.
 */
export type MarkerKind = 'tag' | 'ref' | 'file' | 'dir';

export const MARKER_KINDS: readonly MarkerKind[] = ['tag', 'ref', 'file', 'dir'];

/**
 * One matched marker occurrence.
 */
export interface Marker {
  readonly kind: MarkerKind;

  /** Label text exactly as it appeared in the source */
  readonly text: string;

  /** Identifier of the input the marker was found in (usually a path) */
  readonly source: string;

  /** Physical line number (1-based) */
  readonly line: number;
}

/**
 * All markers found in one input, one ordered sequence per kind.
 * Each sequence is in discovery order: line order, then left to right.
 */
export interface Catalogue {
  tags: Marker[];
  references: Marker[];
  fileLabels: Marker[];
  dirLabels: Marker[];
}

/**
 * One physical line of an input. `null` marks a line that failed to decode.
 */
export type SourceLine = string | null;

/**
 * Result of extracting markers from a single input.
 */
export interface ExtractionResult {
  catalogue: Catalogue;

  /** Physical lines that failed to decode and were skipped */
  skippedLines: number;
}
