import { Catalogue, Marker, MARKER_KINDS, MarkerKind } from './types.js';
import { markersOfKind } from './extractor.js';

/**
 * Marker counts for a catalogue
 */
export type CatalogueSummary = Record<MarkerKind, number>;

/**
 * Human-readable form of a marker: `[tag:label] @ src/main.ts:12`
 */
export function formatMarker(marker: Marker): string {
  return `[${marker.kind}:${marker.text}] @ ${marker.source}:${marker.line}`;
}

/**
 * Render every marker, one per line, tags first, then refs, files and dirs
 */
export function renderCatalogue(catalogue: Catalogue): string {
  const lines: string[] = [];
  for (const kind of MARKER_KINDS) {
    for (const marker of markersOfKind(catalogue, kind)) {
      lines.push(formatMarker(marker));
    }
  }
  return lines.join('\n');
}

export function summarizeCatalogue(catalogue: Catalogue): CatalogueSummary {
  return {
    tag: catalogue.tags.length,
    ref: catalogue.references.length,
    file: catalogue.fileLabels.length,
    dir: catalogue.dirLabels.length
  };
}
