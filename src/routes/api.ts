import { Router, Request, Response } from 'express';
import { LoadResult } from '../loader.js';
import { markersOfKind } from '../extractor.js';
import { formatMarker, summarizeCatalogue } from '../renderer.js';
import { Marker, MARKER_KINDS, MarkerKind } from '../types.js';

function isMarkerKind(value: string): value is MarkerKind {
  return MARKER_KINDS.some(kind => kind === value);
}

/**
 * Create API routes for marker access
 */
export function createApiRoutes(data: LoadResult): Router {
  const router = Router();

  /**
   * GET /api/markers
   * List markers, optionally filtered by kind and source
   * Query params: ?kind=ref&source=src/main.ts
   */
  router.get('/markers', (req: Request, res: Response) => {
    const { kind, source } = req.query;

    let markers: Marker[];
    if (kind === undefined) {
      markers = MARKER_KINDS.flatMap(k => markersOfKind(data.catalogue, k));
    } else if (typeof kind === 'string' && isMarkerKind(kind)) {
      markers = markersOfKind(data.catalogue, kind);
    } else {
      res.status(400).json({ error: `Unknown marker kind: ${String(kind)}` });
      return;
    }

    if (source && typeof source === 'string') {
      markers = markers.filter(m => m.source === source);
    }

    res.json(markers.map(m => ({ ...m, display: formatMarker(m) })));
  });

  /**
   * GET /api/sources
   * List all scanned sources in walk order
   */
  router.get('/sources', (_req: Request, res: Response) => {
    res.json(data.sources.map(s => s.sourceId));
  });

  /**
   * GET /api/summary
   * Marker counts per kind
   */
  router.get('/summary', (_req: Request, res: Response) => {
    res.json({
      ...summarizeCatalogue(data.catalogue),
      skippedLines: data.skippedLines
    });
  });

  return router;
}
