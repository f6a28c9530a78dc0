import * as fs from 'node:fs';
import * as path from 'node:path';
import { Catalogue } from './types.js';
import { DEFAULT_PATTERNS, MarkerPatterns } from './patterns.js';
import { extractMarkers, mergeCatalogues } from './extractor.js';
import { decodeLines } from './lines.js';

/**
 * Options for loading markers from a directory tree
 */
export interface LoadOptions {
  /** Directory to scan recursively */
  rootDir: string;
  /** Marker patterns (default: DEFAULT_PATTERNS) */
  patterns?: MarkerPatterns;
  /** Directory names never descended into (default: .git, node_modules) */
  excludeDirs?: string[];
}

/**
 * Markers extracted from one file
 */
export interface SourceResult {
  /** Path relative to rootDir, with forward slashes */
  sourceId: string;
  catalogue: Catalogue;
  skippedLines: number;
}

/**
 * Result of loading every file under a directory
 */
export interface LoadResult {
  /** Per-file results in walk order */
  sources: SourceResult[];
  /** All markers from all files, merged in walk order */
  catalogue: Catalogue;
  /** Total undecodable lines across all files */
  skippedLines: number;
  /** Any errors encountered during loading */
  errors: string[];
}

const DEFAULT_EXCLUDE_DIRS = ['.git', 'node_modules'];

function toSourceId(rootDir: string, filePath: string): string {
  return path.relative(rootDir, filePath).split(path.sep).join('/');
}

/**
 * Find all regular files below a directory, in sorted order
 */
function findFiles(dir: string, excludeDirs: Set<string>, errors: string[]): string[] {
  const files: string[] = [];

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    errors.push(`Failed to read directory ${dir}: ${err}`);
    return files;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!excludeDirs.has(entry.name)) {
        files.push(...findFiles(entryPath, excludeDirs, errors));
      }
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }

  return files;
}

/**
 * Extract markers from every file under a directory
 */
export function loadMarkers(options: LoadOptions): LoadResult {
  const {
    rootDir,
    patterns = DEFAULT_PATTERNS,
    excludeDirs = DEFAULT_EXCLUDE_DIRS
  } = options;

  const sources: SourceResult[] = [];
  const errors: string[] = [];
  let skippedLines = 0;

  const files = findFiles(rootDir, new Set(excludeDirs), errors);

  for (const filePath of files) {
    const sourceId = toSourceId(rootDir, filePath);

    try {
      const bytes = fs.readFileSync(filePath);
      const result = extractMarkers(patterns, sourceId, decodeLines(bytes));
      sources.push({ sourceId, ...result });
      skippedLines += result.skippedLines;
    } catch (err) {
      errors.push(`Failed to read ${sourceId}: ${err}`);
    }
  }

  return {
    sources,
    catalogue: mergeCatalogues(sources.map(s => s.catalogue)),
    skippedLines,
    errors
  };
}
