import * as test from 'node:test';
import * as assert from 'node:assert';
import { formatMarker, renderCatalogue, summarizeCatalogue } from '../renderer.js';
import { createCatalogue, extractMarkers } from '../extractor.js';
import { DEFAULT_PATTERNS } from '../patterns.js';

test.describe('formatMarker', () => {

  test.it('should render each kind with its lowercase keyword', () => {
    assert.strictEqual(
      formatMarker({ kind: 'tag', text: 'Label', source: 'src/main.ts', line: 12 }),
      '[tag:Label] @ src/main.ts:12'
    );
    assert.strictEqual(
      formatMarker({ kind: 'ref', text: 'x', source: 'a.ts', line: 1 }),
      '[ref:x] @ a.ts:1'
    );
    assert.strictEqual(
      formatMarker({ kind: 'file', text: 'foo/bar/baz.txt', source: 'README.md', line: 3 }),
      '[file:foo/bar/baz.txt] @ README.md:3'
    );
    assert.strictEqual(
      formatMarker({ kind: 'dir', text: 'foo/bar', source: 'README.md', line: 4 }),
      '[dir:foo/bar] @ README.md:4'
    );
  });

  test.it('should lowercase the kind even when the source used uppercase', () => {
    const { catalogue } = extractMarkers(DEFAULT_PATTERNS, 'x.py', ['# [ REF : Target ]']);

    assert.strictEqual(formatMarker(catalogue.references[0]), '[ref:Target] @ x.py:1');
  });
});

test.describe('renderCatalogue', () => {

  test.it('should list kinds in tag, ref, file, dir order', () => {
    const { catalogue } = extractMarkers(DEFAULT_PATTERNS, 'a.txt', [
      '[dir:d] [ref:r]',
      '[file:f] [tag:t]'
    ]);

    assert.strictEqual(
      renderCatalogue(catalogue),
      [
        '[tag:t] @ a.txt:2',
        '[ref:r] @ a.txt:1',
        '[file:f] @ a.txt:2',
        '[dir:d] @ a.txt:1'
      ].join('\n')
    );
  });

  test.it('should render an empty catalogue as an empty string', () => {
    assert.strictEqual(renderCatalogue(createCatalogue()), '');
  });
});

test.describe('summarizeCatalogue', () => {

  test.it('should count markers per kind', () => {
    const { catalogue } = extractMarkers(DEFAULT_PATTERNS, 'a.txt', [
      '[tag:a] [tag:b] [ref:a]',
      '[dir:x]'
    ]);

    assert.deepStrictEqual(summarizeCatalogue(catalogue), { tag: 2, ref: 1, file: 0, dir: 1 });
  });
});
