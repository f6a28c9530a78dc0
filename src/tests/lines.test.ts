import * as test from 'node:test';
import * as assert from 'node:assert';
import { decodeLines, splitLines } from '../lines.js';

const { describe, it } = test;

function bytes(...parts: (string | number[])[]): Uint8Array {
  return Buffer.concat(parts.map(p => (typeof p === 'string' ? Buffer.from(p, 'utf-8') : Buffer.from(p))));
}

describe('decodeLines', () => {

  it('should return no lines for empty input', () => {
    assert.deepStrictEqual(decodeLines(new Uint8Array(0)), []);
  });

  it('should split on newlines without a trailing empty line', () => {
    assert.deepStrictEqual(decodeLines(bytes('one\ntwo\n')), ['one', 'two']);
  });

  it('should keep a last line with no newline', () => {
    assert.deepStrictEqual(decodeLines(bytes('one\ntwo')), ['one', 'two']);
  });

  it('should keep blank lines', () => {
    assert.deepStrictEqual(decodeLines(bytes('\n\nthree\n')), ['', '', 'three']);
  });

  it('should strip carriage returns before newlines', () => {
    assert.deepStrictEqual(decodeLines(bytes('one\r\ntwo\r\n')), ['one', 'two']);
  });

  it('should keep a carriage return that ends the input without a newline', () => {
    assert.deepStrictEqual(decodeLines(bytes('a\r\nb\r')), ['a', 'b\r']);
  });

  it('should decode multi-byte characters', () => {
    assert.deepStrictEqual(decodeLines(bytes('[tag:café]\n')), ['[tag:café]']);
  });

  it('should turn invalid UTF-8 lines into null', () => {
    const input = bytes('[tag:first]\n', [0x66, 0xff, 0x6f, 0x0a], '[ref:first]\n');

    assert.deepStrictEqual(decodeLines(input), ['[tag:first]', null, '[ref:first]']);
  });

  it('should treat a truncated multi-byte sequence as undecodable', () => {
    const input = bytes([0xe2, 0x82], '\nok');

    assert.deepStrictEqual(decodeLines(input), [null, 'ok']);
  });
});

describe('splitLines', () => {

  it('should follow the same rules as decodeLines', () => {
    const text = 'a\r\n\nb\n';

    assert.deepStrictEqual(splitLines(text), ['a', '', 'b']);
    assert.deepStrictEqual(splitLines(text), decodeLines(bytes(text)));
  });

  it('should only strip a carriage return before a newline', () => {
    assert.deepStrictEqual(splitLines('a\r\nb\r'), ['a', 'b\r']);
  });

  it('should return no lines for empty text', () => {
    assert.deepStrictEqual(splitLines(''), []);
  });

  it('should keep a lone trailing blank line before the final newline', () => {
    assert.deepStrictEqual(splitLines('a\n\n'), ['a', '']);
  });
});
