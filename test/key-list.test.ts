import assert from 'node:assert/strict';
import test from 'node:test';

import { readKeyList } from '../src/citations/keyList.js';

test('reads one key per line, stripping matching quotes', () => {
  const text = ['a', '"b"', "'c'", '', '  d  ', `"e'`, 'a', ''].join('\n');
  assert.deepEqual(readKeyList(text), ['a', 'b', 'c', 'd', `"e'`]);
});

test('handles CRLF line endings', () => {
  assert.deepEqual(readKeyList('x\r\ny\r\n'), ['x', 'y']);
});

test('drops lines that are only quotes', () => {
  assert.deepEqual(readKeyList('""\n" z "\n'), ['z']);
});
