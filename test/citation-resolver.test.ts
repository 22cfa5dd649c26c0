import assert from 'node:assert/strict';
import test from 'node:test';

import { parseBibliography } from '../src/citations/bibTeXParser.js';
import { createCitationResolver } from '../src/citations/citationResolver.js';
import { UnknownStyleError } from '../src/citations/errors.js';
import { createStyleRegistry } from '../src/citations/referenceStyles.js';
import { AB_BIB, SMITH_BIB, SMITH_REFERENCE, collectWarnings } from './fixtures.js';

const smith = parseBibliography(SMITH_BIB, { warn: () => {} });
const ab = parseBibliography(AB_BIB, { warn: () => {} });

function setup() {
  const { warnings, warn } = collectWarnings();
  const resolver = createCitationResolver({ registry: createStyleRegistry(), warn });
  return { resolver, warnings };
}

test('rewrites a marker and appends the references section', () => {
  const { resolver, warnings } = setup();
  const resolved = resolver.resolve('Text \\cite{smith2020}.', smith, 'numbered');

  assert.equal(resolved.body, 'Text [1].');
  assert.deepEqual(resolved.references, [SMITH_REFERENCE]);
  assert.equal(resolved.text, `Text [1].\n\n\n## References\n${SMITH_REFERENCE}`);
  assert.deepEqual(resolved.unresolvedKeys, []);
  assert.deepEqual(warnings, []);
});

test('undefined key renders ? with a warning and no references section', () => {
  const { resolver, warnings } = setup();
  const resolved = resolver.resolve('See \\cite{foo}.', smith, 'numbered');

  assert.equal(resolved.body, 'See [?].');
  assert.equal(resolved.text, 'See [?].');
  assert.deepEqual(resolved.references, []);
  assert.deepEqual(resolved.unresolvedKeys, ['foo']);
  assert.deepEqual(warnings, ["Citation key 'foo' not found in bib file (line 1)."]);
});

test('repeated keys keep the number of their first appearance', () => {
  const { resolver } = setup();
  const resolved = resolver.resolve('\\cite{a,b} and later \\cite{b}.', ab, 'numbered');

  assert.equal(resolved.body, '[1, 2] and later [2].');
  assert.deepEqual(resolved.references, [
    '**[1]** Adams, A. (2001). Alpha.',
    '**[2]** Brown, B. (2002). Beta.',
  ]);
  assert.equal(
    resolved.text,
    '[1, 2] and later [2].\n\n\n## References\n**[1]** Adams, A. (2001). Alpha.; **[2]** Brown, B. (2002). Beta.'
  );
});

test('an unresolved key keeps its number so later keys are not renumbered', () => {
  const { resolver } = setup();
  const resolved = resolver.resolve('\\cite{a} \\cite{ghost} \\cite{b}', ab, 'numbered');

  assert.equal(resolved.body, '[1] [?] [3]');
  assert.equal(resolved.order.numbers.get('ghost'), 2);
  assert.deepEqual(resolved.references, [
    '**[1]** Adams, A. (2001). Alpha.',
    '**[3]** Brown, B. (2002). Beta.',
  ]);
});

test('every occurrence of a missing key is warned about', () => {
  const { resolver, warnings } = setup();
  const resolved = resolver.resolve('\\cite{ghost}\nmore \\cite{a, ghost}', ab, 'numbered');

  assert.equal(resolved.body, '[?]\nmore [2, ?]');
  assert.deepEqual(resolved.unresolvedKeys, ['ghost']);
  assert.deepEqual(warnings, [
    "Citation key 'ghost' not found in bib file (line 1).",
    "Citation key 'ghost' not found in bib file (line 2).",
  ]);
});

test('an entry dropped for having no fields resolves like an undefined key', () => {
  const { resolver } = setup();
  const bibliography = parseBibliography('@misc{empty,\n}\n', { warn: () => {} });
  const resolved = resolver.resolve('\\cite{empty}', bibliography, 'numbered');
  assert.equal(resolved.text, '[?]');
});

test('defined but uncited entries never appear', () => {
  const { resolver } = setup();
  const resolved = resolver.resolve('Only \\cite{b}.', ab, 'numbered');
  assert.equal(resolved.body, 'Only [1].');
  assert.deepEqual(resolved.references, ['**[1]** Brown, B. (2002). Beta.']);
});

test('text without markers is returned unchanged', () => {
  const { resolver, warnings } = setup();
  const document = 'Already resolved [1].\n\n\n## References\n**[1]** Adams, A. (2001). Alpha.';
  const resolved = resolver.resolve(document, ab, 'numbered');
  assert.equal(resolved.text, document);
  assert.deepEqual(resolved.references, []);
  assert.deepEqual(warnings, []);
});

test('empty keys render ? and keep their number', () => {
  const { resolver, warnings } = setup();
  const resolved = resolver.resolve('\\cite{a,,b} \\cite{ , }', ab, 'numbered');

  assert.equal(resolved.body, '[1, ?, 3] [?, ?]');
  assert.deepEqual(resolved.references, [
    '**[1]** Adams, A. (2001). Alpha.',
    '**[3]** Brown, B. (2002). Beta.',
  ]);
  assert.deepEqual(resolved.unresolvedKeys, ['']);
  assert.deepEqual(warnings, [
    "Citation key '' not found in bib file (line 1).",
    "Citation key '' not found in bib file (line 1).",
    "Citation key '' not found in bib file (line 1).",
  ]);
});

test('warning lines follow markers further down the document', () => {
  const { resolver, warnings } = setup();
  resolver.resolve('\\cite{x}\n\n\\cite{a}\nthird \\cite{y}\n\\cite{x}', ab, 'numbered');
  assert.deepEqual(warnings, [
    "Citation key 'x' not found in bib file (line 1).",
    "Citation key 'y' not found in bib file (line 4).",
    "Citation key 'x' not found in bib file (line 5).",
  ]);
});

test('uses the style registered on its own registry', () => {
  const registry = createStyleRegistry().register('plain', (fields, number) => `${number}. ${fields.title ?? ''}`);
  const resolver = createCitationResolver({ registry, warn: () => {} });
  const resolved = resolver.resolve('\\cite{b,a}', ab, 'plain');
  assert.equal(resolved.text, '[1, 2]\n\n\n## References\n1. Beta; 2. Alpha');
});

test('an unknown style is rejected', () => {
  const { resolver } = setup();
  assert.throws(() => resolver.resolve('\\cite{a}', ab, 'apa'), UnknownStyleError);
});

test('formatReferenceList numbers an explicit key list', () => {
  const { resolver, warnings } = setup();
  const references = resolver.formatReferenceList(['b', 'missing', 'a'], ab, 'numbered');

  assert.deepEqual(references, [
    '**[1]** Brown, B. (2002). Beta.',
    '**[3]** Adams, A. (2001). Alpha.',
  ]);
  assert.deepEqual(warnings, ["Citation key 'missing' not found in bib file."]);
});
