import type { CitationOrder } from './types.js';

// Matches \cite{key} and \cite{key1, key2}
const CITE_PATTERN = /\\cite\{([^}]+)\}/g;

export function createCiteRegex(): RegExp {
  return new RegExp(CITE_PATTERN.source, CITE_PATTERN.flags);
}

// Empty tokens (\cite{a,,b}) are kept: they take a number and never resolve.
export function parseMarkerKeys(inner: string): string[] {
  return inner.split(',').map((k) => k.trim());
}

/**
 * Number every distinct cited key by first appearance. Runs over the
 * original text only; rewriting happens afterwards against the same input.
 */
export function scanCitations(text: string): CitationOrder {
  const numbers = new Map<string, number>();
  const keys: string[] = [];
  const regex = createCiteRegex();

  let match;
  while ((match = regex.exec(text)) !== null) {
    for (const key of parseMarkerKeys(match[1] ?? '')) {
      if (numbers.has(key)) continue;
      keys.push(key);
      numbers.set(key, keys.length);
    }
  }

  return { keys, numbers };
}
