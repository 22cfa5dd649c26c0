import { createCiteRegex, parseMarkerKeys, scanCitations } from './latexCitationExtractor.js';
import { createLineCounter } from './lineCounter.js';
import type { ReferenceStyleRegistry } from './referenceStyles.js';
import type { Bibliography, CitationOrder, Warn } from './types.js';

export const REFERENCES_HEADING = '## References';

export type ResolvedDocument = {
  /** Document text with every marker rewritten. */
  body: string;
  /** Formatted references, in number order. */
  references: string[];
  order: CitationOrder;
  /** Cited keys with no usable bibliography entry, first appearance first. */
  unresolvedKeys: string[];
  /** body plus the references section, when there is one. */
  text: string;
};

export type CitationResolverOptions = {
  registry: ReferenceStyleRegistry;
  warn?: Warn;
};

export type CitationResolver = {
  resolve(document: string, bibliography: Bibliography, style: string): ResolvedDocument;
  formatReferenceList(keys: string[], bibliography: Bibliography, style: string): string[];
};

function renderReferencesSection(references: string[]): string {
  if (references.length === 0) return '';
  return `\n\n\n${REFERENCES_HEADING}\n${references.join('; ')}`;
}

export function createCitationResolver(options: CitationResolverOptions): CitationResolver {
  const { registry } = options;
  const warn = options.warn ?? ((message: string) => console.warn(message));

  function formatReferenceList(keys: string[], bibliography: Bibliography, style: string) {
    const formatter = registry.get(style);
    const references: string[] = [];
    keys.forEach((key, index) => {
      const entry = bibliography.get(key);
      // Unresolved keys keep their number; it is simply never printed here.
      if (!entry) {
        warn(`Citation key '${key}' not found in bib file.`);
        return;
      }
      references.push(formatter(entry.fields, index + 1));
    });
    return references;
  }

  function resolve(document: string, bibliography: Bibliography, style: string): ResolvedDocument {
    const formatter = registry.get(style);
    const order = scanCitations(document);
    const unresolved = new Set<string>();
    const lineAt = createLineCounter(document);

    const body = document.replace(createCiteRegex(), (_marker: string, inner: string, offset: number) => {
      const keys = parseMarkerKeys(inner);
      const labels = keys.map((key) => {
        const number = order.numbers.get(key);
        if (number === undefined || !bibliography.has(key)) {
          warn(`Citation key '${key}' not found in bib file (line ${lineAt(offset)}).`);
          unresolved.add(key);
          return '?';
        }
        return String(number);
      });
      return `[${labels.join(', ')}]`;
    });

    const references: string[] = [];
    for (const key of order.keys) {
      const entry = bibliography.get(key);
      const number = order.numbers.get(key);
      if (!entry || number === undefined) continue;
      references.push(formatter(entry.fields, number));
    }

    return {
      body,
      references,
      order,
      unresolvedKeys: Array.from(unresolved),
      text: `${body}${renderReferencesSection(references)}`,
    };
  }

  return { resolve, formatReferenceList };
}
