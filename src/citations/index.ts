export * from './types.js';
export * from './errors.js';
export { parseBibliography, readBibliographyFile } from './bibTeXParser.js';
export { scanCitations, parseMarkerKeys } from './latexCitationExtractor.js';
export {
  ReferenceStyleRegistry,
  createStyleRegistry,
  formatAuthors,
  formatNumberedReference,
  DEFAULT_STYLE,
} from './referenceStyles.js';
export type { ReferenceFormatter } from './referenceStyles.js';
export { createCitationResolver, REFERENCES_HEADING } from './citationResolver.js';
export type { CitationResolver, ResolvedDocument } from './citationResolver.js';
export { readKeyList } from './keyList.js';
