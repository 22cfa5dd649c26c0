export type BibFields = Readonly<Record<string, string>>;

export interface BibEntry {
  key: string;           // Citation key (e.g., "smith2020")
  entryType: string;     // Lower-cased type word (e.g., "article")
  fields: BibFields;
  lineNumber: number;    // Line number for the @entry line
}

export type Bibliography = ReadonlyMap<string, BibEntry>;

export interface CitationOrder {
  keys: string[];                        // Distinct keys, first appearance first
  numbers: ReadonlyMap<string, number>;  // 1-based, consistent with keys
}

export type Warn = (message: string) => void;
