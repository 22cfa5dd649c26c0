import fs from 'node:fs';

import { BibliographyReadError } from './errors.js';
import { createLineCounter } from './lineCounter.js';
import type { BibEntry, Bibliography, Warn } from './types.js';

export type ParseBibliographyOptions = {
  warn?: Warn;
};

// Match @article{key, @book{key, etc.
const ENTRY_HEADER_PATTERN = /@(\w+)\s*\{\s*([^,{}]+),/g;

// One field per line. Values spanning several lines are not reconstructed.
const BRACED_FIELD = /^(\w+)\s*=\s*\{(.*)\},?/;
// Extension over the braced form: "quoted" and bare (year = 2020) values.
// An entry holding only such fields is kept rather than dropped.
const QUOTED_FIELD = /^(\w+)\s*=\s*"(.*)",?/;
const BARE_FIELD = /^(\w+)\s*=\s*([\w.:/-]+)\s*,?$/;

/**
 * Consume an entry body starting just after its opening brace.
 * Returns the body text (without the closing brace), the offset just past
 * the closing brace, and whether that brace was found. An entry that never
 * closes runs to the end of the content.
 */
export function readEntryBody(
  content: string,
  start: number
): { body: string; end: number; closed: boolean } {
  let depth = 1;
  let pos = start;
  while (pos < content.length) {
    const ch = content[pos];
    if (ch === '{') depth++;
    if (ch === '}') depth--;
    if (depth === 0) {
      return { body: content.slice(start, pos), end: pos + 1, closed: true };
    }
    pos++;
  }
  return { body: content.slice(start), end: content.length, closed: false };
}

export function parseFieldLine(line: string): [name: string, value: string] | null {
  const match = BRACED_FIELD.exec(line) ?? QUOTED_FIELD.exec(line) ?? BARE_FIELD.exec(line);
  if (!match) return null;
  const [, name = '', raw = ''] = match;
  return [name.toLowerCase(), raw.replace(/[{}]/g, '').trim()];
}

export function parseEntryFields(body: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const rawLine of body.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;
    const field = parseFieldLine(line);
    if (field) {
      const [name, value] = field;
      fields[name] = value;
    }
  }
  return fields;
}

export function parseBibliography(
  content: string,
  options: ParseBibliographyOptions = {}
): Bibliography {
  const warn = options.warn ?? ((message: string) => console.warn(message));
  const entries = new Map<string, BibEntry>();
  const entryRegex = new RegExp(ENTRY_HEADER_PATTERN.source, ENTRY_HEADER_PATTERN.flags);
  const lineAt = createLineCounter(content);

  let match;
  while ((match = entryRegex.exec(content)) !== null) {
    const [header, type = '', rawKey = ''] = match;
    const key = rawKey.trim();
    const bodyStart = match.index + header.length;
    const lineNumber = lineAt(match.index);
    const read = readEntryBody(content, bodyStart);
    let { body, end } = read;

    if (!read.closed) {
      // Unterminated: stop at the next header and keep scanning from there.
      const nextHeader = new RegExp(ENTRY_HEADER_PATTERN.source, ENTRY_HEADER_PATTERN.flags);
      nextHeader.lastIndex = bodyStart;
      const next = nextHeader.exec(content);
      if (next) {
        body = content.slice(bodyStart, next.index);
        end = next.index;
      }
    }
    entryRegex.lastIndex = end;

    const fields = parseEntryFields(body);
    if (Object.keys(fields).length === 0) {
      warn(`Could not parse fields for entry '${key}'`);
      continue;
    }

    entries.set(key, Object.freeze({
      key,
      entryType: type.toLowerCase(),
      fields: Object.freeze(fields),
      lineNumber,
    }));
  }

  return entries;
}

function isMissingFileError(error: unknown) {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

export function readBibliographyFile(
  filePath: string,
  options: ParseBibliographyOptions = {}
): Bibliography {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new BibliographyReadError(`Bib file not found at '${filePath}'`, filePath, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new BibliographyReadError(`Could not read bib file '${filePath}': ${reason}`, filePath, {
      cause: error,
    });
  }
  return parseBibliography(content, options);
}
