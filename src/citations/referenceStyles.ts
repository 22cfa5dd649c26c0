import { UnknownStyleError } from './errors.js';
import type { BibFields } from './types.js';

export type ReferenceFormatter = (fields: BibFields, number: number) => string;

export const DEFAULT_STYLE = 'numbered';

const MISSING = 'N/A';

/**
 * Formats an author list as "Surname, I. I.", e.g.
 * "Albert Einstein and Isaac Newton" -> "Einstein, A., Newton, I.".
 */
export function formatAuthors(raw: string | undefined): string {
  if (!raw || !raw.trim()) return MISSING;

  const formatted: string[] = [];
  for (const author of raw.split(' and ')) {
    const parts = author.trim().split(/\s+/).filter(Boolean);
    const surname = parts.pop();
    if (!surname) continue;
    const initials = parts.map((part) => `${part.charAt(0)}.`).join(' ');
    formatted.push(initials ? `${surname}, ${initials}` : surname);
  }

  return formatted.length > 0 ? formatted.join(', ') : MISSING;
}

export const formatNumberedReference: ReferenceFormatter = (fields, number) => {
  const title = fields.title ?? '';
  const journal = fields.journal ?? '';
  const pages = fields.pages ?? '';
  const issueInfo = `${fields.volume ?? ''}${fields.number ? `(${fields.number})` : ''}`;

  const parts = [
    `**[${number}]**`,
    formatAuthors(fields.author),
    `(${fields.year || MISSING}).`,
    title ? `${title}.` : '',
    journal ? `*${journal}*.` : '',
    issueInfo ? `${issueInfo},` : '',
    pages ? `pp. ${pages.replace(/--/g, '–')}` : '',
  ];

  return parts.filter(Boolean).join(' ');
};

/**
 * Style name -> formatter. Each resolver owns its own registry, so styles
 * registered for one run are never visible to another.
 */
export class ReferenceStyleRegistry {
  private readonly formatters = new Map<string, ReferenceFormatter>();

  register(name: string, formatter: ReferenceFormatter): this {
    this.formatters.set(name, formatter);
    return this;
  }

  has(name: string): boolean {
    return this.formatters.has(name);
  }

  get(name: string): ReferenceFormatter {
    const formatter = this.formatters.get(name);
    if (!formatter) {
      throw new UnknownStyleError(name, this.names());
    }
    return formatter;
  }

  names(): string[] {
    return Array.from(this.formatters.keys());
  }
}

export function createStyleRegistry(): ReferenceStyleRegistry {
  return new ReferenceStyleRegistry().register(DEFAULT_STYLE, formatNumberedReference);
}
