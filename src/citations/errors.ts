export class BibliographyReadError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BibliographyReadError';
    this.path = path;
  }
}

export class UnknownStyleError extends Error {
  readonly style: string;

  constructor(style: string, available: string[]) {
    super(`Unknown citation style '${style}' (available: ${available.join(', ')})`);
    this.name = 'UnknownStyleError';
    this.style = style;
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
