/**
 * Returns a function mapping an offset to its 1-based line. Offsets must be
 * passed in non-decreasing order; each character is visited once.
 */
export function createLineCounter(content: string): (offset: number) => number {
  let cursor = 0;
  let line = 1;
  return (offset) => {
    const limit = Math.min(offset, content.length);
    for (; cursor < limit; cursor += 1) {
      if (content.charCodeAt(cursor) === 10) line += 1;
    }
    return line;
  };
}
