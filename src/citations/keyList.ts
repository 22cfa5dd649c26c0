function stripMatchingQuotes(value: string) {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1).trim();
    }
  }
  return value;
}

/**
 * Reads a newline-delimited key list, e.g. one produced by a shell pipeline.
 * Only this mode strips quotes; \cite{} markers keep their keys verbatim.
 */
export function readKeyList(text: string): string[] {
  const keys: string[] = [];
  const seen = new Set<string>();
  for (const rawLine of text.split(/\r?\n/)) {
    const key = stripMatchingQuotes(rawLine.trim());
    if (!key || seen.has(key)) continue;
    seen.add(key);
    keys.push(key);
  }
  return keys;
}
