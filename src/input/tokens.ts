/**
 * Splitting of the text fields of input records.
 */

export interface Entry {
  /** 1-based position of the entry in its field, counting blank entries */
  readonly line: number;
  readonly tokens: readonly string[];
}

/**
 * A comma separated list. Surrounding whitespace and empty items are dropped.
 */
export function splitList(text: string): string[] {
  return text
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * A semicolon separated list of comma separated entries. Blank entries, such
 * as the one after a trailing semicolon, are skipped.
 */
export function splitEntries(text: string): Entry[] {
  const entries: Entry[] = [];
  text.split(';').forEach((raw, i) => {
    if (raw.trim().length == 0) {
      return;
    }
    entries.push({ line: i + 1, tokens: raw.split(',').map((t) => t.trim()) });
  });
  return entries;
}

/**
 * Split a run of symbols such as a production body ("aS", "a S") or a stack
 * push ("AZ").
 *
 * Whitespace separated text is split on the whitespace. Otherwise the
 * longest name of the vocabulary is taken at each position; when nothing
 * matches, the rest of the text becomes one token so it can be reported.
 */
export function splitSequence(
  text: string,
  vocabulary: readonly string[]
): string[] {
  const trimmed = text.trim();
  if (/\s/.test(trimmed)) {
    return trimmed.split(/\s+/);
  }
  const bySize = vocabulary
    .filter((name) => name.length > 0)
    .sort((a, b) => b.length - a.length);
  const tokens: string[] = [];
  let i = 0;
  while (i < trimmed.length) {
    const name = bySize.find((n) => trimmed.startsWith(n, i));
    if (name === undefined) {
      tokens.push(trimmed.slice(i));
      break;
    }
    tokens.push(name);
    i += name.length;
  }
  return tokens;
}
