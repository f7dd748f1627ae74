// ============================================================
// acf-locate — Fragment Tokenizer
// ============================================================
// Splits an ACF/VDF document into whitespace-delimited fragments.
// Quoted values containing whitespace come out in several pieces;
// the parser joins them back together.

const WHITESPACE_RUN = /[ \t\r\n\v\f]+/;

/**
 * Split raw document text into fragments.
 * An empty or whitespace-only document yields no fragments.
 */
export function tokenize(text: string): string[] {
  const trimmed = text.replace(/^[ \t\r\n\v\f]+|[ \t\r\n\v\f]+$/g, '');
  if (trimmed.length === 0) return [];
  return trimmed.split(WHITESPACE_RUN);
}

/** Number of `"` characters in a fragment */
export function countQuotes(fragment: string): number {
  let count = 0;
  for (const ch of fragment) {
    if (ch === '"') count++;
  }
  return count;
}

/** True for a fragment that opens and closes its own quotes, e.g. `"appid"` */
export function isFullyQuoted(fragment: string): boolean {
  return fragment.length >= 2 && fragment.startsWith('"') && fragment.endsWith('"');
}

/** Remove one leading quote, where present */
export function stripLeadingQuote(fragment: string): string {
  return fragment.startsWith('"') ? fragment.slice(1) : fragment;
}

/** Remove one trailing quote, where present */
export function stripTrailingQuote(fragment: string): string {
  return fragment.endsWith('"') ? fragment.slice(0, -1) : fragment;
}

/** Remove one leading and one trailing quote, where present */
export function stripQuotes(fragment: string): string {
  return stripTrailingQuote(stripLeadingQuote(fragment));
}
