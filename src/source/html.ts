const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  ndash: '–',
  mdash: '—',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
  hellip: '…',
  copy: '©',
  reg: '®',
  trade: '™',
};

function decodeCodePoint(code: number, fallback: string): string {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) return fallback;
  return String.fromCodePoint(code);
}

/**
 * Decode named and numeric character references. Unknown names are left as-is.
 */
export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, ref: string) => {
    if (ref.startsWith('#x') || ref.startsWith('#X')) {
      return decodeCodePoint(parseInt(ref.slice(2), 16), match);
    }
    if (ref.startsWith('#')) {
      return decodeCodePoint(parseInt(ref.slice(1), 10), match);
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
  });
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Strip HTML tags, decode entities and collapse whitespace.
 */
export function stripHtml(html: string): string {
  if (!html) return '';
  // Remove script/style blocks and comments
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<!--[\s\S]*?-->/g, '');
  text = text.replace(/<[^>]+>/g, ' ');
  return collapseWhitespace(decodeEntities(text));
}
