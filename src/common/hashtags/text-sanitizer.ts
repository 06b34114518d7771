/**
 * Keyword contract for source text:
 * - punctuation `. , : ; ! ? " ' ( ) [ ]` is removed outright
 * - whitespace, hyphen and underscore separate tokens
 * - tokens are lowercased, single characters dropped, first occurrence wins
 */
const STRIPPED_PUNCTUATION_RE = /[.,:;!?"'()[\]]/g;
const TOKEN_SEPARATOR_RE = /[ \t\n\r\-_]+/;
const NON_ALPHANUMERIC_RE = /[^\p{L}\p{N}]+/gu;

export function sanitizeKeywords(text: string): string[] {
  const value = (text ?? '').toString().replace(STRIPPED_PUNCTUATION_RE, '');
  if (!value.trim()) return [];
  const out = new Set<string>();
  for (const raw of value.split(TOKEN_SEPARATOR_RE)) {
    const token = raw.toLowerCase();
    if ([...token].length <= 1) continue;
    out.add(token);
  }
  return [...out];
}

/** Letters and digits only (any script), lowercased. */
export function toAlphanumeric(value: string): string {
  return (value ?? '').toString().replace(NON_ALPHANUMERIC_RE, '').toLowerCase();
}
