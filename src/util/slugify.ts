// Quotes vanish instead of splitting words ("What's" -> "whats")
const QUOTE_REGEX = /["'`’“”‘]/g;
const COMBINING_MARKS_REGEX = /[\u0300-\u036f]/g;
const NON_ALPHANUMERIC_REGEX = /[^a-z0-9]+/g;
// Characters rejected by common filesystems, plus control characters
// eslint-disable-next-line no-control-regex
const UNSAFE_FILENAME_REGEX = /[/\\:*?"<>|\u0000-\u001f]+/g;

export interface SlugifyOptions {
  maxLength?: number;
}

/**
 * Generate a filesystem-friendly slug from a page title.
 * - NFKD normalize and drop accents
 * - Lowercase, drop quotes
 * - Replace every run of non-alphanumerics with a single '-'
 * - Trim leading/trailing '-'
 * - Truncate to maxLength, preferring a word boundary
 */
export function slugify(title: string, opts: SlugifyOptions = {}): string {
  const maxLength = opts.maxLength ?? 80;
  let s = title.normalize('NFKD').replace(COMBINING_MARKS_REGEX, '').toLowerCase();
  s = s.replace(QUOTE_REGEX, '');
  s = s.replace(NON_ALPHANUMERIC_REGEX, '-');
  s = s.replace(/^-+|-+$/g, '');
  if (s.length > maxLength) {
    const softLimit = Math.floor(maxLength * 0.95);
    const cutIndex = s.lastIndexOf('-', softLimit);
    s = cutIndex > 20 ? s.slice(0, cutIndex) : s.slice(0, maxLength);
    s = s.replace(/-+$/, '');
  }
  return s || 'untitled';
}

/**
 * Keep the title as written, only replacing characters that are unsafe in
 * file names. Leading dots are dropped so titles never become hidden files.
 */
export function preserveFilename(title: string): string {
  const s = title
    .replace(UNSAFE_FILENAME_REGEX, '-')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^\.+/, '')
    .trim();
  return s || 'untitled';
}
