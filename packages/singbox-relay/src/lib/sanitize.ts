// singbox-relay/src/lib/sanitize.ts
// Tag normalisation shared by dedup, reference rewriting and chain lookup.

/** Decorative characters stripped from tags by default. */
export const DEFAULT_DECORATIVE_CHARS = '[]【】"\'';

export type TagSanitizer = (tag: string) => string;

/**
 * Build a memoised sanitizer for the given decorative character set.
 *
 * The cache lives as long as the returned function; create one per run.
 *
 * sanitize('【HK  01】 ') => 'HK 01'
 */
export function createTagSanitizer(decorativeChars: string = DEFAULT_DECORATIVE_CHARS): TagSanitizer {
    const clean = createTagCleaner(decorativeChars);
    const cache = new Map<string, string>();

    return (tag: string): string => {
        const hit = cache.get(tag);
        if (typeof hit !== 'undefined') return hit;

        const cleaned = clean(tag);
        cache.set(tag, cleaned);
        return cleaned;
    };
}

/** Default-set sanitizer without a cache, safe to share across runs. */
export const sanitizeTag: TagSanitizer = createTagCleaner(DEFAULT_DECORATIVE_CHARS);

function createTagCleaner(decorativeChars: string): TagSanitizer {
    // `u` keeps astral characters (emoji) whole inside the class
    const stripRegex = decorativeChars
        ? new RegExp(`[${escapeCharClass(decorativeChars)}]+`, 'gu')
        : null;

    return (tag: string): string => {
        if (!tag) return tag;
        const stripped = stripRegex ? tag.replace(stripRegex, '') : tag;
        return stripped.replace(/\s+/g, ' ').trimEnd();
    };
}

function escapeCharClass(chars: string): string {
    return chars.replace(/[\\\]\[^-]/g, ch => `\\${ch}`);
}
