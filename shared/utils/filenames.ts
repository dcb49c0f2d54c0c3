// Denylist: characters Windows/macOS/Linux reject in path segments, plus ASCII control characters.
const FILENAME_DENYLIST = /[\\/*?:"<>|\u0000-\u001f\u007f]/g;

/**
 * Makes a theme or slide label safe to use as a single path segment.
 * Strips denylisted characters, turns whitespace runs into `_`,
 * trims leading/trailing dots and underscores and caps the length.
 */
export function sanitizeForFilename(input: string, fallback = 'untitled', maxLength = 80): string {
    const cleaned = input
        .replace(FILENAME_DENYLIST, '')
        .trim()
        .replace(/\s+/g, '_')
        .replace(/^[._]+|[._]+$/g, '')
        .slice(0, maxLength)
        .replace(/[._]+$/, '');
    return cleaned || fallback;
}

/**
 * `01_January` style base name (no extension, no variant suffix).
 */
export function slideBaseName(ordinal: number, label: string): string {
    return `${String(ordinal).padStart(2, '0')}_${sanitizeForFilename(label, `Slide_${ordinal}`)}`;
}

export function variantFileName(baseName: string, variant: number): string {
    return `${baseName}_v${variant}.png`;
}
