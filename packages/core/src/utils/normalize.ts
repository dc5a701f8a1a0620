/**
 * Text normalization.
 *
 * Two flavours: `normalizeDescription` feeds the fingerprint and must stay
 * stable forever; `normalizeVendorName` feeds vendor similarity and may drop
 * noise tokens.
 */

/**
 * Normalize a transaction description for fingerprinting.
 *
 * Transformations:
 * - Trim leading/trailing whitespace
 * - Convert to lowercase
 * - Collapse runs of whitespace to a single space
 *
 * Punctuation is kept: "netflix.com" and "netflix com" are different rows.
 */
export function normalizeDescription(raw: string): string {
    return raw.trim().toLowerCase().replace(/\s+/g, ' ');
}

const WEB_SUFFIX = /\.(?:com|net|org|io|ai|app|dk|de|se|no|fi|nl|fr|eu|co\.uk|co)\b/g;

const BUSINESS_SUFFIXES = new Set([
    'inc',
    'llc',
    'ltd',
    'corp',
    'corporation',
    'company',
    'co',
    'aps',
    'as',
    'bv',
    'gmbh',
    'sarl',
    'srl',
    'ab',
    'oy',
    'plc',
]);

/**
 * Normalize a vendor name or free-text description for similarity scoring.
 *
 * - lowercase
 * - web suffixes (".com", ".dk", ...) removed
 * - "a/s" removed before punctuation is stripped
 * - anything that is not a letter or digit becomes a space
 * - business suffix tokens and pure-digit tokens dropped
 *
 * @example normalizeVendorName('NETFLIX.COM') === 'netflix'
 * @example normalizeVendorName('Acme Cloud ApS #4411') === 'acme cloud'
 */
export function normalizeVendorName(raw: string): string {
    const spaced = raw
        .toLowerCase()
        .replace(WEB_SUFFIX, ' ')
        .replace(/\ba\/s\b/g, ' ')
        .replace(/[^\p{L}\p{N}]+/gu, ' ');

    return spaced
        .split(' ')
        .filter((token) => token.length > 0)
        .filter((token) => !BUSINESS_SUFFIXES.has(token))
        .filter((token) => !/^\d+$/.test(token))
        .join(' ');
}
