/**
 * Profile reference normalizers
 */

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const FACEBOOK_BASE_URL = 'https://www.facebook.com';

/**
 * Canonicalize "name", "@name", "https://host/name" or "https://host/name/status/..."
 * into the bare identifier. Case is passed through. Returns null when nothing usable remains.
 */
export function normalizeHandle(raw: string | null | undefined): string | null {
    const value = raw?.trim() ?? '';
    if (!value) return null;

    if (URL_SCHEME.test(value)) {
        let segment: string;
        try {
            const path = new URL(value).pathname;
            segment = decodeURIComponent(path.split('/').find((part) => part.length > 0) ?? '');
        } catch {
            return null;
        }
        const handle = segment.replace(/^@/, '').trim();
        return handle || null;
    }

    const handle = value.replace(/^@/, '').trim();
    return handle || null;
}

/**
 * Canonicalize a page reference into a URL the page actor accepts.
 * URLs pass through; bare names resolve against the Facebook host.
 */
export function normalizePageUrl(raw: string | null | undefined): string | null {
    const value = raw?.trim() ?? '';
    if (!value) return null;

    if (URL_SCHEME.test(value)) {
        try {
            return new URL(value).toString();
        } catch {
            return null;
        }
    }

    const name = normalizeHandle(value);
    return name ? `${FACEBOOK_BASE_URL}/${encodeURIComponent(name)}` : null;
}
