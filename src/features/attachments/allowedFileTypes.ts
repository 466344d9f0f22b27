/**
 * MIME allow-list. `false` entries are recognised but switched off.
 */
export const ALLOWED_FILE_TYPES: Readonly<Record<string, boolean>> = {
    'application/pdf': false,
    'text/plain; charset=utf-8': true,
    'image/jpeg': true,
    'image/jpg': true,
    'image/png': true,
    'audio/mp3': true,
    'audio/mp4': true,
    'video/quicktime': true,
    'video/mp4': true,
    'video/mpeg': true,
    'video/mov': true,
    'video/avi': true,
    'video/x-flv': true,
    'video/mpg': true,
    'video/webm': true,
    'video/wmv': true,
    'video/3gpp': true,
};

export const IMAGE_TYPES: ReadonlySet<string> = new Set(['image/jpeg', 'image/jpg', 'image/png']);

/** Formats sharp may report for an admitted image */
export const IMAGE_FORMATS: ReadonlySet<string> = new Set(['jpeg', 'png']);

export function normalizeContentType(contentType: string): string {
    return contentType.trim().toLowerCase();
}

export function isAllowedFileType(contentType: string): boolean {
    return ALLOWED_FILE_TYPES[normalizeContentType(contentType)] === true;
}
