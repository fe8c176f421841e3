const WRAPPER_ID_SEGMENT = /(\/v1\/wrapper\/)[^/]+/;

/**
 * Reduces a request URL to something safe to log: the query string is
 * dropped and a wrapper id in the path is replaced by `:id`.
 *
 * The request target is taken as raw text; it is not parsed as a URL, since
 * request targets such as `//[` are not valid URLs.
 *
 * @param {string} url - Raw request target
 * @returns {string} Path without query string or wrapper id
 */
export function redactRequestPath(url: string): string {
    const [pathname] = url.split(/[?#]/, 1);
    return pathname.replace(WRAPPER_ID_SEGMENT, '$1:id');
}
