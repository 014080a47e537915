/**
 * URL helpers for stage output.
 */

/**
 * Resolve a link found on the page at baseUrl. Absolute, protocol-relative,
 * root-relative and relative links are all accepted; missing parts come
 * from the base.
 *
 * @throws TypeError if the result is not a valid URL
 */
export function mergeUrls(baseUrl: string, link: string): string {
  return new URL(link, baseUrl).toString()
}

/**
 * Validate that a URL parses and uses http or https.
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}
