const HTTP_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Host (with port, if any) of a URL with a leading `www.` removed.
 * Returns '' when the URL cannot be parsed.
 */
export function domainOf(input: string): string {
  try {
    const parsed = new URL(input);
    return parsed.host.replace(/^www\./, '');
  } catch {
    return '';
  }
}

export function isHttpUrl(input: string): boolean {
  try {
    return HTTP_PROTOCOLS.has(new URL(input).protocol);
  } catch {
    return false;
  }
}
