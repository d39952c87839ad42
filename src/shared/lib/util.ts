/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalized key of a legal document: the NFKC form of the name keeping
 * only letters, digits and round brackets, lower-cased, plus the digits of
 * the document number when there is one. An empty key means the name has
 * nothing to identify it by.
 *
 * "中华人民共和国 民法典（2020）" and "中华人民共和国民法典(2020)" share a key.
 */
export function normalizeEntityKey(
  name: string,
  documentNumber?: string,
): string {
  const normalizedName = name
    .normalize('NFKC')
    .replace(/[^\p{L}\p{N}()]/gu, '')
    .toLowerCase();

  const digits = documentNumber
    ? documentNumber.normalize('NFKC').replace(/\D+/g, '')
    : '';

  return digits ? `${normalizedName}#${digits}` : normalizedName;
}

/**
 * Lower-cased hostname of a URL or bare domain, without scheme, `www.`,
 * port or path.
 */
export function normalizeHostname(hostOrUrl: string): string {
  return hostOrUrl
    .trim()
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
    .replace(/^www\./, '')
    .split(/[/?#]/)[0]
    .replace(/:\d+$/, '');
}

/**
 * Fills `{query}` in a source URL template.
 */
export function fillUrlTemplate(template: string, query: string): string {
  return template.replace(/\{query\}/g, encodeURIComponent(query));
}
