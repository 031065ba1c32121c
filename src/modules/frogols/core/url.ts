/**
 * Link URL normalization.
 */

/**
 * Prefixes `https://` unless the trimmed value already starts with a
 * http(s) scheme. Hosts are not validated.
 */
export const normalizeUrl = (raw: string): string => {
  const trimmed = raw.trim();

  if (trimmed.startsWith('http://') || trimmed.startsWith('https://')) {
    return trimmed;
  }

  return `https://${trimmed}`;
};
