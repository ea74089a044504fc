/**
 * DOI normalization utilities
 */

/**
 * Normalize DOI (lowercase, strip resolver prefixes and trailing punctuation)
 */
export function normalizeDOI(doi: string): string {
  return doi
    .trim()
    .toLowerCase()
    .replace(/^(https?:\/\/)?(dx\.)?doi\.org\//, "")
    .replace(/^doi:\s*/, "")
    .replace(/[.,;:]+$/, ""); // Remove trailing punctuation
}

/**
 * Validate DOI format (basic check)
 */
export function isValidDOI(doi: string): boolean {
  // DOI format: 10.xxxx/xxxxx
  return /^10\.\d{4,}\/[^\s]+$/.test(doi);
}

/**
 * Normalize the identifier used for dedup: "doi:", "pmid:" or "s2:" prefix,
 * lowercased. Returns undefined for blank identifiers.
 */
export function normalizeExternalId(id: string | undefined): string | undefined {
  if (!id) return undefined;
  const trimmed = id.trim().toLowerCase();
  if (!trimmed) return undefined;
  if (trimmed.startsWith("doi:")) return `doi:${normalizeDOI(trimmed)}`;
  if (isValidDOI(normalizeDOI(trimmed))) return `doi:${normalizeDOI(trimmed)}`;
  return trimmed;
}
