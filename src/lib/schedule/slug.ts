export function normalizeDisplayName(value: string): string {
  return value.replaceAll(/\s+/g, ' ').trim();
}

/**
 * Stable identifier for a display name: Latin diacritics stripped, lowercased,
 * every run of characters that are not letters or digits in any script
 * collapsed to a single `-`.
 */
export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replaceAll(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    // marks left after the strip belong to non-Latin scripts and stay
    .replaceAll(/[^\p{L}\p{M}\p{N}]+/gu, '-')
    .replaceAll(/^-+|-+$/g, '');
}
