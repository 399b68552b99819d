const TITLE_DISALLOWED = /[^-0-9a-zæøå]/g;
const TAG_DISALLOWED = /[^0-9a-zæøå]/g;

/**
 * Title slug: lowercase words joined by single hyphens, with no hyphen at
 * either end (the filename already puts `--` in front of it).
 */
export function normalizeTitle(text: string): string {
  return text
    .toLowerCase()
    .replace(/ /g, '-')
    .replace(/-+/g, '-')
    .replace(TITLE_DISALLOWED, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Tag slug: lowercase alphanumerics only.
 *
 * Spaces are turned into hyphens first and the hyphens are then stripped with
 * everything else, so `"Editor Tools"` becomes `"editortools"`.
 */
export function normalizeTag(text: string): string {
  return text.toLowerCase().replace(/ /g, '-').replace(/_+/g, '_').replace(TAG_DISALLOWED, '');
}

export function normalizeTags(tags?: readonly string[]): string[] {
  if (!tags) {
    return [];
  }

  const seen = new Set<string>();
  for (const rawTag of tags) {
    const tag = normalizeTag(rawTag);
    if (tag) {
      seen.add(tag);
    }
  }

  return Array.from(seen).sort(compareSlugs);
}

export function compareSlugs(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
