import { SHOW_TITLE_ALIASES } from '../config/constants';

/**
 * Canonical form of a show title for equality and similarity checks.
 */
export class TitleNormalizer {
  private readonly aliasTerms: ReadonlyArray<{ canonical: string; terms: readonly string[] }>;

  constructor(aliases: Readonly<Record<string, readonly string[]>> = SHOW_TITLE_ALIASES) {
    this.aliasTerms = Object.entries(aliases).map(([canonical, variants]) => ({
      canonical,
      terms: [...variants, canonical],
    }));
  }

  normalize(raw: string): string {
    const normalized = raw
      .toLowerCase()
      .replace(/[^\p{L}\p{N}_\s]/gu, '')
      .replace(/\s+/g, ' ')
      .trim();

    // Any title containing a term collapses, glued forms like "wwesmackdown" included
    for (const { canonical, terms } of this.aliasTerms) {
      if (terms.some((term) => normalized.includes(term))) {
        return canonical;
      }
    }

    return normalized;
  }
}
