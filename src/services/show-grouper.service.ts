import { distance } from 'fastest-levenshtein';
import { ShowDirectory, ShowGroup } from '../types/consolidation.types';

const TITLE_SIMILARITY_THRESHOLD = 0.8;
const WORD_OVERLAP_THRESHOLD = 0.6;

function wordSet(title: string): Set<string> {
  return new Set(title.toLowerCase().split(/\s+/).filter((word) => word.length > 0));
}

/**
 * Edit-distance similarity in [0, 1]: 1 - distance / length of the longer title.
 */
export function titleSimilarity(title1: string, title2: string): number {
  const longest = Math.max(title1.length, title2.length);
  if (longest === 0) {
    return 1;
  }
  return 1 - distance(title1, title2) / longest;
}

/**
 * Jaccard overlap of the two titles' word sets, 0 when either is empty.
 */
export function wordOverlap(title1: string, title2: string): number {
  const words1 = wordSet(title1);
  const words2 = wordSet(title2);
  if (words1.size === 0 || words2.size === 0) {
    return 0;
  }

  const common = [...words1].filter((word) => words2.has(word)).length;
  const union = new Set([...words1, ...words2]).size;
  return common / union;
}

/**
 * Partitions show directories into groups of the same show. Each group is
 * compared through its seed only, so chains where A~B and B~C but not A~C can
 * end up in separate groups.
 */
export class ShowGrouper {
  group(directories: ShowDirectory[]): ShowGroup[] {
    const groups: ShowGroup[] = [];
    const assigned = new Set<number>();

    directories.forEach((seed, i) => {
      if (assigned.has(i)) {
        return;
      }

      const group: ShowGroup = {
        canonicalTitle: seed.rawTitle,
        year: seed.year,
        members: [seed],
      };
      assigned.add(i);

      directories.forEach((other, j) => {
        if (assigned.has(j)) {
          return;
        }
        if (this.areSameShow(seed, other)) {
          group.members.push(other);
          assigned.add(j);
        }
      });

      groups.push(group);
    });

    console.log(`📺 Grouped ${directories.length} directories into ${groups.length} shows`);
    return groups;
  }

  areSameShow(a: ShowDirectory, b: ShowDirectory): boolean {
    if (a.normalizedTitle === b.normalizedTitle) {
      return true;
    }

    if (titleSimilarity(a.normalizedTitle, b.normalizedTitle) > TITLE_SIMILARITY_THRESHOLD) {
      return true;
    }

    return wordOverlap(a.rawTitle, b.rawTitle) > WORD_OVERLAP_THRESHOLD;
  }
}
