import { ShowDirectory, ShowGroup } from '../types/consolidation.types';

const MAX_SEASON = 50;

/**
 * Season a member directory files under: its own season, or for shows that
 * release by calendar year, the offset from the show's first year.
 */
export class SeasonResolver {
  resolve(member: ShowDirectory, group: Pick<ShowGroup, 'year'>): number | undefined {
    if (member.season !== undefined) {
      return member.season;
    }

    if (member.year === undefined || group.year === undefined) {
      return undefined;
    }

    const season = member.year - group.year + 1;
    return season >= 1 && season <= MAX_SEASON ? season : undefined;
  }
}
