import { IdentityLookup, IdentityMatch, MediaKind } from '../types/media.types';
import { TMDbService } from './tmdb.service';
import { TVDBService } from './tvdb.service';

/**
 * Resolves a title (and optional year) to a canonical identity.
 * TV shows try TVDB first, movies try TMDb first; providers without an API
 * key are skipped. A miss on every provider resolves to null.
 */
export class IdentityLookupService implements IdentityLookup {
  constructor(
    private readonly tmdb: TMDbService,
    private readonly tvdb: TVDBService
  ) {}

  async lookup(title: string, year: number | undefined, kind: MediaKind): Promise<IdentityMatch | null> {
    if (kind === 'unknown') {
      return null;
    }

    const attempts: Array<() => Promise<IdentityMatch | null>> = [];
    if (kind === 'episode') {
      if (this.tvdb.isConfigured) attempts.push(() => this.tvdb.search(title, 'series', year));
      if (this.tmdb.isConfigured) attempts.push(() => this.tmdb.searchTV(title, year));
    } else {
      if (this.tmdb.isConfigured) attempts.push(() => this.tmdb.searchMovie(title, year));
      if (this.tvdb.isConfigured) attempts.push(() => this.tvdb.search(title, 'movie', year));
    }

    for (const attempt of attempts) {
      const match = await attempt();
      if (match) {
        return match;
      }
    }

    return null;
  }

  /**
   * Episode title from the provider that identified the show, then TMDb when
   * it knows the show under its own id.
   */
  async episodeTitle(match: IdentityMatch, season: number, episode: number): Promise<string | null> {
    const attempts: Array<() => Promise<string | null>> = [];
    if (match.provider === 'tvdb' && this.tvdb.isConfigured) {
      attempts.push(() => this.tvdb.getEpisodeTitle(match.externalId, season, episode));
    }
    const tmdbId = match.provider === 'tmdb' ? match.externalId : match.tmdbId;
    if (tmdbId && this.tmdb.isConfigured) {
      attempts.push(() => this.tmdb.getEpisodeTitle(tmdbId, season, episode));
    }

    for (const attempt of attempts) {
      const title = await attempt();
      if (title) {
        return title;
      }
    }

    return null;
  }
}
