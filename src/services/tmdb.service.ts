import axios from 'axios';
import { IdentityMatch } from '../types/media.types';

// TMDb API - get an API key from: https://www.themoviedb.org/settings/api

interface TMDbMovie {
  id: number;
  title: string;
  original_title: string;
  release_date?: string;
  vote_average: number;
  vote_count: number;
  original_language: string;
  popularity: number;
}

interface TMDbSearchResponse {
  results: TMDbMovie[];
  total_results: number;
}

interface TMDbTVShow {
  id: number;
  name: string;
  original_name: string;
  first_air_date?: string;
  vote_average: number;
  vote_count: number;
  original_language: string;
  popularity: number;
}

interface TMDbTVSearchResponse {
  results: TMDbTVShow[];
  total_results: number;
}

interface TMDbTVDetails {
  id: number;
  name: string;
  first_air_date?: string;
  external_ids?: { imdb_id?: string | null; tvdb_id?: number | null };
}

interface TMDbEpisode {
  name?: string;
}

const normalizeTitle = (t: string) => t
  .toLowerCase()
  .replace(/^the\s+/i, '')
  .replace(/,\s*the$/i, '')
  .replace(/[^\w\s]/g, '')
  .trim();

function yearOf(date?: string): number | undefined {
  if (!date) {
    return undefined;
  }
  const year = parseInt(date.substring(0, 4), 10);
  return Number.isNaN(year) ? undefined : year;
}

export class TMDbService {
  private readonly baseUrl = 'https://api.themoviedb.org/3';

  constructor(private readonly apiKey: string) {}

  get isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async searchMovie(title: string, year?: number): Promise<IdentityMatch | null> {
    try {
      console.log(`🎬 TMDb search: "${title}"${year ? ` (${year})` : ''}`);

      const searchResponse = await axios.get<TMDbSearchResponse>(`${this.baseUrl}/search/movie`, {
        params: {
          api_key: this.apiKey,
          query: title,
          language: 'en-US',
          include_adult: false,
        },
        timeout: 10000,
      });

      const results = searchResponse.data.results || [];
      if (results.length === 0) {
        console.log(`  ✗ No results found`);
        return null;
      }

      const bestMatch = this.findBestMovieMatch(results, title, year);
      if (!bestMatch) {
        console.log(`  ✗ No good match found`);
        return null;
      }

      console.log(`  ✓ Found: "${bestMatch.title}" (${bestMatch.release_date?.substring(0, 4)})`);

      return {
        title: bestMatch.title,
        year: yearOf(bestMatch.release_date),
        externalId: String(bestMatch.id),
        provider: 'tmdb',
      };
    } catch (error) {
      console.error(`  ✗ TMDb error:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  private findBestMovieMatch(results: TMDbMovie[], searchTitle: string, searchYear?: number): TMDbMovie | null {
    const normalizedSearch = normalizeTitle(searchTitle);

    const exactMatches = results.filter((m) =>
      normalizeTitle(m.title) === normalizedSearch || normalizeTitle(m.original_title) === normalizedSearch
    );
    let candidates = exactMatches.length > 0 ? exactMatches : results;

    // Year within 1 year tolerance
    if (searchYear) {
      const yearMatches = candidates.filter((m) => {
        const movieYear = yearOf(m.release_date) ?? 0;
        return Math.abs(movieYear - searchYear) <= 1;
      });
      if (yearMatches.length > 0) {
        candidates = yearMatches;
      }
    }

    const scored = candidates.map((m) => {
      let score = 0;
      if (m.original_language === 'en') {
        score += 1000;
      }
      score += Math.log10(Math.max(m.vote_count || 1, 1)) * 100;
      score += m.popularity * 0.5;
      score += m.vote_average * 5;
      return { movie: m, score };
    });

    scored.sort((a, b) => b.score - a.score);
    return scored[0]?.movie || null;
  }

  async searchTV(title: string, year?: number): Promise<IdentityMatch | null> {
    try {
      console.log(`📺 TMDb TV search: "${title}"${year ? ` (${year})` : ''}`);

      const searchResponse = await axios.get<TMDbTVSearchResponse>(`${this.baseUrl}/search/tv`, {
        params: {
          api_key: this.apiKey,
          query: title,
          language: 'en-US',
          include_adult: false,
        },
        timeout: 10000,
      });

      const results = searchResponse.data.results || [];
      if (results.length === 0) {
        console.log(`  ✗ No TV results found`);
        return null;
      }

      const normalizedSearch = normalizeTitle(title);

      const scored = results.map((show) => {
        let score = 0;
        const n1 = normalizeTitle(show.name);
        const n2 = normalizeTitle(show.original_name);

        if (n1 === normalizedSearch || n2 === normalizedSearch) {
          score += 2000;
        } else if (n1.includes(normalizedSearch) || n2.includes(normalizedSearch)) {
          score += 1000;
        }

        if (show.original_language === 'en') {
          score += 500;
        }

        score += Math.log10(Math.max(show.vote_count || 1, 1)) * 100;
        score += show.popularity * 0.5;
        score += show.vote_average * 5;

        return { show, score };
      });

      scored.sort((a, b) => b.score - a.score);

      const bestMatch = scored[0]?.show;
      if (!bestMatch) {
        console.log(`  ✗ No good TV match found`);
        return null;
      }

      console.log(`  ✓ Found TV: "${bestMatch.name}" (${bestMatch.first_air_date?.substring(0, 4)})`);

      return await this.getTVDetails(bestMatch);
    } catch (error) {
      console.error(`  ✗ TMDb TV error:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  /**
   * Details carry the cross-reference ids; the TVDB id is preferred when known.
   */
  private async getTVDetails(show: TMDbTVShow): Promise<IdentityMatch> {
    const fallback: IdentityMatch = {
      title: show.name,
      year: yearOf(show.first_air_date),
      externalId: String(show.id),
      provider: 'tmdb',
    };

    try {
      const response = await axios.get<TMDbTVDetails>(`${this.baseUrl}/tv/${show.id}`, {
        params: {
          api_key: this.apiKey,
          language: 'en-US',
          append_to_response: 'external_ids',
        },
        timeout: 10000,
      });

      const details = response.data;
      const tvdbId = details.external_ids?.tvdb_id;
      if (!tvdbId) {
        return fallback;
      }

      return {
        title: details.name || show.name,
        year: yearOf(details.first_air_date) ?? fallback.year,
        externalId: String(tvdbId),
        provider: 'tvdb',
        tmdbId: String(show.id),
      };
    } catch (error) {
      console.error(`  ✗ Error getting TV details:`, error instanceof Error ? error.message : error);
      return fallback;
    }
  }

  async getEpisodeTitle(tvId: string, season: number, episode: number): Promise<string | null> {
    try {
      const response = await axios.get<TMDbEpisode>(`${this.baseUrl}/tv/${tvId}/season/${season}/episode/${episode}`, {
        params: {
          api_key: this.apiKey,
          language: 'en-US',
        },
        timeout: 10000,
      });
      return response.data.name || null;
    } catch (error) {
      console.error(`  ✗ TMDb episode error:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
