import axios from 'axios';
import { IdentityMatch } from '../types/media.types';

interface TVDBLoginResponse {
  data?: { token?: string };
}

interface TVDBSearchResult {
  tvdb_id?: string;
  id?: string;
  name: string;
  year?: string;
  type?: string;
}

interface TVDBSearchResponse {
  data?: TVDBSearchResult[];
}

interface TVDBEpisode {
  seasonNumber?: number;
  number?: number;
  name?: string | null;
}

interface TVDBEpisodesResponse {
  data?: { episodes?: TVDBEpisode[] };
}

export type TVDBSearchType = 'series' | 'movie';

/**
 * TheTVDB v4 client. Logs in once with the API key and reuses the bearer token
 * until the API rejects it.
 */
export class TVDBService {
  private readonly baseUrl = 'https://api4.thetvdb.com/v4';
  private token: string | null = null;

  constructor(private readonly apiKey: string) {}

  get isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  async search(title: string, type: TVDBSearchType, year?: number): Promise<IdentityMatch | null> {
    try {
      console.log(`📡 TVDB ${type} search: "${title}"${year ? ` (${year})` : ''}`);

      // Pack years are not air years, so series are searched by title alone
      const params: Record<string, string> = { query: title, type };
      if (year && type === 'movie') {
        params.year = String(year);
      }

      const body = await this.get<TVDBSearchResponse>('/search', params);
      if (!body) {
        return null;
      }

      const results = body.data || [];
      const match = results.find((result) => !result.type || result.type === type);
      if (!match) {
        console.log(`  ✗ No TVDB results found`);
        return null;
      }

      const externalId = match.tvdb_id || match.id?.replace(/^\D+-/, '');
      if (!externalId) {
        console.log(`  ✗ TVDB result has no id`);
        return null;
      }

      const matchYear = match.year ? parseInt(match.year, 10) : NaN;
      console.log(`  ✓ Found on TVDB: "${match.name}" (${match.year ?? '????'})`);

      return {
        title: match.name,
        year: Number.isNaN(matchYear) ? undefined : matchYear,
        externalId,
        provider: 'tvdb',
      };
    } catch (error) {
      console.error(`  ✗ TVDB error:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  async getEpisodeTitle(seriesId: string, season: number, episode: number): Promise<string | null> {
    try {
      const body = await this.get<TVDBEpisodesResponse>(`/series/${seriesId}/episodes/default`, {
        season: String(season),
        episodeNumber: String(episode),
      });

      const match = (body?.data?.episodes || []).find(
        (candidate) => candidate.seasonNumber === season && candidate.number === episode
      );
      return match?.name || null;
    } catch (error) {
      console.error(`  ✗ TVDB episode error:`, error instanceof Error ? error.message : error);
      return null;
    }
  }

  /**
   * Authorized GET. A 401 drops the cached token and retries once with a fresh
   * login; null when no token can be obtained.
   */
  private async get<T>(endpoint: string, params: Record<string, string>): Promise<T | null> {
    for (let attempt = 0; attempt < 2; attempt++) {
      const token = await this.authenticate();
      if (!token) {
        return null;
      }

      try {
        const response = await axios.get<T>(`${this.baseUrl}${endpoint}`, {
          params,
          headers: { Authorization: `Bearer ${token}` },
          timeout: 10000,
        });
        return response.data;
      } catch (error) {
        if (attempt === 0 && axios.isAxiosError(error) && error.response?.status === 401) {
          console.warn('  ⚠ TVDB token rejected, logging in again');
          this.token = null;
          continue;
        }
        throw error;
      }
    }
    return null;
  }

  private async authenticate(): Promise<string | null> {
    if (this.token) {
      return this.token;
    }

    const response = await axios.post<TVDBLoginResponse>(
      `${this.baseUrl}/login`,
      { apikey: this.apiKey },
      { timeout: 10000 }
    );

    const token = response.data.data?.token;
    if (!token) {
      console.warn('  ⚠ TVDB login returned no token');
      return null;
    }

    this.token = token;
    return token;
  }
}
