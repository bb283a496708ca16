import axios, { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { IdentityLookupService } from '../services/identity-lookup.service';
import { TMDbService } from '../services/tmdb.service';
import { TVDBSearchType, TVDBService } from '../services/tvdb.service';
import { IdentityMatch } from '../types/media.types';

/**
 * Serves canned JSON for request URLs in process; unknown URLs fail like a
 * network error would.
 */
function cannedAdapter(routes: Record<string, unknown>, requests: InternalAxiosRequestConfig[]): AxiosAdapter {
  return async (config) => {
    requests.push(config);
    const url = config.url ?? '';
    if (!(url in routes)) {
      throw new Error(`Unexpected request: ${url}`);
    }
    return { data: routes[url], status: 200, statusText: 'OK', headers: {}, config };
  };
}

const TMDB = 'https://api.themoviedb.org/3';
const TVDB = 'https://api4.thetvdb.com/v4';

describe('Identity lookup', () => {
  const originalAdapter = axios.defaults.adapter;
  let requests: InternalAxiosRequestConfig[];

  beforeEach(() => {
    requests = [];
  });

  afterAll(() => {
    axios.defaults.adapter = originalAdapter;
  });

  describe('TMDbService', () => {
    const tmdb = new TMDbService('test-secret');

    test('searchTV prefers the TVDB id from external ids', async () => {
      axios.defaults.adapter = cannedAdapter({
        [`${TMDB}/search/tv`]: {
          total_results: 2,
          results: [
            {
              id: 2,
              name: 'SmackDown Highlights',
              original_name: 'SmackDown Highlights',
              first_air_date: '2010-01-01',
              vote_average: 5,
              vote_count: 10,
              original_language: 'es',
              popularity: 5,
            },
            {
              id: 1,
              name: 'WWE SmackDown',
              original_name: 'WWE SmackDown',
              first_air_date: '1999-04-29',
              vote_average: 7,
              vote_count: 100,
              original_language: 'en',
              popularity: 50,
            },
          ],
        },
        [`${TMDB}/tv/1`]: {
          id: 1,
          name: 'WWE SmackDown',
          first_air_date: '1999-04-29',
          external_ids: { tvdb_id: 73255 },
        },
      }, requests);

      expect(await tmdb.searchTV('SmackDown', 2016)).toEqual({
        title: 'WWE SmackDown',
        year: 1999,
        externalId: '73255',
        provider: 'tvdb',
        tmdbId: '1',
      });
      expect(requests.map((request) => request.url)).toEqual([`${TMDB}/search/tv`, `${TMDB}/tv/1`]);
      expect(requests[0].params).toEqual({ api_key: 'test-secret', query: 'SmackDown', language: 'en-US', include_adult: false });
    });

    test('searchTV falls back to the TMDb id without a TVDB id', async () => {
      axios.defaults.adapter = cannedAdapter({
        [`${TMDB}/search/tv`]: {
          total_results: 1,
          results: [{
            id: 7,
            name: 'Some Show',
            original_name: 'Some Show',
            first_air_date: '2001-09-01',
            vote_average: 6,
            vote_count: 3,
            original_language: 'en',
            popularity: 1,
          }],
        },
        [`${TMDB}/tv/7`]: { id: 7, name: 'Some Show', external_ids: { tvdb_id: null } },
      }, requests);

      expect(await tmdb.searchTV('Some Show')).toEqual({ title: 'Some Show', year: 2001, externalId: '7', provider: 'tmdb' });
    });

    test('searchMovie keeps candidates within a year of the hint', async () => {
      axios.defaults.adapter = cannedAdapter({
        [`${TMDB}/search/movie`]: {
          total_results: 2,
          results: [
            {
              id: 10,
              title: 'Dune',
              original_title: 'Dune',
              release_date: '2021-09-15',
              vote_average: 8,
              vote_count: 9000,
              original_language: 'en',
              popularity: 300,
            },
            {
              id: 11,
              title: 'Dune',
              original_title: 'Dune',
              release_date: '1984-12-14',
              vote_average: 6,
              vote_count: 2000,
              original_language: 'en',
              popularity: 40,
            },
          ],
        },
      }, requests);

      expect(await tmdb.searchMovie('Dune', 1984)).toEqual({ title: 'Dune', year: 1984, externalId: '11', provider: 'tmdb' });
    });

    test('request failures resolve to null', async () => {
      axios.defaults.adapter = cannedAdapter({}, requests);

      expect(await tmdb.searchTV('Anything')).toBeNull();
      expect(await tmdb.searchMovie('Anything')).toBeNull();
    });

    test('empty results resolve to null', async () => {
      axios.defaults.adapter = cannedAdapter({ [`${TMDB}/search/tv`]: { total_results: 0, results: [] } }, requests);

      expect(await tmdb.searchTV('Nothing')).toBeNull();
    });

    test('getEpisodeTitle reads the episode name', async () => {
      axios.defaults.adapter = cannedAdapter({
        [`${TMDB}/tv/1/season/3/episode/7`]: { id: 500, name: 'Homecoming', season_number: 3, episode_number: 7 },
      }, requests);

      expect(await tmdb.getEpisodeTitle('1', 3, 7)).toBe('Homecoming');
      expect(requests[0].params).toEqual({ api_key: 'test-secret', language: 'en-US' });
    });

    test('getEpisodeTitle resolves to null when the episode is unknown', async () => {
      axios.defaults.adapter = cannedAdapter({}, requests);

      expect(await tmdb.getEpisodeTitle('1', 99, 1)).toBeNull();
    });
  });

  describe('TVDBService', () => {
    test('logs in once and searches with the bearer token', async () => {
      axios.defaults.adapter = cannedAdapter({
        [`${TVDB}/login`]: { data: { token: 'test-token' } },
        [`${TVDB}/search`]: {
          data: [{ tvdb_id: '73255', name: 'WWE SmackDown', year: '1999', type: 'series' }],
        },
      }, requests);
      const tvdb = new TVDBService('test-secret');

      const first = await tvdb.search('SmackDown', 'series', 2016);
      await tvdb.search('SmackDown', 'series');

      expect(first).toEqual({ title: 'WWE SmackDown', year: 1999, externalId: '73255', provider: 'tvdb' });
      expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
        `post ${TVDB}/login`,
        `get ${TVDB}/search`,
        `get ${TVDB}/search`,
      ]);
      expect(requests[1].params).toEqual({ query: 'SmackDown', type: 'series' });
      expect(requests[1].headers.Authorization).toBe('Bearer test-token');
    });

    test('movie searches filter by year', async () => {
      axios.defaults.adapter = cannedAdapter({
        [`${TVDB}/login`]: { data: { token: 'test-token' } },
        [`${TVDB}/search`]: { data: [{ tvdb_id: '123', name: 'Dune', year: '1984', type: 'movie' }] },
      }, requests);

      await new TVDBService('test-secret').search('Dune', 'movie', 1984);

      expect(requests[1].params).toEqual({ query: 'Dune', type: 'movie', year: '1984' });
    });

    test('an expired token is replaced by a fresh login', async () => {
      const tokens = ['old-token', 'new-token'];
      const expiringTokenAdapter: AxiosAdapter = async (config) => {
        requests.push(config);
        if (config.url === `${TVDB}/login`) {
          return { data: { data: { token: tokens.shift() } }, status: 200, statusText: 'OK', headers: {}, config };
        }
        if (config.headers.Authorization === 'Bearer old-token') {
          const response = { data: {}, status: 401, statusText: 'Unauthorized', headers: {}, config };
          throw new AxiosError('Request failed with status code 401', AxiosError.ERR_BAD_REQUEST, config, null, response);
        }
        return {
          data: { data: [{ tvdb_id: '73255', name: 'WWE SmackDown', year: '1999', type: 'series' }] },
          status: 200,
          statusText: 'OK',
          headers: {},
          config,
        };
      };
      axios.defaults.adapter = expiringTokenAdapter;

      const match = await new TVDBService('test-secret').search('SmackDown', 'series');

      expect(match?.externalId).toBe('73255');
      expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
        `post ${TVDB}/login`,
        `get ${TVDB}/search`,
        `post ${TVDB}/login`,
        `get ${TVDB}/search`,
      ]);
      expect(requests[3].headers.Authorization).toBe('Bearer new-token');
    });

    test('getEpisodeTitle picks the matching season and number', async () => {
      axios.defaults.adapter = cannedAdapter({
        [`${TVDB}/login`]: { data: { token: 'test-token' } },
        [`${TVDB}/series/81189/episodes/default`]: {
          data: {
            episodes: [
              { seasonNumber: 2, number: 4, name: 'Down' },
              { seasonNumber: 2, number: 5, name: 'Breakage' },
            ],
          },
        },
      }, requests);

      expect(await new TVDBService('test-secret').getEpisodeTitle('81189', 2, 5)).toBe('Breakage');
      expect(requests[1].params).toEqual({ season: '2', episodeNumber: '5' });
    });

    test('ids of the form series-123 are reduced to the number', async () => {
      axios.defaults.adapter = cannedAdapter({
        [`${TVDB}/login`]: { data: { token: 'test-token' } },
        [`${TVDB}/search`]: { data: [{ id: 'series-81189', name: 'Breaking Bad', type: 'series' }] },
      }, requests);

      expect(await new TVDBService('test-secret').search('Breaking Bad', 'series')).toEqual({
        title: 'Breaking Bad',
        year: undefined,
        externalId: '81189',
        provider: 'tvdb',
      });
    });

    test('a failed login resolves to null', async () => {
      axios.defaults.adapter = cannedAdapter({ [`${TVDB}/login`]: { data: {} } }, requests);

      expect(await new TVDBService('test-secret').search('Breaking Bad', 'series')).toBeNull();
      expect(requests).toHaveLength(1);
    });
  });

  describe('IdentityLookupService', () => {
    class StubTMDb extends TMDbService {
      readonly calls: string[] = [];

      constructor(apiKey: string, private readonly result: IdentityMatch | null, private readonly episode: string | null = null) {
        super(apiKey);
      }

      async searchTV(title: string): Promise<IdentityMatch | null> {
        this.calls.push(`tv:${title}`);
        return this.result;
      }

      async searchMovie(title: string): Promise<IdentityMatch | null> {
        this.calls.push(`movie:${title}`);
        return this.result;
      }

      async getEpisodeTitle(tvId: string, season: number, episode: number): Promise<string | null> {
        this.calls.push(`episode:${tvId}:${season}:${episode}`);
        return this.episode;
      }
    }

    class StubTVDB extends TVDBService {
      readonly calls: string[] = [];

      constructor(apiKey: string, private readonly result: IdentityMatch | null, private readonly episode: string | null = null) {
        super(apiKey);
      }

      async search(title: string, type: TVDBSearchType): Promise<IdentityMatch | null> {
        this.calls.push(`${type}:${title}`);
        return this.result;
      }

      async getEpisodeTitle(seriesId: string, season: number, episode: number): Promise<string | null> {
        this.calls.push(`episode:${seriesId}:${season}:${episode}`);
        return this.episode;
      }
    }

    const tvdbMatch: IdentityMatch = { title: 'WWE SmackDown', year: 1999, externalId: '73255', provider: 'tvdb' };
    const tmdbMatch: IdentityMatch = { title: 'WWE SmackDown', year: 1999, externalId: '4656', provider: 'tmdb' };

    test('episodes try TVDB first', async () => {
      const tmdb = new StubTMDb('test-secret', tmdbMatch);
      const tvdb = new StubTVDB('test-secret', tvdbMatch);

      expect(await new IdentityLookupService(tmdb, tvdb).lookup('SmackDown', 2016, 'episode')).toBe(tvdbMatch);
      expect(tvdb.calls).toEqual(['series:SmackDown']);
      expect(tmdb.calls).toEqual([]);
    });

    test('episodes fall back to TMDb on a TVDB miss', async () => {
      const tmdb = new StubTMDb('test-secret', tmdbMatch);
      const tvdb = new StubTVDB('test-secret', null);

      expect(await new IdentityLookupService(tmdb, tvdb).lookup('SmackDown', undefined, 'episode')).toBe(tmdbMatch);
      expect(tmdb.calls).toEqual(['tv:SmackDown']);
    });

    test('movies try TMDb first', async () => {
      const tmdb = new StubTMDb('test-secret', null);
      const tvdb = new StubTVDB('test-secret', tvdbMatch);

      expect(await new IdentityLookupService(tmdb, tvdb).lookup('Dune', 1984, 'movie')).toBe(tvdbMatch);
      expect(tmdb.calls).toEqual(['movie:Dune']);
      expect(tvdb.calls).toEqual(['movie:Dune']);
    });

    test('providers without a key are skipped', async () => {
      const tmdb = new StubTMDb('test-secret', tmdbMatch);
      const tvdb = new StubTVDB('', tvdbMatch);

      expect(await new IdentityLookupService(tmdb, tvdb).lookup('SmackDown', 2016, 'episode')).toBe(tmdbMatch);
      expect(tvdb.calls).toEqual([]);
    });

    test('unknown media is never looked up', async () => {
      const tmdb = new StubTMDb('test-secret', tmdbMatch);
      const tvdb = new StubTVDB('test-secret', tvdbMatch);

      expect(await new IdentityLookupService(tmdb, tvdb).lookup('holiday video', undefined, 'unknown')).toBeNull();
      expect([...tmdb.calls, ...tvdb.calls]).toEqual([]);
    });

    test('episode titles come from TVDB for TVDB ids', async () => {
      const tmdb = new StubTMDb('test-secret', null, 'From TMDb');
      const tvdb = new StubTVDB('test-secret', null, 'From TVDB');

      expect(await new IdentityLookupService(tmdb, tvdb).episodeTitle(tvdbMatch, 2, 5)).toBe('From TVDB');
      expect(tvdb.calls).toEqual(['episode:73255:2:5']);
      expect(tmdb.calls).toEqual([]);
    });

    test('episode titles fall back to TMDb under its own id', async () => {
      const tmdb = new StubTMDb('test-secret', null, 'From TMDb');
      const tvdb = new StubTVDB('', null, 'From TVDB');
      const viaTMDb: IdentityMatch = { ...tvdbMatch, tmdbId: '4656' };

      expect(await new IdentityLookupService(tmdb, tvdb).episodeTitle(viaTMDb, 2, 5)).toBe('From TMDb');
      expect(tmdb.calls).toEqual(['episode:4656:2:5']);
      expect(tvdb.calls).toEqual([]);
    });

    test('no provider knows the episode', async () => {
      const tmdb = new StubTMDb('test-secret', null);
      const tvdb = new StubTVDB('test-secret', null);

      expect(await new IdentityLookupService(tmdb, tvdb).episodeTitle(tmdbMatch, 1, 1)).toBeNull();
      expect(tmdb.calls).toEqual(['episode:4656:1:1']);
      expect(tvdb.calls).toEqual([]);
    });
  });
});
