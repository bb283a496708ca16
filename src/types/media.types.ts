import { QualityProfile } from './quality.types';

export type MediaKind = 'movie' | 'episode' | 'unknown';

/**
 * Best-effort fields guessed from a bare file name. Any field may be absent.
 */
export interface FilenameGuess {
  title?: string;
  year?: number;
  season?: number;
  episode?: number;
  episodeTitle?: string;
  kind: MediaKind;
}

export interface FilenameGuesser {
  guess(fileName: string): FilenameGuess;
}

export interface MediaInfo {
  originalPath: string;
  kind: MediaKind;
  title: string;
  year?: number;
  season?: number;
  episode?: number;
  episodeTitle?: string;
  externalId?: string;
  extension: string;
  quality: QualityProfile;
}

export interface RenameResult {
  originalPath: string;
  newPath: string;
  success: boolean;
  error?: string;
}

export type IdentityProvider = 'tmdb' | 'tvdb';

export interface IdentityMatch {
  title: string;
  year?: number;
  externalId: string;
  provider: IdentityProvider;
  /** TMDb's own id when TMDb found the show but a TVDB id is preferred. */
  tmdbId?: string;
}

export interface IdentityLookup {
  /** Resolves to null when nothing matched; never rejects. */
  lookup(title: string, year: number | undefined, kind: MediaKind): Promise<IdentityMatch | null>;
  episodeTitle(match: IdentityMatch, season: number, episode: number): Promise<string | null>;
}
