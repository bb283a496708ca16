import { MEDIA_NAME_PATTERNS, VIDEO_EXTENSIONS, SUBTITLE_EXTENSIONS } from '../config/constants';
import { FilenameGuess, FilenameGuesser, MediaKind } from '../types/media.types';

interface EpisodeMarker {
  index: number;
  length: number;
  season: number;
  episode?: number;
}

/**
 * Best-effort parser for release-style media file names, e.g.
 * "Show.Name.S01E02.Episode.Title.720p.HDTV.x264-GRP.mkv" or
 * "Movie Title (2010) [1080p].mkv". Never throws.
 */
export class MediaNameParser implements FilenameGuesser {
  guess(fileName: string): FilenameGuess {
    const name = this.stripExtension(fileName);

    const marker = this.findEpisodeMarker(name);
    const yearMatch = name.match(MEDIA_NAME_PATTERNS.YEAR);
    const year = yearMatch ? parseInt(yearMatch[1], 10) : undefined;
    const yearIndex = yearMatch?.index ?? -1;

    // Title runs up to whichever comes first: the episode marker or the year
    let end = name.length;
    if (marker) {
      end = Math.min(end, marker.index);
    }
    if (yearIndex > 0) {
      end = Math.min(end, yearIndex);
    }

    const title = this.cleanTitle(name.substring(0, end)) || this.cleanTitle(this.stripTechnicalTail(name));
    const episodeTitle = marker?.episode !== undefined
      ? this.extractEpisodeTitle(name.substring(marker.index + marker.length))
      : undefined;

    let kind: MediaKind = 'unknown';
    if (marker?.episode !== undefined) {
      kind = 'episode';
    } else if (year !== undefined && !marker) {
      kind = 'movie';
    }

    return {
      title: title || undefined,
      year,
      season: marker?.season,
      episode: marker?.episode,
      episodeTitle,
      kind,
    };
  }

  private stripExtension(fileName: string): string {
    const ext = fileName.lastIndexOf('.');
    if (ext <= 0) {
      return fileName;
    }
    const extension = fileName.substring(ext).toLowerCase();
    if (VIDEO_EXTENSIONS.includes(extension) || SUBTITLE_EXTENSIONS.includes(extension)) {
      return fileName.substring(0, ext);
    }
    return fileName;
  }

  private findEpisodeMarker(name: string): EpisodeMarker | undefined {
    const episodePatterns = [
      MEDIA_NAME_PATTERNS.SEASON_EPISODE,
      MEDIA_NAME_PATTERNS.SEASON_EPISODE_WORDS,
      MEDIA_NAME_PATTERNS.CROSS_EPISODE,
    ];

    for (const pattern of episodePatterns) {
      const match = name.match(pattern);
      if (match && match.index !== undefined) {
        return {
          index: match.index,
          length: match[0].length,
          season: parseInt(match[1], 10),
          episode: parseInt(match[2], 10),
        };
      }
    }

    for (const pattern of [MEDIA_NAME_PATTERNS.SEASON_ONLY, MEDIA_NAME_PATTERNS.SEASON_WORD]) {
      const match = name.match(pattern);
      if (match && match.index !== undefined) {
        return {
          index: match.index,
          length: match[0].length,
          season: parseInt(match[1], 10),
        };
      }
    }

    return undefined;
  }

  /**
   * "- Pilot [WEBDL-1080p]..." → "Pilot"; ".720p.HDTV.x264-GRP" → undefined
   */
  private extractEpisodeTitle(rest: string): string | undefined {
    let text = rest.replace(/^[\s.\-_]+/, '');

    const stops = [
      text.search(/[\[(]/),
      text.search(MEDIA_NAME_PATTERNS.QUALITY),
      text.search(MEDIA_NAME_PATTERNS.CODEC),
      text.search(MEDIA_NAME_PATTERNS.AUDIO),
      text.search(/-[A-Za-z0-9]+$/),
    ].filter((index) => index >= 0);

    if (stops.length > 0) {
      text = text.substring(0, Math.min(...stops));
    }

    const cleaned = this.cleanTitle(text);
    return cleaned || undefined;
  }

  private stripTechnicalTail(name: string): string {
    const stops = [
      name.search(MEDIA_NAME_PATTERNS.QUALITY),
      name.search(MEDIA_NAME_PATTERNS.CODEC),
      name.search(/[\[(]/),
    ].filter((index) => index > 0);
    return stops.length > 0 ? name.substring(0, Math.min(...stops)) : name;
  }

  private cleanTitle(raw: string): string {
    return raw
      .replace(MEDIA_NAME_PATTERNS.BRACKETS, ' ')
      .replace(MEDIA_NAME_PATTERNS.DOTS_UNDERSCORES, ' ')
      .replace(MEDIA_NAME_PATTERNS.MULTI_SPACES, ' ')
      .trim()
      .replace(/^-\s*/, '')
      .replace(/\s*-$/, '')
      .trim();
  }
}
