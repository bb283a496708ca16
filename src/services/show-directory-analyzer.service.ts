import fs from 'fs';
import path from 'path';
import { VIDEO_EXTENSIONS } from '../config/constants';
import { ShowDirectory } from '../types/consolidation.types';
import { FilenameGuesser } from '../types/media.types';
import { TitleNormalizer } from '../utils/title-normalizer.util';

const SEASON_PATTERNS: RegExp[] = [
  /season\s*(\d+)/i,
  // S01, s2; never the head of a longer number such as a year
  /\bS(\d{1,2})(?!\d)/i,
  /Season\s*(\d+)/,
  // Directory named just "2"
  /^\s*(\d{1,2})\s*$/,
];

const TITLE_NOISE_PATTERNS: RegExp[] = [
  /\b(?:19|20)\d{2}\b/g,
  /season\s*\d+/gi,
  /\bS\d+(?:E\d+)?/gi,
  /\b(?:2160p|1080p|720p|480p|4K|WEB-DL|WEBDL|WEBRip|WEB|BluRay|HDTV|DVD|h264|x264|h265|x265|HEVC)\b/gi,
  /-[A-Z0-9]+$/,
  /\bPack\b/gi,
];

export interface ShowDirectoryAnalyzerOptions {
  /** Extensions that make a directory a show candidate and feed season inference. */
  extensions?: string[];
}

/**
 * Turns one on-disk directory into a show-directory candidate: title, season
 * and year from its name, with a season inferred from the episode files it
 * holds when the name has none.
 */
export class ShowDirectoryAnalyzer {
  private readonly extensions: string[];

  constructor(
    private readonly guesser: FilenameGuesser,
    private readonly normalizer: TitleNormalizer,
    options: ShowDirectoryAnalyzerOptions = {}
  ) {
    this.extensions = (options.extensions ?? VIDEO_EXTENSIONS).map((ext) => ext.toLowerCase());
  }

  analyze(directory: string): ShowDirectory | null {
    const videoFiles = this.findVideoFiles(directory);
    if (videoFiles.length === 0) {
      return null;
    }

    const dirName = path.basename(directory);
    const rawTitle = this.extractShowTitle(dirName);
    const season = this.extractSeason(dirName) ?? this.inferSeasonFromFiles(videoFiles);

    const showDirectory: ShowDirectory = {
      path: directory,
      rawTitle,
      season,
      year: this.extractYear(dirName),
      normalizedTitle: this.normalizer.normalize(rawTitle),
      confidence: 0,
    };

    console.log(
      `  📂 ${dirName} → "${showDirectory.rawTitle}"` +
      `${showDirectory.season !== undefined ? ` season ${showDirectory.season}` : ''}` +
      `${showDirectory.year !== undefined ? ` (${showDirectory.year})` : ''}`
    );
    return showDirectory;
  }

  extractShowTitle(dirName: string): string {
    let cleaned = dirName;
    for (const pattern of TITLE_NOISE_PATTERNS) {
      cleaned = cleaned.replace(pattern, '');
    }

    cleaned = cleaned
      .replace(/[.\-_]+/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();

    return cleaned || dirName;
  }

  extractSeason(dirName: string): number | undefined {
    for (const pattern of SEASON_PATTERNS) {
      const match = dirName.match(pattern);
      if (match) {
        const season = parseInt(match[1], 10);
        if (season >= 1) {
          return season;
        }
      }
    }
    return undefined;
  }

  extractYear(dirName: string): number | undefined {
    for (const match of dirName.matchAll(/(?<!\d)(\d{4})(?!\d)/g)) {
      const year = parseInt(match[1], 10);
      if (year >= 1980 && year <= 2030) {
        return year;
      }
    }
    return undefined;
  }

  /**
   * A season is adopted only when every file that names one names the same.
   */
  private inferSeasonFromFiles(files: string[]): number | undefined {
    const seasons = new Set<number>();

    for (const file of files) {
      const guess = this.guesser.guess(path.basename(file));
      if (guess.season !== undefined && guess.season >= 1) {
        seasons.add(guess.season);
      }
    }

    if (seasons.size === 1) {
      const [season] = seasons;
      return season;
    }
    return undefined;
  }

  private findVideoFiles(directory: string): string[] {
    const found: string[] = [];

    const walk = (current: string): void => {
      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(current, { withFileTypes: true });
      } catch (error) {
        console.error(`  Error scanning ${current}:`, error instanceof Error ? error.message : error);
        return;
      }

      for (const entry of entries) {
        const fullPath = path.join(current, entry.name);
        if (entry.isDirectory()) {
          walk(fullPath);
        } else if (entry.isFile() && this.extensions.includes(path.extname(entry.name).toLowerCase())) {
          found.push(fullPath);
        }
      }
    };

    walk(directory);
    return found;
  }
}
