import fs from 'fs';
import path from 'path';
import { IdentityLookup, MediaInfo, RenameResult } from '../types/media.types';
import { MetadataExtractorService } from './metadata-extractor.service';
import { QualityClassifier } from './quality-classifier.service';

export interface FileRenamerOptions {
  moviePattern: string;
  tvPattern: string;
  extensions: string[];
}

type TemplateValues = Record<string, string | number | undefined>;

const PLACEHOLDER = /\{(\w+)(?::0(\d)d)?\}/g;

export function sanitizeFileName(name: string): string {
  return name
    .replace(/[<>:"/\\|?*]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Fills `{field}` and `{field:02d}` placeholders. Empty brackets and dangling
 * separators left by absent values are dropped.
 */
export function renderPattern(pattern: string, values: TemplateValues): string {
  const rendered = pattern.replace(PLACEHOLDER, (_match, key: string, width?: string) => {
    const value = values[key];
    if (value === undefined || value === '') {
      return '';
    }
    if (width && typeof value === 'number') {
      return String(value).padStart(parseInt(width, 10), '0');
    }
    return String(value);
  });

  return rendered
    .replace(/\(\s*\)|\[\s*\]/g, '')
    .replace(/[\s-]+$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export class FileRenamerService {
  constructor(
    private readonly extractor: MetadataExtractorService,
    private readonly identityLookup: IdentityLookup,
    private readonly classifier: QualityClassifier,
    private readonly options: FileRenamerOptions
  ) {}

  generateFileName(info: MediaInfo): string | null {
    if (info.kind === 'unknown') {
      return null;
    }

    const pattern = info.kind === 'movie' ? this.options.moviePattern : this.options.tvPattern;
    const name = renderPattern(pattern, {
      title: sanitizeFileName(info.title),
      year: info.year,
      season: info.kind === 'episode' ? info.season ?? 1 : undefined,
      episode: info.kind === 'episode' ? info.episode ?? 1 : undefined,
      episode_title: sanitizeFileName(info.episodeTitle ?? ''),
      quality: this.classifier.format(info.quality),
    });

    const sanitized = sanitizeFileName(name);
    return sanitized ? `${sanitized}${info.extension}` : null;
  }

  renameFile(oldPath: string, newFileName: string, dryRun = false): RenameResult {
    const newPath = path.join(path.dirname(oldPath), newFileName);

    if (newPath === oldPath) {
      return { originalPath: oldPath, newPath, success: true };
    }

    if (dryRun) {
      console.log(`  DRY RUN: Would rename ${oldPath} → ${newPath}`);
      return { originalPath: oldPath, newPath, success: true };
    }

    try {
      if (fs.existsSync(newPath)) {
        return {
          originalPath: oldPath,
          newPath,
          success: false,
          error: `File already exists: ${newPath}`,
        };
      }

      fs.renameSync(oldPath, newPath);
      console.log(`  ✓ Renamed: ${path.basename(oldPath)} → ${newFileName}`);
      return { originalPath: oldPath, newPath, success: true };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      console.error(`  ✗ Failed to rename file: ${oldPath}`, errorMessage);
      return { originalPath: oldPath, newPath: oldPath, success: false, error: errorMessage };
    }
  }

  async processDirectory(directory: string, dryRun = false): Promise<RenameResult[]> {
    if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
      console.error(`❌ Not a directory: ${directory}`);
      return [];
    }

    console.log(`\n✏️  Renaming media in: ${directory}${dryRun ? ' (dry run)' : ''}`);

    const results: RenameResult[] = [];
    for (const filePath of this.findMediaFiles(directory)) {
      const info = await this.enhance(await this.extractor.extract(filePath));

      const newFileName = this.generateFileName(info);
      if (!newFileName) {
        console.warn(`  ⚠ Could not generate filename for: ${filePath}`);
        results.push({ originalPath: filePath, newPath: filePath, success: false, error: 'Could not generate filename' });
        continue;
      }

      results.push(this.renameFile(filePath, newFileName, dryRun));
    }

    const renamed = results.filter((result) => result.success).length;
    console.log(`✅ ${renamed}/${results.length} files processed successfully`);
    return results;
  }

  private async enhance(info: MediaInfo): Promise<MediaInfo> {
    const match = await this.identityLookup.lookup(info.title, info.year, info.kind);
    if (!match) {
      return info;
    }
    let episodeTitle = info.episodeTitle;
    if (info.kind === 'episode' && !episodeTitle && info.season !== undefined && info.episode !== undefined) {
      episodeTitle = (await this.identityLookup.episodeTitle(match, info.season, info.episode)) ?? undefined;
    }

    return {
      ...info,
      title: match.title,
      year: match.year ?? info.year,
      externalId: match.externalId,
      episodeTitle,
    };
  }

  private findMediaFiles(directory: string): string[] {
    const files: string[] = [];
    const entries = fs.readdirSync(directory, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...this.findMediaFiles(fullPath));
      } else if (entry.isFile() && this.options.extensions.includes(path.extname(entry.name).toLowerCase())) {
        files.push(fullPath);
      }
    }

    return files;
  }
}
