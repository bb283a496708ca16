import fs from 'fs';
import path from 'path';
import {
  ConsolidateOptions,
  ConsolidationOperation,
  ConsolidationResult,
  ShowDirectory,
  ShowGroup,
} from '../types/consolidation.types';
import { IdentityLookup } from '../types/media.types';
import { mergeDirectoryContents } from '../utils/directory-merge.util';
import { SeasonResolver } from './season-resolver.service';
import { ShowDirectoryAnalyzer } from './show-directory-analyzer.service';
import { ShowGrouper } from './show-grouper.service';

export interface TVShowConsolidatorDeps {
  analyzer: ShowDirectoryAnalyzer;
  grouper: ShowGrouper;
  seasonResolver: SeasonResolver;
  identityLookup: IdentityLookup;
}

const INVALID_NAME_CHARS = /[<>:"/\\|?*]/g;
const SEASON_FOLDER = /^Season \d+$/i;

function hasSeasonFolders(directory: string): boolean {
  return fs.readdirSync(directory, { withFileTypes: true })
    .some((entry) => entry.isDirectory() && SEASON_FOLDER.test(entry.name));
}

export function seasonFolderName(season: number): string {
  return `Season ${String(season).padStart(2, '0')}`;
}

export function unifiedDirectoryName(group: Pick<ShowGroup, 'canonicalTitle' | 'year' | 'externalId'>): string {
  let name = group.canonicalTitle;
  if (group.year !== undefined) {
    name += ` (${group.year})`;
  }
  if (group.externalId) {
    name += ` [id-${group.externalId}]`;
  }
  return name.replace(INVALID_NAME_CHARS, '').replace(/\s+/g, ' ').trim();
}

/**
 * Finds show directories spread over a library root (one per season or year
 * pack) and merges each show into a single directory with season folders.
 */
export class TVShowConsolidator {
  private readonly analyzer: ShowDirectoryAnalyzer;
  private readonly grouper: ShowGrouper;
  private readonly seasonResolver: SeasonResolver;
  private readonly identityLookup: IdentityLookup;

  constructor(deps: TVShowConsolidatorDeps) {
    this.analyzer = deps.analyzer;
    this.grouper = deps.grouper;
    this.seasonResolver = deps.seasonResolver;
    this.identityLookup = deps.identityLookup;
  }

  async consolidate(root: string, options: ConsolidateOptions = { dryRun: false }): Promise<ConsolidationResult[]> {
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      console.error(`❌ Not a directory: ${root}`);
      return [];
    }

    console.log(`\n🗂️  Consolidating TV shows in: ${root}${options.dryRun ? ' (dry run)' : ''}`);

    const directories = this.discover(root);
    console.log(`🔍 Found ${directories.length} show directories`);

    const groups = this.grouper.group(directories);

    for (const group of groups) {
      await this.enhance(group);
    }

    const results: ConsolidationResult[] = [];
    for (const group of groups) {
      if (group.members.length < 2) {
        continue;
      }
      results.push(this.consolidateGroup(root, group, options));
    }

    console.log(`\n✅ Consolidated ${results.length} shows`);
    return results;
  }

  private discover(root: string): ShowDirectory[] {
    return fs.readdirSync(root, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort()
      .map((name) => this.analyzer.analyze(path.join(root, name)))
      .filter((directory): directory is ShowDirectory => directory !== null);
  }

  private async enhance(group: ShowGroup): Promise<void> {
    const [first] = group.members;
    if (!first) {
      return;
    }

    try {
      const match = await this.identityLookup.lookup(first.rawTitle, first.year, 'episode');
      if (!match) {
        console.log(`  ⚠ No identity found for "${group.canonicalTitle}", keeping discovered title`);
        return;
      }

      group.canonicalTitle = match.title;
      group.year = match.year ?? group.year;
      group.externalId = match.externalId;
      console.log(`  ✓ "${first.rawTitle}" → "${match.title}" [${match.provider} ${match.externalId}]`);
    } catch (error) {
      console.error(`  ✗ Identity lookup failed for "${group.canonicalTitle}":`, error instanceof Error ? error.message : error);
    }
  }

  private consolidateGroup(root: string, group: ShowGroup, options: ConsolidateOptions): ConsolidationResult {
    const unifiedDirectory = path.join(root, unifiedDirectoryName(group));
    console.log(`\n📺 ${group.canonicalTitle}: ${group.members.length} directories → ${unifiedDirectory}`);

    const operations = group.members.map((member) =>
      this.consolidateMember(member, group, unifiedDirectory, options)
    );

    return {
      showTitle: group.canonicalTitle,
      unifiedDirectory,
      externalId: group.externalId,
      operations,
    };
  }

  private consolidateMember(
    member: ShowDirectory,
    group: ShowGroup,
    unifiedDirectory: string,
    options: ConsolidateOptions
  ): ConsolidationOperation {
    if (path.resolve(member.path) === path.resolve(unifiedDirectory)) {
      console.log(`  ✓ ${path.basename(member.path)} is already the unified directory`);
      return { source: member.path, destination: unifiedDirectory, success: true };
    }

    // Already split into season folders: merge those in as they are
    if (hasSeasonFolders(member.path)) {
      return this.mergeMember(member, unifiedDirectory, undefined, options);
    }

    const season = this.seasonResolver.resolve(member, group);
    if (season === undefined) {
      console.warn(`  ⚠ Could not determine season for: ${member.path}`);
      return { source: member.path, success: false, error: 'Could not determine season' };
    }

    return this.mergeMember(member, path.join(unifiedDirectory, seasonFolderName(season)), season, options);
  }

  private mergeMember(
    member: ShowDirectory,
    destination: string,
    season: number | undefined,
    options: ConsolidateOptions
  ): ConsolidationOperation {
    if (options.dryRun) {
      console.log(`  DRY RUN: Would move ${member.path} → ${destination}`);
      return { source: member.path, destination, season, success: true };
    }

    try {
      const summary = mergeDirectoryContents(member.path, destination);
      if (summary.failed.length > 0) {
        return {
          source: member.path,
          season,
          success: false,
          error: `Failed to move ${summary.failed.length} entries`,
          skipped: summary.skipped,
        };
      }

      console.log(`  ✓ ${path.basename(member.path)} → ${path.relative(path.dirname(member.path), destination)}`);
      return {
        source: member.path,
        destination,
        season,
        success: true,
        ...(summary.skipped.length > 0 ? { skipped: summary.skipped } : {}),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`  ✗ Failed to consolidate ${member.path}:`, message);
      return { source: member.path, season, success: false, error: message };
    }
  }
}
