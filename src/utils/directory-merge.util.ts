import fs from 'fs';
import path from 'path';

export interface MergeSummary {
  moved: number;
  /** Destination paths that already existed, so the source entry stayed put. */
  skipped: string[];
  failed: string[];
}

function isSameOrAncestor(candidate: string, target: string): boolean {
  const relative = path.relative(path.resolve(candidate), path.resolve(target));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

function isEmptyDirectory(directory: string): boolean {
  return fs.readdirSync(directory).length === 0;
}

/**
 * Rename, falling back to copy + delete when source and destination sit on
 * different devices.
 */
function moveEntry(source: string, destination: string): void {
  try {
    fs.renameSync(source, destination);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
      fs.cpSync(source, destination, { recursive: true, errorOnExist: true, force: false });
      fs.rmSync(source, { recursive: true, force: true });
      return;
    }
    throw error;
  }
}

/**
 * Move everything in `source` into `destination`, merging into directories
 * that already exist there. Files already present at the destination are left
 * in the source. Directories are removed only once empty, children first.
 */
export function mergeDirectoryContents(source: string, destination: string): MergeSummary {
  const summary: MergeSummary = { moved: 0, skipped: [], failed: [] };

  fs.mkdirSync(destination, { recursive: true });

  for (const entry of fs.readdirSync(source, { withFileTypes: true })) {
    const sourcePath = path.join(source, entry.name);
    const destinationPath = path.join(destination, entry.name);

    // The destination may live inside the source (show already named canonically)
    if (isSameOrAncestor(sourcePath, destination)) {
      continue;
    }

    try {
      if (entry.isDirectory()) {
        if (fs.existsSync(destinationPath)) {
          const nested = mergeDirectoryContents(sourcePath, destinationPath);
          summary.moved += nested.moved;
          summary.skipped.push(...nested.skipped);
          summary.failed.push(...nested.failed);
        } else {
          moveEntry(sourcePath, destinationPath);
          summary.moved++;
        }
        continue;
      }

      if (fs.existsSync(destinationPath)) {
        console.warn(`  ⚠ File already exists, skipping: ${destinationPath}`);
        summary.skipped.push(destinationPath);
        continue;
      }

      moveEntry(sourcePath, destinationPath);
      summary.moved++;
    } catch (error) {
      console.error(`  ✗ Failed to move ${sourcePath}:`, error instanceof Error ? error.message : error);
      summary.failed.push(sourcePath);
    }
  }

  if (isEmptyDirectory(source)) {
    fs.rmdirSync(source);
    console.log(`  🗑️ Removed empty directory: ${source}`);
  }

  return summary;
}
