import fs from 'fs';

/**
 * Library roots, one per line. Blank lines and `#` comments are ignored.
 */
export function readLibraryRoots(librariesTxtPath: string): string[] {
  if (!fs.existsSync(librariesTxtPath)) {
    console.warn(`libraries.txt not found at: ${librariesTxtPath}`);
    return [];
  }

  const content = fs.readFileSync(librariesTxtPath, 'utf-8');
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}
