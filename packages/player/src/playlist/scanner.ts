/**
 * Recursive folder enumeration
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { isSupportedAudioFile } from './formats';

/**
 * Recursively find all supported audio files under a directory.
 * Entries are visited in name order so results are stable across runs.
 */
export async function findAudioFiles(dirPath: string): Promise<string[]> {
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && isSupportedAudioFile(entry.name)) {
        files.push(fullPath);
      }
    }
  }

  await walk(dirPath);
  return files;
}
