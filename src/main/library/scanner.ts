/**
 * Startup scan: walks the start directories and collects image identities.
 */

import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { AppConfig, ImageIdentity } from '../../shared/types';
import { isErrnoException } from '../errors';
import { describeError, log } from '../logging';
import { THUMBNAIL_FOLDER_NAME, excludedFolders } from '../mutation/sort-folders';
import { sortNatural } from './natural-sort';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.webp',
  '.bmp',
  '.tif',
  '.tiff',
  '.avif',
]);

export function isImageFile(file: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(file).toLowerCase());
}

/**
 * scanImages(config)
 *
 * CONTRACT:
 *   Inputs:
 *     - config.startDirs: folders to walk recursively
 *     - config.categories / config.sortDir: determine the sort folders to skip
 *
 *   Outputs:
 *     - absolute image paths in natural order, without duplicates
 *
 *   Invariants:
 *     - Category folders, the deleted folder and .thumbs folders are never entered
 *     - A missing start directory is logged and skipped
 *     - Unreadable subfolders are logged and skipped; the scan continues
 */
export async function scanImages(
  config: Pick<AppConfig, 'startDirs' | 'categories' | 'sortDir'>
): Promise<ImageIdentity[]> {
  const excluded = excludedFolders(config);
  const found = new Set<ImageIdentity>();

  const walk = async (dir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        log('warn', `Start directory not found: ${dir}`);
      } else {
        log('warn', `Skipping unreadable directory ${dir}: ${describeError(error)}`);
      }
      return;
    }

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (entry.name === THUMBNAIL_FOLDER_NAME || excluded.has(full)) {
          continue;
        }
        await walk(full);
      } else if (entry.isFile() && isImageFile(entry.name)) {
        found.add(full);
      }
    }
  };

  for (const dir of config.startDirs) {
    await walk(path.resolve(dir));
  }

  const identities = sortNatural(found);
  log('info', `Scanned ${config.startDirs.length} folder(s), found ${identities.length} image(s)`);
  return identities;
}
