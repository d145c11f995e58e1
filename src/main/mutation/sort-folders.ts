/**
 * Sort folder layout
 *
 * Every start directory sorts into `<sortDir ?? startDir>/<category>` and deletes
 * into `<sortDir ?? startDir>/deleted`.
 */

import path from 'path';
import { AppConfig, ImageIdentity } from '../../shared/types';

export const DELETED_FOLDER_NAME = 'deleted';
export const THUMBNAIL_FOLDER_NAME = '.thumbs';

export interface SortFolders {
  root: string;
  categories: ReadonlyMap<string, string>;
  deleted: string;
}

type FolderConfig = Pick<AppConfig, 'categories' | 'startDirs' | 'sortDir'>;

export function resolveSortFolders(root: string, categories: string[]): SortFolders {
  const resolvedRoot = path.resolve(root);
  return {
    root: resolvedRoot,
    categories: new Map(categories.map((category) => [category, path.join(resolvedRoot, category)])),
    deleted: path.join(resolvedRoot, DELETED_FOLDER_NAME),
  };
}

/**
 * Start directory that contains `identity` (the deepest one when they nest).
 */
export function findStartDir(identity: ImageIdentity, startDirs: string[]): string | undefined {
  let best: string | undefined;
  for (const dir of startDirs.map((candidate) => path.resolve(candidate))) {
    const relative = path.relative(dir, identity);
    const inside = relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
    if (inside && (!best || dir.length > best.length)) {
      best = dir;
    }
  }
  return best;
}

/**
 * sortFoldersFor(identity, config)
 *
 * CONTRACT:
 *   Outputs:
 *     - SortFolders rooted at config.sortDir when set, otherwise at the start
 *       directory holding the identity, otherwise at the identity's own folder
 */
export function sortFoldersFor(identity: ImageIdentity, config: FolderConfig): SortFolders {
  const root = config.sortDir ?? findStartDir(identity, config.startDirs) ?? path.dirname(identity);
  return resolveSortFolders(root, config.categories);
}

/**
 * Absolute paths the scanner must not descend into.
 */
export function excludedFolders(config: FolderConfig): Set<string> {
  const roots = config.sortDir ? [config.sortDir] : config.startDirs;
  const excluded = new Set<string>();
  for (const root of roots) {
    const folders = resolveSortFolders(root, config.categories);
    folders.categories.forEach((dir) => excluded.add(dir));
    excluded.add(folders.deleted);
  }
  return excluded;
}
