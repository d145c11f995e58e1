/**
 * Filesystem moves for sorting, deleting and undoing.
 *
 * An image travels together with its related files (same name, any non-image
 * extension, e.g. a .xmp sidecar). A batch either moves completely or not at all.
 */

import fs from 'fs/promises';
import path from 'path';
import { MovedFile } from '../../shared/types';
import { TaskFailure, isErrnoException } from '../errors';
import { describeError, log } from '../logging';
import { compareNatural } from '../library/natural-sort';
import { isImageFile } from '../library/scanner';

function stem(file: string): string {
  return path.parse(file).name;
}

/**
 * Files in the same folder whose name without extension equals the image's,
 * the image itself included, in natural order. Other images sharing the name
 * (a.jpg next to a.png) are separate entries and never related.
 */
export async function findRelatedFiles(file: string): Promise<string[]> {
  const dir = path.dirname(file);
  const base = stem(file);
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .map((entry) => ({ entry, full: path.join(dir, entry.name) }))
    .filter(({ entry, full }) => entry.isFile() && stem(entry.name) === base && (full === file || !isImageFile(entry.name)))
    .map(({ full }) => full)
    .sort(compareNatural);
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.lstat(file);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Renames `from` to `to`, copying and unlinking when they sit on different devices.
 * Refuses to overwrite.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  if (await exists(to)) {
    throw new TaskFailure('filesystem', `Destination already exists: ${to}`);
  }
  try {
    await fs.rename(from, to);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EXDEV') {
      await fs.copyFile(from, to, fs.constants.COPYFILE_EXCL);
      await fs.unlink(from);
      return;
    }
    throw error;
  }
}

/**
 * moveBatch(moves)
 *
 * CONTRACT:
 *   Inputs:
 *     - moves: source/destination pairs, destinations' folders may not exist yet
 *
 *   Outputs:
 *     - the same pairs once every file has moved
 *
 *   Invariants:
 *     - All destinations are checked for conflicts before the first move
 *     - If any move fails, files already moved are moved back (in reverse order)
 *       and the original error is rethrown
 */
export async function moveBatch(moves: MovedFile[]): Promise<MovedFile[]> {
  for (const { to } of moves) {
    if (await exists(to)) {
      throw new TaskFailure('filesystem', `Destination already exists: ${to}`);
    }
  }

  const done: MovedFile[] = [];
  try {
    for (const move of moves) {
      await fs.mkdir(path.dirname(move.to), { recursive: true });
      await moveFile(move.from, move.to);
      done.push(move);
    }
  } catch (error) {
    for (const move of done.reverse()) {
      try {
        await moveFile(move.to, move.from);
      } catch (rollbackError) {
        log('error', `Failed to roll back ${move.to} -> ${move.from}: ${describeError(rollbackError)}`);
      }
    }
    throw error;
  }
  return moves;
}

/**
 * Moves an image and its related files into `destinationDir`.
 */
export async function moveWithRelated(file: string, destinationDir: string): Promise<MovedFile[]> {
  const related = await findRelatedFiles(file);
  if (!related.includes(file)) {
    throw new TaskFailure('not-found', `File not found: ${file}`);
  }
  return moveBatch(related.map((from) => ({ from, to: path.join(destinationDir, path.basename(from)) })));
}

/**
 * Reverses a recorded batch.
 */
export async function restoreBatch(moved: MovedFile[]): Promise<MovedFile[]> {
  return moveBatch(moved.map(({ from, to }) => ({ from: to, to: from })));
}

/**
 * Removes `dir` when it exists and is empty. Returns whether it was removed.
 */
export async function removeIfEmpty(dir: string): Promise<boolean> {
  try {
    const entries = await fs.readdir(dir);
    if (entries.length > 0) {
      return false;
    }
    await fs.rmdir(dir);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTEMPTY')) {
      return false;
    }
    throw error;
  }
}
