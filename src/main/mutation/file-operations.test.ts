import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { TaskFailure } from '../errors';
import { findRelatedFiles, moveBatch, moveWithRelated, removeIfEmpty, restoreBatch } from './file-operations';

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

describe('file operations', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'image-triage-fileops-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('findRelatedFiles', () => {
    it('returns non-image files sharing the name without extension', async () => {
      for (const name of ['shot1.jpg', 'shot1.xmp', 'shot1.png', 'shot10.jpg', 'other.jpg']) {
        await fs.writeFile(path.join(tempDir, name), name);
      }
      const related = await findRelatedFiles(path.join(tempDir, 'shot1.jpg'));
      expect(related).toEqual([path.join(tempDir, 'shot1.jpg'), path.join(tempDir, 'shot1.xmp')]);
    });
  });

  describe('moveWithRelated', () => {
    it('moves the image and its sidecar into a new folder', async () => {
      const image = path.join(tempDir, 'a.jpg');
      await fs.writeFile(image, 'pixels');
      await fs.writeFile(path.join(tempDir, 'a.xmp'), 'sidecar');
      const destination = path.join(tempDir, 'keep');

      const moved = await moveWithRelated(image, destination);

      expect(moved).toEqual([
        { from: image, to: path.join(destination, 'a.jpg') },
        { from: path.join(tempDir, 'a.xmp'), to: path.join(destination, 'a.xmp') },
      ]);
      expect(await fileExists(image)).toBe(false);
      expect(await fs.readFile(path.join(destination, 'a.xmp'), 'utf8')).toBe('sidecar');
    });

    it('fails with not-found when the image is gone', async () => {
      await expect(moveWithRelated(path.join(tempDir, 'gone.jpg'), path.join(tempDir, 'keep'))).rejects.toMatchObject({
        kind: 'not-found',
      });
    });

    it('refuses to overwrite and leaves every file in place', async () => {
      const image = path.join(tempDir, 'a.jpg');
      await fs.writeFile(image, 'new');
      await fs.writeFile(path.join(tempDir, 'a.xmp'), 'sidecar');
      const destination = path.join(tempDir, 'keep');
      await fs.mkdir(destination);
      await fs.writeFile(path.join(destination, 'a.xmp'), 'existing');

      await expect(moveWithRelated(image, destination)).rejects.toBeInstanceOf(TaskFailure);

      expect(await fs.readFile(image, 'utf8')).toBe('new');
      expect(await fs.readFile(path.join(tempDir, 'a.xmp'), 'utf8')).toBe('sidecar');
      expect(await fs.readFile(path.join(destination, 'a.xmp'), 'utf8')).toBe('existing');
      expect(await fileExists(path.join(destination, 'a.jpg'))).toBe(false);
    });
  });

  describe('moveBatch', () => {
    it('rolls back earlier moves when a later one fails', async () => {
      const first = path.join(tempDir, 'first.jpg');
      await fs.writeFile(first, 'one');
      const destination = path.join(tempDir, 'out');

      await expect(
        moveBatch([
          { from: first, to: path.join(destination, 'first.jpg') },
          { from: path.join(tempDir, 'missing.jpg'), to: path.join(destination, 'missing.jpg') },
        ])
      ).rejects.toMatchObject({ code: 'ENOENT' });

      expect(await fs.readFile(first, 'utf8')).toBe('one');
      expect(await fileExists(path.join(destination, 'first.jpg'))).toBe(false);
    });
  });

  describe('restoreBatch', () => {
    it('moves files back to where they came from', async () => {
      const image = path.join(tempDir, 'b.png');
      await fs.writeFile(image, 'b');
      const moved = await moveWithRelated(image, path.join(tempDir, 'deleted'));

      await restoreBatch(moved);

      expect(await fs.readFile(image, 'utf8')).toBe('b');
      expect(await fileExists(path.join(tempDir, 'deleted', 'b.png'))).toBe(false);
    });
  });

  describe('removeIfEmpty', () => {
    it('removes an empty folder', async () => {
      const dir = path.join(tempDir, 'empty');
      await fs.mkdir(dir);
      expect(await removeIfEmpty(dir)).toBe(true);
      expect(await fileExists(dir)).toBe(false);
    });

    it('keeps a folder that still has files', async () => {
      const dir = path.join(tempDir, 'full');
      await fs.mkdir(dir);
      await fs.writeFile(path.join(dir, 'x.jpg'), 'x');
      expect(await removeIfEmpty(dir)).toBe(false);
    });

    it('returns false for a missing folder', async () => {
      expect(await removeIfEmpty(path.join(tempDir, 'nope'))).toBe(false);
    });
  });
});
