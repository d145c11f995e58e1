/**
 * Tests for the File Mutation Engine
 *
 * Tests verify:
 * - Delete and move take the image (and sidecars) out of the list and the cache
 * - Undo restores files, position and current entry
 * - Failures leave index, cache and undo stack untouched
 * - Mutations of one identity are serialised
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { EngineEvent, EventHub } from '../events';
import { CacheStore } from '../image-cache/cache-store';
import { ImageIndex } from '../library/image-index';
import { TaskScheduler } from '../scheduler/task-scheduler';
import { FileMutationEngine } from './file-mutation-engine';
import { UndoStack } from './undo-stack';

async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

describe('FileMutationEngine', () => {
  let tempDir: string;
  let scheduler: TaskScheduler;
  let index: ImageIndex;
  let cache: CacheStore;
  let engine: FileMutationEngine;
  let seen: EngineEvent[];
  let files: Record<'a' | 'b' | 'c' | 'd' | 'e', string>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'image-triage-mutation-'));
    files = {
      a: path.join(tempDir, 'a.jpg'),
      b: path.join(tempDir, 'b.jpg'),
      c: path.join(tempDir, 'c.jpg'),
      d: path.join(tempDir, 'd.jpg'),
      e: path.join(tempDir, 'e.jpg'),
    };
    for (const file of Object.values(files)) {
      await fs.writeFile(file, path.basename(file));
    }

    const events = new EventHub();
    seen = [];
    events.on((event) => seen.push(event));
    scheduler = new TaskScheduler({ workerCount: 2 });
    index = new ImageIndex(Object.values(files));
    cache = new CacheStore({ budget: { maxEntries: 10, maxBytes: 1000 } });
    engine = new FileMutationEngine({
      index,
      cache,
      scheduler,
      undoStack: new UndoStack(10),
      events,
      folders: { categories: ['keep', 'maybe'], startDirs: [tempDir] },
      clock: () => 42,
    });
  });

  afterEach(async () => {
    await scheduler.shutdown();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('deletes the current entry and undo restores it', async () => {
    index.setCurrent(files.c);

    const deleted = await engine.delete(files.c);

    expect(deleted.ok).toBe(true);
    expect(index.toArray()).toEqual([files.a, files.b, files.d, files.e]);
    expect(index.current()).toBe(files.d);
    expect(await fileExists(path.join(tempDir, 'deleted', 'c.jpg'))).toBe(true);
    expect(await fileExists(files.c)).toBe(false);

    const undone = await engine.undo();

    expect(undone.ok).toBe(true);
    expect(index.toArray()).toEqual([files.a, files.b, files.c, files.d, files.e]);
    expect(index.current()).toBe(files.c);
    expect(await fs.readFile(files.c, 'utf8')).toBe('c.jpg');
    expect(await fileExists(path.join(tempDir, 'deleted'))).toBe(false);
  });

  it('records what it did', async () => {
    const result = await engine.move(files.b, 'keep');

    expect(result).toEqual({
      ok: true,
      record: {
        identity: files.b,
        action: 'move',
        category: 'keep',
        originalDirectory: tempDir,
        destinationDirectory: path.join(tempDir, 'keep'),
        movedFiles: [{ from: files.b, to: path.join(tempDir, 'keep', 'b.jpg') }],
        timestamp: 42,
      },
    });
    expect(engine.undoDepth).toBe(1);
    expect(seen).toEqual([{ type: 'mutation', action: 'move', identity: files.b, ok: true }]);
  });

  it('moves sidecars with the image and brings them back on undo', async () => {
    const sidecar = path.join(tempDir, 'b.xmp');
    await fs.writeFile(sidecar, 'meta');

    await engine.move(files.b, 'maybe');
    expect(await fileExists(path.join(tempDir, 'maybe', 'b.xmp'))).toBe(true);

    await engine.undo();
    expect(await fs.readFile(sidecar, 'utf8')).toBe('meta');
  });

  it('invalidates the cache entry of a moved image', async () => {
    cache.put(files.a, { data: Buffer.alloc(4), width: 2, height: 2, channels: 1 }, {
      identity: files.a,
      width: 2,
      height: 2,
      byteSize: 4,
      format: 'png',
      modifiedAt: 0,
    });

    await engine.delete(files.a);

    expect(cache.contains(files.a)).toBe(false);
  });

  it('leaves another image with the same name where it is', async () => {
    const png = path.join(tempDir, 'a.png');
    await fs.writeFile(png, 'other pixels');
    index.insertSorted(png);

    const result = await engine.delete(files.a);

    expect(result).toMatchObject({
      ok: true,
      record: { movedFiles: [{ from: files.a, to: path.join(tempDir, 'deleted', 'a.jpg') }] },
    });
    expect(await fs.readFile(png, 'utf8')).toBe('other pixels');
    expect(index.toArray()).toEqual([png, files.b, files.c, files.d, files.e]);
    expect(await fs.readdir(path.join(tempDir, 'deleted'))).toEqual(['a.jpg']);
  });

  it('drops an image whose file vanished before the move', async () => {
    cache.put(files.a, { data: Buffer.alloc(4), width: 2, height: 2, channels: 1 }, {
      identity: files.a,
      width: 2,
      height: 2,
      byteSize: 4,
      format: 'png',
      modifiedAt: 0,
    });
    await fs.unlink(files.a);

    const result = await engine.move(files.a, 'keep');

    expect(result).toMatchObject({ ok: false, error: { kind: 'not-found', identity: files.a } });
    expect(index.has(files.a)).toBe(false);
    expect(cache.contains(files.a)).toBe(false);
    expect(engine.undoDepth).toBe(0);
    expect(await fileExists(path.join(tempDir, 'keep'))).toBe(false);
    expect(seen).toEqual([{ type: 'mutation', action: 'move', identity: files.a, ok: false, error: expect.objectContaining({ kind: 'not-found' }) }]);
  });

  it('rejects an unknown category without touching anything', async () => {
    const result = await engine.move(files.a, 'nope');

    expect(result).toMatchObject({ ok: false, error: { kind: 'invalid-request' } });
    expect(index.size).toBe(5);
    expect(engine.undoDepth).toBe(0);
  });

  it('reports a filesystem error and changes nothing when the destination is taken', async () => {
    await fs.mkdir(path.join(tempDir, 'keep'));
    await fs.writeFile(path.join(tempDir, 'keep', 'a.jpg'), 'older');

    const result = await engine.move(files.a, 'keep');

    expect(result).toMatchObject({ ok: false, error: { kind: 'filesystem', identity: files.a } });
    expect(index.has(files.a)).toBe(true);
    expect(engine.undoDepth).toBe(0);
    expect(await fs.readFile(files.a, 'utf8')).toBe('a.jpg');
  });

  it('serialises mutations of the same identity', async () => {
    const [first, second] = await Promise.all([engine.delete(files.c), engine.delete(files.c)]);

    expect(first.ok).toBe(true);
    expect(second).toMatchObject({ ok: false, error: { kind: 'invalid-request' } });
    expect(engine.undoDepth).toBe(1);
  });

  it('waits for pending mutations before undoing', async () => {
    const pending = engine.delete(files.e);

    const undone = await engine.undo();

    expect((await pending).ok).toBe(true);
    expect(undone).toMatchObject({ ok: true, record: { identity: files.e } });
    expect(index.has(files.e)).toBe(true);
  });

  it('reports empty-undo when there is nothing to undo', async () => {
    const result = await engine.undo();

    expect(result).toMatchObject({ ok: false, error: { kind: 'empty-undo' } });
    expect(seen).toEqual([{ type: 'undo', identity: null, ok: false, error: expect.objectContaining({ kind: 'empty-undo' }) }]);
  });

  it('keeps the record when undo cannot move the files back', async () => {
    await engine.delete(files.d);
    await fs.writeFile(files.d, 'replacement');

    const result = await engine.undo();

    expect(result).toMatchObject({ ok: false, error: { kind: 'filesystem' } });
    expect(engine.undoDepth).toBe(1);
    expect(index.has(files.d)).toBe(false);
  });

  it('undoes in reverse order', async () => {
    await engine.delete(files.a);
    await engine.move(files.b, 'keep');

    const first = await engine.undo();
    const second = await engine.undo();

    expect(first).toMatchObject({ ok: true, record: { identity: files.b } });
    expect(second).toMatchObject({ ok: true, record: { identity: files.a } });
    expect(index.toArray()).toEqual(Object.values(files));
  });
});
