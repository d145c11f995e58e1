import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ImageMetadata } from '../../shared/image-cache-types';
import { METADATA_FILE_NAME, MetadataStore, MetadataStoreError } from './metadata-store';

const SAMPLE: ImageMetadata = {
  identity: '/photos/a.jpg',
  width: 640,
  height: 480,
  byteSize: 12345,
  format: 'jpeg',
  modifiedAt: 1700000000000,
};

describe('MetadataStore', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'image-triage-meta-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('returns stored metadata while the fingerprint matches', async () => {
    const store = await MetadataStore.open(tempDir);
    store.put(SAMPLE);
    expect(store.get(SAMPLE.identity, { byteSize: 12345, modifiedAt: 1700000000000 })).toEqual(SAMPLE);
    store.close();
  });

  it('drops a row whose file changed on disk', async () => {
    const store = await MetadataStore.open(tempDir);
    store.put(SAMPLE);
    expect(store.get(SAMPLE.identity, { byteSize: 12345, modifiedAt: 1700000000001 })).toBeUndefined();
    expect(store.count()).toBe(0);
    store.close();
  });

  it('returns undefined for unknown identities', async () => {
    const store = await MetadataStore.open(tempDir);
    expect(store.get('/photos/unknown.jpg', { byteSize: 1, modifiedAt: 1 })).toBeUndefined();
    store.close();
  });

  it('replaces an existing row on put', async () => {
    const store = await MetadataStore.open(tempDir);
    store.put(SAMPLE);
    store.put({ ...SAMPLE, width: 800 });
    expect(store.count()).toBe(1);
    expect(store.get(SAMPLE.identity, { byteSize: 12345, modifiedAt: 1700000000000 })?.width).toBe(800);
    store.close();
  });

  it('persists rows across reopen', async () => {
    const first = await MetadataStore.open(tempDir);
    first.put(SAMPLE);
    first.close();

    const second = await MetadataStore.open(tempDir);
    expect(second.get(SAMPLE.identity, { byteSize: 12345, modifiedAt: 1700000000000 })).toEqual(SAMPLE);
    second.close();
  });

  it('only writes the file when something changed', async () => {
    const store = await MetadataStore.open(tempDir);
    expect(store.flush()).toBe(false);
    store.put(SAMPLE);
    expect(store.flush()).toBe(true);
    expect(store.flush()).toBe(false);
    store.close();
  });

  it('starts empty when the file is corrupt', async () => {
    await fs.writeFile(path.join(tempDir, METADATA_FILE_NAME), 'x'.repeat(1024));
    const store = await MetadataStore.open(tempDir);
    expect(store.count()).toBe(0);
    store.close();
  });

  it('throws after close', async () => {
    const store = await MetadataStore.open(tempDir);
    store.close();
    expect(() => store.put(SAMPLE)).toThrow(MetadataStoreError);
    expect(() => store.close()).not.toThrow();
  });
});
