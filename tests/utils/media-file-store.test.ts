import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MediaFileStore, formatBytes } from '@/lib/utils/media-file-store';
import { bytes, collect } from '../helpers/fakes';

const DAY = 24 * 60 * 60 * 1000;

describe('MediaFileStore', () => {
  let directory: string;
  let time: number;
  const now = () => time;

  const writeComplete = async (store: MediaFileStore, mediaId: string, length: number) => {
    await store.beginWrite(mediaId);
    await store.append(mediaId, bytes(length, 7));
    await store.markComplete(mediaId);
  };

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'media-store-'));
    time = 1000;
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('only treats a file as cached once it is marked complete', async () => {
    const store = new MediaFileStore(directory, { now });
    await store.init();

    await store.beginWrite('clip/1');
    await store.append('clip/1', bytes(6));
    expect(store.isComplete('clip/1')).toBe(false);
    await expect(collect(store.read('clip/1', () => 4))).rejects.toThrow('Media clip/1 is not cached');

    await store.append('clip/1', bytes(4));
    await store.markComplete('clip/1');

    expect(store.isComplete('clip/1')).toBe(true);
    expect(store.getStats()).toEqual({ size: 10, count: 1, complete: 1 });
    await expect(fs.stat(path.join(directory, 'clip%2F1.media'))).resolves.toMatchObject({ size: 10 });
  });

  it('reads back at whatever chunk size is current for each read', async () => {
    const store = new MediaFileStore(directory, { now });
    await writeComplete(store, 'a', 10);

    const fixed = await collect(store.read('a', () => 4));
    expect(fixed.map((chunk) => chunk.byteLength)).toEqual([4, 4, 2]);

    const sizes = [3, 7];
    const changing = await collect(store.read('a', () => sizes.shift() ?? 7));
    expect(changing.map((chunk) => chunk.byteLength)).toEqual([3, 7]);
    expect(changing.every((chunk) => chunk.every((byte) => byte === 7))).toBe(true);
  });

  it('reloads its index and drops files left unfinished by a previous run', async () => {
    const first = new MediaFileStore(directory, { now });
    await writeComplete(first, 'a', 5);
    await first.beginWrite('b');
    await first.append('b', bytes(5));
    await writeComplete(first, 'c', 5);

    const second = new MediaFileStore(directory, { now });
    await second.init();

    expect(second.keys().sort()).toEqual(['a', 'c']);
    expect(second.isComplete('a')).toBe(true);
    await expect(fs.stat(path.join(directory, 'b.media'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('expires files older than the expiry window', async () => {
    const first = new MediaFileStore(directory, { now, expiryMs: 7 * DAY });
    await writeComplete(first, 'a', 5);

    time += 7 * DAY + 1;
    expect(first.isComplete('a')).toBe(false);

    const second = new MediaFileStore(directory, { now, expiryMs: 7 * DAY });
    await second.init();
    expect(second.keys()).toEqual([]);
  });

  it('evicts least recently used complete files past the size cap', async () => {
    const store = new MediaFileStore(directory, { now, maxSize: 25 });

    time = 1;
    await writeComplete(store, 'a', 10);
    time = 2;
    await writeComplete(store, 'b', 10);
    time = 3;
    await collect(store.read('a', () => 64));
    time = 4;
    await writeComplete(store, 'c', 10);

    expect(store.keys().sort()).toEqual(['a', 'c']);
    expect(store.totalSize).toBe(20);
  });

  it('removes single files and clears everything', async () => {
    const store = new MediaFileStore(directory, { now });
    await writeComplete(store, 'a', 5);
    await writeComplete(store, 'b', 5);

    await store.remove('a');
    expect(store.keys()).toEqual(['b']);

    await store.clear();
    expect(store.getStats()).toEqual({ size: 0, count: 0, complete: 0 });
    await expect(fs.readdir(directory)).resolves.toEqual([]);
  });
});

describe('formatBytes', () => {
  it('picks a readable unit', () => {
    expect(formatBytes(512)).toBe('512B');
    expect(formatBytes(1536)).toBe('1.5KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0MB');
  });
});
