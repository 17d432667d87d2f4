import crypto from 'crypto';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { JobConflictError, ResultNotFoundError, ValidationError } from '../src/errors.js';
import { ImageStore, extensionFor, isImageRef } from '../src/storage/image-store.js';
import { FileResultStore, InMemoryResultStore, jobIdFromRef, resultRefFor } from '../src/storage/result-store.js';

describe('result references', () => {
  it('address artifacts by job id', () => {
    expect(resultRefFor('3f2a-17')).toBe('result://3f2a-17');
    expect(jobIdFromRef('result://3f2a-17')).toBe('3f2a-17');
  });

  it('refuse ids that could escape the store', () => {
    expect(() => resultRefFor('../etc/passwd')).toThrow(ValidationError);
    expect(() => jobIdFromRef('file:///etc/passwd')).toThrow(ResultNotFoundError);
    expect(() => jobIdFromRef('result://../x')).toThrow(ResultNotFoundError);
  });
});

describe('InMemoryResultStore', () => {
  it('stores bytes once and returns them by reference', async () => {
    const store = new InMemoryResultStore();

    const ref = await store.put('job-1', Buffer.from('{"label":"cat"}'));

    expect(ref).toBe('result://job-1');
    expect((await store.get(ref)).toString()).toBe('{"label":"cat"}');
    expect(await store.has(ref)).toBe(true);
    await expect(store.put('job-1', Buffer.from('other'))).rejects.toBeInstanceOf(JobConflictError);
    expect((await store.get(ref)).toString()).toBe('{"label":"cat"}');
  });

  it('reports missing results', async () => {
    const store = new InMemoryResultStore();

    expect(await store.has('result://job-2')).toBe(false);
    await expect(store.get('result://job-2')).rejects.toBeInstanceOf(ResultNotFoundError);
  });
});

describe('file-backed stores', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'model-dispatch-store-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  describe('FileResultStore', () => {
    it('writes each artifact exactly once', async () => {
      const store = new FileResultStore(path.join(directory, 'results'));

      const ref = await store.put('job-1', Buffer.from('first'));
      await expect(store.put('job-1', Buffer.from('second'))).rejects.toBeInstanceOf(JobConflictError);

      expect((await store.get(ref)).toString()).toBe('first');
      expect(await fs.readdir(path.join(directory, 'results'))).toEqual(['job-1.result']);
    });

    it('reports missing results', async () => {
      const store = new FileResultStore(path.join(directory, 'results'));

      expect(await store.has('result://job-9')).toBe(false);
      await expect(store.get('result://job-9')).rejects.toBeInstanceOf(ResultNotFoundError);
    });
  });

  describe('ImageStore', () => {
    it('stores an image under its md5 hash and deduplicates uploads', async () => {
      const store = new ImageStore(path.join(directory, 'images'));
      const bytes = Buffer.from('fake-png-bytes');
      const md5 = crypto.createHash('md5').update(bytes).digest('hex');

      const first = await store.put(bytes, '.png');
      const second = await store.put(bytes, '.png');

      expect(first).toEqual({ imageRef: `${md5}.png`, hashMd5: md5, created: true });
      expect(second.created).toBe(false);
      expect(await store.get(first.imageRef)).toEqual(bytes);
    });

    it('never reads outside its directory', async () => {
      const store = new ImageStore(path.join(directory, 'images'));

      expect(await store.get('../../etc/passwd')).toBeNull();
      expect(await store.get(`${'0'.repeat(32)}.png`)).toBeNull();
    });

    it('rejects empty uploads', async () => {
      const store = new ImageStore(path.join(directory, 'images'));

      await expect(store.put(Buffer.alloc(0), '.png')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});

describe('image helpers', () => {
  it('derive the extension from the file name or content type', () => {
    expect(extensionFor('image/jpeg')).toBe('.jpg');
    expect(extensionFor('application/octet-stream', 'photo.PNG')).toBe('.png');
    expect(extensionFor(undefined)).toBe('');
  });

  it('recognise image references', () => {
    expect(isImageRef(`${'a'.repeat(32)}.png`)).toBe(true);
    expect(isImageRef('cat.png')).toBe(false);
  });
});
