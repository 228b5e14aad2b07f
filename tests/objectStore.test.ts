import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { DeleteError, DownloadError, UploadError } from '../src/errors';
import { ObjectStoreGateway, discardRetrievedObject } from '../src/objectStore';
import { InMemoryObjectStore, makeTempFile, serviceError, silentLogger } from './helpers';

describe('ObjectStoreGateway', () => {
  it('uploads a local file under the given key', async () => {
    const store = new InMemoryObjectStore();
    const gateway = new ObjectStoreGateway(store, 'in', silentLogger);
    const file = await makeTempFile('clip.mp4', 'source');

    await gateway.put('abc-clip.mp4', file);

    expect(store.has('in', 'abc-clip.mp4')).toBe(true);
  });

  it('wraps upload failures', async () => {
    const store = new InMemoryObjectStore();
    store.failOn('put', 'in', serviceError('NoSuchBucket', 404, 'The specified bucket does not exist'));
    const gateway = new ObjectStoreGateway(store, 'in', silentLogger);

    const error = await gateway.put('abc-clip.mp4', '/does/not/matter').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({
      operation: 'upload',
      bucket: 'in',
      key: 'abc-clip.mp4',
      detail: 'NoSuchBucket (HTTP 404): The specified bucket does not exist',
    });
  });

  it('downloads into a temp file named after the display name', async () => {
    const store = new InMemoryObjectStore();
    store.seed('out', 'abc-clip.mp4', 'transcoded', 'video/mp4');
    const gateway = new ObjectStoreGateway(store, 'out', silentLogger);

    const object = await gateway.get('abc-clip.mp4', 'clip.mp4');

    expect(object.filename).toBe('clip.mp4');
    expect(path.basename(object.path)).toBe('clip.mp4');
    expect(object.contentType).toBe('video/mp4');
    expect(object.size).toBe(10);
    expect(await fs.readFile(object.path, 'utf8')).toBe('transcoded');

    await discardRetrievedObject(object);
    await expect(fs.access(path.dirname(object.path))).rejects.toThrow();
  });

  it('wraps download failures', async () => {
    const gateway = new ObjectStoreGateway(new InMemoryObjectStore(), 'out', silentLogger);

    const error = await gateway.get('missing.mp4', 'missing.mp4').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({ origin: 'service', detail: 'NoSuchKey (HTTP 404): The specified key does not exist.' });
  });

  it('treats deleting a missing object as done', async () => {
    const store = new InMemoryObjectStore();
    store.failOn('delete', 'in', serviceError('NoSuchKey', 404, 'The specified key does not exist.'));
    const gateway = new ObjectStoreGateway(store, 'in', silentLogger);

    await expect(gateway.delete('abc-clip.mp4')).resolves.toBeUndefined();
  });

  it('wraps other delete failures', async () => {
    const store = new InMemoryObjectStore();
    store.failOn('delete', 'in', new Error('socket hang up'));
    const gateway = new ObjectStoreGateway(store, 'in', silentLogger);

    const error = await gateway.delete('abc-clip.mp4').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DeleteError);
    expect(error).toMatchObject({ origin: 'client', detail: 'Error: socket hang up' });
  });
});
