import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DeleteError, DownloadError, UploadError, isNotFoundError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';

// Raw primitives against a key-addressed store
export interface ObjectStore {
  putObject(bucket: string, key: string, filePath: string): Promise<void>;
  getObject(bucket: string, key: string, destinationPath: string): Promise<{ contentType?: string }>;
  deleteObject(bucket: string, key: string): Promise<void>;
}

export type RetrievedObject = {
  path: string;
  filename: string;
  contentType?: string;
  size: number;
};

// Bucket-bound access used by the orchestrator. Failures come out as UploadError,
// DownloadError or DeleteError; nothing is retried here.
export class ObjectStoreGateway {
  constructor(
    private readonly store: ObjectStore,
    readonly bucket: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  async put(key: string, localFile: string): Promise<void> {
    try {
      await this.store.putObject(this.bucket, key, localFile);
    } catch (err) {
      throw new UploadError(this.bucket, key, err);
    }
    this.logger.debug({ bucket: this.bucket, key }, 'Object uploaded');
  }

  // Downloads into a fresh temp dir; the local file takes the display name, not the key
  async get(key: string, displayName: string): Promise<RetrievedObject> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'transcode-'));
    const target = path.join(dir, path.basename(displayName));
    try {
      const { contentType } = await this.store.getObject(this.bucket, key, target);
      const stats = await fs.stat(target);
      this.logger.debug({ bucket: this.bucket, key, size: stats.size }, 'Object downloaded');
      return { path: target, filename: displayName, contentType, size: stats.size };
    } catch (err) {
      await fs.rm(dir, { recursive: true, force: true });
      throw new DownloadError(this.bucket, key, err);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.store.deleteObject(this.bucket, key);
    } catch (err) {
      if (isNotFoundError(err)) {
        this.logger.debug({ bucket: this.bucket, key }, 'Object already absent');
        return;
      }
      throw new DeleteError(this.bucket, key, err);
    }
    this.logger.debug({ bucket: this.bucket, key }, 'Object deleted');
  }
}

export async function discardRetrievedObject(object: RetrievedObject): Promise<void> {
  await fs.rm(path.dirname(object.path), { recursive: true, force: true });
}
