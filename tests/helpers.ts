import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import type { NotificationQueue, QueueMessage } from '../src/notifications';
import type { ObjectStore } from '../src/objectStore';
import type { EncodeRequest, EncodingService } from '../src/transcoder';

export const silentLogger = pino({ level: 'silent' });

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'transcode-test-'));
}

export async function makeTempFile(name: string, contents: string | Buffer): Promise<string> {
  const dir = await makeTempDir();
  const file = path.join(dir, name);
  await fs.writeFile(file, contents);
  return file;
}

// Shaped like an AWS SDK service exception
export function serviceError(name: string, status: number, message: string): Error {
  return Object.assign(new Error(message), { name, $fault: 'client', $metadata: { httpStatusCode: status } });
}

type StoredObject = { data: Buffer; contentType?: string };
type StoreCall = { op: 'put' | 'get' | 'delete'; bucket: string; key: string };

export class InMemoryObjectStore implements ObjectStore {
  readonly calls: StoreCall[] = [];
  // Local files written by getObject
  readonly downloads: string[] = [];
  private readonly buckets = new Map<string, Map<string, StoredObject>>();
  private readonly failures = new Map<string, unknown>();

  failOn(op: StoreCall['op'], bucket: string, error: unknown): void {
    this.failures.set(`${op}:${bucket}`, error);
  }

  seed(bucket: string, key: string, data: string | Buffer, contentType?: string): void {
    this.bucket(bucket).set(key, { data: Buffer.from(data), contentType });
  }

  has(bucket: string, key: string): boolean {
    return this.bucket(bucket).has(key);
  }

  callsFor(bucket: string): StoreCall[] {
    return this.calls.filter((call) => call.bucket === bucket);
  }

  async putObject(bucket: string, key: string, filePath: string): Promise<void> {
    this.record('put', bucket, key);
    const data = await fs.readFile(filePath);
    this.bucket(bucket).set(key, { data });
  }

  async getObject(bucket: string, key: string, destinationPath: string): Promise<{ contentType?: string }> {
    this.record('get', bucket, key);
    const object = this.bucket(bucket).get(key);
    if (!object) {
      throw serviceError('NoSuchKey', 404, 'The specified key does not exist.');
    }
    await fs.writeFile(destinationPath, object.data);
    this.downloads.push(destinationPath);
    return { contentType: object.contentType };
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    this.record('delete', bucket, key);
    this.bucket(bucket).delete(key);
  }

  private record(op: StoreCall['op'], bucket: string, key: string): void {
    this.calls.push({ op, bucket, key });
    const failure = this.failures.get(`${op}:${bucket}`);
    if (failure !== undefined) throw failure;
  }

  private bucket(name: string): Map<string, StoredObject> {
    let bucket = this.buckets.get(name);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(name, bucket);
    }
    return bucket;
  }
}

export function statusBody(jobId: string, state: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    Type: 'Notification',
    MessageId: `sns-${jobId}-${state}`,
    Message: JSON.stringify({ state, version: '2012-09-25', jobId, pipelineId: 'PL1', ...extra }),
  });
}

// Messages leave the queue when received; receive() parks until something is pushed or the signal aborts
export class InMemoryNotificationQueue implements NotificationQueue {
  readonly acknowledged: string[] = [];
  receiveCount = 0;
  closed = false;
  failNextReceives = 0;
  failAcknowledge = false;
  ackDelayMs = 0;

  private readonly messages: QueueMessage[] = [];
  private waiters: Array<() => void> = [];
  private seq = 0;

  constructor(private readonly maxPerReceive = 10) {}

  push(body: string): QueueMessage {
    this.seq += 1;
    const message = { id: `m-${this.seq}`, receiptHandle: `rh-${this.seq}`, body };
    this.messages.push(message);
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
    return message;
  }

  pushStatus(jobId: string, state: string, extra: Record<string, unknown> = {}): QueueMessage {
    return this.push(statusBody(jobId, state, extra));
  }

  async receive(signal: AbortSignal): Promise<QueueMessage[]> {
    this.receiveCount += 1;
    if (this.failNextReceives > 0) {
      this.failNextReceives -= 1;
      throw new Error('queue unavailable');
    }
    while (this.messages.length === 0) {
      if (signal.aborted) return [];
      await new Promise<void>((resolve) => {
        const wake = () => {
          signal.removeEventListener('abort', wake);
          resolve();
        };
        this.waiters.push(wake);
        signal.addEventListener('abort', wake, { once: true });
      });
    }
    return this.messages.splice(0, this.maxPerReceive);
  }

  async acknowledge(message: QueueMessage): Promise<void> {
    if (this.ackDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.ackDelayMs));
    }
    if (this.failAcknowledge) throw new Error('delete rejected');
    this.acknowledged.push(message.id);
  }

  close(): void {
    this.closed = true;
  }
}

export type FakeEncoderOptions = {
  jobId?: string;
  error?: unknown;
  // Runs before submitJob returns, like the remote pipeline starting work
  onSubmit?: (request: EncodeRequest) => void | Promise<void>;
};

export class FakeEncodingService implements EncodingService {
  readonly requests: EncodeRequest[] = [];

  constructor(private readonly options: FakeEncoderOptions = {}) {}

  async submitJob(request: EncodeRequest): Promise<string> {
    this.requests.push(request);
    if (this.options.error !== undefined) throw this.options.error;
    await this.options.onSubmit?.(request);
    return this.options.jobId ?? 'J1';
  }
}
