export type RemoteErrorOrigin = 'service' | 'client';

export type RemoteErrorDescription = {
  origin: RemoteErrorOrigin;
  code: string;
  status?: number;
  detail: string;
};

export class TranscodeError extends Error {
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranscodeError';
  }
}

export class ConfigError extends TranscodeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends TranscodeError {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super(message);
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

export type StorageOperation = 'upload' | 'download' | 'delete';

export class StorageError extends TranscodeError {
  override readonly retryable = true;
  readonly operation: StorageOperation;
  readonly bucket: string;
  readonly key: string;
  readonly origin: RemoteErrorOrigin;
  readonly detail: string;

  constructor(operation: StorageOperation, bucket: string, key: string, cause: unknown) {
    const remote = describeRemoteError(cause);
    super(`Failed to ${operation} s3://${bucket}/${key}: ${remote.detail}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
    this.bucket = bucket;
    this.key = key;
    this.origin = remote.origin;
    this.detail = remote.detail;
  }
}

export class UploadError extends StorageError {
  constructor(bucket: string, key: string, cause: unknown) {
    super('upload', bucket, key, cause);
    this.name = 'UploadError';
  }
}

export class DownloadError extends StorageError {
  constructor(bucket: string, key: string, cause: unknown) {
    super('download', bucket, key, cause);
    this.name = 'DownloadError';
  }
}

export class DeleteError extends StorageError {
  constructor(bucket: string, key: string, cause: unknown) {
    super('delete', bucket, key, cause);
    this.name = 'DeleteError';
  }
}

export class SubmissionError extends TranscodeError {
  override readonly retryable: boolean;
  readonly pipelineId: string;
  readonly inputKey: string;
  readonly origin: RemoteErrorOrigin;
  readonly detail: string;

  constructor(pipelineId: string, inputKey: string, cause: unknown) {
    const remote = describeRemoteError(cause);
    super(`Encoding service rejected job for ${inputKey} on pipeline ${pipelineId}: ${remote.detail}`, { cause });
    this.name = 'SubmissionError';
    this.pipelineId = pipelineId;
    this.inputKey = inputKey;
    this.origin = remote.origin;
    this.detail = remote.detail;
    this.retryable = remote.origin === 'client';
  }
}

// The encoding service itself reported the job as failed
export class RemoteJobError extends TranscodeError {
  readonly jobId: string;
  readonly inputKey: string;
  readonly detail?: string;

  constructor(jobId: string, inputKey: string, detail?: string) {
    super(`An error occurred while transcoding file ${inputKey} (job ${jobId})${detail ? `: ${detail}` : ''}`);
    this.name = 'RemoteJobError';
    this.jobId = jobId;
    this.inputKey = inputKey;
    this.detail = detail;
  }
}

export class WaitTimeoutError extends TranscodeError {
  override readonly retryable = true;
  readonly jobId: string;
  readonly timeoutMs: number;

  constructor(jobId: string, timeoutMs: number) {
    super(`No terminal notification for job ${jobId} within ${timeoutMs}ms`);
    this.name = 'WaitTimeoutError';
    this.jobId = jobId;
    this.timeoutMs = timeoutMs;
  }
}

export class CleanupError extends TranscodeError {
  readonly failures: DeleteError[];

  constructor(failures: DeleteError[]) {
    super(`Cleanup failed: ${failures.map((f) => f.message).join('; ')}`);
    this.name = 'CleanupError';
    this.failures = failures;
  }
}

export class NotificationFormatError extends TranscodeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotificationFormatError';
  }
}

export class ListenerStateError extends TranscodeError {
  constructor(message: string) {
    super(message);
    this.name = 'ListenerStateError';
  }
}

export class OrchestratorStateError extends TranscodeError {
  constructor(message: string) {
    super(message);
    this.name = 'OrchestratorStateError';
  }
}

export class CallbackError extends TranscodeError {
  readonly attempts: number;

  constructor(url: string, attempts: number, cause: unknown) {
    super(`Callback to ${url} failed after ${attempts} attempts`, { cause });
    this.name = 'CallbackError';
    this.attempts = attempts;
  }
}

function httpStatus(err: Error): number | undefined {
  if (!('$metadata' in err)) return undefined;
  const metadata = err.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) return undefined;
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

// AWS SDK exceptions carry $fault when the service answered; anything else is client side or network
export function describeRemoteError(err: unknown): RemoteErrorDescription {
  if (!(err instanceof Error)) {
    return { origin: 'client', code: 'Unknown', detail: String(err) };
  }
  const status = httpStatus(err);
  if ('$fault' in err) {
    const prefix = status !== undefined ? `${err.name} (HTTP ${status})` : err.name;
    return { origin: 'service', code: err.name, status, detail: `${prefix}: ${err.message}` };
  }
  return { origin: 'client', code: err.name, status, detail: `${err.name}: ${err.message}` };
}

export function isNotFoundError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === 'NoSuchKey' || err.name === 'NotFound' || httpStatus(err) === 404;
}
