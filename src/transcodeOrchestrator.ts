import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { z } from 'zod';
import {
  CleanupError,
  DeleteError,
  OrchestratorStateError,
  RemoteJobError,
  SubmissionError,
  ValidationError,
  WaitTimeoutError,
} from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { NotificationListener, type NotificationListenerOptions } from './notificationListener';
import type { JobState, NotificationEvent, NotificationQueue } from './notifications';
import { ObjectStoreGateway, discardRetrievedObject, type ObjectStore, type RetrievedObject } from './objectStore';
import { advance, canDeleteInput, canDeleteOutput, isIdle, reset, type TranscodeStep } from './steps';
import type { EncodingService } from './transcoder';

export type SourceFile = {
  path: string;
  // Defaults to the basename of path
  filename?: string;
};

export type TranscodeOptions = {
  presetId: string;
  inputBucket: string;
  outputBucket: string;
  pipelineId: string;
  queueUrl: string;
  deleteInputOnCleanup?: boolean;
  deleteOutputOnCleanup?: boolean;
  // Absent or 0: wait for the terminal notification forever
  waitTimeoutMs?: number;
  // Raise CleanupError when a deletion fails after an otherwise successful run
  strictCleanup?: boolean;
};

export type TranscodeDependencies = {
  objectStore: ObjectStore;
  encoder: EncodingService;
  createNotificationQueue: (queueUrl: string) => NotificationQueue;
  listenerOptions?: Omit<NotificationListenerOptions, 'logger'>;
  logger?: Logger;
};

export type TerminalState = Extract<JobState, 'succeeded' | 'error'>;

// Terminal events seen before the remote job id is known
const MAX_EARLY_EVENTS = 100;

// Blank means whitespace only; the value itself is passed on untouched
const required = (field: string) =>
  z.string({ required_error: `${field} is missing`, invalid_type_error: `${field} must be a string` })
    .refine((value) => value.trim().length > 0, `${field} is blank`);

const parametersSchema = z.object({
  path: required('path'),
  filename: required('filename'),
  presetId: required('presetId'),
  inputBucket: required('inputBucket'),
  outputBucket: required('outputBucket'),
  pipelineId: required('pipelineId'),
  queueUrl: required('queueUrl'),
  waitTimeoutMs: z.number().int().nonnegative().optional(),
});

type Parameters = z.infer<typeof parametersSchema>;

function validate(source: SourceFile, options: TranscodeOptions): Parameters {
  const parsed = parametersSchema.safeParse({
    ...options,
    path: source.path,
    filename: source.filename ?? (typeof source.path === 'string' ? path.basename(source.path) : undefined),
  });
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    const messages = parsed.error.issues.map((issue) => issue.message);
    throw new ValidationError(`Invalid transcode parameters: ${messages.join('; ')}`, fields);
  }
  return parsed.data;
}

type Correlation = {
  completion: Promise<NotificationEvent>;
  bind: (jobId: string) => void;
  // Ignore anything delivered from now on
  abandon: () => void;
};

/**
 * Runs one file through the remote encoder: upload, submit, wait for the job's terminal
 * notification, download, then delete what was created remotely. The step reached
 * decides what cleanup may delete, so an object that was never created is never
 * touched.
 *
 * Each run starts its own NotificationListener on the shared queue and stops it once
 * the wait is over.
 */
export class TranscodeJobOrchestrator {
  readonly inputKey: string;
  readonly outputKey: string;

  private readonly params: Parameters;
  private readonly prefix: string;
  private readonly inputStore: ObjectStoreGateway;
  private readonly outputStore: ObjectStoreGateway;
  private readonly logger: Logger;
  private readonly strictCleanup: boolean;

  private deleteInputOnCleanup: boolean;
  private deleteOutputOnCleanup: boolean;
  private currentStep: TranscodeStep = 'init';
  private inFlight = false;
  private remoteJobId: string | undefined;
  private terminal: TerminalState | undefined;
  private transcoded: RetrievedObject | undefined;

  constructor(source: SourceFile, options: TranscodeOptions, private readonly deps: TranscodeDependencies) {
    this.params = validate(source, options);
    this.deleteInputOnCleanup = options.deleteInputOnCleanup ?? true;
    this.deleteOutputOnCleanup = options.deleteOutputOnCleanup ?? true;
    this.strictCleanup = options.strictCleanup ?? false;

    // Output keys must be unique: the encoder fails a job whose output key already exists
    this.prefix = `${randomUUID().replace(/-/g, '')}-`;
    this.inputKey = `${this.prefix}${this.params.filename}`;
    this.outputKey = `${this.prefix}${this.params.filename}`;

    this.logger = (deps.logger ?? defaultLogger).child({ inputKey: this.inputKey });
    this.inputStore = new ObjectStoreGateway(deps.objectStore, this.params.inputBucket, this.logger);
    this.outputStore = new ObjectStoreGateway(deps.objectStore, this.params.outputBucket, this.logger);
  }

  get step(): TranscodeStep {
    return this.currentStep;
  }

  get jobId(): string | undefined {
    return this.remoteJobId;
  }

  get terminalState(): TerminalState | undefined {
    return this.terminal;
  }

  get outputFileName(): string {
    return this.outputKey.slice(this.prefix.length);
  }

  // False while a transcode() call is running, cleanup included
  done(): boolean {
    return !this.inFlight && isIdle(this.currentStep);
  }

  getTranscodedBlob(): RetrievedObject | undefined {
    return this.transcoded;
  }

  setDeleteInputOnCleanup(value: boolean): void {
    this.assertIdle('change cleanup settings');
    this.deleteInputOnCleanup = value;
  }

  setDeleteOutputOnCleanup(value: boolean): void {
    this.assertIdle('change cleanup settings');
    this.deleteOutputOnCleanup = value;
  }

  async transcode(): Promise<RetrievedObject> {
    this.assertIdle('start another transcode');
    this.inFlight = true;
    this.remoteJobId = undefined;
    this.terminal = undefined;
    this.transcoded = undefined;

    const startedAt = Date.now();
    let failure: unknown;
    let failed = false;
    try {
      await this.run();
    } catch (err) {
      failed = true;
      failure = err;
    }

    const cleanupFailures = await this.cleanup();
    this.inFlight = false;

    if (failed) {
      this.logger.error({ err: failure, jobId: this.remoteJobId }, 'Transcode failed');
      throw failure;
    }
    if (cleanupFailures.length > 0 && this.strictCleanup) {
      // The run is reported as failed, so nobody will pick up the downloaded file
      if (this.transcoded) {
        await discardRetrievedObject(this.transcoded);
        this.transcoded = undefined;
      }
      throw new CleanupError(cleanupFailures);
    }

    const output = this.transcoded;
    if (!output) {
      throw new OrchestratorStateError(`Transcode of ${this.inputKey} finished without an output file`);
    }
    this.logger.info({ jobId: this.remoteJobId, durationMs: Date.now() - startedAt, size: output.size }, 'Transcode completed');
    return output;
  }

  private async run(): Promise<void> {
    // From here on the input exists remotely and cleanup may delete it
    await this.inputStore.put(this.inputKey, this.params.path);
    this.moveTo('input-sent');

    // One listener per run, stopped as soon as the wait ends
    const queue = this.deps.createNotificationQueue(this.params.queueUrl);
    const listener = new NotificationListener(queue, { ...this.deps.listenerOptions, logger: this.logger });
    listener.start();

    const event = await this.submitAndWait(listener);
    // Terminal either way: the output key may now exist
    this.moveTo('transcoding-done');

    if (event.state === 'error') {
      throw new RemoteJobError(event.jobId, this.inputKey, event.detail);
    }

    this.transcoded = await this.outputStore.get(this.outputKey, this.outputFileName);
    this.moveTo('output-downloaded');
  }

  private async submitAndWait(listener: NotificationListener): Promise<NotificationEvent> {
    try {
      // Registered before submitting so a fast terminal event cannot slip past
      const correlation = this.correlate(listener);
      const jobId = await this.submit();
      this.remoteJobId = jobId;
      this.logger.info({ jobId }, 'Waiting for job to complete');
      correlation.bind(jobId);
      return await this.waitFor(correlation, jobId);
    } finally {
      await listener.stop();
    }
  }

  private async submit(): Promise<string> {
    try {
      return await this.deps.encoder.submitJob({
        pipelineId: this.params.pipelineId,
        inputKey: this.inputKey,
        outputKey: this.outputKey,
        presetId: this.params.presetId,
      });
    } catch (err) {
      throw new SubmissionError(this.params.pipelineId, this.inputKey, err);
    }
  }

  private correlate(listener: NotificationListener): Correlation {
    const early = new Map<string, NotificationEvent>();
    let jobId: string | undefined;
    let settled = false;
    let settle: (event: NotificationEvent) => void = () => undefined;
    const completion = new Promise<NotificationEvent>((resolve) => {
      settle = resolve;
    });

    const deliver = (event: NotificationEvent) => {
      if (settled) return;
      settled = true;
      this.terminal = event.state === 'error' ? 'error' : 'succeeded';
      if (this.terminal === 'error') {
        this.logger.error({ jobId: event.jobId, detail: event.detail }, 'Encoding service reported job error');
      }
      settle(event);
    };

    listener.addHandler(
      (id) => jobId === undefined || id === jobId,
      (event) => {
        if (!event.terminal) {
          if (event.state === 'warning') {
            this.logger.warn({ jobId: event.jobId, detail: event.detail }, 'Encoding service reported a warning');
          }
          return;
        }
        if (jobId === undefined) {
          if (early.size >= MAX_EARLY_EVENTS) {
            const oldest = early.keys().next();
            if (!oldest.done) early.delete(oldest.value);
          }
          early.set(event.jobId, event);
          return;
        }
        deliver(event);
      },
    );

    return {
      completion,
      bind: (id) => {
        jobId = id;
        const buffered = early.get(id);
        early.clear();
        if (buffered) deliver(buffered);
      },
      abandon: () => {
        settled = true;
        early.clear();
      },
    };
  }

  private async waitFor(correlation: Correlation, jobId: string): Promise<NotificationEvent> {
    const timeoutMs = this.params.waitTimeoutMs;
    if (!timeoutMs) return correlation.completion;

    let timer: NodeJS.Timeout | undefined;
    const expiry = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Events still in the listener's current batch must not mark the run as finished
        correlation.abandon();
        reject(new WaitTimeoutError(jobId, timeoutMs));
      }, timeoutMs);
    });
    try {
      return await Promise.race([correlation.completion, expiry]);
    } finally {
      clearTimeout(timer);
    }
  }

  // Deletes whatever the step reached allows, then resets to init. Failures are
  // logged and returned, never thrown.
  private async cleanup(): Promise<DeleteError[]> {
    const failures: DeleteError[] = [];
    if (this.deleteInputOnCleanup && canDeleteInput(this.currentStep)) {
      await this.tryDelete(this.inputStore, this.inputKey, failures);
    }
    // A job that ended in error produced no output
    if (this.deleteOutputOnCleanup && canDeleteOutput(this.currentStep) && this.terminal !== 'error') {
      await this.tryDelete(this.outputStore, this.outputKey, failures);
    }
    this.currentStep = reset();
    return failures;
  }

  private async tryDelete(store: ObjectStoreGateway, key: string, failures: DeleteError[]): Promise<void> {
    try {
      await store.delete(key);
    } catch (err) {
      const failure = err instanceof DeleteError ? err : new DeleteError(store.bucket, key, err);
      this.logger.error({ err: failure, bucket: store.bucket, key }, 'Error when deleting file during cleanup');
      failures.push(failure);
    }
  }

  private moveTo(step: TranscodeStep): void {
    this.currentStep = advance(this.currentStep, step);
  }

  private assertIdle(action: string): void {
    if (this.inFlight) {
      throw new OrchestratorStateError(`Cannot ${action} while ${this.inputKey} is being transcoded`);
    }
  }
}
