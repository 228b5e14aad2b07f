import { ListenerStateError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { parseNotification, type NotificationEvent, type NotificationQueue, type QueueMessage } from './notifications';

export type NotificationPredicate = (jobId: string) => boolean;
export type NotificationCallback = (event: NotificationEvent) => void;

type HandlerRegistration = {
  predicate: NotificationPredicate;
  callback: NotificationCallback;
};

export type NotificationListenerOptions = {
  // Pause after a failed poll before trying again
  errorBackoffMs?: number;
  logger?: Logger;
};

type ListenerStatus = 'idle' | 'running' | 'stopped';

/**
 * Polls a notification queue and fans every status event out to the handlers whose
 * predicate matches its job id. Handlers run inline in the poll loop, so they must
 * return quickly. Every message is acknowledged once dispatched, whatever the
 * handlers did with it.
 */
export class NotificationListener {
  private readonly handlers = new Set<HandlerRegistration>();
  private readonly abort = new AbortController();
  private readonly errorBackoffMs: number;
  private readonly logger: Logger;
  private status: ListenerStatus = 'idle';
  private loop: Promise<void> = Promise.resolve();

  constructor(private readonly queue: NotificationQueue, options: NotificationListenerOptions = {}) {
    this.errorBackoffMs = options.errorBackoffMs ?? 1000;
    this.logger = options.logger ?? defaultLogger;
  }

  get running(): boolean {
    return this.status === 'running';
  }

  get handlerCount(): number {
    return this.handlers.size;
  }

  start(): void {
    if (this.status === 'running') return;
    if (this.status === 'stopped') {
      throw new ListenerStateError('Notification listener cannot be restarted after stop()');
    }
    this.status = 'running';
    this.loop = this.run();
  }

  addHandler(predicate: NotificationPredicate, callback: NotificationCallback): () => void {
    const registration: HandlerRegistration = { predicate, callback };
    this.handlers.add(registration);
    return () => {
      this.handlers.delete(registration);
    };
  }

  // Interrupts the current long poll; resolves once the loop has exited
  stop(): Promise<void> {
    if (this.status === 'idle') {
      this.status = 'stopped';
      this.handlers.clear();
      this.queue.close();
      return Promise.resolve();
    }
    if (this.status === 'running') {
      this.status = 'stopped';
      this.abort.abort();
    }
    return this.loop;
  }

  private async run(): Promise<void> {
    this.logger.debug('Notification listener started');
    try {
      while (this.status === 'running') {
        await this.pollOnce();
      }
    } finally {
      this.handlers.clear();
      this.queue.close();
      this.logger.debug('Notification listener stopped');
    }
  }

  private async pollOnce(): Promise<void> {
    let messages: QueueMessage[];
    try {
      messages = await this.queue.receive(this.abort.signal);
    } catch (err) {
      if (this.abort.signal.aborted) return;
      this.logger.warn({ err }, 'Failed to poll notification queue, retrying');
      await this.pause(this.errorBackoffMs);
      return;
    }

    for (const message of messages) {
      this.dispatch(message);
      await this.acknowledge(message);
    }
  }

  private dispatch(message: QueueMessage): void {
    let event: NotificationEvent;
    try {
      event = parseNotification(message.body);
    } catch (err) {
      this.logger.warn({ err, messageId: message.id }, 'Dropping unreadable notification');
      return;
    }

    this.logger.debug({ jobId: event.jobId, state: event.state }, 'Notification received');
    for (const handler of [...this.handlers]) {
      try {
        if (handler.predicate(event.jobId)) {
          handler.callback(event);
        }
      } catch (err) {
        this.logger.error({ err, jobId: event.jobId }, 'Notification handler failed');
      }
    }
  }

  private async acknowledge(message: QueueMessage): Promise<void> {
    try {
      await this.queue.acknowledge(message);
    } catch (err) {
      this.logger.warn({ err, messageId: message.id }, 'Failed to acknowledge notification');
    }
  }

  private pause(ms: number): Promise<void> {
    const signal = this.abort.signal;
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
    });
  }
}
