import { SQSClient, ReceiveMessageCommand, DeleteMessageCommand } from '@aws-sdk/client-sqs';
import type { NotificationQueue, QueueMessage } from './notifications';

export type SqsQueueOptions = {
  waitTimeSeconds?: number;
  maxMessages?: number;
};

// One client per queue instance; close() releases it
export class SqsNotificationQueue implements NotificationQueue {
  private readonly waitTimeSeconds: number;
  private readonly maxMessages: number;

  constructor(
    private readonly sqs: SQSClient,
    readonly queueUrl: string,
    options: SqsQueueOptions = {},
  ) {
    this.waitTimeSeconds = options.waitTimeSeconds ?? 20;
    this.maxMessages = options.maxMessages ?? 10;
  }

  async receive(signal: AbortSignal): Promise<QueueMessage[]> {
    const res = await this.sqs.send(
      new ReceiveMessageCommand({
        QueueUrl: this.queueUrl,
        WaitTimeSeconds: this.waitTimeSeconds,
        MaxNumberOfMessages: this.maxMessages,
      }),
      { abortSignal: signal },
    );

    const messages: QueueMessage[] = [];
    for (const m of res.Messages ?? []) {
      // Without a receipt handle the message can never be deleted; SQS always sends one
      if (!m.MessageId || !m.ReceiptHandle) continue;
      messages.push({ id: m.MessageId, receiptHandle: m.ReceiptHandle, body: m.Body ?? '' });
    }
    return messages;
  }

  async acknowledge(message: QueueMessage): Promise<void> {
    await this.sqs.send(new DeleteMessageCommand({
      QueueUrl: this.queueUrl,
      ReceiptHandle: message.receiptHandle,
    }));
  }

  close(): void {
    this.sqs.destroy();
  }
}
