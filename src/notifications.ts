import { z } from 'zod';
import { NotificationFormatError } from './errors';

export type JobState = 'submitted' | 'progressing' | 'succeeded' | 'warning' | 'error';

export type NotificationEvent = Readonly<{
  jobId: string;
  state: JobState;
  terminal: boolean;
  pipelineId?: string;
  detail?: string;
}>;

// A message as handed out by the queue, still opaque
export type QueueMessage = {
  id: string;
  receiptHandle: string;
  body: string;
};

export interface NotificationQueue {
  receive(signal: AbortSignal): Promise<QueueMessage[]>;
  acknowledge(message: QueueMessage): Promise<void>;
  close(): void;
}

const REMOTE_STATES: Record<string, JobState> = {
  SUBMITTED: 'submitted',
  PROGRESSING: 'progressing',
  COMPLETED: 'succeeded',
  WARNING: 'warning',
  ERROR: 'error',
};

export function isTerminalState(state: JobState): boolean {
  return state === 'succeeded' || state === 'error';
}

const snsEnvelope = z.object({
  Type: z.literal('Notification'),
  Message: z.string(),
});

const statusMessage = z.object({
  jobId: z.string().min(1),
  state: z.string().transform((value, ctx) => {
    const state = REMOTE_STATES[value.toUpperCase()];
    if (!state) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown job state ${value}` });
      return z.NEVER;
    }
    return state;
  }),
  pipelineId: z.string().optional(),
  messageDetails: z.string().optional(),
  outputs: z
    .array(z.object({
      status: z.string().optional(),
      statusDetail: z.string().optional(),
      errorCode: z.number().optional(),
    }).passthrough())
    .optional(),
}).passthrough();

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new NotificationFormatError('Notification body is not valid JSON', { cause: err });
  }
}

function describe(message: z.infer<typeof statusMessage>): string | undefined {
  const output = message.outputs?.[0];
  const parts = [
    message.messageDetails,
    output?.errorCode !== undefined ? `error code ${output.errorCode}` : undefined,
    output?.statusDetail,
  ].filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join('; ') : undefined;
}

// Accepts the SNS envelope or raw message delivery
export function parseNotification(body: string): NotificationEvent {
  let payload = parseJson(body);
  const envelope = snsEnvelope.safeParse(payload);
  if (envelope.success) {
    payload = parseJson(envelope.data.Message);
  }

  const parsed = statusMessage.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new NotificationFormatError(`Invalid job status notification: ${issues.join('; ')}`);
  }

  const { jobId, state, pipelineId } = parsed.data;
  return {
    jobId,
    state,
    terminal: isTerminalState(state),
    pipelineId,
    detail: describe(parsed.data),
  };
}
