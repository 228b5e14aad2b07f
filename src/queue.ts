import { Worker, QueueEvents } from 'bullmq';
import IORedis from 'ioredis';
import { createAwsDependencies } from './aws';
import type { Env } from './env';
import { logger } from './logger';
import { createTranscodeJobHandler, transcodeSettingsFromEnv } from './transcodeJob';
import type { TranscodeJobData, TranscodeJobResult } from './types';

export type RunningWorker = {
  worker: Worker<TranscodeJobData, TranscodeJobResult>;
  close(): Promise<void>;
};

// Cria o worker BullMQ com a conexão Redis e o handler de transcodificação
export function startWorker(env: Env): RunningWorker {
  // BullMQ exige maxRetriesPerRequest: null na conexão
  const connection = new IORedis(env.REDIS_URL, { maxRetriesPerRequest: null });
  const concurrency = env.WORKER_CONCURRENCY;
  logger.info({ concurrency, pid: process.pid }, 'Initializing BullMQ worker');

  const handler = createTranscodeJobHandler(createAwsDependencies(env), transcodeSettingsFromEnv(env));

  const worker = new Worker<TranscodeJobData, TranscodeJobResult>(
    env.QUEUE_NAME,
    async (job) => {
      logger.info({ jobId: job.id, data: job.data }, 'Worker received job');
      return handler(job);
    },
    { connection, concurrency },
  );
  // Eventos do worker
  worker.on('completed', (job, result) => {
    logger.info({ jobId: job.id, result }, 'Job completed');
  });
  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, err }, 'Job failed');
  });
  worker.on('error', (err) => {
    logger.error({ err }, 'Worker error');
  });

  // Eventos da fila (estado dos jobs vistos pelo Redis)
  const queueEvents = new QueueEvents(env.QUEUE_NAME, { connection });
  queueEvents.on('waiting', ({ jobId }) => logger.info({ jobId }, 'Job waiting'));
  queueEvents.on('active', ({ jobId }) => logger.info({ jobId }, 'Job active'));
  queueEvents.on('failed', ({ jobId, failedReason }) => logger.error({ jobId, failedReason }, 'Job failed event'));

  return {
    worker,
    // Para de pegar jobs, espera os ativos e fecha a conexão
    close: async () => {
      await worker.close();
      await queueEvents.close();
      await connection.quit();
    },
  };
}
