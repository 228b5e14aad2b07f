import cluster from 'node:cluster';
import os from 'node:os';
import process from 'node:process';
import { getEnv, type Env } from './env';
import { logger } from './logger';
import { startWorker } from './queue';

async function startSingleWorker(env: Env) {
  logger.info({ queue: env.QUEUE_NAME, concurrency: env.WORKER_CONCURRENCY }, 'Starting transcode worker');
  const running = startWorker(env);

  // Fecha worker, eventos e Redis antes de sair; jobs em andamento terminam primeiro
  const shutdown = async (signal: string) => {
    try {
      logger.info({ signal, pid: process.pid }, 'Shutting down worker');
      await running.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during worker shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

async function main() {
  // Configuração inválida derruba o processo antes de qualquer fork
  const env = getEnv();

  if (env.WORKER_CLUSTER && cluster.isPrimary) {
    const cpuCount = os.cpus().length;
    const desiredWorkers = env.WORKER_COUNT ?? cpuCount;
    logger.info({ desiredWorkers, cpuCount }, 'Starting worker cluster');

    for (let i = 0; i < desiredWorkers; i++) {
      cluster.fork();
    }

    // Substitui qualquer processo que morrer
    cluster.on('exit', (worker, code, signal) => {
      logger.warn({ pid: worker.process.pid, code, signal }, 'Worker process exited - forking replacement');
      cluster.fork();
    });
    return;
  }

  await startSingleWorker(env);
}

main().catch((err) => {
  logger.fatal({ err }, 'Worker failed to start');
  process.exit(1);
});
