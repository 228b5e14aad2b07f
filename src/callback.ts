import axios from 'axios';
import { CallbackError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import type { TranscodeJobResult } from './types';

export type CallbackSettings = {
  baseUrl: string;
  token?: string;
  maxRetries: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// Normaliza a base para que contenha exatamente uma "/api"
export function callbackUrl(baseUrl: string): string {
  const base = baseUrl.replace(/\/$/, '').replace(/\/api\/api$/, '/api');
  const ensuredApi = base.endsWith('/api') ? base : `${base}/api`;
  return `${ensuredApi}/transcode/callback`;
}

// Avisa o backend do job concluído, com backoff exponencial (2s, 4s, 8s...)
export async function notifyBackend(result: TranscodeJobResult, settings: CallbackSettings): Promise<void> {
  const log = settings.logger ?? defaultLogger;
  const sleep = settings.sleep ?? delay;
  const url = callbackUrl(settings.baseUrl);

  for (let attempt = 1; attempt <= settings.maxRetries; attempt++) {
    try {
      // Token opcional, enviado como Bearer
      await axios.post(url, result, {
        headers: settings.token ? { Authorization: `Bearer ${settings.token}` } : undefined,
        timeout: 30000,
      });
      log.info({ jobId: result.jobId, attempt }, 'Callback to backend succeeded');
      return;
    } catch (err) {
      // Última tentativa: o erro sobe para o BullMQ
      if (attempt === settings.maxRetries) {
        log.error({ err, attempt, jobId: result.jobId }, 'Callback to backend failed after all retries');
        throw new CallbackError(url, attempt, err);
      }
      const retryDelay = 2000 * Math.pow(2, attempt - 1);
      log.warn({ err, attempt, jobId: result.jobId, retryDelay }, `Callback to backend failed, retrying... (${attempt}/${settings.maxRetries})`);
      await sleep(retryDelay);
    }
  }
}
