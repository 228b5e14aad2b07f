import fs from 'node:fs/promises';
import path from 'node:path';
import type { Job } from 'bullmq';
import { notifyBackend, type CallbackSettings } from './callback';
import type { Env } from './env';
import { logger as defaultLogger } from './logger';
import { discardRetrievedObject } from './objectStore';
import { TranscodeJobOrchestrator, type TranscodeDependencies } from './transcodeOrchestrator';
import type { TranscodeJobData, TranscodeJobResult } from './types';

export type TranscodeSettings = {
  presetId: string;
  pipelineId: string;
  inputBucket: string;
  outputBucket: string;
  queueUrl: string;
  outputDir: string;
  waitTimeoutMs: number;
  strictCleanup: boolean;
  callback?: CallbackSettings;
};

export function transcodeSettingsFromEnv(env: Env): TranscodeSettings {
  return {
    presetId: env.TRANSCODE_PRESET_ID,
    pipelineId: env.TRANSCODE_PIPELINE_ID,
    inputBucket: env.TRANSCODE_INPUT_BUCKET,
    outputBucket: env.TRANSCODE_OUTPUT_BUCKET,
    queueUrl: env.TRANSCODE_NOTIFICATION_QUEUE_URL,
    outputDir: env.OUTPUT_DIR,
    waitTimeoutMs: env.TRANSCODE_WAIT_TIMEOUT_MS,
    strictCleanup: env.TRANSCODE_STRICT_CLEANUP,
    callback: env.BACKEND_API_URL
      ? { baseUrl: env.BACKEND_API_URL, token: env.BACKEND_API_TOKEN, maxRetries: env.CALLBACK_MAX_RETRIES }
      : undefined,
  };
}

export type TranscodeJobHandler = (job: Pick<Job<TranscodeJobData>, 'id' | 'data'>) => Promise<TranscodeJobResult>;

// Um orquestrador por job: envia, espera a notificação, baixa e limpa o S3.
// Os erros sobem para o BullMQ registrar a falha e aplicar a própria política de retry.
export function createTranscodeJobHandler(deps: TranscodeDependencies, settings: TranscodeSettings): TranscodeJobHandler {
  const logger = deps.logger ?? defaultLogger;

  return async (job) => {
    const data = job.data;
    const startTime = Date.now();

    // Campos do job têm prioridade sobre a configuração do ambiente
    const orchestrator = new TranscodeJobOrchestrator(
      { path: data.filePath, filename: data.filename },
      {
        presetId: data.presetId ?? settings.presetId,
        pipelineId: data.pipelineId ?? settings.pipelineId,
        inputBucket: data.inputBucket ?? settings.inputBucket,
        outputBucket: data.outputBucket ?? settings.outputBucket,
        queueUrl: data.queueUrl ?? settings.queueUrl,
        deleteInputOnCleanup: data.deleteInputOnCleanup,
        deleteOutputOnCleanup: data.deleteOutputOnCleanup,
        waitTimeoutMs: settings.waitTimeoutMs,
        strictCleanup: settings.strictCleanup,
      },
      deps,
    );
    logger.info({ jobId: job.id, inputKey: orchestrator.inputKey }, 'Transcode job started');

    // Upload, envio, espera pela notificação, download e limpeza remota
    const output = await orchestrator.transcode();

    const outputDir = data.outputDir ?? settings.outputDir;
    const outputPath = path.join(outputDir, path.basename(output.filename));
    // Copia para o diretório de saída; o temporário é apagado mesmo se a cópia falhar
    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.copyFile(output.path, outputPath);
    } finally {
      await discardRetrievedObject(output);
    }

    // Resultado do job
    const result: TranscodeJobResult = {
      jobId: job.id,
      remoteJobId: orchestrator.jobId,
      filename: output.filename,
      outputPath,
      contentType: output.contentType,
      size: output.size,
      durationMs: Date.now() - startTime,
    };

    // Callback opcional para o backend
    if (settings.callback) {
      await notifyBackend(result, { logger, ...settings.callback });
    } else {
      logger.debug('BACKEND_API_URL not set; skipping callback');
    }

    return result;
  };
}
