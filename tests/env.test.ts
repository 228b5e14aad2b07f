import { describe, expect, it } from 'vitest';
import { loadEnv } from '../src/env';
import { ConfigError } from '../src/errors';

const BASE = {
  TRANSCODE_INPUT_BUCKET: 'in',
  TRANSCODE_OUTPUT_BUCKET: 'out',
  TRANSCODE_PIPELINE_ID: 'PL1',
  TRANSCODE_PRESET_ID: 'P1',
  TRANSCODE_NOTIFICATION_QUEUE_URL: 'https://sqs.us-east-1.amazonaws.com/000000000000/transcode-status',
  REDIS_URL: 'redis://localhost:6379',
};

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv(BASE);

    expect(env).toMatchObject({
      AWS_REGION: 'us-east-1',
      TRANSCODE_WAIT_TIMEOUT_MS: 3600000,
      TRANSCODE_STRICT_CLEANUP: false,
      SQS_WAIT_TIME_SECONDS: 20,
      SQS_MAX_MESSAGES: 10,
      QUEUE_NAME: 'media-transcode',
      WORKER_CONCURRENCY: 1,
      WORKER_CLUSTER: false,
      OUTPUT_DIR: './transcoded',
      CALLBACK_MAX_RETRIES: 5,
    });
    expect(env.AWS_ACCESS_KEY_ID).toBeUndefined();
    expect(env.BACKEND_API_URL).toBeUndefined();
    expect(env.WORKER_COUNT).toBeUndefined();
  });

  it('coerces numbers and booleans', () => {
    const env = loadEnv({ ...BASE, TRANSCODE_WAIT_TIMEOUT_MS: '0', TRANSCODE_STRICT_CLEANUP: 'true', SQS_WAIT_TIME_SECONDS: '1' });

    expect(env.TRANSCODE_WAIT_TIMEOUT_MS).toBe(0);
    expect(env.TRANSCODE_STRICT_CLEANUP).toBe(true);
    expect(env.SQS_WAIT_TIME_SECONDS).toBe(1);
  });

  it('reads the cluster settings', () => {
    const env = loadEnv({ ...BASE, WORKER_CLUSTER: 'true', WORKER_COUNT: '3' });

    expect(env.WORKER_CLUSTER).toBe(true);
    expect(env.WORKER_COUNT).toBe(3);
    expect(() => loadEnv({ ...BASE, WORKER_COUNT: '0' })).toThrow(/WORKER_COUNT/);
    expect(() => loadEnv({ ...BASE, WORKER_CLUSTER: 'yes' })).toThrow(/WORKER_CLUSTER/);
  });

  it('lists every missing setting', () => {
    const { TRANSCODE_INPUT_BUCKET: _input, TRANSCODE_PRESET_ID: _preset, ...rest } = BASE;

    expect(() => loadEnv(rest)).toThrow(ConfigError);
    expect(() => loadEnv(rest)).toThrow(/TRANSCODE_INPUT_BUCKET: .*; TRANSCODE_PRESET_ID: /);
  });

  it('rejects out of range polling settings', () => {
    expect(() => loadEnv({ ...BASE, SQS_WAIT_TIME_SECONDS: '30' })).toThrow(/SQS_WAIT_TIME_SECONDS/);
    expect(() => loadEnv({ ...BASE, SQS_MAX_MESSAGES: '0' })).toThrow(/SQS_MAX_MESSAGES/);
  });

  it('requires both halves of static credentials', () => {
    expect(() => loadEnv({ ...BASE, AWS_ACCESS_KEY_ID: 'test' })).toThrow(
      'AWS_ACCESS_KEY_ID: AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together',
    );
    expect(loadEnv({ ...BASE, AWS_ACCESS_KEY_ID: 'test', AWS_SECRET_ACCESS_KEY: 'test-secret' }).AWS_SECRET_ACCESS_KEY).toBe('test-secret');
  });
});
