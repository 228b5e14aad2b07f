import { S3Client } from '@aws-sdk/client-s3';
import { SQSClient } from '@aws-sdk/client-sqs';
import { ElasticTranscoderClient } from '@aws-sdk/client-elastic-transcoder';
import type { Env } from './env';
import { S3ObjectStore } from './s3';
import { SqsNotificationQueue } from './sqs';
import { ElasticTranscoderEncodingService } from './transcoder';
import type { TranscodeDependencies } from './transcodeOrchestrator';

type AwsEnv = Pick<
  Env,
  'AWS_REGION' | 'AWS_ACCESS_KEY_ID' | 'AWS_SECRET_ACCESS_KEY' | 'AWS_ENDPOINT' | 'SQS_WAIT_TIME_SECONDS' | 'SQS_MAX_MESSAGES'
>;

// Região, credenciais e endpoint compartilhados pelos três clientes
export function awsClientConfig(env: AwsEnv) {
  return {
    region: env.AWS_REGION,
    // Sem chaves estáticas o SDK usa a cadeia padrão (perfil, IAM role...)
    credentials: env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY
      ? { accessKeyId: env.AWS_ACCESS_KEY_ID, secretAccessKey: env.AWS_SECRET_ACCESS_KEY }
      : undefined,
    endpoint: env.AWS_ENDPOINT,
  };
}

export function createAwsDependencies(env: AwsEnv): TranscodeDependencies {
  const config = awsClientConfig(env);
  // Endpoints locais (localstack, minio) só aceitam path-style
  const s3 = new S3Client({ ...config, forcePathStyle: Boolean(env.AWS_ENDPOINT) });

  return {
    objectStore: new S3ObjectStore(s3),
    encoder: new ElasticTranscoderEncodingService(new ElasticTranscoderClient(config)),
    // Cada listener tem o próprio cliente, destruído quando o listener para
    createNotificationQueue: (queueUrl) =>
      new SqsNotificationQueue(new SQSClient(config), queueUrl, {
        waitTimeSeconds: env.SQS_WAIT_TIME_SECONDS,
        maxMessages: env.SQS_MAX_MESSAGES,
      }),
  };
}
