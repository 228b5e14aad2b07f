import { ElasticTranscoderClient, CreateJobCommand } from '@aws-sdk/client-elastic-transcoder';

export type EncodeRequest = {
  pipelineId: string;
  inputKey: string;
  outputKey: string;
  presetId: string;
};

// Completion is only ever learned from the notification queue, never by polling the service
export interface EncodingService {
  submitJob(request: EncodeRequest): Promise<string>;
}

export class ElasticTranscoderEncodingService implements EncodingService {
  constructor(private readonly client: ElasticTranscoderClient) {}

  async submitJob(request: EncodeRequest): Promise<string> {
    const res = await this.client.send(new CreateJobCommand({
      PipelineId: request.pipelineId,
      Input: { Key: request.inputKey },
      Outputs: [{ Key: request.outputKey, PresetId: request.presetId }],
    }));
    const jobId = res.Job?.Id;
    if (!jobId) {
      throw new Error(`Elastic Transcoder returned no job id for ${request.inputKey}`);
    }
    return jobId;
  }
}
