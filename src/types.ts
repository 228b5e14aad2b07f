export type TranscodeJobData = {
  filePath: string; // local file, readable by the worker
  filename?: string; // name used for the remote keys, default: basename of filePath
  presetId?: string; // default: TRANSCODE_PRESET_ID
  pipelineId?: string; // default: TRANSCODE_PIPELINE_ID
  inputBucket?: string;
  outputBucket?: string;
  queueUrl?: string; // status queue wired to the pipeline
  outputDir?: string; // where the transcoded file lands, default: OUTPUT_DIR
  deleteInputOnCleanup?: boolean; // default true
  deleteOutputOnCleanup?: boolean; // default true
};

export type TranscodeJobResult = {
  jobId?: string; // BullMQ job id
  remoteJobId?: string;
  filename: string;
  outputPath: string;
  contentType?: string;
  size: number;
  durationMs: number;
};
