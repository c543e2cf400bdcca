export const PIPELINE_QUEUE = 'pipeline';

export const PIPELINE_JOB_NAMES = [
  'collect-prices',
  'collect-news',
  'collect-all',
  'generate-labels',
  'collect-and-label',
  'build-split',
] as const;

export type PipelineJobName = (typeof PIPELINE_JOB_NAMES)[number];

export function isPipelineJobName(name: string): name is PipelineJobName {
  return PIPELINE_JOB_NAMES.some((known) => known === name);
}

export interface PipelineJobData {
  tickers?: string[];
  days?: number;
}

export interface QueuedJob {
  queued: true;
  jobId: string;
  name: PipelineJobName;
}
