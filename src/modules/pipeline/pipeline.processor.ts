import { OnQueueFailed, Process, Processor } from '@nestjs/bull';
import { Logger } from '@nestjs/common';
import { Job } from 'bull';
import { PipelineJobResult, PipelineRunner } from './pipeline-runner.service';
import { PIPELINE_QUEUE, PipelineJobData, isPipelineJobName } from './pipeline.constants';

/**
 * Single handler for every job name. Bull starts one worker loop per
 * `@Process` handler, so one handler keeps pipeline jobs running one at a time.
 */
@Processor(PIPELINE_QUEUE)
export class PipelineProcessor {
  private readonly logger = new Logger(PipelineProcessor.name);

  constructor(private readonly runner: PipelineRunner) {}

  @Process()
  async process(job: Pick<Job<PipelineJobData>, 'id' | 'name' | 'data'>): Promise<PipelineJobResult> {
    const name = job.name;
    if (!isPipelineJobName(name)) {
      throw new Error(`Unknown pipeline job: ${name}`);
    }

    this.logger.log(`Job ${job.id}: running ${name}`);
    return this.runner.run(name, job.data);
  }

  @OnQueueFailed()
  onFailed(job: Job<PipelineJobData>, error: Error) {
    this.logger.error(`Job ${job.id} (${job.name}) failed: ${error.message}`);
  }
}
