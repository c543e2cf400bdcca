import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectQueue } from '@nestjs/bull';
import { Queue } from 'bull';
import { PipelineJobResult, PipelineRunner } from './pipeline-runner.service';
import { PIPELINE_QUEUE, PipelineJobData, PipelineJobName, QueuedJob } from './pipeline.constants';

/**
 * Entry point for triggered runs. With Redis the job goes onto the pipeline
 * queue, whose single worker keeps writers from overlapping; without it the
 * job runs inline.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);
  private readonly queueEnabled: boolean;

  constructor(
    private readonly runner: PipelineRunner,
    @InjectQueue(PIPELINE_QUEUE) private readonly pipelineQueue: Queue<PipelineJobData>,
    configService: ConfigService,
  ) {
    this.queueEnabled = Boolean(configService.get<boolean>('redis.enabled'));
  }

  isQueueEnabled(): boolean {
    return this.queueEnabled;
  }

  async dispatch(name: PipelineJobName, data: PipelineJobData = {}): Promise<QueuedJob | PipelineJobResult> {
    if (!this.queueEnabled) {
      this.logger.log(`Running ${name} inline`);
      return this.runner.run(name, data);
    }

    const job = await this.pipelineQueue.add(name, data, {
      removeOnComplete: 100,
      removeOnFail: 100,
    });
    this.logger.log(`Queued ${name} as job ${job.id}`);
    return { queued: true, jobId: String(job.id), name };
  }
}
