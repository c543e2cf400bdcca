import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { PipelineScheduler } from './pipeline.scheduler';
import { PipelineService } from './pipeline.service';

describe('PipelineScheduler', () => {
  let pipelineService: { dispatch: jest.Mock };

  const createScheduler = async (scheduleEnabled: boolean): Promise<PipelineScheduler> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PipelineScheduler,
        { provide: PipelineService, useValue: pipelineService },
        { provide: ConfigService, useValue: new ConfigService({ scheduleEnabled }) },
      ],
    }).compile();

    return module.get(PipelineScheduler);
  };

  beforeEach(() => {
    pipelineService = { dispatch: jest.fn().mockResolvedValue({ queued: true, jobId: '1', name: 'collect-and-label' }) };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should dispatch collection and labelling as one job', async () => {
    const scheduler = await createScheduler(true);

    await scheduler.dailyCollection();

    expect(pipelineService.dispatch).toHaveBeenCalledTimes(1);
    expect(pipelineService.dispatch).toHaveBeenCalledWith('collect-and-label');
  });

  it('should do nothing when scheduling is disabled', async () => {
    const scheduler = await createScheduler(false);

    await scheduler.dailyCollection();

    expect(pipelineService.dispatch).not.toHaveBeenCalled();
  });

  it('should log a failed dispatch instead of throwing', async () => {
    const errorLog = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    pipelineService.dispatch.mockRejectedValue(new Error('redis down'));
    const scheduler = await createScheduler(true);

    await expect(scheduler.dailyCollection()).resolves.toBeUndefined();
    expect(errorLog).toHaveBeenCalledWith('Scheduled collection failed: redis down');
  });
});
