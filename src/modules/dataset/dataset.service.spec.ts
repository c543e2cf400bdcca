import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Label, SplitAssignment } from '../../common/interfaces';
import { InsufficientDataError } from '../../common/errors/pipeline.errors';
import { Clock } from '../../common/utils/clock';
import { LabelsPgRepository } from '../labels/repositories/labels-pg.repository';
import { RunLogService } from '../run-log/run-log.service';
import { RunLogPgRepository } from '../run-log/repositories/run-log-pg.repository';
import { InMemoryLabelsRepository, InMemoryRunLogRepository } from '../../../test/in-memory-repositories';
import { FakeClock, testConfigService, tradingDays } from '../../../test/test-support';
import { DatasetService } from './dataset.service';
import { SplitSnapshotStore } from './split-snapshot.store';

const label = (ticker: string, date: string): Label => ({
  ticker,
  date,
  labelBinary: 1,
  pctReturn: 0.01,
  closeT: 100,
  closeTPlus1: 101,
});

describe('DatasetService', () => {
  let service: DatasetService;
  let labels: InMemoryLabelsRepository;
  let runLog: InMemoryRunLogRepository;
  let snapshots: { save: jest.Mock; load: jest.Mock };

  beforeEach(async () => {
    labels = new InMemoryLabelsRepository();
    runLog = new InMemoryRunLogRepository();
    snapshots = {
      save: jest.fn(async (assignment: SplitAssignment) => `/snapshots/${assignment.key}.json`),
      load: jest.fn(async () => null),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DatasetService,
        RunLogService,
        { provide: LabelsPgRepository, useValue: labels },
        { provide: RunLogPgRepository, useValue: runLog },
        { provide: SplitSnapshotStore, useValue: snapshots },
        { provide: Clock, useValue: new FakeClock('2026-03-10T21:00:00Z') },
        { provide: ConfigService, useValue: testConfigService() },
      ],
    }).compile();

    service = module.get(DatasetService);

    const dates = tradingDays('2026-01-05', 20);
    await labels.insertLabels([
      ...dates.map((date) => label('AAPL', date)),
      ...dates.slice(0, 10).map((date) => label('MSFT', date)),
    ]);
  });

  it('should split the labeled dates and count labels per partition', async () => {
    const assignment = await service.buildSplit();

    expect(assignment.key).toBe('split_2026-01-05_2026-02-02');
    expect(assignment.createdAt).toBe('2026-03-10T17:00:00-04:00');
    expect(assignment.totalDates).toBe(20);
    expect([assignment.train.numDays, assignment.val.numDays, assignment.test.numDays]).toEqual([14, 3, 3]);
    expect([assignment.train.labelCount, assignment.val.labelCount, assignment.test.labelCount]).toEqual([24, 3, 3]);
  });

  it('should persist the assignment as a snapshot', async () => {
    const assignment = await service.buildSplit();

    expect(snapshots.save).toHaveBeenCalledWith(assignment);
  });

  it('should use the given ratios', async () => {
    const assignment = await service.buildSplit({ train: 0.5, val: 0.25, test: 0.25 });

    expect(assignment.ratios).toEqual({ train: 0.5, val: 0.25, test: 0.25 });
    expect([assignment.train.numDays, assignment.val.numDays, assignment.test.numDays]).toEqual([10, 5, 5]);
  });

  it('should record the split in the run log', async () => {
    await service.buildSplit();

    expect(runLog.records).toHaveLength(1);
    expect(runLog.records[0]).toMatchObject({ runType: 'dataset_split', status: 'success', rowsAdded: 20 });
  });

  it('should refuse to split too few dates', async () => {
    labels.rows.clear();
    await labels.insertLabels([label('AAPL', '2026-01-05'), label('AAPL', '2026-01-06')]);

    await expect(service.buildSplit()).rejects.toThrow(InsufficientDataError);
    expect(snapshots.save).not.toHaveBeenCalled();
  });
});
