import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SplitAssignment, SplitName, SplitRatios } from '../../common/interfaces';
import { Clock } from '../../common/utils/clock';
import { PipelineConfig } from '../../config/configuration';
import { formatInstant } from '../calendar/market-time';
import { LabelsPgRepository } from '../labels/repositories/labels-pg.repository';
import { RunLogService } from '../run-log/run-log.service';
import { snapshotKey, splitDates } from './dataset-splitter';
import { SplitSnapshotStore } from './split-snapshot.store';

const SPLIT_NAMES: SplitName[] = ['train', 'val', 'test'];

@Injectable()
export class DatasetService {
  private readonly logger = new Logger(DatasetService.name);
  private readonly config: PipelineConfig;

  constructor(
    private readonly labelsRepository: LabelsPgRepository,
    private readonly snapshots: SplitSnapshotStore,
    private readonly runLog: RunLogService,
    private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.config = configService.getOrThrow<PipelineConfig>('pipeline');
  }

  /**
   * Splits every labeled date chronologically, counts the labels falling in
   * each partition and persists the result as a snapshot.
   */
  async buildSplit(ratios: SplitRatios = this.config.dataset.ratios): Promise<SplitAssignment> {
    const startedAt = this.clock.now();
    const counts = await this.labelsRepository.countByDate();
    const countsByDate = new Map(counts.map(({ date, count }) => [date, count]));
    const split = splitDates(countsByDate.keys(), ratios, this.config.dataset.minDates);

    for (const name of SPLIT_NAMES) {
      split[name].labelCount = split[name].dates.reduce((sum, date) => sum + (countsByDate.get(date) ?? 0), 0);
    }

    const assignment: SplitAssignment = {
      key: snapshotKey(split.train.start, split.test.end),
      createdAt: formatInstant(startedAt.getTime(), this.config.cutoff.timeZone),
      ratios,
      totalDates: split.totalDates,
      train: split.train,
      val: split.val,
      test: split.test,
    };

    await this.snapshots.save(assignment);
    this.logger.log(
      `Split ${assignment.key}: train ${split.train.numDays}, val ${split.val.numDays}, test ${split.test.numDays} dates`,
    );

    await this.runLog.record({
      runType: 'dataset_split',
      tickersAttempted: [],
      tickersSucceeded: [],
      tickersFailed: [],
      rowsAdded: split.totalDates,
      duplicatesSkipped: 0,
      errorMessages: {},
      startedAt,
      finishedAt: this.clock.now(),
    });

    return assignment;
  }

  loadSplit(key: string): Promise<SplitAssignment | null> {
    return this.snapshots.load(key);
  }
}
