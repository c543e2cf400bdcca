import { Module } from '@nestjs/common';
import { LabelsModule } from '../labels/labels.module';
import { DatasetService } from './dataset.service';
import { SplitSnapshotStore } from './split-snapshot.store';

@Module({
  imports: [LabelsModule],
  providers: [SplitSnapshotStore, DatasetService],
  exports: [DatasetService],
})
export class DatasetModule {}
