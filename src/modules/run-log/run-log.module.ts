import { Global, Module } from '@nestjs/common';
import { RunLogPgRepository } from './repositories/run-log-pg.repository';
import { RunLogService } from './run-log.service';

@Global()
@Module({
  providers: [RunLogPgRepository, RunLogService],
  exports: [RunLogService],
})
export class RunLogModule {}
