import { Injectable } from '@nestjs/common';
import { sleep } from './retry';

/** Wall time and waiting, behind one seam so schedules can be driven in tests. */
@Injectable()
export class Clock {
  now(): Date {
    return new Date();
  }

  sleep(ms: number): Promise<void> {
    return sleep(ms);
  }
}
