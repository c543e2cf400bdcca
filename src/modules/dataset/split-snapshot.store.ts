import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { SplitAssignment } from '../../common/interfaces';
import { PipelineConfig } from '../../config/configuration';

function isPartition(value: unknown): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dates' in value &&
    Array.isArray(value.dates) &&
    value.dates.every((date: unknown) => typeof date === 'string')
  );
}

function isSplitAssignment(value: unknown): value is SplitAssignment {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'string' &&
    'train' in value &&
    isPartition(value.train) &&
    'val' in value &&
    isPartition(value.val) &&
    'test' in value &&
    isPartition(value.test)
  );
}

const KEY_PATTERN = /^split_\d{4}-\d{2}-\d{2}_\d{4}-\d{2}-\d{2}$/;

/** Split snapshots as `<snapshotDir>/<key>.json`. */
@Injectable()
export class SplitSnapshotStore {
  private readonly logger = new Logger(SplitSnapshotStore.name);
  private readonly directory: string;

  constructor(configService: ConfigService) {
    const { dataset } = configService.getOrThrow<PipelineConfig>('pipeline');
    this.directory = resolve(process.cwd(), dataset.snapshotDir);
  }

  async save(assignment: SplitAssignment): Promise<string> {
    const path = this.pathFor(assignment.key);
    await mkdir(this.directory, { recursive: true });
    await writeFile(path, `${JSON.stringify(assignment, null, 2)}\n`, 'utf8');
    this.logger.log(`Split snapshot written to ${path}`);
    return path;
  }

  /** The snapshot stored under `key`, or null when there is none. */
  async load(key: string): Promise<SplitAssignment | null> {
    let content: string;
    try {
      content = await readFile(this.pathFor(key), 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    const parsed: unknown = JSON.parse(content);
    if (!isSplitAssignment(parsed)) {
      throw new SyntaxError(`Split snapshot ${key} is not a split assignment`);
    }
    return parsed;
  }

  private pathFor(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new RangeError(`Not a split snapshot key: ${key}`);
    }
    return join(this.directory, `${key}.json`);
  }
}
