#!/usr/bin/env node
import 'reflect-metadata';
import { parseArgs } from 'util';
import { NestFactory } from '@nestjs/core';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { CliModule } from './cli.module';
import { errorMessage } from './common/errors/pipeline.errors';
import { NewsDatasetBuilder } from './modules/news/news-dataset.builder';
import { PipelineJobData } from './modules/pipeline/pipeline.constants';
import { PipelineRunner } from './modules/pipeline/pipeline-runner.service';

const COMMANDS = [
  'collect-all',
  'collect-prices',
  'collect-news',
  'labels',
  'split',
  'validate',
  'news-dataset',
] as const;

type Command = (typeof COMMANDS)[number];

const USAGE = `Usage: market-pipeline <command> [--days N] [--tickers AAPL,MSFT] [--all-groups]

Commands:
  collect-all     collect prices and news, then validate
  collect-prices  collect daily bars
  collect-news    collect company headlines
  labels          generate next-day labels from stored bars
  split           build the chronological train/val/test split
  validate        print price and news validation reports
  news-dataset    group headlines by prediction date and join labels`;

const isCommand = (value: string | undefined): value is Command =>
  COMMANDS.some((command) => command === value);

export interface CliInvocation {
  command: Command;
  data: PipelineJobData;
  requireLabels: boolean;
}

export function parseInvocation(argv: string[]): CliInvocation {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      days: { type: 'string' },
      tickers: { type: 'string' },
      'all-groups': { type: 'boolean', default: false },
    },
  });

  const [command] = positionals;
  if (!isCommand(command)) {
    throw new TypeError(command ? `Unknown command: ${command}\n\n${USAGE}` : USAGE);
  }

  const data: PipelineJobData = {};
  if (values.days !== undefined) {
    const days = Number(values.days);
    if (!Number.isInteger(days) || days < 1) {
      throw new TypeError(`--days must be a positive integer, got ${values.days}`);
    }
    data.days = days;
  }
  if (values.tickers) {
    data.tickers = values.tickers
      .split(',')
      .map((ticker) => ticker.trim().toUpperCase())
      .filter(Boolean);
  }

  return { command, data, requireLabels: !values['all-groups'] };
}

async function execute(app: INestApplicationContext, invocation: CliInvocation): Promise<unknown> {
  const runner = app.get(PipelineRunner);
  const { data } = invocation;

  switch (invocation.command) {
    case 'collect-all':
      return runner.collectAll(data);
    case 'collect-prices':
      return runner.collectPrices(data);
    case 'collect-news':
      return runner.collectNews(data);
    case 'labels':
      return runner.generateLabels(data);
    case 'split':
      return runner.buildSplit();
    case 'validate':
      return runner.validate(data);
    case 'news-dataset':
      return app.get(NewsDatasetBuilder).build({ tickers: data.tickers, requireLabels: invocation.requireLabels });
  }
}

async function main(): Promise<void> {
  const logger = new Logger('Cli');
  let invocation: CliInvocation;
  try {
    invocation = parseInvocation(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['log', 'warn', 'error'],
  });
  try {
    const result = await execute(app, invocation);
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  } catch (error) {
    logger.error(`${invocation.command} failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exit(1);
  });
}
