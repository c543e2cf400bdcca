import { Test, TestingModule } from '@nestjs/testing';
import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatasetService } from '../dataset/dataset.service';
import { LabelGeneratorService } from '../labels/label-generator.service';
import { NewsCollectorService } from '../news/news-collector.service';
import { PriceCollectorService } from '../prices/price-collector.service';
import { NewsValidatorService } from '../validation/news-validator.service';
import { PriceValidatorService } from '../validation/price-validator.service';
import { testConfigService } from '../../../test/test-support';
import { PipelineRunner } from './pipeline-runner.service';

describe('PipelineRunner', () => {
  let runner: PipelineRunner;
  let calls: string[];
  let priceCollector: { collect: jest.Mock };
  let newsCollector: { collect: jest.Mock };
  let labelGenerator: { generate: jest.Mock };
  let datasetService: { buildSplit: jest.Mock; loadSplit: jest.Mock };

  beforeEach(async () => {
    calls = [];
    const step = (name: string, result: object) =>
      jest.fn(async () => {
        calls.push(name);
        return result;
      });

    priceCollector = { collect: step('prices', { rowsAdded: 10 }) };
    newsCollector = { collect: step('news', { rowsAdded: 4 }) };
    labelGenerator = { generate: step('labels', { totalLabels: 9 }) };
    datasetService = {
      buildSplit: step('split', { key: 'split_2026-01-05_2026-02-02' }),
      loadSplit: jest.fn(async (key: string) => (key === 'split_2026-01-05_2026-02-02' ? { key } : null)),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PipelineRunner,
        { provide: PriceCollectorService, useValue: priceCollector },
        { provide: NewsCollectorService, useValue: newsCollector },
        { provide: LabelGeneratorService, useValue: labelGenerator },
        { provide: DatasetService, useValue: datasetService },
        { provide: PriceValidatorService, useValue: { validate: step('validate-prices', { priceAnomalies: [] }) } },
        { provide: NewsValidatorService, useValue: { validate: step('validate-news', {}) } },
        { provide: ConfigService, useValue: testConfigService() },
      ],
    }).compile();

    runner = module.get(PipelineRunner);
  });

  it('should fall back to the configured tickers and lookback', async () => {
    await runner.collectPrices();

    expect(priceCollector.collect).toHaveBeenCalledWith(['AAPL', 'MSFT'], 21);
  });

  it('should pass requested tickers and days through', async () => {
    await runner.collectNews({ tickers: ['NVDA'], days: 3 });

    expect(newsCollector.collect).toHaveBeenCalledWith(['NVDA'], 3);
  });

  it('should collect prices before news and validate last', async () => {
    const result = await runner.collectAll();

    expect(calls).toEqual(['prices', 'news', 'validate-prices', 'validate-news']);
    expect(result.prices).toEqual({ rowsAdded: 10 });
    expect(result.news).toEqual({ rowsAdded: 4 });
  });

  it('should route job names to their steps', async () => {
    await runner.run('generate-labels', {});
    await runner.run('build-split', {});

    expect(calls).toEqual(['labels', 'split']);
    expect(labelGenerator.generate).toHaveBeenCalledWith(['AAPL', 'MSFT']);
    expect(datasetService.buildSplit).toHaveBeenCalledWith(undefined);
  });

  it('should collect, validate and only then generate labels for the daily job', async () => {
    const result = await runner.run('collect-and-label', { tickers: ['NVDA'] });

    expect(calls).toEqual(['prices', 'news', 'validate-prices', 'validate-news', 'labels']);
    expect(labelGenerator.generate).toHaveBeenCalledWith(['NVDA']);
    expect(result).toMatchObject({ labels: { totalLabels: 9 } });
  });

  it('should return a stored split by key', async () => {
    await expect(runner.loadSplit('split_2026-01-05_2026-02-02')).resolves.toEqual({
      key: 'split_2026-01-05_2026-02-02',
    });
  });

  it('should raise not found for an unknown split key', async () => {
    await expect(runner.loadSplit('split_missing')).rejects.toBeInstanceOf(NotFoundException);
  });
});
