import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { TransientFetchError } from '../../common/errors/pipeline.errors';
import { Clock } from '../../common/utils/clock';
import { RunLogService } from '../run-log/run-log.service';
import { RunLogPgRepository } from '../run-log/repositories/run-log-pg.repository';
import { PipelineConfig } from '../../config/configuration';
import { InMemoryNewsRepository, InMemoryRunLogRepository } from '../../../test/in-memory-repositories';
import { FakeClock, testConfigService } from '../../../test/test-support';
import { FinnhubNewsService, RawNewsItem } from './providers/finnhub-news.service';
import { NewsPgRepository } from './repositories/news-pg.repository';
import { NewsCollectorService } from './news-collector.service';

// 2026-03-10T16:00:00-04:00
const TUESDAY_CLOSE = 1773172800;

function item(url: string, title: string, datetime: number | null = TUESDAY_CLOSE): RawNewsItem {
  return { url, title, source: 'Wire', datetime, summary: null, related: [] };
}

describe('NewsCollectorService', () => {
  let newsSource: { getCompanyNews: jest.Mock };
  let news: InMemoryNewsRepository;
  let runLog: InMemoryRunLogRepository;
  let clock: FakeClock;

  async function createCollector(overrides: Partial<PipelineConfig> = {}): Promise<NewsCollectorService> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NewsCollectorService,
        RunLogService,
        { provide: FinnhubNewsService, useValue: newsSource },
        { provide: NewsPgRepository, useValue: news },
        { provide: RunLogPgRepository, useValue: runLog },
        { provide: Clock, useValue: clock },
        { provide: ConfigService, useValue: testConfigService(overrides) },
      ],
    }).compile();
    return module.get(NewsCollectorService);
  }

  beforeEach(() => {
    newsSource = { getCompanyNews: jest.fn().mockResolvedValue([]) };
    news = new InMemoryNewsRepository();
    runLog = new InMemoryRunLogRepository();
    clock = new FakeClock('2026-03-10T21:00:00Z');
  });

  it('should request the last `days` calendar days, today included', async () => {
    const collector = await createCollector();

    await collector.collect(['AAPL'], 7);

    expect(newsSource.getCompanyNews).toHaveBeenCalledWith('AAPL', '2026-03-04', '2026-03-10');
  });

  it('should request only today for a one-day range', async () => {
    const collector = await createCollector();

    await collector.collect(['AAPL'], 1);

    expect(newsSource.getCompanyNews).toHaveBeenCalledWith('AAPL', '2026-03-10', '2026-03-10');
  });

  it('should keep relevant headlines and store standardized timestamps', async () => {
    newsSource.getCompanyNews.mockResolvedValue([
      item('https://news.test/1', 'Apple unveils a phone'),
      item('https://news.test/2', 'AAPL rallies', 1773066600),
      item('https://news.test/3', 'Markets drift'),
    ]);
    const collector = await createCollector();

    const result = await collector.collect(['AAPL'], 7);

    expect(result.rowsAdded).toBe(2);
    expect(news.articles.get('https://news.test/2')).toEqual({
      url: 'https://news.test/2',
      tickerFetchedFor: 'AAPL',
      title: 'AAPL rallies',
      source: 'Wire',
      publishedAt: '2026-03-09T10:30:00-04:00',
      summary: null,
    });
    expect(news.articles.has('https://news.test/3')).toBe(false);
  });

  it('should keep every headline when the filter would drop nearly all of them', async () => {
    newsSource.getCompanyNews.mockResolvedValue(
      Array.from({ length: 20 }, (_, i) => item(`https://news.test/${i}`, i === 0 ? 'Apple up' : `Wrap ${i}`)),
    );
    const collector = await createCollector();

    const result = await collector.collect(['AAPL'], 7);

    expect(result.rowsAdded).toBe(20);
  });

  it('should count repeated urls as duplicates and link shared articles to both tickers', async () => {
    newsSource.getCompanyNews.mockImplementation(async (symbol: string) =>
      symbol === 'AAPL'
        ? [item('https://news.test/shared', 'Apple and Microsoft team up'), item('https://news.test/shared', 'Apple and Microsoft team up')]
        : [item('https://news.test/shared', 'Apple and Microsoft team up'), item('https://news.test/m', 'Microsoft earnings')],
    );
    const collector = await createCollector();

    const result = await collector.collect(['AAPL', 'MSFT'], 7);

    expect(result.rowsAdded).toBe(2);
    expect(result.duplicatesSkipped).toBe(2);
    expect(news.articles.size).toBe(2);
    const linked = await news.findByTickers(['AAPL', 'MSFT']);
    expect(linked.filter((entry) => entry.article.url === 'https://news.test/shared').map((entry) => entry.ticker)).toEqual([
      'AAPL',
      'MSFT',
    ]);
  });

  it('should reject items without a url, title or timestamp', async () => {
    newsSource.getCompanyNews.mockResolvedValue([
      item('', 'Apple without a link'),
      item('https://news.test/1', ''),
      item('https://news.test/2', 'Apple undated', null),
      item('https://news.test/3', 'Apple fine'),
    ]);
    const collector = await createCollector();

    const result = await collector.collect(['AAPL'], 7);

    expect(result.rowsAdded).toBe(1);
    expect(result.rowsRejected).toBe(3);
    expect(runLog.records[0].rowsRejected).toBe(3);
  });

  it('should treat an empty response as a successful run', async () => {
    const collector = await createCollector();

    const result = await collector.collect(['AAPL'], 7);

    expect(result.tickersSucceeded).toEqual(['AAPL']);
    expect(result.rowsAdded).toBe(0);
    expect(runLog.records[0].status).toBe('success');
  });

  it('should retry a malformed response and fail the ticker after the last attempt', async () => {
    newsSource.getCompanyNews.mockImplementation(async (symbol: string) => {
      if (symbol === 'AAPL') {
        throw new TransientFetchError('Malformed company-news response for AAPL');
      }
      return [item('https://news.test/m', 'Microsoft earnings')];
    });
    const collector = await createCollector();

    const result = await collector.collect(['AAPL', 'MSFT'], 7);

    expect(newsSource.getCompanyNews).toHaveBeenCalledTimes(4);
    expect(result.tickersFailed).toEqual(['AAPL']);
    expect(result.tickersSucceeded).toEqual(['MSFT']);
    expect(runLog.records).toHaveLength(1);
    expect(runLog.records[0].status).toBe('partial');
  });

  it('should wait for the rate limit window once it is full', async () => {
    const collector = await createCollector({ newsRateLimit: { maxCalls: 2, windowMs: 60_000 } });

    await collector.collect(['AAPL', 'MSFT', 'NVDA'], 7);

    expect(clock.sleeps).toEqual([60_000]);
  });

  it('should count retries against the rate limit', async () => {
    newsSource.getCompanyNews
      .mockRejectedValueOnce(new TransientFetchError('timeout'))
      .mockRejectedValueOnce(new TransientFetchError('timeout'))
      .mockResolvedValueOnce([]);
    const collector = await createCollector({ newsRateLimit: { maxCalls: 2, windowMs: 60_000 } });

    await collector.collect(['AAPL'], 7);

    // backoff 2s and 4s, then 54s until the first call leaves the window
    expect(clock.sleeps).toEqual([2000, 4000, 54_000]);
  });
});
