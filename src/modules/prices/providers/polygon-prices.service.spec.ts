import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { of, throwError } from 'rxjs';
import { TransientFetchError } from '../../../common/errors/pipeline.errors';
import { axiosResponse, testConfigService } from '../../../../test/test-support';
import { PolygonPricesService } from './polygon-prices.service';

describe('PolygonPricesService', () => {
  let service: PolygonPricesService;
  let httpService: { get: jest.Mock };

  beforeEach(async () => {
    httpService = { get: jest.fn() };
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PolygonPricesService,
        { provide: HttpService, useValue: httpService },
        { provide: ConfigService, useValue: testConfigService() },
      ],
    }).compile();

    service = module.get(PolygonPricesService);
  });

  it('should request unadjusted daily aggregates for the range', async () => {
    httpService.get.mockReturnValue(
      of(axiosResponse({ ticker: 'AAPL', status: 'OK', results: [{ o: 1, h: 2, l: 0.5, c: 1.5, v: 100, t: Date.UTC(2026, 2, 10, 4) }] })),
    );

    await service.fetchDailyBars('AAPL', '2026-03-06', '2026-03-10');

    expect(httpService.get).toHaveBeenCalledWith(
      'https://polygon.test/v2/aggs/ticker/AAPL/range/1/day/2026-03-06/2026-03-10',
      {
        params: { adjusted: false, sort: 'asc', limit: 50000, apiKey: 'test-secret' },
        timeout: 1000,
      },
    );
  });

  it('should map bars onto market-local dates', async () => {
    httpService.get.mockReturnValue(
      of(
        axiosResponse({
          ticker: 'AAPL',
          status: 'OK',
          results: [
            { o: 10, h: 12, l: 9, c: 11, v: 1234.6, t: Date.UTC(2026, 2, 6, 5) },
            { o: 11, h: 13, l: 10, c: 12, v: 999, t: Date.UTC(2026, 2, 9, 4) },
          ],
        }),
      ),
    );

    const bars = await service.fetchDailyBars('aapl', '2026-03-06', '2026-03-09');

    expect(bars).toEqual([
      { ticker: 'AAPL', date: '2026-03-06', open: 10, high: 12, low: 9, close: 11, volume: 1235, adjustedClose: null },
      { ticker: 'AAPL', date: '2026-03-09', open: 11, high: 13, low: 10, close: 12, volume: 999, adjustedClose: null },
    ]);
  });

  it('should treat an empty result set as transient', async () => {
    httpService.get.mockReturnValue(of(axiosResponse({ ticker: 'AAPL', status: 'OK', results: [] })));
    await expect(service.fetchDailyBars('AAPL', '2026-03-06', '2026-03-10')).rejects.toBeInstanceOf(
      TransientFetchError,
    );
  });

  it('should treat a payload without results as transient', async () => {
    httpService.get.mockReturnValue(of(axiosResponse({ ticker: 'AAPL', status: 'ERROR' })));
    await expect(service.fetchDailyBars('AAPL', '2026-03-06', '2026-03-10')).rejects.toBeInstanceOf(
      TransientFetchError,
    );
  });

  it('should reject a bar without a close', async () => {
    httpService.get.mockReturnValue(
      of(axiosResponse({ ticker: 'AAPL', status: 'OK', results: [{ o: 1, h: 1, l: 1, v: 1, t: Date.UTC(2026, 2, 9, 4) }] })),
    );
    await expect(service.fetchDailyBars('AAPL', '2026-03-09', '2026-03-09')).rejects.toThrow('Malformed bar for AAPL');
  });

  it('should let transport errors through to the caller', async () => {
    httpService.get.mockReturnValue(throwError(() => new Error('socket hang up')));
    await expect(service.fetchDailyBars('AAPL', '2026-03-06', '2026-03-10')).rejects.toThrow('socket hang up');
  });
});
