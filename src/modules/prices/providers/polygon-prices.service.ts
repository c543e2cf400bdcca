import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { IsoDate, PriceBar } from '../../../common/interfaces';
import { TransientFetchError } from '../../../common/errors/pipeline.errors';
import { standardizeDate } from '../../calendar/standardization';
import { PipelineConfig } from '../../../config/configuration';

interface PolygonAggregateBar {
  o: number; // open
  h: number; // high
  l: number; // low
  c: number; // close
  v: number; // volume
  vw?: number; // volume-weighted average
  t: number; // bar start, ms since epoch
}

interface PolygonAggregatesResponse {
  ticker: string;
  status: string;
  resultsCount?: number;
  results?: PolygonAggregateBar[];
}

export interface PriceSource {
  fetchDailyBars(ticker: string, from: IsoDate, to: IsoDate): Promise<PriceBar[]>;
}

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

@Injectable()
export class PolygonPricesService implements PriceSource {
  private readonly logger = new Logger(PolygonPricesService.name);
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly timeZone: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.baseUrl = this.configService.getOrThrow<string>('polygon.baseUrl');
    this.apiKey = this.configService.get<string>('polygon.apiKey', '');
    this.timeoutMs = this.configService.get<number>('polygon.timeoutMs', 15000);
    this.timeZone = this.configService.getOrThrow<PipelineConfig>('pipeline').cutoff.timeZone;
  }

  /**
   * Daily OHLCV bars for [from, to], unadjusted. Throws TransientFetchError
   * when the provider answers with no bars or an unexpected payload.
   */
  async fetchDailyBars(ticker: string, from: IsoDate, to: IsoDate): Promise<PriceBar[]> {
    const url = `${this.baseUrl}/v2/aggs/ticker/${encodeURIComponent(ticker)}/range/1/day/${from}/${to}`;
    this.logger.debug(`Fetching aggregates from: ${url}`);

    const response = await firstValueFrom(
      this.httpService.get<PolygonAggregatesResponse>(url, {
        params: {
          adjusted: false,
          sort: 'asc',
          limit: 50000,
          apiKey: this.apiKey,
        },
        timeout: this.timeoutMs,
      }),
    );

    const results = response.data?.results;
    if (!Array.isArray(results)) {
      throw new TransientFetchError(`Malformed aggregates response for ${ticker}`);
    }
    if (results.length === 0) {
      throw new TransientFetchError(`No aggregates returned for ${ticker} (${from} -> ${to})`);
    }

    this.logger.log(`Got ${results.length} aggregates for ${ticker} from Polygon`);
    return results.map((bar) => this.toPriceBar(ticker, bar));
  }

  private toPriceBar(ticker: string, bar: PolygonAggregateBar): PriceBar {
    if (!isFiniteNumber(bar.t) || !isFiniteNumber(bar.c)) {
      throw new TransientFetchError(`Malformed bar for ${ticker}: ${JSON.stringify(bar)}`);
    }

    return {
      ticker: ticker.toUpperCase(),
      date: standardizeDate(new Date(bar.t), this.timeZone),
      open: isFiniteNumber(bar.o) ? bar.o : null,
      high: isFiniteNumber(bar.h) ? bar.h : null,
      low: isFiniteNumber(bar.l) ? bar.l : null,
      close: bar.c,
      volume: isFiniteNumber(bar.v) ? Math.round(bar.v) : null,
      adjustedClose: null,
    };
  }
}
