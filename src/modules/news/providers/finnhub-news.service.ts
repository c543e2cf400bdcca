import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';
import { IsoDate } from '../../../common/interfaces';
import { TransientFetchError } from '../../../common/errors/pipeline.errors';

interface FinnhubNewsItem {
  id: number;
  category: string;
  datetime: number;
  headline: string;
  image: string;
  related: string;
  source: string;
  summary: string;
  url: string;
}

/** A headline as the provider reported it, before any standardization. */
export interface RawNewsItem {
  url: string;
  title: string;
  source: string | null;
  /** Publication time, seconds since epoch. */
  datetime: number | null;
  summary: string | null;
  related: string[];
}

export interface NewsSource {
  getCompanyNews(symbol: string, from: IsoDate, to: IsoDate): Promise<RawNewsItem[]>;
}

const textOrNull = (value: unknown): string | null =>
  typeof value === 'string' && value.trim() !== '' ? value.trim() : null;

@Injectable()
export class FinnhubNewsService implements NewsSource {
  private readonly logger = new Logger(FinnhubNewsService.name);
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.baseUrl = this.configService.getOrThrow<string>('finnhub.baseUrl');
    this.apiKey = this.configService.get<string>('finnhub.apiKey', '');
    this.timeoutMs = this.configService.get<number>('finnhub.timeoutMs', 15000);
  }

  /**
   * Company news for [from, to]. An empty list is a valid answer; a payload
   * that is not a list is treated as a transient provider fault.
   */
  async getCompanyNews(symbol: string, from: IsoDate, to: IsoDate): Promise<RawNewsItem[]> {
    const url = `${this.baseUrl}/company-news`;
    const response = await firstValueFrom(
      this.httpService.get<FinnhubNewsItem[]>(url, {
        params: {
          symbol,
          from,
          to,
          token: this.apiKey,
        },
        timeout: this.timeoutMs,
      }),
    );

    if (!Array.isArray(response.data)) {
      throw new TransientFetchError(`Malformed company-news response for ${symbol}`);
    }

    this.logger.log(`Fetched ${response.data.length} articles for ${symbol}`);
    return response.data.map((item) => this.toRawNewsItem(item));
  }

  private toRawNewsItem(item: FinnhubNewsItem): RawNewsItem {
    return {
      url: textOrNull(item.url) ?? '',
      title: textOrNull(item.headline) ?? '',
      source: textOrNull(item.source),
      datetime: typeof item.datetime === 'number' && Number.isFinite(item.datetime) ? item.datetime : null,
      summary: textOrNull(item.summary),
      related: item.related
        ? item.related.split(',').map((s) => s.trim().toUpperCase()).filter(Boolean)
        : [],
    };
  }
}
