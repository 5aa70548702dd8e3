import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { ReportConfig } from '../config/report.config';
import { SearchedAssetType } from './ticker-classifier';

type SearchMatch = Record<string, unknown>;

/**
 * Resolves tickers whose class the B3 suffix does not tell ("XXXX11" can be
 * a unit, an ETF or a fund) through the AlphaVantage symbol search.
 * Without IRPF_REPORT_STOCKS_APIKEY every lookup answers null.
 */
@Injectable()
export class TickerLookupService {
  private readonly logger = new Logger(TickerLookupService.name);
  private readonly cache = new Map<string, SearchedAssetType | null>();

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {}

  async lookupAssetType(ticker: string): Promise<SearchedAssetType | null> {
    const cached = this.cache.get(ticker);
    if (cached !== undefined) {
      return cached;
    }

    const type = await this.search(ticker);
    this.cache.set(ticker, type);
    return type;
  }

  private async search(ticker: string): Promise<SearchedAssetType | null> {
    const config = this.configService.get<ReportConfig>('report');
    if (!config?.stocksApiKey) {
      this.logger.warn('IRPF_REPORT_STOCKS_APIKEY is not set. Skipping online ticker search.');
      return null;
    }

    let matches: unknown;
    try {
      const response = await firstValueFrom(
        this.httpService.get<{ bestMatches?: unknown }>(config.tickerSearchUrl, {
          params: {
            function: 'SYMBOL_SEARCH',
            keywords: ticker,
            apikey: config.stocksApiKey,
          },
          timeout: config.httpTimeoutMs,
        }),
      );
      matches = response.data?.bestMatches;
    } catch (error) {
      this.logger.warn(`Online ticker search failed for ${ticker}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }

    if (!Array.isArray(matches)) {
      this.logger.warn(`Online ticker search for ${ticker} returned no matches list`);
      return null;
    }

    for (const match of matches) {
      if (typeof match !== 'object' || match === null) {
        continue;
      }
      const entry: SearchMatch = { ...match };
      const symbol = this.field(entry, 'symbol');
      if (symbol === null) {
        this.logger.warn('Online ticker search failed: no "symbol" field on the returned data.');
        return null;
      }
      // "PETR4.SAO" → "PETR4"
      if (symbol.split('.')[0] === ticker) {
        return this.toAssetType(this.field(entry, 'type'));
      }
    }

    this.logger.debug(`Online ticker search found no match for ${ticker}`);
    return null;
  }

  // AlphaVantage prefixes keys with an ordinal: "1. symbol", "3. type".
  private field(entry: SearchMatch, name: string): string | null {
    const key = Object.keys(entry).find((k) => k.includes(name));
    if (key === undefined) {
      return null;
    }
    const value = entry[key];
    return typeof value === 'string' ? value : null;
  }

  private toAssetType(type: string | null): SearchedAssetType | null {
    switch (type) {
      case 'Equity':
        return 'Stock';
      case 'ETF':
        return 'ETF';
      case 'Mutual Fund':
        return 'Fund';
      default:
        return null;
    }
  }
}
