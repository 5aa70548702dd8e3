import { registerAs } from '@nestjs/config';

export interface ReportConfig {
  stocksApiKey: string | undefined;
  tickerSearchUrl: string;
  httpTimeoutMs: number;
  logLevel: string;
}

export default registerAs('report', (): ReportConfig => ({
  stocksApiKey: process.env.IRPF_REPORT_STOCKS_APIKEY || undefined,
  tickerSearchUrl: process.env.IRPF_REPORT_TICKER_SEARCH_URL || 'https://www.alphavantage.co/query',
  httpTimeoutMs: parseInt(process.env.IRPF_REPORT_HTTP_TIMEOUT_MS || '10000', 10),
  logLevel: process.env.IRPF_REPORT_LOG_LEVEL || 'warn',
}));
