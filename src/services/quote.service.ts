import { AppConfig } from '../config/env.validation';
import { NotFoundError, UpstreamError } from '../errors/http.errors';
import { StockPriceOut } from '../types';

/** Market-data source. Resolves `null` when the symbol has no current price. */
export interface QuoteProvider {
  getPrice(symbol: string): Promise<number | null>;
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const readMarketPrice = (body: unknown): number | null => {
  if (!isRecord(body) || !isRecord(body.chart) || !Array.isArray(body.chart.result)) {
    return null;
  }
  const [first] = body.chart.result;
  if (!isRecord(first) || !isRecord(first.meta)) return null;
  const price = first.meta.regularMarketPrice;
  return typeof price === 'number' && Number.isFinite(price) ? price : null;
};

/** Reads the last traded price from Yahoo's chart endpoint. */
export class YahooQuoteProvider implements QuoteProvider {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  static fromConfig(config: Pick<AppConfig, 'quoteApiUrl' | 'quoteTimeoutMs'>): YahooQuoteProvider {
    return new YahooQuoteProvider(config.quoteApiUrl, config.quoteTimeoutMs);
  }

  async getPrice(symbol: string): Promise<number | null> {
    const url = `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}?interval=1d&range=1d`;
    const response = await this.fetchImpl(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (response.status === 404) return null;
    if (!response.ok) {
      throw new Error(`provider responded with HTTP ${response.status}`);
    }
    return readMarketPrice(await response.json());
  }
}

export class QuoteService {
  constructor(private readonly provider: QuoteProvider) {}

  async getPrice(symbol: string): Promise<StockPriceOut> {
    let price: number | null;
    try {
      price = await this.provider.getPrice(symbol);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Error fetching stock price: ${reason}`);
    }

    if (price === null) {
      throw new NotFoundError(`Could not find price for symbol '${symbol}'`);
    }
    return { symbol: symbol.toUpperCase(), price };
  }
}
