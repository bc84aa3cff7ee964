import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  clearMarketDataCache,
  getHistoricalVolatility,
  getOptionChain,
  getRiskFreeRate,
  getSpotPrice,
} from './finnhub.actions';
import { DataUnavailableError } from '@/lib/finance/errors';
import { historicalVolatility } from '@/lib/finance/volatility';

const fetchMock = vi.fn(async (_input: string | URL | Request) => new Response('{}'));

const respondWith = (body: unknown, status = 200) => {
  fetchMock.mockImplementation(async () => new Response(JSON.stringify(body), { status }));
};

const requestedUrl = (call = 0) => String(fetchMock.mock.calls[call][0]);

describe('finnhub market data', () => {
  beforeEach(async () => {
    await clearMarketDataCache();
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    vi.stubEnv('FINNHUB_API_KEY', 'test-key');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('getSpotPrice', () => {
    it('returns the current price from the quote endpoint', async () => {
      respondWith({ c: 187.25, pc: 185 });

      await expect(getSpotPrice('AAPL')).resolves.toBe(187.25);
      expect(requestedUrl()).toBe('https://finnhub.io/api/v1/quote?symbol=AAPL&token=test-key');
    });

    it('falls back to the previous close when there is no current price', async () => {
      respondWith({ c: 0, pc: 185 });
      await expect(getSpotPrice('AAPL')).resolves.toBe(185);
    });

    it('fails when neither price is present', async () => {
      respondWith({});
      await expect(getSpotPrice('NOPE')).rejects.toThrow(
        new DataUnavailableError('Unable to fetch current price for NOPE')
      );
    });

    it('serves repeated requests from the cache until the entry expires', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-02T15:00:00Z'));
      respondWith({ c: 50 });

      await getSpotPrice('MSFT');
      await getSpotPrice('MSFT');
      expect(fetchMock).toHaveBeenCalledTimes(1);

      vi.setSystemTime(new Date('2026-03-02T15:00:31Z'));
      await getSpotPrice('MSFT');
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('keys the cache by request', async () => {
      respondWith({ c: 50 });
      await getSpotPrice('MSFT');
      await getSpotPrice('IBM');
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('surfaces HTTP failures as unavailable data', async () => {
      respondWith({ error: 'limit' }, 429);
      await expect(getSpotPrice('AAPL')).rejects.toThrow(
        new DataUnavailableError('Request to /quote failed with status 429')
      );
    });

    it('surfaces network failures as unavailable data', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      await expect(getSpotPrice('AAPL')).rejects.toBeInstanceOf(DataUnavailableError);
    });

    it('rejects a malformed body', async () => {
      respondWith({ c: 'not-a-number' });
      await expect(getSpotPrice('AAPL')).rejects.toThrow(
        new DataUnavailableError('Unexpected response shape from /quote')
      );
    });

    it('does not call out without an API key', async () => {
      vi.stubEnv('FINNHUB_API_KEY', '');
      vi.stubEnv('NEXT_PUBLIC_FINNHUB_API_KEY', '');
      await expect(getSpotPrice('AAPL')).rejects.toThrow(
        new DataUnavailableError('FINNHUB API key is not configured')
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('getHistoricalVolatility', () => {
    it('annualizes the daily closes', async () => {
      respondWith({ s: 'ok', c: [100, 110, 100, 110] });

      await expect(getHistoricalVolatility('AAPL')).resolves.toBeCloseTo(
        historicalVolatility([100, 110, 100, 110]),
        12
      );
      expect(requestedUrl()).toContain('/stock/candle?symbol=AAPL&resolution=D&from=');
    });

    it('uses only the most recent lookback window', async () => {
      respondWith({ s: 'ok', c: [50, 500, 100, 110, 100, 110] });
      await expect(getHistoricalVolatility('AAPL', 3)).resolves.toBeCloseTo(
        historicalVolatility([100, 110, 100, 110]),
        12
      );
    });

    it('requests a day-aligned window and reuses it within the day', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-02T15:00:00Z'));
      respondWith({ s: 'ok', c: [100, 110, 100, 110] });

      await getHistoricalVolatility('AAPL');
      vi.setSystemTime(new Date('2026-03-02T15:00:05Z'));
      await getHistoricalVolatility('AAPL');

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(requestedUrl()).toBe(
        'https://finnhub.io/api/v1/stock/candle?symbol=AAPL&resolution=D&from=1768003200&to=1772496000&token=test-key'
      );
    });

    it('fails when the history is empty', async () => {
      respondWith({ s: 'no_data' });
      await expect(getHistoricalVolatility('AAPL')).rejects.toThrow(
        new DataUnavailableError('No price history available for AAPL')
      );
    });
  });

  describe('getRiskFreeRate', () => {
    it('converts the latest percentage reading to a decimal', async () => {
      respondWith({
        data: [
          { date: '2026-02-27', value: 4.4 },
          { date: '2026-03-02', value: 4.5 },
        ],
      });
      await expect(getRiskFreeRate()).resolves.toBeCloseTo(0.045, 12);
    });

    it('converts readings below one percent', async () => {
      respondWith({ data: [{ date: '2021-03-01', value: 0.05 }] });
      await expect(getRiskFreeRate()).resolves.toBeCloseTo(0.0005, 12);
    });

    it('falls back to the configured default with a warning', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      vi.stubEnv('DEFAULT_RISK_FREE_RATE', '0.0425');
      respondWith({}, 500);

      await expect(getRiskFreeRate()).resolves.toBe(0.0425);
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('getOptionChain', () => {
    const chain = {
      data: [
        {
          expirationDate: '2026-06-19',
          options: {
            CALL: [
              { strike: 100, lastPrice: 7.5, bid: 7.4, ask: 7.6, impliedVolatility: 32 },
              { strike: 160, lastPrice: 0.4, impliedVolatility: 150 },
            ],
            PUT: [{ strike: 100, lastPrice: 5.1, impliedVolatility: 0.8 }, { lastPrice: 1 }],
          },
        },
        {
          expirationDate: '2026-09-18',
          options: { CALL: [{ strike: 110, lastPrice: 4.2 }] },
        },
      ],
    };

    it('flattens calls and puts and converts percent volatility to a decimal', async () => {
      respondWith(chain);

      await expect(getOptionChain('AAPL', '2026-06-19')).resolves.toEqual([
        {
          ticker: 'AAPL',
          optionType: 'call',
          strikePrice: 100,
          expirationDate: '2026-06-19',
          lastPrice: 7.5,
          bid: 7.4,
          ask: 7.6,
          impliedVolatility: 0.32,
        },
        {
          ticker: 'AAPL',
          optionType: 'call',
          strikePrice: 160,
          expirationDate: '2026-06-19',
          lastPrice: 0.4,
          bid: undefined,
          ask: undefined,
          impliedVolatility: 1.5,
        },
        {
          ticker: 'AAPL',
          optionType: 'put',
          strikePrice: 100,
          expirationDate: '2026-06-19',
          lastPrice: 5.1,
          bid: undefined,
          ask: undefined,
          impliedVolatility: 0.008,
        },
      ]);
    });

    it('returns every expiry when none is requested', async () => {
      respondWith(chain);
      const quotes = await getOptionChain('AAPL');
      expect(quotes.map((quote) => quote.expirationDate)).toEqual([
        '2026-06-19',
        '2026-06-19',
        '2026-06-19',
        '2026-09-18',
      ]);
    });

    it('fails when the requested expiry is missing', async () => {
      respondWith(chain);
      await expect(getOptionChain('AAPL', '2027-01-15')).rejects.toBeInstanceOf(
        DataUnavailableError
      );
    });
  });
});
