'use server';

import { z } from 'zod';
import { getServerConfig } from '@/lib/config';
import { DataUnavailableError } from '@/lib/finance/errors';
import { historicalVolatility } from '@/lib/finance/volatility';
import type { OptionQuote, OptionType } from '@/types/options';

type CacheEntry = {
  expiresAt: number;
  body: unknown;
};

// JSON bodies keyed by request path and query (token excluded); expired entries are swept on insert.
const responseCache = new Map<string, CacheEntry>();

const DAY_SECONDS = 24 * 60 * 60;

const pruneExpired = (now: number) => {
  for (const [key, entry] of responseCache) {
    if (entry.expiresAt <= now) responseCache.delete(key);
  }
};

const quoteSchema = z.object({
  c: z.number().optional(),
  pc: z.number().optional(),
});

const candleSchema = z.object({
  s: z.string(),
  c: z.array(z.number()).optional(),
});

const economicSchema = z.object({
  data: z.array(z.object({ value: z.number(), date: z.string() })).optional(),
});

const finnhubContractSchema = z.object({
  strike: z.number().optional(),
  strikePrice: z.number().optional(),
  lastPrice: z.number().nullish(),
  bid: z.number().nullish(),
  ask: z.number().nullish(),
  impliedVolatility: z.number().nullish(),
});

type FinnhubContract = z.infer<typeof finnhubContractSchema>;

const optionChainSchema = z.object({
  data: z
    .array(
      z.object({
        expirationDate: z.string(),
        options: z
          .object({
            CALL: z.array(finnhubContractSchema).optional(),
            PUT: z.array(finnhubContractSchema).optional(),
          })
          .optional(),
      })
    )
    .optional(),
});

const ensureToken = () => {
  const { finnhubApiKey } = getServerConfig();
  if (!finnhubApiKey) {
    throw new DataUnavailableError('FINNHUB API key is not configured');
  }
  return finnhubApiKey;
};

const toQueryString = (params: Record<string, string | number>) =>
  Object.entries(params)
    .map(([key, value]) => `${key}=${encodeURIComponent(String(value))}`)
    .join('&');

export async function fetchJSON<T>(
  path: string,
  params: Record<string, string | number>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ttlSeconds: number
): Promise<T> {
  const token = ensureToken();
  const key = `${path}?${toQueryString(params)}`;
  const now = Date.now();
  const cached = responseCache.get(key);

  let body: unknown;
  if (cached && cached.expiresAt > now) {
    body = cached.body;
  } else {
    const { finnhubBaseUrl } = getServerConfig();
    const url = `${finnhubBaseUrl}${key}&token=${encodeURIComponent(token)}`;

    let response: Response;
    try {
      response = await fetch(url);
    } catch (error) {
      throw new DataUnavailableError(`Request to ${path} failed`, { cause: error });
    }
    if (!response.ok) {
      throw new DataUnavailableError(`Request to ${path} failed with status ${response.status}`);
    }

    try {
      body = await response.json();
    } catch (error) {
      throw new DataUnavailableError(`Response from ${path} is not valid JSON`, { cause: error });
    }
    pruneExpired(now);
    responseCache.set(key, { expiresAt: now + ttlSeconds * 1000, body });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new DataUnavailableError(`Unexpected response shape from ${path}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export async function clearMarketDataCache(): Promise<void> {
  responseCache.clear();
}

export async function getSpotPrice(ticker: string): Promise<number> {
  const data = await fetchJSON('/quote', { symbol: ticker }, quoteSchema, 30);
  const price = data.c || data.pc;
  if (!price || !Number.isFinite(price)) {
    throw new DataUnavailableError(`Unable to fetch current price for ${ticker}`);
  }
  return price;
}

export async function getHistoricalVolatility(ticker: string, lookbackDays = 30): Promise<number> {
  // end of the current UTC day, so one day's requests share a cache key
  const to = (Math.floor(Date.now() / 1000 / DAY_SECONDS) + 1) * DAY_SECONDS;
  // calendar window wide enough to hold lookbackDays trading sessions
  const from = to - Math.ceil(lookbackDays * 1.5 + 7) * DAY_SECONDS;
  const candles = await fetchJSON(
    '/stock/candle',
    { symbol: ticker, resolution: 'D', from, to },
    candleSchema,
    3600
  );

  if (candles.s !== 'ok' || !candles.c?.length) {
    throw new DataUnavailableError(`No price history available for ${ticker}`);
  }
  return historicalVolatility(candles.c.slice(-(lookbackDays + 1)));
}

export async function getRiskFreeRate(): Promise<number> {
  const { defaultRiskFreeRate } = getServerConfig();
  try {
    const data = await fetchJSON('/economic', { symbol: 'FRED/DGS3MO' }, economicSchema, 10800);
    const values = data.data ?? [];
    const latest = values.at(-1);
    // FRED DGS3MO is quoted in percent
    if (latest && Number.isFinite(latest.value)) {
      return latest.value / 100;
    }
  } catch (error) {
    console.warn(
      `Unable to fetch risk-free rate, falling back to default ${defaultRiskFreeRate}:`,
      error
    );
  }
  return defaultRiskFreeRate;
}

// Finnhub quotes option implied volatility in percent (32.5 for 32.5%)
const impliedVolatilityFromPercent = (input: number | null | undefined) => {
  if (input === null || input === undefined || !Number.isFinite(input)) return undefined;
  return input / 100;
};

const toOptionQuote = (
  raw: FinnhubContract,
  optionType: OptionType,
  ticker: string,
  expirationDate: string
): OptionQuote | undefined => {
  const strikePrice = raw.strike ?? raw.strikePrice;
  if (strikePrice === undefined) return undefined;
  return {
    ticker,
    optionType,
    strikePrice,
    expirationDate,
    lastPrice: raw.lastPrice ?? undefined,
    bid: raw.bid ?? undefined,
    ask: raw.ask ?? undefined,
    impliedVolatility: impliedVolatilityFromPercent(raw.impliedVolatility),
  };
};

export async function getOptionChain(ticker: string, expiration?: string): Promise<OptionQuote[]> {
  const chain = await fetchJSON('/stock/option-chain', { symbol: ticker }, optionChainSchema, 600);
  const slices = (chain.data ?? []).filter(
    (slice) => !expiration || slice.expirationDate.substring(0, 10) === expiration.substring(0, 10)
  );

  if (!slices.length) {
    throw new DataUnavailableError(
      expiration
        ? `No option chain for ${ticker} expiring ${expiration}`
        : `No option chain available for ${ticker}`
    );
  }

  return slices.flatMap((slice) => {
    const calls = (slice.options?.CALL ?? []).map((raw) =>
      toOptionQuote(raw, 'call', ticker, slice.expirationDate)
    );
    const puts = (slice.options?.PUT ?? []).map((raw) =>
      toOptionQuote(raw, 'put', ticker, slice.expirationDate)
    );
    return [...calls, ...puts].filter((quote): quote is OptionQuote => quote !== undefined);
  });
}
