'use server';

import {
  getHistoricalVolatility,
  getOptionChain,
  getRiskFreeRate,
  getSpotPrice,
} from '@/lib/actions/finnhub.actions';
import { analyzeMarketPrice } from '@/lib/finance/analysis';
import { createOptionContract } from '@/lib/finance/contract';
import { DataUnavailableError, ValidationError } from '@/lib/finance/errors';
import { solveImpliedVolatility } from '@/lib/finance/impliedVolatility';
import { priceOption } from '@/lib/finance/optionPricing';
import { generateOptionSurface } from '@/lib/finance/surface';
import type {
  ContractEcho,
  ContractRequest,
  ImpliedVolatilityRequestPayload,
  ImpliedVolatilityResponsePayload,
  MarketAnalysisRequestPayload,
  MarketAnalysisResponsePayload,
  OptionContract,
  OptionPricingRequestPayload,
  OptionPricingResponsePayload,
  OptionQuote,
  SurfaceRequestPayload,
  SurfaceResponsePayload,
  TimeToExpirationInput,
} from '@/types/options';

const DAYS_PER_YEAR = 365;
const YEAR_MS = 365.25 * 24 * 60 * 60 * 1000;

const computeTimeToExpiration = (input: TimeToExpirationInput) => {
  if ('timeToExpiration' in input) return input.timeToExpiration;
  if ('daysToExpiration' in input) return input.daysToExpiration / DAYS_PER_YEAR;

  const expiry = new Date(input.expiration);
  if (Number.isNaN(expiry.getTime())) {
    throw new ValidationError('Invalid expiration date', 'expiration');
  }
  return Math.max((expiry.getTime() - Date.now()) / YEAR_MS, 0);
};

const resolveVolatility = async (ticker: string, volatility: number | undefined) => {
  if (volatility !== undefined) return volatility;
  try {
    return await getHistoricalVolatility(ticker);
  } catch (error) {
    if (error instanceof DataUnavailableError) {
      throw new DataUnavailableError(
        `Historical volatility for ${ticker} is unavailable; supply volatility explicitly`,
        { cause: error }
      );
    }
    throw error;
  }
};

type ResolvedRequest = {
  ticker: string;
  contract: OptionContract;
  echo: ContractEcho;
};

const resolveContract = async (
  payload: ContractRequest,
  volatility: number | undefined
): Promise<ResolvedRequest> => {
  const ticker = payload.ticker.trim().toUpperCase();
  if (!ticker) throw new ValidationError('Ticker is required', 'ticker');

  const timeToExpiration = computeTimeToExpiration(payload);
  const [spotPrice, riskFreeRate, resolvedVolatility] = await Promise.all([
    payload.spotPrice ?? getSpotPrice(ticker),
    payload.riskFreeRate ?? getRiskFreeRate(),
    resolveVolatility(ticker, volatility),
  ]);

  const contract = createOptionContract({
    spotPrice,
    strikePrice: payload.strikePrice,
    timeToExpiration,
    riskFreeRate,
    volatility: resolvedVolatility,
    optionType: payload.optionType,
    dividendYield: payload.dividendYield ?? 0,
  });

  return {
    ticker,
    contract,
    echo: {
      ticker,
      optionType: contract.optionType,
      strikePrice: contract.strikePrice,
      spotPrice: contract.spotPrice,
      timeToExpiration: contract.timeToExpiration,
      riskFreeRate: contract.riskFreeRate,
      dividendYield: contract.dividendYield ?? 0,
    },
  };
};

export async function priceOptionContract(
  payload: OptionPricingRequestPayload
): Promise<OptionPricingResponsePayload> {
  const { contract, echo } = await resolveContract(payload, payload.volatility);
  return {
    ...echo,
    volatility: contract.volatility,
    result: priceOption(contract),
  };
}

export async function generatePriceSurface(
  payload: SurfaceRequestPayload
): Promise<SurfaceResponsePayload> {
  const { ticker, contract } = await resolveContract(payload, payload.volatility);
  const grid = generateOptionSurface(contract, {
    priceRangePct: payload.priceRangePct,
    timeHorizon: payload.timeHorizon,
    minTime: payload.minTime,
    pricePoints: payload.pricePoints,
    timePoints: payload.timePoints,
  });

  return {
    ticker,
    strikePrice: contract.strikePrice,
    optionType: contract.optionType,
    volatility: contract.volatility,
    currentPrice: contract.spotPrice,
    ...grid,
  };
}

export async function impliedVolatilityForQuote(
  payload: ImpliedVolatilityRequestPayload
): Promise<ImpliedVolatilityResponsePayload> {
  // volatility is the unknown here; price the contract with a placeholder
  const { contract, echo } = await resolveContract(payload, 0);
  const result = solveImpliedVolatility(contract, payload.marketPrice);
  if (!result.ok) {
    throw result.error;
  }

  return {
    ...echo,
    marketPrice: payload.marketPrice,
    impliedVolatility: result.volatility,
    iterations: result.iterations,
    method: result.method,
  };
}

const tradedPrice = (quote: OptionQuote) => {
  if (quote.lastPrice !== undefined && quote.lastPrice > 0) return quote.lastPrice;
  if (quote.bid !== undefined && quote.ask !== undefined && quote.bid > 0 && quote.ask >= quote.bid) {
    return (quote.bid + quote.ask) / 2;
  }
  return undefined;
};

const resolveMarketPrice = async (payload: MarketAnalysisRequestPayload, ticker: string) => {
  if (payload.marketPrice !== undefined) return payload.marketPrice;
  if (!('expiration' in payload)) {
    throw new ValidationError(
      'marketPrice is required unless an expiration date is given to look it up',
      'marketPrice'
    );
  }

  const chain = await getOptionChain(ticker, payload.expiration);
  const quote = chain.find(
    (candidate) =>
      candidate.optionType === payload.optionType && candidate.strikePrice === payload.strikePrice
  );
  const price = quote && tradedPrice(quote);
  if (price === undefined) {
    throw new DataUnavailableError(
      `No traded ${payload.optionType} price for ${ticker} at strike ${payload.strikePrice} expiring ${payload.expiration}`
    );
  }
  return price;
};

export async function analyzeOptionQuote(
  payload: MarketAnalysisRequestPayload
): Promise<MarketAnalysisResponsePayload> {
  const { ticker, contract, echo } = await resolveContract(payload, payload.volatility);
  const marketPrice = await resolveMarketPrice(payload, ticker);
  return {
    ...echo,
    volatility: contract.volatility,
    ...analyzeMarketPrice(contract, { price: marketPrice }),
  };
}
