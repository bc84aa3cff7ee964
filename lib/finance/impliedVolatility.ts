import { assertValidUnpricedContract } from './contract';
import { ConvergenceError, InvalidQuoteError, ValidationError } from './errors';
import { priceOption, rawVega } from './optionPricing';
import type { UnpricedOptionContract } from '@/types/options';

export type ImpliedVolatilityOptions = {
  initialGuess?: number;
  tolerance?: number; // on the price residual
  maxIterations?: number; // Newton-Raphson budget
  bisectionIterations?: number;
  lowerVolatility?: number;
  upperVolatility?: number;
};

export type ImpliedVolatilityResult =
  | {
      ok: true;
      volatility: number;
      iterations: number;
      method: 'newton' | 'bisection';
    }
  | {
      ok: false;
      reason: 'invalidQuote';
      error: InvalidQuoteError;
    }
  | {
      ok: false;
      reason: 'noConvergence';
      error: ConvergenceError;
    };

const DEFAULTS: Required<ImpliedVolatilityOptions> = {
  initialGuess: 0.2,
  tolerance: 1e-6,
  maxIterations: 100,
  bisectionIterations: 200,
  lowerVolatility: 1e-4,
  upperVolatility: 5,
};

const resolveSettings = (options: ImpliedVolatilityOptions): Required<ImpliedVolatilityOptions> => ({
  initialGuess: options.initialGuess ?? DEFAULTS.initialGuess,
  tolerance: options.tolerance ?? DEFAULTS.tolerance,
  maxIterations: options.maxIterations ?? DEFAULTS.maxIterations,
  bisectionIterations: options.bisectionIterations ?? DEFAULTS.bisectionIterations,
  lowerVolatility: options.lowerVolatility ?? DEFAULTS.lowerVolatility,
  upperVolatility: options.upperVolatility ?? DEFAULTS.upperVolatility,
});

const MIN_VEGA = 1e-8;
const MIN_BRACKET_WIDTH = 1e-10;

/**
 * No-arbitrage band for a European option price: the discounted forward
 * payoff below, the discounted spot (call) or discounted strike (put) above.
 */
export const priceBounds = (contract: UnpricedOptionContract) => {
  const { spotPrice, strikePrice, timeToExpiration: t, riskFreeRate, optionType } = contract;
  const discountedSpot = spotPrice * Math.exp(-(contract.dividendYield ?? 0) * t);
  const discountedStrike = strikePrice * Math.exp(-riskFreeRate * t);

  return optionType === 'call'
    ? { lower: Math.max(0, discountedSpot - discountedStrike), upper: discountedSpot }
    : { lower: Math.max(0, discountedStrike - discountedSpot), upper: discountedStrike };
};

const bisect = (
  residual: (sigma: number) => number,
  settings: Required<ImpliedVolatilityOptions>,
  spentIterations: number
): ImpliedVolatilityResult => {
  let low = settings.lowerVolatility;
  let high = settings.upperVolatility;
  let residualLow = residual(low);
  const residualHigh = residual(high);

  if (Math.abs(residualLow) < settings.tolerance) {
    return { ok: true, volatility: low, iterations: spentIterations, method: 'bisection' };
  }
  if (Math.abs(residualHigh) < settings.tolerance) {
    return { ok: true, volatility: high, iterations: spentIterations, method: 'bisection' };
  }
  if (Math.sign(residualLow) === Math.sign(residualHigh)) {
    return {
      ok: false,
      reason: 'noConvergence',
      error: new ConvergenceError(
        `No volatility in [${low}, ${high}] reproduces the market price`,
        spentIterations
      ),
    };
  }

  for (let i = 1; i <= settings.bisectionIterations; i++) {
    const mid = 0.5 * (low + high);
    const residualMid = residual(mid);

    if (Math.abs(residualMid) < settings.tolerance || high - low < MIN_BRACKET_WIDTH) {
      return { ok: true, volatility: mid, iterations: spentIterations + i, method: 'bisection' };
    }

    if (Math.sign(residualMid) === Math.sign(residualLow)) {
      low = mid;
      residualLow = residualMid;
    } else {
      high = mid;
    }
  }

  const iterations = spentIterations + settings.bisectionIterations;
  return {
    ok: false,
    reason: 'noConvergence',
    error: new ConvergenceError(
      `Implied volatility did not converge after ${iterations} iterations`,
      iterations
    ),
  };
};

/**
 * Recovers the volatility that reproduces `marketPrice` under Black-Scholes.
 *
 * Newton-Raphson on the price residual, falling back to bisection when vega
 * vanishes, an iterate leaves the search range or the Newton budget runs out.
 * Malformed contracts throw ValidationError; quote and convergence failures
 * come back as tagged results.
 */
export const solveImpliedVolatility = (
  contract: UnpricedOptionContract,
  marketPrice: number,
  options: ImpliedVolatilityOptions = {}
): ImpliedVolatilityResult => {
  assertValidUnpricedContract(contract);
  if (contract.timeToExpiration === 0) {
    throw new ValidationError(
      'timeToExpiration must be greater than 0 to imply a volatility',
      'timeToExpiration'
    );
  }
  if (!Number.isFinite(marketPrice)) {
    throw new ValidationError('marketPrice must be a finite number', 'marketPrice');
  }

  const settings = resolveSettings(options);
  const { lower, upper } = priceBounds(contract);
  if (marketPrice < lower || marketPrice > upper) {
    return {
      ok: false,
      reason: 'invalidQuote',
      error: new InvalidQuoteError(marketPrice, lower, upper),
    };
  }

  const residual = (volatility: number) =>
    priceOption({ ...contract, volatility }).price - marketPrice;

  let sigma = settings.initialGuess;
  for (let i = 1; i <= settings.maxIterations; i++) {
    const diff = residual(sigma);
    if (Math.abs(diff) < settings.tolerance) {
      return { ok: true, volatility: sigma, iterations: i, method: 'newton' };
    }

    const vega = rawVega({ ...contract, volatility: sigma });
    if (vega < MIN_VEGA) {
      return bisect(residual, settings, i);
    }

    sigma -= diff / vega;
    if (!Number.isFinite(sigma) || sigma <= 0 || sigma > settings.upperVolatility) {
      return bisect(residual, settings, i);
    }
  }

  return bisect(residual, settings, settings.maxIterations);
};

export const impliedVolatilityOrThrow = (
  contract: UnpricedOptionContract,
  marketPrice: number,
  options?: ImpliedVolatilityOptions
): number => {
  const result = solveImpliedVolatility(contract, marketPrice, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.volatility;
};
