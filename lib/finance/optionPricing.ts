import { assertValidContract } from './contract';
import { ValidationError } from './errors';
import { normCdf, normPdf } from './math';
import type { OptionContract, PricingResult } from '@/types/options';

const PERCENT = 100;
// below this sigma * sqrt(t) underflows and gamma overflows; price as zero volatility
const MIN_VOLATILITY = 1e-12;

type PricingContext = Required<OptionContract>;

const withDefaults = (contract: OptionContract): PricingContext => ({
  ...contract,
  dividendYield: contract.dividendYield ?? 0,
});

const ensureFiniteResult = (result: PricingResult): PricingResult => {
  for (const [field, value] of Object.entries(result)) {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Contract produces a non-finite ${field}`, field);
    }
  }
  return result;
};

export const intrinsicValue = (contract: OptionContract): number =>
  contract.optionType === 'call'
    ? Math.max(0, contract.spotPrice - contract.strikePrice)
    : Math.max(0, contract.strikePrice - contract.spotPrice);

const priceAtExpiry = (context: PricingContext): PricingResult => {
  const { spotPrice, strikePrice, optionType } = context;
  return {
    price: intrinsicValue(context),
    delta:
      optionType === 'call'
        ? spotPrice > strikePrice
          ? 1
          : 0
        : spotPrice < strikePrice
          ? -1
          : 0,
    gamma: 0,
    theta: 0,
    vega: 0,
    rho: 0,
  };
};

// Zero volatility: the terminal price is the forward, so the payoff is known today.
const priceDeterministic = (context: PricingContext): PricingResult => {
  const { spotPrice, strikePrice, timeToExpiration: t, riskFreeRate, dividendYield, optionType } =
    context;
  const discountedSpot = spotPrice * Math.exp(-dividendYield * t);
  const discountedStrike = strikePrice * Math.exp(-riskFreeRate * t);
  const sign = optionType === 'call' ? 1 : -1;
  const payoff = sign * (discountedSpot - discountedStrike);

  if (payoff <= 0) {
    return { price: 0, delta: 0, gamma: 0, theta: 0, vega: 0, rho: 0 };
  }

  return {
    price: payoff,
    delta: sign * Math.exp(-dividendYield * t),
    gamma: 0,
    theta: sign * (dividendYield * discountedSpot - riskFreeRate * discountedStrike),
    vega: 0,
    rho: (sign * strikePrice * t * Math.exp(-riskFreeRate * t)) / PERCENT,
  };
};

const priceBlackScholes = (context: PricingContext): PricingResult => {
  const {
    spotPrice,
    strikePrice,
    timeToExpiration: t,
    riskFreeRate,
    volatility: sigma,
    dividendYield,
    optionType,
  } = context;

  const sqrtT = Math.sqrt(t);
  const d1 =
    (Math.log(spotPrice / strikePrice) + (riskFreeRate - dividendYield + 0.5 * sigma * sigma) * t) /
    (sigma * sqrtT);
  const d2 = d1 - sigma * sqrtT;

  const dividendDiscount = Math.exp(-dividendYield * t);
  const rateDiscount = Math.exp(-riskFreeRate * t);
  const discountedSpot = spotPrice * dividendDiscount;
  const discountedStrike = strikePrice * rateDiscount;
  const density = normPdf(d1);

  const price =
    optionType === 'call'
      ? discountedSpot * normCdf(d1) - discountedStrike * normCdf(d2)
      : discountedStrike * normCdf(-d2) - discountedSpot * normCdf(-d1);

  const decay = -(discountedSpot * density * sigma) / (2 * sqrtT);
  const theta =
    optionType === 'call'
      ? decay - riskFreeRate * discountedStrike * normCdf(d2) + dividendYield * discountedSpot * normCdf(d1)
      : decay + riskFreeRate * discountedStrike * normCdf(-d2) - dividendYield * discountedSpot * normCdf(-d1);

  return {
    price,
    delta: optionType === 'call' ? dividendDiscount * normCdf(d1) : -dividendDiscount * normCdf(-d1),
    gamma: (dividendDiscount * density) / (spotPrice * sigma * sqrtT),
    theta,
    vega: (discountedSpot * density * sqrtT) / PERCENT,
    rho:
      optionType === 'call'
        ? (strikePrice * t * rateDiscount * normCdf(d2)) / PERCENT
        : (-strikePrice * t * rateDiscount * normCdf(-d2)) / PERCENT,
  };
};

/**
 * Black-Scholes-Merton price and Greeks for a European option.
 *
 * Theta is reported per year (divide by 365 for daily decay), vega per
 * volatility point and rho per rate point. Expired and zero-volatility
 * contracts take their limiting values instead of dividing by
 * `sigma * sqrt(t)`; a volatility below 1e-12 counts as zero.
 */
export const priceOption = (contract: OptionContract): PricingResult => {
  assertValidContract(contract);
  const context = withDefaults(contract);

  if (context.timeToExpiration === 0) {
    return priceAtExpiry(context);
  }
  if (context.volatility < MIN_VOLATILITY) {
    return ensureFiniteResult(priceDeterministic(context));
  }
  return ensureFiniteResult(priceBlackScholes(context));
};

/** Raw dV/dsigma, used by the implied volatility solver. */
export const rawVega = (contract: OptionContract): number => priceOption(contract).vega * PERCENT;

export const priceOptionChain = (
  contract: OptionContract,
  strikes: number[]
): Array<{ strikePrice: number; result: PricingResult }> =>
  strikes.map((strikePrice) => ({
    strikePrice,
    result: priceOption({ ...contract, strikePrice }),
  }));

/** call - put - (S e^(-qT) - K e^(-rT)); zero up to rounding for any valid contract. */
export const putCallParityGap = (contract: OptionContract): number => {
  const { spotPrice, strikePrice, timeToExpiration: t, riskFreeRate, dividendYield } =
    withDefaults(contract);
  const call = priceOption({ ...contract, optionType: 'call' }).price;
  const put = priceOption({ ...contract, optionType: 'put' }).price;
  return (
    call -
    put -
    (spotPrice * Math.exp(-dividendYield * t) - strikePrice * Math.exp(-riskFreeRate * t))
  );
};
