import { solveImpliedVolatility } from './impliedVolatility';
import { priceOption } from './optionPricing';
import type { MarketAnalysis, MarketQuote, OptionContract } from '@/types/options';

/**
 * Compares the model price with an observed trade and backs out the
 * volatility the market is implying. A quote the solver rejects is reported
 * alongside the comparison rather than failing it.
 */
export const analyzeMarketPrice = (
  contract: OptionContract,
  quote: MarketQuote
): MarketAnalysis => {
  const theoretical = priceOption(contract);
  const difference = quote.price - theoretical.price;
  const base = {
    theoretical,
    marketPrice: quote.price,
    difference,
    percentDifference: theoretical.price === 0 ? null : (difference / theoretical.price) * 100,
    moneyness: contract.spotPrice / contract.strikePrice,
  };

  // volatility has no effect on an expired contract
  if (contract.timeToExpiration === 0) {
    return { ...base, impliedVolatility: null, impliedVolatilityFailure: null };
  }

  const implied = solveImpliedVolatility(contract, quote.price);
  return {
    ...base,
    impliedVolatility: implied.ok ? implied.volatility : null,
    impliedVolatilityFailure: implied.ok
      ? null
      : { reason: implied.reason, message: implied.error.message },
  };
};
