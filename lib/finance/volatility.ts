import { DataUnavailableError } from './errors';

export const TRADING_DAYS_PER_YEAR = 252;

/**
 * Annualized close-to-close volatility: sample standard deviation of daily
 * log returns scaled by sqrt(tradingDays).
 */
export const historicalVolatility = (
  closes: number[],
  tradingDays = TRADING_DAYS_PER_YEAR
): number => {
  const usable = closes.filter((close) => Number.isFinite(close) && close > 0);
  if (usable.length < 3) {
    throw new DataUnavailableError(
      `At least 3 positive closing prices are required, received ${usable.length}`
    );
  }

  const returns = usable.slice(1).map((close, i) => Math.log(close / usable[i]));
  const mean = returns.reduce((acc, value) => acc + value, 0) / returns.length;
  const variance =
    returns.reduce((acc, value) => acc + (value - mean) ** 2, 0) / (returns.length - 1);

  return Math.sqrt(variance) * Math.sqrt(tradingDays);
};
