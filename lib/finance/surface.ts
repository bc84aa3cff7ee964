import { assertValidContract } from './contract';
import { ValidationError } from './errors';
import { linspace } from './math';
import { priceOption } from './optionPricing';
import type { OptionContract, SurfaceGrid, SurfaceOptions } from '@/types/options';

export const MAX_SURFACE_POINTS = 50;
const MIN_SURFACE_POINTS = 2;

export const SURFACE_DEFAULTS: Required<SurfaceOptions> = {
  priceRangePct: 0.5,
  timeHorizon: 1,
  minTime: 1 / 365,
  pricePoints: 50,
  timePoints: 30,
};

const resolveOptions = (options: SurfaceOptions): Required<SurfaceOptions> => {
  const settings: Required<SurfaceOptions> = {
    priceRangePct: options.priceRangePct ?? SURFACE_DEFAULTS.priceRangePct,
    timeHorizon: options.timeHorizon ?? SURFACE_DEFAULTS.timeHorizon,
    minTime: options.minTime ?? SURFACE_DEFAULTS.minTime,
    pricePoints: options.pricePoints ?? SURFACE_DEFAULTS.pricePoints,
    timePoints: options.timePoints ?? SURFACE_DEFAULTS.timePoints,
  };
  const { priceRangePct, timeHorizon, minTime, pricePoints, timePoints } = settings;

  if (!Number.isFinite(priceRangePct) || priceRangePct <= 0 || priceRangePct >= 1) {
    throw new ValidationError('priceRangePct must be between 0 and 1 (exclusive)', 'priceRangePct');
  }
  if (!Number.isFinite(timeHorizon) || timeHorizon <= 0) {
    throw new ValidationError('timeHorizon must be greater than 0', 'timeHorizon');
  }
  if (!Number.isFinite(minTime) || minTime <= 0 || minTime > timeHorizon) {
    throw new ValidationError('minTime must be in (0, timeHorizon]', 'minTime');
  }
  for (const [field, count] of [
    ['pricePoints', pricePoints],
    ['timePoints', timePoints],
  ] as const) {
    if (!Number.isInteger(count) || count < MIN_SURFACE_POINTS || count > MAX_SURFACE_POINTS) {
      throw new ValidationError(
        `${field} must be an integer between ${MIN_SURFACE_POINTS} and ${MAX_SURFACE_POINTS}`,
        field
      );
    }
  }

  return settings;
};

const closestIndex = (values: number[], target: number) =>
  values.reduce(
    (best, value, index) => (Math.abs(value - target) < Math.abs(values[best] - target) ? index : best),
    0
  );

/**
 * Prices the contract over a stock-price x time-to-expiry grid.
 *
 * Rows follow `times` (smallest time remaining first), columns follow
 * `stockPrices`. Every other contract field is held fixed. A node that fails
 * to price aborts the whole grid.
 */
export const generateOptionSurface = (
  contract: OptionContract,
  options: SurfaceOptions = {}
): SurfaceGrid => {
  assertValidContract(contract);
  const { priceRangePct, timeHorizon, minTime, pricePoints, timePoints } = resolveOptions(options);

  const stockPrices = linspace(
    contract.spotPrice * (1 - priceRangePct),
    contract.spotPrice * (1 + priceRangePct),
    pricePoints
  );
  const times = linspace(minTime, timeHorizon, timePoints);

  const optionValues = times.map((timeToExpiration) =>
    stockPrices.map((spotPrice) => priceOption({ ...contract, spotPrice, timeToExpiration }).price)
  );

  const priceIndex = closestIndex(stockPrices, contract.spotPrice);
  const timeIndex = Math.floor(times.length / 2);

  return {
    stockPrices,
    times,
    optionValues,
    spotMarker: {
      priceIndex,
      timeIndex,
      value: optionValues[timeIndex][priceIndex],
    },
  };
};
