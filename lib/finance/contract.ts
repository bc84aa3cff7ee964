import { ValidationError } from './errors';
import type { OptionContract, OptionType, UnpricedOptionContract } from '@/types/options';

const OPTION_TYPES: readonly OptionType[] = ['call', 'put'];

const requireFinite = (field: string, value: number) => {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number`, field);
  }
};

const requirePositive = (field: string, value: number) => {
  requireFinite(field, value);
  if (value <= 0) {
    throw new ValidationError(`${field} must be greater than 0`, field);
  }
};

const requireNonNegative = (field: string, value: number) => {
  requireFinite(field, value);
  if (value < 0) {
    throw new ValidationError(`${field} must not be negative`, field);
  }
};

export const assertValidUnpricedContract = (contract: UnpricedOptionContract): void => {
  requirePositive('spotPrice', contract.spotPrice);
  requirePositive('strikePrice', contract.strikePrice);
  requireNonNegative('timeToExpiration', contract.timeToExpiration);
  requireFinite('riskFreeRate', contract.riskFreeRate);
  if (contract.dividendYield !== undefined) {
    requireNonNegative('dividendYield', contract.dividendYield);
  }
  if (!OPTION_TYPES.includes(contract.optionType)) {
    throw new ValidationError(`optionType must be 'call' or 'put'`, 'optionType');
  }
};

export const assertValidContract = (contract: OptionContract): void => {
  assertValidUnpricedContract(contract);
  requireNonNegative('volatility', contract.volatility);
};

export const createOptionContract = (input: OptionContract): OptionContract => {
  assertValidContract(input);
  return Object.freeze({
    spotPrice: input.spotPrice,
    strikePrice: input.strikePrice,
    timeToExpiration: input.timeToExpiration,
    riskFreeRate: input.riskFreeRate,
    volatility: input.volatility,
    optionType: input.optionType,
    dividendYield: input.dividendYield ?? 0,
  });
};
