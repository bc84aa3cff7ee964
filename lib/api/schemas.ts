import { z } from 'zod';
import { MAX_SURFACE_POINTS } from '@/lib/finance/surface';
import type { TimeToExpirationInput } from '@/types/options';

const expirySchema = z
  .object({
    timeToExpiration: z.number().min(0).optional(),
    daysToExpiration: z.number().min(0).optional(),
    expiration: z.string().min(1).optional(),
  })
  .transform((value, ctx): TimeToExpirationInput => {
    const provided = [value.timeToExpiration, value.daysToExpiration, value.expiration].filter(
      (field) => field !== undefined
    );
    if (provided.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Provide exactly one of timeToExpiration, daysToExpiration or expiration',
        path: ['timeToExpiration'],
      });
      return z.NEVER;
    }
    if (value.timeToExpiration !== undefined) return { timeToExpiration: value.timeToExpiration };
    if (value.daysToExpiration !== undefined) return { daysToExpiration: value.daysToExpiration };
    return { expiration: value.expiration ?? '' };
  });

const contractFields = {
  ticker: z.string().trim().min(1),
  optionType: z.enum(['call', 'put']),
  strikePrice: z.number().positive(),
  spotPrice: z.number().positive().optional(),
  riskFreeRate: z.number().finite().optional(),
  dividendYield: z.number().min(0).optional(),
};

const volatilityField = {
  volatility: z.number().min(0).optional(),
};

export const pricingSchema = z.object({ ...contractFields, ...volatilityField }).and(expirySchema);

export const surfaceSchema = z
  .object({
    ...contractFields,
    ...volatilityField,
    priceRangePct: z.number().gt(0).lt(1).optional(),
    timeHorizon: z.number().positive().optional(),
    minTime: z.number().positive().optional(),
    pricePoints: z.number().int().min(2).max(MAX_SURFACE_POINTS).optional(),
    timePoints: z.number().int().min(2).max(MAX_SURFACE_POINTS).optional(),
  })
  .and(expirySchema);

export const impliedVolatilitySchema = z
  .object({ ...contractFields, marketPrice: z.number().min(0) })
  .and(expirySchema);

export const analysisSchema = z
  .object({ ...contractFields, ...volatilityField, marketPrice: z.number().min(0).optional() })
  .and(expirySchema);
