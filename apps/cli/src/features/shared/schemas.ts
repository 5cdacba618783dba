import { CurrencySchema, DEFAULT_CURRENCY } from '@txcheck/caudena';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/**
 * Number given on the command line. Blank strings are rejected instead of
 * being coerced to 0.
 */
function numericOption(flag: string) {
  return z.union([z.number(), z.string().trim().min(1, `${flag} must not be empty`)]);
}

export const TargetSelectionSchema = z.object({
  hash: z.string().trim().min(1, '--hash must not be empty').optional(),
  address: z.string().trim().min(1, '--address must not be empty').optional(),
});

/**
 * Check command options (validated at the CLI boundary)
 */
export const CheckCommandOptionsSchema = TargetSelectionSchema.extend({
  currency: CurrencySchema.default(DEFAULT_CURRENCY),
  limit: numericOption('--limit')
    .pipe(
      z.coerce
        .number()
        .int('--limit must be an integer')
        .min(1, '--limit must be between 1 and 50')
        .max(50, '--limit must be between 1 and 50')
    )
    .default(5),
  riskThreshold: numericOption('--risk-threshold')
    .pipe(
      z.coerce
        .number()
        .min(0, '--risk-threshold must be between 0 and 10')
        .max(10, '--risk-threshold must be between 0 and 10')
    )
    .default(4),
  envFile: z.string().min(1).optional(),
})
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape)
  .refine((data) => !!(data.hash || data.address), {
    message: 'Either --hash or --address is required',
  })
  .refine((data) => !(data.hash && data.address), {
    message: 'Cannot specify both --hash and --address',
  });

/**
 * Currencies command options
 */
export const CurrenciesCommandOptionsSchema = JsonFlagSchema.extend({
  family: z.string().optional(),
});
