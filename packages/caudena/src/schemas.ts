import { z } from 'zod';

const NumericStringSchema = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/, 'Expected a numeric string');

/**
 * Counts, scores and timestamps. They arrive either as JSON numbers or as
 * numeric strings and are compared, so both become numbers.
 */
export const NumericSchema = z.union([z.number(), NumericStringSchema.transform(Number)]);

/**
 * Monetary values. Numeric strings stay strings so wei-sized values keep
 * digits beyond 2^53.
 */
export const AmountSchema = z.union([z.number(), NumericStringSchema]);

export const CaudenaIoEntrySchema = z
  .object({
    address: z.string().nullish(),
    amount: AmountSchema.nullish(),
    amount_usd: AmountSchema.nullish(),
    contract: z.boolean().nullish(),
    name: z.string().nullish(),
    score: NumericSchema.nullish(),
  })
  .passthrough();

export const CaudenaEntitySchema = z
  .object({
    category: z.string().nullish(),
    name: z.string().nullish(),
  })
  .passthrough();

export const CaudenaTokenPartySchema = z
  .object({
    address: z.string().nullish(),
    entity: CaudenaEntitySchema.nullish(),
    score: NumericSchema.nullish(),
  })
  .passthrough();

export const CaudenaTokenTransferSchema = z
  .object({
    receiver: CaudenaTokenPartySchema.nullish(),
    sender: CaudenaTokenPartySchema.nullish(),
    token: z
      .object({
        name: z.string().nullish(),
        scam: z.boolean().nullish(),
        spam: z.boolean().nullish(),
        symbol: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    usd: AmountSchema.nullish(),
    value: AmountSchema.nullish(),
  })
  .passthrough();

export const CaudenaTransactionSchema = z
  .object({
    amount: AmountSchema.nullish(),
    amount_usd: AmountSchema.nullish(),
    confirmations: NumericSchema.nullish(),
    currency: z.string().nullish(),
    fee: AmountSchema.nullish(),
    fee_usd: AmountSchema.nullish(),
    gas: AmountSchema.nullish(),
    gas_price: AmountSchema.nullish(),
    gas_used: AmountSchema.nullish(),
    hash: z.string().nullish(),
    height: NumericSchema.nullish(),
    inputs: z.array(CaudenaIoEntrySchema).nullish(),
    outputs: z.array(CaudenaIoEntrySchema).nullish(),
    status: z.boolean().nullish(),
    time: NumericSchema.nullish(),
    tokens: z.array(CaudenaTokenTransferSchema).nullish(),
  })
  .passthrough();

const BalanceSchema = z
  .object({
    balance: AmountSchema.nullish(),
    total_in: AmountSchema.nullish(),
    total_out: AmountSchema.nullish(),
  })
  .passthrough();

export const CaudenaAddressStatsSchema = z
  .object({
    address: z.string().nullish(),
    balance: BalanceSchema.nullish(),
    balance_usd: BalanceSchema.nullish(),
    blockchain: z.string().nullish(),
    entity: CaudenaEntitySchema.nullish(),
    first_seen: NumericSchema.nullish(),
    last_seen: NumericSchema.nullish(),
    score: NumericSchema.nullish(),
    trx_count: z
      .object({
        in: NumericSchema.nullish(),
        out: NumericSchema.nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const CaudenaAddressTransactionSchema = z
  .object({
    confirmations: NumericSchema.nullish(),
    direction: z.string().nullish(),
    fee: AmountSchema.nullish(),
    fee_usd: AmountSchema.nullish(),
    hash: z.string().nullish(),
    time: NumericSchema.nullish(),
    total_in: AmountSchema.nullish(),
    total_in_usd: AmountSchema.nullish(),
    total_out: AmountSchema.nullish(),
    total_out_usd: AmountSchema.nullish(),
  })
  .passthrough();

export const CaudenaPaginationSchema = z
  .object({
    total_entries: NumericSchema.nullish(),
  })
  .passthrough();

/**
 * Every endpoint wraps its payload in `{ status, data, pagination? }`.
 */
export function caudenaEnvelope<TData extends z.ZodTypeAny>(data: TData) {
  return z
    .object({
      data: data.nullish(),
      pagination: CaudenaPaginationSchema.nullish(),
      status: z.boolean(),
    })
    .passthrough();
}

export const CaudenaTransactionEnvelopeSchema = caudenaEnvelope(CaudenaTransactionSchema);
export const CaudenaAddressStatsEnvelopeSchema = caudenaEnvelope(CaudenaAddressStatsSchema);
export const CaudenaAddressTransactionsEnvelopeSchema = caudenaEnvelope(z.array(CaudenaAddressTransactionSchema));

export type CaudenaIoEntry = z.infer<typeof CaudenaIoEntrySchema>;
export type CaudenaEntity = z.infer<typeof CaudenaEntitySchema>;
export type CaudenaTokenParty = z.infer<typeof CaudenaTokenPartySchema>;
export type CaudenaTokenTransfer = z.infer<typeof CaudenaTokenTransferSchema>;
export type CaudenaTransaction = z.infer<typeof CaudenaTransactionSchema>;
export type CaudenaAddressStats = z.infer<typeof CaudenaAddressStatsSchema>;
export type CaudenaAddressTransaction = z.infer<typeof CaudenaAddressTransactionSchema>;
export type CaudenaPagination = z.infer<typeof CaudenaPaginationSchema>;
