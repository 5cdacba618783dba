import { describe, expect, it } from 'vitest';

import {
  CaudenaAddressTransactionsEnvelopeSchema,
  AmountSchema,
  CaudenaTransactionEnvelopeSchema,
  NumericSchema,
} from '../schemas.js';

describe('NumericSchema', () => {
  it('should accept numbers and numeric strings', () => {
    expect(NumericSchema.parse(12.5)).toBe(12.5);
    expect(NumericSchema.parse(' 7 ')).toBe(7);
    expect(NumericSchema.parse('-0.00012')).toBe(-0.00012);
    expect(NumericSchema.parse('1e-8')).toBe(1e-8);
  });

  it('should reject non-numeric strings', () => {
    expect(NumericSchema.safeParse('abc').success).toBe(false);
    expect(NumericSchema.safeParse('').success).toBe(false);
  });
});

describe('AmountSchema', () => {
  it('should keep numeric strings as exact strings', () => {
    expect(AmountSchema.parse(' 123456789012345678901 ')).toBe('123456789012345678901');
    expect(AmountSchema.parse(0.5)).toBe(0.5);
  });

  it('should reject non-numeric strings', () => {
    expect(AmountSchema.safeParse('1,000').success).toBe(false);
  });
});

describe('Caudena envelopes', () => {
  it('should normalise transaction fields and keep unknown ones', () => {
    const parsed = CaudenaTransactionEnvelopeSchema.parse({
      status: true,
      data: {
        hash: 'abc123',
        amount: '0.5',
        confirmations: '12',
        height: null,
        inputs: [{ address: 'addr-1', amount: '0.25', score: 7, contract: false, cluster: 'c-1' }],
        risk_flags: ['mixer'],
      },
    });

    expect(parsed.data?.amount).toBe('0.5');
    expect(parsed.data?.confirmations).toBe(12);
    expect(parsed.data?.height).toBeNull();
    expect(parsed.data?.inputs?.[0]).toEqual({
      address: 'addr-1',
      amount: '0.25',
      score: 7,
      contract: false,
      cluster: 'c-1',
    });
    expect(parsed.data?.['risk_flags']).toEqual(['mixer']);
  });

  it('should require a boolean status', () => {
    expect(CaudenaTransactionEnvelopeSchema.safeParse({ data: {} }).success).toBe(false);
    expect(CaudenaTransactionEnvelopeSchema.safeParse({ status: 'ok', data: {} }).success).toBe(false);
  });

  it('should allow a failed envelope without data', () => {
    const parsed = CaudenaTransactionEnvelopeSchema.parse({ status: false, message: 'not found' });

    expect(parsed.status).toBe(false);
    expect(parsed.data).toBeUndefined();
    expect(parsed['message']).toBe('not found');
  });

  it('should parse address transactions with pagination', () => {
    const parsed = CaudenaAddressTransactionsEnvelopeSchema.parse({
      status: true,
      data: [{ hash: 'tx-1', direction: 'in', total_in: '1.5', time: 1_700_000_000 }],
      pagination: { total_entries: '42', page: 1 },
    });

    expect(parsed.data?.[0]?.total_in).toBe('1.5');
    expect(parsed.pagination?.total_entries).toBe(42);
  });
});
