import type { CaudenaTransaction } from '@txcheck/caudena';
import { describe, expect, it } from 'vitest';

import { buildCheckParams, findSuspiciousContracts } from './check-utils.js';

describe('findSuspiciousContracts', () => {
  const transaction: CaudenaTransaction = {
    inputs: [
      { address: '0xaaa', contract: true, name: 'Mixer', score: 2 },
      { address: '0xzero', contract: true, score: 0 },
      { address: '0xwallet', contract: false, score: 1 },
      { address: '0xunscored', contract: true, score: null },
      { address: '0xsafe', contract: true, score: 4 },
    ],
    outputs: [{ address: '0xbbb', contract: true, score: 3.5 }],
  };

  it('should flag contracts scoring below the threshold', () => {
    expect(findSuspiciousContracts(transaction, 4)).toEqual([
      { address: '0xaaa', entity: 'Mixer', score: 2, side: 'Input' },
      { address: '0xbbb', entity: undefined, score: 3.5, side: 'Output' },
    ]);
  });

  it('should never flag a contract scored zero', () => {
    expect(findSuspiciousContracts({ outputs: [{ address: 'a', contract: true, score: 0 }] }, 4)).toEqual([]);
    expect(findSuspiciousContracts(transaction, 10).map((contract) => contract.address)).toEqual([
      '0xaaa',
      '0xsafe',
      '0xbbb',
    ]);
  });

  it('should honour a custom threshold', () => {
    expect(findSuspiciousContracts(transaction, 3).map((contract) => contract.address)).toEqual(['0xaaa']);
  });

  it('should return nothing for a transaction without inputs or outputs', () => {
    expect(findSuspiciousContracts({}, 4)).toEqual([]);
  });
});

describe('buildCheckParams', () => {
  it('should build transaction params from a hash', () => {
    const result = buildCheckParams({ hash: 'abc', currency: 'eth', limit: 5, riskThreshold: 3 });

    expect(result._unsafeUnwrap()).toEqual({ currency: 'eth', hash: 'abc', kind: 'transaction', riskThreshold: 3 });
  });

  it('should build address params from an address', () => {
    const result = buildCheckParams({ address: 'TTest', currency: 'trx', limit: 12, riskThreshold: 4 });

    expect(result._unsafeUnwrap()).toEqual({ address: 'TTest', currency: 'trx', kind: 'address', limit: 12 });
  });

  it('should fail without a target', () => {
    const result = buildCheckParams({ currency: 'btc', limit: 5, riskThreshold: 4 });

    expect(result.isErr() && result.error.message).toBe('Either --hash or --address is required');
  });
});
