/**
 * Tests for the in-memory ledger
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryLedger } from '../src/ledger.js';
import { InsufficientBalanceError, TransferFailure, ValidationError } from '../src/errors.js';

describe('MemoryLedger', () => {
  let ledger: MemoryLedger;

  beforeEach(() => {
    ledger = new MemoryLedger('TKA', 'pool');
    ledger.mint('alice', 100n).approve('alice', 60n);
  });

  it('should pull into the pool account and consume allowance', () => {
    ledger.transferIn('alice', 40n);

    expect(ledger.balanceOf('alice')).toBe(60n);
    expect(ledger.balanceOf('pool')).toBe(40n);
    expect(ledger.allowance('alice')).toBe(20n);
  });

  it('should reject a pull beyond the allowance', () => {
    try {
      ledger.transferIn('alice', 61n);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TransferFailure);
      if (error instanceof TransferFailure) {
        expect(error.details?.reason).toBe('insufficient allowance');
        expect(error.cause).toBeInstanceOf(InsufficientBalanceError);
      }
    }
    expect(ledger.balanceOf('alice')).toBe(100n);
  });

  it('should reject a pull beyond the balance without consuming allowance', () => {
    ledger.approve('alice', 500n);

    expect(() => ledger.transferIn('alice', 101n)).toThrow('Transfer in of 101 TKA for alice failed: insufficient balance');
    expect(ledger.allowance('alice')).toBe(500n);
  });

  it('should push out of the pool account', () => {
    ledger.transferIn('alice', 40n);
    ledger.transferOut('bob', 15n);

    expect(ledger.balanceOf('bob')).toBe(15n);
    expect(ledger.balanceOf('pool')).toBe(25n);
  });

  it('should reject a push beyond the pool balance', () => {
    expect(() => ledger.transferOut('bob', 1n)).toThrow(TransferFailure);
  });

  it('should restore allowance on refund', () => {
    ledger.transferIn('alice', 40n);
    ledger.refund('alice', 40n);

    expect(ledger.balanceOf('alice')).toBe(100n);
    expect(ledger.allowance('alice')).toBe(60n);
    expect(ledger.balanceOf('pool')).toBe(0n);
  });

  it('should reject negative mints and approvals', () => {
    expect(() => ledger.mint('alice', -1n)).toThrow(ValidationError);
    expect(() => ledger.approve('alice', -1n)).toThrow(ValidationError);
  });
});
