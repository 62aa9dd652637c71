import { describe, expect, it } from 'vitest';

import { assertMoneyErr, assertOk, balanceOf, openAccount } from '../../__tests__/test-utils.js';
import { deposit, withdraw } from '../../accounts/account-operations.js';
import { splitTransfer, splitValue, validateWeights } from '../distribution.js';

describe('validateWeights', () => {
  it('accepts weights summing exactly to 1', () => {
    const weights = assertOk(validateWeights([0.1, 0.2, 0.7]));
    expect(weights.map((weight) => weight.toString())).toEqual(['0.1', '0.2', '0.7']);
  });

  it('rejects an empty list', () => {
    const error = assertMoneyErr(validateWeights([]), 'INVALID_DISTRIBUTION');
    expect(error.message).toBe('At least one weight is required');
  });

  it('rejects negative weights even when the sum is 1', () => {
    const error = assertMoneyErr(validateWeights([1.5, -0.5]), 'INVALID_DISTRIBUTION');
    expect(error.message).toBe('Weight 1 must not be negative, got -0.5');
  });

  it('rejects non-numeric weights', () => {
    assertMoneyErr(validateWeights(['half', '0.5']), 'INVALID_DISTRIBUTION');
  });

  it('rejects sums other than 1', () => {
    const error = assertMoneyErr(validateWeights([0.5, 0.4]), 'INVALID_DISTRIBUTION');
    expect(error.message).toBe('Weights must sum to 1, got 0.9');
  });
});

describe('splitTransfer', () => {
  it('withdraws once and deposits each weighted share', () => {
    const outcome = assertOk(
      splitTransfer(openAccount(1, 'BRL', 10), [openAccount(2, 'BRL'), openAccount(3, 'BRL')], 10, [0.6, 0.4])
    );

    expect(balanceOf(outcome.sender)).toBe('0.00');
    expect(outcome.receivers.map(balanceOf)).toEqual(['6.00', '4.00']);
    expect(outcome.undistributed.amount.isZero()).toBe(true);
  });

  it('reports the residue left by flooring the shares', () => {
    const outcome = assertOk(
      splitTransfer(
        openAccount(1, 'BRL', 10),
        [openAccount(2, 'BRL'), openAccount(3, 'BRL'), openAccount(4, 'BRL')],
        10,
        ['0.3333', '0.3333', '0.3334']
      )
    );

    expect(balanceOf(outcome.sender)).toBe('0.00');
    expect(outcome.receivers.map(balanceOf)).toEqual(['3.33', '3.33', '3.33']);
    expect(outcome.undistributed.amount.toFixed(2)).toBe('0.01');
    expect(outcome.undistributed.currency).toBe('BRL');
  });

  it('leaves a receiver with a zero share unchanged', () => {
    const idle = openAccount(3, 'BRL', 1);
    const outcome = assertOk(splitTransfer(openAccount(1, 'BRL', 10), [openAccount(2, 'BRL'), idle], 5, [1, 0]));

    expect(outcome.receivers[1]).toBe(idle);
    expect(balanceOf(outcome.receivers[0] ?? idle)).toBe('5.00');
    expect(balanceOf(outcome.sender)).toBe('5.00');
  });

  it('fails with INVALID_DISTRIBUTION when the weights do not sum to 1', () => {
    assertMoneyErr(
      splitTransfer(openAccount(1, 'BRL', 100), [openAccount(2, 'BRL'), openAccount(3, 'BRL')], 50, [0.5, 0.4]),
      'INVALID_DISTRIBUTION'
    );
  });

  it('fails with INVALID_DISTRIBUTION when receivers and weights differ in count', () => {
    const error = assertMoneyErr(
      splitTransfer(openAccount(1, 'BRL', 100), [openAccount(2, 'BRL'), openAccount(3, 'BRL')], 50, [1]),
      'INVALID_DISTRIBUTION'
    );
    expect(error.message).toBe('Got 2 accounts for 1 weights');
  });

  it('fails with UNSUPPORTED_CURRENCY for a receiver in another currency', () => {
    assertMoneyErr(
      splitTransfer(openAccount(1, 'BRL', 100), [openAccount(2, 'BRL'), openAccount(3, 'USD')], 50, [0.5, 0.5]),
      'UNSUPPORTED_CURRENCY'
    );
  });

  it('fails with INSUFFICIENT_FUNDS when the sender cannot cover the value', () => {
    assertMoneyErr(splitTransfer(openAccount(1, 'BRL', 10), [openAccount(2, 'BRL')], 50, [1]), 'INSUFFICIENT_FUNDS');
  });

  it('fails with VALUE_TOO_LOW when a nonzero share floors below one atomic unit', () => {
    assertMoneyErr(
      splitTransfer(openAccount(1, 'BRL', 10), [openAccount(2, 'BRL'), openAccount(3, 'BRL')], 1, ['0.999', '0.001']),
      'VALUE_TOO_LOW'
    );
  });
});

describe('splitValue', () => {
  it('splits a deposit across accounts', () => {
    const accounts = assertOk(
      splitValue([openAccount(1, 'BRL'), openAccount(2, 'BRL'), openAccount(3, 'BRL')], 10, [0.5, 0.3, 0.2], deposit)
    );
    expect(accounts.map(balanceOf)).toEqual(['5.00', '3.00', '2.00']);
  });

  it('splits a cost across accounts', () => {
    const accounts = assertOk(
      splitValue([openAccount(1, 'JPY', 100), openAccount(2, 'JPY', 100)], 90, [0.5, 0.5], withdraw)
    );
    expect(accounts.map(balanceOf)).toEqual(['55', '55']);
  });

  it('uses the first account currency for every share', () => {
    assertMoneyErr(
      splitValue([openAccount(1, 'BRL'), openAccount(2, 'USD')], 10, [0.5, 0.5], deposit),
      'UNSUPPORTED_CURRENCY'
    );
  });

  it('fails with INVALID_DISTRIBUTION for no accounts', () => {
    const error = assertMoneyErr(splitValue([], 10, [1], deposit), 'INVALID_DISTRIBUTION');
    expect(error.message).toBe('At least one account is required');
  });

  it('fails with INSUFFICIENT_FUNDS when one account cannot pay its share', () => {
    assertMoneyErr(
      splitValue([openAccount(1, 'BRL', 100), openAccount(2, 'BRL', 1)], 10, [0.5, 0.5], withdraw),
      'INSUFFICIENT_FUNDS'
    );
  });
});
