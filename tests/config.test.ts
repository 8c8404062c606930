import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { loadConfig, parseConfigString } from '../src/config/loader.js';
import { ConfigError, InvalidPlanError } from '../src/errors.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/plans.json', import.meta.url));

describe('loadConfig', () => {
  it('reads plans and the reference APR from a JSON file', () => {
    const config = loadConfig(FIXTURE);
    expect(config.regularApr).toBe(24.5);
    expect(config.paymentPlans).toEqual([
      { purchaseAmount: 1196, numPayments: 18, monthlyPayment: 80.73, monthlyFee: 14.28 },
      { purchaseAmount: 2365.2, numPayments: 24, monthlyPayment: 129.14, monthlyFee: 30.59 },
      { purchaseAmount: 200, numPayments: 18, monthlyPayment: 13.51, monthlyFee: 2.39 },
    ]);
    expect(Object.isFrozen(config.paymentPlans[0])).toBe(true);
  });
});

describe('parseConfigString', () => {
  const plan = { purchase_amount: 500, num_payments: 6, monthly_payment: 90, monthly_fee: 5 };

  it('defaults the reference APR to 27%', () => {
    const config = parseConfigString(JSON.stringify({ payment_plans: [plan] }));
    expect(config.regularApr).toBe(27);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseConfigString('{ "payment_plans": [')).toThrow(/not valid JSON/);
  });

  it('lists every shape problem with its path', () => {
    const raw = JSON.stringify({
      regular_apr: 'high',
      payment_plans: [{ ...plan, num_payments: 2.5, monthly_fee: -1 }],
    });
    try {
      parseConfigString(raw);
      expect.fail('expected a ConfigError');
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      expect(err.code).toBe('INVALID_CONFIG');
      expect(err.issues).toHaveLength(3);
      expect(err.issues.some((i) => i.startsWith('regular_apr:'))).toBe(true);
      expect(err.issues.some((i) => i.startsWith('payment_plans.0.num_payments:'))).toBe(true);
      expect(err.issues.some((i) => i.startsWith('payment_plans.0.monthly_fee:'))).toBe(true);
    }
  });

  it('requires at least one plan', () => {
    expect(() => parseConfigString(JSON.stringify({ payment_plans: [] }))).toThrow(ConfigError);
    expect(() => parseConfigString(JSON.stringify({ regular_apr: 27 }))).toThrow(ConfigError);
  });

  it('applies plan domain rules after the shape check', () => {
    const raw = JSON.stringify({ payment_plans: [{ ...plan, monthly_fee: 90 }] });
    expect(() => parseConfigString(raw)).toThrow(InvalidPlanError);
  });
});
