import { describe, expect, it } from 'vitest';
import { periodCharge, simulate } from '../src/calculators/amortization.js';
import { InvalidPlanError } from '../src/errors.js';

describe('periodCharge', () => {
  it('proportional mode → balance × rate', () => {
    expect(periodCharge({ kind: 'proportional', rate: 0.01 }, 500)).toBe(5);
  });

  it('fixed-fee mode → flat fee regardless of balance', () => {
    expect(periodCharge({ kind: 'fixed-fee', fee: 14.28 }, 500)).toBe(14.28);
    expect(periodCharge({ kind: 'fixed-fee', fee: 14.28 }, 5)).toBe(14.28);
  });
});

describe('simulate', () => {
  it('proportional mode: 1% monthly on 100 with 60 payments', () => {
    // Month 1: interest 1, principal 59 → 41
    // Month 2: interest 0.41, principal capped at 41 → 0
    const result = simulate({ principal: 100, mode: { kind: 'proportional', rate: 0.01 }, payment: 60, periods: 5 });

    expect(result.periodsUsed).toBe(2);
    expect(result.finishedEarly).toBe(true);
    expect(result.steps[0]).toEqual({
      period: 1,
      balanceBefore: 100,
      principalComponent: 59,
      interestOrFee: 1,
      balanceAfter: 41,
    });
    expect(result.steps[1].interestOrFee).toBeCloseTo(0.41, 10);
    expect(result.steps[1].principalComponent).toBe(41);
    expect(result.steps[1].balanceAfter).toBe(0);
    expect(result.totalInterestOrFees).toBeCloseTo(1.41, 10);
    expect(result.totalPrincipal).toBe(100);
    expect(result.endingBalance).toBe(0);
  });

  it('fixed-fee mode: constant fee, constant principal', () => {
    // 1196 − 66.45 × k; the 18th payment overshoots by 0.10 and is floored to zero
    const result = simulate({ principal: 1_196, mode: { kind: 'fixed-fee', fee: 14.28 }, payment: 80.73, periods: 18 });

    expect(result.periodsUsed).toBe(18);
    expect(result.finishedEarly).toBe(false);
    expect(result.steps[0].balanceAfter).toBeCloseTo(1_129.55, 6);
    expect(result.steps[7].balanceAfter).toBeCloseTo(664.4, 6);
    expect(result.steps[17].principalComponent).toBeCloseTo(66.35, 6);
    expect(result.steps[17].balanceAfter).toBe(0);
    expect(result.steps.every((s) => s.interestOrFee === 14.28)).toBe(true);
    expect(result.totalInterestOrFees).toBeCloseTo(14.28 * 18, 6);
  });

  it('both modes produce the same step shape', () => {
    const a = simulate({ principal: 100, mode: { kind: 'proportional', rate: 0.02 }, payment: 30, periods: 5 });
    const b = simulate({ principal: 100, mode: { kind: 'fixed-fee', fee: 2 }, payment: 30, periods: 5 });
    expect(Object.keys(a.steps[0]).sort()).toEqual(Object.keys(b.steps[0]).sort());
  });

  it('over-payment ends the schedule early and reports the periods used', () => {
    const result = simulate({ principal: 100, mode: { kind: 'fixed-fee', fee: 1 }, payment: 51, periods: 12 });
    expect(result.periodsUsed).toBe(2);
    expect(result.finishedEarly).toBe(true);
    expect(result.steps.map((s) => s.balanceAfter)).toEqual([50, 0]);
  });

  it('keeps a residual balance when the term is too short', () => {
    const result = simulate({ principal: 100, mode: { kind: 'fixed-fee', fee: 0 }, payment: 30, periods: 3 });
    expect(result.periodsUsed).toBe(3);
    expect(result.endingBalance).toBe(10);
  });

  it('zero rate → straight-line repayment', () => {
    const result = simulate({ principal: 120, mode: { kind: 'proportional', rate: 0 }, payment: 10, periods: 12 });
    expect(result.totalInterestOrFees).toBe(0);
    expect(result.steps[11].balanceAfter).toBe(0);
  });

  it('fails when the payment never covers the interest', () => {
    expect(() =>
      simulate({ principal: 1_000, mode: { kind: 'proportional', rate: 0.1 }, payment: 100, periods: 12 }),
    ).toThrow(InvalidPlanError);
  });

  it('fails when the fee eats the whole payment', () => {
    expect(() => simulate({ principal: 1_000, mode: { kind: 'fixed-fee', fee: 50 }, payment: 50, periods: 12 })).toThrow(
      /never amortizes/,
    );
  });

  it.each([
    ['zero principal', { principal: 0 }],
    ['negative payment', { payment: -5 }],
    ['zero periods', { periods: 0 }],
    ['fractional periods', { periods: 1.5 }],
  ])('rejects %s', (_label, override) => {
    expect(() =>
      simulate({ principal: 100, mode: { kind: 'proportional', rate: 0.01 }, payment: 10, periods: 12, ...override }),
    ).toThrow(InvalidPlanError);
  });

  it('rejects a negative rate or fee', () => {
    expect(() => simulate({ principal: 100, mode: { kind: 'proportional', rate: -0.01 }, payment: 10, periods: 12 })).toThrow(
      InvalidPlanError,
    );
    expect(() => simulate({ principal: 100, mode: { kind: 'fixed-fee', fee: -1 }, payment: 10, periods: 12 })).toThrow(
      InvalidPlanError,
    );
  });

  it('floors a floating-point residue on the last period to zero', () => {
    // 129.14 - 30.59 is 98.54999999999998, so 24 principal shares fall 1.4e-13 short of 2365.20
    const schedule = simulate({ principal: 2_365.2, mode: { kind: 'fixed-fee', fee: 30.59 }, payment: 129.14, periods: 24 });
    expect(schedule.periodsUsed).toBe(24);
    expect(schedule.finishedEarly).toBe(false);
    expect(schedule.endingBalance).toBe(0);
    expect(schedule.steps[23].balanceAfter).toBe(0);
    expect(schedule.steps[23].principalComponent).toBe(schedule.steps[23].balanceBefore);
    expect(schedule.totalPrincipal).toBeCloseTo(2_365.2, 9);
  });

  it('is deterministic', () => {
    const input = { principal: 2_365.2, mode: { kind: 'fixed-fee', fee: 30.59 } as const, payment: 129.14, periods: 24 };
    expect(simulate(input)).toEqual(simulate(input));
  });
});
