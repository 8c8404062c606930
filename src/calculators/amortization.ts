import type { AmortizationInput, AmortizationSchedule, AmortizationStep, InterestMode } from '../types.js';
import { InvalidPlanError } from '../errors.js';
import { BALANCE_EPSILON } from '../config/defaults.js';

/**
 * Charge for one period: balance × rate in proportional mode, the flat fee otherwise.
 */
export function periodCharge(mode: InterestMode, balance: number): number {
  return mode.kind === 'proportional' ? balance * mode.rate : mode.fee;
}

/**
 * Simulate month-by-month balance decay with a fixed payment.
 *
 * Each period: charge per `mode`, principal = payment - charge,
 * balanceAfter = balanceBefore - principal. A balance that would go negative,
 * or that is left with only a rounding residue below `BALANCE_EPSILON`, is
 * floored to zero; before the last period that ends the schedule early.
 * A positive balance left after the last period is kept as `endingBalance`.
 */
export function simulate(input: AmortizationInput): AmortizationSchedule {
  const { principal, mode, payment, periods } = input;

  if (!Number.isFinite(principal) || principal <= 0) {
    throw new InvalidPlanError(`Principal must be positive, got ${principal}`);
  }
  if (!Number.isFinite(payment) || payment <= 0) {
    throw new InvalidPlanError(`Payment must be positive, got ${payment}`);
  }
  if (!Number.isInteger(periods) || periods < 1) {
    throw new InvalidPlanError(`Period count must be a whole number of at least 1, got ${periods}`);
  }
  if (mode.kind === 'proportional' && !(mode.rate >= 0)) {
    throw new InvalidPlanError(`Periodic rate must not be negative, got ${mode.rate}`);
  }
  if (mode.kind === 'fixed-fee' && !(mode.fee >= 0)) {
    throw new InvalidPlanError(`Fee must not be negative, got ${mode.fee}`);
  }

  const steps: AmortizationStep[] = [];
  let balance = principal;
  let totalCharges = 0;
  let totalPrincipal = 0;

  for (let period = 1; period <= periods; period++) {
    const charge = periodCharge(mode, balance);
    let principalComponent = payment - charge;

    if (principalComponent <= 0) {
      throw new InvalidPlanError(
        `Payment ${payment} does not cover the charge of ${charge.toFixed(2)} in period ${period}; the balance never amortizes`,
        'Raise the payment or lower the rate',
      );
    }

    let balanceAfter = balance - principalComponent;
    if (balanceAfter < BALANCE_EPSILON) {
      principalComponent = balance;
      balanceAfter = 0;
    }

    steps.push({
      period,
      balanceBefore: balance,
      principalComponent,
      interestOrFee: charge,
      balanceAfter,
    });
    totalCharges += charge;
    totalPrincipal += principalComponent;
    balance = balanceAfter;

    if (balance === 0) break;
  }

  return {
    steps,
    periodsUsed: steps.length,
    finishedEarly: steps.length < periods,
    totalInterestOrFees: totalCharges,
    totalPrincipal,
    endingBalance: balance,
  };
}
