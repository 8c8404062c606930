import type { PaymentPlan, SolvedRate, SolverOptions } from '../types.js';
import { InvalidPlanError, RateSolverConvergenceError } from '../errors.js';
import {
  SOLVER_BRACKET_TOLERANCE,
  SOLVER_MAX_ITERATIONS,
  SOLVER_TOLERANCE,
  SOLVER_UPPER_BOUND,
} from '../config/defaults.js';
import { createPaymentPlan } from './plan.js';

/**
 * Present value of an ordinary annuity:
 * PV = PMT × (1 - (1+r)^-n) / r, and PMT × n at r = 0.
 *
 * @param payment - Payment per period
 * @param rate - Periodic rate (e.g. 0.02 for 2% per month)
 * @param periods - Number of payments
 */
export function annuityPresentValue(payment: number, rate: number, periods: number): number {
  if (rate === 0) return payment * periods;
  return (payment * (1 - Math.pow(1 + rate, -periods))) / rate;
}

/**
 * Find the monthly rate at which the plan's payments, discounted as an
 * ordinary annuity, are worth exactly the purchase amount.
 *
 * PV(r) is strictly decreasing for r > -1, so a sign change over [0, upperBound]
 * brackets a single root and bisection always narrows onto it.
 */
export function solveEquivalentRate(input: PaymentPlan, options: SolverOptions = {}): SolvedRate {
  const plan = createPaymentPlan(input);
  const tolerance = options.tolerance ?? SOLVER_TOLERANCE;
  const bracketTolerance = options.bracketTolerance ?? SOLVER_BRACKET_TOLERANCE;
  const maxIterations = options.maxIterations ?? SOLVER_MAX_ITERATIONS;
  const upperBound = options.upperBound ?? SOLVER_UPPER_BOUND;

  const residual = (rate: number): number =>
    annuityPresentValue(plan.monthlyPayment, rate, plan.numPayments) - plan.purchaseAmount;

  const atZero = residual(0);
  if (atZero < -tolerance) {
    throw new InvalidPlanError(
      `Payments total ${(plan.monthlyPayment * plan.numPayments).toFixed(2)}, less than the purchase amount ${plan.purchaseAmount.toFixed(2)}; no non-negative rate reproduces this plan`,
      'Check the monthly payment and the number of payments',
    );
  }
  if (Math.abs(atZero) <= tolerance) {
    // Payments only return the purchase: no room left for a positive fee
    if (plan.monthlyFee > 0) {
      throw new InvalidPlanError(
        `Payments total exactly the purchase amount ${plan.purchaseAmount.toFixed(2)}, yet the plan charges a monthly fee of ${plan.monthlyFee.toFixed(2)}`,
        'The payments must cover the purchase amount plus the fees',
      );
    }
    return toSolvedRate(0, 0, atZero);
  }

  const atUpper = residual(upperBound);
  if (atUpper > 0) {
    throw new RateSolverConvergenceError(
      `Equivalent rate lies above the search bound of ${upperBound} per month`,
      upperBound,
      [0, upperBound],
      atUpper,
      0,
    );
  }

  let lo = 0;
  let hi = upperBound;
  let mid = lo;
  let midResidual = atZero;

  for (let i = 1; i <= maxIterations; i++) {
    mid = (lo + hi) / 2;
    midResidual = residual(mid);

    if (Math.abs(midResidual) < tolerance || hi - lo < bracketTolerance) {
      return toSolvedRate(mid, i, midResidual);
    }

    // PV too high → rate too low
    if (midResidual > 0) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  throw new RateSolverConvergenceError(
    `Rate solver did not converge within ${maxIterations} iterations (best estimate ${mid}, residual ${midResidual})`,
    mid,
    [lo, hi],
    midResidual,
    maxIterations,
  );
}

function toSolvedRate(periodicRate: number, iterations: number, residual: number): SolvedRate {
  const annualRate = periodicRate * 12;
  return {
    periodicRate,
    annualRate,
    apr: annualRate * 100,
    iterations,
    residual,
  };
}
