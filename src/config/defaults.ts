import type { PaymentPlan } from '../types.js';

export const DEFAULT_REGULAR_APR = 27.0;

export const SAMPLE_PLANS: PaymentPlan[] = [
  { purchaseAmount: 1_196.0, numPayments: 18, monthlyPayment: 80.73, monthlyFee: 14.28 },
  { purchaseAmount: 2_365.2, numPayments: 24, monthlyPayment: 129.14, monthlyFee: 30.59 },
  { purchaseAmount: 200.0, numPayments: 18, monthlyPayment: 13.51, monthlyFee: 2.39 },
];

// Rate solver bracket and stopping rules
export const SOLVER_TOLERANCE = 1e-9; // on the present-value residual
export const SOLVER_BRACKET_TOLERANCE = 1e-15;
export const SOLVER_MAX_ITERATIONS = 200;
export const SOLVER_UPPER_BOUND = 10.0; // 1000% per month

export const REFERENCE_HORIZON_MONTHS = 1_000;

// Balances below this are floating-point leftovers and are floored to zero
export const BALANCE_EPSILON = 1e-9;

// No effective rate is reported at or below this balance
export const EFFECTIVE_RATE_MIN_BALANCE = 0.01;
