import type { PaymentPlan } from '../types.js';
import { InvalidPlanError } from '../errors.js';

/**
 * Validate the domain constraints of a payment plan and return it frozen.
 */
export function createPaymentPlan(input: PaymentPlan): PaymentPlan {
  const { purchaseAmount, numPayments, monthlyPayment, monthlyFee } = input;

  if (!Number.isFinite(purchaseAmount) || purchaseAmount <= 0) {
    throw new InvalidPlanError(`Purchase amount must be positive, got ${purchaseAmount}`);
  }
  if (!Number.isInteger(numPayments) || numPayments < 1) {
    throw new InvalidPlanError(`Number of payments must be a whole number of at least 1, got ${numPayments}`);
  }
  if (!Number.isFinite(monthlyPayment) || monthlyPayment <= 0) {
    throw new InvalidPlanError(`Monthly payment must be positive, got ${monthlyPayment}`);
  }
  if (!Number.isFinite(monthlyFee) || monthlyFee < 0) {
    throw new InvalidPlanError(`Monthly fee must not be negative, got ${monthlyFee}`);
  }
  if (monthlyPayment - monthlyFee <= 0) {
    throw new InvalidPlanError(
      `Monthly payment ${monthlyPayment} does not exceed the monthly fee ${monthlyFee}; the balance never goes down`,
      'The payment must include a principal share on top of the fee',
    );
  }

  return Object.freeze({ purchaseAmount, numPayments, monthlyPayment, monthlyFee });
}

