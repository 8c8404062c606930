import { createPaymentPlan } from '../calculators/plan.js';
import { solveEquivalentRate } from '../calculators/rate-solver.js';
import { renderSolvedRate } from '../formatters/table.js';
import { num, requiredNum } from './options.js';

interface SolveOptions {
  amount?: string;
  payments?: string;
  payment?: string;
  fee?: string;
}

export function solveCommand(opts: SolveOptions): void {
  const plan = createPaymentPlan({
    purchaseAmount: requiredNum(opts.amount, '--amount'),
    numPayments: requiredNum(opts.payments, '--payments'),
    monthlyPayment: requiredNum(opts.payment, '--payment'),
    monthlyFee: num(opts.fee, 0),
  });

  const solved = solveEquivalentRate(plan);
  console.log(renderSolvedRate(plan, solved));
  console.log('');
}
