import type {
  AnalysisResult,
  AnalyzeOptions,
  ComparisonRow,
  PaymentPlan,
  PayoffRecommendation,
  PlanMetrics,
  PlanTotals,
  ReferencePlanSummary,
} from '../types.js';
import { ReferencePlanNonConvergentError } from '../errors.js';
import { EFFECTIVE_RATE_MIN_BALANCE, REFERENCE_HORIZON_MONTHS } from '../config/defaults.js';
import { simulate } from '../calculators/amortization.js';
import { createPaymentPlan } from '../calculators/plan.js';
import { solveEquivalentRate } from '../calculators/rate-solver.js';

/**
 * Compare a fixed-fee plan against a revolving account charging `regularApr`
 * and work out when paying off the rest of the balance becomes worthwhile.
 *
 * @param regularApr - Reference annual rate as a percentage (e.g. 27 for 27%)
 */
export function analyze(input: PaymentPlan, regularApr: number, options: AnalyzeOptions = {}): AnalysisResult {
  const plan = createPaymentPlan(input);
  const horizon = options.horizonMonths ?? REFERENCE_HORIZON_MONTHS;
  const reference = simulateReferencePlan(plan, regularApr, horizon);
  const equivalentRate = solveEquivalentRate(plan, options.solver);

  const schedule = buildComparisonSchedule(plan, reference.monthlyRate);
  const unfavorableMonths = schedule.filter((row) => !row.favorable);
  const recommendation = findOptimalPayoff(schedule, reference.monthlyRate);
  const totals = planTotals(plan, reference);
  const metrics = planMetrics(plan, schedule, totals);

  return {
    plan,
    regularApr,
    equivalentRate,
    schedule,
    unfavorableMonths,
    recommendation,
    reference,
    totals,
    metrics,
  };
}

/**
 * Pay the plan's monthly payment into an account charging the reference APR
 * and count the months until the balance reaches zero.
 */
export function simulateReferencePlan(
  plan: PaymentPlan,
  regularApr: number,
  horizon: number = REFERENCE_HORIZON_MONTHS,
): ReferencePlanSummary {
  if (!Number.isFinite(regularApr) || regularApr <= 0) {
    throw new ReferencePlanNonConvergentError(
      `Reference APR must be positive, got ${regularApr}`,
      regularApr,
      horizon,
      plan.purchaseAmount,
    );
  }

  const monthlyRate = regularApr / 100 / 12;
  const firstInterest = plan.purchaseAmount * monthlyRate;
  if (firstInterest >= plan.monthlyPayment) {
    throw new ReferencePlanNonConvergentError(
      `Monthly payment ${plan.monthlyPayment.toFixed(2)} does not cover ${firstInterest.toFixed(2)} of interest at ${regularApr}% APR`,
      regularApr,
      horizon,
      plan.purchaseAmount,
    );
  }

  const result = simulate({
    principal: plan.purchaseAmount,
    mode: { kind: 'proportional', rate: monthlyRate },
    payment: plan.monthlyPayment,
    periods: horizon,
  });

  if (result.endingBalance > 0) {
    throw new ReferencePlanNonConvergentError(
      `Balance of ${result.endingBalance.toFixed(2)} remains after ${horizon} months at ${regularApr}% APR`,
      regularApr,
      horizon,
      result.endingBalance,
    );
  }

  return {
    monthlyRate,
    payments: result.periodsUsed,
    totalInterest: result.totalInterestOrFees,
    schedule: result.steps,
  };
}

/**
 * Month-by-month fixed-fee schedule, with the interest the reference rate
 * would charge on the balance carried into the following month.
 */
export function buildComparisonSchedule(plan: PaymentPlan, monthlyRate: number): ComparisonRow[] {
  const { steps } = simulate({
    principal: plan.purchaseAmount,
    mode: { kind: 'fixed-fee', fee: plan.monthlyFee },
    payment: plan.monthlyPayment,
    periods: plan.numPayments,
  });

  return steps.map((step) => {
    const balance = step.balanceAfter;
    const fee = step.interestOrFee;
    const regularInterest = balance * monthlyRate;
    const effectiveMonthlyRate = balance > EFFECTIVE_RATE_MIN_BALANCE ? fee / balance : 0;

    return {
      month: step.period,
      balanceBefore: step.balanceBefore,
      principalPayment: step.principalComponent,
      fee,
      balance,
      regularInterest,
      difference: fee - regularInterest,
      effectiveMonthlyRate,
      effectiveAnnualRate: effectiveMonthlyRate * 12,
      favorable: fee <= regularInterest,
    };
  });
}

/**
 * The last month in which the fee is no more than the reference interest.
 * Paying off the remaining balance right after it avoids every later
 * unfavorable month. When no month is favorable the advice is month 0:
 * pay the whole purchase off before the first fee. Null when nothing
 * unfavorable follows the last favorable month.
 *
 * @param monthlyRate - Reference periodic rate, used to price month 0
 */
export function findOptimalPayoff(schedule: ComparisonRow[], monthlyRate: number): PayoffRecommendation | null {
  if (schedule.length === 0) return null;

  let lastFavorable = -1;
  for (let i = 0; i < schedule.length; i++) {
    if (schedule[i].favorable) lastFavorable = i;
  }

  if (lastFavorable < 0) {
    const first = schedule[0];
    return {
      month: 0,
      payoffMonth: 1,
      remainingBalance: first.balanceBefore,
      feeAtMonth: first.fee,
      regularInterestAtMonth: first.balanceBefore * monthlyRate,
      unfavorableMonthsAvoided: schedule.length,
    };
  }

  const after = schedule.slice(lastFavorable + 1);
  const avoided = after.filter((row) => !row.favorable).length;
  if (avoided === 0) return null;

  const row = schedule[lastFavorable];
  return {
    month: row.month,
    payoffMonth: row.month + 1,
    remainingBalance: row.balance,
    feeAtMonth: row.fee,
    regularInterestAtMonth: row.regularInterest,
    unfavorableMonthsAvoided: avoided,
  };
}

export function planTotals(plan: PaymentPlan, reference: ReferencePlanSummary): PlanTotals {
  const totalCost = plan.numPayments * plan.monthlyPayment;
  const totalFees = totalCost - plan.purchaseAmount;
  const regularTotalCost = plan.purchaseAmount + reference.totalInterest;

  return {
    totalCost,
    totalFees,
    regularInterest: reference.totalInterest,
    regularTotalCost,
    regularPayments: reference.payments,
    difference: totalCost - regularTotalCost,
  };
}

/**
 * Secondary rate figures. The average-balance ones are approximate: they take
 * the plain mean of every starting balance over the stated term (months after
 * an early finish count as zero) and ignore when within the year it falls.
 */
export function planMetrics(plan: PaymentPlan, schedule: ComparisonRow[], totals: PlanTotals): PlanMetrics {
  const years = plan.numPayments / 12;
  const averageBalance = schedule.reduce((sum, row) => sum + row.balanceBefore, 0) / plan.numPayments;

  return {
    simpleInterestApr: totals.totalFees / plan.purchaseAmount / years,
    monthlyFeePercent: plan.monthlyFee / plan.purchaseAmount,
    averageBalance,
    averageBalanceApr: totals.totalFees / averageBalance / years,
    feeOnlyApr: (plan.monthlyFee * plan.numPayments) / averageBalance / years,
  };
}
