// ─── Plan Types ───

export interface PaymentPlan {
  readonly purchaseAmount: number;
  readonly numPayments: number;
  readonly monthlyPayment: number; // includes the fee
  readonly monthlyFee: number; // constant charge per month, independent of balance
}

export interface AnalysisConfig {
  regularApr: number; // annual % e.g. 27 for 27%
  paymentPlans: PaymentPlan[];
}

// ─── Amortization Types ───

export type InterestMode =
  | { kind: 'proportional'; rate: number } // periodic rate, e.g. 0.0225
  | { kind: 'fixed-fee'; fee: number };

export interface AmortizationInput {
  principal: number;
  mode: InterestMode;
  payment: number;
  periods: number;
}

export interface AmortizationStep {
  period: number; // 1-based
  balanceBefore: number;
  principalComponent: number;
  interestOrFee: number;
  balanceAfter: number;
}

export interface AmortizationSchedule {
  steps: AmortizationStep[];
  periodsUsed: number;
  finishedEarly: boolean;
  totalInterestOrFees: number;
  totalPrincipal: number;
  endingBalance: number;
}

// ─── Rate Solver Types ───

export interface SolvedRate {
  periodicRate: number; // monthly
  annualRate: number; // periodicRate × 12
  apr: number; // annualRate as a percentage
  iterations: number;
  residual: number; // present value minus purchase amount at the returned rate
}

export interface SolverOptions {
  tolerance?: number;
  bracketTolerance?: number;
  maxIterations?: number;
  upperBound?: number;
}

// ─── Comparison Types ───

export interface ComparisonRow {
  month: number;
  balanceBefore: number;
  principalPayment: number;
  fee: number;
  balance: number; // carried into the next month
  regularInterest: number; // reference APR applied to `balance`
  difference: number; // fee - regularInterest
  effectiveMonthlyRate: number; // fee / balance, fraction
  effectiveAnnualRate: number;
  favorable: boolean; // fee <= regularInterest
}

export interface PayoffRecommendation {
  month: number; // last favorable month; 0 means pay off before the first fee
  payoffMonth: number;
  remainingBalance: number;
  feeAtMonth: number;
  regularInterestAtMonth: number;
  unfavorableMonthsAvoided: number;
}

export interface ReferencePlanSummary {
  monthlyRate: number;
  payments: number;
  totalInterest: number;
  schedule: AmortizationStep[];
}

export interface PlanTotals {
  totalCost: number;
  totalFees: number;
  regularInterest: number;
  regularTotalCost: number;
  regularPayments: number;
  difference: number; // totalCost - regularTotalCost
}

export interface PlanMetrics {
  simpleInterestApr: number; // fraction per year
  monthlyFeePercent: number; // fraction of purchase amount
  averageBalance: number;
  averageBalanceApr: number; // approximate
  feeOnlyApr: number;
}

export interface AnalysisResult {
  plan: PaymentPlan;
  regularApr: number;
  equivalentRate: SolvedRate;
  schedule: ComparisonRow[];
  unfavorableMonths: ComparisonRow[];
  recommendation: PayoffRecommendation | null;
  reference: ReferencePlanSummary;
  totals: PlanTotals;
  metrics: PlanMetrics;
}

export interface AnalyzeOptions {
  horizonMonths?: number;
  solver?: SolverOptions;
}
