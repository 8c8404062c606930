import chalk from 'chalk';
import type { AmortizationSchedule, AnalysisResult, PaymentPlan, SolvedRate } from '../types.js';
import type { PayoffRecommendation } from '../types.js';
import { formatPct, formatPctPoints, formatUsd, theme } from './colors.js';

/**
 * Pad a string to a given width (right-padded).
 */
function pad(str: string, width: number): string {
  // Strip ANSI codes for length calculation
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const diff = width - stripped.length;
  return diff > 0 ? str + ' '.repeat(diff) : str;
}

/**
 * Right-align a string within a given width.
 */
function rpad(str: string, width: number): string {
  const stripped = str.replace(/\x1b\[[0-9;]*m/g, '');
  const diff = width - stripped.length;
  return diff > 0 ? ' '.repeat(diff) + str : str;
}

export function renderPlanSummary(result: AnalysisResult, planNumber: number): string {
  const { plan, totals } = result;
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading(`━━━ Fixed Payment Plan Analysis #${planNumber} ━━━`));
  lines.push('');
  lines.push(`  Purchase amount:      ${formatUsd(plan.purchaseAmount)}`);
  lines.push(`  Number of payments:   ${plan.numPayments}`);
  lines.push(`  Monthly payment:      ${formatUsd(plan.monthlyPayment)}`);
  lines.push(`  Monthly fee:          ${formatUsd(plan.monthlyFee)}`);
  lines.push(`  Total cost:           ${formatUsd(totals.totalCost)}`);
  lines.push(`  Total fees:           ${formatUsd(totals.totalFees)}`);
  lines.push(`  Equivalent APR:       ${chalk.bold(formatPctPoints(result.equivalentRate.apr))}`);
  return lines.join('\n');
}

export function renderComparison(result: AnalysisResult): string {
  const { totals, regularApr } = result;
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.subheading(`  Comparison with Regular ${regularApr}% APR`));
  lines.push(`    Regular interest paid:     ${formatUsd(totals.regularInterest)}`);
  lines.push(`    Regular total cost:        ${formatUsd(totals.regularTotalCost)}`);
  lines.push(`    Regular payments needed:   ${totals.regularPayments}`);
  lines.push(`    Difference (fixed - regular): ${theme.cost(totals.difference)}`);

  if (totals.difference > 0) {
    lines.push(theme.negative(`    The fixed payment plan costs ${formatUsd(totals.difference)} more than regular payments.`));
  } else {
    lines.push(theme.positive(`    The fixed payment plan saves ${formatUsd(Math.abs(totals.difference))} compared to regular payments.`));
  }
  return lines.join('\n');
}

export function renderMetrics(result: AnalysisResult): string {
  const { metrics } = result;
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.subheading('  Additional Analysis'));
  lines.push(`    Simple interest rate equivalent:        ${formatPct(metrics.simpleInterestApr)} APR`);
  lines.push(`    Monthly fee as % of purchase:           ${formatPct(metrics.monthlyFeePercent)} per month`);
  lines.push(`    Effective rate based on avg. balance:   ${formatPct(metrics.averageBalanceApr)} APR ${theme.muted('(approximate)')}`);
  lines.push(`    Fee-only equivalent rate (avg. balance): ${formatPct(metrics.feeOnlyApr)} APR`);
  return lines.join('\n');
}

function payoffPoint(recommendation: PayoffRecommendation): string {
  if (recommendation.month === 0) {
    return `Before month 1, pay the full ${formatUsd(recommendation.remainingBalance)}`;
  }
  return `After month ${recommendation.month}, pay remaining ${formatUsd(recommendation.remainingBalance)}`;
}

/**
 * Month-by-month schedule with the optimal payoff marker.
 */
export function renderComparisonSchedule(result: AnalysisResult): string {
  const { recommendation, regularApr } = result;
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.subheading('  Balance Schedule and Optimal Payoff Analysis'));
  lines.push('');

  const cols = [
    rpad('Month', 6),
    rpad('Balance', 12),
    rpad('Fixed Fee', 10),
    rpad('Regular Int.*', 14),
    rpad('Difference', 11),
    rpad('Eff. Rate', 10),
    rpad('APR Equiv.', 11),
  ];
  lines.push(chalk.bold(cols.join(' ')));
  lines.push(theme.muted('─'.repeat(80)));

  if (recommendation?.month === 0) {
    lines.push(chalk.green.bold(`       >>> OPTIMAL PAYOFF POINT: ${payoffPoint(recommendation)}`));
  }

  for (const row of result.schedule) {
    const diff = row.favorable ? theme.positive(formatUsd(row.difference)) : theme.negative(formatUsd(row.difference));
    lines.push(
      [
        rpad(String(row.month), 6),
        rpad(formatUsd(row.balance), 12),
        rpad(formatUsd(row.fee), 10),
        rpad(formatUsd(row.regularInterest), 14),
        rpad(diff, 11),
        rpad(formatPct(row.effectiveMonthlyRate), 10),
        rpad(formatPct(row.effectiveAnnualRate), 11),
      ].join(' '),
    );

    if (recommendation && row.month === recommendation.month) {
      lines.push(chalk.green.bold(`       >>> OPTIMAL PAYOFF POINT: ${payoffPoint(recommendation)}`));
    }
  }

  lines.push(theme.muted(`       *Regular interest calculated at ${regularApr}% APR on remaining balance`));
  return lines.join('\n');
}

export function renderRecommendation(result: AnalysisResult): string {
  const { recommendation, regularApr } = result;
  const lines: string[] = [];

  if (result.unfavorableMonths.length > 0) {
    lines.push('');
    lines.push(theme.warning(`  Months where the fee exceeds regular ${regularApr}% APR interest (${(regularApr / 12).toFixed(2)}% monthly):`));
    for (const row of result.unfavorableMonths) {
      lines.push(
        `    Month ${row.month}: ${formatPct(row.effectiveMonthlyRate)} monthly (${formatPct(row.effectiveAnnualRate)} APR) on ${formatUsd(row.balance)} balance`,
      );
      lines.push(
        theme.muted(
          `      Fixed fee: ${formatUsd(row.fee)}, Regular interest: ${formatUsd(row.regularInterest)}, Difference: ${formatUsd(row.difference)}`,
        ),
      );
    }
  }

  lines.push('');
  if (recommendation?.month === 0) {
    lines.push(theme.negative('  → The fee exceeds regular interest from the first month; paying off now is cheapest.'));
  }
  if (recommendation) {
    lines.push(theme.positive(`  → Suggested optimal payoff: ${payoffPoint(recommendation)}`));
    lines.push(
      `    At this point, fixed fee would be ${formatUsd(recommendation.feeAtMonth)}, regular interest would be ${formatUsd(recommendation.regularInterestAtMonth)}`,
    );
    lines.push(`    This would avoid ${recommendation.unfavorableMonthsAvoided} months of high-cost fees.`);
  } else {
    lines.push(theme.positive('  → The fee never exceeds regular interest; keep the plan to term.'));
  }

  return lines.join('\n');
}

/**
 * Full console report for one analyzed plan.
 */
export function renderAnalysis(result: AnalysisResult, planNumber: number): string {
  return [
    renderPlanSummary(result, planNumber),
    renderComparison(result),
    renderMetrics(result),
    renderComparisonSchedule(result),
    renderRecommendation(result),
  ].join('\n');
}

export function renderSolvedRate(plan: PaymentPlan, solved: SolvedRate): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading('━━━ Equivalent APR ━━━'));
  lines.push('');
  lines.push(`  Purchase amount:      ${formatUsd(plan.purchaseAmount)}`);
  lines.push(`  Payments:             ${plan.numPayments} × ${formatUsd(plan.monthlyPayment)}`);
  lines.push(`  Monthly fee:          ${formatUsd(plan.monthlyFee)}`);
  lines.push(`  Monthly rate:         ${formatPct(solved.periodicRate, 4)}`);
  lines.push(`  Equivalent APR:       ${chalk.bold(formatPctPoints(solved.apr))}`);
  lines.push(theme.muted(`  (${solved.iterations} bisection steps, residual ${solved.residual.toExponential(2)})`));
  return lines.join('\n');
}

export function renderAmortizationSchedule(schedule: AmortizationSchedule, title: string): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(theme.heading(`━━━ ${title} ━━━`));
  lines.push('');

  const cols = [
    rpad('Period', 7),
    rpad('Start', 12),
    rpad('Principal', 12),
    rpad('Interest/Fee', 13),
    rpad('End', 12),
  ];
  lines.push(chalk.bold(cols.join(' ')));
  lines.push(theme.muted('─'.repeat(60)));

  for (const step of schedule.steps) {
    lines.push(
      [
        rpad(String(step.period), 7),
        rpad(formatUsd(step.balanceBefore), 12),
        rpad(formatUsd(step.principalComponent), 12),
        rpad(formatUsd(step.interestOrFee), 13),
        rpad(formatUsd(step.balanceAfter), 12),
      ].join(' '),
    );
  }

  lines.push('');
  lines.push(`  ${pad('Periods used:', 22)}${schedule.periodsUsed}${schedule.finishedEarly ? theme.positive(' (paid off early)') : ''}`);
  lines.push(`  ${pad('Total interest/fees:', 22)}${formatUsd(schedule.totalInterestOrFees)}`);
  if (schedule.endingBalance > 0) {
    lines.push(theme.warning(`  ${pad('Balance remaining:', 22)}${formatUsd(schedule.endingBalance)}`));
  }
  return lines.join('\n');
}
