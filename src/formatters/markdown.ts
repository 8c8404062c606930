import type { AnalysisResult, PayoffRecommendation } from '../types.js';

function usd(n: number): string {
  return n.toLocaleString('en-US', { style: 'currency', currency: 'USD', minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

function pct(n: number): string {
  return (n * 100).toFixed(2) + '%';
}

function payoffPoint(rec: PayoffRecommendation): string {
  return rec.month === 0
    ? `Before month 1, pay the full ${usd(rec.remainingBalance)}`
    : `After month ${rec.month}, pay remaining ${usd(rec.remainingBalance)}`;
}

export function renderMarkdownAnalysis(result: AnalysisResult, planNumber: number): string {
  const { plan, totals, metrics, regularApr, recommendation } = result;
  const lines: string[] = [];

  // ─── Plan ───
  lines.push(`# Fixed Payment Plan Analysis #${planNumber}`);
  lines.push('');
  lines.push(`- Purchase Amount: ${usd(plan.purchaseAmount)}`);
  lines.push(`- Number of Payments: ${plan.numPayments}`);
  lines.push(`- Monthly Payment: ${usd(plan.monthlyPayment)}`);
  lines.push(`- Monthly Fee: ${usd(plan.monthlyFee)}`);
  lines.push(`- Total Cost: ${usd(totals.totalCost)}`);
  lines.push(`- Total Fees: ${usd(totals.totalFees)}`);
  lines.push(`- Equivalent APR: ${result.equivalentRate.apr.toFixed(2)}%`);
  lines.push('');

  // ─── Reference comparison ───
  lines.push(`## Comparison with Regular ${regularApr}% APR`);
  lines.push('');
  lines.push(`- Regular Interest Paid: ${usd(totals.regularInterest)}`);
  lines.push(`- Regular Total Cost: ${usd(totals.regularTotalCost)}`);
  lines.push(`- Regular Payments Needed: ${totals.regularPayments}`);
  lines.push(`- Difference (Fixed Plan - Regular): ${usd(totals.difference)}`);
  if (totals.difference > 0) {
    lines.push(`- The fixed payment plan costs ${usd(totals.difference)} more than regular payments.`);
  } else {
    lines.push(`- The fixed payment plan saves ${usd(Math.abs(totals.difference))} compared to regular payments.`);
  }
  lines.push('');

  // ─── Metrics ───
  lines.push('## Additional Analysis');
  lines.push('');
  lines.push(`- Simple interest rate equivalent: ${pct(metrics.simpleInterestApr)} APR`);
  lines.push(`- Monthly fee as % of purchase: ${pct(metrics.monthlyFeePercent)} per month`);
  lines.push(`- Effective rate based on avg. balance: ${pct(metrics.averageBalanceApr)} APR (approximate)`);
  lines.push(`- Fee-only equivalent rate (on avg. balance): ${pct(metrics.feeOnlyApr)} APR`);
  lines.push('');

  // ─── Schedule ───
  lines.push('## Balance Schedule and Optimal Payoff Analysis');
  lines.push('');
  lines.push('| Month | Balance | Fixed Fee | Regular Interest* | Difference | Effective Rate | APR Equivalent |');
  lines.push('| --- | --- | --- | --- | --- | --- | --- |');
  if (recommendation?.month === 0) {
    lines.push(`| **OPTIMAL PAYOFF POINT: ${payoffPoint(recommendation)}** | | | | | | |`);
  }
  for (const row of result.schedule) {
    lines.push(
      `| ${row.month} | ${usd(row.balance)} | ${usd(row.fee)} | ${usd(row.regularInterest)} | ${usd(row.difference)} | ${pct(row.effectiveMonthlyRate)} monthly | ${pct(row.effectiveAnnualRate)} |`,
    );
    if (recommendation && row.month === recommendation.month) {
      lines.push(
        `| **OPTIMAL PAYOFF POINT: ${payoffPoint(recommendation)}** | | | | | | |`,
      );
    }
  }
  lines.push('');
  lines.push(`*Regular interest calculated at ${regularApr}% APR on remaining balance`);

  // ─── High-cost months ───
  if (result.unfavorableMonths.length > 0) {
    lines.push('');
    lines.push(`### Months where the fee exceeds regular ${regularApr}% APR interest (${(regularApr / 12).toFixed(2)}% monthly)`);
    lines.push('');
    lines.push('| Month | Rate | APR | Balance | Fixed Fee | Regular Interest | Difference |');
    lines.push('| --- | --- | --- | --- | --- | --- | --- |');
    for (const row of result.unfavorableMonths) {
      lines.push(
        `| ${row.month} | ${pct(row.effectiveMonthlyRate)} monthly | ${pct(row.effectiveAnnualRate)} | ${usd(row.balance)} | ${usd(row.fee)} | ${usd(row.regularInterest)} | ${usd(row.difference)} |`,
      );
    }
  }

  if (recommendation) {
    lines.push('');
    lines.push('### Optimal Payoff Recommendation');
    lines.push('');
    lines.push(`- Suggested optimal payoff: ${payoffPoint(recommendation)}`);
    lines.push(
      `- At this point, fixed fee would be ${usd(recommendation.feeAtMonth)}, regular interest would be ${usd(recommendation.regularInterestAtMonth)}`,
    );
    lines.push(`- This would avoid ${recommendation.unfavorableMonthsAvoided} months of high-cost fees.`);
  }

  return lines.join('\n');
}

export function renderMarkdownReport(results: AnalysisResult[]): string {
  return results.map((r, i) => renderMarkdownAnalysis(r, i + 1)).join('\n\n---\n\n') + '\n';
}
