import type { InterestMode } from '../types.js';
import { PlanAnalysisError } from '../errors.js';
import { simulate } from '../calculators/amortization.js';
import { renderAmortizationSchedule } from '../formatters/table.js';
import { requiredNum } from './options.js';

interface ScheduleOptions {
  principal?: string;
  payment?: string;
  periods?: string;
  rate?: string;
  fee?: string;
}

export function scheduleCommand(opts: ScheduleOptions): void {
  if ((opts.rate === undefined) === (opts.fee === undefined)) {
    throw new PlanAnalysisError(
      'INVALID_OPTION',
      'Pass exactly one of --rate (annual %) or --fee (fixed monthly fee)',
      'e.g. --rate 27 or --fee 14.28',
    );
  }

  const mode: InterestMode = opts.rate !== undefined
    ? { kind: 'proportional', rate: requiredNum(opts.rate, '--rate') / 100 / 12 }
    : { kind: 'fixed-fee', fee: requiredNum(opts.fee, '--fee') };

  const schedule = simulate({
    principal: requiredNum(opts.principal, '--principal'),
    mode,
    payment: requiredNum(opts.payment, '--payment'),
    periods: requiredNum(opts.periods, '--periods'),
  });

  const title = mode.kind === 'proportional'
    ? `Amortization at ${opts.rate}% APR`
    : `Amortization with a ${opts.fee} monthly fee`;
  console.log(renderAmortizationSchedule(schedule, title));
  console.log('');
}
