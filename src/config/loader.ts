import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { AnalysisConfig } from '../types.js';
import { ConfigError } from '../errors.js';
import { createPaymentPlan } from '../calculators/plan.js';
import { DEFAULT_REGULAR_APR } from './defaults.js';

const paymentPlanSchema = z.object({
  purchase_amount: z.number().positive(),
  num_payments: z.number().int().min(1),
  monthly_payment: z.number().positive(),
  monthly_fee: z.number().min(0),
});

const configSchema = z.object({
  regular_apr: z.number().positive().default(DEFAULT_REGULAR_APR),
  payment_plans: z.array(paymentPlanSchema).min(1),
});

/**
 * Load an analysis configuration from a JSON file.
 *
 * Format:
 * { "regular_apr": 27.0, "payment_plans": [{ "purchase_amount": 1196.00, "num_payments": 18,
 *   "monthly_payment": 80.73, "monthly_fee": 14.28 }] }
 */
export function loadConfig(filePath: string): AnalysisConfig {
  const raw = readFileSync(filePath, 'utf-8');
  return parseConfigString(raw);
}

export function parseConfigString(raw: string): AnalysisConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Configuration is not valid JSON: ${reason}`);
  }

  const parsed = configSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  return {
    regularApr: parsed.data.regular_apr,
    paymentPlans: parsed.data.payment_plans.map((p) =>
      createPaymentPlan({
        purchaseAmount: p.purchase_amount,
        numPayments: p.num_payments,
        monthlyPayment: p.monthly_payment,
        monthlyFee: p.monthly_fee,
      }),
    ),
  };
}
