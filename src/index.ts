export type * from './types.js';
export {
  PlanAnalysisError,
  InvalidPlanError,
  RateSolverConvergenceError,
  ReferencePlanNonConvergentError,
  ConfigError,
} from './errors.js';
export { createPaymentPlan } from './calculators/plan.js';
export { simulate, periodCharge } from './calculators/amortization.js';
export { solveEquivalentRate, annuityPresentValue } from './calculators/rate-solver.js';
export { analyze, findOptimalPayoff } from './analyzers/comparison.js';
export { loadConfig, parseConfigString } from './config/loader.js';
export { DEFAULT_REGULAR_APR, SAMPLE_PLANS } from './config/defaults.js';
