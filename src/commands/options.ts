import { PlanAnalysisError } from '../errors.js';
import { theme } from '../formatters/colors.js';

export function num(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Parse a required numeric option, failing with a usage error when absent.
 */
export function requiredNum(value: string | undefined, flag: string): number {
  const parsed = value === undefined ? NaN : parseFloat(value);
  if (isNaN(parsed)) {
    throw new PlanAnalysisError('INVALID_OPTION', `Option ${flag} needs a number`, `Pass ${flag} <n>`);
  }
  return parsed;
}

/**
 * Print a typed analysis failure and set a non-zero exit code.
 * Anything that is not a PlanAnalysisError is a bug and propagates.
 */
export function withErrorReport<A extends unknown[]>(action: (...args: A) => void): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (err) {
      if (!(err instanceof PlanAnalysisError)) throw err;
      console.error(theme.negative(`\n  ✖ ${err.message}`));
      if (err.suggestion) {
        console.error(theme.muted(`    ${err.suggestion}`));
      }
      process.exitCode = 1;
    }
  };
}
