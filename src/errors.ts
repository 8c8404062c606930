export class PlanAnalysisError extends Error {
  constructor(
    public code: string,
    message: string,
    public suggestion = '',
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A plan that is well-formed but economically meaningless: non-positive
 * amounts, or a payment that never reduces the balance.
 */
export class InvalidPlanError extends PlanAnalysisError {
  constructor(message: string, suggestion = 'Check the plan amounts') {
    super('INVALID_PLAN', message, suggestion);
  }
}

export class RateSolverConvergenceError extends PlanAnalysisError {
  constructor(
    message: string,
    public bestEstimate: number,
    public bracket: readonly [number, number],
    public residual: number,
    public iterations: number,
  ) {
    super(
      'RATE_SOLVER_NO_CONVERGENCE',
      message,
      'Widen the search bracket or raise the iteration limit',
    );
  }
}

export class ReferencePlanNonConvergentError extends PlanAnalysisError {
  constructor(
    message: string,
    public regularApr: number,
    public horizon: number,
    public remainingBalance: number,
  ) {
    super(
      'REFERENCE_NON_CONVERGENT',
      message,
      'Use a positive reference APR whose monthly interest the payment can cover',
    );
  }
}

export class ConfigError extends PlanAnalysisError {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super('INVALID_CONFIG', message, 'Expected { "regular_apr": number, "payment_plans": [{ "purchase_amount", "num_payments", "monthly_payment", "monthly_fee" }] }');
  }
}
