export interface ErrorDetail {
  field?: string;
  rule?: string;
  message: string;
}

export class AppError extends Error {
  code: string;
  status: number;
  details?: ErrorDetail[];

  constructor(
    code: string,
    status: number,
    message: string,
    details?: ErrorDetail[],
  ) {
    super(message);
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

/**
 * A rule was invoked in a way that can never succeed: missing parameters,
 * an unknown rule name or an unusable table spec. Distinct from a soft
 * validation failure, which is just a `false` result.
 */
export class RuleError extends AppError {
  rule: string;

  constructor(code: string, rule: string, message: string) {
    super(code, 500, message);
    this.rule = rule;
  }
}

export function invalidArgumentError(rule: string, message: string): RuleError {
  return new RuleError("INVALID_ARGUMENT", rule, message);
}

export function invalidRuleSpecError(rule: string, spec: string): RuleError {
  return new RuleError(
    "INVALID_RULE_SPEC",
    rule,
    `${rule}: expected "table.column[,field,value]", got "${spec}"`,
  );
}

export function validationError(details: ErrorDetail[]): AppError {
  return new AppError("VALIDATION_FAILED", 422, "Validation failed", details);
}
