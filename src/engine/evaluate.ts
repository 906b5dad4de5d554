import type { FieldRule } from "../metadata/rule.js";
import { getInstrumenter } from "../instrument/instrument.js";
import { lookupField, type Submission } from "./dot-path.js";
import { validationError, type ErrorDetail } from "./errors.js";
import { fillPlaceholders } from "./placeholders.js";
import { invokeRule } from "./registry.js";
import type { RuleContext } from "./unique.js";

/**
 * Evaluates field rules in order against a submission.
 * Returns one error detail per failed rule; a failed rule marked
 * `stop_on_fail` ends the run. Hard errors are rethrown.
 */
export async function evaluateFieldRules(
  rules: readonly FieldRule[],
  data: Submission,
  ctx: RuleContext = {},
): Promise<ErrorDetail[]> {
  const span = getInstrumenter().startSpan("engine", "rules", "rules.evaluate");
  span.setMetadata("rule_count", rules.length);
  try {
    const errs: ErrorDetail[] = [];

    for (const r of rules) {
      const value = lookupField(r.field, data);
      const param = r.param === undefined ? undefined : fillPlaceholders(r.param, data);
      const ok = await invokeRule(r.rule, value, param, data, ctx);
      if (ok) continue;

      errs.push({
        field: r.field,
        rule: r.rule,
        message: r.message ?? `field ${r.field} failed ${r.rule} validation`,
      });
      if (r.stop_on_fail) break;
    }

    span.setStatus("ok");
    span.setMetadata("error_count", errs.length);
    return errs;
  } catch (err) {
    span.setStatus("error");
    span.setMetadata("error", err instanceof Error ? err.message : String(err));
    throw err;
  } finally {
    span.end();
  }
}

/** Like `evaluateFieldRules`, but throws a VALIDATION_FAILED error on failure. */
export async function assertValid(
  rules: readonly FieldRule[],
  data: Submission,
  ctx: RuleContext = {},
): Promise<void> {
  const errs = await evaluateFieldRules(rules, data, ctx);
  if (errs.length > 0) {
    throw validationError(errs);
  }
}
