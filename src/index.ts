// Configuration
export { databaseConfig, loadConfig, parseConfig } from "./config/index.js";
export type {
  Config,
  DatabaseConfig,
  DatabaseDriver,
  DatabaseGroupsConfig,
  InstrumentationConfig,
} from "./config/index.js";

// Dotted-path lookup
export { NOT_FOUND, dotArraySearch, isFound, lookupField } from "./engine/dot-path.js";
export type { Submission } from "./engine/dot-path.js";

// Parameters
export {
  charLength,
  isNumeric,
  isPlaceholder,
  parseFieldList,
  parseLengthList,
  parseTableSpec,
  parseValueList,
  toInteger,
  toNumber,
} from "./engine/params.js";
export type { RowFilter, TableSpec } from "./engine/params.js";

// Predicates
export {
  differs,
  equals,
  exactLength,
  greaterThan,
  greaterThanEqualTo,
  inList,
  lessThan,
  lessThanEqualTo,
  matches,
  maxLength,
  minLength,
  notEquals,
  notInList,
  required,
  requiredWith,
  requiredWithout,
} from "./engine/rules.js";
export type { FieldValue } from "./engine/rules.js";
export { DB_GROUP_KEY, isNotUnique, isUnique } from "./engine/unique.js";
export type { RuleContext } from "./engine/unique.js";
export { StoreExistenceChecker } from "./engine/existence.js";
export type { ExistenceChecker, ExistsQuery } from "./engine/existence.js";

// Rule table and evaluation
export { asFieldValue, invokeRule, isRuleName, ruleNames } from "./engine/registry.js";
export type { RuleName } from "./engine/registry.js";
export { assertValid, evaluateFieldRules } from "./engine/evaluate.js";
export { fillPlaceholders } from "./engine/placeholders.js";
export { createRuleEngine } from "./engine/context.js";
export type { RuleEngine, RuleEngineOptions } from "./engine/context.js";
export type { FieldRule } from "./metadata/rule.js";

// Errors
export {
  AppError,
  RuleError,
  invalidArgumentError,
  invalidRuleSpecError,
  validationError,
} from "./engine/errors.js";
export type { ErrorDetail } from "./engine/errors.js";

// Persistence
export { ConnectionGroups } from "./store/groups.js";
export { SQLiteDatabase, Store, exec, queryRows } from "./store/postgres.js";
export type { Queryable, Row } from "./store/postgres.js";
export { newDialect } from "./store/dialect.js";
export type { Dialect } from "./store/dialect.js";

// Instrumentation
export { EventBuffer, consoleSink } from "./instrument/buffer.js";
export { getInstrumenter, getTraceContext, runTraced, runWithTraceContext } from "./instrument/instrument.js";
export type { EventRecord, EventSink, Instrumenter, Span } from "./instrument/types.js";
