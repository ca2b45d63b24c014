export { AlertEngine, DEFAULT_COOLDOWN_SECONDS } from "./AlertEngine";
export type { AlertEngineOptions, AlertListener } from "./AlertEngine";
export { AlertLog } from "./AlertLog";
export { RuleStorage } from "./RuleStorage";
export type { RuleLoadResult, RuleStorageOptions } from "./RuleStorage";
export { RULE_FILE_VERSION, parseRuleFile } from "./ruleSchema";
export type { RuleFile } from "./ruleSchema";
export { changePercentOf, evaluateRule, observedValue } from "./predicates";
export type { RuleEvaluation } from "./predicates";
export { ALERT_KINDS, isAlertKind } from "./types";
export type { AlertEvent, AlertKind, AlertRule, NewAlertRule } from "./types";
