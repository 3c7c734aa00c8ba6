export type { AlertRule, AlertEvent, AlertListener, AlertEngineOptions, AddRuleOptions } from "./types.js";
export type { ExpressionNode, EvaluationContext } from "./expression.js";
export { tokenize, parseCondition, evaluateCondition, referencedVariables } from "./expression.js";
export { AlertEngine, DEFAULT_HISTORY_LIMIT, DEFAULT_HISTORY_QUERY } from "./alert-engine.js";
