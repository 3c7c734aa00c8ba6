/**
 * Alert Engine
 *
 * Holds user-defined rules and evaluates them against metric snapshots.
 * An armed rule fires the first time its condition holds and then stays
 * latched, whatever later evaluations return, until it is reset.
 *
 * A rule whose condition cannot be evaluated (unknown variable, division
 * by zero, type mismatch) is treated as not holding for that cycle and the
 * error is logged; other rules are unaffected.
 */

import { ConditionEvalError, ConditionParseError, err, errorMessage, ok, type Result } from "../errors.js";
import { evaluateCondition, parseCondition, type EvaluationContext, type ExpressionNode } from "./expression.js";
import type { AddRuleOptions, AlertEngineOptions, AlertEvent, AlertListener, AlertRule } from "./types.js";

export const DEFAULT_HISTORY_LIMIT = 1000;
export const DEFAULT_HISTORY_QUERY = 100;

// Log the first few evaluation errors per rule, then every Nth
const EVAL_ERROR_LOG_FIRST = 3;
const EVAL_ERROR_LOG_EVERY = 100;

interface RuleState {
  id: number;
  condition: string;
  symbol: string | null;
  ast: ExpressionNode;
  triggered: boolean;
  triggeredAt: string | null;
  triggerCount: number;
  createdAt: string;
  evalErrors: number;
}

function toPublic(rule: RuleState): AlertRule {
  return {
    id: rule.id,
    condition: rule.condition,
    symbol: rule.symbol,
    triggered: rule.triggered,
    triggeredAt: rule.triggeredAt,
    triggerCount: rule.triggerCount,
    createdAt: rule.createdAt,
  };
}

export class AlertEngine {
  private readonly rules = new Map<number, RuleState>();
  private readonly events: AlertEvent[] = [];
  private readonly listeners = new Set<AlertListener>();
  private readonly historyLimit: number;
  private readonly now: () => Date;
  private nextId = 1;

  constructor(options: AlertEngineOptions = {}) {
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Register a rule
   *
   * @param options.symbol - Only evaluate against this symbol's context
   * @returns The new rule, or INVALID_CONDITION when the condition does not parse
   */
  addRule(condition: string, options: AddRuleOptions = {}): Result<AlertRule, ConditionParseError> {
    let ast: ExpressionNode;
    try {
      ast = parseCondition(condition);
    } catch (error) {
      if (error instanceof ConditionParseError) return err(error);
      throw error;
    }

    const rule: RuleState = {
      id: this.nextId++,
      condition: condition.trim(),
      symbol: options.symbol?.trim().toLowerCase() || null,
      ast,
      triggered: false,
      triggeredAt: null,
      triggerCount: 0,
      createdAt: this.now().toISOString(),
      evalErrors: 0,
    };
    this.rules.set(rule.id, rule);
    console.log(`🔔 Alert #${rule.id} added: ${rule.condition}${rule.symbol ? ` [${rule.symbol}]` : ""}`);
    return ok(toPublic(rule));
  }

  /**
   * @returns false when no rule has this id
   */
  removeRule(id: number): boolean {
    const removed = this.rules.delete(id);
    if (removed) console.log(`🔕 Alert #${id} removed`);
    return removed;
  }

  /**
   * Re-arm a rule so its next true evaluation fires again
   *
   * @returns false when no rule has this id
   */
  resetRule(id: number): boolean {
    const rule = this.rules.get(id);
    if (!rule) return false;
    rule.triggered = false;
    return true;
  }

  resetAll(): void {
    for (const rule of this.rules.values()) rule.triggered = false;
  }

  getRule(id: number): AlertRule | null {
    const rule = this.rules.get(id);
    return rule ? toPublic(rule) : null;
  }

  listRules(): AlertRule[] {
    return [...this.rules.values()].map(toPublic);
  }

  /**
   * Most recent events, oldest first
   */
  history(limit = DEFAULT_HISTORY_QUERY): AlertEvent[] {
    if (limit <= 0) return [];
    return this.events.slice(-limit).map((event) => ({ ...event, context: { ...event.context } }));
  }

  /**
   * Subscribe to trigger events
   *
   * @returns Unsubscribe function
   */
  onTrigger(listener: AlertListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Evaluate rules against one snapshot of values
   *
   * @param symbol - Symbol the context describes; rules scoped to another
   *   symbol are skipped. Without it only unscoped rules run.
   * @returns Events fired by this evaluation, in rule order
   */
  evaluate(context: EvaluationContext, symbol?: string): AlertEvent[] {
    const fired: AlertEvent[] = [];
    const scope = symbol?.toLowerCase() ?? null;

    for (const rule of this.rules.values()) {
      if (rule.triggered) continue;
      if (rule.symbol !== null && rule.symbol !== scope) continue;

      if (this.check(rule, context)) {
        rule.triggered = true;
        rule.triggerCount++;
        rule.triggeredAt = this.now().toISOString();

        const event: AlertEvent = {
          ruleId: rule.id,
          condition: rule.condition,
          symbol: scope,
          triggeredAt: rule.triggeredAt,
          triggerCount: rule.triggerCount,
          context: { ...context },
        };
        this.record(event);
        fired.push(event);
      }
    }

    for (const event of fired) {
      console.log(`🚨 Alert #${event.ruleId} triggered: ${event.condition}${event.symbol ? ` [${event.symbol}]` : ""}`);
      this.notify(event);
    }

    return fired;
  }

  private check(rule: RuleState, context: EvaluationContext): boolean {
    try {
      return evaluateCondition(rule.ast, context);
    } catch (error) {
      if (!(error instanceof ConditionEvalError)) throw error;
      rule.evalErrors++;
      if (rule.evalErrors <= EVAL_ERROR_LOG_FIRST || rule.evalErrors % EVAL_ERROR_LOG_EVERY === 0) {
        console.warn(`⚠️ Alert #${rule.id} evaluation failed (${rule.evalErrors}x): ${error.message}`);
      }
      return false;
    }
  }

  private record(event: AlertEvent): void {
    this.events.push(event);
    while (this.events.length > this.historyLimit) {
      this.events.shift();
    }
  }

  private notify(event: AlertEvent): void {
    for (const listener of this.listeners) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            console.error(`❌ Alert listener failed for #${event.ruleId}: ${errorMessage(error)}`);
          });
        }
      } catch (error) {
        console.error(`❌ Alert listener failed for #${event.ruleId}: ${errorMessage(error)}`);
      }
    }
  }
}
