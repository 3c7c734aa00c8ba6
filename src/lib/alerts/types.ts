/**
 * Alert Types
 */

import type { EvaluationContext } from "./expression.js";

/**
 * Public view of a registered rule
 */
export interface AlertRule {
  id: number;
  condition: string;
  /** Symbol the rule is limited to, or null for every context */
  symbol: string | null;
  /** Latched since the last reset */
  triggered: boolean;
  /** ISO time of the most recent trigger */
  triggeredAt: string | null;
  triggerCount: number;
  createdAt: string;
}

/**
 * One armed-to-triggered transition of a rule
 */
export interface AlertEvent {
  ruleId: number;
  condition: string;
  /** Symbol of the context that fired the rule, if one was given */
  symbol: string | null;
  triggeredAt: string;
  /** Rule's trigger count including this event */
  triggerCount: number;
  /** Copy of the values the condition was evaluated against */
  context: Record<string, unknown>;
}

export type AlertListener = (event: AlertEvent) => void | Promise<void>;

export interface AddRuleOptions {
  symbol?: string;
}

export interface AlertEngineOptions {
  /** Maximum events retained in history (default 1000) */
  historyLimit?: number;
  /** Clock for trigger timestamps */
  now?: () => Date;
}

export type { EvaluationContext };
