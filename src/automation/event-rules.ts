/**
 * Event Rule Engine - fires automation rules for named events
 *
 * Rules listening to an event run in priority order (lowest number first,
 * ties by id). A rule inside its cooldown is skipped. A matching rule is
 * recorded as fired in its own transaction before its actions run; action
 * failures are logged and reported, never thrown.
 */

import { createLogger } from '../utils/logger';
import type { ActionRegistry } from './actions';
import { alwaysMatch, type ConditionMatcher } from './conditions';
import { errorMessage } from './errors';
import type { AutomationStore } from './store';
import { MINUTE_MS, systemClock, type AutomationRule, type Clock, type JsonObject } from './types';

const logger = createLogger('event-rules');

export type ActionOutcome =
  | { kind: string; ok: true; result: unknown }
  | { kind: string; ok: false; error: string };

export interface FiredRule {
  ruleId: string;
  name: string;
  priority: number;
  firedAt: number;
  actions: ActionOutcome[];
}

export interface EventRuleEngineDeps {
  store: AutomationStore;
  actions: ActionRegistry;
  clock?: Clock;
  /** Defaults to matching every rule */
  matcher?: ConditionMatcher;
}

export interface EventRuleEngine {
  triggerEvent(eventName: string, payload?: JsonObject): Promise<FiredRule[]>;
}

export function isRuleInCooldown(
  rule: Pick<AutomationRule, 'cooldownMinutes' | 'lastTriggered'>,
  now: number,
): boolean {
  if (rule.cooldownMinutes <= 0 || rule.lastTriggered === null) return false;
  return now < rule.lastTriggered + rule.cooldownMinutes * MINUTE_MS;
}

export function createEventRuleEngine(deps: EventRuleEngineDeps): EventRuleEngine {
  const { store, actions } = deps;
  const clock = deps.clock ?? systemClock;
  const matcher = deps.matcher ?? alwaysMatch;

  function matches(rule: AutomationRule, payload: JsonObject): boolean {
    try {
      return matcher(rule.conditions, payload);
    } catch (err) {
      logger.warn({ err, ruleId: rule.id }, 'Condition matcher failed, rule not matched');
      return false;
    }
  }

  /** Record the firing against fresh state. Null if the rule changed underneath us. */
  function markFired(ruleId: string, now: number): AutomationRule | null {
    return store.transaction(() => {
      const current = store.getAutomationRule(ruleId);
      if (!current || !current.isActive || isRuleInCooldown(current, now)) return null;

      const fired: AutomationRule = {
        ...current,
        lastTriggered: now,
        triggerCount: current.triggerCount + 1,
        updatedAt: now,
      };
      store.updateAutomationRule(fired);
      return fired;
    });
  }

  async function runActions(rule: AutomationRule, payload: JsonObject): Promise<ActionOutcome[]> {
    const outcomes: ActionOutcome[] = [];
    for (const action of rule.actions) {
      try {
        const result = await actions.execute(action.kind, action.config, {
          taskId: null,
          workflowId: null,
          ruleId: rule.id,
          payload,
        });
        outcomes.push({ kind: action.kind, ok: true, result: result ?? null });
      } catch (err) {
        const error = errorMessage(err);
        logger.error({ ruleId: rule.id, actionKind: action.kind, error }, 'Rule action failed');
        outcomes.push({ kind: action.kind, ok: false, error });
      }
    }
    return outcomes;
  }

  return {
    async triggerEvent(eventName: string, payload: JsonObject = {}): Promise<FiredRule[]> {
      const rules = store.findRulesForEvent(eventName);
      const firedRules: FiredRule[] = [];

      for (const rule of rules) {
        const now = clock.now();
        if (isRuleInCooldown(rule, now)) {
          logger.debug({ ruleId: rule.id, eventName }, 'Rule in cooldown');
          continue;
        }
        if (!matches(rule, payload)) continue;

        const fired = markFired(rule.id, now);
        if (!fired) continue;

        logger.info({ ruleId: fired.id, eventName, priority: fired.priority }, 'Rule fired');
        firedRules.push({
          ruleId: fired.id,
          name: fired.name,
          priority: fired.priority,
          firedAt: now,
          actions: await runActions(fired, payload),
        });
      }

      return firedRules;
    },
  };
}
