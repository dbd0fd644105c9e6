import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Database } from '../db/index';
import { createActionRegistry } from './actions';
import { matchEventConditions } from './conditions';
import { createEventRuleEngine, isRuleInCooldown, type EventRuleEngine } from './event-rules';
import { createAutomationStore, type AutomationStore } from './store';
import { MINUTE_MS } from './types';
import {
  T0,
  createFakeClock,
  createRecordingExecutors,
  createTestDb,
  makeAutomationRule,
  type FakeClock,
  type RecordedCall,
} from './test-utils';

describe('EventRuleEngine', () => {
  let db: Database;
  let store: AutomationStore;
  let clock: FakeClock;
  let calls: RecordedCall[];
  let engine: EventRuleEngine;

  beforeEach(async () => {
    db = await createTestDb();
    store = createAutomationStore(db);
    clock = createFakeClock(T0);
    const recording = createRecordingExecutors(['webhook_call']);
    calls = recording.calls;
    engine = createEventRuleEngine({
      store,
      actions: createActionRegistry(recording.executors),
      clock,
      matcher: matchEventConditions,
    });
  });

  afterEach(() => {
    db.close();
  });

  it('fires matching rules in priority order', async () => {
    store.insertAutomationRule(makeAutomationRule({ id: 'rule_c', priority: 10 }));
    store.insertAutomationRule(makeAutomationRule({ id: 'rule_a', priority: 1 }));
    store.insertAutomationRule(makeAutomationRule({ id: 'rule_b', priority: 5 }));
    const spy = vi.spyOn(store, 'updateAutomationRule');

    const fired = await engine.triggerEvent('new_review', { rating: 1 });

    expect(fired.map((f) => f.ruleId)).toEqual(['rule_a', 'rule_b', 'rule_c']);
    expect(spy.mock.calls.map(([rule]) => rule.id)).toEqual(['rule_a', 'rule_b', 'rule_c']);
    expect(calls.map((c) => c.context.ruleId)).toEqual(['rule_a', 'rule_b', 'rule_c']);
  });

  it('breaks priority ties by id', async () => {
    store.insertAutomationRule(makeAutomationRule({ id: 'rule_y', priority: 1 }));
    store.insertAutomationRule(makeAutomationRule({ id: 'rule_x', priority: 1 }));

    const fired = await engine.triggerEvent('new_review');
    expect(fired.map((f) => f.ruleId)).toEqual(['rule_x', 'rule_y']);
  });

  it('records the firing on the rule', async () => {
    const rule = makeAutomationRule({ triggerCount: 2 });
    store.insertAutomationRule(rule);

    await engine.triggerEvent('new_review');

    const stored = store.getAutomationRule(rule.id);
    expect(stored?.triggerCount).toBe(3);
    expect(stored?.lastTriggered).toBe(T0);
    expect(stored?.updatedAt).toBe(T0);
  });

  it('passes the payload and rule to actions', async () => {
    const rule = makeAutomationRule();
    store.insertAutomationRule(rule);

    await engine.triggerEvent('new_review', { review_id: 'rev-1', rating: 2 });

    expect(calls).toHaveLength(1);
    expect(calls[0].context).toEqual({
      taskId: null,
      workflowId: null,
      ruleId: rule.id,
      payload: { review_id: 'rev-1', rating: 2 },
    });
  });

  it('ignores rules for other events and inactive rules', async () => {
    store.insertAutomationRule(makeAutomationRule({ triggerEvent: 'review_responded' }));
    store.insertAutomationRule(makeAutomationRule({ isActive: false }));

    expect(await engine.triggerEvent('new_review')).toEqual([]);
    expect(calls).toEqual([]);
  });

  it('skips a rule inside its cooldown', async () => {
    const rule = makeAutomationRule({ cooldownMinutes: 30 });
    store.insertAutomationRule(rule);

    expect(await engine.triggerEvent('new_review')).toHaveLength(1);

    clock.advance(10 * MINUTE_MS);
    expect(await engine.triggerEvent('new_review')).toEqual([]);
    expect(store.getAutomationRule(rule.id)?.triggerCount).toBe(1);

    clock.advance(20 * MINUTE_MS);
    expect(await engine.triggerEvent('new_review')).toHaveLength(1);
    expect(store.getAutomationRule(rule.id)?.triggerCount).toBe(2);
  });

  it('applies rule conditions to the payload', async () => {
    store.insertAutomationRule(
      makeAutomationRule({ id: 'rule_low', conditions: { rating_max: 2, sentiment: 'Negative' } }),
    );

    expect(await engine.triggerEvent('new_review', { rating: 4, sentiment: 'Positive' })).toEqual([]);

    const fired = await engine.triggerEvent('new_review', { rating: 1, sentiment: 'negative' });
    expect(fired.map((f) => f.ruleId)).toEqual(['rule_low']);
  });

  it('treats a throwing matcher as no match', async () => {
    const throwing = createEventRuleEngine({
      store,
      actions: createActionRegistry(createRecordingExecutors().executors),
      clock,
      matcher: () => {
        throw new Error('bad conditions');
      },
    });
    store.insertAutomationRule(makeAutomationRule());

    expect(await throwing.triggerEvent('new_review')).toEqual([]);
  });

  it('reports failed actions without stopping later actions or rules', async () => {
    store.insertAutomationRule(
      makeAutomationRule({
        id: 'rule_a',
        priority: 1,
        actions: [
          { kind: 'webhook_call', config: { url: 'https://hooks.example.com/reviews' } },
          { kind: 'update_status', config: { status: 'flagged' } },
        ],
      }),
    );
    store.insertAutomationRule(makeAutomationRule({ id: 'rule_b', priority: 2 }));

    const fired = await engine.triggerEvent('new_review');

    expect(fired).toHaveLength(2);
    expect(fired[0].actions).toEqual([
      { kind: 'webhook_call', ok: false, error: 'webhook_call failed' },
      { kind: 'update_status', ok: true, result: { ok: true } },
    ]);
    expect(fired[1].actions).toEqual([{ kind: 'send_notification', ok: true, result: { ok: true } }]);
    expect(store.getAutomationRule('rule_a')?.triggerCount).toBe(1);
  });

  it('reports an invalid action config as a failed action', async () => {
    store.insertAutomationRule(makeAutomationRule({ actions: [{ kind: 'update_status', config: {} }] }));

    const [fired] = await engine.triggerEvent('new_review');

    expect(fired.actions).toHaveLength(1);
    expect(fired.actions[0].ok).toBe(false);
    expect(calls).toEqual([]);
  });
});

describe('isRuleInCooldown', () => {
  it('is never in cooldown without a cooldown or a previous firing', () => {
    expect(isRuleInCooldown({ cooldownMinutes: 0, lastTriggered: T0 }, T0)).toBe(false);
    expect(isRuleInCooldown({ cooldownMinutes: 30, lastTriggered: null }, T0)).toBe(false);
  });

  it('ends exactly when the cooldown elapses', () => {
    const rule = { cooldownMinutes: 30, lastTriggered: T0 };
    expect(isRuleInCooldown(rule, T0 + 30 * MINUTE_MS - 1)).toBe(true);
    expect(isRuleInCooldown(rule, T0 + 30 * MINUTE_MS)).toBe(false);
  });
});
