import { describe, it, expect } from 'vitest';
import { GuidelineMatcher, compareMatches } from '../lib/ai/core/guideline-matcher';
import { MatchingUnavailableError, TurnCancelledError } from '../lib/ai/core/errors';
import type { ConditionEvaluator } from '../lib/ai/core/condition-evaluator';
import { RuleEvaluator, makeState, matchOf, registered, userSays } from './helpers/fakes';

const guidelines = [
  registered({ id: 'greet', condition: 'customer greets', criticality: 'low' }, 0),
  registered({ id: 'ssn', condition: 'customer shares an SSN', criticality: 'high' }, 1),
  registered({ id: 'products', condition: 'customer asks about products' }, 2),
  registered({ id: 'off', condition: 'customer greets again', enabled: false }, 3),
  registered({ id: 'booking-only', condition: 'customer asks duration', scope: { kind: 'journey', journeyId: 'booking' } }, 4)
];

const state = makeState({ messages: userSays('hello, my number is 123-45-6789') });

describe('GuidelineMatcher', () => {
  it('keeps matches above the threshold ordered by criticality', async () => {
    const evaluator = new RuleEvaluator({
      'customer greets': /hello/i,
      'customer shares an SSN': /\d{3}-\d{2}-\d{4}/,
      'customer asks about products': /product/i
    });
    const matcher = new GuidelineMatcher(evaluator, { threshold: 0.5 });

    const matches = await matcher.match({ state, guidelines, position: {} });

    expect(matches.map(m => m.guideline.id)).toEqual(['ssn', 'greet']);
    expect(matches[0].score).toBe(0.9);
  });

  it('only evaluates enabled guidelines in scope', async () => {
    const evaluator = new RuleEvaluator();
    const matcher = new GuidelineMatcher(evaluator);

    await matcher.match({ state, guidelines, position: {} });
    expect(evaluator.calls).toEqual(['customer greets', 'customer shares an SSN', 'customer asks about products']);

    evaluator.calls.length = 0;
    await matcher.match({ state, guidelines, position: { journeyId: 'booking', stateId: 'ask_date' } });
    expect(evaluator.calls).toContain('customer asks duration');
    expect(evaluator.calls).not.toContain('customer greets again');
  });

  it('sends conditions in batches when the evaluator supports it', async () => {
    const batches: string[][] = [];
    const evaluator: ConditionEvaluator = {
      evaluate: async () => ({ applies: false, confidence: 0, reason: '' }),
      evaluateBatch: async conditions => {
        batches.push(conditions);
        return conditions.map(() => ({ applies: true, confidence: 0.7, reason: 'batch' }));
      }
    };
    const matcher = new GuidelineMatcher(evaluator, { batchSize: 2 });

    const matches = await matcher.match({ state, guidelines, position: {} });

    expect(batches).toEqual([['customer greets', 'customer shares an SSN'], ['customer asks about products']]);
    expect(matches).toHaveLength(3);
  });

  it('fails the whole match when the oracle fails', async () => {
    const evaluator = new RuleEvaluator();
    evaluator.failuresLeft = 1;
    const matcher = new GuidelineMatcher(evaluator);

    await expect(matcher.match({ state, guidelines, position: {} })).rejects.toBeInstanceOf(MatchingUnavailableError);
  });

  it('fails when the oracle answers for the wrong number of conditions', async () => {
    const evaluator: ConditionEvaluator = {
      evaluate: async () => ({ applies: true, confidence: 1, reason: '' }),
      evaluateBatch: async () => [{ applies: true, confidence: 1, reason: '' }]
    };
    const matcher = new GuidelineMatcher(evaluator, { batchSize: 5 });

    await expect(matcher.match({ state, guidelines, position: {} })).rejects.toBeInstanceOf(MatchingUnavailableError);
  });

  it('treats an oracle timeout as unavailability', async () => {
    const evaluator: ConditionEvaluator = { evaluate: () => new Promise(() => undefined) };
    const matcher = new GuidelineMatcher(evaluator, { timeoutMs: 20 });

    await expect(matcher.match({ state, guidelines, position: {} })).rejects.toBeInstanceOf(MatchingUnavailableError);
  });

  it('propagates cancellation as is', async () => {
    const controller = new AbortController();
    controller.abort();
    const matcher = new GuidelineMatcher(new RuleEvaluator());

    await expect(
      matcher.match({ state, guidelines, position: {}, signal: controller.signal, turnId: 'turn-1' })
    ).rejects.toBeInstanceOf(TurnCancelledError);
  });
});

describe('compareMatches', () => {
  it('orders by criticality, then score, then declaration order', () => {
    const matches = [
      matchOf({ id: 'late', condition: 'x' }, 5, 0.8),
      matchOf({ id: 'early', condition: 'x' }, 1, 0.8),
      matchOf({ id: 'confident', condition: 'x' }, 9, 0.95),
      matchOf({ id: 'critical', condition: 'x', criticality: 'high' }, 7, 0.6)
    ];
    expect(matches.sort(compareMatches).map(m => m.guideline.id)).toEqual(['critical', 'confident', 'early', 'late']);
  });
});
