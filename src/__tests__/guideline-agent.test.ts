import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { GuidelineAgent, type AgentDefinition } from '../lib/ai/guideline-agent';
import {
  ConfigurationError,
  MatchingUnavailableError,
  SessionNotFoundError,
  TurnCancelledError,
  TurnFailedError
} from '../lib/ai/core/errors';
import { defineTool } from '../lib/ai/types/tool';
import { MemorySessionStore } from '../lib/db/memory-session-store';
import { MemoryContextVariableStore } from '../lib/cache/context-variable-store';
import { RuleComplianceChecker } from '../lib/ai/core/compliance';
import type { DraftRequest } from '../lib/ai/core/response-generator';
import type { Session, TurnCommit } from '../lib/ai/types/session';
import { RuleEvaluator, ScriptedGenerator, type ConditionRule } from './helpers/fakes';

const NOW = new Date('2026-10-19T09:00:00.000Z');

function definition(overrides: Partial<AgentDefinition>, lookups: { count: number }): AgentDefinition {
  return {
    name: 'test-agent',
    description: 'Agent used by the pipeline tests',
    guidelines: [
      { id: 'greet', condition: 'customer greets', action: 'Greet back', criticality: 'low' },
      { id: 'help', condition: 'customer asks for help', action: 'Offer help', tools: ['ping'] },
      { id: 'stop', condition: 'customer wants to stop', action: 'Acknowledge and stop', journeyControl: 'abandon' }
    ],
    journeys: [
      {
        id: 'booking',
        title: 'Booking',
        conditions: ['customer wants to book'],
        initialStateId: 'ask_name',
        states: [
          { id: 'ask_name', kind: 'chat', instruction: 'Ask for the name to book under', collects: ['name'] },
          { id: 'confirm', kind: 'chat', instruction: 'Confirm the booking' }
        ],
        transitions: [{ from: 'ask_name', to: 'confirm' }],
        fields: [{ name: 'name', description: 'Name for the booking', pattern: 'my name is (\\w+)' }]
      }
    ],
    tools: [
      defineTool({
        name: 'ping',
        description: 'Answers pong',
        inputSchema: z.object({}),
        execute: async () => ({ data: 'pong', variables: { visits: 1, banner: 'from a tool' } })
      }),
      defineTool({
        name: 'get_tier',
        description: 'Reads the loyalty tier',
        inputSchema: z.object({}),
        execute: async () => {
          lookups.count++;
          return { data: 'gold', variables: { tier: 'gold' } };
        }
      })
    ],
    variables: [
      { name: 'tier', scope: 'customer', freshnessMs: 60_000, refresher: 'get_tier' },
      { name: 'visits', scope: 'customer' },
      { name: 'banner', scope: 'tag' }
    ],
    ...overrides
  };
}

// Fails the first `failures` commits, then behaves normally
class FlakySessionStore extends MemorySessionStore {
  constructor(private failures: number) {
    super();
  }

  async commitTurn(sessionId: string, commit: TurnCommit): Promise<Session> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('firestore down');
    }
    return super.commitTurn(sessionId, commit);
  }
}

function build(
  script: (request: DraftRequest, call: number) => string = (_req, call) => `reply ${call}`,
  overrides: Partial<AgentDefinition> = {},
  extras: { rules?: Record<string, ConditionRule>; sessions?: MemorySessionStore } = {}
) {
  const evaluator = new RuleEvaluator({
    'customer greets': /\b(hi|hello)\b/i,
    'customer asks for help': /\bhelp\b/i,
    'customer wants to stop': /\bstop\b/i,
    'customer wants to book': /\bbook\b/i,
    ...extras.rules
  });
  const generator = new ScriptedGenerator(script);
  const sessions = extras.sessions ?? new MemorySessionStore();
  const variables = new MemoryContextVariableStore();
  const lookups = { count: 0 };
  const agent = new GuidelineAgent(
    definition(overrides, lookups),
    { evaluator, generator, checker: new RuleComplianceChecker(), sessions, variables },
    { clock: () => NOW }
  );
  return { agent, evaluator, generator, sessions, variables, lookups };
}

describe('GuidelineAgent', () => {
  describe('configuration', () => {
    it('rejects a guideline bound to an unknown tool', () => {
      expect(() => build(undefined, { guidelines: [{ id: 'g', condition: 'c', tools: ['nope'] }] })).toThrow(ConfigurationError);
    });

    it('rejects variables declared twice or refreshed by an unknown tool', () => {
      expect(() => build(undefined, { variables: [{ name: 'tier' }, { name: 'tier' }] })).toThrow(ConfigurationError);
      expect(() => build(undefined, { variables: [{ name: 'tier', refresher: 'nope' }] })).toThrow(ConfigurationError);
    });

    it('rejects canned responses scoped to an unknown journey', () => {
      const cannedResponses = [{ id: 'x', template: 'Hi', signals: ['hi'], scope: { kind: 'journey' as const, journeyId: 'ghost' } }];
      expect(() => build(undefined, { cannedResponses })).toThrow(ConfigurationError);
    });

    it('rejects journeys with a tool state for an unknown tool', () => {
      const journeys = [
        { id: 'j', title: 'J', conditions: ['c'], initialStateId: 's', states: [{ id: 's', kind: 'tool' as const, tool: 'nope' }] }
      ];
      expect(() => build(undefined, { journeys })).toThrow(ConfigurationError);
    });

    it('describes itself', () => {
      const { agent } = build();
      expect(agent.describe()).toMatchObject({
        name: 'test-agent',
        description: 'Agent used by the pipeline tests',
        defaultCompositionMode: 'fluid',
        journeys: [{ id: 'booking', title: 'Booking', states: 2 }],
        tools: ['ping', 'get_tier'],
        variables: ['tier', 'visits', 'banner'],
        cannedResponses: 0
      });
      expect(agent.describe().guidelines.map(g => g.id)).toEqual(['greet', 'help', 'stop']);
    });
  });

  describe('processMessage', () => {
    it('fails for an unknown session', async () => {
      const { agent } = build();
      await expect(agent.processMessage('missing', 'hello')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('appends customer message, tool calls and reply with contiguous offsets', async () => {
      const { agent } = build();
      const session = await agent.createSession('customer-1');

      const first = await agent.processMessage(session.id, 'hello, I need help');
      expect(first).toMatchObject({ reply: 'reply 1', status: 'composed', attempts: 1 });

      await agent.processMessage(session.id, 'thanks');
      const events = await agent.listEvents(session.id);

      expect(events.map(e => [e.offset, e.kind, e.source])).toEqual([
        [0, 'message', 'customer'],
        [1, 'tool', 'agent'],
        [2, 'message', 'agent'],
        [3, 'message', 'customer'],
        [4, 'message', 'agent']
      ]);
      expect(events.slice(0, 3).every(e => e.turnId === first.turnId)).toBe(true);
      expect((await agent.getSession(session.id)).eventCount).toBe(5);
    });

    it('runs turns of the same customer one after the other', async () => {
      const { agent, generator } = build();
      const session = await agent.createSession('customer-1');

      await Promise.all([agent.processMessage(session.id, 'hello'), agent.processMessage(session.id, 'thanks')]);

      expect(generator.requests[1].state.messages).toEqual([
        { role: 'user', content: 'hello' },
        { role: 'assistant', content: 'reply 1' },
        { role: 'user', content: 'thanks' }
      ]);
    });

    it('retries the whole turn when matching is briefly unavailable', async () => {
      const { agent, evaluator } = build();
      const session = await agent.createSession('customer-1');
      evaluator.failuresLeft = 1;

      const result = await agent.processMessage(session.id, 'hello');

      expect(result.attempts).toBe(2);
      expect(await agent.listEvents(session.id)).toHaveLength(2);
    });

    it('gives up after the last attempt and commits nothing', async () => {
      const { agent, evaluator } = build();
      const session = await agent.createSession('customer-1');
      evaluator.failuresLeft = 1000;

      await expect(agent.processMessage(session.id, 'hello')).rejects.toBeInstanceOf(MatchingUnavailableError);
      expect(await agent.listEvents(session.id)).toEqual([]);
    });

    it('does not run a journey tool again when the turn is retried', async () => {
      const holds = { count: 0 };
      let partyChecks = 0;
      const { agent } = build(
        undefined,
        {
          guidelines: [
            {
              id: 'party_size',
              condition: 'customer mentions a party size',
              action: 'Repeat the party size back',
              scope: { kind: 'state', journeyId: 'reservation', stateId: 'confirm' }
            }
          ],
          journeys: [
            {
              id: 'reservation',
              title: 'Reservation',
              conditions: ['customer wants to reserve'],
              initialStateId: 'hold',
              states: [
                { id: 'hold', kind: 'tool', tool: 'hold_table' },
                { id: 'confirm', kind: 'chat', instruction: 'Confirm the reservation' }
              ],
              transitions: [{ from: 'hold', to: 'confirm' }]
            }
          ],
          tools: [
            defineTool({
              name: 'hold_table',
              description: 'Holds a table',
              inputSchema: z.object({}),
              execute: async () => {
                holds.count++;
                return { data: 'held' };
              }
            })
          ],
          variables: []
        },
        {
          rules: {
            'customer wants to reserve': /\breserve\b/i,
            'customer mentions a party size': () => {
              partyChecks++;
              if (partyChecks === 1) throw new Error('oracle offline');
              return true;
            }
          }
        }
      );
      const session = await agent.createSession('customer-1');

      const result = await agent.processMessage(session.id, 'reserve a table for four');

      expect(result.attempts).toBe(2);
      expect(holds.count).toBe(1);
      expect(result.journey).toMatchObject({ journeyId: 'reservation', stateId: 'confirm', status: 'active' });
      expect(result.trace.tools).toEqual([{ name: 'hold_table', status: 'success' }]);
      expect(result.trace.guidelines.map(g => g.id)).toEqual(['party_size']);
      const events = await agent.listEvents(session.id);
      expect(events.filter(e => e.kind === 'tool')).toHaveLength(1);
    });

    it('writes no variables when the session commit fails', async () => {
      const { agent, variables } = build(undefined, {}, { sessions: new FlakySessionStore(1) });
      const session = await agent.createSession('customer-1');
      const tier = [{ name: 'tier', owner: 'customer:customer-1' }];

      await expect(agent.processMessage(session.id, 'hello')).rejects.toBeInstanceOf(TurnFailedError);
      expect(await agent.listEvents(session.id)).toEqual([]);
      expect(await variables.getMany(tier)).toEqual([undefined]);

      await agent.processMessage(session.id, 'hello');
      expect(await variables.getMany(tier)).toEqual([{ value: 'gold', refreshedAt: '2026-10-19T09:00:00.000Z' }]);
    });
  });

  describe('cancellation', () => {
    it('commits nothing for a turn cancelled before it starts', async () => {
      const { agent, generator } = build();
      const session = await agent.createSession('customer-1');
      const controller = new AbortController();
      controller.abort();

      await expect(agent.processMessage(session.id, 'hello', { signal: controller.signal })).rejects.toBeInstanceOf(TurnCancelledError);
      expect(generator.requests).toHaveLength(0);
      expect(await agent.listEvents(session.id)).toEqual([]);
    });

    it('discards staged writes when cancelled after the reply was drafted', async () => {
      const controller = new AbortController();
      const { agent, variables } = build(() => {
        controller.abort();
        return 'too late';
      });
      const session = await agent.createSession('customer-1');

      await expect(agent.processMessage(session.id, 'I need help', { signal: controller.signal })).rejects.toBeInstanceOf(TurnCancelledError);

      expect(await agent.listEvents(session.id)).toEqual([]);
      expect((await agent.getSession(session.id)).eventCount).toBe(0);
      expect(
        await variables.getMany([
          { name: 'visits', owner: 'customer:customer-1' },
          { name: 'tier', owner: 'customer:customer-1' }
        ])
      ).toEqual([undefined, undefined]);
    });
  });

  describe('context variables', () => {
    it('refreshes stale values, stages tool writes and commits them with the turn', async () => {
      const { agent, generator, variables } = build();
      await variables.writeMany([{ name: 'banner', owner: 'tag:vip', value: 'VIP night', refreshedAt: NOW.toISOString() }]);
      const session = await agent.createSession('customer-1', ['vip']);

      await agent.processMessage(session.id, 'I need help');

      expect(generator.requests[0].state.variables).toEqual({ banner: 'VIP night', tier: 'gold', visits: 1 });
      expect(
        await variables.getMany([
          { name: 'tier', owner: 'customer:customer-1' },
          { name: 'visits', owner: 'customer:customer-1' },
          { name: 'banner', owner: 'tag:vip' }
        ])
      ).toEqual([
        { value: 'gold', refreshedAt: '2026-10-19T09:00:00.000Z' },
        { value: 1, refreshedAt: '2026-10-19T09:00:00.000Z' },
        { value: 'VIP night', refreshedAt: '2026-10-19T09:00:00.000Z' }
      ]);
    });

    it('does not refresh a value that is still fresh', async () => {
      const { agent, generator, lookups } = build();
      const session = await agent.createSession('customer-1');

      await agent.processMessage(session.id, 'hello');
      await agent.processMessage(session.id, 'hello again');

      expect(generator.requests.map(r => r.state.variables.tier)).toEqual(['gold', 'gold']);
      expect(lookups.count).toBe(1);
    });

    it('takes a tag value from the first tag that holds one', async () => {
      const { agent, generator, variables } = build();
      await variables.writeMany([
        { name: 'banner', owner: 'tag:eu', value: 'EU sale', refreshedAt: NOW.toISOString() },
        { name: 'banner', owner: 'tag:vip', value: 'VIP night', refreshedAt: NOW.toISOString() }
      ]);
      const both = await agent.createSession('customer-1', ['vip', 'eu']);
      const euOnly = await agent.createSession('customer-2', ['outlet', 'eu']);

      await agent.processMessage(both.id, 'hello');
      await agent.processMessage(euOnly.id, 'hello');

      expect(generator.requests.map(r => r.state.variables.banner)).toEqual(['VIP night', 'EU sale']);
    });

    it('refreshes a tag-scoped value separately for every tag', async () => {
      const { agent, generator, variables } = build(undefined, {
        guidelines: [],
        tools: [
          defineTool({
            name: 'get_notice',
            description: 'Reads the notice shown to a tag',
            inputSchema: z.object({}),
            execute: async context => ({ data: `notice for ${context.owner ?? 'nobody'}` })
          })
        ],
        variables: [{ name: 'notice', scope: 'tag', freshnessMs: 60_000, refresher: 'get_notice' }]
      });
      const session = await agent.createSession('customer-1', ['eu', 'vip']);

      await agent.processMessage(session.id, 'hello');

      expect(
        await variables.getMany([
          { name: 'notice', owner: 'tag:eu' },
          { name: 'notice', owner: 'tag:vip' }
        ])
      ).toEqual([
        { value: 'notice for tag:eu', refreshedAt: '2026-10-19T09:00:00.000Z' },
        { value: 'notice for tag:vip', refreshedAt: '2026-10-19T09:00:00.000Z' }
      ]);
      expect(generator.requests[0].state.variables).toEqual({ notice: 'notice for tag:eu' });
    });
  });

  describe('journeys', () => {
    it('activates a journey and presents its first state', async () => {
      const { agent, generator } = build();
      const session = await agent.createSession('customer-1');

      const result = await agent.processMessage(session.id, 'I want to book a table');

      expect(result.journey).toMatchObject({ journeyId: 'booking', stateId: 'ask_name', phase: 'presented', status: 'active' });
      expect(result.trace.journeyState).toBe('ask_name');
      expect(generator.requests[0].journeyInstruction).toBe('Ask for the name to book under');
      const events = await agent.listEvents(session.id);
      expect(events.filter(e => e.kind === 'status')).toMatchObject([{ status: 'journey_activated', detail: 'booking' }]);
    });

    it('stays on a question until the customer answers it', async () => {
      const { agent, generator } = build();
      const session = await agent.createSession('customer-1');

      await agent.processMessage(session.id, 'I want to book a table');
      const result = await agent.processMessage(session.id, 'tomorrow evening');

      expect(result.journey).toMatchObject({ stateId: 'ask_name', status: 'active' });
      expect(generator.requests[1].journeyInstruction).toBe('Ask for the name to book under');
    });

    it('skips states whose facts are already known and completes on the next turn', async () => {
      const { agent } = build();
      const session = await agent.createSession('customer-1');

      const first = await agent.processMessage(session.id, 'I want to book, my name is Dana');
      expect(first.journey).toMatchObject({ stateId: 'confirm', facts: { name: 'Dana' }, path: ['ask_name', 'confirm'] });

      const second = await agent.processMessage(session.id, 'thanks');
      expect(second.journey?.status).toBe('completed');
      expect(second.trace.journeyState).toBeUndefined();

      const statuses = (await agent.listEvents(session.id)).flatMap(e => (e.kind === 'status' ? [[e.status, e.detail]] : []));
      expect(statuses).toEqual([
        ['journey_activated', 'booking'],
        ['journey_state_skipped', 'ask_name'],
        ['journey_completed', 'booking']
      ]);
    });

    it('abandons the journey and does not reactivate it in the same turn', async () => {
      const { agent, generator } = build();
      const session = await agent.createSession('customer-1');

      await agent.processMessage(session.id, 'I want to book a table');
      const result = await agent.processMessage(session.id, 'stop, I do not want to book');

      expect(result.journey).toMatchObject({ journeyId: 'booking', status: 'abandoned' });
      expect(generator.requests[1].journeyInstruction).toBeUndefined();
      const statuses = (await agent.listEvents(session.id)).flatMap(e => (e.kind === 'status' ? [e.status] : []));
      expect(statuses).toEqual(['journey_activated', 'journey_abandoned']);
    });

    it('starts another journey on the turn after the previous one finished', async () => {
      const { agent, generator } = build(
        undefined,
        {
          journeys: [
            {
              id: 'booking',
              title: 'Booking',
              conditions: ['customer wants to book'],
              initialStateId: 'done',
              states: [{ id: 'done', kind: 'chat', instruction: 'Confirm the booking' }]
            },
            {
              id: 'support',
              title: 'Support',
              conditions: ['customer needs support'],
              initialStateId: 'ask_issue',
              states: [{ id: 'ask_issue', kind: 'chat', instruction: 'Ask what went wrong' }]
            }
          ]
        },
        { rules: { 'customer needs support': /\bsupport\b/i } }
      );
      const session = await agent.createSession('customer-1');

      const first = await agent.processMessage(session.id, 'book please');
      expect(first.journey).toMatchObject({ journeyId: 'booking', stateId: 'done', phase: 'presented', status: 'active' });

      const second = await agent.processMessage(session.id, 'now I need support');
      expect(second.journey).toMatchObject({ journeyId: 'support', stateId: 'ask_issue', status: 'active' });
      expect(generator.requests[1].journeyInstruction).toBe('Ask what went wrong');

      const statuses = (await agent.listEvents(session.id)).flatMap(e => (e.kind === 'status' ? [[e.status, e.detail]] : []));
      expect(statuses).toEqual([
        ['journey_activated', 'booking'],
        ['journey_completed', 'booking'],
        ['journey_activated', 'support']
      ]);
    });
  });

  describe('configuration edits', () => {
    it('stops evaluating a deactivated guideline', async () => {
      const { agent, evaluator } = build();
      const session = await agent.createSession('customer-1');
      agent.setGuidelineEnabled('greet', false);

      const result = await agent.processMessage(session.id, 'hello');

      expect(evaluator.calls).not.toContain('customer greets');
      expect(result.trace.guidelines).toEqual([]);
    });

    it('exposes glossary edits', () => {
      const { agent } = build();
      agent.upsertGlossaryTerm({ name: 'RMA', description: 'Return authorization number' });
      expect(agent.describe().glossary).toEqual([{ name: 'RMA', description: 'Return authorization number', synonyms: [] }]);
    });
  });
});
