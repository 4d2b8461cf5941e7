import { describe, it, expect } from 'vitest';
import { buildBatchPrompt, buildSinglePrompt, parseVerdictText } from '../lib/ai/evaluators/llm-condition-evaluator';
import { buildCompliancePrompt } from '../lib/ai/evaluators/llm-compliance-checker';
import { buildSystemPrompt } from '../lib/ai/agents/response-generator';
import { buildExtractionPrompt } from '../lib/ai/agents/extractors';
import { buildContextXml, lastMessageOf, parseJsonReply, summarizeConversation } from '../lib/ai/utils/prompt-helpers';
import { getModel } from '../lib/ai/openrouter';
import type { DraftRequest } from '../lib/ai/core/response-generator';
import { makeState, registered } from './helpers/fakes';

const state = makeState({
  messages: [
    { role: 'user', content: 'hi' },
    { role: 'assistant', content: 'Hello! How can I help?' },
    { role: 'user', content: 'where is order A100?' }
  ],
  facts: { date: '2026-11-02' },
  glossary: [{ name: 'RMA', description: 'Return authorization number', synonyms: ['return number'] }],
  toolResults: [{ toolName: 'lookup_order', data: { id: 'A100' } }],
  journey: { id: 'store_appointment', title: 'Book an in-store appointment', stateId: 'ask_date' }
});

describe('parseJsonReply', () => {
  it('reads JSON out of code fences and prose', () => {
    expect(parseJsonReply('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
    expect(parseJsonReply('Here you go: {"a": {"b": 2}} hope it helps')).toEqual({ a: { b: 2 } });
  });

  it('throws when there is no object', () => {
    expect(() => parseJsonReply('no json here')).toThrow('No JSON object found in model reply');
  });
});

describe('parseVerdictText', () => {
  it('accepts string booleans and clamps confidence', () => {
    expect(parseVerdictText('```json\n{"applies": "true", "confidence": 1.4, "reasoning": "clear"}\n```')).toEqual({
      applies: true,
      confidence: 1,
      reason: 'clear'
    });
  });

  it('fills in what the model left out', () => {
    expect(parseVerdictText('{"applies": "false", "confidence": "high"}')).toEqual({
      applies: false,
      confidence: 0.5,
      reason: 'No reasoning provided'
    });
    expect(parseVerdictText('{"applies": false, "confidence": -0.2, "reasoning": "no"}').confidence).toBe(0);
  });
});

describe('prompt helpers', () => {
  it('summarizes the most recent messages', () => {
    expect(summarizeConversation(state, 2)).toBe('assistant: Hello! How can I help?\nuser: where is order A100?');
    expect(lastMessageOf(makeState())).toBe('N/A');
  });

  it('renders context, facts, glossary and tool results', () => {
    const xml = buildContextXml(state);
    expect(xml).toContain('<active_journey id="store_appointment" state="ask_date">Book an in-store appointment</active_journey>');
    expect(xml).toContain('<content>where is order A100?</content>');
    expect(xml).toContain('- **RMA** (also: return number): Return authorization number');
    expect(xml).toContain('<fact name="date">2026-11-02</fact>');
    expect(xml).toContain('<tool_name>lookup_order</tool_name>');
  });
});

describe('condition prompts', () => {
  it('numbers every condition of a batch', () => {
    const prompt = buildBatchPrompt(['The customer greets', 'The customer asks about an order'], state);
    expect(prompt).toContain('<condition index="1">The customer greets</condition>');
    expect(prompt).toContain('<condition index="2">The customer asks about an order</condition>');
    expect(prompt).toContain('Evaluate ALL conditions in the given order (1 to 2)');
  });

  it('asks about a single condition', () => {
    expect(buildSinglePrompt('The customer greets', state)).toContain('<condition>The customer greets</condition>');
  });
});

describe('buildSystemPrompt', () => {
  const request: DraftRequest = {
    state: makeState({ variables: { loyalty_tier: 'gold', visits: 2 }, facts: { service: 'boot fitting' } }),
    mode: 'fluid',
    guidelines: [{ id: 'protect_ssn', condition: 'SSN is mentioned', action: 'Never repeat it', criticality: 'high' }],
    journeyInstruction: 'Ask for a date',
    tools: [
      { toolName: 'lookup_order', args: {}, attempts: 1, outcome: { status: 'success', data: { id: 'A100' }, cannedFields: {} }, variables: {} },
      { toolName: 'process_return', args: {}, attempts: 0, outcome: { status: 'deferred', missing: ['order_id'] }, variables: {} }
    ],
    styleAnchor: 'You are booked for {{service}}.',
    feedback: { previousDraft: 'Your SSN is 123-45-6789', violations: ['protect_ssn: repeats the SSN'] }
  };

  it('lists guidelines, tool outcomes and variables', () => {
    const prompt = buildSystemPrompt(request);
    expect(prompt).toContain('<guideline id="protect_ssn" criticality="high">');
    expect(prompt).toContain('<then>Never repeat it</then>');
    expect(prompt).toContain('<tool name="lookup_order" status="success">\n{\n  "id": "A100"\n}\n    </tool>');
    expect(prompt).toContain('Not called yet. Ask the customer for: order_id');
    expect(prompt).toContain('<variable name="loyalty_tier">gold</variable>');
    expect(prompt).toContain('<variable name="visits">2</variable>');
    expect(prompt).toContain('<variable name="service">boot fitting</variable>');
  });

  it('adds the style anchor and critique feedback', () => {
    const prompt = buildSystemPrompt(request);
    expect(prompt).toContain('<template>You are booked for {{service}}.</template>');
    expect(prompt).toContain('<previous_draft>Your SSN is 123-45-6789</previous_draft>');
    expect(prompt).toContain('<violation>protect_ssn: repeats the SSN</violation>');
  });

  it('leaves the journey block out without an active journey', () => {
    expect(buildSystemPrompt(request)).not.toContain('<journey ');
    expect(buildSystemPrompt({ ...request, guidelines: [] })).not.toContain('<guidelines>');
  });
});

describe('extraction and compliance prompts', () => {
  it('describes the fields to extract', () => {
    const prompt = buildExtractionPrompt('Collect the booking details', [{ name: 'date', description: 'Date as YYYY-MM-DD' }], state);
    expect(prompt).toContain('<goal>Collect the booking details</goal>');
    expect(prompt).toContain('<field name="date">Date as YYYY-MM-DD</field>');
  });

  it('puts the draft under review next to the mandatory guidelines', () => {
    const guideline = registered({ id: 'protect_ssn', condition: 'SSN is mentioned', action: 'Never repeat it', criticality: 'high' });
    const prompt = buildCompliancePrompt('All good', [guideline], state);
    expect(prompt).toContain('<guideline id="protect_ssn">\n      <when>SSN is mentioned</when>\n      <then>Never repeat it</then>');
    expect(prompt).toContain('<reply_to_review>All good</reply_to_review>');
  });
});

describe('getModel', () => {
  it('routes model names to their provider', () => {
    const modelId = (name: string) => {
      const model = getModel(name);
      return typeof model === 'string' ? model : model.modelId;
    };
    expect(modelId('groq/openai/gpt-oss-20b')).toBe('openai/gpt-oss-20b');
    expect(modelId('gpt-4o-mini')).toBe('gpt-4o-mini');
    expect(modelId('x-ai/grok-4-fast')).toBe('x-ai/grok-4-fast');
  });
});
