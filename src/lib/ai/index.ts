/**
 * Main exports for the Guideline Agent System
 */

import { getEnv } from '../../config/env';
import { GuidelineAgent, type GuidelineAgentOptions } from './guideline-agent';
import { retailSupportAgent } from './agents/retail-support';
import { LLMConditionEvaluator } from './evaluators/llm-condition-evaluator';
import { LLMComplianceChecker } from './evaluators/llm-compliance-checker';
import { LLMResponseGenerator } from './agents/response-generator';
import { LLMFactExtractor, LLMParameterExtractor } from './agents/extractors';
import { CompositeComplianceChecker, RuleComplianceChecker } from './core/compliance';
import { FirestoreSessionStore } from '../db/repositories/sessions';
import { MemorySessionStore } from '../db/memory-session-store';
import { MemoryContextVariableStore, RedisContextVariableStore } from '../cache/context-variable-store';

// Main agent class
export { GuidelineAgent } from './guideline-agent';
export type { AgentDefinition, AgentDependencies, GuidelineAgentOptions, TurnResult } from './guideline-agent';

// Errors
export * from './core/errors';

// Configuration
export { AI_CONFIG } from './config';
export type { AIConfig } from './config';

/**
 * Retail support agent wired from the environment: LLM adapters for
 * matching, generation and critique, and the configured stores.
 */
export function createDefaultAgent(options: GuidelineAgentOptions = {}): GuidelineAgent {
  const env = getEnv();

  return new GuidelineAgent(
    retailSupportAgent(env.AGENT_NAME),
    {
      evaluator: new LLMConditionEvaluator(),
      generator: new LLMResponseGenerator(),
      checker: new CompositeComplianceChecker([new RuleComplianceChecker(), new LLMComplianceChecker()]),
      sessions: env.SESSION_STORE === 'firestore' ? new FirestoreSessionStore(env.AGENT_NAME) : new MemorySessionStore(),
      variables: env.VARIABLE_STORE === 'redis' ? new RedisContextVariableStore() : new MemoryContextVariableStore(),
      factExtractor: new LLMFactExtractor(),
      parameterExtractor: new LLMParameterExtractor()
    },
    options
  );
}
