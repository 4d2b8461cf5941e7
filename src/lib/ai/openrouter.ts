/**
 * Model provider configuration
 *
 * Resolves a model name to an OpenRouter, Groq or OpenAI model instance
 */

import { groq } from '@ai-sdk/groq';
import { openai } from '@ai-sdk/openai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import type { LanguageModel } from 'ai';

// Create OpenRouter instance
export const openrouter = createOpenRouter({
  apiKey: process.env.OPENROUTER_API_KEY
});

/**
 * Get OpenRouter model instance
 * @param modelName - e.g. 'openai/gpt-4o-mini', 'x-ai/grok-4-fast'
 */
export function getOpenRouterModel(modelName: string): LanguageModel {
  return openrouter(modelName);
}

// 'groq/...' goes to Groq, 'gpt-...' to OpenAI, everything else to OpenRouter
export function getModel(modelName: string): LanguageModel {
  if (modelName.startsWith('groq/')) {
    return groq(modelName.replace('groq/', ''));
  }
  return modelName.startsWith('gpt') ? openai(modelName) : getOpenRouterModel(modelName);
}
