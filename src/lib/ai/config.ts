/**
 * AI Configuration for the Guideline Engine
 *
 * Defines models and settings for each component of the guideline agent
 */

export const AI_CONFIG = {
  // Models for each component (OpenRouter format: provider/model-name)
  MATCHING_MODEL: 'groq/openai/gpt-oss-120b',   // Condition evaluation (guidelines, journeys, transitions)
  COMPOSER_MODEL: 'openai/gpt-4o-mini',         // Reply generation
  CRITIQUE_MODEL: 'x-ai/grok-4-fast',           // Compliance check of HIGH guidelines
  EXTRACTION_MODEL: 'groq/openai/gpt-oss-20b',  // Journey facts and tool parameters

  // Thresholds and limits
  GUIDELINE_THRESHOLD: 0.6,           // Minimum confidence to activate a guideline
  JOURNEY_THRESHOLD: 0.6,             // Minimum confidence to activate a journey or take a transition
  SIGNAL_THRESHOLD: 0.6,              // Minimum overlap for a canned-response signal to match
  MATCHING_BATCH_SIZE: 5,             // Guidelines evaluated per oracle call
  MAX_GLOSSARY_TERMS: 5,              // Maximum terms attached to the oracle context
  HISTORY_WINDOW: 10,                 // Messages passed to prompts

  // Timeouts (ms)
  MATCHING_TIMEOUT_MS: 15000,
  TOOL_TIMEOUT_MS: 10000,
  REFRESH_TIMEOUT_MS: 5000,
  COMPOSER_TIMEOUT_MS: 30000,
  CRITIQUE_TIMEOUT_MS: 15000,

  // Retries
  TURN_MAX_ATTEMPTS: 2,               // Whole-turn retries when matching is unavailable
  CRITIQUE_MAX_REGENERATIONS: 1,      // Regenerations after a failed compliance check

  // Temperature settings
  MATCHING_TEMPERATURE: 0,
  COMPOSER_TEMPERATURE: 0.7,
  CRITIQUE_TEMPERATURE: 0,

  // Customer-facing fallbacks
  DEFLECTION_MESSAGE: "I'm sorry, I can't help with that right now. A member of our team will follow up with you shortly.",
  NO_APPROVED_RESPONSE_MESSAGE: "I'm sorry, I don't have an approved answer for that. Let me connect you with a member of our team."
} as const;

export type AIConfig = typeof AI_CONFIG;

