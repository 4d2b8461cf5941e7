import { AI_CONFIG } from '../config';
import { GlossaryStore } from '../core/glossary-store';
import type { ConversationState } from '../types/context';

// Recent history as `role: content` lines
export function summarizeConversation(
  state: Pick<ConversationState, 'messages'>,
  window: number = AI_CONFIG.HISTORY_WINDOW
): string {
  return state.messages
    .slice(-window)
    .map(m => `${m.role}: ${m.content}`)
    .join('\n');
}

export function lastMessageOf(state: Pick<ConversationState, 'messages'>): string {
  return state.messages[state.messages.length - 1]?.content || 'N/A';
}

// <conversation_context>, <last_message>, glossary and tool results blocks
export function buildContextXml(state: ConversationState): string {
  let xml = `  <conversation_context>\n`;
  xml += `    <recent_history>\n${summarizeConversation(state)}\n</recent_history>\n`;
  if (state.journey) {
    xml += `    <active_journey id="${state.journey.id}" state="${state.journey.stateId}">${state.journey.title}</active_journey>\n`;
  }
  xml += `  </conversation_context>\n\n`;

  xml += `  <last_message>\n`;
  xml += `    <content>${lastMessageOf(state)}</content>\n`;
  xml += `  </last_message>\n\n`;

  const glossary = GlossaryStore.buildEnrichedContext(state.glossary);
  if (glossary) {
    xml += `  <glossary>${glossary}\n  </glossary>\n\n`;
  }

  const facts = Object.entries(state.facts);
  if (facts.length > 0) {
    xml += `  <known_facts>\n`;
    facts.forEach(([name, value]) => {
      xml += `    <fact name="${name}">${value}</fact>\n`;
    });
    xml += `  </known_facts>\n\n`;
  }

  if (state.toolResults.length > 0) {
    xml += `  <tool_results>\n`;
    state.toolResults.forEach((tr, idx) => {
      xml += `    <tool_result index="${idx + 1}">\n`;
      xml += `      <tool_name>${tr.toolName}</tool_name>\n`;
      xml += `      <result>\n${JSON.stringify(tr.data, null, 2)}\n</result>\n`;
      xml += `    </tool_result>\n`;
    });
    xml += `  </tool_results>\n\n`;
  }

  return xml;
}

/**
 * Parses the first JSON object in a model reply, tolerating markdown code
 * fences and surrounding prose. Throws when none can be parsed.
 */
export function parseJsonReply(text: string): unknown {
  let jsonText = text.trim();

  if (jsonText.startsWith('```')) {
    jsonText = jsonText.replace(/```json?\n?/g, '').replace(/```\n?$/g, '').trim();
  }

  const start = jsonText.indexOf('{');
  const end = jsonText.lastIndexOf('}');
  if (start === -1 || end < start) {
    throw new Error('No JSON object found in model reply');
  }
  return JSON.parse(jsonText.slice(start, end + 1));
}
