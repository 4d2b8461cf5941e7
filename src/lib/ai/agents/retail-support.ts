import type { AgentDefinition } from '../guideline-agent';
import { retailGlossary } from '../glossary/retail-terms';
import { retailGuidelines } from '../guidelines/retail-guidelines';
import { retailCannedResponses } from '../guidelines/retail-canned-responses';
import { storeAppointmentJourney } from '../journeys/store-appointment';
import { retailTools } from '../tools/retail-tools';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Customer support agent for an outdoor-gear store: orders, returns,
 * product recommendations and in-store appointments
 */
export function retailSupportAgent(name: string): AgentDefinition {
  return {
    name,
    description: 'Customer support for an outdoor-gear store',
    defaultCompositionMode: 'fluid',
    glossary: retailGlossary,
    guidelines: retailGuidelines,
    journeys: [storeAppointmentJourney],
    tools: retailTools,
    variables: [
      {
        name: 'loyalty_tier',
        description: 'Loyalty program tier',
        scope: 'customer',
        freshnessMs: DAY_MS,
        refresher: 'get_loyalty_tier'
      },
      { name: 'last_return_id', description: 'Most recent return number', scope: 'customer' },
      { name: 'store_notice', description: 'Notice for customers of a store location', scope: 'tag' }
    ],
    cannedResponses: retailCannedResponses
  };
}
