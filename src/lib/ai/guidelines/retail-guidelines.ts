import type { GuidelineInput } from '../types/guideline';

/**
 * Guidelines for the retail support agent
 */
export const retailGuidelines: GuidelineInput[] = [
  {
    id: 'greeting',
    condition: 'The customer greets the agent and the conversation has just started',
    action: 'Greet the customer briefly and ask how you can help. Mention free return shipping when their loyalty tier is gold',
    criticality: 'low',
    tags: ['greeting']
  },

  // ===== Orders and returns =====
  {
    id: 'order_status',
    condition: 'The customer asks where their order is or what its status is',
    action: 'Share the current status of the order; ask for the order number only if it is unknown',
    criticality: 'medium',
    tools: ['lookup_order'],
    tags: ['orders']
  },
  {
    id: 'return_request',
    condition: 'The customer wants to return an item',
    action: 'Get the order number, then help the customer return the item and give them the return number',
    criticality: 'medium',
    tools: ['process_return'],
    glossaryTerms: ['RMA', 'Return window'],
    tags: ['returns']
  },
  {
    id: 'return_policy',
    condition: 'The customer asks about the return policy or how long they have to return something',
    action: 'Quote the approved return policy',
    criticality: 'medium',
    compositionMode: 'strict',
    tags: ['returns']
  },

  // ===== Products =====
  {
    id: 'recommend_products',
    condition: 'The customer asks about products or wants a recommendation',
    action: 'Recommend products that match the preference the customer stated, with their prices',
    criticality: 'medium',
    tools: ['recommend_products'],
    tags: ['products']
  },
  {
    id: 'protect_cost_basis',
    condition: 'The customer asks about products, prices or recommendations',
    action: 'Never disclose the internal cost basis, wholesale prices or margins of any product',
    criticality: 'high',
    restrictions: ['cost basis', 'wholesale (?:price|cost)', '\\bmargins?\\b', '\\bcostBasis\\b'],
    glossaryTerms: ['Cost basis'],
    tags: ['products', 'confidential']
  },

  // ===== Discounts =====
  {
    id: 'offer_discount',
    condition: 'The customer is unhappy with a purchase or a delay',
    action: 'Apologize and offer a 10% discount code on their next order',
    criticality: 'medium',
    tags: ['discounts']
  },
  {
    id: 'clearance_no_discount',
    condition: 'The customer is talking about a clearance or final-sale item',
    action: 'Do not offer additional discounts on clearance items',
    criticality: 'high',
    conflictsWith: ['offer_discount'],
    tags: ['discounts']
  },

  // ===== Privacy =====
  {
    id: 'protect_ssn',
    condition: 'The customer shares or asks about a social security number',
    action: 'Never repeat a social security number; tell the customer we never need it',
    criticality: 'high',
    restrictions: ['\\b\\d{3}-\\d{2}-\\d{4}\\b'],
    tags: ['privacy']
  },

  // ===== Appointments =====
  {
    id: 'stop_booking',
    condition: 'The customer no longer wants to book an appointment',
    action: 'Acknowledge that the booking is cancelled and ask if there is anything else',
    criticality: 'medium',
    journeyControl: 'abandon',
    scope: { kind: 'journey', journeyId: 'store_appointment' },
    tags: ['appointments']
  },
  {
    id: 'appointment_duration',
    condition: 'The customer asks how long the appointment takes',
    action: 'Explain that appointments take about 30 minutes',
    criticality: 'low',
    scope: { kind: 'journey', journeyId: 'store_appointment' },
    glossaryTerms: ['Boot fitting'],
    tags: ['appointments']
  }
];
