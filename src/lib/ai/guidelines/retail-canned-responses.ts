import type { CannedResponseInput } from '../types/composition';

// Approved replies; {{field}} values come from variables, journey facts and tool results
export const retailCannedResponses: CannedResponseInput[] = [
  {
    id: 'return_policy',
    template: 'Delivered items can be returned within 30 days of delivery. Gold members get free return shipping.',
    signals: ['return policy', 'how long do I have to return', 'return window days']
  },
  {
    id: 'return_started',
    template: 'Your return for order {{order_id}} has been started. Your return number is {{return_id}}.',
    signals: ['return started order number', 'return initiated for order']
  },
  {
    id: 'order_status',
    template: 'Order {{order_id}} is currently {{order_status}}.',
    signals: ['order status', 'where is my order']
  },
  {
    id: 'appointment_confirmed',
    template: 'You are booked for {{service}} on {{slot}}. See you in store!',
    signals: ['confirm appointment slot', 'booked service slot'],
    scope: { kind: 'state', journeyId: 'store_appointment', stateId: 'confirm' }
  }
];
