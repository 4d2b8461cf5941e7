import type { JourneyInput } from '../types/journey';

// Book an in-store service: service -> date -> slot lookup -> confirmation
export const storeAppointmentJourney: JourneyInput = {
  id: 'store_appointment',
  title: 'Book an in-store appointment',
  description: 'Collects the service and a date, finds a slot and confirms it',
  conditions: [
    'The customer wants to book an in-store appointment',
    'The customer asks for a boot fitting, jacket tailoring or a gear consultation'
  ],
  initialStateId: 'ask_service',
  states: [
    {
      id: 'ask_service',
      kind: 'chat',
      instruction: 'Ask which service they want: boot fitting, jacket tailoring or gear consultation',
      collects: ['service']
    },
    {
      id: 'ask_date',
      kind: 'chat',
      instruction: 'Ask which date suits them, in YYYY-MM-DD format',
      collects: ['date']
    },
    { id: 'check_slot', kind: 'tool', tool: 'check_availability' },
    {
      id: 'confirm',
      kind: 'chat',
      instruction: 'Confirm the service and the slot returned by check_availability',
      compositionMode: 'composited'
    }
  ],
  transitions: [
    { from: 'ask_service', to: 'ask_date' },
    { from: 'ask_date', to: 'check_slot' },
    { from: 'check_slot', to: 'confirm' }
  ],
  fields: [
    {
      name: 'service',
      description: 'The in-store service the customer wants',
      pattern: '\\b(boot fitting|jacket tailoring|gear consultation)\\b'
    },
    {
      name: 'date',
      description: 'Requested appointment date as YYYY-MM-DD',
      pattern: '\\b(\\d{4}-\\d{2}-\\d{2})\\b'
    }
  ]
};
