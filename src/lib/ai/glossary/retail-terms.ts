import type { GlossaryTermInput } from '../types/glossary';

// Store vocabulary the oracle and the composer should read the same way
export const retailGlossary: GlossaryTermInput[] = [
  // Returns
  {
    name: 'RMA',
    description: 'Return merchandise authorization; the return number issued when a return starts',
    synonyms: ['return number', 'return authorization']
  },
  {
    name: 'Return window',
    description: 'Delivered items can be returned within 30 days of delivery',
    synonyms: ['return period']
  },
  { name: 'Store credit', description: 'Refund issued as a balance for future purchases', synonyms: ['gift balance'] },

  // In-store services
  {
    name: 'Boot fitting',
    description: 'A 30 minute in-store appointment to size and adjust hiking boots',
    synonyms: ['fitting']
  },
  { name: 'Gear consultation', description: 'In-store session to plan equipment for a trip', synonyms: [] },

  // Loyalty program
  {
    name: 'Loyalty tier',
    description: 'Standard, silver or gold; gold members get free return shipping',
    synonyms: ['membership level', 'gold member', 'silver member']
  },

  // Internal only; never shown to customers
  { name: 'Cost basis', description: 'What the store paid for an item. Internal figure', synonyms: ['wholesale price', 'margin'] }
];
