/**
 * Redis key layout
 */

const CONTEXT_VARIABLES_PREFIX = 'ctxvar';

// One hash per owner; owner is `customer:<id>` or `tag:<tag>`
export function contextVariablesKey(owner: string): string {
  return `${CONTEXT_VARIABLES_PREFIX}:${owner}`;
}
