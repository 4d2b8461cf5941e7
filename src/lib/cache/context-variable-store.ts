/**
 * Context-variable stores
 * Values are keyed by (variable name, owner) where owner is `customer:<id>` or `tag:<tag>`
 */

import type Redis from 'ioredis';
import { z } from 'zod';
import { getRedisClient } from './redis-client';
import { contextVariablesKey } from './cache-key-helpers';
import type { StoredVariable, VariableKey, VariableWrite } from '../ai/types/context';
import type { ContextVariableStore } from '../ai/types/session';

const StoredVariableSchema = z.object({
  value: z.unknown(),
  refreshedAt: z.string()
});

function parseStored(raw: string): StoredVariable {
  const parsed = StoredVariableSchema.parse(JSON.parse(raw));
  return { value: parsed.value, refreshedAt: parsed.refreshedAt };
}

export class MemoryContextVariableStore implements ContextVariableStore {
  private values = new Map<string, StoredVariable>();

  private key(name: string, owner: string): string {
    return `${owner}/${name}`;
  }

  async getMany(keys: VariableKey[]): Promise<Array<StoredVariable | undefined>> {
    return keys.map(k => {
      const stored = this.values.get(this.key(k.name, k.owner));
      return stored ? structuredClone(stored) : undefined;
    });
  }

  async writeMany(writes: VariableWrite[]): Promise<void> {
    writes.forEach(w => {
      this.values.set(this.key(w.name, w.owner), structuredClone({ value: w.value, refreshedAt: w.refreshedAt }));
    });
  }
}

/**
 * One hash per owner (`ctxvar:<owner>`), one field per variable. Writes of a
 * turn go through MULTI/EXEC so they land together.
 */
export class RedisContextVariableStore implements ContextVariableStore {
  constructor(private readonly redis: Redis = getRedisClient()) {}

  async getMany(keys: VariableKey[]): Promise<Array<StoredVariable | undefined>> {
    if (keys.length === 0) return [];

    const pipeline = this.redis.pipeline();
    keys.forEach(k => pipeline.hget(contextVariablesKey(k.owner), k.name));
    const results = (await pipeline.exec()) ?? [];

    return keys.map((_, idx) => {
      const [error, raw] = results[idx] ?? [null, null];
      if (error) throw error;
      return typeof raw === 'string' ? parseStored(raw) : undefined;
    });
  }

  async writeMany(writes: VariableWrite[]): Promise<void> {
    if (writes.length === 0) return;

    const multi = this.redis.multi();
    writes.forEach(w => {
      multi.hset(contextVariablesKey(w.owner), w.name, JSON.stringify({ value: w.value, refreshedAt: w.refreshedAt }));
    });
    const results = await multi.exec();
    if (!results) {
      throw new Error('Context variable transaction was aborted');
    }
    const failed = results.find(([error]) => error);
    if (failed?.[0]) throw failed[0];
  }
}
