import { describe, it, expect } from 'vitest';
import { withTimeout } from '../lib/utils/timeout';
import { KeyedMutex } from '../lib/utils/keyed-mutex';
import { createExecutionContext } from '../lib/utils/execution-context';
import { matchInMessages, matchPattern } from '../lib/utils/patterns';
import { TimeoutError, TurnCancelledError } from '../lib/ai/core/errors';

const never = () => new Promise<never>(() => undefined);

describe('withTimeout', () => {
  it('returns the task result', async () => {
    await expect(withTimeout(async () => 'done', { ms: 100, label: 'quick' })).resolves.toBe('done');
  });

  it('rejects and aborts the task when it runs too long', async () => {
    let taskSignal: AbortSignal | undefined;
    const pending = withTimeout(signal => {
      taskSignal = signal;
      return never();
    }, { ms: 10, label: 'slow task' });

    await expect(pending).rejects.toThrow(new TimeoutError('slow task', 10));
    expect(taskSignal?.aborted).toBe(true);
  });

  it('rejects with a cancellation when the parent aborts', async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => never(), { ms: 1000, label: 'slow', signal: parent.signal, turnId: 'turn-1' });
    parent.abort();

    await expect(pending).rejects.toBeInstanceOf(TurnCancelledError);
  });

  it('does not start when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    let started = false;

    await expect(
      withTimeout(async () => {
        started = true;
      }, { ms: 1000, label: 'task', signal: parent.signal, turnId: 'turn-1' })
    ).rejects.toThrow('Turn turn-1 was cancelled');
    expect(started).toBe(false);
  });
});

describe('KeyedMutex', () => {
  it('serializes work per key and lets other keys through', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = mutex.runExclusive('customer-1', async () => {
      order.push('first:start');
      await new Promise<void>(resolve => {
        releaseFirst = resolve;
      });
      order.push('first:end');
    });
    const second = mutex.runExclusive('customer-1', async () => {
      order.push('second');
    });
    await mutex.runExclusive('customer-2', async () => {
      order.push('other');
    });

    expect(order).toEqual(['first:start', 'other']);
    expect(mutex.isLocked('customer-1')).toBe(true);

    releaseFirst();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'other', 'first:end', 'second']);
    expect(mutex.isLocked('customer-1')).toBe(false);
  });

  it('releases the lock when the work fails', async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive('k', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe('next');
  });
});

describe('ExecutionContext', () => {
  it('runs named actions first and lets a later one replace an earlier one', async () => {
    const context = createExecutionContext();
    const ran: string[] = [];
    context.addPendingAction(async () => {
      ran.push('anonymous');
    });
    context.addPendingAction(async () => {
      ran.push('session v1');
    }, 'session');
    context.addPendingAction(async () => {
      ran.push('session v2');
    }, 'session');

    await context.commit();

    expect(ran).toEqual(['session v2', 'anonymous']);
  });

  it('commits nothing once aborted', async () => {
    const parent = new AbortController();
    const context = createExecutionContext(parent.signal);
    let ran = false;
    context.addPendingAction(async () => {
      ran = true;
    });

    parent.abort();

    expect(context.isAborted()).toBe(true);
    await expect(context.commit()).rejects.toBeInstanceOf(TurnCancelledError);
    expect(ran).toBe(false);
  });

  it('cannot be aborted after the commit started', async () => {
    const context = createExecutionContext();
    await context.commit();
    context.abort();
    expect(context.isAborted()).toBe(false);
  });

  it('keeps the last staged write per variable and owner', () => {
    const context = createExecutionContext();
    context.stageWrite({ name: 'tier', owner: 'customer:c1', value: 'silver', refreshedAt: 't1' });
    context.stageWrite({ name: 'tier', owner: 'customer:c1', value: 'gold', refreshedAt: 't2' });
    context.stageWrite({ name: 'tier', owner: 'customer:c2', value: 'bronze', refreshedAt: 't1' });

    expect(context.stagedWrites()).toEqual([
      { name: 'tier', owner: 'customer:c1', value: 'gold', refreshedAt: 't2' },
      { name: 'tier', owner: 'customer:c2', value: 'bronze', refreshedAt: 't1' }
    ]);

    context.discard();
    expect(context.stagedWrites()).toEqual([]);
  });
});

describe('patterns', () => {
  it('returns the first capture group or the whole match', () => {
    expect(matchPattern('#?\\b([A-Z]\\d{3,})\\b', 'order #a100 please')).toBe('a100');
    expect(matchPattern('\\d+', 'room 42')).toBe('42');
    expect(matchPattern('\\d+', 'no digits')).toBeUndefined();
  });

  it('searches messages in the order given', () => {
    expect(matchInMessages('\\b([A-Z]\\d{3})\\b', ['nothing here', 'about B200', 'about A100'])).toBe('B200');
  });
});
