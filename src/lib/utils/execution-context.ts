/**
 * ExecutionContext - lifecycle of one agent turn
 *
 * Features:
 * - Unique executionId (the turn id) for tracking events
 * - AbortSignal for cancellation detection at suspension points
 * - Staged context-variable writes, visible to the turn that made them
 * - Pending commit actions that only run when the turn was not aborted
 */

import { randomUUID } from 'crypto';
import logger from 'jet-logger';
import { TurnCancelledError } from '../ai/core/errors';
import type { VariableWrite } from '../ai/types/context';

export type PendingActionFn = () => Promise<void>;

export interface IExecutionContext {
  readonly executionId: string;
  readonly abortSignal: AbortSignal;

  isAborted(): boolean;
  throwIfAborted(): void;
  stageWrite(write: VariableWrite): void;
  addPendingAction(fn: PendingActionFn, actionId?: string): void;
  commit(): Promise<void>;
}

export class ExecutionContext implements IExecutionContext {
  public readonly executionId: string;
  public readonly abortSignal: AbortSignal;

  private readonly abortController: AbortController;
  private staged = new Map<string, VariableWrite>();
  private namedActions = new Map<string, PendingActionFn>();
  private anonymousActions: PendingActionFn[] = [];
  private committed = false;

  constructor(parentSignal?: AbortSignal) {
    this.executionId = randomUUID();
    this.abortController = new AbortController();
    this.abortSignal = this.abortController.signal;

    if (parentSignal) {
      if (parentSignal.aborted) {
        this.abortController.abort();
      } else {
        parentSignal.addEventListener('abort', () => this.abort(), { once: true });
      }
    }
  }

  isAborted(): boolean {
    return this.abortSignal.aborted;
  }

  abort(): void {
    if (!this.isAborted() && !this.committed) {
      logger.info(`[ExecutionContext] Aborting execution ${this.executionId}`);
      this.abortController.abort();
    }
  }

  throwIfAborted(): void {
    if (this.isAborted()) {
      throw new TurnCancelledError(this.executionId);
    }
  }

  /**
   * Stage a context-variable write. Last write per (name, owner) wins.
   */
  stageWrite(write: VariableWrite): void {
    this.staged.set(`${write.owner}/${write.name}`, write);
  }

  stagedWrites(): VariableWrite[] {
    return Array.from(this.staged.values());
  }

  /**
   * Add an action to run at commit time.
   * A named action replaces an earlier one with the same id.
   */
  addPendingAction(fn: PendingActionFn, actionId?: string): void {
    if (this.isAborted()) {
      logger.info('[ExecutionContext] Ignoring action - execution already aborted');
      return;
    }

    if (actionId) {
      this.namedActions.set(actionId, fn);
    } else {
      this.anonymousActions.push(fn);
    }
  }

  /**
   * Runs pending actions in order (named first). The abort check happens once,
   * before the first action: past that point the turn is no longer cancellable.
   */
  async commit(): Promise<void> {
    this.throwIfAborted();
    this.committed = true;

    const actions = [...this.namedActions.values(), ...this.anonymousActions];
    logger.info(`[ExecutionContext] Committing ${actions.length} action(s) for ${this.executionId}`);

    for (const action of actions) {
      await action();
    }
  }

  /**
   * Drop everything staged; used when the turn fails or is cancelled
   */
  discard(): void {
    if (this.staged.size > 0 || this.namedActions.size > 0 || this.anonymousActions.length > 0) {
      logger.info(`[ExecutionContext] Discarding ${this.staged.size} staged write(s) for ${this.executionId}`);
    }
    this.staged.clear();
    this.namedActions.clear();
    this.anonymousActions = [];
  }
}

export function createExecutionContext(parentSignal?: AbortSignal): ExecutionContext {
  return new ExecutionContext(parentSignal);
}
