/**
 * Delayed Action Scheduler
 *
 * One-shot detached timers that undo something later (lifting a temporary
 * ban). Each action runs once. A target that no longer exists is reported by
 * the action as a NotFoundError and treated as a no-op.
 *
 * @module jobs/delayed-action
 */

import { NotFoundError } from '../utils/errors.js';
import { logger as defaultLogger } from '../utils/logger.js';

export type DelayedActionHandler = () => Promise<void> | void;

export interface DelayedActionSchedulerConfig {
  logger?: typeof defaultLogger;
}

interface PendingAction {
  timer: ReturnType<typeof setTimeout>;
  dueAt: number;
}

/**
 * Outcome of a finished action
 */
export type DelayedActionOutcome = 'completed' | 'target_missing' | 'failed';

export class DelayedActionScheduler {
  private logger: typeof defaultLogger;
  private pending = new Map<string, PendingAction>();

  constructor(config: DelayedActionSchedulerConfig = {}) {
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Schedule an action under a key. Scheduling the same key again replaces
   * the earlier action.
   */
  schedule(key: string, delayMs: number, handler: DelayedActionHandler): void {
    this.cancel(key);

    const delay = Math.max(0, delayMs);
    const timer = setTimeout(() => {
      this.pending.delete(key);
      this.run(key, handler).catch((error) => {
        this.logger.error({ event: 'delayed_action.error', key, error }, 'Delayed action crashed');
      });
    }, delay);
    // Pending undo actions must not hold the process open on shutdown
    timer.unref?.();

    this.pending.set(key, { timer, dueAt: Date.now() + delay });
    this.logger.info({ event: 'delayed_action.scheduled', key, delayMs: delay }, 'Delayed action scheduled');
  }

  /**
   * @returns true when a pending action was cancelled
   */
  cancel(key: string): boolean {
    const entry = this.pending.get(key);
    if (!entry) {
      return false;
    }
    clearTimeout(entry.timer);
    this.pending.delete(key);
    return true;
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  /**
   * Epoch ms at which a pending action is due
   */
  dueAt(key: string): number | null {
    return this.pending.get(key)?.dueAt ?? null;
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Cancel everything still pending
   */
  cancelAll(): void {
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer);
    }
    this.pending.clear();
  }

  /**
   * Run an action now and classify the result
   */
  async run(key: string, handler: DelayedActionHandler): Promise<DelayedActionOutcome> {
    try {
      await handler();
      this.logger.info({ event: 'delayed_action.completed', key }, 'Delayed action completed');
      return 'completed';
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.info(
          { event: 'delayed_action.target_missing', key, resource: error.resource },
          'Delayed action target no longer exists'
        );
        return 'target_missing';
      }
      this.logger.error({ event: 'delayed_action.failed', key, error }, 'Delayed action failed');
      return 'failed';
    }
  }
}
