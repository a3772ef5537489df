/**
 * Extraction Task Queue
 *
 * Delayed background work keyed by an idempotency key (the conversation id).
 * Scheduling the same key again cancels the waiting task, a key whose task
 * completed never runs again, and every task gets an AbortSignal that fires
 * on cancel or shutdown. Task failures are logged, never thrown to callers.
 */

import { errorMessage } from '@/src/lib/errors/app-error';

export type TaskOutcome = 'completed' | 'failed' | 'cancelled' | 'skipped';

export type ExtractionTask = {
  idempotencyKey: string;
  delayMs: number;
  run: (signal: AbortSignal) => Promise<void>;
};

export type ScheduledTask = {
  idempotencyKey: string;
  signal: AbortSignal;
  /** Settles with the outcome; never rejects */
  done: Promise<TaskOutcome>;
};

type Entry = {
  key: string;
  controller: AbortController;
  timer: ReturnType<typeof setTimeout> | undefined;
  done: Promise<TaskOutcome>;
};

export class ExtractionTaskQueue {
  /** Latest entry per key, until it settles */
  private readonly pending = new Map<string, Entry>();
  /** Every unsettled entry, including superseded ones still running */
  private readonly active = new Set<Entry>();
  private readonly completed = new Set<string>();
  private closed = false;

  schedule(task: ExtractionTask): ScheduledTask {
    const { idempotencyKey: key } = task;
    const controller = new AbortController();

    if (this.closed || this.completed.has(key)) {
      controller.abort();
      console.info('[ExtractionTaskQueue] Task skipped', {
        key,
        reason: this.closed ? 'shutdown' : 'already_completed',
      });
      return { idempotencyKey: key, signal: controller.signal, done: Promise.resolve('skipped') };
    }

    // The user sent another message: restart the wait
    this.cancel(key);

    const entry: Entry = { key, controller, timer: undefined, done: Promise.resolve('skipped') };
    entry.done = new Promise<TaskOutcome>((resolve) => {
      entry.timer = setTimeout(() => {
        entry.timer = undefined;
        resolve(this.execute(task, controller.signal));
      }, task.delayMs);

      controller.signal.addEventListener(
        'abort',
        () => {
          if (entry.timer === undefined) return;
          clearTimeout(entry.timer);
          entry.timer = undefined;
          resolve('cancelled');
        },
        { once: true },
      );
    }).then((outcome) => {
      this.active.delete(entry);
      if (this.pending.get(key) === entry) this.pending.delete(key);
      return outcome;
    });

    this.pending.set(key, entry);
    this.active.add(entry);
    return { idempotencyKey: key, signal: controller.signal, done: entry.done };
  }

  /**
   * Abort the task for a key (waiting or running). Returns false if none.
   */
  cancel(key: string): boolean {
    const entry = this.pending.get(key);
    if (!entry) return false;
    this.pending.delete(key);
    entry.controller.abort();
    return true;
  }

  /**
   * Wait until every scheduled task has settled, including tasks scheduled
   * while draining.
   */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active].map((entry) => entry.done));
    }
  }

  /**
   * Refuse new work, abort everything and wait for running tasks to settle.
   */
  async shutdown(): Promise<void> {
    this.closed = true;
    for (const entry of this.active) entry.controller.abort();
    this.pending.clear();
    await this.drain();
  }

  isCompleted(key: string): boolean {
    return this.completed.has(key);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private async execute(task: ExtractionTask, signal: AbortSignal): Promise<TaskOutcome> {
    const key = task.idempotencyKey;
    if (signal.aborted) return 'cancelled';

    try {
      await task.run(signal);
    } catch (error) {
      if (signal.aborted) return 'cancelled';
      console.warn('[ExtractionTaskQueue] Task failed', { key, error: errorMessage(error) });
      return 'failed';
    }

    if (signal.aborted) return 'cancelled';
    this.completed.add(key);
    console.info('[ExtractionTaskQueue] Task completed', { key });
    return 'completed';
  }
}
