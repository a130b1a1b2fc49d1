import type { WorkerCounters } from '@reaction-roles/shared';
import { abortError, isAbortError, type MemberIntent, type MutationQueue } from './mutation-queue.js';
import { everyoneRole, type MembershipStore, type RoleId, type StoreResult } from './types.js';

export interface MutationWorkerOptions {
  /** Members processed per second at most; 0 disables throttling */
  maxProcessedPerSecond: number;
  /** Forbidden results tolerated for one change before it is dropped; 0 retries forever */
  maxForbiddenAttempts: number;
}

export type ProcessOutcome = 'written' | 'noop' | 'retry' | 'dropped' | 'abandoned' | 'idle';

type StoreFailure = Extract<StoreResult<unknown>, { ok: false }>;

/**
 * Single serializing worker for the mutation queue
 *
 * The membership store only offers read-full/replace-full, so two concurrent
 * read-modify-write cycles on one member would lose an update. Every write
 * therefore goes through this one loop, which reads the member's live roles,
 * applies the coalesced intent and writes the result once.
 */
export class MutationWorker {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly intervalMs: number;
  readonly counters: WorkerCounters = { processed: 0, writes: 0, noops: 0, retries: 0, dropped: 0 };

  constructor(
    private readonly queue: MutationQueue,
    private readonly store: MembershipStore,
    private readonly options: MutationWorkerOptions,
  ) {
    this.intervalMs = options.maxProcessedPerSecond > 0 ? 1000 / options.maxProcessedPerSecond : 0;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    console.log(`[MutationWorker] Started, processing ${this.options.maxProcessedPerSecond || 'unlimited'} member(s) per second`);
  }

  /**
   * Stop after the current store call. A change that was taken off the queue
   * but not written is put back.
   */
  async stop(): Promise<void> {
    if (!this.loop) return;
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
  }

  /**
   * Process the member at the head of the queue, if any
   */
  async processNext(signal?: AbortSignal): Promise<ProcessOutcome> {
    const intent = this.queue.take();
    if (!intent) return 'idle';

    const current = await this.call(() => this.store.getRoles(intent.member));
    if (!current.ok) return this.fail(intent, current);

    if (signal?.aborted) {
      this.queue.restore(intent);
      return 'abandoned';
    }

    const final = new Set<RoleId>(current.value);
    for (const role of intent.add) final.add(role);
    for (const role of intent.remove) final.delete(role);
    final.delete(everyoneRole(intent.member.guildId));

    const baseline = new Set<RoleId>(current.value);
    baseline.delete(everyoneRole(intent.member.guildId));
    if (sameRoles(final, baseline)) {
      this.counters.processed++;
      this.counters.noops++;
      return 'noop';
    }

    const result = await this.call(() => this.store.replaceRoles(intent.member, final));
    if (!result.ok) return this.fail(intent, result);

    this.counters.processed++;
    this.counters.writes++;
    return 'written';
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        await this.queue.waitForWork(signal);
        const outcome = await this.processNext(signal);
        if (outcome !== 'idle' && outcome !== 'abandoned') {
          await sleep(this.intervalMs, signal);
        }
      }
    } catch (error) {
      if (!isAbortError(error)) {
        console.error('[MutationWorker] Processing loop failed:', error);
      }
    }
    console.log('[MutationWorker] Processing loop has ended');
  }

  private fail(intent: MemberIntent, failure: StoreFailure): ProcessOutcome {
    const who = `${intent.member.userId} in ${intent.member.guildId}`;
    this.counters.processed++;

    if (failure.kind === 'forbidden') {
      intent.forbiddenAttempts++;
      const limit = this.options.maxForbiddenAttempts;
      if (limit > 0 && intent.forbiddenAttempts >= limit) {
        console.warn(`[MutationWorker] Dropping role change for ${who} after ${intent.forbiddenAttempts} forbidden attempt(s): ${failure.message}`);
        this.counters.dropped++;
        return 'dropped';
      }
    } else {
      intent.forbiddenAttempts = 0;
    }

    console.warn(`[MutationWorker] Role change for ${who} failed (${failure.kind}), retrying: ${failure.message}`);
    this.counters.retries++;
    this.queue.restore(intent);
    return 'retry';
  }

  /** A store that throws is treated like one reporting a transient failure */
  private async call<T>(fn: () => Promise<StoreResult<T>>): Promise<StoreResult<T>> {
    try {
      return await fn();
    } catch (error) {
      return { ok: false, kind: 'transient', message: error instanceof Error ? error.message : String(error) };
    }
  }
}

function sameRoles(a: ReadonlySet<RoleId>, b: ReadonlySet<RoleId>): boolean {
  if (a.size !== b.size) return false;
  for (const role of a) {
    if (!b.has(role)) return false;
  }
  return true;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.reject(abortError());

  // Always goes through a timer, even at 0 ms
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(ms, 0));
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
