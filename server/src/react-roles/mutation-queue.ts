import type { MemberRef } from '@reaction-roles/shared';
import { everyoneRole, memberKey, type RoleId } from './types.js';

/**
 * Net role change pending for one member
 */
export interface MemberIntent {
  member: MemberRef;
  add: Set<RoleId>;
  remove: Set<RoleId>;
  /** Consecutive forbidden write results for this change */
  forbiddenAttempts: number;
}

/**
 * Coalescing mutation queue
 *
 * Holds at most one intent and one FIFO slot per member. Requests for a member
 * that is already queued are merged into its intent, so any number of
 * reaction toggles before the worker gets to the member become one write.
 *
 * All methods are synchronous; event handlers never wait on the worker.
 */
export class MutationQueue {
  private intents = new Map<string, MemberIntent>(); // memberKey -> intent
  private order: string[] = []; // FIFO of member keys
  private waiters: Array<() => void> = [];

  /**
   * Merge a requested change into the member's pending intent. For each role
   * the most recent request wins; within one call, remove is applied after add.
   */
  enqueue(member: MemberRef, add: Iterable<RoleId>, remove: Iterable<RoleId>): void {
    const intent = this.intentFor(member);
    const addSet = new Set(add);
    const removeSet = new Set(remove);

    for (const role of addSet) intent.remove.delete(role);
    for (const role of removeSet) intent.add.delete(role);
    for (const role of addSet) intent.add.add(role);
    for (const role of removeSet) intent.remove.add(role);
  }

  /**
   * Put back a change the worker failed to apply. Requests that arrived while
   * it was in flight are newer, so they are merged on top of it.
   */
  restore(intent: MemberIntent): void {
    const newer = this.intents.get(memberKey(intent.member));
    if (!newer) {
      const restored = this.intentFor(intent.member);
      restored.forbiddenAttempts = intent.forbiddenAttempts;
      this.enqueue(intent.member, intent.add, intent.remove);
      return;
    }

    // The newer intent keeps its queue slot; the failed change goes underneath it
    const add = new Set(intent.add);
    const remove = new Set(intent.remove);
    for (const role of newer.add) remove.delete(role);
    for (const role of newer.remove) add.delete(role);
    for (const role of newer.add) add.add(role);
    for (const role of newer.remove) remove.add(role);
    newer.add = add;
    newer.remove = remove;
    newer.forbiddenAttempts = intent.forbiddenAttempts;
  }

  /**
   * Pop the oldest member key together with its intent
   */
  take(): MemberIntent | null {
    const key = this.order.shift();
    if (key === undefined) return null;
    const intent = this.intents.get(key);
    this.intents.delete(key);
    return intent ?? null;
  }

  /**
   * Resolve once there is at least one member queued. Rejects if the signal
   * aborts first.
   */
  waitForWork(signal?: AbortSignal): Promise<void> {
    if (this.order.length > 0) return Promise.resolve();
    if (signal?.aborted) return Promise.reject(abortError());

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter(w => w !== wake);
        reject(abortError());
      };
      const wake = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Read-only view of a member's pending change
   */
  peek(member: MemberRef): Readonly<MemberIntent> | undefined {
    return this.intents.get(memberKey(member));
  }

  get size(): number {
    return this.order.length;
  }

  private intentFor(member: MemberRef): MemberIntent {
    const key = memberKey(member);
    let intent = this.intents.get(key);
    if (!intent) {
      // Never let a write hand out the guild's default role
      intent = {
        member: { guildId: member.guildId, userId: member.userId },
        add: new Set(),
        remove: new Set([everyoneRole(member.guildId)]),
        forbiddenAttempts: 0,
      };
      this.intents.set(key, intent);
      this.order.push(key);
      this.notify();
    }
    return intent;
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}

export function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
