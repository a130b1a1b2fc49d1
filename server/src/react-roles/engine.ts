import type { BindingsSnapshot, LinkedMessage, MessageRef, QueueStatus, ReconcileProgress } from '@reaction-roles/shared';
import { BindingCache } from './binding-cache.js';
import { AlreadyBoundError, InvalidSymbolError, MessageNotFoundError, NotBoundError, RoleNotFoundError } from './errors.js';
import { ReactionHandlers } from './handlers.js';
import { LinkRegistry, type LinkGroupInfo } from './link-registry.js';
import { MutationQueue } from './mutation-queue.js';
import { MutationWorker, type MutationWorkerOptions } from './mutation-worker.js';
import { Reconciler, type ProgressListener } from './reconciler.js';
import { normalizeSymbol } from './symbols.js';
import { messageKey, type BindingsPersistence, type MembershipStore, type ReactionTransport, type RoleId } from './types.js';

export interface EngineDeps {
  store: MembershipStore;
  transport: ReactionTransport;
  persistence: BindingsPersistence;
}

export type EngineOptions = MutationWorkerOptions;

export interface UnbindOptions {
  symbol?: string;
  roleId?: RoleId;
  /** Also take every reaction with the symbol off the message */
  clearReactions?: boolean;
}

/**
 * Reaction roles engine
 *
 * Owns the binding cache, link registry, mutation queue and its worker for one
 * bot process. Admin operations go through here so every change is persisted;
 * platform events go to `handlers`.
 */
export class ReactRolesEngine {
  readonly bindings = new BindingCache();
  readonly links: LinkRegistry;
  readonly queue = new MutationQueue();
  readonly worker: MutationWorker;
  readonly reconciler: Reconciler;
  readonly handlers: ReactionHandlers;
  private saving: Promise<void> = Promise.resolve();

  constructor(
    private readonly deps: EngineDeps,
    options: EngineOptions,
  ) {
    this.links = new LinkRegistry(this.bindings);
    this.worker = new MutationWorker(this.queue, deps.store, options);
    this.reconciler = new Reconciler(this.bindings, this.links, deps.transport, deps.store);
    this.handlers = new ReactionHandlers({
      bindings: this.bindings,
      links: this.links,
      queue: this.queue,
      transport: deps.transport,
      persist: () => this.persist(),
    });
  }

  /**
   * Replay persisted bindings and start processing role changes
   */
  async start(): Promise<void> {
    await this.restore();
    this.worker.start();
  }

  async stop(): Promise<void> {
    await this.worker.stop();
    try {
      await this.saving;
    } catch (error) {
      console.error('[ReactRoles] Last bindings save failed:', error);
    }
  }

  /**
   * Load the persisted snapshot, dropping messages and roles that no longer
   * exist
   */
  async restore(): Promise<void> {
    const snapshot = await this.deps.persistence.load();
    this.bindings.load(snapshot.bindings);
    this.links.load(snapshot.links);

    const refs = new Map<string, MessageRef>();
    for (const ref of this.bindings.list()) refs.set(messageKey(ref), ref);
    for (const [guildId, links] of Object.entries(snapshot.links)) {
      for (const messages of Object.values(links)) {
        for (const m of messages) {
          const ref = { guildId, channelId: m.channelId, messageId: m.messageId };
          refs.set(messageKey(ref), ref);
        }
      }
    }

    let dropped = 0;
    for (const ref of refs.values()) {
      let exists: boolean;
      try {
        exists = await this.deps.transport.messageExists(ref);
      } catch (error) {
        console.warn(`[ReactRoles] Could not check message ${ref.messageId}, keeping its bindings:`, error);
        continue;
      }
      if (!exists) {
        console.warn(`[ReactRoles] Message ${ref.messageId} in channel ${ref.channelId} no longer exists, dropping its bindings`);
        this.bindings.removeMessage(ref);
        this.links.pruneMessage(ref);
        dropped++;
      }
    }
    dropped += await this.dropMissingRoles();

    console.log(`[ReactRoles] Loaded ${this.bindings.size} binding(s) on ${this.bindings.list().length} message(s)`);
    if (dropped > 0) {
      await this.persist();
    }
  }

  // ============================================
  // Admin operations
  // ============================================

  async bind(ref: MessageRef, rawSymbol: string, role: RoleId): Promise<string> {
    const symbol = normalizeSymbol(rawSymbol);
    if (this.bindings.lookup(ref, symbol) !== undefined) {
      throw new AlreadyBoundError(symbol);
    }
    if (!(await this.deps.transport.roleExists(ref.guildId, role))) {
      throw new RoleNotFoundError(role);
    }
    if (!(await this.deps.transport.messageExists(ref))) {
      throw new MessageNotFoundError();
    }
    if (!(await this.deps.transport.addMarker(ref, symbol))) {
      throw new InvalidSymbolError(rawSymbol);
    }

    this.bindings.bind(ref, symbol, role);
    this.links.refresh(ref);
    await this.persist();
    console.log(`[ReactRoles] Bound ${symbol} to role ${role} on message ${ref.messageId}`);
    return symbol;
  }

  async unbind(ref: MessageRef, options: UnbindOptions): Promise<{ symbol: string; roleId: RoleId }> {
    let symbol: string | undefined;
    if (options.symbol !== undefined) {
      symbol = normalizeSymbol(options.symbol);
    } else if (options.roleId !== undefined) {
      symbol = this.bindings.symbolOf(ref, options.roleId);
      if (symbol === undefined) throw new NotBoundError(`Role ${options.roleId}`);
    } else {
      throw new NotBoundError('Nothing');
    }

    const roleId = this.bindings.unbind(ref, symbol);
    this.links.refresh(ref);
    await this.persist();
    console.log(`[ReactRoles] Unbound ${symbol} (role ${roleId}) on message ${ref.messageId}`);

    if (options.clearReactions) {
      await this.deps.transport.clearReaction(ref, symbol);
    }
    return { symbol, roleId };
  }

  async link(guildId: string, name: string, messages: LinkedMessage[]): Promise<void> {
    this.links.link(guildId, name, messages);
    await this.persist();
    console.log(`[ReactRoles] Linked ${messages.length} message(s) as "${name}" in guild ${guildId}`);
  }

  async unlink(guildId: string, name: string): Promise<void> {
    this.links.unlink(guildId, name);
    await this.persist();
    console.log(`[ReactRoles] Removed link "${name}" in guild ${guildId}`);
  }

  listLinks(guildId: string): LinkGroupInfo[] {
    return this.links.list(guildId);
  }

  reconcile(ref: MessageRef, onProgress?: ProgressListener): Promise<ReconcileProgress> {
    return this.reconciler.reconcile(ref, onProgress);
  }

  // ============================================
  // Inspection
  // ============================================

  snapshot(): BindingsSnapshot {
    return { bindings: this.bindings.toSnapshot(), links: this.links.toSnapshot() };
  }

  status(): QueueStatus {
    return {
      running: this.worker.running,
      pending: this.queue.size,
      counters: { ...this.worker.counters },
    };
  }

  private async dropMissingRoles(): Promise<number> {
    const known = new Map<string, boolean>(); // guildId:roleId -> exists
    let dropped = 0;

    for (const ref of this.bindings.list()) {
      for (const role of this.bindings.rolesOf(ref)) {
        const key = `${ref.guildId}:${role}`;
        let exists = known.get(key);
        if (exists === undefined) {
          try {
            exists = await this.deps.transport.roleExists(ref.guildId, role);
          } catch (error) {
            console.warn(`[ReactRoles] Could not check role ${role}, keeping its bindings:`, error);
            continue;
          }
          known.set(key, exists);
        }
        if (exists) continue;

        let symbol = this.bindings.symbolOf(ref, role);
        while (symbol !== undefined) {
          console.warn(`[ReactRoles] Role ${role} no longer exists, dropping its binding ${symbol} on message ${ref.messageId}`);
          this.bindings.unbind(ref, symbol);
          dropped++;
          symbol = this.bindings.symbolOf(ref, role);
        }
        this.links.refresh(ref);
      }
    }
    return dropped;
  }

  /**
   * Writes are chained so snapshots land on disk in order; each write takes
   * the state current at the time it runs.
   */
  private persist(): Promise<void> {
    const write = () => this.deps.persistence.save(this.snapshot());
    const next = this.saving.then(write, write);
    this.saving = next;
    return next;
  }
}
