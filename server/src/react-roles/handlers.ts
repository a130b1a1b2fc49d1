import type { MessageRef } from '@reaction-roles/shared';
import type { BindingCache } from './binding-cache.js';
import type { LinkRegistry } from './link-registry.js';
import type { MutationQueue } from './mutation-queue.js';
import type { ReactionTransport } from './types.js';

export interface ReactionHandlerDeps {
  bindings: BindingCache;
  links: LinkRegistry;
  queue: MutationQueue;
  transport: ReactionTransport;
  /** Called after a deleted message changed the bindings */
  persist: () => Promise<void>;
}

/**
 * Event handlers
 *
 * Translate platform events into cache lookups and queue merges. They return
 * as soon as the change is queued and never let an error escape into the
 * platform's event subscription.
 */
export class ReactionHandlers {
  constructor(private readonly deps: ReactionHandlerDeps) {}

  async onReactionAdded(ref: MessageRef, symbol: string, userId: string): Promise<void> {
    try {
      const { bindings, links, queue, transport } = this.deps;
      if (userId === transport.selfId()) return;

      const role = bindings.lookup(ref, symbol);
      if (role === undefined) return;

      const exclusive = new Set(links.exclusivity(ref));
      exclusive.delete(role);
      queue.enqueue({ guildId: ref.guildId, userId }, [role], exclusive);
    } catch (error) {
      console.error('[ReactRoles] Error handling reaction add:', error);
    }
  }

  async onReactionRemoved(ref: MessageRef, symbol: string, userId: string): Promise<void> {
    try {
      const { bindings, queue, transport } = this.deps;
      const role = bindings.lookup(ref, symbol);
      if (role === undefined) return;

      if (userId === transport.selfId()) {
        // Someone took the bot's marker reaction off; put it back
        console.log(`[ReactRoles] Restoring marker reaction ${symbol} on message ${ref.messageId}`);
        await transport.addMarker(ref, symbol);
        return;
      }

      // Leaving a role never restores the roles it excluded
      queue.enqueue({ guildId: ref.guildId, userId }, [], [role]);
    } catch (error) {
      console.error('[ReactRoles] Error handling reaction remove:', error);
    }
  }

  async onMessageDeleted(ref: MessageRef): Promise<void> {
    try {
      const { bindings, links } = this.deps;
      const hadBindings = bindings.removeMessage(ref);
      const wasLinked = links.pruneMessage(ref);
      if (!hadBindings && !wasLinked) return;

      console.log(`[ReactRoles] Message ${ref.messageId} was deleted, dropped its bindings`);
      await this.deps.persist();
    } catch (error) {
      console.error('[ReactRoles] Error handling message delete:', error);
    }
  }
}
