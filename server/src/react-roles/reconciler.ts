import type { MessageRef, ReconcileProgress } from '@reaction-roles/shared';
import type { BindingCache } from './binding-cache.js';
import type { LinkRegistry } from './link-registry.js';
import { CannotReconcileLinkedError, NotBoundError } from './errors.js';
import type { MembershipStore, ReactionTransport, RoleId } from './types.js';

/** Reactors returned per page by the platform */
export const REACTORS_PAGE_SIZE = 100;

export type ProgressListener = (progress: ReconcileProgress) => void | Promise<void>;

/**
 * Reconciliation scanner
 *
 * One-shot sweep over the reactions already on a message, granting the bound
 * role to every reactor that lacks it. Grants go straight to the store rather
 * than through the mutation queue: this is a bulk catch-up, not a live toggle.
 * Running it again without new reactions grants nothing.
 */
export class Reconciler {
  constructor(
    private readonly bindings: BindingCache,
    private readonly links: LinkRegistry,
    private readonly transport: ReactionTransport,
    private readonly store: MembershipStore,
  ) {}

  async reconcile(ref: MessageRef, onProgress?: ProgressListener): Promise<ReconcileProgress> {
    if (this.links.isLinked(ref)) {
      throw new CannotReconcileLinkedError();
    }
    if (!this.bindings.has(ref)) {
      throw new NotBoundError('No emoji');
    }

    const reactions = await this.transport.listReactions(ref);
    const selfId = this.transport.selfId();
    const progress: ReconcileProgress = {
      checked: 0,
      total: reactions.reduce((sum, r) => sum + r.count - (r.me ? 1 : 0), 0),
      emojis: 0,
      granted: 0,
      skipped: 0,
    };
    const report = async () => {
      if (onProgress) await onProgress({ ...progress });
    };

    for (const reaction of reactions) {
      progress.emojis++;
      const role = this.bindings.lookup(ref, reaction.symbol);
      if (role === undefined) {
        progress.checked += reaction.count - (reaction.me ? 1 : 0);
        await report();
        continue;
      }

      let after: string | undefined;
      for (;;) {
        const page = await this.transport.listReactors(ref, reaction.symbol, after);
        for (const userId of page) {
          if (userId === selfId) continue;
          progress.checked++;
          await this.grantIfMissing(ref.guildId, userId, role, progress);
        }
        await report();

        if (page.length < REACTORS_PAGE_SIZE) break;
        after = page[page.length - 1];
      }
    }

    console.log(
      `[Reconciler] Message ${ref.messageId}: checked ${progress.checked} reaction(s), gave ${progress.granted} role(s), skipped ${progress.skipped}`,
    );
    return progress;
  }

  private async grantIfMissing(guildId: string, userId: string, role: RoleId, progress: ReconcileProgress): Promise<void> {
    const member = { guildId, userId };
    try {
      const roles = await this.store.getRoles(member);
      if (!roles.ok) {
        progress.skipped++;
        return;
      }
      if (roles.value.has(role)) return;

      const result = await this.store.grantRole(member, role);
      if (result.ok) {
        progress.granted++;
      } else {
        console.warn(`[Reconciler] Could not give role ${role} to ${userId}: ${result.message}`);
        progress.skipped++;
      }
    } catch (error) {
      console.warn(`[Reconciler] Skipping reactor ${userId}:`, error);
      progress.skipped++;
    }
  }
}
