import type { BindingsTree, MessageRef } from '@reaction-roles/shared';
import { AlreadyBoundError, NotBoundError } from './errors.js';
import { messageKey, type RoleId } from './types.js';

interface MessageBindings {
  ref: MessageRef;
  symbols: Map<string, RoleId>; // symbol -> role
}

/**
 * Binding cache for (message, symbol) -> role lookups on the reaction hot path
 */
export class BindingCache {
  private messages = new Map<string, MessageBindings>(); // messageKey -> bindings

  bind(ref: MessageRef, symbol: string, role: RoleId): void {
    const key = messageKey(ref);
    let entry = this.messages.get(key);
    if (entry?.symbols.has(symbol)) {
      throw new AlreadyBoundError(symbol);
    }
    if (!entry) {
      entry = { ref: { ...ref }, symbols: new Map() };
      this.messages.set(key, entry);
    }
    entry.symbols.set(symbol, role);
  }

  /**
   * Remove a binding and return the role it pointed at
   */
  unbind(ref: MessageRef, symbol: string): RoleId {
    const key = messageKey(ref);
    const entry = this.messages.get(key);
    const role = entry?.symbols.get(symbol);
    if (!entry || role === undefined) {
      throw new NotBoundError(`The emoji ${symbol}`);
    }
    entry.symbols.delete(symbol);
    if (entry.symbols.size === 0) {
      this.messages.delete(key);
    }
    return role;
  }

  lookup(ref: MessageRef, symbol: string): RoleId | undefined {
    return this.messages.get(messageKey(ref))?.symbols.get(symbol);
  }

  /**
   * Find which symbol grants a role on a message
   */
  symbolOf(ref: MessageRef, role: RoleId): string | undefined {
    const entry = this.messages.get(messageKey(ref));
    if (!entry) return undefined;
    for (const [symbol, bound] of entry.symbols) {
      if (bound === role) return symbol;
    }
    return undefined;
  }

  rolesOf(ref: MessageRef): Set<RoleId> {
    return new Set(this.messages.get(messageKey(ref))?.symbols.values() ?? []);
  }

  has(ref: MessageRef): boolean {
    return this.messages.has(messageKey(ref));
  }

  /**
   * Drop every binding of a message. Returns false if it had none.
   */
  removeMessage(ref: MessageRef): boolean {
    return this.messages.delete(messageKey(ref));
  }

  list(): MessageRef[] {
    return Array.from(this.messages.values(), entry => ({ ...entry.ref }));
  }

  get size(): number {
    let count = 0;
    for (const entry of this.messages.values()) {
      count += entry.symbols.size;
    }
    return count;
  }

  // ============================================
  // Snapshot
  // ============================================

  toSnapshot(): BindingsTree {
    const tree: BindingsTree = {};
    for (const { ref, symbols } of this.messages.values()) {
      const guild = tree[ref.guildId] || {};
      const channel = guild[ref.channelId] || {};
      channel[ref.messageId] = Object.fromEntries(symbols);
      guild[ref.channelId] = channel;
      tree[ref.guildId] = guild;
    }
    return tree;
  }

  load(tree: BindingsTree): void {
    this.messages.clear();
    for (const [guildId, channels] of Object.entries(tree)) {
      for (const [channelId, messages] of Object.entries(channels)) {
        for (const [messageId, symbols] of Object.entries(messages)) {
          for (const [symbol, role] of Object.entries(symbols)) {
            this.bind({ guildId, channelId, messageId }, symbol, role);
          }
        }
      }
    }
  }
}
