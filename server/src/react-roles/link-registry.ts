import type { LinkedMessage, LinksTree, MessageRef } from '@reaction-roles/shared';
import type { BindingCache } from './binding-cache.js';
import { LinkNotFoundError, PairInvalidError } from './errors.js';
import { messageKey, type RoleId } from './types.js';

interface LinkGroup {
  guildId: string;
  name: string;
  members: Map<string, MessageRef>; // messageKey -> ref
}

export interface LinkGroupInfo {
  name: string;
  messages: LinkedMessage[];
}

const NO_ROLES: ReadonlySet<RoleId> = new Set();

/**
 * Link registry
 *
 * Tracks named groups of messages whose roles are mutually exclusive. The
 * exclusion set of every linked message is precomputed so the reaction hot path
 * never scans groups: each message maps to the union of the roles bound across
 * every group it belongs to.
 */
export class LinkRegistry {
  private groups = new Map<string, LinkGroup>(); // guildId:name -> group
  private memberships = new Map<string, Set<string>>(); // messageKey -> group keys
  private exclusive = new Map<string, Set<RoleId>>(); // messageKey -> exclusion set

  constructor(private readonly bindings: BindingCache) {}

  /**
   * Create (or replace) a link group. Every message must belong to the guild
   * and carry at least one binding.
   */
  link(guildId: string, name: string, messages: LinkedMessage[]): void {
    if (messages.length === 0) {
      throw new PairInvalidError('no messages given');
    }

    const refs = messages.map(m => ({ guildId, channelId: m.channelId, messageId: m.messageId }));
    for (const ref of refs) {
      if (!this.bindings.has(ref)) {
        throw new PairInvalidError(`message ${ref.messageId} in channel ${ref.channelId} has no bound roles`);
      }
    }

    const affected = new Set<string>();
    const existing = this.groups.get(groupKey(guildId, name));
    if (existing) {
      for (const key of this.detach(existing)) affected.add(key);
    }
    for (const key of this.insert(guildId, name, refs)) affected.add(key);
    this.recompute(affected);
  }

  /**
   * Remove a link group. Messages still referenced by other groups keep the
   * exclusions of those groups.
   *
   * @returns the messages that were in the group
   */
  unlink(guildId: string, name: string): MessageRef[] {
    const group = this.groups.get(groupKey(guildId, name));
    if (!group) {
      throw new LinkNotFoundError(name);
    }
    const refs = Array.from(group.members.values());
    this.recompute(this.detach(group));
    return refs;
  }

  exclusivity(ref: MessageRef): ReadonlySet<RoleId> {
    return this.exclusive.get(messageKey(ref)) ?? NO_ROLES;
  }

  isLinked(ref: MessageRef): boolean {
    return this.memberships.has(messageKey(ref));
  }

  /**
   * Recompute the exclusion sets around a message whose bindings changed
   */
  refresh(ref: MessageRef): void {
    const groupKeys = this.memberships.get(messageKey(ref));
    if (!groupKeys) return;

    const affected = new Set<string>();
    for (const key of groupKeys) {
      const group = this.groups.get(key);
      if (group) {
        for (const member of group.members.keys()) affected.add(member);
      }
    }
    this.recompute(affected);
  }

  /**
   * Take a message out of every group referencing it. Groups left empty are
   * dropped.
   *
   * @returns whether the message was linked at all
   */
  pruneMessage(ref: MessageRef): boolean {
    const key = messageKey(ref);
    const groupKeys = this.memberships.get(key);
    if (!groupKeys) return false;

    const affected = new Set<string>([key]);
    for (const gk of groupKeys) {
      const group = this.groups.get(gk);
      if (!group) continue;
      group.members.delete(key);
      if (group.members.size === 0) {
        this.groups.delete(gk);
      }
      for (const member of group.members.keys()) affected.add(member);
    }
    this.memberships.delete(key);
    this.recompute(affected);
    return true;
  }

  list(guildId: string): LinkGroupInfo[] {
    const result: LinkGroupInfo[] = [];
    for (const group of this.groups.values()) {
      if (group.guildId === guildId) {
        result.push({ name: group.name, messages: toLinkedMessages(group) });
      }
    }
    return result;
  }

  // ============================================
  // Snapshot
  // ============================================

  toSnapshot(): LinksTree {
    const tree: LinksTree = {};
    for (const group of this.groups.values()) {
      const guild = tree[group.guildId] || {};
      guild[group.name] = toLinkedMessages(group);
      tree[group.guildId] = guild;
    }
    return tree;
  }

  /**
   * Replace all groups with persisted ones. No binding validation happens here:
   * a linked message may legitimately have lost its last binding.
   */
  load(tree: LinksTree): void {
    this.groups.clear();
    this.memberships.clear();
    this.exclusive.clear();

    const affected = new Set<string>();
    for (const [guildId, links] of Object.entries(tree)) {
      for (const [name, messages] of Object.entries(links)) {
        if (messages.length === 0) continue;
        const refs = messages.map(m => ({ guildId, channelId: m.channelId, messageId: m.messageId }));
        for (const key of this.insert(guildId, name, refs)) affected.add(key);
      }
    }
    this.recompute(affected);
  }

  // ============================================
  // Internals
  // ============================================

  private insert(guildId: string, name: string, refs: MessageRef[]): string[] {
    const key = groupKey(guildId, name);
    const group: LinkGroup = { guildId, name, members: new Map() };
    for (const ref of refs) {
      group.members.set(messageKey(ref), ref);
    }
    this.groups.set(key, group);

    for (const member of group.members.keys()) {
      const groupKeys = this.memberships.get(member) || new Set<string>();
      groupKeys.add(key);
      this.memberships.set(member, groupKeys);
    }
    return Array.from(group.members.keys());
  }

  private detach(group: LinkGroup): string[] {
    const key = groupKey(group.guildId, group.name);
    this.groups.delete(key);
    for (const member of group.members.keys()) {
      const groupKeys = this.memberships.get(member);
      if (!groupKeys) continue;
      groupKeys.delete(key);
      if (groupKeys.size === 0) {
        this.memberships.delete(member);
      }
    }
    return Array.from(group.members.keys());
  }

  private recompute(messageKeys: Iterable<string>): void {
    const unions = new Map<string, Set<RoleId>>(); // group key -> union, memoized for this pass

    for (const key of messageKeys) {
      const groupKeys = this.memberships.get(key);
      if (!groupKeys) {
        this.exclusive.delete(key);
        continue;
      }

      const roles = new Set<RoleId>();
      for (const gk of groupKeys) {
        let union = unions.get(gk);
        if (!union) {
          union = this.groupUnion(gk);
          unions.set(gk, union);
        }
        for (const role of union) roles.add(role);
      }
      this.exclusive.set(key, roles);
    }
  }

  private groupUnion(key: string): Set<RoleId> {
    const union = new Set<RoleId>();
    const group = this.groups.get(key);
    if (!group) return union;
    for (const ref of group.members.values()) {
      for (const role of this.bindings.rolesOf(ref)) union.add(role);
    }
    return union;
  }
}

function groupKey(guildId: string, name: string): string {
  return `${guildId}:${name}`;
}

function toLinkedMessages(group: LinkGroup): LinkedMessage[] {
  return Array.from(group.members.values(), ref => ({ channelId: ref.channelId, messageId: ref.messageId }));
}
