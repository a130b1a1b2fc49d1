import type { BindingsSnapshot, MemberRef, MessageRef } from '@reaction-roles/shared';

export type RoleId = string;

// ============================================
// Keys
// ============================================

/** Stable map key for a message reference */
export function messageKey(ref: MessageRef): string {
  return `${ref.guildId}/${ref.channelId}/${ref.messageId}`;
}

/** Stable map key for a guild member */
export function memberKey(member: MemberRef): string {
  return `${member.guildId}:${member.userId}`;
}

/**
 * The default role every guild member holds. Discord gives it the guild's own id.
 */
export function everyoneRole(guildId: string): RoleId {
  return guildId;
}

// ============================================
// Membership Store
// ============================================

export type StoreFailureKind = 'forbidden' | 'transient';

export type StoreResult<T = undefined> =
  | { ok: true; value: T }
  | { ok: false; kind: StoreFailureKind; message: string };

/**
 * System of record for a member's roles. Only full-set reads and writes are
 * available, plus a single-role grant for bulk reconciliation.
 */
export interface MembershipStore {
  getRoles(member: MemberRef): Promise<StoreResult<ReadonlySet<RoleId>>>;
  replaceRoles(member: MemberRef, roles: ReadonlySet<RoleId>): Promise<StoreResult>;
  grantRole(member: MemberRef, role: RoleId): Promise<StoreResult>;
}

// ============================================
// Reaction Transport
// ============================================

export interface ReactionSummary {
  symbol: string;
  count: number;
  /** Whether the bot itself is one of the reactors */
  me: boolean;
}

/**
 * On-demand calls into the chat platform. Live reaction events are pushed
 * into the engine's handlers by the platform adapter.
 */
export interface ReactionTransport {
  /** Id of the bot's own account, or null before login */
  selfId(): string | null;
  messageExists(ref: MessageRef): Promise<boolean>;
  roleExists(guildId: string, roleId: RoleId): Promise<boolean>;
  /** Places the marker reaction; resolves false when the symbol is not a usable emoji */
  addMarker(ref: MessageRef, symbol: string): Promise<boolean>;
  clearReaction(ref: MessageRef, symbol: string): Promise<void>;
  listReactions(ref: MessageRef): Promise<ReactionSummary[]>;
  /** One page of reactor user ids, ordered by id, strictly after `after` */
  listReactors(ref: MessageRef, symbol: string, after?: string): Promise<string[]>;
}

// ============================================
// Persistence
// ============================================

export interface BindingsPersistence {
  load(): Promise<BindingsSnapshot>;
  save(snapshot: BindingsSnapshot): Promise<void>;
}
