/**
 * discord.js implementations of the engine's collaborators
 */

import { DiscordAPIError, RESTJSONErrorCodes, type Client, type Message } from 'discord.js';
import type { MemberRef, MessageRef } from '@reaction-roles/shared';
import type {
  MembershipStore,
  ReactionSummary,
  ReactionTransport,
  RoleId,
  StoreFailureKind,
  StoreResult,
} from '../react-roles/types.js';
import { REACTORS_PAGE_SIZE } from '../react-roles/reconciler.js';

/**
 * Role reads and writes against guild members
 */
export class DiscordMembershipStore implements MembershipStore {
  constructor(private readonly client: Client) {}

  async getRoles(member: MemberRef): Promise<StoreResult<ReadonlySet<RoleId>>> {
    try {
      const guild = await this.client.guilds.fetch(member.guildId);
      const guildMember = await guild.members.fetch({ user: member.userId, force: true });
      return { ok: true, value: new Set(guildMember.roles.cache.keys()) };
    } catch (error) {
      return toFailure(error);
    }
  }

  async replaceRoles(member: MemberRef, roles: ReadonlySet<RoleId>): Promise<StoreResult> {
    try {
      const guild = await this.client.guilds.fetch(member.guildId);
      await guild.members.edit(member.userId, { roles: Array.from(roles) });
      return { ok: true, value: undefined };
    } catch (error) {
      return toFailure(error);
    }
  }

  async grantRole(member: MemberRef, role: RoleId): Promise<StoreResult> {
    try {
      const guild = await this.client.guilds.fetch(member.guildId);
      const guildMember = await guild.members.fetch(member.userId);
      await guildMember.roles.add(role);
      return { ok: true, value: undefined };
    } catch (error) {
      return toFailure(error);
    }
  }
}

/**
 * Message and reaction access for the engine
 */
export class DiscordReactionTransport implements ReactionTransport {
  constructor(private readonly client: Client) {}

  selfId(): string | null {
    return this.client.user?.id ?? null;
  }

  async messageExists(ref: MessageRef): Promise<boolean> {
    try {
      await this.fetchMessage(ref);
      return true;
    } catch (error) {
      if (isApiError(error, RESTJSONErrorCodes.UnknownMessage) || isApiError(error, RESTJSONErrorCodes.UnknownChannel)) {
        return false;
      }
      throw error;
    }
  }

  async roleExists(guildId: string, roleId: RoleId): Promise<boolean> {
    try {
      const guild = await this.client.guilds.fetch(guildId);
      const role = await guild.roles.fetch(roleId);
      return role !== null;
    } catch (error) {
      if (isApiError(error, RESTJSONErrorCodes.UnknownRole)) return false;
      throw error;
    }
  }

  async addMarker(ref: MessageRef, symbol: string): Promise<boolean> {
    const message = await this.fetchMessage(ref);
    try {
      await message.react(symbol);
      return true;
    } catch (error) {
      if (error instanceof DiscordAPIError && (error.code === RESTJSONErrorCodes.UnknownEmoji || error.status === 400)) {
        return false;
      }
      throw error;
    }
  }

  async clearReaction(ref: MessageRef, symbol: string): Promise<void> {
    const message = await this.fetchMessage(ref);
    const reaction = message.reactions.cache.get(symbol);
    if (reaction) {
      await reaction.remove();
    }
  }

  async listReactions(ref: MessageRef): Promise<ReactionSummary[]> {
    const message = await this.fetchMessage(ref);
    const summaries: ReactionSummary[] = [];
    for (const reaction of message.reactions.cache.values()) {
      const symbol = reaction.emoji.id ?? reaction.emoji.name;
      if (!symbol) continue;
      summaries.push({ symbol, count: reaction.count ?? 0, me: reaction.me });
    }
    return summaries;
  }

  async listReactors(ref: MessageRef, symbol: string, after?: string): Promise<string[]> {
    const message = await this.fetchMessage(ref);
    const reaction = message.reactions.cache.get(symbol);
    if (!reaction) return [];
    const users = await reaction.users.fetch({ limit: REACTORS_PAGE_SIZE, after });
    return Array.from(users.keys());
  }

  private async fetchMessage(ref: MessageRef): Promise<Message> {
    const channel = await this.client.channels.fetch(ref.channelId);
    if (!channel || !channel.isTextBased() || channel.isDMBased()) {
      throw new Error(`Channel ${ref.channelId} is not a server text channel`);
    }
    return channel.messages.fetch(ref.messageId);
  }
}

function isApiError(error: unknown, code: RESTJSONErrorCodes): boolean {
  return error instanceof DiscordAPIError && error.code === code;
}

/**
 * Rate limits, server errors and anything that never reached Discord are worth
 * retrying. Any other 4xx (missing permissions, unknown member or role,
 * invalid body) will fail the same way again.
 */
export function toFailure(error: unknown): { ok: false; kind: StoreFailureKind; message: string } {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof DiscordAPIError && error.status >= 400 && error.status < 500 && error.status !== 429) {
    return { ok: false, kind: 'forbidden', message };
  }
  return { ok: false, kind: 'transient', message };
}
