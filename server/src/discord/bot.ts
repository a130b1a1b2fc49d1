/**
 * Discord Bot Integration
 *
 * Connects to the gateway and forwards reaction and message-delete events to
 * the reaction roles engine. Partials are enabled so reactions on messages
 * sent before the bot started (and therefore not cached) still arrive.
 */

import {
  Client,
  Events,
  GatewayIntentBits,
  Partials,
  type MessageReaction,
  type PartialMessageReaction,
  type PartialUser,
  type User,
} from 'discord.js';
import type { MessageRef } from '@reaction-roles/shared';
import type { ReactionHandlers } from '../react-roles/handlers.js';

export function createDiscordClient(): Client {
  return new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.GuildMessageReactions,
    ],
    partials: [Partials.Message, Partials.Channel, Partials.Reaction, Partials.User],
  });
}

/**
 * Subscribe the engine's handlers to gateway events
 */
export function attachReactionHandlers(client: Client, handlers: ReactionHandlers): void {
  client.on(Events.MessageReactionAdd, async (reaction, user) => {
    const event = toReactionEvent(reaction, user);
    if (event) {
      await handlers.onReactionAdded(event.ref, event.symbol, event.userId);
    }
  });

  client.on(Events.MessageReactionRemove, async (reaction, user) => {
    const event = toReactionEvent(reaction, user);
    if (event) {
      await handlers.onReactionRemoved(event.ref, event.symbol, event.userId);
    }
  });

  client.on(Events.MessageDelete, async (message) => {
    if (!message.guildId) return;
    await handlers.onMessageDeleted({ guildId: message.guildId, channelId: message.channelId, messageId: message.id });
  });

  client.on(Events.MessageBulkDelete, async (messages) => {
    for (const message of messages.values()) {
      if (!message.guildId) continue;
      await handlers.onMessageDeleted({ guildId: message.guildId, channelId: message.channelId, messageId: message.id });
    }
  });
}

/**
 * Log in and resolve once the gateway reports ready
 */
export async function startDiscordBot(client: Client, token: string): Promise<void> {
  console.log('[Discord] Starting Discord bot...');
  const ready = new Promise<void>((resolve) => {
    client.once(Events.ClientReady, (readyClient) => {
      console.log(`[Discord] Logged in as ${readyClient.user.tag}`);
      resolve();
    });
  });
  await client.login(token);
  await ready;
}

interface ReactionEvent {
  ref: MessageRef;
  symbol: string;
  userId: string;
}

/**
 * Reduce a gateway reaction to the ids the engine works with. Reactions
 * outside servers are ignored.
 */
export function toReactionEvent(
  reaction: MessageReaction | PartialMessageReaction,
  user: User | PartialUser,
): ReactionEvent | null {
  const message = reaction.message;
  if (!message.guildId) return null;
  const symbol = reaction.emoji.id ?? reaction.emoji.name;
  if (!symbol) return null;

  return {
    ref: { guildId: message.guildId, channelId: message.channelId, messageId: message.id },
    symbol,
    userId: user.id,
  };
}
