// Load environment-specific .env file
import { config as dotenvConfig } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const nodeEnv = process.env.NODE_ENV || 'development';
// .env files are in the server directory (one level up from src/)
const envFile = path.join(__dirname, '..', `.env.${nodeEnv}`);
dotenvConfig({ path: envFile });

import Fastify from 'fastify';
import { initConfig } from './config/index.js';
import { registerAdminRoutes } from './api/admin.js';
import { attachReactionHandlers, createDiscordClient, startDiscordBot } from './discord/bot.js';
import { DiscordMembershipStore, DiscordReactionTransport } from './discord/adapters.js';
import { ReactRolesEngine } from './react-roles/index.js';
import { JsonBindingsStore } from './storage/bindings-store.js';

const config = initConfig();

const fastify = Fastify({
  logger: {
    level: config.logLevel,
  },
});

const client = createDiscordClient();
const engine = new ReactRolesEngine(
  {
    store: new DiscordMembershipStore(client),
    transport: new DiscordReactionTransport(client),
    persistence: new JsonBindingsStore({ file: config.reactRoles.bindingsFile }),
  },
  {
    maxProcessedPerSecond: config.reactRoles.maxProcessedPerSecond,
    maxForbiddenAttempts: config.reactRoles.maxForbiddenAttempts,
  },
);
attachReactionHandlers(client, engine.handlers);

// Start server
const start = async () => {
  if (!config.discord.botToken) {
    console.error('[Discord] DISCORD_BOT_TOKEN is not set - nothing to do');
    process.exit(1);
  }

  try {
    await startDiscordBot(client, config.discord.botToken);
    await engine.start();
    fastify.log.info({ file: config.reactRoles.bindingsFile }, 'Reaction roles engine started');

    if (config.admin.token) {
      await registerAdminRoutes(fastify, { engine, token: config.admin.token });
      await fastify.listen({
        port: config.port,
        host: config.host,
      });
    } else {
      fastify.log.warn('ADMIN_TOKEN is not set - admin API disabled');
    }
  } catch (error) {
    fastify.log.error(error);
    process.exit(1);
  }
};

// Handle shutdown
const shutdown = async () => {
  console.log('Shutting down...');
  await engine.stop();
  await fastify.close();
  await client.destroy();
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

void start();
