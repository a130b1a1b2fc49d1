import { z } from 'zod';

// Discord ids are 64-bit snowflakes carried as decimal strings
export const SnowflakeSchema = z.string().regex(/^\d{1,20}$/, 'Expected a Discord snowflake id');

export const MessageRefSchema = z.object({
  guildId: SnowflakeSchema,
  channelId: SnowflakeSchema,
  messageId: SnowflakeSchema,
});

// Symbols are either a unicode emoji or a custom emote (id or <:name:id> form)
export const SymbolSchema = z.string().min(1).max(64);

// Persisted snapshot schemas
// bindings: guild -> channel -> message -> { symbol: role }
export const BindingsTreeSchema = z.record(
  z.record(z.record(z.record(SnowflakeSchema))),
);

export const LinkedMessageSchema = z.object({
  channelId: SnowflakeSchema,
  messageId: SnowflakeSchema,
});

// links: guild -> link name -> messages
export const LinksTreeSchema = z.record(z.record(z.array(LinkedMessageSchema)));

export const BindingsSnapshotSchema = z.object({
  bindings: BindingsTreeSchema.default({}),
  links: LinksTreeSchema.default({}),
});

// Admin request schemas
export const BindRequestSchema = MessageRefSchema.extend({
  symbol: SymbolSchema,
  roleId: SnowflakeSchema,
});

export const UnbindRequestSchema = MessageRefSchema.extend({
  symbol: SymbolSchema.optional(),
  roleId: SnowflakeSchema.optional(),
  clearReactions: z.boolean().default(false),
}).refine(body => body.symbol !== undefined || body.roleId !== undefined, {
  message: 'Either symbol or roleId is required',
});

export const LinkNameSchema = z.string().min(1).max(100).regex(/^[\w-]+$/, 'Link names may only contain letters, digits, _ and -');

export const LinkRequestSchema = z.object({
  guildId: SnowflakeSchema,
  name: LinkNameSchema,
  messages: z.array(LinkedMessageSchema).min(1),
});

export const ReconcileRequestSchema = MessageRefSchema;

// Type exports
export type BindingsTree = z.infer<typeof BindingsTreeSchema>;
export type LinkedMessage = z.infer<typeof LinkedMessageSchema>;
export type LinksTree = z.infer<typeof LinksTreeSchema>;
export type BindingsSnapshot = z.infer<typeof BindingsSnapshotSchema>;
export type BindRequest = z.infer<typeof BindRequestSchema>;
export type UnbindRequest = z.infer<typeof UnbindRequestSchema>;
export type LinkRequest = z.infer<typeof LinkRequestSchema>;
export type ReconcileRequest = z.infer<typeof ReconcileRequestSchema>;
