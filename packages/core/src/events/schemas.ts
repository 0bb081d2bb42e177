import { z } from "zod";

// Payload schemas keep unknown fields: the platform adds fields faster than we model them.

const snowflake = z.string().min(1);
const isoTimestamp = z.string();

export const userSchema = z
  .object({
    id: snowflake,
    username: z.string(),
    discriminator: z.string().optional(),
    global_name: z.string().nullish(),
    avatar: z.string().nullish(),
    bot: z.boolean().optional(),
    system: z.boolean().optional(),
    flags: z.number().int().optional()
  })
  .passthrough();

export const roleSchema = z
  .object({
    id: snowflake,
    name: z.string(),
    color: z.number().int().optional(),
    hoist: z.boolean().optional(),
    position: z.number().int().optional(),
    permissions: z.string().optional(),
    managed: z.boolean().optional(),
    mentionable: z.boolean().optional()
  })
  .passthrough();

export const emojiSchema = z
  .object({
    id: snowflake.nullable(),
    name: z.string().nullable(),
    roles: z.array(snowflake).optional(),
    user: userSchema.optional(),
    animated: z.boolean().optional()
  })
  .passthrough();

export const stickerSchema = z
  .object({
    id: snowflake,
    name: z.string(),
    format_type: z.number().int()
  })
  .passthrough();

export const guildMemberSchema = z
  .object({
    user: userSchema.optional(),
    nick: z.string().nullish(),
    roles: z.array(snowflake),
    joined_at: isoTimestamp.nullable(),
    deaf: z.boolean().optional(),
    mute: z.boolean().optional(),
    pending: z.boolean().optional()
  })
  .passthrough();

export const threadMemberSchema = z
  .object({
    id: snowflake.optional(),
    user_id: snowflake.optional(),
    join_timestamp: isoTimestamp,
    flags: z.number().int()
  })
  .passthrough();

export const channelSchema = z
  .object({
    id: snowflake,
    type: z.number().int(),
    guild_id: snowflake.optional(),
    name: z.string().nullish(),
    topic: z.string().nullish(),
    position: z.number().int().optional(),
    parent_id: snowflake.nullish(),
    last_message_id: snowflake.nullish(),
    nsfw: z.boolean().optional()
  })
  .passthrough();

export const attachmentSchema = z
  .object({
    id: snowflake,
    filename: z.string(),
    size: z.number().int(),
    url: z.string(),
    content_type: z.string().optional()
  })
  .passthrough();

export const embedSchema = z
  .object({
    title: z.string().optional(),
    type: z.string().optional(),
    description: z.string().optional(),
    url: z.string().optional()
  })
  .passthrough();

export const reactionSchema = z
  .object({
    count: z.number().int(),
    me: z.boolean(),
    emoji: emojiSchema
  })
  .passthrough();

export const messageSchema = z
  .object({
    id: snowflake,
    channel_id: snowflake,
    guild_id: snowflake.optional(),
    author: userSchema,
    member: guildMemberSchema.partial().optional(),
    content: z.string(),
    timestamp: isoTimestamp,
    edited_timestamp: isoTimestamp.nullish(),
    tts: z.boolean().optional(),
    mention_everyone: z.boolean().optional(),
    mentions: z.array(userSchema).optional(),
    mention_roles: z.array(snowflake).optional(),
    attachments: z.array(attachmentSchema).optional(),
    embeds: z.array(embedSchema).optional(),
    reactions: z.array(reactionSchema).optional(),
    pinned: z.boolean().optional(),
    type: z.number().int().optional()
  })
  .passthrough();

// Edits may carry only the fields that changed.
export const messageUpdateSchema = messageSchema.partial().extend({
  id: snowflake,
  channel_id: snowflake
});

export const unavailableGuildSchema = z
  .object({
    id: snowflake,
    unavailable: z.boolean().optional()
  })
  .passthrough();

export const guildSchema = z
  .object({
    id: snowflake,
    name: z.string(),
    icon: z.string().nullish(),
    owner_id: snowflake.optional(),
    roles: z.array(roleSchema).optional(),
    emojis: z.array(emojiSchema).optional(),
    members: z.array(guildMemberSchema).optional(),
    channels: z.array(channelSchema).optional(),
    threads: z.array(channelSchema).optional(),
    member_count: z.number().int().optional(),
    unavailable: z.boolean().optional()
  })
  .passthrough();

export const readyEventSchema = z
  .object({
    v: z.number().int(),
    user: userSchema,
    guilds: z.array(unavailableGuildSchema),
    session_id: z.string(),
    resume_gateway_url: z.string().optional(),
    shard: z.tuple([z.number().int(), z.number().int()]).optional(),
    application: z.object({ id: snowflake }).passthrough().optional()
  })
  .passthrough();

export const guildRoleEventSchema = z
  .object({
    guild_id: snowflake,
    role: roleSchema
  })
  .passthrough();

export const guildRoleDeleteEventSchema = z
  .object({
    guild_id: snowflake,
    role_id: snowflake
  })
  .passthrough();

export const channelPinsUpdateEventSchema = z
  .object({
    guild_id: snowflake.optional(),
    channel_id: snowflake,
    last_pin_timestamp: isoTimestamp.nullish()
  })
  .passthrough();

export const threadListSyncEventSchema = z
  .object({
    guild_id: snowflake,
    channel_ids: z.array(snowflake).optional(),
    threads: z.array(channelSchema),
    members: z.array(threadMemberSchema)
  })
  .passthrough();

export const threadMembersUpdateEventSchema = z
  .object({
    id: snowflake,
    guild_id: snowflake,
    member_count: z.number().int(),
    added_members: z.array(threadMemberSchema).optional(),
    removed_member_ids: z.array(snowflake).optional()
  })
  .passthrough();

export const stageInstanceSchema = z
  .object({
    id: snowflake,
    guild_id: snowflake,
    channel_id: snowflake,
    topic: z.string(),
    privacy_level: z.number().int()
  })
  .passthrough();

export const guildMemberAddEventSchema = guildMemberSchema.extend({
  guild_id: snowflake
});

export const guildMemberUpdateEventSchema = z
  .object({
    guild_id: snowflake,
    roles: z.array(snowflake),
    user: userSchema,
    nick: z.string().nullish(),
    joined_at: isoTimestamp.nullable(),
    premium_since: isoTimestamp.nullish()
  })
  .passthrough();

export const guildMemberRemoveEventSchema = z
  .object({
    guild_id: snowflake,
    user: userSchema
  })
  .passthrough();

export const guildMembersChunkEventSchema = z
  .object({
    guild_id: snowflake,
    members: z.array(guildMemberSchema),
    chunk_index: z.number().int(),
    chunk_count: z.number().int(),
    not_found: z.array(snowflake).optional(),
    nonce: z.string().optional()
  })
  .passthrough();

export const guildBanEventSchema = z
  .object({
    guild_id: snowflake,
    user: userSchema
  })
  .passthrough();

export const guildEmojisUpdateEventSchema = z
  .object({
    guild_id: snowflake,
    emojis: z.array(emojiSchema)
  })
  .passthrough();

export const guildStickersUpdateEventSchema = z
  .object({
    guild_id: snowflake,
    stickers: z.array(stickerSchema)
  })
  .passthrough();

export const guildIntegrationsUpdateEventSchema = z
  .object({
    guild_id: snowflake
  })
  .passthrough();

export const integrationSchema = z
  .object({
    id: snowflake,
    name: z.string(),
    type: z.string(),
    enabled: z.boolean().optional(),
    guild_id: snowflake.optional(),
    account: z.object({ id: z.string(), name: z.string() }).passthrough().optional()
  })
  .passthrough();

export const integrationDeleteEventSchema = z
  .object({
    id: snowflake,
    guild_id: snowflake,
    application_id: snowflake.optional()
  })
  .passthrough();

export const inviteCreateEventSchema = z
  .object({
    channel_id: snowflake,
    code: z.string(),
    created_at: isoTimestamp,
    guild_id: snowflake.optional(),
    inviter: userSchema.optional(),
    max_age: z.number().int(),
    max_uses: z.number().int(),
    temporary: z.boolean(),
    uses: z.number().int()
  })
  .passthrough();

export const inviteDeleteEventSchema = z
  .object({
    channel_id: snowflake,
    guild_id: snowflake.optional(),
    code: z.string()
  })
  .passthrough();

export const activitySchema = z
  .object({
    name: z.string(),
    type: z.number().int(),
    url: z.string().nullish(),
    created_at: z.number().optional(),
    state: z.string().nullish(),
    details: z.string().nullish()
  })
  .passthrough();

export const presenceUpdateEventSchema = z
  .object({
    user: z.object({ id: snowflake }).passthrough(),
    guild_id: snowflake.optional(),
    status: z.string(),
    activities: z.array(activitySchema),
    client_status: z
      .object({
        desktop: z.string().optional(),
        mobile: z.string().optional(),
        web: z.string().optional()
      })
      .passthrough()
  })
  .passthrough();

export const messageDeleteEventSchema = z
  .object({
    id: snowflake,
    channel_id: snowflake,
    guild_id: snowflake.optional()
  })
  .passthrough();

export const messageDeleteBulkEventSchema = z
  .object({
    ids: z.array(snowflake),
    channel_id: snowflake,
    guild_id: snowflake.optional()
  })
  .passthrough();

export const messageReactionAddEventSchema = z
  .object({
    user_id: snowflake,
    channel_id: snowflake,
    message_id: snowflake,
    guild_id: snowflake.optional(),
    member: guildMemberSchema.optional(),
    emoji: emojiSchema
  })
  .passthrough();

export const messageReactionRemoveEventSchema = z
  .object({
    user_id: snowflake,
    channel_id: snowflake,
    message_id: snowflake,
    guild_id: snowflake.optional(),
    emoji: emojiSchema
  })
  .passthrough();

export const messageReactionRemoveAllEventSchema = z
  .object({
    channel_id: snowflake,
    message_id: snowflake,
    guild_id: snowflake.optional()
  })
  .passthrough();

export const messageReactionRemoveEmojiEventSchema = z
  .object({
    channel_id: snowflake,
    message_id: snowflake,
    guild_id: snowflake.optional(),
    emoji: emojiSchema
  })
  .passthrough();

export const typingStartEventSchema = z
  .object({
    channel_id: snowflake,
    guild_id: snowflake.optional(),
    user_id: snowflake,
    timestamp: z.number().int(),
    member: guildMemberSchema.optional()
  })
  .passthrough();

export const guildScheduledEventSchema = z
  .object({
    id: snowflake,
    guild_id: snowflake,
    channel_id: snowflake.nullish(),
    creator_id: snowflake.nullish(),
    name: z.string(),
    description: z.string().nullish(),
    scheduled_start_time: isoTimestamp,
    scheduled_end_time: isoTimestamp.nullish(),
    privacy_level: z.number().int(),
    status: z.number().int(),
    entity_type: z.number().int(),
    entity_id: snowflake.nullish()
  })
  .passthrough();

export const guildScheduledEventUserEventSchema = z
  .object({
    guild_scheduled_event_id: snowflake,
    user_id: snowflake,
    guild_id: snowflake
  })
  .passthrough();

export const webhooksUpdateEventSchema = z
  .object({
    guild_id: snowflake,
    channel_id: snowflake
  })
  .passthrough();
