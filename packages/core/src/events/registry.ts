import type { z } from "zod";
import { GatewayError } from "../errors.js";
import {
  channelPinsUpdateEventSchema,
  channelSchema,
  guildBanEventSchema,
  guildEmojisUpdateEventSchema,
  guildIntegrationsUpdateEventSchema,
  guildMemberAddEventSchema,
  guildMemberRemoveEventSchema,
  guildMembersChunkEventSchema,
  guildMemberUpdateEventSchema,
  guildRoleDeleteEventSchema,
  guildRoleEventSchema,
  guildScheduledEventSchema,
  guildScheduledEventUserEventSchema,
  guildSchema,
  guildStickersUpdateEventSchema,
  integrationDeleteEventSchema,
  integrationSchema,
  inviteCreateEventSchema,
  inviteDeleteEventSchema,
  messageDeleteBulkEventSchema,
  messageDeleteEventSchema,
  messageReactionAddEventSchema,
  messageReactionRemoveAllEventSchema,
  messageReactionRemoveEmojiEventSchema,
  messageReactionRemoveEventSchema,
  messageSchema,
  messageUpdateSchema,
  presenceUpdateEventSchema,
  readyEventSchema,
  stageInstanceSchema,
  threadListSyncEventSchema,
  threadMembersUpdateEventSchema,
  threadMemberSchema,
  typingStartEventSchema,
  unavailableGuildSchema,
  userSchema,
  webhooksUpdateEventSchema
} from "./schemas.js";

export const eventSchemas = {
  READY: readyEventSchema,

  GUILD_CREATE: guildSchema,
  GUILD_UPDATE: guildSchema,
  GUILD_DELETE: unavailableGuildSchema,
  GUILD_ROLE_CREATE: guildRoleEventSchema,
  GUILD_ROLE_UPDATE: guildRoleEventSchema,
  GUILD_ROLE_DELETE: guildRoleDeleteEventSchema,

  CHANNEL_CREATE: channelSchema,
  CHANNEL_UPDATE: channelSchema,
  CHANNEL_DELETE: channelSchema,
  CHANNEL_PINS_UPDATE: channelPinsUpdateEventSchema,
  THREAD_CREATE: channelSchema,
  THREAD_UPDATE: channelSchema,
  THREAD_DELETE: channelSchema,
  THREAD_LIST_SYNC: threadListSyncEventSchema,
  THREAD_MEMBER_UPDATE: threadMemberSchema,
  THREAD_MEMBERS_UPDATE: threadMembersUpdateEventSchema,

  STAGE_INSTANCE_CREATE: stageInstanceSchema,
  STAGE_INSTANCE_UPDATE: stageInstanceSchema,
  STAGE_INSTANCE_DELETE: stageInstanceSchema,

  GUILD_MEMBER_ADD: guildMemberAddEventSchema,
  GUILD_MEMBER_UPDATE: guildMemberUpdateEventSchema,
  GUILD_MEMBER_REMOVE: guildMemberRemoveEventSchema,
  GUILD_MEMBERS_CHUNK: guildMembersChunkEventSchema,

  GUILD_BAN_ADD: guildBanEventSchema,
  GUILD_BAN_REMOVE: guildBanEventSchema,
  GUILD_EMOJIS_UPDATE: guildEmojisUpdateEventSchema,
  GUILD_STICKERS_UPDATE: guildStickersUpdateEventSchema,

  GUILD_INTEGRATIONS_UPDATE: guildIntegrationsUpdateEventSchema,
  INTEGRATION_CREATE: integrationSchema,
  INTEGRATION_UPDATE: integrationSchema,
  INTEGRATION_DELETE: integrationDeleteEventSchema,
  WEBHOOKS_UPDATE: webhooksUpdateEventSchema,

  INVITE_CREATE: inviteCreateEventSchema,
  INVITE_DELETE: inviteDeleteEventSchema,

  PRESENCE_UPDATE: presenceUpdateEventSchema,
  USER_UPDATE: userSchema,

  MESSAGE_CREATE: messageSchema,
  MESSAGE_UPDATE: messageUpdateSchema,
  MESSAGE_DELETE: messageDeleteEventSchema,
  MESSAGE_DELETE_BULK: messageDeleteBulkEventSchema,

  MESSAGE_REACTION_ADD: messageReactionAddEventSchema,
  MESSAGE_REACTION_REMOVE: messageReactionRemoveEventSchema,
  MESSAGE_REACTION_REMOVE_ALL: messageReactionRemoveAllEventSchema,
  MESSAGE_REACTION_REMOVE_EMOJI: messageReactionRemoveEmojiEventSchema,

  TYPING_START: typingStartEventSchema,

  GUILD_SCHEDULED_EVENT_CREATE: guildScheduledEventSchema,
  GUILD_SCHEDULED_EVENT_UPDATE: guildScheduledEventSchema,
  GUILD_SCHEDULED_EVENT_DELETE: guildScheduledEventSchema,
  GUILD_SCHEDULED_EVENT_USER_ADD: guildScheduledEventUserEventSchema,
  GUILD_SCHEDULED_EVENT_USER_REMOVE: guildScheduledEventUserEventSchema
} as const;

export type KnownEventName = keyof typeof eventSchemas;

export type EventPayload<TName extends KnownEventName> = z.infer<(typeof eventSchemas)[TName]>;

/** A decoded record published to the event queue. */
export interface GatewayEvent {
  name: string;
  payload?: unknown;
}

export type KnownGatewayEvent<TName extends KnownEventName> = {
  name: TName;
  payload: EventPayload<TName>;
};

export type DecodeEventResult =
  | {
      ok: true;
      event: GatewayEvent;
    }
  | {
      ok: false;
      error: GatewayError;
    };

const knownEventNames = new Set<string>(Object.keys(eventSchemas));

export function isKnownEventName(name: string): name is KnownEventName {
  return knownEventNames.has(name);
}

export function schemaFor(name: string): z.ZodTypeAny | undefined {
  return isKnownEventName(name) ? eventSchemas[name] : undefined;
}

/** Decodes a dispatch payload against its schema; unknown names keep the data as-is. */
export function decodeEvent(name: string, data: unknown): DecodeEventResult {
  const schema = schemaFor(name);
  if (!schema) {
    return {
      ok: true,
      event: { name, payload: data }
    };
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".") || "payload"}: ${issue.message}` : "invalid payload";
    return {
      ok: false,
      error: new GatewayError("decode_failed", `Unable to decode ${name} (${detail})`)
    };
  }
  return {
    ok: true,
    event: { name, payload: parsed.data }
  };
}

export function isGatewayEvent<TName extends KnownEventName>(
  event: GatewayEvent,
  name: TName
): event is KnownGatewayEvent<TName> {
  return event.name === name;
}
