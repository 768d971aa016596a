import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { ChannelError, DeliveryError } from "./errors.js";
import { logger } from "./logger.js";
import type {
  ChannelDirectory,
  ChannelTarget,
  DirectMessenger,
  HistoryOptions,
  HistoryPage,
  HistorySource,
  Message,
} from "./types.js";

export const DISCORD_API_BASE = "https://discord.com/api/v10";
export const PAGE_SIZE = 100;
export const MESSAGE_CHUNK_SIZE = 1900;

const DISCORD_EPOCH = 1420070400000n;
const GUILD_TEXT = 0;

const embedSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  fields: z.array(z.object({ name: z.string(), value: z.string() })).nullish(),
});

const messageSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  author: z.object({
    id: z.string(),
    username: z.string(),
    global_name: z.string().nullish(),
  }),
  content: z.string().default(""),
  timestamp: z.string(),
  embeds: z.array(embedSchema).default([]),
});

const channelSchema = z.object({
  id: z.string(),
  type: z.number(),
  name: z.string().nullish(),
});

type RawMessage = z.infer<typeof messageSchema>;

export type DiscordClient = HistorySource & ChannelDirectory & DirectMessenger;

export type DiscordClientOptions = {
  token: string;
  baseURL?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

/** Smallest snowflake Discord could assign at the given instant. */
export function snowflakeAt(instant: Date): string {
  return ((BigInt(instant.getTime()) - DISCORD_EPOCH) << 22n).toString();
}

export function extractMessageText(raw: RawMessage): string {
  const parts: string[] = [];
  if (raw.content.trim()) parts.push(raw.content);
  for (const embed of raw.embeds) {
    if (embed.title) parts.push(embed.title);
    if (embed.description) parts.push(embed.description);
    for (const field of embed.fields ?? []) {
      parts.push(`${field.name}\n${field.value}`);
    }
  }
  return parts.join("\n");
}

function toMessage(raw: RawMessage): Message {
  return {
    id: raw.id,
    channelId: raw.channel_id,
    authorId: raw.author.id,
    authorName: raw.author.global_name || raw.author.username,
    text: extractMessageText(raw),
    timestamp: new Date(raw.timestamp),
  };
}

/**
 * Splits text into chunks under the DM size limit, preferring line breaks.
 * Lines longer than the limit are cut hard.
 */
export function chunkMessage(text: string, size = MESSAGE_CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const line of text.split("\n")) {
    const pieces: string[] = [];
    for (let i = 0; i < line.length; i += size) pieces.push(line.slice(i, i + size));
    if (pieces.length === 0) pieces.push("");
    for (const piece of pieces) {
      const candidate = current ? `${current}\n${piece}` : piece;
      if (candidate.length <= size) {
        current = candidate;
      } else {
        chunks.push(current);
        current = piece;
      }
    }
  }
  if (current.trim()) chunks.push(current);
  return chunks;
}

function describeHttpError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    return status ? `HTTP ${status}` : err.code || err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

export function createDiscordClient(options: DiscordClientOptions): DiscordClient {
  const http =
    options.http ??
    axios.create({
      baseURL: options.baseURL ?? DISCORD_API_BASE,
      timeout: options.timeoutMs ?? 15000,
    });
  const headers = {
    Authorization: `Bot ${options.token}`,
    "Content-Type": "application/json",
  };

  return {
    async fetchHistory(channelId: string, since: Date, opts: HistoryOptions = {}): Promise<HistoryPage> {
      const before = opts.cursor ?? (opts.until ? snowflakeAt(opts.until) : undefined);
      try {
        const res = await http.get(`/channels/${channelId}/messages`, {
          headers,
          params: before ? { limit: PAGE_SIZE, before } : { limit: PAGE_SIZE },
          signal: opts.signal,
        });
        const parsed = z.array(messageSchema).safeParse(res.data);
        if (!parsed.success) {
          throw new ChannelError(channelId, "Malformed message history response");
        }
        // Discord returns newest first.
        const raw = parsed.data;
        const oldest = raw.at(-1);
        logger.debug({ channelId, count: raw.length, since: since.toISOString() }, "Fetched history page");
        return {
          messages: raw.map(toMessage).reverse(),
          nextCursor: raw.length === PAGE_SIZE && oldest ? oldest.id : null,
        };
      } catch (err) {
        if (err instanceof ChannelError) throw err;
        throw new ChannelError(channelId, `History fetch failed: ${describeHttpError(err)}`, { cause: err });
      }
    },

    async listTextChannels(serverId: string, signal?: AbortSignal): Promise<ChannelTarget[]> {
      try {
        const res = await http.get(`/guilds/${serverId}/channels`, { headers, signal });
        const parsed = z.array(channelSchema).safeParse(res.data);
        if (!parsed.success) {
          throw new ChannelError(serverId, "Malformed channel list response");
        }
        return parsed.data
          .filter((channel) => channel.type === GUILD_TEXT)
          .map((channel) => (channel.name ? { id: channel.id, name: channel.name } : { id: channel.id }));
      } catch (err) {
        if (err instanceof ChannelError) throw err;
        throw new ChannelError(serverId, `Channel listing failed: ${describeHttpError(err)}`, { cause: err });
      }
    },

    async sendDirectMessage(userId: string, text: string, signal?: AbortSignal): Promise<void> {
      try {
        const dm = await http.post("/users/@me/channels", { recipient_id: userId }, { headers, signal });
        const parsed = z.object({ id: z.string() }).safeParse(dm.data);
        if (!parsed.success) {
          throw new DeliveryError(userId, "Malformed DM channel response");
        }
        for (const chunk of chunkMessage(text)) {
          await http.post(`/channels/${parsed.data.id}/messages`, { content: chunk }, { headers, signal });
        }
      } catch (err) {
        if (err instanceof DeliveryError) throw err;
        throw new DeliveryError(userId, `Direct message failed: ${describeHttpError(err)}`, { cause: err });
      }
    },
  };
}
