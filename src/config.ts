import { z } from "zod";
import { ConfigError } from "./errors.js";
import { parseKeywords } from "./keywordFilter.js";
import type { KeywordSet } from "./types.js";

export type TruncationOrder = "oldest-first" | "newest-first";

export type Settings = {
  discordToken: string;
  serverId: string;
  recipientId: string;
  keywords: KeywordSet;
  timezone: string;
  targetLocalTime: string;
  channelIds: string[];
  channelPrefix: string;
  promptBudget: number;
  truncation: TruncationOrder;
  runTimeoutMs: number;
  catchUpOnStart: boolean;
  lastFiredDate: string | null;
  geminiApiKey: string;
  geminiModel: string;
  port: number;
  adminToken: string;
};

export const DEFAULT_TIMEZONE = "Asia/Karachi";
export const DEFAULT_MODEL = "gemini-2.5-pro";

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

const snowflake = z.string().trim().regex(/^\d+$/, "must be a numeric Discord id");

const flag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  SUMMARY_DISCORD_TOKEN: z.string().trim().min(1, "is required"),
  SUMMARY_SERVER_ID: snowflake,
  SUMMARY_OWNER_USER_ID: snowflake,
  SUMMARY_KEYWORDS: z.string().default(""),
  SUMMARY_TIMEZONE: z
    .string()
    .trim()
    .default(DEFAULT_TIMEZONE)
    .refine(isValidTimeZone, "must be an IANA timezone"),
  SUMMARY_TIME: z
    .string()
    .trim()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "must be HH:mm")
    .default("13:00"),
  SUMMARY_CHANNEL_IDS: z.string().default(""),
  SUMMARY_CHANNEL_PREFIX: z.string().trim().default(""),
  SUMMARY_PROMPT_BUDGET: z.coerce.number().int().positive().default(12000),
  SUMMARY_TRUNCATE: z.enum(["oldest-first", "newest-first"]).default("oldest-first"),
  SUMMARY_RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  SUMMARY_CATCH_UP_ON_START: flag,
  SUMMARY_LAST_FIRED_DATE: z
    .string()
    .trim()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "must be yyyy-MM-dd")
    .optional(),
  GEMINI_API_KEY: z.string().trim().default(""),
  GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  ADMIN_TOKEN: z.string().trim().default(""),
});

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// Blank variables behave as unset so `.env` templates with empty values keep defaults.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }
  return cleaned;
}

export function getSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`),
    );
  }
  const e = parsed.data;
  return {
    discordToken: e.SUMMARY_DISCORD_TOKEN,
    serverId: e.SUMMARY_SERVER_ID,
    recipientId: e.SUMMARY_OWNER_USER_ID,
    keywords: parseKeywords(e.SUMMARY_KEYWORDS),
    timezone: e.SUMMARY_TIMEZONE,
    targetLocalTime: e.SUMMARY_TIME,
    channelIds: splitList(e.SUMMARY_CHANNEL_IDS),
    channelPrefix: e.SUMMARY_CHANNEL_PREFIX,
    promptBudget: e.SUMMARY_PROMPT_BUDGET,
    truncation: e.SUMMARY_TRUNCATE,
    runTimeoutMs: e.SUMMARY_RUN_TIMEOUT_MS,
    catchUpOnStart: e.SUMMARY_CATCH_UP_ON_START,
    lastFiredDate: e.SUMMARY_LAST_FIRED_DATE ?? null,
    geminiApiKey: e.GEMINI_API_KEY,
    geminiModel: e.GEMINI_MODEL,
    port: e.PORT,
    adminToken: e.ADMIN_TOKEN,
  };
}
