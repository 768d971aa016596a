import "dotenv/config";
import { getSettings, type Settings } from "./config.js";
import { createDiscordClient } from "./discordClient.js";
import { ConfigError } from "./errors.js";
import { createGeminiClient } from "./geminiClient.js";
import { createApp } from "./handlers/admin.js";
import { logger } from "./logger.js";
import { DailyScheduler } from "./scheduler.js";
import { createDigestRunner } from "./schedulerHelpers.js";
import { createCollector } from "./services/collector.js";
import { createDispatcher } from "./services/dispatcher.js";
import { createSummarizer } from "./services/summarizer.js";

function loadSettings(): Settings {
  try {
    return getSettings();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ issues: err.issues }, "Invalid configuration");
      process.exit(1);
    }
    throw err;
  }
}

const settings = loadSettings();
logger.info(
  {
    serverId: settings.serverId,
    recipientId: settings.recipientId,
    timezone: settings.timezone,
    targetLocalTime: settings.targetLocalTime,
    keywords: settings.keywords,
    channels: settings.channelIds.length > 0 ? settings.channelIds : "discover",
    summarization: settings.geminiApiKey ? settings.geminiModel : "disabled",
  },
  "Starting channel digest agent",
);
if (settings.keywords.length === 0) {
  logger.warn("SUMMARY_KEYWORDS is empty; no message will match and every digest will report no activity");
}

const discord = createDiscordClient({ token: settings.discordToken });
const service = settings.geminiApiKey
  ? createGeminiClient({ apiKey: settings.geminiApiKey, model: settings.geminiModel })
  : null;

const runner = createDigestRunner({
  settings,
  directory: discord,
  collector: createCollector({ source: discord, keywords: settings.keywords }),
  summarizer: createSummarizer({
    service,
    keywords: settings.keywords,
    timezone: settings.timezone,
    promptBudget: settings.promptBudget,
    truncation: settings.truncation,
  }),
  dispatcher: createDispatcher({ messenger: discord }),
});

const scheduler = new DailyScheduler({
  timezone: settings.timezone,
  targetLocalTime: settings.targetLocalTime,
  runTimeoutMs: settings.runTimeoutMs,
  lastFiredDate: settings.lastFiredDate,
  catchUpOnStart: settings.catchUpOnStart,
  run: (fire, signal) => runner.runScheduled(fire, signal),
});

const app = createApp({ scheduler, runner, timezone: settings.timezone, adminToken: settings.adminToken });
const server = app.listen(settings.port, () => {
  logger.info(`channel digest agent listening on ${settings.port}`);
});

const loop = scheduler.start().catch((err: unknown) => {
  logger.fatal({ err }, "Scheduler loop crashed");
  process.exitCode = 1;
  server.close();
});

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down");
  server.close();
  await scheduler.stop();
  await loop;
}

process.once("SIGINT", () => {
  shutdown("SIGINT").catch((err: unknown) => logger.error({ err }, "Shutdown failed"));
});
process.once("SIGTERM", () => {
  shutdown("SIGTERM").catch((err: unknown) => logger.error({ err }, "Shutdown failed"));
});
