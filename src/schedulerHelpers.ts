import type { Settings } from "./config.js";
import { describeError } from "./errors.js";
import { logger } from "./logger.js";
import type { FireContext } from "./scheduler.js";
import type { WindowCollector } from "./services/collector.js";
import type { Dispatcher } from "./services/dispatcher.js";
import type { Summarizer } from "./services/summarizer.js";
import { DAY_MS, dayBounds, localDate } from "./time.js";
import type { ChannelDirectory, ChannelFailure, ChannelTarget, Report } from "./types.js";

export type DigestDeps = {
  settings: Pick<Settings, "serverId" | "recipientId" | "channelIds" | "channelPrefix" | "timezone">;
  directory: ChannelDirectory;
  collector: WindowCollector;
  summarizer: Summarizer;
  dispatcher: Dispatcher;
  now?: () => Date;
};

export type DigestRequest = {
  since: Date;
  until?: Date;
  coverageDate: string;
  deliver?: boolean;
};

export type RunDiagnostics = {
  coverageDate: string;
  channelCount: number;
  matchedMessageCount: number;
  channelFailures: ChannelFailure[];
  summarySource: Report["source"];
  serviceError?: string;
  omittedFromPrompt: number;
  delivery: "sent" | "failed" | "skipped";
  deliveryError?: string;
  durationMs: number;
};

export type DigestOutcome = {
  report: Report;
  diagnostics: RunDiagnostics;
};

export type DigestRunner = {
  runScheduled(fire: FireContext, signal: AbortSignal): Promise<DigestOutcome>;
  runForDay(date: string, signal: AbortSignal, options?: { deliver?: boolean }): Promise<DigestOutcome>;
  runRecent(signal: AbortSignal, options?: { deliver?: boolean }): Promise<DigestOutcome>;
  lastOutcome(): DigestOutcome | null;
};

/** Channel names containing this are never summarised. */
const EXCLUDED_NAME_FRAGMENT = "test";

export async function resolveChannels(deps: DigestDeps, signal?: AbortSignal): Promise<ChannelTarget[]> {
  const { channelIds, channelPrefix, serverId } = deps.settings;
  if (channelIds.length > 0) return channelIds.map((id) => ({ id }));

  const discovered = await deps.directory.listTextChannels(serverId, signal);
  const selected = discovered.filter((channel) => {
    const name = (channel.name ?? "").toLowerCase();
    if (name.includes(EXCLUDED_NAME_FRAGMENT)) return false;
    return channelPrefix ? name.startsWith(channelPrefix.toLowerCase()) : true;
  });
  logger.info({ serverId, discovered: discovered.length, selected: selected.length }, "Resolved channels");
  return selected;
}

export async function generateDailySummary(
  deps: DigestDeps,
  request: DigestRequest,
  signal?: AbortSignal,
): Promise<DigestOutcome> {
  const now = deps.now ?? (() => new Date());
  const started = now().getTime();

  const channels = await resolveChannels(deps, signal);
  const collection = await deps.collector.collect(channels, request.since, { until: request.until, signal });
  const windows = [...collection.windows.values()];
  const summary = await deps.summarizer.summarize(windows, { coverageDate: request.coverageDate, signal });
  logger.info(
    {
      coverageDate: request.coverageDate,
      channels: windows.length,
      matched: summary.report.matchedMessageCount,
      source: summary.report.source,
    },
    "Generated daily summary",
  );

  // Past the run deadline nothing may be sent.
  signal?.throwIfAborted();

  let delivery: RunDiagnostics["delivery"] = "skipped";
  let deliveryError: string | undefined;
  if (request.deliver !== false) {
    const result = await deps.dispatcher.deliver(summary.report, deps.settings.recipientId, signal);
    delivery = result.ok ? "sent" : "failed";
    if (!result.ok) deliveryError = result.error.message;
  }

  const diagnostics: RunDiagnostics = {
    coverageDate: request.coverageDate,
    channelCount: windows.length,
    matchedMessageCount: summary.report.matchedMessageCount,
    channelFailures: collection.failures,
    summarySource: summary.report.source,
    omittedFromPrompt: summary.omittedFromPrompt,
    delivery,
    durationMs: now().getTime() - started,
  };
  if (summary.serviceError) diagnostics.serviceError = describeError(summary.serviceError);
  if (deliveryError) diagnostics.deliveryError = deliveryError;

  if (collection.failures.length > 0 || delivery === "failed") {
    logger.warn({ diagnostics }, "Daily summary finished with errors");
  } else {
    logger.info({ diagnostics }, "Daily summary finished");
  }
  return { report: summary.report, diagnostics };
}

export function createDigestRunner(deps: DigestDeps): DigestRunner {
  const now = deps.now ?? (() => new Date());
  let last: DigestOutcome | null = null;

  async function run(request: DigestRequest, signal: AbortSignal): Promise<DigestOutcome> {
    const outcome = await generateDailySummary(deps, request, signal);
    last = outcome;
    return outcome;
  }

  return {
    runScheduled(fire, signal) {
      const until = now();
      return run({ since: new Date(until.getTime() - DAY_MS), coverageDate: fire.date }, signal);
    },

    runForDay(date, signal, options = {}) {
      const { since, until } = dayBounds(date, deps.settings.timezone);
      return run({ since, until, coverageDate: date, deliver: options.deliver }, signal);
    },

    runRecent(signal, options = {}) {
      const until = now();
      return run(
        {
          since: new Date(until.getTime() - DAY_MS),
          coverageDate: localDate(until, deps.settings.timezone),
          deliver: options.deliver,
        },
        signal,
      );
    },

    lastOutcome: () => last,
  };
}
