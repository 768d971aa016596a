import type { TruncationOrder } from "../config.js";
import { ServiceError } from "../errors.js";
import { logger } from "../logger.js";
import { localClock } from "../time.js";
import type { ChannelWindow, KeywordSet, Message, Report, SummarizationService } from "../types.js";

export const FALLBACK_MAX_ITEMS = 15;
export const FALLBACK_EXCERPT_CHARS = 200;

export const PROMPT_TEMPLATE = `You are writing a short daily digest of chat activity for one reader.
The messages below were posted in the listed channels during the covered day and each one mentions at least one tracked keyword.

Write a concise plain-text summary:
- Group related messages and name the channel they came from.
- Lead with errors, failures and anything that needs a decision.
- Do not invent details that are not in the messages.
- End with one line naming the channels that had no matching activity, if any.
Keep it under 250 words.`;

export type SummarizerOptions = {
  service: SummarizationService | null;
  keywords: KeywordSet;
  timezone: string;
  promptBudget: number;
  truncation: TruncationOrder;
  now?: () => Date;
};

export type SummarizeOptions = {
  coverageDate: string;
  signal?: AbortSignal;
};

export type SummaryResult = {
  report: Report;
  serviceError?: ServiceError;
  omittedFromPrompt: number;
};

export type Summarizer = {
  summarize(windows: ChannelWindow[], options: SummarizeOptions): Promise<SummaryResult>;
};

export type BuiltPrompt = {
  prompt: string;
  included: number;
  omitted: number;
};

export function channelLabel(window: ChannelWindow): string {
  return window.channelName ? `#${window.channelName}` : window.channelId;
}

function excerpt(text: string, limit: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > limit ? `${flat.slice(0, limit - 1)}…` : flat;
}

const NO_MATCHES_NOTE = "(no matching messages)";

function omittedNote(count: number): string {
  return `(${count} message(s) omitted for length)`;
}

/**
 * Renders the prompt within `budget` characters in total. The template and
 * one header plus note per channel are reserved first; message lines fill the
 * rest in truncation order, skipping any line that does not fit.
 */
export function buildPrompt(
  windows: ChannelWindow[],
  options: { keywords: KeywordSet; timezone: string; budget: number; truncation: TruncationOrder },
): BuiltPrompt {
  const entries = windows.flatMap((window) =>
    window.messages.map((message) => ({
      message,
      line: `[${localClock(message.timestamp, options.timezone)}] ${message.authorName}: ${message.text.trim()}`,
    })),
  );
  entries.sort((a, b) => a.message.timestamp.getTime() - b.message.timestamp.getTime());

  const preamble = [PROMPT_TEMPLATE, "", `Tracked keywords: ${options.keywords.join(", ")}`, "", "MESSAGES:"];
  let reserved = preamble.reduce((sum, line) => sum + line.length + 1, 0);
  for (const window of windows) {
    const note = window.messages.length === 0 ? NO_MATCHES_NOTE : omittedNote(window.messages.length);
    reserved += `### ${channelLabel(window)}`.length + 1 + note.length + 1;
  }

  // Walk from the end that survives truncation.
  const order = options.truncation === "oldest-first" ? [...entries].reverse() : entries;
  const kept = new Set<Message>();
  let used = reserved;
  for (const entry of order) {
    const cost = entry.line.length + 1;
    if (used + cost > options.budget) continue;
    used += cost;
    kept.add(entry.message);
  }

  const lines = [...preamble];
  for (const window of windows) {
    lines.push(`### ${channelLabel(window)}`);
    const visible = entries.filter((e) => e.message.channelId === window.channelId && kept.has(e.message));
    if (window.messages.length === 0) {
      lines.push(NO_MATCHES_NOTE);
    } else if (visible.length < window.messages.length) {
      lines.push(omittedNote(window.messages.length - visible.length));
    }
    for (const entry of visible) lines.push(entry.line);
  }

  return { prompt: lines.join("\n"), included: kept.size, omitted: entries.length - kept.size };
}

/** Extractive digest used when the summarization service is unavailable or not needed. */
export function buildFallbackBody(windows: ChannelWindow[]): string {
  const total = windows.reduce((sum, w) => sum + w.messages.length, 0);
  if (total === 0) {
    return `No messages matched the tracked keywords across ${windows.length} channel(s).`;
  }

  const active = windows.filter((w) => w.messages.length > 0);
  const quiet = windows.filter((w) => w.messages.length === 0).map(channelLabel);
  const lines = [`${total} matching message(s) across ${active.length} of ${windows.length} channel(s):`];

  let shown = 0;
  for (const window of active) {
    for (const message of window.messages) {
      if (shown >= FALLBACK_MAX_ITEMS) break;
      lines.push(`• ${channelLabel(window)} · ${message.authorName}: ${excerpt(message.text, FALLBACK_EXCERPT_CHARS)}`);
      shown++;
    }
  }
  if (total > shown) lines.push(`…and ${total - shown} more`);
  if (quiet.length > 0) lines.push("", `No matching activity: ${quiet.join(", ")}`);

  return lines.join("\n");
}

export function createSummarizer(options: SummarizerOptions): Summarizer {
  const now = options.now ?? (() => new Date());

  return {
    async summarize(windows, { coverageDate, signal }) {
      const matchedMessageCount = windows.reduce((sum, w) => sum + w.messages.length, 0);
      const report = (body: string, source: Report["source"]): Report => ({
        generatedAt: now(),
        coverageDate,
        body,
        sourceChannelCount: windows.length,
        matchedMessageCount,
        source,
      });

      if (matchedMessageCount === 0 || !options.service) {
        logger.info(
          { matchedMessageCount, serviceEnabled: options.service !== null },
          "Using fallback summary",
        );
        return { report: report(buildFallbackBody(windows), "fallback"), omittedFromPrompt: 0 };
      }

      const built = buildPrompt(windows, {
        keywords: options.keywords,
        timezone: options.timezone,
        budget: options.promptBudget,
        truncation: options.truncation,
      });
      if (built.included === 0) {
        logger.warn(
          { matchedMessageCount, budget: options.promptBudget },
          "No message fits the prompt budget, using fallback summary",
        );
        return { report: report(buildFallbackBody(windows), "fallback"), omittedFromPrompt: built.omitted };
      }
      if (built.omitted > 0) {
        logger.warn({ omitted: built.omitted, budget: options.promptBudget }, "Prompt over budget, messages dropped");
      }

      try {
        const text = await options.service.summarizeText(built.prompt, signal);
        const body = text.trim();
        if (!body) throw new ServiceError("malformed-response", "Summarization returned empty text");
        return { report: report(body, "service"), omittedFromPrompt: built.omitted };
      } catch (err) {
        if (signal?.aborted) throw signal.reason;
        if (!(err instanceof ServiceError)) throw err;
        logger.warn({ err, kind: err.kind }, "Summarization failed, using fallback summary");
        return {
          report: report(buildFallbackBody(windows), "fallback"),
          serviceError: err,
          omittedFromPrompt: built.omitted,
        };
      }
    },
  };
}
