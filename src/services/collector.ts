import { describeError } from "../errors.js";
import { matches } from "../keywordFilter.js";
import { logger } from "../logger.js";
import type {
  ChannelFailure,
  ChannelTarget,
  ChannelWindow,
  HistorySource,
  KeywordSet,
  Message,
} from "../types.js";

export const MAX_PAGES_PER_CHANNEL = 50;

export type CollectOptions = {
  until?: Date;
  signal?: AbortSignal;
};

export type Collection = {
  windows: Map<string, ChannelWindow>;
  failures: ChannelFailure[];
};

export type WindowCollector = {
  collect(channels: ChannelTarget[], since: Date, options?: CollectOptions): Promise<Collection>;
};

export function createCollector(deps: {
  source: HistorySource;
  keywords: KeywordSet;
  maxPages?: number;
}): WindowCollector {
  const maxPages = deps.maxPages ?? MAX_PAGES_PER_CHANNEL;

  async function fetchWindow(channelId: string, since: Date, options: CollectOptions): Promise<Message[]> {
    const pages: Message[][] = [];
    let cursor: string | undefined;
    for (let page = 0; page < maxPages; page++) {
      const result = await deps.source.fetchHistory(channelId, since, {
        cursor,
        until: options.until,
        signal: options.signal,
      });
      pages.push(result.messages);
      const passedSince = result.messages.some((m) => m.timestamp.getTime() < since.getTime());
      if (passedSince || !result.nextCursor || result.nextCursor === cursor) {
        return pages.reverse().flat();
      }
      cursor = result.nextCursor;
    }
    logger.warn({ channelId, maxPages }, "Stopped paging channel history at page cap");
    return pages.reverse().flat();
  }

  function inWindow(message: Message, since: Date, until?: Date): boolean {
    const t = message.timestamp.getTime();
    if (t < since.getTime()) return false;
    return until ? t < until.getTime() : true;
  }

  return {
    async collect(channels, since, options = {}) {
      const windows = new Map<string, ChannelWindow>();
      const failures: ChannelFailure[] = [];

      for (const channel of channels) {
        const window: ChannelWindow = { channelId: channel.id, sinceTimestamp: since, messages: [] };
        if (channel.name) window.channelName = channel.name;
        windows.set(channel.id, window);

        try {
          const fetched = await fetchWindow(channel.id, since, options);
          window.messages = fetched
            .filter((m) => inWindow(m, since, options.until) && matches(m.text, deps.keywords))
            .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
          logger.info(
            { channelId: channel.id, channelName: channel.name, fetched: fetched.length, matched: window.messages.length },
            "Collected channel window",
          );
        } catch (err) {
          // A cancelled run is not a channel failure.
          if (options.signal?.aborted) throw options.signal.reason;
          failures.push({ channelId: channel.id, reason: describeError(err) });
          logger.warn({ err, channelId: channel.id }, "Skipping channel after fetch failure");
        }
      }

      return { windows, failures };
    },
  };
}
