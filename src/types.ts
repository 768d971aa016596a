export type Message = {
  id: string;
  channelId: string;
  authorId: string;
  authorName: string;
  text: string;
  timestamp: Date;
};

/** Lower-cased, trimmed, de-duplicated keywords in configuration order. */
export type KeywordSet = readonly string[];

export type ChannelTarget = {
  id: string;
  name?: string;
};

export type ChannelWindow = {
  channelId: string;
  channelName?: string;
  sinceTimestamp: Date;
  messages: Message[];
};

export type ChannelFailure = {
  channelId: string;
  reason: string;
};

export type Report = {
  generatedAt: Date;
  /** Local calendar date (yyyy-MM-dd) the report covers. */
  coverageDate: string;
  body: string;
  sourceChannelCount: number;
  matchedMessageCount: number;
  source: "service" | "fallback";
};

export type ScheduleState = {
  timezone: string;
  /** HH:mm */
  targetLocalTime: string;
  lastFiredDate: string | null;
};

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type HistoryPage = {
  /** Oldest first. */
  messages: Message[];
  /** Cursor for the page before this one, or null when history is exhausted. */
  nextCursor: string | null;
};

export type HistoryOptions = {
  cursor?: string;
  until?: Date;
  signal?: AbortSignal;
};

/**
 * Channel history, newest page first. Each page is chronological and each
 * following page reaches further back in time. Fails with ChannelError.
 */
export interface HistorySource {
  fetchHistory(channelId: string, since: Date, options?: HistoryOptions): Promise<HistoryPage>;
}

export interface ChannelDirectory {
  listTextChannels(serverId: string, signal?: AbortSignal): Promise<ChannelTarget[]>;
}

/** Fails with ServiceError. */
export interface SummarizationService {
  summarizeText(prompt: string, signal?: AbortSignal): Promise<string>;
}

/** Fails with DeliveryError. */
export interface DirectMessenger {
  sendDirectMessage(userId: string, text: string, signal?: AbortSignal): Promise<void>;
}
