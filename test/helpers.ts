import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";
import type { HistoryOptions, HistoryPage, HistorySource, Message } from "../src/types.js";
import { ChannelError } from "../src/errors.js";

let nextId = 1;

export function message(channelId: string, text: string, at: string, authorName = "alice"): Message {
  return {
    id: String(nextId++),
    channelId,
    authorId: `${authorName}-id`,
    authorName,
    text,
    timestamp: new Date(at),
  };
}

/**
 * In-memory history: each channel holds pages newest first, every page
 * chronological. Channels listed in `failing` reject with ChannelError.
 */
export class FakeHistory implements HistorySource {
  readonly calls: { channelId: string; cursor?: string; until?: Date }[] = [];

  constructor(
    private readonly pages: Record<string, Message[][]>,
    private readonly failing: string[] = [],
  ) {}

  async fetchHistory(channelId: string, _since: Date, options: HistoryOptions = {}): Promise<HistoryPage> {
    this.calls.push({ channelId, cursor: options.cursor, until: options.until });
    if (this.failing.includes(channelId)) {
      throw new ChannelError(channelId, `History fetch failed: HTTP 403`);
    }
    const pages = this.pages[channelId] ?? [];
    const index = options.cursor ? Number(options.cursor) : 0;
    return {
      messages: pages[index] ?? [],
      nextCursor: index + 1 < pages.length ? String(index + 1) : null,
    };
  }
}

export type FakeRoute = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

/**
 * Axios instance answered in-process by `route`. Statuses of 400 and above
 * reject with an AxiosError the way the real adapters do.
 */
export function fakeHttp(route: FakeRoute) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push(config);
      const { status, data } = route(config);
      const response: AxiosResponse = { status, statusText: String(status), data, headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_RESPONSE, config, null, response);
      }
      return response;
    },
  });
  return { http, requests };
}

export function jsonBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === "string" ? JSON.parse(config.data) : config.data;
}
