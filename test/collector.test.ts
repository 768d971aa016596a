import { describe, expect, it } from "vitest";
import { parseKeywords } from "../src/keywordFilter.js";
import { createCollector } from "../src/services/collector.js";
import { FakeHistory, message } from "./helpers.js";

const since = new Date("2026-10-18T08:00:00Z");
const keywords = parseKeywords("error,status");

function texts(messages: { text: string }[]): string[] {
  return messages.map((m) => m.text);
}

describe("createCollector", () => {
  it("keeps only keyword matches per channel", async () => {
    const history = new FakeHistory({
      A: [[message("A", "build passed", "2026-10-18T09:00:00Z"), message("A", "error: timeout", "2026-10-18T10:00:00Z")]],
      B: [[]],
    });
    const collector = createCollector({ source: history, keywords });

    const { windows, failures } = await collector.collect([{ id: "A" }, { id: "B" }], since);

    expect(failures).toEqual([]);
    expect(texts(windows.get("A")?.messages ?? [])).toEqual(["error: timeout"]);
    expect(windows.get("B")?.messages).toEqual([]);
    expect(windows.get("A")?.sinceTimestamp).toBe(since);
  });

  it("skips a failing channel and still collects the rest", async () => {
    const history = new FakeHistory(
      {
        A: [[message("A", "status: green", "2026-10-18T09:00:00Z")]],
        C: [[message("C", "error in deploy", "2026-10-18T11:00:00Z"), message("C", "lunch?", "2026-10-18T12:00:00Z")]],
      },
      ["B"],
    );
    const collector = createCollector({ source: history, keywords });

    const { windows, failures } = await collector.collect([{ id: "A" }, { id: "B" }, { id: "C" }], since);

    expect([...windows.keys()]).toEqual(["A", "B", "C"]);
    expect(windows.get("B")?.messages).toEqual([]);
    expect(texts(windows.get("A")?.messages ?? [])).toEqual(["status: green"]);
    expect(texts(windows.get("C")?.messages ?? [])).toEqual(["error in deploy"]);
    expect(failures).toEqual([{ channelId: "B", reason: "History fetch failed: HTTP 403" }]);
  });

  it("follows pagination until a page reaches past the window start", async () => {
    const history = new FakeHistory({
      A: [
        [message("A", "error 3", "2026-10-18T20:00:00Z"), message("A", "error 4", "2026-10-18T21:00:00Z")],
        [message("A", "error 2", "2026-10-18T12:00:00Z")],
        [message("A", "error 0", "2026-10-17T23:00:00Z"), message("A", "error 1", "2026-10-18T09:00:00Z")],
        [message("A", "error -1", "2026-10-17T20:00:00Z")],
      ],
    });
    const collector = createCollector({ source: history, keywords });

    const { windows } = await collector.collect([{ id: "A" }], since);

    expect(texts(windows.get("A")?.messages ?? [])).toEqual(["error 1", "error 2", "error 3", "error 4"]);
    expect(history.calls.map((c) => c.cursor)).toEqual([undefined, "1", "2"]);
  });

  it("stops when history runs out", async () => {
    const history = new FakeHistory({
      A: [[message("A", "status ok", "2026-10-18T20:00:00Z")], [message("A", "status late", "2026-10-18T10:00:00Z")]],
    });
    const collector = createCollector({ source: history, keywords });

    const { windows } = await collector.collect([{ id: "A" }], since);

    expect(texts(windows.get("A")?.messages ?? [])).toEqual(["status late", "status ok"]);
    expect(history.calls).toHaveLength(2);
  });

  it("stops at the page cap", async () => {
    const pages = Array.from({ length: 10 }, (_, i) => [
      message("A", `error ${i}`, new Date(Date.parse("2026-10-18T23:00:00Z") - i * 60_000).toISOString()),
    ]);
    const history = new FakeHistory({ A: pages });
    const collector = createCollector({ source: history, keywords, maxPages: 3 });

    const { windows } = await collector.collect([{ id: "A" }], since);

    expect(history.calls).toHaveLength(3);
    expect(texts(windows.get("A")?.messages ?? [])).toEqual(["error 2", "error 1", "error 0"]);
  });

  it("drops messages at or after the upper bound and passes it to the source", async () => {
    const until = new Date("2026-10-19T00:00:00Z");
    const history = new FakeHistory({
      A: [[message("A", "error before", "2026-10-18T23:59:00Z"), message("A", "error after", "2026-10-19T00:00:00Z")]],
    });
    const collector = createCollector({ source: history, keywords });

    const { windows } = await collector.collect([{ id: "A" }], since, { until });

    expect(texts(windows.get("A")?.messages ?? [])).toEqual(["error before"]);
    expect(history.calls[0]?.until).toBe(until);
  });

  it("keeps the channel name on the window", async () => {
    const history = new FakeHistory({ A: [[]] });
    const collector = createCollector({ source: history, keywords });

    const { windows } = await collector.collect([{ id: "A", name: "phone-1" }], since);

    expect(windows.get("A")?.channelName).toBe("phone-1");
  });

  it("propagates cancellation instead of recording a channel failure", async () => {
    const controller = new AbortController();
    const reason = new Error("run cancelled");
    const collector = createCollector({
      source: {
        async fetchHistory() {
          controller.abort(reason);
          throw new Error("socket closed");
        },
      },
      keywords,
    });

    await expect(collector.collect([{ id: "A" }], since, { signal: controller.signal })).rejects.toBe(reason);
  });
});
