import { describe, expect, it, vi } from "vitest";
import { DeliveryError } from "../src/errors.js";
import { createDispatcher, formatReportMessage } from "../src/services/dispatcher.js";
import type { Report } from "../src/types.js";

const report: Report = {
  generatedAt: new Date("2026-10-19T08:00:05Z"),
  coverageDate: "2026-10-19",
  body: "  A timed out once.\n",
  sourceChannelCount: 2,
  matchedMessageCount: 1,
  source: "service",
};

describe("formatReportMessage", () => {
  it("prefixes the body with the dated header", () => {
    expect(formatReportMessage(report)).toBe("📊 **Daily Summary - October 19, 2026**\n\nA timed out once.");
  });

  it("zero-pads the day", () => {
    expect(formatReportMessage({ ...report, coverageDate: "2026-12-02" })).toContain("December 02, 2026");
  });
});

describe("createDispatcher", () => {
  it("sends the formatted report to the recipient", async () => {
    const messenger = { sendDirectMessage: vi.fn().mockResolvedValue(undefined) };

    const result = await createDispatcher({ messenger }).deliver(report, "owner-1");

    expect(result).toEqual({ ok: true, value: undefined });
    expect(messenger.sendDirectMessage).toHaveBeenCalledWith(
      "owner-1",
      "📊 **Daily Summary - October 19, 2026**\n\nA timed out once.",
      undefined,
    );
  });

  it("returns a delivery failure instead of throwing", async () => {
    const failure = new DeliveryError("owner-1", "Cannot send messages to this user");
    const messenger = { sendDirectMessage: vi.fn().mockRejectedValue(failure) };

    const result = await createDispatcher({ messenger }).deliver(report, "owner-1");

    expect(result).toEqual({ ok: false, error: failure });
  });

  it("wraps unexpected errors as delivery failures", async () => {
    const messenger = { sendDirectMessage: vi.fn().mockRejectedValue(new Error("socket hang up")) };

    const result = await createDispatcher({ messenger }).deliver(report, "owner-1");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DeliveryError);
    expect(result.error.recipientId).toBe("owner-1");
    expect(result.error.message).toBe("socket hang up");
  });
});
