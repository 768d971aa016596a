import { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import { ServiceError } from "../src/errors.js";
import { createGeminiClient, toServiceError } from "../src/geminiClient.js";
import { fakeHttp, jsonBody, type FakeRoute } from "./helpers.js";

function gemini(route: FakeRoute) {
  const fake = fakeHttp(route);
  return {
    service: createGeminiClient({ apiKey: "test-secret", model: "gemini-2.5-pro", http: fake.http }),
    requests: fake.requests,
  };
}

async function failure(route: FakeRoute): Promise<ServiceError> {
  const err = await gemini(route).service.summarizeText("prompt").catch((e: unknown) => e);
  if (!(err instanceof ServiceError)) throw new Error(`expected ServiceError, got ${String(err)}`);
  return err;
}

describe("createGeminiClient", () => {
  it("posts the prompt and joins the returned text parts", async () => {
    const { service, requests } = gemini(() => ({
      status: 200,
      data: { candidates: [{ content: { parts: [{ text: "Two errors " }, { text: "in #builds.\n" }] } }] },
    }));

    await expect(service.summarizeText("Summarise this")).resolves.toBe("Two errors in #builds.");
    expect(requests[0]?.url).toBe("/models/gemini-2.5-pro:generateContent");
    expect(requests[0]?.headers.get("x-goog-api-key")).toBe("test-secret");
    expect(requests.map(jsonBody)).toEqual([{ contents: [{ role: "user", parts: [{ text: "Summarise this" }] }] }]);
  });

  it("maps HTTP 429 to a quota error", async () => {
    expect((await failure(() => ({ status: 429, data: {} }))).kind).toBe("quota");
  });

  it("maps other HTTP failures to unavailable", async () => {
    const err = await failure(() => ({ status: 503, data: {} }));

    expect(err.kind).toBe("unavailable");
    expect(err.message).toBe("Summarization request failed with HTTP 503");
  });

  it("maps request timeouts to timeout", async () => {
    const err = await failure((config) => {
      throw new AxiosError("timeout of 60000ms exceeded", AxiosError.ECONNABORTED, config);
    });

    expect(err.kind).toBe("timeout");
  });

  it("rejects responses without candidates", async () => {
    const err = await failure(() => ({ status: 200, data: { candidates: [] } }));

    expect(err.kind).toBe("malformed-response");
  });

  it("rejects responses without text", async () => {
    const err = await failure(() => ({ status: 200, data: { candidates: [{ content: { parts: [{}] } }] } }));

    expect(err).toMatchObject({ kind: "malformed-response", message: "Gemini returned no text" });
  });
});

describe("toServiceError", () => {
  it("keeps service errors and wraps anything else as unavailable", () => {
    const quota = new ServiceError("quota", "out of quota");

    expect(toServiceError(quota)).toBe(quota);
    expect(toServiceError(new Error("dns lookup failed"))).toMatchObject({
      kind: "unavailable",
      message: "dns lookup failed",
    });
  });
});
