import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { ServiceError } from "./errors.js";
import { logger } from "./logger.js";
import type { SummarizationService } from "./types.js";

export const GEMINI_API_BASE = "https://generativelanguage.googleapis.com/v1beta";

const responseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })).default([]),
        }),
      }),
    )
    .min(1),
});

export type GeminiClientOptions = {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

export function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) return err;
  if (axios.isAxiosError(err)) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT" || err.code === "ERR_CANCELED") {
      return new ServiceError("timeout", "Summarization request timed out", { cause: err });
    }
    const status = err.response?.status;
    if (status === 429) {
      return new ServiceError("quota", "Summarization quota exhausted", { cause: err });
    }
    return new ServiceError(
      "unavailable",
      `Summarization request failed${status ? ` with HTTP ${status}` : `: ${err.message}`}`,
      { cause: err },
    );
  }
  return new ServiceError("unavailable", err instanceof Error ? err.message : String(err), { cause: err });
}

export function createGeminiClient(options: GeminiClientOptions): SummarizationService {
  const http =
    options.http ??
    axios.create({
      baseURL: options.baseURL ?? GEMINI_API_BASE,
      timeout: options.timeoutMs ?? 60000,
    });

  return {
    async summarizeText(prompt: string, signal?: AbortSignal): Promise<string> {
      logger.info({ model: options.model, chars: prompt.length }, "Sending prompt to Gemini");
      try {
        const res = await http.post(
          `/models/${options.model}:generateContent`,
          { contents: [{ role: "user", parts: [{ text: prompt }] }] },
          {
            headers: { "Content-Type": "application/json", "x-goog-api-key": options.apiKey },
            signal,
          },
        );
        const parsed = responseSchema.safeParse(res.data);
        if (!parsed.success) {
          throw new ServiceError("malformed-response", "Gemini response did not match the expected shape");
        }
        const [candidate] = parsed.data.candidates;
        const text = (candidate?.content.parts ?? [])
          .map((part) => part.text ?? "")
          .join("")
          .trim();
        if (!text) {
          throw new ServiceError("malformed-response", "Gemini returned no text");
        }
        return text;
      } catch (err) {
        throw toServiceError(err);
      }
    },
  };
}
