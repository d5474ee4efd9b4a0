import { z } from "zod";
import { ProviderError } from "../errors";
import type { Logger } from "../logger";
import { recordProviderError, startProviderTimer } from "../metrics";
import { FetchLike, requestJson } from "./httpJson";

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

export interface GeminiClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  maxOutputTokens: number;
  logger: Logger;
  fetchImpl?: FetchLike;
}

export class GeminiClient {
  constructor(private readonly options: GeminiClientOptions) {}

  async generate(systemInstruction: string, prompt: string, signal?: AbortSignal): Promise<string> {
    const stopTimer = startProviderTimer("gemini");
    try {
      const data = await requestJson({
        provider: "gemini",
        stage: "generate",
        url: `${this.options.baseUrl}/v1beta/models/${encodeURIComponent(this.options.model)}:generateContent`,
        method: "POST",
        headers: { "x-goog-api-key": this.options.apiKey },
        body: {
          systemInstruction: { parts: [{ text: systemInstruction }] },
          contents: [{ role: "user", parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: 0.2,
            maxOutputTokens: this.options.maxOutputTokens,
          },
        },
        schema: generateResponseSchema,
        signal,
        fetchImpl: this.options.fetchImpl,
        logger: this.options.logger,
      });

      const blockReason = data.promptFeedback?.blockReason;
      if (blockReason) {
        recordProviderError("gemini", "result");
        throw new ProviderError("gemini", `Gemini blocked the prompt (${blockReason})`);
      }
      const candidate = data.candidates?.[0];
      const text = (candidate?.content?.parts ?? [])
        .map((part) => part.text ?? "")
        .join("")
        .trim();
      if (!text) {
        recordProviderError("gemini", "result");
        const reason = candidate?.finishReason ? ` (finish reason ${candidate.finishReason})` : "";
        throw new ProviderError("gemini", `Gemini returned no content${reason}`);
      }
      return text;
    } finally {
      stopTimer();
    }
  }
}
