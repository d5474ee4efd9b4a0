import { fetch } from "undici";
import { z } from "zod";
import { describeError, ProviderError, ProviderName } from "../errors";
import type { Logger } from "../logger";
import { recordProviderError } from "../metrics";

export type FetchLike = typeof fetch;

export interface JsonRequest<S extends z.ZodTypeAny> {
  provider: ProviderName;
  stage: string;
  url: string;
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  schema: S;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
  logger: Logger;
}

/**
 * Performs one JSON request against a provider API. Transport failures, non-2xx replies and
 * bodies that do not match `schema` all surface as {@link ProviderError}; an aborted signal
 * rethrows its reason untouched.
 */
export async function requestJson<S extends z.ZodTypeAny>(req: JsonRequest<S>): Promise<z.output<S>> {
  const doFetch = req.fetchImpl ?? fetch;
  const fail = (message: string, options: { status?: number; cause?: unknown } = {}) => {
    recordProviderError(req.provider, req.stage);
    return new ProviderError(req.provider, message, options);
  };

  let response: Awaited<ReturnType<FetchLike>>;
  try {
    response = await doFetch(req.url, {
      method: req.method,
      headers: {
        accept: "application/json",
        ...(req.body === undefined ? {} : { "content-type": "application/json" }),
        ...req.headers,
      },
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      signal: req.signal,
    });
  } catch (error) {
    if (req.signal?.aborted) {
      throw req.signal.reason;
    }
    throw fail(`${req.provider} ${req.stage} request failed: ${describeError(error)}`, { cause: error });
  }

  if (!response.ok) {
    const text = await response.text();
    req.logger.error(
      { provider: req.provider, stage: req.stage, status: response.status, text },
      "Provider request failed",
    );
    throw fail(`${req.provider} ${req.stage} failed (${response.status})`, { status: response.status });
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw fail(`${req.provider} ${req.stage} returned invalid JSON`, { cause: error });
  }

  const parsed = req.schema.safeParse(payload);
  if (!parsed.success) {
    req.logger.warn({ provider: req.provider, stage: req.stage, issues: parsed.error.issues }, "Malformed provider response");
    throw fail(`${req.provider} ${req.stage} returned a malformed response`);
  }
  return parsed.data;
}
