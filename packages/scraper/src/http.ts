/**
 * Small HTTP client for the remote sources: user agent, timeout,
 * retries on 429/5xx and network errors, zod-validated JSON bodies.
 */

import type { z } from "zod";
import { withRetry } from "./retry";
import type { RetryOptions } from "./retry";

export type QueryParams = Record<string, string | number>;

export class HttpError extends Error {
  constructor(
    readonly status: number,
    readonly url: string
  ) {
    super(`HTTP ${status}: ${url}`);
    this.name = "HttpError";
  }
}

export interface HttpClient {
  getText(url: string, params?: QueryParams): Promise<string>;
  getJson<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: QueryParams
  ): Promise<T>;
}

export interface HttpClientOptions {
  userAgent: string;
  timeoutMs: number;
  retry?: RetryOptions;
  fetchImpl?: typeof fetch;
}

/** Append query params, keeping any already in the URL. */
export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/** Client errors other than 429 will not change on retry. */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.status === 429 || error.status >= 500;
  }
  return true;
}

export function createHttpClient(options: HttpClientOptions): HttpClient {
  const fetchImpl = options.fetchImpl ?? fetch;

  function getBody(url: string, accept: string, params?: QueryParams): Promise<string> {
    const target = buildUrl(url, params);
    return withRetry(
      async () => {
        const res = await fetchImpl(target, {
          headers: { "User-Agent": options.userAgent, Accept: accept },
          signal: AbortSignal.timeout(options.timeoutMs),
        });
        if (!res.ok) throw new HttpError(res.status, target);
        return res.text();
      },
      options.retry,
      target,
      isRetryableError
    );
  }

  return {
    getText(url, params) {
      return getBody(url, "text/html,application/xhtml+xml,*/*;q=0.8", params);
    },

    async getJson(url, schema, params) {
      const body = await getBody(url, "application/json", params);
      let data: unknown;
      try {
        data = JSON.parse(body);
      } catch {
        throw new Error(`Response from ${buildUrl(url, params)} is not valid JSON`);
      }
      const result = schema.safeParse(data);
      if (!result.success) {
        const messages = result.error.issues
          .slice(0, 5)
          .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
        throw new Error(
          `Unexpected response shape from ${buildUrl(url, params)}: ${messages.join("; ")}`
        );
      }
      return result.data;
    },
  };
}
