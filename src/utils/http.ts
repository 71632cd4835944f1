// CHANGE: Retrying JSON POST helper on a shared axios instance.
// WHY: Network resets, 5xx and 429 responses are retried within one delivery attempt; other errors surface to the dispatcher.

import axios, { AxiosInstance, AxiosResponse } from "axios";
import { debug } from "../logger.js";

const RETRY_ATTEMPTS = 3;
const RETRY_BASE_DELAY_MS = 500;
const MAX_RETRY_AFTER_MS = 30000;
const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNABORTED", "ECONNREFUSED", "EAI_AGAIN"]);

const httpClient: AxiosInstance = axios.create({
  timeout: 15000,
  maxRedirects: 5,
  headers: {
    "User-Agent": "PublishDispatcher/1.0",
    Accept: "application/json"
  }
});

export interface PostOptions {
  readonly headers?: Record<string, string>;
  readonly timeout?: number;
}

function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

function retryAfterMs(headers: AxiosResponse["headers"] | undefined): number | undefined {
  const raw = headers?.["retry-after"];
  if (typeof raw !== "string") {
    return undefined;
  }
  const seconds = Number.parseFloat(raw);
  return Number.isNaN(seconds) ? undefined : Math.min(MAX_RETRY_AFTER_MS, Math.ceil(seconds * 1000));
}

async function executeWithRetry<T>(operation: () => Promise<AxiosResponse<T>>, attempt: number): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (rawError) {
    if (!axios.isAxiosError(rawError)) {
      throw rawError;
    }
    const nextAttempt = attempt + 1;
    if (nextAttempt >= RETRY_ATTEMPTS) {
      throw rawError;
    }
    const status = rawError.response?.status;
    const isNetworkIssue = rawError.code !== undefined && RETRYABLE_CODES.has(rawError.code);
    const isRateLimited = status === 429;
    const isRetryableStatus = typeof status === "number" && status >= 500 && status < 600;
    if (!isNetworkIssue && !isRateLimited && !isRetryableStatus) {
      throw rawError;
    }
    const backoff = (isRateLimited ? retryAfterMs(rawError.response?.headers) : undefined) ?? RETRY_BASE_DELAY_MS * 2 ** attempt;
    debug(`HTTP retry (${nextAttempt}/${RETRY_ATTEMPTS}) after ${backoff}ms for ${rawError.config?.url ?? "unknown-url"}`);
    await sleep(backoff);
    return executeWithRetry(operation, nextAttempt);
  }
}

/**
 * POST a JSON body and return the parsed response.
 *
 * @param url - Target URL.
 * @param body - Serialisable request body.
 * @throws AxiosError once retries are exhausted or the failure is not transient.
 */
export async function postJson<T>(
  url: string,
  body: unknown,
  options: PostOptions = {}
): Promise<{ readonly data: T; readonly status: number }> {
  const response = await executeWithRetry(
    () =>
      httpClient.post<T>(url, body, {
        headers: { "Content-Type": "application/json", ...options.headers },
        timeout: options.timeout
      }),
    0
  );
  return {
    data: response.data,
    status: response.status
  };
}

/**
 * Describe a request failure in one line for status messages and logs.
 */
export function describeHttpError(cause: unknown): string {
  if (axios.isAxiosError(cause)) {
    const status = cause.response?.status;
    return status ? `HTTP ${status}${cause.response?.statusText ? ` ${cause.response.statusText}` : ""}` : cause.code ?? cause.message;
  }
  return cause instanceof Error ? cause.message : String(cause);
}

export { httpClient };
