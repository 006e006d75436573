/**
 * HTTP helpers for direct-API providers.
 *
 * Wraps `fetch` with a per-call timeout, maps transport and status
 * failures onto the error taxonomy and validates bodies with zod.
 */

import type { z } from "zod";
import { AuthError, DecodeError, NetworkError } from "../errors";

export const DEFAULT_TIMEOUT_MS = 30_000;

export type FetchFn = typeof fetch;

export interface RequestJsonOptions<T> {
  provider: string;
  url: string;
  headers: Record<string, string>;
  schema: z.ZodType<T>;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}

/**
 * GET a JSON document and validate it against `schema`.
 *
 * @throws NetworkError on transport failure, timeout or 5xx/unexpected status
 * @throws AuthError on 401/403
 * @throws DecodeError when the body is not JSON or does not match the schema
 */
export async function requestJson<T>(options: RequestJsonOptions<T>): Promise<T> {
  const { provider, url, headers, schema } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchFn = options.fetchFn ?? fetch;

  let response: Response;
  try {
    response = await fetchFn(url, {
      method: "GET",
      headers: { Accept: "application/json", ...headers },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && error.name === "TimeoutError") {
      throw new NetworkError(provider, `request timed out after ${timeoutMs}ms`, error);
    }
    throw new NetworkError(
      provider,
      error instanceof Error ? error.message : String(error),
      error
    );
  }

  if (response.status === 401 || response.status === 403) {
    throw new AuthError(provider, new Error(`HTTP ${response.status}`));
  }

  if (!response.ok) {
    throw new NetworkError(provider, `HTTP ${response.status} from ${new URL(url).pathname}`);
  }

  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new NetworkError(provider, "failed to read response body", error);
  }

  return parseWithSchema(provider, body, schema);
}

/**
 * Parse and validate a raw response body.
 */
export function parseWithSchema<T>(provider: string, body: string, schema: z.ZodType<T>): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new DecodeError(provider, ["Response is not valid JSON"], error);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `${issue.path.map(String).join(".")}: ${issue.message}`
    );
    throw new DecodeError(provider, errors);
  }

  return result.data;
}
