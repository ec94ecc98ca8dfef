import type { z } from "zod";
import { withTimeout } from "../clients/call-policy.js";

export class HttpServiceError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number
  ) {
    super(message);
    this.name = "HttpServiceError";
  }
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface PostJsonOptions<T> {
  url: string;
  body: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
}

export const joinUrl = (baseUrl: string, path: string): string =>
  `${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;

/** POSTs a JSON body and validates the JSON reply against `schema`. */
export async function postJson<T>(options: PostJsonOptions<T>): Promise<T> {
  const fetchImpl = options.fetchImpl ?? fetch;

  const json = await withTimeout(
    async (signal) => {
      const response = await fetchImpl(options.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...options.headers
        },
        body: JSON.stringify(options.body),
        signal
      });

      if (!response.ok) {
        const details = await response.text();
        throw new HttpServiceError(`Request to ${options.url} failed (${response.status}): ${details}`, response.status);
      }

      const payload: unknown = await response.json();
      return payload;
    },
    options.timeoutMs,
    options.signal
  );

  const parsed = options.schema.safeParse(json);
  if (!parsed.success) {
    throw new HttpServiceError(`Unexpected response shape from ${options.url}: ${parsed.error.message}`);
  }
  return parsed.data;
}
