import { z } from "zod";
import { joinUrl, postJson, type FetchLike } from "./http-json.js";
import type { CallOptions, WebSearch, WebSearchResult } from "./types.js";

const DEFAULT_MAX_RESULTS = 5;

const searchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish()
      })
    )
    .default([])
});

export class WebSearchUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WebSearchUnavailableError";
  }
}

export interface TavilyWebSearchOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  maxResults?: number;
  fetchImpl?: FetchLike;
}

export class TavilyWebSearch implements WebSearch {
  constructor(private readonly options: TavilyWebSearchOptions) {}

  async search(query: string, callOptions?: CallOptions): Promise<WebSearchResult[]> {
    if (!this.options.apiKey) {
      throw new WebSearchUnavailableError("WEB_SEARCH_API_KEY is not configured.");
    }

    const response = await postJson({
      url: joinUrl(this.options.baseUrl, "search"),
      body: {
        api_key: this.options.apiKey,
        query,
        search_depth: "basic",
        max_results: this.options.maxResults ?? DEFAULT_MAX_RESULTS
      },
      schema: searchResponseSchema,
      timeoutMs: this.options.timeoutMs,
      signal: callOptions?.signal,
      fetchImpl: this.options.fetchImpl
    });

    return response.results
      .map((result) => ({
        title: result.title ?? "",
        url: result.url ?? "",
        content: result.content ?? ""
      }))
      .filter((result) => result.content.trim().length > 0);
  }
}
