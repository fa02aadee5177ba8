import { search } from "duck-duck-scrape";
import type { SearchAdapter } from "../types/index.js";

export const NO_SEARCH_RESULTS = "No results.";

export const DEFAULT_MAX_RESULTS = 3;

export interface SearchHit {
  title: string;
  snippet: string;
}

export interface WebSearchProvider {
  search(query: string, limit: number): Promise<SearchHit[]>;
}

export class DuckDuckGoSearchProvider implements WebSearchProvider {
  async search(query: string, limit: number): Promise<SearchHit[]> {
    const response = await search(query);
    if (response.noResults) {
      return [];
    }
    return response.results.slice(0, limit).map((result) => ({
      title: result.title,
      snippet: result.description,
    }));
  }
}

export interface SearchAgentOptions {
  provider?: WebSearchProvider;
  maxResults?: number;
}

/**
 * 网页搜索代理：失败时返回错误文本而不是抛出，便于后续步骤继续。
 */
export class SearchAgent implements SearchAdapter {
  public readonly kind = "Search" as const;

  public readonly description =
    "A general web search agent for public information. Action: what to look up.";

  private readonly provider: WebSearchProvider;

  private readonly maxResults: number;

  constructor(options: SearchAgentOptions = {}) {
    this.provider = options.provider ?? new DuckDuckGoSearchProvider();
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  }

  public isAvailable(): boolean {
    return true;
  }

  public async run(query: string): Promise<string> {
    try {
      const hits = await this.provider.search(query, this.maxResults);
      const digest = hits
        .slice(0, this.maxResults)
        .map((hit) => `${hit.title}: ${hit.snippet}`)
        .join("\n");
      return digest || NO_SEARCH_RESULTS;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[SearchAgent] Search failed for "${query}" (${message})`);
      return `Search error: ${message}`;
    }
  }
}
