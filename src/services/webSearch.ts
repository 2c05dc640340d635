import { config } from '../config/index.js';
import { WebSearchError } from './errors.js';

export interface WebSearchResult {
  title: string;
  url: string;
  content: string;
}

export interface WebSearchResponse {
  query: string;
  answer: string | null;
  results: WebSearchResult[];
}

/**
 * Anything that can run a web search for the agent
 */
export interface WebSearchClient {
  search(query: string): Promise<WebSearchResponse>;
}

export interface TavilySearchClientOptions {
  apiKey: string;
  baseUrl?: string;
  maxResults?: number;
  timeoutMs?: number;
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Web search over the Tavily REST API
 */
export class TavilySearchClient implements WebSearchClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxResults: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TavilySearchClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? config.tavily.baseUrl;
    this.maxResults = options.maxResults ?? 5;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string): Promise<WebSearchResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/search`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          query,
          topic: 'general',
          search_depth: 'advanced', // Better recall for agronomy questions
          max_results: this.maxResults,
          include_answer: 'basic',
          include_raw_content: false,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new WebSearchError(`Tavily API error (${response.status}): ${errorBody}`, response.status);
      }

      const data: unknown = await response.json();
      if (!isRecord(data)) {
        throw new WebSearchError('Tavily returned a malformed response');
      }

      const results = Array.isArray(data.results) ? data.results : [];
      return {
        query,
        answer: typeof data.answer === 'string' ? data.answer : null,
        results: results.filter(isRecord).map(r => ({
          title: asString(r.title),
          url: asString(r.url),
          content: asString(r.content),
        })),
      };
    } catch (error) {
      if (error instanceof WebSearchError) throw error;
      if (error instanceof Error && error.name === 'AbortError') {
        throw new WebSearchError(`Tavily request timed out after ${this.timeoutMs}ms`);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new WebSearchError(`Tavily request failed: ${message}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
