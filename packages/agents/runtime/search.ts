import { tavily } from '@tavily/core';
import { addLog } from '@insight/shared/logger';

export type SearchDepth = 'basic' | 'advanced';

export interface SearchHit {
    content: string;
    score: number;
    title?: string;
    url?: string;
}

export interface SearchResponse {
    query: string;
    results: SearchHit[];
    /** Seconds the provider spent on the query, when reported. */
    responseTime?: number;
    engine?: string;
}

export interface SearchOptions {
    searchDepth: SearchDepth;
    maxResults: number;
}

/**
 * Web search collaborator. Results come back in provider order; callers
 * apply their own relevance filtering.
 */
export interface SearchClient {
    search(query: string, options: SearchOptions): Promise<SearchResponse>;
}

type TavilyClient = ReturnType<typeof tavily>;

export class TavilySearchClient implements SearchClient {
    private readonly client: TavilyClient;

    constructor(apiKey: string) {
        this.client = tavily({ apiKey });
    }

    async search(query: string, options: SearchOptions): Promise<SearchResponse> {
        addLog(`[Search] tavily depth=${options.searchDepth} max=${options.maxResults} query="${query.slice(0, 80)}"`);
        const response = await this.client.search(query, {
            searchDepth: options.searchDepth,
            maxResults: options.maxResults,
        });
        return {
            query: response.query,
            responseTime: response.responseTime,
            engine: 'tavily',
            results: response.results.map(result => ({
                content: result.content,
                score: result.score,
                title: result.title,
                url: result.url,
            })),
        };
    }
}

export function createSearchClient(): SearchClient | undefined {
    const apiKey = process.env.TAVILY_API_KEY;
    if (!apiKey) {
        addLog('[Search] TAVILY_API_KEY not set, web search disabled');
        return undefined;
    }
    return new TavilySearchClient(apiKey);
}
