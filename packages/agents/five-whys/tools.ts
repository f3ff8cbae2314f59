import { addLog } from '@insight/shared/logger';
import type { SearchClient, SearchHit } from '../runtime/search.js';
import type { WebSearchConfig } from './config.js';
import type { WebSearchOutput } from './state.js';

/**
 * Keeps hits scoring at or above the threshold, in source order, stopping at maxResults.
 */
export function filterSearchResults(results: SearchHit[], scoreThreshold: number, maxResults: number): SearchHit[] {
    const filtered: SearchHit[] = [];
    for (const item of results) {
        if (filtered.length >= maxResults) {
            break;
        }
        if (item.score >= scoreThreshold) {
            filtered.push(item);
        }
    }
    return filtered;
}

/** Cuts by code point so a surrogate pair is never split. */
export function truncateQuery(query: string, maxLength: number): string {
    const codePoints = Array.from(query);
    return codePoints.length <= maxLength ? query : codePoints.slice(0, maxLength).join('');
}

export const emptySearchOutput = (query: string): WebSearchOutput => ({
    searchResults: [],
    searchQuery: query,
    searchTime: '',
    searchEngine: '',
    searchUrl: '',
});

export async function webSearch(client: SearchClient, query: string, config: WebSearchConfig): Promise<WebSearchOutput> {
    const response = await client.search(truncateQuery(query, config.maxQueryLength), {
        searchDepth: config.searchDepth,
        maxResults: config.maxResults,
    });

    const filtered = filterSearchResults(response.results, config.scoreThreshold, config.maxResults);
    addLog(`[FiveWhys] web search kept ${filtered.length}/${response.results.length} results`);

    return {
        searchResults: filtered.map(item => item.content),
        searchQuery: query,
        searchTime: response.responseTime === undefined ? '' : String(response.responseTime),
        searchEngine: response.engine ?? '',
        searchUrl: filtered[0]?.url ?? '',
    };
}
