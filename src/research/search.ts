/**
 * Tavily search client
 *
 * Returns search results as a context blob (JSON text of url/content
 * pairs) that is handed to the model as-is.
 */

import { z } from 'zod';
import * as Logging from '../logging';
import { DEFAULT_MAX_CONTEXT_CHARS, TAVILY_API_URL } from '../constants';
import { SearchError } from './types';

export interface SearchProvider {
    search(query: string, maxResults: number): Promise<string>;
}

export interface TavilyConfig {
    apiKey?: string;
    baseUrl?: string;
    maxContextChars?: number;
}

const TavilyResponseSchema = z.object({
    results: z.array(z.object({
        url: z.string(),
        content: z.string(),
        title: z.string().optional(),
    })).default([]),
});

export const create = (config: TavilyConfig): SearchProvider => {
    const logger = Logging.getLogger();
    const baseUrl = config.baseUrl ?? TAVILY_API_URL;
    const maxContextChars = config.maxContextChars ?? DEFAULT_MAX_CONTEXT_CHARS;

    const getApiKey = (): string => {
        if (!config.apiKey) {
            throw new SearchError('Missing TAVILY_API_KEY environment variable');
        }
        return config.apiKey;
    };

    const search = async (query: string, maxResults: number): Promise<string> => {
        const apiKey = getApiKey();
        logger.debug('Searching Tavily', { query, maxResults });

        let response: Response;
        try {
            response = await fetch(`${baseUrl}/search`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Authorization: `Bearer ${apiKey}`,
                },
                body: JSON.stringify({
                    query,
                    max_results: maxResults,
                    search_depth: 'basic',
                    include_answer: false,
                    include_raw_content: false,
                }),
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new SearchError(`Tavily request failed: ${message}`, { cause: error });
        }

        if (!response.ok) {
            const body = await response.text();
            throw new SearchError(`Tavily search failed: ${response.status} ${body}`);
        }

        const parsed = TavilyResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new SearchError(`Unexpected Tavily response: ${parsed.error.message}`);
        }

        const context = JSON.stringify(parsed.data.results.map(r => ({ url: r.url, content: r.content })));
        logger.debug('Tavily returned %d result(s), %d chars', parsed.data.results.length, context.length);
        return context.length > maxContextChars ? context.slice(0, maxContextChars) : context;
    };

    return { search };
};
