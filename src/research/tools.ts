/**
 * Search Tool
 *
 * The one tool the research agent may call: run a web search and return the
 * raw context.
 */

import { SearchArgsSchema } from './types';
import type { ResearchTool, SearchArgs, ToolResult } from './types';
import * as Logging from '../logging';

export interface SearchToolContext {
    search(query: string, maxResults: number): Promise<string>;
    maxResults: number;
    onSearch?: (args: SearchArgs) => void;
}

export const SEARCH_TOOL_NAME = 'get_search';

export const create = (ctx: SearchToolContext): ResearchTool => ({
    name: SEARCH_TOOL_NAME,
    description: 'Perform a search for the given query.',
    parameters: {
        type: 'object',
        properties: {
            query: {
                type: 'string',
                description: 'Keywords to search',
            },
            query_number: {
                type: 'integer',
                description: 'The number of the query in the sequence',
            },
        },
        required: ['query', 'query_number'],
    },
    execute: async (rawArgs: Record<string, unknown>): Promise<ToolResult> => {
        const logger = Logging.getLogger();
        const parsed = SearchArgsSchema.safeParse(rawArgs);
        if (!parsed.success) {
            return {
                success: false,
                error: `Invalid arguments for ${SEARCH_TOOL_NAME}: ${parsed.error.issues.map(i => i.message).join('; ')}`,
            };
        }

        const args = parsed.data;
        logger.info('Search query %d: %s', args.query_number, args.query);
        ctx.onSearch?.(args);

        const data = await ctx.search(args.query, ctx.maxResults);
        return { success: true, data };
    },
});
