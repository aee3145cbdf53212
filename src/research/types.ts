/**
 * Research Agent Types
 *
 * Includes the Zod schema the agent's final answer is validated against.
 */

import { z } from 'zod';

// ============================================================================
// Zod Schemas for Structured Outputs
// ============================================================================

/**
 * Final answer as the model writes it (snake_case on the wire)
 */
export const ResearchAnswerSchema = z.object({
    // Top-level heading for the topic; a leading '#' from the model is dropped
    research_title: z.string()
        .transform(title => title.trim().replace(/^#+\s*/, ''))
        .pipe(z.string().min(1)),
    research_main: z.string()
        .describe('Main section that gives detailed answers for the query'),
    research_bullets: z.string()
        .describe('Bullet points summarizing the answers'),
});

export const SearchArgsSchema = z.object({
    query: z.string().trim().min(1).describe('Keywords to search'),
    query_number: z.coerce.number().int().min(1).describe('The number of the query in the sequence'),
});

export type SearchArgs = z.infer<typeof SearchArgsSchema>;

// ============================================================================
// TypeScript Interfaces
// ============================================================================

export interface ResearchResult {
    researchTitle: string;
    researchMain: string;
    researchBullets: string;
}

/**
 * The fixed set of things the agent can do besides talking to the model.
 */
export interface ResearchCapabilities {
    search(query: string, maxResults: number): Promise<string>;
    clock(): Date;
}

export interface ResearchTool {
    name: string;
    description: string;
    parameters: Record<string, unknown>;  // JSON Schema
    execute: (args: Record<string, unknown>) => Promise<ToolResult>;
}

export interface ToolResult {
    success: boolean;
    data?: string;
    error?: string;
}

export interface ResearchRun {
    result: ResearchResult;
    searches: SearchArgs[];
    iterations: number;
    totalTokens: number;
}

export class SearchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SearchError';
    }
}

export class ResearchError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ResearchError';
    }
}
