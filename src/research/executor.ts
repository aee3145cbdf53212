/**
 * Research Executor
 *
 * Runs the research agent loop: the model plans searches through the
 * get_search tool, tool results are fed back in, and the loop ends when the
 * model answers without tool calls. The answer must be the JSON shape of
 * ResearchAnswerSchema.
 */

import * as Reasoning from '../reasoning';
import * as Logging from '../logging';
import * as Tools from './tools';
import { ResearchAnswerSchema, ResearchError } from './types';
import type { ResearchCapabilities, ResearchRun, ResearchTool, SearchArgs } from './types';

export interface ExecutorConfig {
    reasoning: Reasoning.ReasoningInstance;
    capabilities: ResearchCapabilities;
    maxResults: number;
    maxSteps: number;
}

export interface ExecutorInstance {
    run(query: string): Promise<ResearchRun>;
}

export const formatDate = (date: Date): string => {
    const pad = (n: number) => n.toString().padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
};

export const buildSystemPrompt = (today: Date): string => `You're a helpful research assistant. You are an expert in research.
If you are given a question, you write strong keywords to perform 3-5 searches in total (each with a query_number) and then combine the results.
If you need today's date, it is ${formatDate(today)}.

When you have finished searching, reply with only a JSON object in this shape:
{
    "research_title": "A top-level Markdown heading that covers the topic of the query (without the leading #)",
    "research_main": "A main section that provides detailed answers for the query and research",
    "research_bullets": "A set of bullet points summarizing the answers for the query"
}`;

const FINAL_ANSWER_PROMPT = 'Stop searching now. Using the search results you already have, reply with only the final JSON answer.';

/**
 * Pull the JSON object out of a reply that may be wrapped in prose or a code fence.
 */
export const extractJsonObject = (content: string): unknown => {
    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start === -1 || end <= start) {
        throw new ResearchError('Research answer does not contain a JSON object');
    }
    try {
        return JSON.parse(content.slice(start, end + 1));
    } catch (error) {
        throw new ResearchError('Research answer is not valid JSON', { cause: error });
    }
};

export const create = (config: ExecutorConfig): ExecutorInstance => {
    const logger = Logging.getLogger();

    const run = async (query: string): Promise<ResearchRun> => {
        const searches: SearchArgs[] = [];
        const tool = Tools.create({
            search: (q, maxResults) => config.capabilities.search(q, maxResults),
            maxResults: config.maxResults,
            onSearch: args => searches.push(args),
        });
        const toolMap = new Map<string, ResearchTool>([[tool.name, tool]]);
        const toolDefinitions: Reasoning.ToolDefinition[] = [{
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
        }];

        const history: Reasoning.ConversationMessage[] = [
            { role: 'system', content: buildSystemPrompt(config.capabilities.clock()) },
            { role: 'user', content: query },
        ];

        let iterations = 0;
        let totalTokens = 0;

        const complete = async (request: Reasoning.ReasoningRequest): Promise<Reasoning.ReasoningResponse> => {
            const response = await config.reasoning.complete(request);
            totalTokens += response.usage?.totalTokens ?? 0;
            return response;
        };

        try {
            let response = await complete({ messages: history, tools: toolDefinitions });

            while (response.toolCalls && response.toolCalls.length > 0 && iterations < config.maxSteps) {
                iterations++;
                logger.debug('Iteration %d: Processing %d tool calls...', iterations, response.toolCalls.length);
                history.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });

                for (const toolCall of response.toolCalls) {
                    const handler = toolMap.get(toolCall.name);
                    if (!handler) {
                        throw new ResearchError(`Unknown tool: ${toolCall.name}`);
                    }
                    // A failed tool call ends the query; it is not handed back to the model
                    const result = await handler.execute(toolCall.arguments);
                    if (!result.success) {
                        throw new ResearchError(result.error ?? `Tool ${toolCall.name} failed`);
                    }
                    history.push({ role: 'tool', toolCallId: toolCall.id, content: result.data ?? '' });
                }

                response = await complete({ messages: history, tools: toolDefinitions });
            }

            if (response.toolCalls && response.toolCalls.length > 0) {
                // Out of steps: the pending tool calls are dropped and the model is asked to wrap up.
                logger.warn('Research agent reached %d steps, asking for the final answer', config.maxSteps);
                history.push({ role: 'user', content: FINAL_ANSWER_PROMPT });
                response = await complete({ messages: history, json: true });
            }

            const parsed = ResearchAnswerSchema.safeParse(extractJsonObject(response.content));
            if (!parsed.success) {
                throw new ResearchError(
                    `Research answer does not match the expected shape: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
                );
            }

            logger.debug('Research finished after %d iteration(s) and %d search(es)', iterations, searches.length);
            return {
                result: {
                    researchTitle: parsed.data.research_title,
                    researchMain: parsed.data.research_main,
                    researchBullets: parsed.data.research_bullets,
                },
                searches,
                iterations,
                totalTokens,
            };
        } catch (error) {
            if (error instanceof ResearchError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new ResearchError(`Research failed: ${message}`, { cause: error });
        }
    };

    return { run };
};
