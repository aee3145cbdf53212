/**
 * Research Command
 *
 * Interactive research loop, or a single query when one is given.
 */

import { Command } from 'commander';
import { ConfigurationError, configure } from '../arguments';
import type { Args, Config, SecureConfig } from '../arguments';
import * as Reasoning from '../reasoning';
import { Executor, Search, Session } from '../research';
import { ReadlinePrompter } from '../interactive';
import type { Prompter } from '../interactive';

/**
 * Wire the research agent. It talks to the OpenAI API unless researchBaseUrl
 * names another endpoint; the analysis endpoint and model are not reused.
 */
export const createResearchSession = (
    config: Config,
    secureConfig: SecureConfig,
    prompter: Prompter,
): Session.SessionInstance => {
    if (!config.researchBaseUrl && !secureConfig.openaiApiKey) {
        throw new ConfigurationError(
            'OPENAI_API_KEY is not set. Set it for the OpenAI API, or point the research agent at another endpoint with --research-base-url.',
        );
    }
    const reasoning = Reasoning.create({
        model: config.researchModel,
        baseUrl: config.researchBaseUrl,
        apiKey: secureConfig.openaiApiKey,
        temperature: config.temperature,
        maxTokens: config.researchMaxTokens,
    });
    const search = Search.create({
        apiKey: secureConfig.tavilyApiKey,
        maxContextChars: config.maxContextChars,
    });
    const executor = Executor.create({
        reasoning,
        capabilities: {
            search: (query, maxResults) => search.search(query, maxResults),
            clock: () => new Date(),
        },
        maxResults: config.searchMaxResults,
        maxSteps: config.maxAgentSteps,
    });
    return Session.create({ executor, prompter, researchDirectory: config.researchDirectory });
};

export const runResearch = async (
    query: string | undefined,
    args: Args,
    prompter: Prompter = ReadlinePrompter.create(),
): Promise<void> => {
    try {
        const [config, secureConfig] = await configure(args);
        const session = createResearchSession(config, secureConfig, prompter);
        if (query && query.trim()) {
            await session.runOnce(query.trim(), args.save ?? false);
        } else {
            await session.run();
        }
    } finally {
        prompter.close();
    }
};

export const registerResearchCommand = (program: Command): void => {
    program
        .command('research [query]')
        .description('Research a topic with web searches and summarize the findings')
        .option('--save', 'save the result of a single query to the research directory')
        .option('--research-model <researchModel>', 'model used by the research agent')
        .option('--research-base-url <researchBaseUrl>', 'OpenAI-compatible endpoint for the research agent (default: the OpenAI API)')
        .option('--research-max-tokens <researchMaxTokens>', 'token limit for each research completion (default: none)')
        .option('--research-directory <researchDirectory>', 'directory to save research results to')
        .option('--max-results <maxResults>', 'search results per query')
        .option('--max-agent-steps <maxAgentSteps>', 'rounds of tool calls before the agent must answer')
        .action(async (query: string | undefined, _options: Args, command: Command) => {
            await runResearch(query, command.optsWithGlobals<Args>());
        });
};
