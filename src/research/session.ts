/**
 * Research Session
 *
 * The interactive loop around the research agent: ask for a query, show
 * the answer, optionally save it, and offer another round (or a retry after
 * an error).
 */

import type { Prompter } from '../interactive';
import * as Logging from '../logging';
import type { ExecutorInstance } from './executor';
import { saveResearch } from './markdown';
import type { ResearchResult } from './types';

export interface SessionConfig {
    executor: ExecutorInstance;
    prompter: Prompter;
    researchDirectory: string;
}

export interface SessionSummary {
    queries: number;
    saved: string[];
    failures: number;
}

export interface SessionInstance {
    run(): Promise<SessionSummary>;
    runOnce(query: string, save: boolean): Promise<{ result: ResearchResult; savedTo?: string }>;
}

export const create = (config: SessionConfig): SessionInstance => {
    const logger = Logging.getLogger();
    const { prompter } = config;

    const show = (result: ResearchResult) => {
        prompter.print('\nResearch Results:');
        prompter.print(`# ${result.researchTitle}`);
        prompter.print('\n' + result.researchMain);
        prompter.print('\nKey Points:');
        prompter.print(result.researchBullets);
    };

    const research = async (query: string): Promise<ResearchResult> => {
        prompter.print(`\nResearching: ${query}`);
        const { result, searches, iterations, totalTokens } = await config.executor.run(query);
        logger.verbose('Research used %d search(es) over %d step(s) and %d tokens', searches.length, iterations, totalTokens);
        show(result);
        return result;
    };

    const runOnce = async (query: string, save: boolean) => {
        const result = await research(query);

        if (!save) {
            return { result };
        }
        const savedTo = await saveResearch(config.researchDirectory, result);
        prompter.print(`Results saved to: ${savedTo}`);
        return { result, savedTo };
    };

    const run = async (): Promise<SessionSummary> => {
        const summary: SessionSummary = { queries: 0, saved: [], failures: 0 };

        for (;;) {
            const query = await prompter.ask("\nEnter your research query (or 'q' to quit): ");
            if (query.toLowerCase() === 'q') {
                prompter.print('Goodbye!');
                return summary;
            }
            if (!query.trim()) {
                prompter.print('Please enter a valid query.');
                continue;
            }

            summary.queries++;
            try {
                const result = await research(query);

                const save = await prompter.ask('\nSave results to file? (y/n): ');
                if (save.toLowerCase() === 'y') {
                    const savedTo = await saveResearch(config.researchDirectory, result);
                    summary.saved.push(savedTo);
                    prompter.print(`Results saved to: ${savedTo}`);
                }

                const again = await prompter.ask('\nResearch another topic? (y/n): ');
                if (again.toLowerCase() !== 'y') {
                    prompter.print('Goodbye!');
                    return summary;
                }
            } catch (error) {
                summary.failures++;
                const message = error instanceof Error ? error.message : String(error);
                logger.debug('Research query failed', { query, error: message });
                prompter.print(`Error during research: ${message}`);
                const retry = await prompter.ask('Would you like to try again? (y/n): ');
                if (retry.toLowerCase() !== 'y') {
                    return summary;
                }
            }
        }
    };

    return { run, runOnce };
};
