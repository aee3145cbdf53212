/**
 * Insight Extractor
 *
 * Sends a transcript to the completion backend with the analysis prompt and
 * turns the reply into a MeetingInsight.
 *
 * Two failure modes:
 * - strict: any backend or parse failure is thrown as an ExtractionError
 * - lenient: the failure is logged and an empty insight comes back
 */

import * as Reasoning from '../reasoning';
import * as Logging from '../logging';
import { createEmptyInsight, countItems } from './types';
import type { MeetingInsight } from './types';
import { misplacedItems } from './taxonomy';
import type { Taxonomy } from './taxonomy';
import { parseInsightResponse } from './parse';
import { buildAnalysisSystemPrompt, buildAnalysisUserPrompt } from './prompts';

export type FailureMode = 'strict' | 'lenient';

export interface ExtractorConfig {
    reasoning: Reasoning.ReasoningInstance;
    taxonomy: Taxonomy;
    failureMode: FailureMode;
    temperature?: number;
    maxTokens?: number;
}

export interface ExtractorInstance {
    analyze(transcript: string): Promise<MeetingInsight>;
}

export class ExtractionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ExtractionError';
    }
}

export const create = (config: ExtractorConfig): ExtractorInstance => {
    const logger = Logging.getLogger();
    const systemPrompt = buildAnalysisSystemPrompt(config.taxonomy);

    const analyze = async (transcript: string): Promise<MeetingInsight> => {
        if (transcript.trim() === '') {
            logger.warn('Transcript is empty, skipping analysis');
            return createEmptyInsight();
        }

        logger.info('Starting analysis...');
        try {
            const response = await config.reasoning.complete({
                messages: [
                    { role: 'system', content: systemPrompt },
                    { role: 'user', content: buildAnalysisUserPrompt(transcript) },
                ],
                json: true,
                temperature: config.temperature,
                maxTokens: config.maxTokens,
            });

            const insight = parseInsightResponse(response.content, config.taxonomy);
            for (const { category, item } of misplacedItems(insight, config.taxonomy)) {
                logger.warn('"%s" is tagged "%s", which is not a %s tag', item.point, item.subcategory, category);
            }
            logger.info('Analysis complete: %d insight(s) extracted', countItems(insight));
            return insight;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            if (config.failureMode === 'strict') {
                throw new ExtractionError(`Transcript analysis failed: ${message}`, { cause: error });
            }
            logger.error('Transcript analysis failed: %s', message);
            return createEmptyInsight();
        }
    };

    return { analyze };
};
