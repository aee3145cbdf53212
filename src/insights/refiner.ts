/**
 * Insight Refiner
 *
 * Asks the model for a replacement MeetingInsight that addresses free-text
 * feedback. The reply replaces the previous result wholesale; there is no
 * merge. Failures are thrown so the caller can keep what it already has.
 */

import * as Reasoning from '../reasoning';
import * as Logging from '../logging';
import type { MeetingInsight } from './types';
import type { Taxonomy } from './taxonomy';
import { parseInsightResponse } from './parse';
import { buildRefinementSystemPrompt, buildRefinementUserPrompt } from './prompts';

export interface RefinerConfig {
    reasoning: Reasoning.ReasoningInstance;
    taxonomy: Taxonomy;
    temperature?: number;
    maxTokens?: number;
}

export interface RefinerInstance {
    improve(previous: MeetingInsight, feedback: string, transcript: string): Promise<MeetingInsight>;
}

export class RefinementError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RefinementError';
    }
}

export const create = (config: RefinerConfig): RefinerInstance => {
    const logger = Logging.getLogger();
    const systemPrompt = buildRefinementSystemPrompt(config.taxonomy);

    const improve = async (
        previous: MeetingInsight,
        feedback: string,
        transcript: string,
    ): Promise<MeetingInsight> => {
        if (feedback.trim() === '') {
            throw new RefinementError('Feedback is empty; nothing to refine');
        }

        logger.info('Improving insights based on feedback...');
        try {
            const response = await config.reasoning.complete({
                messages: [
                    { role: 'system', content: systemPrompt },
                    { role: 'user', content: buildRefinementUserPrompt(previous, feedback.trim(), transcript) },
                ],
                json: true,
                temperature: config.temperature,
                maxTokens: config.maxTokens,
            });
            const improved = parseInsightResponse(response.content, config.taxonomy);
            logger.info('Improvement complete.');
            return improved;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error('Refinement failed: %s', message);
            throw new RefinementError(`Refinement failed: ${message}`, { cause: error });
        }
    };

    return { improve };
};
