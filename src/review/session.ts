/**
 * Review Session
 *
 * Drives the approve / feedback / manual-entry loop for one analyzed
 * transcript. Refinement is best-effort: when it fails, the insight the
 * person was looking at is kept as-is.
 */

import { isEmptyInsight, toMarkdown } from '../insights';
import type { MeetingInsight, Refiner, Taxonomy } from '../insights';
import type { Prompter } from '../interactive';
import type { StageWriter } from '../output';
import * as Logging from '../logging';
import { STAGES } from '../constants';
import { collectManualInsight } from './manual';
import type { ReviewResult, ReviewState } from './types';

export interface SessionConfig {
    refiner: Refiner.RefinerInstance;
    output: StageWriter;
    prompter: Prompter;
    taxonomy: Taxonomy;
    maxReviewRounds: number;
}

export interface SessionInstance {
    run(insight: MeetingInsight, transcript: string): Promise<ReviewResult>;
}

export const isAffirmative = (answer: string): boolean => {
    const normalized = answer.trim().toLowerCase();
    return normalized === 'y' || normalized === 'yes';
};

export const iterationStage = (round: number): string =>
    round <= 1 ? STAGES.iteration : `${STAGES.iteration}_${round}`;

export const create = (config: SessionConfig): SessionInstance => {
    const logger = Logging.getLogger();
    const { prompter } = config;

    const banner = (title: string) => {
        prompter.print('\n' + '─'.repeat(60));
        prompter.print(`[${title}]`);
        prompter.print('─'.repeat(60));
    };

    const askFeedback = async (): Promise<string> => {
        prompter.print('Please provide feedback for improvement:');
        return prompter.ask('> ');
    };

    const iterate = async (
        current: MeetingInsight,
        feedback: string,
        transcript: string,
        round: number,
    ): Promise<{ insight: MeetingInsight; refined: boolean }> => {
        banner('Iteration Based on Feedback');
        try {
            const improved = await config.refiner.improve(current, feedback, transcript);
            const savedTo = await config.output.saveStage(iterationStage(round), toMarkdown(improved));
            prompter.print(`✓ Iteration saved to: ${savedTo}`);
            return { insight: improved, refined: true };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.debug('Keeping previous insights after failed iteration', { round });
            prompter.print(`Error during iteration: ${message}`);
            return { insight: current, refined: false };
        }
    };

    const run = async (insight: MeetingInsight, transcript: string): Promise<ReviewResult> => {
        const states: ReviewState[] = ['ANALYZED'];
        let current = insight;
        let rounds = 0;
        let refinements = 0;

        const finish = (state: ReviewState, outcome: ReviewResult['outcome'], result: MeetingInsight): ReviewResult => {
            states.push(state);
            logger.debug('Review finished: %s', outcome);
            return { insight: result, outcome, rounds, refinements, states };
        };

        for (;;) {
            banner('Human Review');
            prompter.print('\nCurrent Insights:');
            prompter.print(JSON.stringify(current, null, 2));

            let feedback: string;
            if (isEmptyInsight(current)) {
                states.push('EMPTY');
                prompter.print('\nNo insights extracted. Options:');
                prompter.print('1. Provide feedback for another attempt');
                prompter.print('2. Enter insights manually');
                prompter.print('3. Accept empty insights');

                const choice = await prompter.ask('\nEnter choice (1-3): ');
                if (choice === '2') {
                    const manual = await collectManualInsight(prompter, config.taxonomy);
                    return finish('MANUAL', 'manual', manual);
                }
                if (choice !== '1') {
                    return finish('ACCEPT_EMPTY', 'accepted_empty', current);
                }
                feedback = await askFeedback();
            } else {
                states.push('REVIEW');
                const approval = await prompter.ask('\nApprove these insights? (y/n): ');
                if (isAffirmative(approval)) {
                    return finish('APPROVED', 'approved', current);
                }
                feedback = await askFeedback();
            }

            states.push('FEEDBACK');
            rounds++;
            const result = await iterate(current, feedback, transcript, rounds);
            current = result.insight;
            if (result.refined) {
                refinements++;
            }
            states.push('ANALYZED');

            if (rounds >= config.maxReviewRounds) {
                return {
                    insight: current,
                    outcome: result.refined ? 'refined' : 'refinement_failed',
                    rounds,
                    refinements,
                    states,
                };
            }
        }
    };

    return { run };
};
