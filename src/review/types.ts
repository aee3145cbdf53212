/**
 * Review Types
 *
 * States of the human review loop that sits between analysis and the final
 * artifact:
 *
 *   ANALYZED -> EMPTY | REVIEW
 *   REVIEW   -> APPROVED | FEEDBACK
 *   EMPTY    -> FEEDBACK | MANUAL | ACCEPT_EMPTY
 *   FEEDBACK -> ANALYZED (via the refiner)
 */

import type { MeetingInsight } from '../insights';

export type ReviewState =
    | 'ANALYZED'
    | 'EMPTY'
    | 'REVIEW'
    | 'FEEDBACK'
    | 'APPROVED'
    | 'MANUAL'
    | 'ACCEPT_EMPTY';

export type ReviewOutcome =
    | 'approved'
    | 'accepted_empty'
    | 'manual'
    | 'refined'
    | 'refinement_failed';

export interface ReviewResult {
    insight: MeetingInsight;
    outcome: ReviewOutcome;
    /** Feedback rounds taken, successful or not */
    rounds: number;
    /** Rounds whose refinement replaced the insight */
    refinements: number;
    /** Every state visited, in order */
    states: ReviewState[];
}
