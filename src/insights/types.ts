/**
 * Insight Types
 *
 * The record shapes produced by analysis: a quote-backed InsightItem and the
 * seven-category MeetingInsight that groups them.
 */

import { z } from 'zod';

export const CATEGORIES = [
    'tasks',
    'decisions',
    'questions',
    'attendees',
    'deadlines',
    'follow_ups',
    'risks',
] as const;

export type Category = typeof CATEGORIES[number];

export const CATEGORY_TITLES: Record<Category, string> = {
    tasks: 'Tasks',
    decisions: 'Decisions',
    questions: 'Questions',
    attendees: 'Attendees',
    deadlines: 'Deadlines',
    follow_ups: 'Follow-ups',
    risks: 'Risks',
};

export const CATEGORY_DESCRIPTIONS: Record<Category, string> = {
    tasks: 'Action items and work to be done',
    decisions: 'Decisions and agreements reached',
    questions: 'Questions raised or concerns expressed',
    attendees: 'Mentioned participants, roles or teams',
    deadlines: 'Stated time constraints or due dates',
    follow_ups: 'Items requiring further action',
    risks: 'Identified risks and concerns',
};

/**
 * Schema for a single extracted insight. The subcategory is checked against
 * a taxonomy separately, see parse.ts.
 */
export const InsightItemSchema = z.object({
    point: z.string().describe('One-line summary of the insight'),
    quote: z.string().describe('Exact supporting quote from the transcript'),
    speaker: z.string().min(1).describe('Speaker identifier or name'),
    subcategory: z.string().min(1).describe('Subcategory of the insight'),
});

export type InsightItem = Readonly<z.infer<typeof InsightItemSchema>>;

export type MeetingInsight = {
    readonly [K in Category]: readonly InsightItem[];
};

export const createEmptyInsight = (): MeetingInsight => ({
    tasks: [],
    decisions: [],
    questions: [],
    attendees: [],
    deadlines: [],
    follow_ups: [],
    risks: [],
});

export const isEmptyInsight = (insight: MeetingInsight): boolean =>
    CATEGORIES.every(category => insight[category].length === 0);

export const countItems = (insight: MeetingInsight): number =>
    CATEGORIES.reduce((total, category) => total + insight[category].length, 0);
