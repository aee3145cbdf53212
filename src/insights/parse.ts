/**
 * Insight Response Parsing
 *
 * Turns the model's JSON reply into a MeetingInsight. Validation runs once
 * as-is; if that fails the reply is repaired (default sub-tags, empty
 * categories) and validated one more time before giving up.
 */

import { z } from 'zod';
import { CATEGORIES, InsightItemSchema } from './types';
import type { MeetingInsight } from './types';
import { acceptedTags, defaultTag } from './taxonomy';
import type { Taxonomy } from './taxonomy';
import { UNKNOWN_SPEAKER } from '../constants';
import * as Logging from '../logging';

export class ResponseParseError extends Error {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ResponseParseError';
        this.issues = issues;
    }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    value !== null && typeof value === 'object' && !Array.isArray(value);

export const createInsightSchema = (taxonomy: Taxonomy) => {
    const tags = acceptedTags(taxonomy);
    const item = InsightItemSchema.extend({
        subcategory: z.string().refine(tag => tags.includes(tag), tag => ({
            message: `"${tag}" is not one of: ${tags.join(', ')}`,
        })),
    });
    const list = () => z.array(item).default([]);

    return z.object({
        tasks: list(),
        decisions: list(),
        questions: list(),
        attendees: list(),
        deadlines: list(),
        follow_ups: list(),
        risks: list(),
    });
};

const formatIssues = (error: z.ZodError): string[] =>
    error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);

/**
 * Fill in what the model commonly leaves out. Returns a new object; the input
 * is not touched.
 */
export const repairInsightPayload = (payload: Record<string, unknown>, taxonomy: Taxonomy): Record<string, unknown> => {
    const repaired: Record<string, unknown> = { ...payload };

    for (const category of CATEGORIES) {
        const value = payload[category];
        if (!Array.isArray(value)) {
            repaired[category] = [];
            continue;
        }
        repaired[category] = value.map((entry: unknown) => {
            if (!isRecord(entry)) {
                return entry;
            }
            const fixed: Record<string, unknown> = { ...entry };
            if (typeof fixed.subcategory !== 'string' || fixed.subcategory.trim() === '') {
                fixed.subcategory = defaultTag(taxonomy, category);
            }
            if (typeof fixed.speaker !== 'string' || fixed.speaker.trim() === '') {
                fixed.speaker = UNKNOWN_SPEAKER;
            }
            return fixed;
        });
    }

    return repaired;
};

export const toInsight = (payload: unknown, taxonomy: Taxonomy): MeetingInsight => {
    const logger = Logging.getLogger();

    if (!isRecord(payload)) {
        throw new ResponseParseError('Model response is not a JSON object');
    }

    const schema = createInsightSchema(taxonomy);
    const first = schema.safeParse(payload);
    if (first.success) {
        return first.data;
    }

    logger.debug('Insight response failed validation, repairing: %s', formatIssues(first.error).join('; '));

    const second = schema.safeParse(repairInsightPayload(payload, taxonomy));
    if (second.success) {
        return second.data;
    }

    throw new ResponseParseError('Model response does not match the insight schema', formatIssues(second.error));
};

export const parseInsightResponse = (raw: string, taxonomy: Taxonomy): MeetingInsight => {
    let payload: unknown;
    try {
        payload = JSON.parse(raw);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ResponseParseError(`Model response is not valid JSON (${reason})`);
    }
    return toInsight(payload, taxonomy);
};
