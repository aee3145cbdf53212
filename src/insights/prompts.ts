/**
 * Prompt templates for insight extraction and refinement.
 */

import { CATEGORIES, CATEGORY_DESCRIPTIONS } from './types';
import type { MeetingInsight } from './types';
import type { Taxonomy } from './taxonomy';

const heading = (category: string): string => category.replace('_', '-').toUpperCase();

const responseShape = (taxonomy: Taxonomy): string => {
    const lines = CATEGORIES.map(category =>
        `    "${category}": [{"point": "", "quote": "", "speaker": "", "subcategory": "${taxonomy[category].default}"}]`,
    );
    return `{\n${lines.join(',\n')}\n}`;
};

export const buildAnalysisSystemPrompt = (taxonomy: Taxonomy): string => {
    const categoryLines = CATEGORIES.map(category =>
        `${heading(category)}: ${CATEGORY_DESCRIPTIONS[category]}. Subcategories: ${taxonomy[category].tags.join(', ')}.`,
    );

    return [
        'You are an expert at analyzing meeting transcripts.',
        'The transcript may contain timestamps and speaker labels such as "Speaker 1".',
        'Extract all relevant information according to the categories:',
        '',
        ...categoryLines,
        '',
        'Rules:',
        '1. Use exact quotes from the transcript.',
        '2. Use actual names/roles if mentioned; otherwise use the speaker label as written.',
        '3. Provide a clear one-line summary for each point.',
        '4. Pick each subcategory from the list for its own category.',
        '',
        'Respond with a single JSON object in this shape:',
        responseShape(taxonomy),
    ].join('\n');
};

export const buildAnalysisUserPrompt = (transcript: string): string =>
    `Analyze the following meeting transcript:\n\n${transcript}`;

export const buildRefinementSystemPrompt = (taxonomy: Taxonomy): string => [
    'You are an expert at improving meeting analysis.',
    'Based on the previous analysis and the given feedback, do the following:',
    '1. Keep good existing insights.',
    '2. Add missing information if available.',
    '3. Use exact quotes from the transcript.',
    '4. Use actual names and roles when mentioned.',
    '5. Correct any misclassifications.',
    '6. Follow the same categories and format as before.',
    '',
    'Respond with the complete improved analysis as a single JSON object in this shape:',
    responseShape(taxonomy),
].join('\n');

export const buildRefinementUserPrompt = (
    previous: MeetingInsight,
    feedback: string,
    transcript: string,
): string => [
    `Previous insights:\n${JSON.stringify(previous, null, 2)}`,
    `Feedback:\n${feedback}`,
    `Original transcript:\n${transcript}`,
    'Please improve the analysis based on the feedback.',
].join('\n\n');
