import { describe, it, expect } from 'vitest';
import { collectManualInsight } from '../../src/review';
import { getBuiltinTaxonomy } from '../../src/insights';
import { createScriptedPrompter } from '../fakes';

describe('collectManualInsight', () => {
    it('should turn N lines into N items for the category', async () => {
        const prompter = createScriptedPrompter([
            // tasks
            'Write release notes', 'Book the room', '',
            // decisions
            'Ship on Monday', '',
            // questions, attendees, deadlines, follow-ups, risks
            '', '', '', '', '',
        ]);

        const insight = await collectManualInsight(prompter, getBuiltinTaxonomy('standard'));

        expect(insight.tasks).toEqual([
            { point: 'Write release notes', quote: 'Manually entered', speaker: 'Manual Entry', subcategory: 'proposed' },
            { point: 'Book the room', quote: 'Manually entered', speaker: 'Manual Entry', subcategory: 'proposed' },
        ]);
        expect(insight.decisions).toEqual([
            { point: 'Ship on Monday', quote: 'Manually entered', speaker: 'Manual Entry', subcategory: 'confirmed' },
        ]);
        expect(insight.questions).toEqual([]);
        expect(insight.risks).toEqual([]);
    });

    it('should prompt for every category in order', async () => {
        const prompter = createScriptedPrompter(['', '', '', '', '', '', '']);

        await collectManualInsight(prompter, getBuiltinTaxonomy('classic'));

        const headings = prompter.printed.filter(line => line.startsWith('\nEnter '));
        expect(headings).toEqual([
            '\nEnter Tasks (press Enter on an empty line to skip):',
            '\nEnter Decisions (press Enter on an empty line to skip):',
            '\nEnter Questions (press Enter on an empty line to skip):',
            '\nEnter Attendees (press Enter on an empty line to skip):',
            '\nEnter Deadlines (press Enter on an empty line to skip):',
            '\nEnter Follow-ups (press Enter on an empty line to skip):',
            '\nEnter Risks (press Enter on an empty line to skip):',
        ]);
        expect(prompter.questions).toHaveLength(7);
    });
});
