import { describe, it, expect } from 'vitest';
import { toMarkdown, createEmptyInsight, EMPTY_SECTION_TEXT } from '../../src/insights';
import type { MeetingInsight } from '../../src/insights';

describe('toMarkdown', () => {
    it('should render every category as empty for an empty insight', () => {
        const markdown = toMarkdown(createEmptyInsight());

        expect(markdown.startsWith('# Meeting Analysis Results\n\n## Tasks\nNo items found.\n')).toBe(true);
        expect(markdown.match(/No items found\./g)).toHaveLength(7);
        expect(markdown.endsWith('## Risks\nNo items found.\n\n')).toBe(true);
    });

    it('should render sections in category order', () => {
        const markdown = toMarkdown(createEmptyInsight());
        const headings = markdown.split('\n').filter(line => line.startsWith('## '));

        expect(headings).toEqual([
            '## Tasks',
            '## Decisions',
            '## Questions',
            '## Attendees',
            '## Deadlines',
            '## Follow-ups',
            '## Risks',
        ]);
    });

    it('should render each item with its point, quote, speaker and category', () => {
        const insight: MeetingInsight = {
            ...createEmptyInsight(),
            tasks: [{
                point: 'Finish the API',
                quote: 'I will finish the API by Friday.',
                speaker: 'Alice',
                subcategory: 'assigned',
            }],
        };

        const markdown = toMarkdown(insight);

        expect(markdown).toContain([
            '## Tasks',
            '- **Finish the API**',
            '  - Quote: "I will finish the API by Friday."',
            '  - Speaker: Alice',
            '  - Category: assigned',
            '',
            '',
            '## Decisions',
        ].join('\n'));
        expect(markdown.match(new RegExp(EMPTY_SECTION_TEXT.replace('.', '\\.'), 'g'))).toHaveLength(6);
    });

    it('should keep multiple items in their original order', () => {
        const insight: MeetingInsight = {
            ...createEmptyInsight(),
            risks: [
                { point: 'First', quote: 'a', speaker: 'Bo', subcategory: 'technical' },
                { point: 'Second', quote: 'b', speaker: 'Cy', subcategory: 'timeline' },
            ],
        };

        const markdown = toMarkdown(insight);

        expect(markdown.indexOf('- **First**')).toBeLessThan(markdown.indexOf('- **Second**'));
    });
});
