import { CATEGORIES, CATEGORY_TITLES } from './types';
import type { MeetingInsight } from './types';

export const EMPTY_SECTION_TEXT = 'No items found.';

/**
 * Render insights as a human-readable report. This is a display format;
 * nothing reads it back.
 */
export const toMarkdown = (insight: MeetingInsight): string => {
    const lines: string[] = ['# Meeting Analysis Results\n'];

    for (const category of CATEGORIES) {
        const items = insight[category];
        lines.push(`## ${CATEGORY_TITLES[category]}`);
        if (items.length === 0) {
            lines.push(`${EMPTY_SECTION_TEXT}\n`);
        } else {
            for (const item of items) {
                lines.push(`- **${item.point}**`);
                lines.push(`  - Quote: "${item.quote}"`);
                lines.push(`  - Speaker: ${item.speaker}`);
                lines.push(`  - Category: ${item.subcategory}\n`);
            }
        }
        lines.push('');
    }

    return lines.join('\n');
};
