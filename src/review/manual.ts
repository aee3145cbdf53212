import { CATEGORIES, CATEGORY_TITLES, defaultTag } from '../insights';
import type { Category, InsightItem, MeetingInsight, Taxonomy } from '../insights';
import type { Prompter } from '../interactive';
import { MANUAL_QUOTE, MANUAL_SPEAKER } from '../constants';

/**
 * Collect insights by hand, one category at a time. Each non-empty line
 * becomes an item; an empty line moves on to the next category.
 */
export const collectManualInsight = async (prompter: Prompter, taxonomy: Taxonomy): Promise<MeetingInsight> => {
    prompter.print('Enter insights manually (one per line, empty line to move to next category):');

    const collected: Record<Category, InsightItem[]> = {
        tasks: [],
        decisions: [],
        questions: [],
        attendees: [],
        deadlines: [],
        follow_ups: [],
        risks: [],
    };

    for (const category of CATEGORIES) {
        prompter.print(`\nEnter ${CATEGORY_TITLES[category]} (press Enter on an empty line to skip):`);
        for (;;) {
            const line = await prompter.ask('');
            if (!line) {
                break;
            }
            collected[category].push({
                point: line,
                quote: MANUAL_QUOTE,
                speaker: MANUAL_SPEAKER,
                subcategory: defaultTag(taxonomy, category),
            });
        }
    }

    return collected;
};
