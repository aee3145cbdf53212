/**
 * Insight Taxonomy
 *
 * The closed set of sub-tags allowed for each category, plus the tag used
 * when the model leaves one out. Taxonomies are data: two profiles ship in
 * taxonomies.json and a config file may supply its own.
 */

import { z } from 'zod';
import builtinTaxonomies from './taxonomies.json';
import { CATEGORIES } from './types';
import type { Category, InsightItem, MeetingInsight } from './types';

export const CategoryTagsSchema = z.object({
    tags: z.array(z.string().min(1)).min(1),
    default: z.string().min(1),
}).refine(value => value.tags.includes(value.default), {
    message: 'default must be one of the listed tags',
    path: ['default'],
});

export const TaxonomySchema = z.object({
    tasks: CategoryTagsSchema,
    decisions: CategoryTagsSchema,
    questions: CategoryTagsSchema,
    attendees: CategoryTagsSchema,
    deadlines: CategoryTagsSchema,
    follow_ups: CategoryTagsSchema,
    risks: CategoryTagsSchema,
});

export type Taxonomy = z.infer<typeof TaxonomySchema>;

export const BUILTIN_TAXONOMY_NAMES = ['standard', 'classic'] as const;
export type BuiltinTaxonomyName = typeof BUILTIN_TAXONOMY_NAMES[number];

export const getBuiltinTaxonomy = (name: BuiltinTaxonomyName): Taxonomy =>
    TaxonomySchema.parse(builtinTaxonomies[name]);

/**
 * Every tag the taxonomy knows about, in first-seen order.
 */
export const acceptedTags = (taxonomy: Taxonomy): string[] => {
    const seen = new Set<string>();
    for (const category of CATEGORIES) {
        for (const tag of taxonomy[category].tags) {
            seen.add(tag);
        }
    }
    return [...seen];
};

export const defaultTag = (taxonomy: Taxonomy, category: Category): string =>
    taxonomy[category].default;

export interface MisplacedItem {
    category: Category;
    item: InsightItem;
}

/**
 * Items whose subcategory is valid somewhere in the taxonomy but not in the
 * category that holds them. Reported, never rejected.
 */
export const misplacedItems = (insight: MeetingInsight, taxonomy: Taxonomy): MisplacedItem[] =>
    CATEGORIES.flatMap(category =>
        insight[category]
            .filter(item => !taxonomy[category].tags.includes(item.subcategory))
            .map(item => ({ category, item })),
    );
