import { describe, it, expect } from 'vitest';
import {
    TaxonomySchema,
    acceptedTags,
    createEmptyInsight,
    defaultTag,
    getBuiltinTaxonomy,
    misplacedItems,
} from '../../src/insights';
import type { MeetingInsight } from '../../src/insights';

describe('Taxonomy', () => {
    describe('getBuiltinTaxonomy', () => {
        it('should load the standard profile', () => {
            const taxonomy = getBuiltinTaxonomy('standard');

            expect(taxonomy.tasks.tags).toEqual(['assigned', 'proposed', 'blocked', 'completed']);
            expect(taxonomy.tasks.default).toBe('proposed');
            expect(taxonomy.decisions.default).toBe('confirmed');
            expect(taxonomy.risks.tags).toContain('resource');
        });

        it('should load the classic profile with its own defaults', () => {
            const taxonomy = getBuiltinTaxonomy('classic');

            expect(taxonomy.decisions.default).toBe('approved');
            expect(taxonomy.tasks.tags).toContain('confirmed');
            expect(taxonomy.risks.tags).not.toContain('resource');
        });
    });

    describe('TaxonomySchema', () => {
        it('should reject a default that is not among the tags', () => {
            const taxonomy = getBuiltinTaxonomy('standard');
            const result = TaxonomySchema.safeParse({
                ...taxonomy,
                risks: { tags: ['technical'], default: 'budget' },
            });

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.issues[0].path).toEqual(['risks', 'default']);
            }
        });

        it('should reject a taxonomy missing a category', () => {
            const { risks: _risks, ...rest } = getBuiltinTaxonomy('standard');
            expect(TaxonomySchema.safeParse(rest).success).toBe(false);
        });
    });

    describe('acceptedTags', () => {
        it('should list every tag once in first-seen order', () => {
            const tags = acceptedTags(getBuiltinTaxonomy('standard'));

            expect(tags.slice(0, 4)).toEqual(['assigned', 'proposed', 'blocked', 'completed']);
            expect(tags).toContain('decisions');
            expect(new Set(tags).size).toBe(tags.length);
        });
    });

    describe('defaultTag', () => {
        it('should return the default for a category', () => {
            expect(defaultTag(getBuiltinTaxonomy('standard'), 'follow_ups')).toBe('meetings');
        });
    });

    describe('misplacedItems', () => {
        it('should report items whose tag belongs to another category', () => {
            const insight: MeetingInsight = {
                ...createEmptyInsight(),
                tasks: [
                    { point: 'ok', quote: 'q', speaker: 's', subcategory: 'assigned' },
                    { point: 'odd', quote: 'q', speaker: 's', subcategory: 'technical' },
                ],
            };

            const misplaced = misplacedItems(insight, getBuiltinTaxonomy('standard'));

            expect(misplaced).toHaveLength(1);
            expect(misplaced[0].category).toBe('tasks');
            expect(misplaced[0].item.point).toBe('odd');
        });
    });
});
