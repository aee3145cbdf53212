/**
 * Insight System
 *
 * Extraction, refinement, validation and rendering of categorized meeting
 * insights.
 */

export * from './types';
export * from './taxonomy';
export { toMarkdown, EMPTY_SECTION_TEXT } from './markdown';
export { parseInsightResponse, toInsight, repairInsightPayload, ResponseParseError } from './parse';
export * as Extractor from './extractor';
export * as Refiner from './refiner';
