/**
 * Human Review System
 */

export * as Session from './session';
export { collectManualInsight } from './manual';

// Re-export types
export * from './types';
