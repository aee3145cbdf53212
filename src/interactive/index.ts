/**
 * Interactive Mode System
 */

export * as ReadlinePrompter from './prompter';

// Re-export types
export * from './types';
