/**
 * Transcript Access
 */

export * from './reader';
