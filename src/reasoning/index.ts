/**
 * Reasoning System
 *
 * Entry point for talking to the completion backend. Callers build an
 * instance from explicit config and hand it to the components that need it.
 */

import type { ReasoningConfig } from './types';
import * as Client from './client';

export type ReasoningInstance = Client.ClientInstance;

export const create = (config: ReasoningConfig): ReasoningInstance => Client.create(config);

// Re-export types
export * from './types';
