/**
 * Output Management System
 *
 * Stage artifacts for transcript analysis runs.
 */

import type { OutputConfig } from './types';
import * as Manager from './manager';

export type OutputInstance = Manager.ManagerInstance;

export const create = (config: OutputConfig): OutputInstance => Manager.create(config);

export { formatRunTimestamp } from './manager';

// Re-export types
export * from './types';
