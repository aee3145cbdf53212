/**
 * Output Manager
 *
 * Maps a transcript run to output/<transcript>/<YYYYMMDD_HHMMSS>/ and writes
 * one markdown file per stage into it. The timestamp is fixed when the
 * manager is created so every stage of a run lands in the same directory.
 */

import * as path from 'node:path';
import * as fs from 'fs/promises';
import type { OutputConfig, StageWriter } from './types';
import * as Logging from '../logging';

export type ManagerInstance = StageWriter;

export const formatRunTimestamp = (date: Date): string => {
    const pad = (n: number) => n.toString().padStart(2, '0');
    const datePart = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const timePart = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${datePart}_${timePart}`;
};

export const create = (config: OutputConfig): ManagerInstance => {
    const logger = Logging.getLogger();
    const runDirectory = path.join(
        config.outputDirectory,
        config.transcriptName,
        formatRunTimestamp(config.now ?? new Date()),
    );

    const saveStage = async (stage: string, content: string): Promise<string> => {
        await fs.mkdir(runDirectory, { recursive: true });
        const filePath = path.join(runDirectory, `${stage}.md`);
        await fs.writeFile(filePath, content, 'utf-8');
        logger.debug('Wrote stage file', { stage, path: filePath });
        return filePath;
    };

    return {
        runDirectory,
        saveStage,
    };
};
