/**
 * Transcript Reader
 *
 * Finds transcript files in the input directory and loads them as text.
 */

import * as path from 'node:path';
import * as fs from 'fs/promises';
import { glob } from 'glob';
import * as Logging from '../logging';
import { DEFAULT_CHARACTER_ENCODING, TRANSCRIPT_EXTENSION } from '../constants';

/**
 * List transcript files in a directory, sorted by name. The directory is
 * created if it does not exist yet.
 */
export const listTranscripts = async (directory: string): Promise<string[]> => {
    const logger = Logging.getLogger();
    await fs.mkdir(directory, { recursive: true });

    const files = await glob(`*${TRANSCRIPT_EXTENSION}`, {
        cwd: directory,
        nodir: true,
        absolute: true,
    });
    files.sort((a, b) => path.basename(a).localeCompare(path.basename(b)));

    logger.debug('Found %d transcript(s) in %s', files.length, directory);
    return files;
};

export const readTranscript = async (filePath: string): Promise<string> => {
    const content = await fs.readFile(filePath, DEFAULT_CHARACTER_ENCODING);
    return content.trim();
};

/**
 * The transcript name used for output directories: file name without extension.
 */
export const transcriptName = (filePath: string): string =>
    path.basename(filePath, path.extname(filePath));

// "10:32", "10:32:05", "10:32 AM", "3pm"
const TIMESTAMP_ONLY = /^(\d{1,2}:\d{2}(:\d{2})?\s*([ap]\.?m\.?)?|\d{1,2}\s*[ap]\.?m\.?)$/i;

/**
 * Collapse whitespace inside each line and drop blank and timestamp-only
 * lines. Speaker turns stay on their own lines.
 */
export const normalizeTranscript = (text: string): string =>
    text
        .split(/\r?\n/)
        .map(line => line.replace(/\s+/g, ' ').trim())
        .filter(line => line !== '' && !TIMESTAMP_ONLY.test(line))
        .join('\n');
