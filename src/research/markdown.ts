import * as path from 'node:path';
import * as fs from 'fs/promises';
import type { ResearchResult } from './types';
import { MAX_SLUG_LENGTH } from '../constants';
import * as Logging from '../logging';

export const toResearchMarkdown = (result: ResearchResult): string => [
    `# ${result.researchTitle}`,
    result.researchMain,
    '## Key Points',
    result.researchBullets,
].join('\n\n');

/**
 * File name stem for a research title: lowercased, spaces to underscores,
 * anything unsafe in a file name also to underscores, capped in length.
 */
export const slugifyTitle = (title: string): string => {
    const slug = title
        .toLowerCase()
        .replace(/ /g, '_')
        .replace(/[/\\:*?"<>|\u0000-\u001f]/g, '_')
        .slice(0, MAX_SLUG_LENGTH);
    return slug.replace(/^\.+/, '') || 'research';
};

export const saveResearch = async (directory: string, result: ResearchResult): Promise<string> => {
    const logger = Logging.getLogger();
    await fs.mkdir(directory, { recursive: true });
    const outputPath = path.join(directory, `${slugifyTitle(result.researchTitle)}.md`);
    await fs.writeFile(outputPath, toResearchMarkdown(result), 'utf-8');
    logger.debug('Wrote research result', { path: outputPath });
    return outputPath;
};
