import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import * as Transcript from '../../src/transcript';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('Transcript reader', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'meeting-insights-transcript-test-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true });
    });

    describe('listTranscripts', () => {
        it('should list only .md files sorted by name', async () => {
            await fs.writeFile(path.join(tempDir, 'retro.md'), 'r');
            await fs.writeFile(path.join(tempDir, 'kickoff.md'), 'k');
            await fs.writeFile(path.join(tempDir, 'notes.txt'), 'n');
            await fs.mkdir(path.join(tempDir, 'archive.md'));

            const files = await Transcript.listTranscripts(tempDir);

            expect(files.map(file => path.basename(file))).toEqual(['kickoff.md', 'retro.md']);
            expect(files.every(file => path.isAbsolute(file))).toBe(true);
        });

        it('should create a missing input directory', async () => {
            const inputDir = path.join(tempDir, 'transcripts');

            const files = await Transcript.listTranscripts(inputDir);

            expect(files).toEqual([]);
            expect((await fs.stat(inputDir)).isDirectory()).toBe(true);
        });
    });

    describe('readTranscript', () => {
        it('should return the trimmed contents', async () => {
            const filePath = path.join(tempDir, 'standup.md');
            await fs.writeFile(filePath, '\n\nAlice: hello\n\n');

            expect(await Transcript.readTranscript(filePath)).toBe('Alice: hello');
        });
    });

    describe('transcriptName', () => {
        it('should drop the directory and extension', () => {
            expect(Transcript.transcriptName('/tmp/transcripts/weekly-sync.md')).toBe('weekly-sync');
        });
    });

    describe('normalizeTranscript', () => {
        it('should collapse whitespace and keep one speaker turn per line', () => {
            const text = 'Alice:   I will   finish\tthe API\n\n10:32\nBob: ok   then\r\n   \n3pm\n';

            expect(Transcript.normalizeTranscript(text)).toBe('Alice: I will finish the API\nBob: ok then');
        });

        it('should keep lines that only start with a time', () => {
            expect(Transcript.normalizeTranscript('10:32 Alice: hi')).toBe('10:32 Alice: hi');
        });
    });
});
