import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

const { mockChatCompletionsCreate, mockConstructor } = vi.hoisted(() => ({
    mockChatCompletionsCreate: vi.fn(),
    mockConstructor: vi.fn(),
}));

vi.mock('openai', () => ({
    default: class MockOpenAI {
        chat = { completions: { create: mockChatCompletionsCreate } };

        constructor(options: unknown) {
            mockConstructor(options);
        }
    },
}));

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        verbose: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
    setLogLevel: vi.fn(),
}));

import { runAnalyze, selectTranscript } from '../../src/cli/analyze';
import { createScriptedPrompter } from '../fakes';

const analysisReply = {
    model: 'qwen2.5:32b',
    choices: [{
        message: {
            content: JSON.stringify({
                tasks: [{
                    point: 'Alice will send the notes',
                    quote: 'I will send the notes.',
                    speaker: 'Alice',
                    subcategory: 'assigned',
                }],
            }),
        },
        finish_reason: 'stop',
    }],
};

const files = ['/t/kickoff.md', '/t/retro.md', '/t/standup.md'];

describe('analyze command', () => {
    describe('selectTranscript', () => {
        it('should list the files and return the chosen one', async () => {
            const prompter = createScriptedPrompter(['2']);

            expect(await selectTranscript(files, prompter)).toBe('/t/retro.md');
            expect(prompter.printed).toEqual([
                '\nAvailable transcripts:',
                '  1. kickoff.md',
                '  2. retro.md',
                '  3. standup.md',
            ]);
        });

        it('should ask again on a non-number or an out-of-range value', async () => {
            const prompter = createScriptedPrompter(['abc', '0', '4', '3']);

            expect(await selectTranscript(files, prompter)).toBe('/t/standup.md');
            expect(prompter.questions).toHaveLength(4);
            expect(prompter.printed.filter(line => line === 'Please enter a number between 1 and 3.')).toHaveLength(3);
        });

        it('should return null on q', async () => {
            const prompter = createScriptedPrompter(['q']);
            expect(await selectTranscript(files, prompter)).toBeNull();
        });
    });

    describe('runAnalyze', () => {
        let tempDir: string;

        beforeEach(async () => {
            vi.clearAllMocks();
            vi.stubEnv('OPENAI_API_KEY', '');
            vi.stubEnv('OPENAI_BASE_URL', '');
            mockChatCompletionsCreate.mockResolvedValue(analysisReply);
            tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'meeting-insights-cli-test-'));
        });

        afterEach(async () => {
            vi.unstubAllEnvs();
            await fs.rm(tempDir, { recursive: true });
        });

        const writeTranscripts = async (names: string[]): Promise<string> => {
            const inputDirectory = path.join(tempDir, 'transcripts');
            await fs.mkdir(inputDirectory);
            for (const name of names) {
                await fs.writeFile(path.join(inputDirectory, name), 'Alice: I will send the notes.\n');
            }
            return inputDirectory;
        };

        const runDirectoryOf = (outputDirectory: string, artifact: string): string =>
            path.relative(outputDirectory, artifact).split(path.sep)[0];

        it('should take the first transcript with --first and never show the menu', async () => {
            const inputDirectory = await writeTranscripts(['b.md', 'a.md']);
            const outputDirectory = path.join(tempDir, 'output');
            const prompter = createScriptedPrompter([]);

            const result = await runAnalyze(undefined, {
                configDirectory: path.join(tempDir, 'config'),
                inputDirectory,
                outputDirectory,
                first: true,
                auto: true,
            }, prompter);

            expect(prompter.questions).toEqual([]);
            expect(prompter.printed).toEqual([]);
            expect(result?.outcome).toBe('auto');
            expect(result?.insight.tasks).toHaveLength(1);
            expect(result?.artifacts).toHaveLength(2);
            expect(result?.artifacts.map(artifact => runDirectoryOf(outputDirectory, artifact))).toEqual(['a', 'a']);
            expect(mockChatCompletionsCreate).toHaveBeenCalledTimes(1);
            expect(mockChatCompletionsCreate.mock.calls[0][0].model).toBe('qwen2.5:32b');
            expect(mockConstructor).toHaveBeenCalledWith({ apiKey: 'ollama', baseURL: 'http://localhost:11434/v1' });
            expect(prompter.closed).toBe(true);
        });

        it('should take a lone transcript without the menu', async () => {
            const inputDirectory = await writeTranscripts(['retro.md']);
            const outputDirectory = path.join(tempDir, 'output');
            const prompter = createScriptedPrompter([]);

            const result = await runAnalyze(undefined, {
                configDirectory: path.join(tempDir, 'config'),
                inputDirectory,
                outputDirectory,
                auto: true,
            }, prompter);

            expect(prompter.questions).toEqual([]);
            expect(result?.outcome).toBe('auto');
            expect(result?.artifacts.map(artifact => runDirectoryOf(outputDirectory, artifact))).toEqual(['retro', 'retro']);
        });

        it('should stop quietly when there are no transcripts', async () => {
            const prompter = createScriptedPrompter([]);
            const inputDirectory = path.join(tempDir, 'transcripts');

            const result = await runAnalyze(undefined, {
                configDirectory: path.join(tempDir, 'config'),
                inputDirectory,
            }, prompter);

            expect(result).toBeNull();
            expect(prompter.closed).toBe(true);
            expect((await fs.stat(inputDirectory)).isDirectory()).toBe(true);
        });

        it('should stop when the person quits the menu', async () => {
            const inputDirectory = path.join(tempDir, 'transcripts');
            await fs.mkdir(inputDirectory);
            await fs.writeFile(path.join(inputDirectory, 'a.md'), 'Alice: hi');
            await fs.writeFile(path.join(inputDirectory, 'b.md'), 'Bob: hi');
            const prompter = createScriptedPrompter(['q']);

            const result = await runAnalyze(undefined, {
                configDirectory: path.join(tempDir, 'config'),
                inputDirectory,
            }, prompter);

            expect(result).toBeNull();
            expect(prompter.closed).toBe(true);
        });

        it('should fail for a transcript path that does not exist', async () => {
            const prompter = createScriptedPrompter([]);

            await expect(runAnalyze(path.join(tempDir, 'missing.md'), {
                configDirectory: path.join(tempDir, 'config'),
            }, prompter)).rejects.toThrow(`Transcript not found: ${path.join(tempDir, 'missing.md')}`);
            expect(prompter.closed).toBe(true);
        });
    });
});
