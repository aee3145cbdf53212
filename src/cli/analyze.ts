/**
 * Analyze Command
 *
 * Picks a transcript (argument, --first, or an interactive menu), runs the
 * analysis pipeline on it and hands the result to the review session.
 */

import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'node:path';
import { configure, resolveTaxonomy } from '../arguments';
import type { Args } from '../arguments';
import * as Reasoning from '../reasoning';
import { Extractor, Refiner } from '../insights';
import { ReadlinePrompter } from '../interactive';
import type { Prompter } from '../interactive';
import * as Processor from '../processor';
import type { ProcessResult } from '../processor';
import * as Transcript from '../transcript';
import { getLogger } from '../logging';

/**
 * Numbered menu of transcripts. Returns null when the person quits.
 */
export const selectTranscript = async (files: string[], prompter: Prompter): Promise<string | null> => {
    prompter.print('\nAvailable transcripts:');
    files.forEach((file, index) => {
        prompter.print(`  ${index + 1}. ${path.basename(file)}`);
    });

    for (;;) {
        const answer = await prompter.ask("\nEnter transcript number to analyze (or 'q' to quit): ");
        if (answer.toLowerCase() === 'q') {
            return null;
        }
        const choice = Number(answer);
        if (Number.isInteger(choice) && choice >= 1 && choice <= files.length) {
            return files[choice - 1];
        }
        prompter.print(`Please enter a number between 1 and ${files.length}.`);
    }
};

const resolveTranscript = async (
    transcriptArg: string | undefined,
    inputDirectory: string,
    first: boolean,
    prompter: Prompter,
): Promise<string | null> => {
    const logger = getLogger();

    if (transcriptArg) {
        const transcriptPath = path.resolve(transcriptArg);
        try {
            await fs.access(transcriptPath);
        } catch (error) {
            throw new Error(`Transcript not found: ${transcriptArg}`, { cause: error });
        }
        return transcriptPath;
    }

    const files = await Transcript.listTranscripts(inputDirectory);
    if (files.length === 0) {
        logger.info('No transcripts found in %s. Add .md transcript files there and run again.', inputDirectory);
        return null;
    }
    if (first || files.length === 1) {
        return files[0];
    }
    return selectTranscript(files, prompter);
};

export const runAnalyze = async (
    transcriptArg: string | undefined,
    args: Args,
    prompter: Prompter = ReadlinePrompter.create(),
): Promise<ProcessResult | null> => {
    try {
        const [config, secureConfig] = await configure(args);
        // Fetched after configure, which may have changed the level
        const logger = getLogger();
        const taxonomy = resolveTaxonomy(config);

        const transcriptPath = await resolveTranscript(transcriptArg, config.inputDirectory, args.first ?? false, prompter);
        if (!transcriptPath) {
            return null;
        }
        logger.info('Analyzing %s', path.basename(transcriptPath));

        const reasoning = Reasoning.create({
            model: config.model,
            baseUrl: config.baseUrl,
            apiKey: secureConfig.openaiApiKey,
            temperature: config.temperature,
            maxTokens: config.maxTokens,
        });

        const processor = Processor.create({
            extractor: Extractor.create({ reasoning, taxonomy, failureMode: config.failureMode }),
            refiner: Refiner.create({ reasoning, taxonomy }),
            taxonomy,
            prompter,
            outputDirectory: config.outputDirectory,
            auto: config.auto,
            maxReviewRounds: config.maxReviewRounds,
            normalizeTranscript: config.normalizeTranscript,
        });

        const result = await processor.process(transcriptPath);
        logger.verbose('Run finished with outcome %s, %d file(s) written', result.outcome, result.artifacts.length);
        return result;
    } finally {
        prompter.close();
    }
};

export const registerAnalyzeCommand = (program: Command): void => {
    program
        .command('analyze [transcript]')
        .description('Extract categorized insights from a meeting transcript and review them')
        .option('--input-directory <inputDirectory>', 'directory to look for .md transcripts in')
        .option('--output-directory <outputDirectory>', 'directory to write analysis runs to')
        .option('--auto', 'skip the review session')
        .option('--first', 'take the first transcript without asking')
        .option('--failure-mode <failureMode>', 'strict or lenient handling of analysis failures')
        .option('--taxonomy <taxonomy>', 'sub-tag profile: standard or classic')
        .option('--max-review-rounds <maxReviewRounds>', 'number of feedback rounds before the session ends')
        .option('--normalize', 'collapse whitespace and drop timestamp-only lines before analysis')
        .action(async (transcript: string | undefined, _options: Args, command: Command) => {
            await runAnalyze(transcript, command.optsWithGlobals<Args>());
        });
};
