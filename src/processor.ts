import * as Logging from '@/logging';
import * as Output from '@/output';
import * as Review from '@/review';
import * as Transcript from '@/transcript';
import { createEmptyInsight, toMarkdown } from '@/insights';
import type { Extractor, MeetingInsight, Refiner, Taxonomy } from '@/insights';
import type { Prompter } from '@/interactive';
import { STAGES } from '@/constants';

export type ProcessOutcome = Review.ReviewOutcome | 'auto' | 'empty_transcript';

export interface ProcessResult {
    insight: MeetingInsight;
    outcome: ProcessOutcome;
    artifacts: string[];
}

export interface ProcessorConfig {
    extractor: Extractor.ExtractorInstance;
    refiner: Refiner.RefinerInstance;
    taxonomy: Taxonomy;
    prompter: Prompter;
    outputDirectory: string;
    auto: boolean;
    maxReviewRounds: number;
    normalizeTranscript: boolean;
    clock?: () => Date;
}

export interface Instance {
    process(transcriptPath: string): Promise<ProcessResult>;
}

export const create = (config: ProcessorConfig): Instance => {
    const logger = Logging.getLogger();
    const clock = config.clock ?? (() => new Date());

    const process = async (transcriptPath: string): Promise<ProcessResult> => {
        logger.verbose('Processing transcript %s', transcriptPath);

        const raw = await Transcript.readTranscript(transcriptPath);
        if (!raw) {
            logger.error('Error: Transcript is empty! (%s)', transcriptPath);
            return { insight: createEmptyInsight(), outcome: 'empty_transcript', artifacts: [] };
        }
        const transcript = config.normalizeTranscript ? Transcript.normalizeTranscript(raw) : raw;

        const artifacts: string[] = [];
        const manager = Output.create({
            outputDirectory: config.outputDirectory,
            transcriptName: Transcript.transcriptName(transcriptPath),
            now: clock(),
        });
        // Records every artifact written during the run, including review iterations
        const output: Output.StageWriter = {
            runDirectory: manager.runDirectory,
            saveStage: async (stage, content) => {
                const filePath = await manager.saveStage(stage, content);
                artifacts.push(filePath);
                return filePath;
            },
        };

        // Stage 1: analysis
        let insight = await config.extractor.analyze(transcript);
        const analysisPath = await output.saveStage(STAGES.analysis, toMarkdown(insight));
        logger.info('✓ Analysis saved to: %s', analysisPath);

        // Stage 2: human review, unless running unattended
        let outcome: ProcessOutcome = 'auto';
        if (!config.auto) {
            const session = Review.Session.create({
                refiner: config.refiner,
                output,
                prompter: config.prompter,
                taxonomy: config.taxonomy,
                maxReviewRounds: config.maxReviewRounds,
            });
            const review = await session.run(insight, transcript);
            insight = review.insight;
            outcome = review.outcome;
        }

        const finalPath = await output.saveStage(STAGES.final, toMarkdown(insight));
        logger.info('✓ Final output saved to: %s', finalPath);

        return { insight, outcome, artifacts };
    };

    return {
        process,
    };
};
