/**
 * CLI Entry Point
 *
 * Builds the commander program with the analyze and research commands.
 */

import { Command } from 'commander';
import { PROGRAM_NAME, VERSION } from '../constants';
import { applyLogLevel } from '../arguments';
import { registerAnalyzeCommand } from './analyze';
import { registerResearchCommand } from './research';

export const createProgram = (): Command => {
    const program = new Command();

    program
        .name(PROGRAM_NAME)
        .version(VERSION)
        .description('Extract categorized insights from meeting transcripts, and research topics on the web')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .option('--config-directory <configDirectory>', 'directory holding config.yaml')
        .option('--model <model>', 'model used for transcript analysis')
        .option('--base-url <baseUrl>', 'OpenAI-compatible endpoint');

    // The flags take effect before config is read; config.yaml can still raise the level later
    program.hook('preAction', (_thisCommand, actionCommand) => {
        const opts = actionCommand.optsWithGlobals<{ verbose?: boolean; debug?: boolean }>();
        applyLogLevel({ verbose: opts.verbose ?? false, debug: opts.debug ?? false });
    });

    registerAnalyzeCommand(program);
    registerResearchCommand(program);

    program.addHelpText('after', `
Examples:
  ${PROGRAM_NAME} analyze                     Pick a transcript from ./transcripts
  ${PROGRAM_NAME} analyze notes/standup.md    Analyze one file
  ${PROGRAM_NAME} analyze --first --auto      First transcript, no review
  ${PROGRAM_NAME} research                    Interactive research session
  ${PROGRAM_NAME} research "edge AI chips" --save
`);

    return program;
};

export const runCLI = async (argv: string[] = process.argv): Promise<void> => {
    await createProgram().parseAsync(argv);
};
