#!/usr/bin/env node
import 'dotenv/config';
import { runCLI } from '@/cli';
import { getLogger } from '@/logging';

runCLI().catch((error: unknown) => {
    const logger = getLogger();
    if (error instanceof Error) {
        logger.error('Exiting due to Error: %s, %s', error.message, error.stack);
    } else {
        logger.error('Exiting due to Error: %s', String(error));
    }
    process.exit(1);
});
